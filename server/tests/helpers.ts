import type { Clock } from "../src/clock";
import { TrackCatalog } from "../src/tracks";

export class ManualClock implements Clock {
  private current: number;

  constructor(start: Date) {
    this.current = start.getTime();
  }

  now() {
    return new Date(this.current);
  }

  advanceMinutes(minutes: number) {
    this.current += minutes * 60_000;
  }
}

export const testTracks = () =>
  new TrackCatalog([
    { id: "Security+", name: "Security+", description: "", domains: ["Threats", "Architecture", "Implementation", "Operations"] },
    { id: "Network+", name: "Network+", description: "", domains: ["Fundamentals", "Troubleshooting"] }
  ]);
