import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { NotFoundError } from "./errors";
import type { Track } from "./types";

export const defaultTracksPath = path.resolve(__dirname, "../data/tracks.json");

export const trackSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional().default(""),
  domains: z.array(z.string().min(1)).min(1)
});

export class TrackCatalog {
  private readonly tracks: Map<string, Track>;

  constructor(tracks: Track[]) {
    this.tracks = new Map(tracks.map((track) => [track.id, track]));
  }

  list(): Track[] {
    return [...this.tracks.values()].map((track) => ({ ...track, domains: [...track.domains] }));
  }

  has(id: string) {
    return this.tracks.has(id);
  }

  get(id: string): Track {
    const track = this.tracks.get(id);
    if (!track) throw new NotFoundError(`Unknown track: ${id}`);
    return { ...track, domains: [...track.domains] };
  }
}

export async function loadTracks(filePath = defaultTracksPath): Promise<TrackCatalog> {
  const raw: unknown = JSON.parse(await fs.readFile(filePath, "utf-8"));
  const tracks = z.array(trackSchema).parse(raw);
  const ids = new Set<string>();
  for (const track of tracks) {
    if (ids.has(track.id)) throw new Error(`Duplicate track id in ${filePath}: ${track.id}`);
    ids.add(track.id);
  }
  return new TrackCatalog(tracks);
}
