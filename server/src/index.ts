import { loadSettings } from "./config";
import { createApp } from "./app";
import { ProgressStore } from "./progressStore";
import { StudyService } from "./studyService";
import { SessionTimerManager, durationsFromSettings } from "./timerManager";
import { loadTracks } from "./tracks";

async function main() {
  const settings = loadSettings();
  const tracks = await loadTracks();
  const store = new ProgressStore(tracks);
  const timers = new SessionTimerManager({
    durations: durationsFromSettings(settings),
    retentionMinutes: settings.sessionRetentionMinutes,
    activeExpiry: settings.activeExpiry
  });
  const service = new StudyService({ store, timers, tracks, settings });

  const sweep = setInterval(() => timers.sweep(), 60_000);
  sweep.unref();

  const app = createApp(service);
  app.listen(settings.port, () => console.log(`Server listening on http://localhost:${settings.port}`));
}

main().catch((error: unknown) => {
  console.error("Failed to start server", error);
  process.exitCode = 1;
});
