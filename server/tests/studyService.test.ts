import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { defaultSettings } from "../src/config";
import { ValidationError } from "../src/errors";
import { ProgressStore } from "../src/progressStore";
import { StudyService } from "../src/studyService";
import { SessionTimerManager, durationsFromSettings } from "../src/timerManager";
import { ManualClock, testTracks } from "./helpers";

describe("StudyService", () => {
  let clock: ManualClock;
  let timers: SessionTimerManager;
  let store: ProgressStore;
  let service: StudyService;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    clock = new ManualClock(new Date(2026, 0, 5, 9, 0));
    const tracks = testTracks();
    store = new ProgressStore(tracks, clock);
    timers = new SessionTimerManager({ durations: durationsFromSettings(defaultSettings), clock });
    service = new StudyService({ store, timers, tracks, settings: defaultSettings, clock });
  });

  afterEach(() => {
    timers.dispose();
    vi.restoreAllMocks();
  });

  it("adapts difficulty as answers come in", async () => {
    for (let index = 0; index < 4; index++) {
      const result = await service.answerQuestion("u1", "Threats", true);
      expect(result.difficulty).toBe("beginner");
    }
    const fifth = await service.answerQuestion("u1", "Threats", true);
    expect(fifth.progress.totalQuestions).toBe(5);
    expect(fifth.progress.correctAnswers).toBe(5);
    expect(fifth.difficulty).toBe("advanced");
  });

  it("reports achievements exactly once", async () => {
    const unlockedPerAnswer: string[][] = [];
    for (let index = 0; index < 11; index++) {
      const result = await service.answerQuestion("u1", index % 2 === 0 ? "Threats" : "Architecture", true);
      unlockedPerAnswer.push(result.unlocked.map((achievement) => achievement.id));
    }
    expect(unlockedPerAnswer[7]).toEqual([]);
    expect(unlockedPerAnswer[8]).toEqual(["topic_expert"]);
    expect(unlockedPerAnswer[9]).toEqual(["first_steps", "perfect_streak"]);
    expect(unlockedPerAnswer[10]).toEqual([]);
    expect(store.get("u1").unlockedAchievements).toEqual(["topic_expert", "first_steps", "perfect_streak"]);
    expect(service.overview("u1").points).toBe(425);
  });

  it("reports each unlock to the answer that earned it when answers arrive together", async () => {
    const topics = ["Threats", "Architecture", "Implementation"];
    for (let index = 0; index < 8; index++) await service.answerQuestion("u1", topics[index % 3], index > 0);
    const [ninth, tenth] = await Promise.all([
      service.answerQuestion("u1", topics[8 % 3], true),
      service.answerQuestion("u1", topics[9 % 3], true)
    ]);
    expect(ninth.progress.totalQuestions).toBe(9);
    expect(ninth.unlocked).toEqual([]);
    expect(tenth.progress.totalQuestions).toBe(10);
    expect(tenth.unlocked.map((achievement) => achievement.id)).toEqual(["first_steps"]);
    expect(store.get("u1").unlockedAchievements).toEqual(["first_steps"]);
  });

  it("builds an overview with weak spots", async () => {
    await service.answerQuestion("u1", "Threats", false);
    await service.answerQuestion("u1", "Architecture", true);
    const overview = service.overview("u1");
    expect(overview.accuracy).toBe(0.5);
    expect(overview.difficulty).toBe("beginner");
    expect(overview.weakSpots.map((spot) => spot.topic)).toEqual(["Threats", "Architecture"]);
  });

  describe("practicePlan", () => {
    it("requires a selected track", () => {
      expect(() => service.practicePlan("u1")).toThrow(ValidationError);
    });

    it("falls back to the first track domains without history", async () => {
      await service.selectTrack("u1", "Security+");
      expect(service.practicePlan("u1")).toEqual({
        track: { id: "Security+", name: "Security+", description: "", domains: ["Threats", "Architecture", "Implementation", "Operations"] },
        difficulty: "beginner",
        weakSpots: [],
        focusTopics: ["Threats", "Architecture", "Implementation"]
      });
    });

    it("focuses on weak spots once they exist", async () => {
      await service.selectTrack("u1", "Security+");
      await service.answerQuestion("u1", "Operations", false);
      await service.answerQuestion("u1", "Threats", true);
      expect(service.practicePlan("u1").focusTopics).toEqual(["Operations", "Threats"]);
    });
  });

  describe("pomodoro", () => {
    it("logs session starts and stops from timer events", () => {
      const log = vi.mocked(console.log);
      timers.start("u1", "short_break");
      expect(log).toHaveBeenLastCalledWith("u1 started a short_break session (5 min)");
      timers.stop("u1");
      expect(log).toHaveBeenLastCalledWith("u1 stopped a short_break session");
    });

    it("credits elapsed minutes when a study session is stopped early", async () => {
      service.startSession("u1", "study");
      clock.advanceMinutes(12);
      const result = await service.stopSession("u1");
      expect(result.creditedMinutes).toBe(12);
      expect(store.get("u1").studyTimeMinutes).toBe(12);
      expect(service.sessionStatus("u1").state).toBe("cancelled");
      expect(service.startSession("u1", "study").state).toBe("running");
    });

    it("does not credit breaks", async () => {
      service.startSession("u1", "long_break");
      clock.advanceMinutes(10);
      expect((await service.stopSession("u1")).creditedMinutes).toBe(0);
      expect(store.has("u1")).toBe(false);
    });

    it("credits the full duration when a study session completes", async () => {
      service.startSession("u1", "study");
      clock.advanceMinutes(26);
      expect(service.sessionStatus("u1").state).toBe("completed");
      await vi.waitFor(() => expect(store.get("u1").studyTimeMinutes).toBe(25));
      service.sessionStatus("u1");
      await new Promise((resolve) => setTimeout(resolve, 0));
      expect(store.get("u1").studyTimeMinutes).toBe(25);
    });
  });

  it("ranks users on the leaderboard", async () => {
    for (let index = 0; index < 10; index++) await service.answerQuestion("alice", "Threats", index < 9);
    for (let index = 0; index < 3; index++) await service.answerQuestion("bob", "Threats", true);
    const boards = service.leaderboard();
    expect(boards.dailyChampions.map((entry) => [entry.userId, entry.value])).toEqual([["alice", 10], ["bob", 3]]);
    expect(boards.accuracyMasters).toEqual([{ rank: 1, userId: "alice", value: 90, totalQuestions: 10, tier: "beginner" }]);
    expect(boards.studyLegends.map((entry) => [entry.userId, entry.value])).toEqual([["alice", 8], ["bob", 3]]);
  });

  it("restores exported state and rolls back a bad import", async () => {
    await service.answerQuestion("u1", "Threats", true);
    service.startSession("u1", "study");
    const exported = JSON.parse(JSON.stringify(service.exportState()));

    await service.answerQuestion("u2", "Threats", true);
    expect(() => service.importState({ progress: exported.progress, timers: { sessions: [{ id: "broken" }] } })).toThrow();
    expect(store.has("u2")).toBe(true);

    expect(service.importState(exported)).toEqual({ users: 1, sessions: 1 });
    expect(store.has("u2")).toBe(false);
    expect(service.sessionStatus("u1").state).toBe("running");
  });
});
