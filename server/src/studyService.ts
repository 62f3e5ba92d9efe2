import { z } from "zod";
import { describeAchievements, evaluate, totalPoints, type AchievementInfo } from "./achievements";
import { nextDifficulty, strengths, weakSpots } from "./adaptive";
import { systemClock, type Clock } from "./clock";
import { ValidationError } from "./errors";
import { buildLeaderboards, type Leaderboards } from "./leaderboard";
import { accuracy, applyAnswer, cloneProgress } from "./progress";
import { mergeAchievements, requireMinutes, requireTimestamp, requireTopic, type ProgressStore } from "./progressStore";
import type { StoppedSession, SessionTimerManager } from "./timerManager";
import type { TrackCatalog } from "./tracks";
import type { Difficulty, ExportPayload, PomodoroSession, SessionCompletedEvent, Settings, TimerStatus, TopicPerformance, Track, UserProgress } from "./types";

export interface StudyServiceDeps {
  store: ProgressStore;
  timers: SessionTimerManager;
  tracks: TrackCatalog;
  settings: Settings;
  clock?: Clock;
}

export interface ProgressOverview {
  progress: UserProgress;
  accuracy: number;
  difficulty: Difficulty;
  weakSpots: TopicPerformance[];
  achievements: AchievementInfo[];
  points: number;
}

export interface AnswerResult {
  progress: UserProgress;
  difficulty: Difficulty;
  weakSpots: TopicPerformance[];
  unlocked: AchievementInfo[];
}

export interface PracticePlan {
  track: Track;
  difficulty: Difficulty;
  weakSpots: string[];
  focusTopics: string[];
}

export interface StopResult extends StoppedSession {
  creditedMinutes: number;
}

const importSchema = z.object({
  progress: z.unknown(),
  timers: z.unknown().optional()
});

/** Routes bot commands into the progress, adaptive, achievement and timer components. */
export class StudyService {
  private readonly store: ProgressStore;
  private readonly timers: SessionTimerManager;
  private readonly tracks: TrackCatalog;
  private readonly settings: Settings;
  private readonly clock: Clock;

  constructor(deps: StudyServiceDeps) {
    this.store = deps.store;
    this.timers = deps.timers;
    this.tracks = deps.tracks;
    this.settings = deps.settings;
    this.clock = deps.clock ?? systemClock;
    this.timers.on("started", (session) => {
      console.log(`${session.userId} started a ${session.sessionType} session (${session.durationMinutes} min)`);
    });
    this.timers.on("cancelled", (session) => {
      console.log(`${session.userId} stopped a ${session.sessionType} session`);
    });
    this.timers.on("completed", (event) => {
      this.handleCompleted(event).catch((error: unknown) => console.error(`Failed to credit session ${event.session.id}`, error));
    });
  }

  listTracks(): Track[] {
    return this.tracks.list();
  }

  overview(userId: string): ProgressOverview {
    const progress = this.store.getOrCreate(userId);
    return {
      progress,
      accuracy: accuracy(progress),
      difficulty: nextDifficulty(progress, this.settings),
      weakSpots: weakSpots(progress, this.settings.weakSpotLimit),
      achievements: describeAchievements(progress.unlockedAchievements),
      points: totalPoints(progress)
    };
  }

  selectTrack(userId: string, track: string) {
    return this.store.selectTrack(userId, track);
  }

  /** Records the answer and merges any unlocks in one queued step, so concurrent answers each see their own result. */
  async answerQuestion(userId: string, topic: string, isCorrect: boolean, timestamp: Date = this.clock.now()): Promise<AnswerResult> {
    const label = requireTopic(topic);
    requireTimestamp(timestamp);
    const { progress, added } = await this.store.update(userId, (draft) => {
      applyAnswer(draft, label, isCorrect, timestamp);
      return this.settleAchievements(draft);
    });
    return {
      progress,
      difficulty: nextDifficulty(progress, this.settings),
      weakSpots: weakSpots(progress, this.settings.weakSpotLimit),
      unlocked: this.announce(userId, added)
    };
  }

  async addStudyMinutes(userId: string, minutes: number) {
    requireMinutes(minutes);
    const { progress, added } = await this.store.update(userId, (draft) => {
      draft.studyTimeMinutes += minutes;
      return this.settleAchievements(draft);
    });
    return { progress, unlocked: this.announce(userId, added) };
  }

  weakSpots(userId: string, limit = this.settings.weakSpotLimit) {
    return weakSpots(this.store.getOrCreate(userId), limit);
  }

  strengths(userId: string, limit = this.settings.weakSpotLimit) {
    return strengths(this.store.getOrCreate(userId), limit);
  }

  /** What question generation needs: the track, a difficulty label and the topics to lean on. */
  practicePlan(userId: string): PracticePlan {
    const progress = this.store.getOrCreate(userId);
    if (!progress.selectedTrack) throw new ValidationError("Select a track before practicing");
    const track = this.tracks.get(progress.selectedTrack);
    const weak = weakSpots(progress, this.settings.weakSpotLimit).map((spot) => spot.topic);
    return {
      track,
      difficulty: nextDifficulty(progress, this.settings),
      weakSpots: weak,
      focusTopics: weak.length ? weak : track.domains.slice(0, 3)
    };
  }

  startSession(userId: string, sessionType: string): PomodoroSession {
    return this.timers.start(userId, sessionType);
  }

  async stopSession(userId: string): Promise<StopResult> {
    const stopped = this.timers.stop(userId);
    if (stopped.session.sessionType !== "study" || stopped.elapsedMinutes <= 0) return { ...stopped, creditedMinutes: 0 };
    await this.addStudyMinutes(userId, stopped.elapsedMinutes);
    return { ...stopped, creditedMinutes: stopped.elapsedMinutes };
  }

  sessionStatus(userId: string): TimerStatus {
    return this.timers.status(userId);
  }

  leaderboard(): Leaderboards {
    return buildLeaderboards(this.store.list(), this.clock.now(), this.settings.leaderboardSize);
  }

  exportState(): ExportPayload {
    return { progress: this.store.exportState(), timers: this.timers.exportState() };
  }

  importState(payload: unknown) {
    const parsed = importSchema.parse(payload);
    const previous = this.store.exportState();
    const users = this.store.importState(parsed.progress);
    try {
      const sessions = this.timers.importState(parsed.timers ?? { sessions: [] });
      return { users, sessions };
    } catch (error) {
      this.store.importState(previous);
      throw error;
    }
  }

  private settleAchievements(draft: UserProgress) {
    const added = mergeAchievements(draft, evaluate(draft));
    return { progress: cloneProgress(draft), added };
  }

  private announce(userId: string, added: string[]): AchievementInfo[] {
    const unlocked = describeAchievements(added);
    for (const achievement of unlocked) console.log(`${userId} unlocked ${achievement.name} (+${achievement.points} pts)`);
    return unlocked;
  }

  private async handleCompleted({ session }: SessionCompletedEvent) {
    console.log(`${session.userId} completed a ${session.sessionType} session (${session.durationMinutes} min)`);
    if (session.sessionType !== "study") return;
    await this.addStudyMinutes(session.userId, session.durationMinutes);
  }
}
