import { z } from "zod";
import { systemClock, type Clock } from "./clock";
import { NotFoundError, ValidationError } from "./errors";
import { KeyedQueue } from "./keyedQueue";
import { applyAnswer, cloneProgress, createProgress } from "./progress";
import type { TrackCatalog } from "./tracks";
import type { ProgressSnapshot, UserProgress } from "./types";

const topicStatSchema = z.object({
  attempts: z.number().int().min(0),
  correct: z.number().int().min(0)
}).refine((stat) => stat.correct <= stat.attempts, { message: "topic correct must not exceed attempts" });

export const progressSchema = z.object({
  userId: z.string().min(1),
  selectedTrack: z.string().nullable().default(null),
  studyStreak: z.number().int().min(0),
  totalQuestions: z.number().int().min(0),
  correctAnswers: z.number().int().min(0),
  studyScore: z.number().int().default(0),
  currentCorrectRun: z.number().int().min(0).default(0),
  questionsToday: z.number().int().min(0).default(0),
  studyTimeMinutes: z.number().int().min(0),
  lastStudyDate: z.string().datetime().nullable().default(null),
  topicStats: z.record(z.string(), topicStatSchema).default({}),
  unlockedAchievements: z.array(z.string()).default([]),
  createdAt: z.string().datetime()
}).superRefine((progress, ctx) => {
  if (progress.correctAnswers > progress.totalQuestions) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "correctAnswers must not exceed totalQuestions" });
  }
  if (progress.currentCorrectRun > progress.correctAnswers) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "currentCorrectRun must not exceed correctAnswers" });
  }
}).transform((progress) => ({ ...progress, unlockedAchievements: [...new Set(progress.unlockedAchievements)] }));

export const progressSnapshotSchema = z.object({
  users: z.array(progressSchema).default([])
}).superRefine((snapshot, ctx) => {
  const seen = new Set<string>();
  for (const user of snapshot.users) {
    if (seen.has(user.userId)) ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate userId ${user.userId}` });
    seen.add(user.userId);
  }
});

function requireUserId(userId: string) {
  if (typeof userId !== "string" || !userId.trim()) throw new ValidationError("userId must be a non-empty string");
}

export function requireTopic(topic: string): string {
  const label = typeof topic === "string" ? topic.trim() : "";
  if (!label) throw new ValidationError("topic must be a non-empty string");
  return label;
}

export function requireTimestamp(timestamp: Date) {
  if (Number.isNaN(timestamp.getTime())) throw new ValidationError("timestamp must be a valid date");
}

export function requireMinutes(minutes: number) {
  if (!Number.isInteger(minutes) || minutes <= 0) throw new ValidationError("minutes must be a positive integer");
}

/**
 * Owns every user's progress record. Mutations for one user run through a
 * per-user queue against a draft copy and are committed only when the
 * mutator finishes without throwing.
 */
export class ProgressStore {
  private readonly records = new Map<string, UserProgress>();
  private readonly queue = new KeyedQueue();

  constructor(private readonly tracks: TrackCatalog, private readonly clock: Clock = systemClock) {}

  getOrCreate(userId: string): UserProgress {
    return cloneProgress(this.ensure(userId));
  }

  get(userId: string): UserProgress {
    const record = this.records.get(userId);
    if (!record) throw new NotFoundError(`No progress recorded for user ${userId}`);
    return cloneProgress(record);
  }

  has(userId: string) {
    return this.records.has(userId);
  }

  list(): UserProgress[] {
    return [...this.records.values()].map(cloneProgress);
  }

  async update<T>(userId: string, mutator: (draft: UserProgress) => T | Promise<T>): Promise<T> {
    requireUserId(userId);
    return this.queue.run(userId, async () => {
      const draft = cloneProgress(this.ensure(userId));
      const result = await mutator(draft);
      this.records.set(userId, draft);
      return result;
    });
  }

  async recordAnswer(userId: string, topic: string, isCorrect: boolean, timestamp: Date = this.clock.now()): Promise<UserProgress> {
    const label = requireTopic(topic);
    requireTimestamp(timestamp);
    return this.update(userId, (draft) => {
      applyAnswer(draft, label, isCorrect, timestamp);
      return cloneProgress(draft);
    });
  }

  async addStudyMinutes(userId: string, minutes: number): Promise<UserProgress> {
    requireMinutes(minutes);
    return this.update(userId, (draft) => {
      draft.studyTimeMinutes += minutes;
      return cloneProgress(draft);
    });
  }

  async selectTrack(userId: string, track: string): Promise<UserProgress> {
    if (!this.tracks.has(track)) throw new ValidationError(`Unknown track: ${track}`);
    return this.update(userId, (draft) => {
      draft.selectedTrack = track;
      return cloneProgress(draft);
    });
  }

  async unlockAchievements(userId: string, ids: string[]): Promise<string[]> {
    return this.update(userId, (draft) => mergeAchievements(draft, ids));
  }

  exportState(): ProgressSnapshot {
    return { users: this.list() };
  }

  importState(snapshot: unknown) {
    const parsed = progressSnapshotSchema.parse(snapshot);
    this.records.clear();
    for (const user of parsed.users) this.records.set(user.userId, user);
    return parsed.users.length;
  }

  private ensure(userId: string): UserProgress {
    requireUserId(userId);
    let record = this.records.get(userId);
    if (!record) {
      record = createProgress(userId, this.clock.now());
      this.records.set(userId, record);
    }
    return record;
  }
}

export function mergeAchievements(progress: UserProgress, ids: string[]): string[] {
  const known = new Set(progress.unlockedAchievements);
  const added: string[] = [];
  for (const id of ids) {
    if (known.has(id)) continue;
    known.add(id);
    added.push(id);
  }
  progress.unlockedAchievements.push(...added);
  return added;
}
