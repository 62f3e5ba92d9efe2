import { randomUUID } from "crypto";
import { EventEmitter } from "eventemitter3";
import { z } from "zod";
import { systemClock, type Clock } from "./clock";
import { ConflictError, NotFoundError, ValidationError } from "./errors";
import type { PomodoroSession, SessionCompletedEvent, SessionType, Settings, TimerSnapshot, TimerStatus } from "./types";

const MINUTE_MS = 60_000;

export const sessionTypeSchema = z.union([z.literal("study"), z.literal("short_break"), z.literal("long_break")]);

export const pomodoroSessionSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  sessionType: sessionTypeSchema,
  startTime: z.string().datetime(),
  durationMinutes: z.number().int().min(1),
  state: z.union([z.literal("running"), z.literal("completed"), z.literal("cancelled")]),
  endedAt: z.string().datetime().nullable().default(null)
}).transform((session) => {
  if (session.state === "running") return { ...session, endedAt: null };
  if (session.endedAt) return session;
  // a terminal record without an end time ends when its duration ran out
  const endedAt = new Date(Date.parse(session.startTime) + session.durationMinutes * MINUTE_MS).toISOString();
  return { ...session, endedAt };
});

const timerSnapshotSchema = z.object({
  sessions: z.array(pomodoroSessionSchema).default([])
});

export interface TimerEvents {
  started: [PomodoroSession];
  cancelled: [PomodoroSession];
  completed: [SessionCompletedEvent];
}

export interface TimerManagerOptions {
  durations: Record<SessionType, number>;
  clock?: Clock;
  retentionMinutes?: number;
  /** Schedule a timer per session so completion is pushed, not only seen on the next poll. */
  activeExpiry?: boolean;
}

export interface StoppedSession {
  session: PomodoroSession;
  elapsedMinutes: number;
}

export function durationsFromSettings(settings: Pick<Settings, "studyMinutes" | "shortBreakMinutes" | "longBreakMinutes">): Record<SessionType, number> {
  return { study: settings.studyMinutes, short_break: settings.shortBreakMinutes, long_break: settings.longBreakMinutes };
}

/**
 * Per-user Pomodoro state machines: idle -> running -> completed | cancelled.
 * Every transition is synchronous, so a stop is visible to any status call
 * made after it returns. A session emits `completed` exactly once, whichever
 * of status, start, stop or the expiry timer notices it first.
 */
export class SessionTimerManager extends EventEmitter<TimerEvents> {
  private readonly sessions = new Map<string, PomodoroSession>();
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly clock: Clock;
  private readonly durations: Record<SessionType, number>;
  private readonly retentionMs: number;
  private readonly activeExpiry: boolean;

  constructor(options: TimerManagerOptions) {
    super();
    this.clock = options.clock ?? systemClock;
    this.durations = { ...options.durations };
    this.retentionMs = (options.retentionMinutes ?? 60) * MINUTE_MS;
    this.activeExpiry = options.activeExpiry ?? false;
  }

  start(userId: string, sessionType: string): PomodoroSession {
    if (!userId) throw new ValidationError("userId must be a non-empty string");
    const parsedType = sessionTypeSchema.safeParse(sessionType);
    if (!parsedType.success) throw new ValidationError(`Unknown session type: ${sessionType}`);

    const existing = this.settle(userId);
    if (existing?.state === "running") {
      const remaining = this.remainingMinutes(existing);
      throw new ConflictError(`A ${existing.sessionType} session is already running (${remaining} minutes remaining)`);
    }

    const session: PomodoroSession = {
      id: `s_${randomUUID()}`,
      userId,
      sessionType: parsedType.data,
      startTime: this.clock.now().toISOString(),
      durationMinutes: this.durations[parsedType.data],
      state: "running",
      endedAt: null
    };
    this.sessions.set(userId, session);
    this.schedule(session);
    this.emit("started", { ...session });
    return { ...session };
  }

  stop(userId: string): StoppedSession {
    const session = this.settle(userId);
    if (!session || session.state !== "running") throw new NotFoundError("No running session to stop");

    const elapsedMinutes = this.elapsedMinutes(session);
    session.state = "cancelled";
    session.endedAt = this.clock.now().toISOString();
    this.clearTimer(userId);
    this.emit("cancelled", { ...session });
    return { session: { ...session }, elapsedMinutes };
  }

  status(userId: string): TimerStatus {
    const session = this.settle(userId);
    if (!session) return { state: "idle", sessionType: null, elapsedMinutes: 0, remainingMinutes: 0 };
    if (session.state === "running") {
      return { state: "running", sessionType: session.sessionType, elapsedMinutes: this.elapsedMinutes(session), remainingMinutes: this.remainingMinutes(session) };
    }
    const ended = session.endedAt ? new Date(session.endedAt) : this.clock.now();
    return { state: session.state, sessionType: session.sessionType, elapsedMinutes: this.elapsedMinutes(session, ended), remainingMinutes: 0 };
  }

  get(userId: string): PomodoroSession | null {
    const session = this.settle(userId);
    return session ? { ...session } : null;
  }

  /** Settles expired sessions and drops terminal records past retention. */
  sweep() {
    for (const userId of [...this.sessions.keys()]) this.settle(userId);
  }

  exportState(): TimerSnapshot {
    this.sweep();
    return { sessions: [...this.sessions.values()].map((session) => ({ ...session })) };
  }

  importState(snapshot: unknown) {
    const parsed = timerSnapshotSchema.parse(snapshot);
    const seen = new Set<string>();
    for (const session of parsed.sessions) {
      if (seen.has(session.userId)) throw new ValidationError(`Duplicate session for user ${session.userId}`);
      seen.add(session.userId);
    }
    this.dispose();
    this.sessions.clear();
    for (const session of parsed.sessions) {
      this.sessions.set(session.userId, session);
      if (session.state === "running") this.schedule(session);
    }
    this.sweep();
    return parsed.sessions.length;
  }

  dispose() {
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
  }

  private settle(userId: string): PomodoroSession | undefined {
    const session = this.sessions.get(userId);
    if (!session) return undefined;
    const now = this.clock.now();

    if (session.state === "running" && now.getTime() - Date.parse(session.startTime) >= session.durationMinutes * MINUTE_MS) {
      this.complete(session);
    }
    if (session.state !== "running" && session.endedAt && now.getTime() - Date.parse(session.endedAt) > this.retentionMs) {
      this.sessions.delete(userId);
      return undefined;
    }
    return session;
  }

  private complete(session: PomodoroSession) {
    session.state = "completed";
    session.endedAt = new Date(Date.parse(session.startTime) + session.durationMinutes * MINUTE_MS).toISOString();
    this.clearTimer(session.userId);
    this.emit("completed", { session: { ...session } });
  }

  private schedule(session: PomodoroSession) {
    if (!this.activeExpiry) return;
    this.clearTimer(session.userId);
    const dueIn = Math.max(0, Date.parse(session.startTime) + session.durationMinutes * MINUTE_MS - this.clock.now().getTime());
    const timer = setTimeout(() => this.expire(session.userId, session.id), dueIn);
    timer.unref();
    this.timers.set(session.userId, timer);
  }

  private expire(userId: string, sessionId: string) {
    this.timers.delete(userId);
    const session = this.sessions.get(userId);
    if (!session || session.id !== sessionId || session.state !== "running") return;
    this.settle(userId);
    // Fired ahead of the clock: wait out the difference.
    if (session.state === "running") this.schedule(session);
  }

  private clearTimer(userId: string) {
    const timer = this.timers.get(userId);
    if (timer) clearTimeout(timer);
    this.timers.delete(userId);
  }

  private elapsedMinutes(session: PomodoroSession, until: Date = this.clock.now()) {
    const elapsedMs = Math.max(0, until.getTime() - Date.parse(session.startTime));
    return Math.min(session.durationMinutes, Math.floor(elapsedMs / MINUTE_MS));
  }

  private remainingMinutes(session: PomodoroSession) {
    const remainingMs = Date.parse(session.startTime) + session.durationMinutes * MINUTE_MS - this.clock.now().getTime();
    return Math.max(0, Math.ceil(remainingMs / MINUTE_MS));
  }
}
