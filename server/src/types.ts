export type Difficulty = "beginner" | "intermediate" | "advanced";

export type SessionType = "study" | "short_break" | "long_break";

export type SessionState = "running" | "completed" | "cancelled";

export interface Settings {
  port: number;
  studyMinutes: number;
  shortBreakMinutes: number;
  longBreakMinutes: number;
  minSampleSize: number;
  lowAccuracyThreshold: number;
  highAccuracyThreshold: number;
  weakSpotLimit: number;
  sessionRetentionMinutes: number;
  activeExpiry: boolean;
  leaderboardSize: number;
}

export interface Track {
  id: string;
  name: string;
  description: string;
  domains: string[];
}

export interface TopicStat {
  attempts: number;
  correct: number;
}

export interface UserProgress {
  userId: string;
  selectedTrack: string | null;
  studyStreak: number;
  totalQuestions: number;
  correctAnswers: number;
  studyScore: number;
  currentCorrectRun: number;
  questionsToday: number;
  studyTimeMinutes: number;
  lastStudyDate: string | null;
  topicStats: Record<string, TopicStat>;
  unlockedAchievements: string[];
  createdAt: string;
}

export interface TopicPerformance {
  topic: string;
  attempts: number;
  correct: number;
  accuracy: number;
}

export interface PomodoroSession {
  id: string;
  userId: string;
  sessionType: SessionType;
  startTime: string;
  durationMinutes: number;
  state: SessionState;
  endedAt: string | null;
}

export interface TimerStatus {
  state: SessionState | "idle";
  sessionType: SessionType | null;
  elapsedMinutes: number;
  remainingMinutes: number;
}

export interface SessionCompletedEvent {
  session: PomodoroSession;
}

export interface ProgressSnapshot {
  users: UserProgress[];
}

export interface TimerSnapshot {
  sessions: PomodoroSession[];
}

export interface ExportPayload {
  progress: ProgressSnapshot;
  timers: TimerSnapshot;
}
