import { differenceInCalendarDays } from "date-fns";
import type { UserProgress } from "./types";

export function createProgress(userId: string, createdAt: Date): UserProgress {
  return {
    userId,
    selectedTrack: null,
    studyStreak: 0,
    totalQuestions: 0,
    correctAnswers: 0,
    studyScore: 0,
    currentCorrectRun: 0,
    questionsToday: 0,
    studyTimeMinutes: 0,
    lastStudyDate: null,
    topicStats: {},
    unlockedAchievements: [],
    createdAt: createdAt.toISOString()
  };
}

export function cloneProgress(progress: UserProgress): UserProgress {
  const topicStats: UserProgress["topicStats"] = {};
  for (const [topic, stat] of Object.entries(progress.topicStats)) {
    topicStats[topic] = { ...stat };
  }
  return { ...progress, topicStats, unlockedAchievements: [...progress.unlockedAchievements] };
}

/**
 * Streak rules: first activity starts at 1, the same calendar day keeps it,
 * the next day extends it, any longer gap restarts at 1. An answer dated
 * before the last study day is counted but moves no dates.
 */
export function applyAnswer(progress: UserProgress, topic: string, isCorrect: boolean, timestamp: Date) {
  progress.totalQuestions += 1;
  const stat = progress.topicStats[topic] ?? { attempts: 0, correct: 0 };
  stat.attempts += 1;

  if (isCorrect) {
    progress.correctAnswers += 1;
    progress.studyScore += 1;
    progress.currentCorrectRun += 1;
    stat.correct += 1;
  } else {
    progress.studyScore -= 1;
    progress.currentCorrectRun = 0;
  }
  progress.topicStats[topic] = stat;

  if (!progress.lastStudyDate) {
    progress.studyStreak = 1;
    progress.questionsToday = 1;
    progress.lastStudyDate = timestamp.toISOString();
    return;
  }

  const gap = differenceInCalendarDays(timestamp, new Date(progress.lastStudyDate));
  if (gap < 0) return;

  if (gap === 0) {
    progress.questionsToday += 1;
    progress.studyStreak = Math.max(progress.studyStreak, 1);
  } else {
    progress.questionsToday = 1;
    progress.studyStreak = gap === 1 ? progress.studyStreak + 1 : 1;
  }
  progress.lastStudyDate = timestamp.toISOString();
}

export function accuracy(progress: Pick<UserProgress, "totalQuestions" | "correctAnswers">) {
  return progress.totalQuestions === 0 ? 0 : progress.correctAnswers / progress.totalQuestions;
}
