import { isSameDay } from "date-fns";
import { accuracy } from "./progress";
import type { UserProgress } from "./types";

export type SkillTier = "legend" | "expert" | "advanced" | "intermediate" | "beginner";

export interface LeaderboardEntry {
  rank: number;
  userId: string;
  value: number;
  totalQuestions: number;
  tier: SkillTier;
}

export interface Leaderboards {
  dailyChampions: LeaderboardEntry[];
  accuracyMasters: LeaderboardEntry[];
  studyLegends: LeaderboardEntry[];
}

export const ACCURACY_MASTER_MIN_QUESTIONS = 10;

export function skillTier(score: number, questions: number): SkillTier {
  if (score >= 100) return "legend";
  if (score >= 50) return "expert";
  if (score >= 25) return "advanced";
  if (questions >= 20) return "intermediate";
  return "beginner";
}

function rank(users: UserProgress[], value: (user: UserProgress) => number, size: number): LeaderboardEntry[] {
  return users
    .map((user) => ({ user, value: value(user) }))
    .sort((a, b) => b.value - a.value || b.user.totalQuestions - a.user.totalQuestions || a.user.userId.localeCompare(b.user.userId))
    .slice(0, size)
    .map(({ user, value: entryValue }, index) => ({
      rank: index + 1,
      userId: user.userId,
      value: entryValue,
      totalQuestions: user.totalQuestions,
      tier: skillTier(user.studyScore, user.totalQuestions)
    }));
}

export function buildLeaderboards(users: UserProgress[], now: Date, size = 5): Leaderboards {
  const activeToday = users.filter((user) => user.lastStudyDate && user.questionsToday > 0 && isSameDay(new Date(user.lastStudyDate), now));
  return {
    dailyChampions: rank(activeToday, (user) => user.questionsToday, size),
    accuracyMasters: rank(
      users.filter((user) => user.totalQuestions >= ACCURACY_MASTER_MIN_QUESTIONS),
      (user) => Math.round(accuracy(user) * 1000) / 10,
      size
    ),
    studyLegends: rank(users.filter((user) => user.totalQuestions > 0), (user) => user.studyScore, size)
  };
}
