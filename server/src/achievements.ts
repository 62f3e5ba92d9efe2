import { accuracy } from "./progress";
import type { UserProgress } from "./types";

export type AchievementCategory = "volume" | "accuracy" | "consistency" | "mastery" | "focus";

export interface Achievement {
  id: string;
  name: string;
  description: string;
  category: AchievementCategory;
  points: number;
  predicate: (progress: UserProgress) => boolean;
}

export type AchievementInfo = Omit<Achievement, "predicate">;

const accuracyOver = (minimum: number, ratio: number) => (progress: UserProgress) =>
  progress.totalQuestions >= minimum && accuracy(progress) >= ratio;

export const ACHIEVEMENTS: readonly Achievement[] = [
  { id: "first_steps", name: "First Steps", description: "Answer 10 practice questions", category: "volume", points: 25, predicate: (p) => p.totalQuestions >= 10 },
  { id: "question_warrior", name: "Question Warrior", description: "Answer 100+ practice questions", category: "volume", points: 150, predicate: (p) => p.totalQuestions >= 100 },
  { id: "study_legend", name: "Study Legend", description: "Answer 500+ practice questions", category: "volume", points: 500, predicate: (p) => p.totalQuestions >= 500 },
  { id: "sharpshooter", name: "Sharpshooter", description: "Keep 90%+ accuracy over 20+ questions", category: "accuracy", points: 100, predicate: accuracyOver(20, 0.9) },
  { id: "accuracy_master", name: "Accuracy Master", description: "Maintain 90%+ accuracy over 50+ questions", category: "accuracy", points: 200, predicate: accuracyOver(50, 0.9) },
  { id: "perfect_streak", name: "Perfect Streak", description: "Answer 10 questions correctly in a row", category: "accuracy", points: 150, predicate: (p) => p.currentCorrectRun >= 10 },
  { id: "week_warrior", name: "Week Warrior", description: "Study 7 days in a row", category: "consistency", points: 150, predicate: (p) => p.studyStreak >= 7 },
  {
    id: "topic_expert",
    name: "Topic Expert",
    description: "Reach 85%+ accuracy in a topic with 5+ attempts",
    category: "mastery",
    points: 250,
    predicate: (p) => Object.values(p.topicStats).some((stat) => stat.attempts >= 5 && stat.correct / stat.attempts >= 0.85)
  },
  { id: "deep_focus", name: "Deep Focus", description: "Log 60 minutes of focused study", category: "focus", points: 75, predicate: (p) => p.studyTimeMinutes >= 60 }
];

const byId = new Map(ACHIEVEMENTS.map((achievement) => [achievement.id, achievement]));

/** Ids that hold for `progress` but are not yet unlocked, in table order. */
export function evaluate(progress: UserProgress, table: readonly Achievement[] = ACHIEVEMENTS): string[] {
  const unlocked = new Set(progress.unlockedAchievements);
  return table.filter((achievement) => !unlocked.has(achievement.id) && achievement.predicate(progress)).map((achievement) => achievement.id);
}

export function describeAchievements(ids: string[]): AchievementInfo[] {
  return ids.flatMap((id) => {
    const achievement = byId.get(id);
    if (!achievement) return [];
    const { predicate: _predicate, ...info } = achievement;
    return [info];
  });
}

export function totalPoints(progress: Pick<UserProgress, "unlockedAchievements">) {
  return progress.unlockedAchievements.reduce((sum, id) => sum + (byId.get(id)?.points ?? 0), 0);
}
