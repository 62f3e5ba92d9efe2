import { ValidationError } from "./errors";
import { accuracy } from "./progress";
import type { Difficulty, Settings, TopicPerformance, UserProgress } from "./types";

export type DifficultyPolicy = Pick<Settings, "minSampleSize" | "lowAccuracyThreshold" | "highAccuracyThreshold">;

export const defaultDifficultyPolicy: DifficultyPolicy = {
  minSampleSize: 5,
  lowAccuracyThreshold: 0.65,
  highAccuracyThreshold: 0.85
};

export function nextDifficulty(
  progress: Pick<UserProgress, "totalQuestions" | "correctAnswers">,
  policy: DifficultyPolicy = defaultDifficultyPolicy
): Difficulty {
  if (progress.totalQuestions < policy.minSampleSize) return "beginner";
  const ratio = accuracy(progress);
  if (ratio < policy.lowAccuracyThreshold) return "beginner";
  if (ratio >= policy.highAccuracyThreshold) return "advanced";
  return "intermediate";
}

export function topicPerformance(progress: Pick<UserProgress, "topicStats">): TopicPerformance[] {
  return Object.entries(progress.topicStats)
    .filter(([, stat]) => stat.attempts > 0)
    .map(([topic, stat]) => ({ topic, attempts: stat.attempts, correct: stat.correct, accuracy: stat.correct / stat.attempts }));
}

function requireLimit(limit: number) {
  if (!Number.isInteger(limit) || limit < 0) throw new ValidationError("limit must be a non-negative integer");
}

/** Lowest accuracy first; among equals, the topic with more evidence comes first. */
export function weakSpots(progress: Pick<UserProgress, "topicStats">, limit: number): TopicPerformance[] {
  requireLimit(limit);
  return topicPerformance(progress)
    .sort((a, b) => a.accuracy - b.accuracy || b.attempts - a.attempts || a.topic.localeCompare(b.topic))
    .slice(0, limit);
}

export function strengths(progress: Pick<UserProgress, "topicStats">, limit: number): TopicPerformance[] {
  requireLimit(limit);
  return topicPerformance(progress)
    .sort((a, b) => b.accuracy - a.accuracy || b.attempts - a.attempts || a.topic.localeCompare(b.topic))
    .slice(0, limit);
}
