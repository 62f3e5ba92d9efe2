import { describe, expect, it } from "vitest";
import { nextDifficulty, strengths, weakSpots } from "../src/adaptive";
import { ValidationError } from "../src/errors";
import { createProgress } from "../src/progress";
import type { TopicStat, UserProgress } from "../src/types";

const withTopics = (topicStats: Record<string, TopicStat>): UserProgress => ({ ...createProgress("u1", new Date(2026, 0, 1)), topicStats });

describe("nextDifficulty", () => {
  it("stays at beginner below the minimum sample regardless of accuracy", () => {
    expect(nextDifficulty({ totalQuestions: 4, correctAnswers: 4 })).toBe("beginner");
    expect(nextDifficulty({ totalQuestions: 0, correctAnswers: 0 })).toBe("beginner");
  });

  it("moves to advanced once the sample is large enough and accuracy is high", () => {
    expect(nextDifficulty({ totalQuestions: 5, correctAnswers: 5 })).toBe("advanced");
  });

  it("maps accuracy bands onto difficulty", () => {
    expect(nextDifficulty({ totalQuestions: 20, correctAnswers: 12 })).toBe("beginner");
    expect(nextDifficulty({ totalQuestions: 20, correctAnswers: 13 })).toBe("intermediate");
    expect(nextDifficulty({ totalQuestions: 20, correctAnswers: 16 })).toBe("intermediate");
    expect(nextDifficulty({ totalQuestions: 20, correctAnswers: 17 })).toBe("advanced");
  });

  it("honours a custom policy", () => {
    const policy = { minSampleSize: 10, lowAccuracyThreshold: 0.5, highAccuracyThreshold: 0.95 };
    expect(nextDifficulty({ totalQuestions: 9, correctAnswers: 9 }, policy)).toBe("beginner");
    expect(nextDifficulty({ totalQuestions: 10, correctAnswers: 9 }, policy)).toBe("intermediate");
    expect(nextDifficulty({ totalQuestions: 10, correctAnswers: 4 }, policy)).toBe("beginner");
  });
});

describe("weakSpots", () => {
  const progress = withTopics({
    Threats: { attempts: 4, correct: 1 },
    Architecture: { attempts: 8, correct: 2 },
    Implementation: { attempts: 5, correct: 5 },
    Operations: { attempts: 0, correct: 0 },
    Governance: { attempts: 3, correct: 2 }
  });

  it("orders by ascending accuracy and prefers more attempts on ties", () => {
    expect(weakSpots(progress, 10).map((spot) => spot.topic)).toEqual(["Architecture", "Threats", "Governance", "Implementation"]);
  });

  it("never returns topics without attempts and keeps accuracy non-decreasing", () => {
    const spots = weakSpots(progress, 10);
    expect(spots.some((spot) => spot.attempts === 0)).toBe(false);
    for (let index = 1; index < spots.length; index++) {
      expect(spots[index].accuracy).toBeGreaterThanOrEqual(spots[index - 1].accuracy);
    }
  });

  it("respects the limit", () => {
    expect(weakSpots(progress, 2)).toEqual([
      { topic: "Architecture", attempts: 8, correct: 2, accuracy: 0.25 },
      { topic: "Threats", attempts: 4, correct: 1, accuracy: 0.25 }
    ]);
    expect(weakSpots(progress, 0)).toEqual([]);
  });

  it("rejects invalid limits", () => {
    expect(() => weakSpots(progress, -1)).toThrow(ValidationError);
    expect(() => weakSpots(progress, 1.5)).toThrow(ValidationError);
  });

  it("returns strongest topics first for strengths", () => {
    expect(strengths(progress, 2).map((spot) => spot.topic)).toEqual(["Implementation", "Governance"]);
  });
});
