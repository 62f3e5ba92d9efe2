import { z } from "zod";
import { ValidationError } from "./errors";
import type { Settings } from "./types";

export const settingsSchema = z.object({
  port: z.number().int().min(1).max(65535),
  studyMinutes: z.number().int().min(1),
  shortBreakMinutes: z.number().int().min(1),
  longBreakMinutes: z.number().int().min(1),
  minSampleSize: z.number().int().min(1),
  lowAccuracyThreshold: z.number().min(0).max(1),
  highAccuracyThreshold: z.number().min(0).max(1),
  weakSpotLimit: z.number().int().min(1),
  sessionRetentionMinutes: z.number().min(0),
  activeExpiry: z.boolean(),
  leaderboardSize: z.number().int().min(1)
}).superRefine((settings, ctx) => {
  if (settings.lowAccuracyThreshold > settings.highAccuracyThreshold) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "lowAccuracyThreshold must not exceed highAccuracyThreshold" });
  }
});

export const defaultSettings: Settings = {
  port: 5174,
  studyMinutes: 25,
  shortBreakMinutes: 5,
  longBreakMinutes: 15,
  minSampleSize: 5,
  lowAccuracyThreshold: 0.65,
  highAccuracyThreshold: 0.85,
  weakSpotLimit: 5,
  sessionRetentionMinutes: 60,
  activeExpiry: true,
  leaderboardSize: 5
};

const envNumber = (value: string | undefined) => (value === undefined || value.trim() === "" ? undefined : Number(value));
const envFlagSchema = z.enum(["true", "false", "1", "0"]);
const envBoolean = (name: string, value: string | undefined) => {
  if (value === undefined || value.trim() === "") return undefined;
  const flag = envFlagSchema.safeParse(value.trim().toLowerCase());
  if (!flag.success) throw new ValidationError(`${name} must be one of true, false, 1, 0 (got "${value}")`);
  return flag.data === "true" || flag.data === "1";
};

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const overrides = {
    port: envNumber(env.PORT),
    studyMinutes: envNumber(env.STUDY_MINUTES),
    shortBreakMinutes: envNumber(env.SHORT_BREAK_MINUTES),
    longBreakMinutes: envNumber(env.LONG_BREAK_MINUTES),
    minSampleSize: envNumber(env.MIN_SAMPLE_SIZE),
    lowAccuracyThreshold: envNumber(env.LOW_ACCURACY_THRESHOLD),
    highAccuracyThreshold: envNumber(env.HIGH_ACCURACY_THRESHOLD),
    sessionRetentionMinutes: envNumber(env.SESSION_RETENTION_MINUTES),
    activeExpiry: envBoolean("ACTIVE_EXPIRY", env.ACTIVE_EXPIRY)
  };
  const merged: Record<string, unknown> = { ...defaultSettings };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }
  return settingsSchema.parse(merged);
}
