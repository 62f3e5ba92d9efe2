import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";
import cors from "cors";
import { z, ZodError } from "zod";
import { StudyError } from "./errors";
import { sessionTypeSchema } from "./timerManager";
import type { StudyService } from "./studyService";

const trackPayloadSchema = z.object({ track: z.string().min(1) });
const answerPayloadSchema = z.object({
  topic: z.string().trim().min(1),
  isCorrect: z.boolean(),
  timestamp: z.string().datetime().optional()
});
const minutesPayloadSchema = z.object({ minutes: z.number().int().min(1) });
const sessionPayloadSchema = z.object({ sessionType: sessionTypeSchema.optional().default("study") });
const limitQuerySchema = z.object({ limit: z.coerce.number().int().min(0).max(50).optional() });

const handle = (handler: (req: Request, res: Response) => unknown | Promise<unknown>): RequestHandler =>
  (req, res, next) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };

export function createApp(service: StudyService) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  app.use("/api", (_req, res, next) => {
    res.setHeader("Cache-Control", "no-store, no-cache, must-revalidate, proxy-revalidate");
    next();
  });

  app.get("/api/tracks", (_req, res) => res.json(service.listTracks()));

  app.get("/api/users/:userId/progress", handle((req, res) => res.json(service.overview(req.params.userId))));

  app.put("/api/users/:userId/track", handle(async (req, res) => {
    const parsed = trackPayloadSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: "Invalid track payload" });
    res.json(await service.selectTrack(req.params.userId, parsed.data.track));
  }));

  app.post("/api/users/:userId/answers", handle(async (req, res) => {
    const parsed = answerPayloadSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: "Invalid answer payload" });
    const timestamp = parsed.data.timestamp ? new Date(parsed.data.timestamp) : undefined;
    res.status(201).json(await service.answerQuestion(req.params.userId, parsed.data.topic, parsed.data.isCorrect, timestamp));
  }));

  app.post("/api/users/:userId/study-minutes", handle(async (req, res) => {
    const parsed = minutesPayloadSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: "minutes must be a positive integer" });
    res.json(await service.addStudyMinutes(req.params.userId, parsed.data.minutes));
  }));

  app.get("/api/users/:userId/weak-spots", handle((req, res) => {
    const parsed = limitQuerySchema.safeParse(req.query);
    if (!parsed.success) return res.status(400).json({ error: "Invalid limit" });
    res.json(service.weakSpots(req.params.userId, parsed.data.limit));
  }));

  app.get("/api/users/:userId/strengths", handle((req, res) => {
    const parsed = limitQuerySchema.safeParse(req.query);
    if (!parsed.success) return res.status(400).json({ error: "Invalid limit" });
    res.json(service.strengths(req.params.userId, parsed.data.limit));
  }));

  app.get("/api/users/:userId/practice-plan", handle((req, res) => res.json(service.practicePlan(req.params.userId))));

  app.get("/api/users/:userId/pomodoro", handle((req, res) => res.json(service.sessionStatus(req.params.userId))));
  app.post("/api/users/:userId/pomodoro", handle((req, res) => {
    const parsed = sessionPayloadSchema.safeParse(req.body ?? {});
    if (!parsed.success) return res.status(400).json({ error: "Unknown session type" });
    res.status(201).json(service.startSession(req.params.userId, parsed.data.sessionType));
  }));
  app.delete("/api/users/:userId/pomodoro", handle(async (req, res) => res.json(await service.stopSession(req.params.userId))));

  app.get("/api/leaderboard", (_req, res) => res.json(service.leaderboard()));

  app.get("/api/export", (_req, res) => res.json(service.exportState()));
  app.post("/api/import", handle((req, res) => res.json(service.importState(req.body))));

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof StudyError) return res.status(error.status).json({ error: error.message });
    if (error instanceof ZodError) return res.status(400).json({ error: "Invalid payload", issues: error.issues.map((issue) => issue.message) });
    console.error("Unhandled request error", error);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
