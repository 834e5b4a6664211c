import cors from "cors";
import express, { type Request } from "express";
import { z } from "zod";
import type { CrossingContext } from "./context/crossingContext";
import { TimetableUnavailable, safeErrorMessage } from "./utils/errors";
import { logger } from "./utils/logger";
import { isOperatingDay } from "./utils/time";

const MAX_FEED_BATCH = 1000;

export interface AppOptions {
  adminToken: string | undefined;
  /** Extra fields merged into the health payload, e.g. redis status. */
  healthExtras?: () => Record<string, unknown>;
}

const feedBatchSchema = z.union([
  z.array(z.unknown()).max(MAX_FEED_BATCH),
  z.object({ messages: z.array(z.unknown()).max(MAX_FEED_BATCH) }),
]);

const connectionSchema = z.object({ connected: z.boolean() });

const reloadSchema = z.object({
  day: z.string().refine(isOperatingDay, "day must be YYYY-MM-DD").optional(),
});

const parseNumberParam = (value: unknown): number | undefined => {
  if (typeof value !== "string") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const readAdminToken = (req: Request) => {
  const header = req.get("x-admin-token");
  if (header) return header;
  const authorization = req.get("authorization");
  return authorization?.startsWith("Bearer ") ? authorization.slice("Bearer ".length) : undefined;
};

export const createApp = (context: CrossingContext, options: AppOptions) => {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  app.get("/api/status", (_req, res) => {
    res.json(context.currentStatus());
  });

  app.get("/api/timeline", (req, res) => {
    const requested = parseNumberParam(req.query.horizon);
    if (req.query.horizon !== undefined && (requested === undefined || requested <= 0)) {
      return res.status(400).json({ error: "bad_request", message: "horizon must be a positive number of minutes" });
    }
    return res.json(context.timeline(Date.now(), requested ?? context.settings.horizonMinutes));
  });

  app.get("/api/trains", (_req, res) => {
    res.json(context.trains());
  });

  app.get("/api/health", (_req, res) => {
    const health = context.health();
    res.status(health.status === "ok" ? 200 : 503).json({ ...health, ...options.healthExtras?.() });
  });

  app.post("/api/feed/messages", (req, res) => {
    const parsed = feedBatchSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({
        error: "bad_request",
        message: `Expected an array of messages or { messages: [...] } with at most ${MAX_FEED_BATCH} entries`,
      });
    }
    const messages = Array.isArray(parsed.data) ? parsed.data : parsed.data.messages;
    const receivedAt = Date.now();
    messages.forEach((message) => context.ingest(message, receivedAt));
    return res.status(202).json({ accepted: messages.length });
  });

  app.post("/api/feed/connection", (req, res) => {
    const parsed = connectionSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "bad_request", message: "connected must be a boolean" });
    }
    context.setFeedConnected(parsed.data.connected);
    return res.json({ feedConnected: parsed.data.connected });
  });

  app.post("/api/admin/timetable/reload", async (req, res) => {
    if (!options.adminToken) {
      return res.status(403).json({ error: "forbidden", message: "Timetable reload is disabled" });
    }
    if (readAdminToken(req) !== options.adminToken) {
      return res.status(401).json({ error: "unauthorized", message: "Invalid admin token" });
    }
    const parsed = reloadSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: "bad_request", message: parsed.error.issues[0]?.message ?? "Invalid body" });
    }
    try {
      const result = await context.loadDay(parsed.data.day ?? context.currentDay());
      context.recompute();
      return res.json(result);
    } catch (error) {
      if (error instanceof TimetableUnavailable) {
        return res.status(503).json({ error: error.code, message: error.message });
      }
      logger.error("Timetable reload failed", { message: safeErrorMessage(error) });
      return res.status(500).json({ error: "internal_error", message: "Unable to reload timetable" });
    }
  });

  return app;
};
