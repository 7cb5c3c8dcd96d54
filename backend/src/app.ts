import express, { type Express, type NextFunction, type Request, type Response } from "express";

import { createConsoleLogger, type Logger } from "./services/logger";
import type { PresenceScheduler } from "./services/presenceScheduler";
import { createPresenceHandle, type LeaderboardOrder, type LeaderboardQuery, type RemoteStatClient } from "./services/remoteStatClient";
import { err, type Result, type ServiceError } from "./services/result";
import type { StatsManager } from "./services/statsManager";

export type AppDeps = Readonly<{
  statsManager: StatsManager<string>;
  presenceScheduler: PresenceScheduler<string>;
  remote: RemoteStatClient;
  logger?: Logger;
}>;

function sendError(res: Response, error: ServiceError): Response {
  const code = error.code;
  const status =
    code === "USER_NOT_REGISTERED"
      ? 404
      : code === "STAT_NOT_FOUND"
        ? 404
      : code === "ALREADY_REGISTERED"
        ? 409
      : code === "TYPE_MISMATCH"
        ? 409
      : code === "THROTTLED"
        ? 429
      : code === "TRANSPORT_ERROR"
        ? 502
      : 400;
  return res.status(status).json(error);
}

function readBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (typeof body !== "object" || body === null || Array.isArray(body)) return {};
  return body as Record<string, unknown>;
}

function readOrder(value: unknown): LeaderboardOrder | undefined {
  return value === "ascending" || value === "descending" ? value : undefined;
}

function readOptionalNumber(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

function readLeaderboardQuery(body: Record<string, unknown>): Result<LeaderboardQuery> {
  if (body.order !== undefined && readOrder(body.order) === undefined) {
    return err("INVALID_QUERY", "order must be ascending or descending.");
  }
  return {
    ok: true,
    value: {
      skipToRank: readOptionalNumber(body.skipToRank),
      maxItems: readOptionalNumber(body.maxItems),
      order: readOrder(body.order)
    }
  };
}

function setStatFromBody(statsManager: StatsManager<string>, userId: string, statName: string, body: Record<string, unknown>): Result<void> {
  const { type, value } = body;
  if (type === "number" && typeof value === "number") return statsManager.setStatAsNumber(userId, statName, value);
  if (type === "integer" && typeof value === "number") return statsManager.setStatAsInteger(userId, statName, value);
  if (type === "string" && typeof value === "string") return statsManager.setStatAsString(userId, statName, value);
  return err("INVALID_STAT_VALUE", "Body must be { type: number | integer | string, value } with a matching value.");
}

export function createApp(deps: AppDeps): Express {
  const { statsManager, presenceScheduler, remote } = deps;
  const logger = deps.logger ?? createConsoleLogger();

  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "8kb" }));

  app.get("/health", (_req, res) => {
    res.status(200).json({ ok: true });
  });

  // Local users
  app.post("/api/users/:userId", (req, res) => {
    const userId = req.params.userId.trim();
    const result = statsManager.addLocalUser(userId);
    if (!result.ok) return sendError(res, result.error);
    return res.status(201).json({ userId });
  });

  app.delete("/api/users/:userId", (req, res) => {
    const result = statsManager.removeLocalUser(req.params.userId);
    if (!result.ok) return sendError(res, result.error);
    return res.status(200).json({ ok: true });
  });

  // Stats
  app.get("/api/users/:userId/stats", (req, res) => {
    const result = statsManager.getStatNames(req.params.userId);
    if (!result.ok) return sendError(res, result.error);
    return res.status(200).json({ names: result.value });
  });

  app.get("/api/users/:userId/stats/:statName", (req, res) => {
    const result = statsManager.getStat(req.params.userId, req.params.statName);
    if (!result.ok) return sendError(res, result.error);
    return res.status(200).json({ stat: result.value });
  });

  app.put("/api/users/:userId/stats/:statName", (req, res) => {
    const { userId, statName } = req.params;
    const result = setStatFromBody(statsManager, userId, statName, readBody(req));
    if (!result.ok) return sendError(res, result.error);
    const updated = statsManager.getStat(userId, statName);
    if (!updated.ok) return sendError(res, updated.error);
    return res.status(200).json({ stat: updated.value });
  });

  app.delete("/api/users/:userId/stats/:statName", (req, res) => {
    const result = statsManager.deleteStat(req.params.userId, req.params.statName);
    if (!result.ok) return sendError(res, result.error);
    return res.status(200).json({ ok: true });
  });

  app.post("/api/users/:userId/flush", (req, res) => {
    const highPriority = readBody(req).highPriority === true;
    const result = statsManager.requestFlushToService(req.params.userId, highPriority);
    if (!result.ok) return sendError(res, result.error);
    return res.status(202).json({ accepted: true });
  });

  app.post("/api/users/:userId/leaderboards/:statName", (req, res) => {
    const { userId, statName } = req.params;
    const body = readBody(req);
    const query = readLeaderboardQuery(body);
    if (!query.ok) return sendError(res, query.error);
    const socialGroup = body.socialGroup;
    const result =
      typeof socialGroup === "string"
        ? statsManager.getSocialLeaderboard(userId, statName, socialGroup, query.value)
        : statsManager.getLeaderboard(userId, statName, query.value);
    if (!result.ok) return sendError(res, result.error);
    return res.status(202).json({ accepted: true });
  });

  // Presence
  app.post("/api/users/:userId/presence", (req, res) => {
    const userId = req.params.userId.trim();
    presenceScheduler.startWriter(userId, createPresenceHandle(remote, userId));
    return res.status(200).json({ presence: presenceScheduler.state() });
  });

  app.delete("/api/users/:userId/presence", async (req, res, next) => {
    try {
      await presenceScheduler.stopWriter(req.params.userId.trim());
      res.status(200).json({ presence: presenceScheduler.state() });
    } catch (e: unknown) {
      next(e);
    }
  });

  app.get("/api/presence", (_req, res) => {
    res.status(200).json({ presence: presenceScheduler.state(), writers: presenceScheduler.listWriters() });
  });

  // Final error boundary.
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const message = error instanceof Error ? error.message : "Internal error.";
    logger.error(`Request failed: ${message}`);
    res.status(500).json({ code: "INTERNAL_ERROR", message });
  });

  return app;
}
