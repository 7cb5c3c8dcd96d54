import path from "node:path";

export type ServerConfig = Readonly<{
  port: number;
  presenceTickMs: number;
  defaultHeartbeatMinutes: number;
  statsAutoFlushMs: number;
  flushCooldownMs: number;
  eventPumpMs: number;
  wsHeartbeatTimeoutMs: number;
  statStoreFilePath: string;
  requireDatabase: boolean;
}>;

function positiveNumber(raw: string | undefined, fallback: number): number {
  if (typeof raw !== "string" || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function nonNegativeNumber(raw: string | undefined, fallback: number): number {
  if (typeof raw !== "string" || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

export function resolveServerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const storeFile = env.STAT_STORE_FILE;
  return {
    port: positiveNumber(env.PORT, 3000),
    presenceTickMs: positiveNumber(env.PRESENCE_TICK_MS, 60_000),
    defaultHeartbeatMinutes: Math.trunc(positiveNumber(env.DEFAULT_HEARTBEAT_MINUTES, 5)) || 5,
    statsAutoFlushMs: positiveNumber(env.STATS_AUTO_FLUSH_MS, 30_000),
    flushCooldownMs: nonNegativeNumber(env.FLUSH_COOLDOWN_MS, 5_000),
    eventPumpMs: positiveNumber(env.EVENT_PUMP_MS, 1_000),
    wsHeartbeatTimeoutMs: positiveNumber(env.WS_HEARTBEAT_TIMEOUT_MS, 45_000),
    statStoreFilePath:
      typeof storeFile === "string" && storeFile.trim() !== ""
        ? path.resolve(storeFile.trim())
        : path.resolve(process.cwd(), "backend/.data/stats.json"),
    requireDatabase: env.REQUIRE_DATABASE === "true"
  };
}
