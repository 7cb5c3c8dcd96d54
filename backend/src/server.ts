import http from "node:http";

import { WebSocketServer } from "ws";

import { createApp } from "./app";
import { resolveServerConfigFromEnv } from "./config";
import { createWebsocketGateway } from "./realtime/websocketGateway";
import { createInMemoryRemoteStatClient } from "./repositories/inMemoryRemoteStatClient";
import { createPostgresPool, ensurePostgresSchema, resolvePostgresSettingsFromEnv } from "./repositories/postgresCore";
import { createPostgresRemoteStatClient } from "./repositories/postgresRemoteStatClient";
import { createEventQueue } from "./services/eventQueue";
import { createConsoleLogger } from "./services/logger";
import { createStringPresenceScheduler } from "./services/presenceScheduler";
import type { RemoteStatClient } from "./services/remoteStatClient";
import { describeUnknownError } from "./services/result";
import { createStringStatsManager } from "./services/statsManager";
import { createIntervalTicker } from "./services/ticker";

async function main(): Promise<void> {
  const config = resolveServerConfigFromEnv();
  const logger = createConsoleLogger();

  const postgresSettings = resolvePostgresSettingsFromEnv();
  if (config.requireDatabase && !postgresSettings) {
    throw new Error("REQUIRE_DATABASE=true but no PostgreSQL URL was found. Set DATABASE_URL or NEON_DATABASE_URL.");
  }
  const postgresPool = postgresSettings ? createPostgresPool(postgresSettings) : null;

  let remote: RemoteStatClient;
  if (postgresPool) {
    await ensurePostgresSchema(postgresPool);
    remote = createPostgresRemoteStatClient(postgresPool, { heartbeatMinutes: config.defaultHeartbeatMinutes });
    logger.info(`Persistence mode: PostgreSQL (${postgresSettings?.sourceEnvKey})`);
  } else {
    remote = createInMemoryRemoteStatClient({
      heartbeatMinutes: config.defaultHeartbeatMinutes,
      storeFilePath: config.statStoreFilePath
    });
    logger.info(`Persistence mode: local file storage (${config.statStoreFilePath})`);
  }

  // Presence and stats share one queue so a single drain sees both producers.
  const eventQueue = createEventQueue();
  const presenceScheduler = createStringPresenceScheduler({
    ticker: createIntervalTicker(config.presenceTickMs),
    eventQueue,
    logger,
    defaultHeartbeatMinutes: config.defaultHeartbeatMinutes
  });
  const statsManager = createStringStatsManager({
    remote,
    eventQueue,
    logger,
    ticker: createIntervalTicker(config.statsAutoFlushMs),
    flushCooldownMs: config.flushCooldownMs,
    failureBackoffMs: config.defaultHeartbeatMinutes * 60_000
  });

  const app = createApp({ statsManager, presenceScheduler, remote, logger });
  const server = http.createServer(app);
  const wss = new WebSocketServer({ server });
  const gateway = createWebsocketGateway({ wss, heartbeatTimeoutMs: config.wsHeartbeatTimeoutMs, logger });

  // The pump is the only doWork() consumer in this process.
  const pump = createIntervalTicker(config.eventPumpMs).start(() => {
    const events = statsManager.doWork();
    if (events.length > 0) gateway.publish(events);
  });

  server.listen(config.port, () => {
    logger.info(`Stat sync backend listening on http://localhost:${config.port}`);
  });

  const shutdown = async (): Promise<void> => {
    pump.stop();
    await Promise.allSettled([presenceScheduler.close(), statsManager.close()]);
    gateway.publish(statsManager.doWork());
    await gateway.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    if (postgresPool) {
      await postgresPool.end();
    }
  };

  process.on("SIGINT", () => {
    void shutdown().finally(() => process.exit(0));
  });
  process.on("SIGTERM", () => {
    void shutdown().finally(() => process.exit(0));
  });
}

main().catch((e: unknown) => {
  console.error(`[StatSync] Startup failed: ${describeUnknownError(e)}`);
  process.exit(1);
});
