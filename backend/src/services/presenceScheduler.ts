import { createEventQueue, type EventQueue } from "./eventQueue";
import { createConsoleLogger, type Logger } from "./logger";
import { createPresenceRegistry, type PresenceRegistry } from "./presenceRegistry";
import { settleRemoteCall, type PresenceHandle } from "./remoteStatClient";
import type { Result } from "./result";
import { createIntervalTicker, type Ticker, type TickerHandle } from "./ticker";
import { createStringUserRegistry, type UserRegistry } from "./userRegistry";
import { createWriteGate, type WriteGate } from "./writeGate";

export type HeartbeatState = Readonly<{
  countdownMinutes: number;
  writerActive: boolean;
  flushInFlight: boolean;
  subscriberCount: number;
}>;

export type PresenceSchedulerDeps<TUser> = Readonly<{
  userRegistry: UserRegistry<TUser>;
  ticker?: Ticker;
  eventQueue?: EventQueue;
  logger?: Logger;
  defaultHeartbeatMinutes?: number;
}>;

export type PresenceScheduler<TUser> = Readonly<{
  startWriter(user: TUser, handle: PresenceHandle): void;
  stopWriter(userId: string): Promise<void>;
  handleTick(): Promise<void>;
  triggerFlush(): Promise<void>;
  state(): HeartbeatState;
  listWriters(): ReadonlyArray<string>;
  close(): Promise<void>;
}>;

export const PRESENCE_TICK_MS = 60_000;
export const DEFAULT_HEARTBEAT_MINUTES = 5;

/**
 * Smallest positive whole interval among the successful writes; `null` when
 * no write succeeded with a usable interval.
 */
export function selectHeartbeatInterval(results: ReadonlyArray<Result<number>>): number | null {
  let selected: number | null = null;
  for (const result of results) {
    if (!result.ok) continue;
    const minutes = result.value;
    if (!Number.isSafeInteger(minutes) || minutes <= 0) continue;
    if (selected === null || minutes < selected) selected = minutes;
  }
  return selected;
}

export function createPresenceScheduler<TUser>(deps: PresenceSchedulerDeps<TUser>): PresenceScheduler<TUser> {
  const ticker = deps.ticker ?? createIntervalTicker(PRESENCE_TICK_MS);
  const eventQueue = deps.eventQueue ?? createEventQueue();
  const logger = deps.logger ?? createConsoleLogger();
  const defaultHeartbeatMinutes = deps.defaultHeartbeatMinutes ?? DEFAULT_HEARTBEAT_MINUTES;

  if (!Number.isSafeInteger(defaultHeartbeatMinutes) || defaultHeartbeatMinutes <= 0) {
    throw new Error("presenceScheduler requires a positive whole defaultHeartbeatMinutes.");
  }

  const registry: PresenceRegistry = createPresenceRegistry();
  const gate: WriteGate = createWriteGate();
  const pendingInactiveWrites = new Set<Promise<void>>();
  let countdownMinutes = 0;
  let writerActive = false;
  let loop: TickerHandle | null = null;
  let inFlight: Promise<void> | null = null;
  // Users whose active write belongs to the fan-out currently in flight.
  let inFlightUserIds: ReadonlySet<string> = new Set<string>();

  async function setInactive(userId: string, handle: PresenceHandle): Promise<void> {
    const result = await settleRemoteCall(() => handle.setPresence(false));
    if (!result.ok) {
      logger.error(`Set presence inactive failed for ${userId}: ${result.error.message}`);
    }
  }

  async function writeActive(): Promise<void> {
    logger.info("Start presence writing.");
    const subscriptions = registry.snapshot();
    inFlightUserIds = new Set(subscriptions.map((subscription) => subscription.userId));
    const results = await Promise.all(
      subscriptions.map((subscription) => settleRemoteCall(() => subscription.handle.setPresence(true)))
    );
    logger.info("Presence writing finished.");

    results.forEach((result, index) => {
      const subscription = subscriptions[index];
      if (!subscription) return;
      if (!result.ok) {
        logger.error(`Presence write failed for ${subscription.userId}: ${result.error.message}`);
      }
      eventQueue.push({
        type: "presence_heartbeat_complete",
        producer: "presence",
        userId: subscription.userId,
        error: result.ok ? null : result.error,
        nextIntervalMinutes: result.ok ? result.value : undefined
      });
    });

    if (!writerActive) return;
    const selected = selectHeartbeatInterval(results);
    if (selected === null) {
      logger.error(`No usable heartbeat interval from presence writes, using default of ${defaultHeartbeatMinutes} minutes.`);
    }
    countdownMinutes = selected ?? defaultHeartbeatMinutes;
  }

  async function triggerFlush(): Promise<void> {
    if (!gate.tryAcquire()) {
      logger.info("Presence write in progress, skipping this cycle.");
      return;
    }
    const run = writeActive();
    inFlight = run;
    try {
      await run;
    } finally {
      gate.release();
      if (inFlight === run) {
        inFlight = null;
        inFlightUserIds = new Set<string>();
      }
    }
  }

  async function handleTick(): Promise<void> {
    countdownMinutes -= 1;
    if (countdownMinutes > 0) return;
    await triggerFlush();
  }

  function stopWriter(userId: string): Promise<void> {
    if (!writerActive) return Promise.resolve();

    const removed = registry.remove(userId);
    let inactiveWrite: Promise<void> = Promise.resolve();
    if (removed) {
      const { userId: removedId, handle } = removed;
      const write = (): Promise<void> => setInactive(removedId, handle);
      // An active write still in flight for this user must land before the inactive one.
      inactiveWrite = inFlight && inFlightUserIds.has(removedId) ? inFlight.then(write, write) : write();
      pendingInactiveWrites.add(inactiveWrite);
      void inactiveWrite.finally(() => pendingInactiveWrites.delete(inactiveWrite));
    }

    if (registry.size() === 0) {
      writerActive = false;
      countdownMinutes = 0;
      if (loop) {
        loop.stop();
        loop = null;
      }
    }
    return inactiveWrite;
  }

  return {
    startWriter(user: TUser, handle: PresenceHandle): void {
      const userId = deps.userRegistry.resolveUserId(user);
      if (userId === null) {
        logger.warn("Cannot start presence writer for an unidentified user.");
        return;
      }
      if (!registry.add({ userId, handle })) {
        logger.info(`Presence writer for ${userId} already exists.`);
        return;
      }
      logger.info(`Added ${userId} to the presence writer.`);

      if (!writerActive) {
        writerActive = true;
        loop = ticker.start(() => {
          void handleTick();
        });
      }
    },

    stopWriter,
    handleTick,
    triggerFlush,

    state(): HeartbeatState {
      return {
        countdownMinutes,
        writerActive,
        flushInFlight: gate.isHeld(),
        subscriberCount: registry.size()
      };
    },

    listWriters(): ReadonlyArray<string> {
      return registry.snapshot().map((subscription) => subscription.userId);
    },

    async close(): Promise<void> {
      const stops = registry.snapshot().map((subscription) => stopWriter(subscription.userId));
      await Promise.all([...stops, ...pendingInactiveWrites, inFlight ?? Promise.resolve()]);
    }
  };
}

export function createStringPresenceScheduler(
  deps: Omit<PresenceSchedulerDeps<string>, "userRegistry"> = {}
): PresenceScheduler<string> {
  return createPresenceScheduler({ ...deps, userRegistry: createStringUserRegistry() });
}
