import { createEventQueue, type EventQueue, type StatEvent } from "./eventQueue";
import { createConsoleLogger, type Logger } from "./logger";
import {
  settleRemoteCall,
  type LeaderboardQuery,
  type LeaderboardRequest,
  type RemoteStatClient,
  type StatValue
} from "./remoteStatClient";
import { err, ok, type Result } from "./result";
import { createStatDocument, validateStatName, type StatDocument, type StatSnapshot } from "./statDocument";
import { createIntervalTicker, type Ticker, type TickerHandle } from "./ticker";
import { createStringUserRegistry, type UserRegistry } from "./userRegistry";

export type StatsManagerDeps<TUser> = Readonly<{
  remote: RemoteStatClient;
  userRegistry: UserRegistry<TUser>;
  eventQueue?: EventQueue;
  ticker?: Ticker;
  logger?: Logger;
  nowMs?: () => number;
  flushCooldownMs?: number;
  failureBackoffMs?: number;
}>;

export type StatsManager<TUser> = Readonly<{
  addLocalUser(user: TUser): Result<void>;
  removeLocalUser(user: TUser): Result<void>;
  setStatAsNumber(user: TUser, statName: string, value: number): Result<void>;
  setStatAsInteger(user: TUser, statName: string, value: number): Result<void>;
  setStatAsString(user: TUser, statName: string, value: string): Result<void>;
  getStat(user: TUser, statName: string): Result<StatSnapshot>;
  getStatNames(user: TUser): Result<ReadonlyArray<string>>;
  deleteStat(user: TUser, statName: string): Result<void>;
  requestFlushToService(user: TUser, highPriority?: boolean): Result<void>;
  getLeaderboard(user: TUser, statName: string, query?: LeaderboardQuery): Result<void>;
  getSocialLeaderboard(user: TUser, statName: string, socialGroup: string, query?: LeaderboardQuery): Result<void>;
  doWork(): ReadonlyArray<StatEvent>;
  listLocalUsers(): ReadonlyArray<string>;
  flushDirtyUsers(): Promise<void>;
  settle(): Promise<void>;
  close(): Promise<void>;
}>;

export const STATS_AUTO_FLUSH_MS = 30_000;
export const DEFAULT_FLUSH_COOLDOWN_MS = 5_000;
export const DEFAULT_FAILURE_BACKOFF_MS = 5 * 60_000;
export const DEFAULT_LEADERBOARD_MAX_ITEMS = 10;
export const MAX_LEADERBOARD_ITEMS = 100;

type LocalUserState = {
  userId: string;
  document: StatDocument;
  lastForcedFlushAtMs: number | null;
  retryNotBeforeMs: number;
  flushInFlight: boolean;
  flushQueued: boolean;
};

function validateLeaderboardQuery(statName: string, query: LeaderboardQuery, socialGroup?: string): Result<LeaderboardRequest> {
  const validName = validateStatName(statName);
  if (!validName.ok) return validName;

  const skipToRank = query.skipToRank ?? 0;
  const maxItems = query.maxItems ?? DEFAULT_LEADERBOARD_MAX_ITEMS;
  const order = query.order ?? "descending";
  if (!Number.isSafeInteger(skipToRank) || skipToRank < 0) {
    return err("INVALID_QUERY", "skipToRank must be a non-negative integer.");
  }
  if (!Number.isSafeInteger(maxItems) || maxItems <= 0 || maxItems > MAX_LEADERBOARD_ITEMS) {
    return err("INVALID_QUERY", `maxItems must be between 1 and ${MAX_LEADERBOARD_ITEMS}.`);
  }
  if (order !== "ascending" && order !== "descending") {
    return err("INVALID_QUERY", "order must be ascending or descending.");
  }
  if (socialGroup !== undefined && (typeof socialGroup !== "string" || socialGroup.trim() === "")) {
    return err("INVALID_QUERY", "Social group is required.");
  }
  return ok(socialGroup === undefined ? { statName, skipToRank, maxItems, order } : { statName, socialGroup, skipToRank, maxItems, order });
}

export function createStatsManager<TUser>(deps: StatsManagerDeps<TUser>): StatsManager<TUser> {
  const eventQueue = deps.eventQueue ?? createEventQueue();
  const ticker = deps.ticker ?? createIntervalTicker(STATS_AUTO_FLUSH_MS);
  const logger = deps.logger ?? createConsoleLogger();
  const nowMs = deps.nowMs ?? (() => Date.now());
  const flushCooldownMs = deps.flushCooldownMs ?? DEFAULT_FLUSH_COOLDOWN_MS;
  const failureBackoffMs = deps.failureBackoffMs ?? DEFAULT_FAILURE_BACKOFF_MS;

  if (!Number.isFinite(flushCooldownMs) || flushCooldownMs < 0) {
    throw new Error("statsManager requires flushCooldownMs to be >= 0.");
  }
  if (!Number.isFinite(failureBackoffMs) || failureBackoffMs < 0) {
    throw new Error("statsManager requires failureBackoffMs to be >= 0.");
  }

  const users = new Map<string, LocalUserState>();
  const pending = new Set<Promise<void>>();
  let autoFlush: TickerHandle | null = null;

  function track(work: Promise<void>): void {
    pending.add(work);
    void work.finally(() => pending.delete(work));
  }

  function resolveUser(user: TUser): Result<string> {
    const userId = deps.userRegistry.resolveUserId(user);
    if (userId === null) return err("INVALID_USER", "User cannot be identified.");
    return ok(userId);
  }

  function requireLocalUser(user: TUser): Result<LocalUserState> {
    const resolved = resolveUser(user);
    if (!resolved.ok) return resolved;
    const state = users.get(resolved.value);
    if (!state) return err("USER_NOT_REGISTERED", "User is not registered with the stats manager.", { userId: resolved.value });
    return ok(state);
  }

  async function runFlush(state: LocalUserState, reason: "auto" | "forced" | "final"): Promise<void> {
    let mode = reason;
    state.flushInFlight = true;
    try {
      do {
        state.flushQueued = false;
        const flush = state.document.takePending();
        const nothingToSend = flush.upserts.length === 0 && flush.deletes.length === 0;
        const result = nothingToSend
          ? ok(0)
          : await settleRemoteCall(() =>
              deps.remote.flush({ userId: state.userId, upserts: flush.upserts, deletes: flush.deletes })
            );

        if (result.ok) {
          state.document.acknowledge(flush);
          state.retryNotBeforeMs = 0;
        } else {
          state.retryNotBeforeMs = nowMs() + failureBackoffMs;
          logger.error(`Stats flush (${mode}) failed for ${state.userId}: ${result.error.message}`);
        }

        if (mode === "final") continue;
        if (users.get(state.userId) !== state) {
          // Removed mid-flight: anything queued behind this flush is the final one.
          logger.info(`Dropping flush outcome for removed user ${state.userId}.`);
          mode = "final";
          continue;
        }
        eventQueue.push({
          type: "stat_update_complete",
          producer: "stats",
          userId: state.userId,
          error: result.ok ? null : result.error
        });
      } while (state.flushQueued);
    } finally {
      state.flushInFlight = false;
    }
  }

  function scheduleFlush(state: LocalUserState, reason: "auto" | "forced" | "final"): void {
    if (state.flushInFlight) {
      state.flushQueued = true;
      return;
    }
    track(runFlush(state, reason));
  }

  async function flushDirtyUsers(): Promise<void> {
    const now = nowMs();
    const started: Promise<void>[] = [];
    for (const state of users.values()) {
      if (state.flushInFlight || !state.document.isDirty()) continue;
      if (now < state.retryNotBeforeMs) continue;
      const work = runFlush(state, "auto");
      track(work);
      started.push(work);
    }
    await Promise.all(started);
  }

  async function settle(): Promise<void> {
    while (pending.size > 0) {
      await Promise.all(Array.from(pending));
    }
  }

  function startLeaderboardQuery(userId: string, request: LeaderboardRequest): void {
    const work = (async (): Promise<void> => {
      const result = await settleRemoteCall(() => deps.remote.queryLeaderboard(userId, request));
      if (!result.ok) {
        logger.error(`Leaderboard query for "${request.statName}" failed: ${result.error.message}`);
      }
      eventQueue.push(
        result.ok
          ? { type: "get_leaderboard_complete", producer: "stats", userId, error: null, leaderboard: result.value }
          : { type: "get_leaderboard_complete", producer: "stats", userId, error: result.error }
      );
    })();
    track(work);
  }

  function setStat(user: TUser, statName: string, value: StatValue): Result<void> {
    const state = requireLocalUser(user);
    if (!state.ok) return state;
    return state.value.document.set(statName, value);
  }

  return {
    addLocalUser(user: TUser): Result<void> {
      const resolved = resolveUser(user);
      if (!resolved.ok) return resolved;
      const userId = resolved.value;
      if (users.has(userId)) {
        return err("ALREADY_REGISTERED", "User is already registered with the stats manager.", { userId });
      }

      users.set(userId, {
        userId,
        document: createStatDocument(),
        lastForcedFlushAtMs: null,
        retryNotBeforeMs: 0,
        flushInFlight: false,
        flushQueued: false
      });
      if (!autoFlush) {
        autoFlush = ticker.start(() => {
          void flushDirtyUsers();
        });
      }
      eventQueue.push({ type: "local_user_added", producer: "stats", userId, error: null });
      return ok(undefined);
    },

    removeLocalUser(user: TUser): Result<void> {
      const found = requireLocalUser(user);
      if (!found.ok) return found;
      const state = found.value;

      users.delete(state.userId);
      if (state.document.isDirty()) {
        scheduleFlush(state, "final");
      }
      if (users.size === 0 && autoFlush) {
        autoFlush.stop();
        autoFlush = null;
      }
      eventQueue.push({ type: "local_user_removed", producer: "stats", userId: state.userId, error: null });
      return ok(undefined);
    },

    setStatAsNumber(user: TUser, statName: string, value: number): Result<void> {
      if (typeof value !== "number") return err("INVALID_STAT_VALUE", "Stat value must be a number.");
      return setStat(user, statName, { kind: "number", value });
    },

    setStatAsInteger(user: TUser, statName: string, value: number): Result<void> {
      if (typeof value !== "number" || !Number.isFinite(value)) {
        return err("INVALID_STAT_VALUE", "Stat value must be an integer.");
      }
      const truncated = Math.trunc(value);
      if (!Number.isSafeInteger(truncated)) {
        return err("INVALID_STAT_VALUE", "Stat value is outside the safe integer range.");
      }
      // -0 would survive JSON as 0 anyway.
      return setStat(user, statName, { kind: "number", value: truncated === 0 ? 0 : truncated });
    },

    setStatAsString(user: TUser, statName: string, value: string): Result<void> {
      if (typeof value !== "string") return err("INVALID_STAT_VALUE", "Stat value must be a string.");
      return setStat(user, statName, { kind: "string", value });
    },

    getStat(user: TUser, statName: string): Result<StatSnapshot> {
      const state = requireLocalUser(user);
      if (!state.ok) return state;
      return state.value.document.get(statName);
    },

    getStatNames(user: TUser): Result<ReadonlyArray<string>> {
      const state = requireLocalUser(user);
      if (!state.ok) return state;
      return ok(state.value.document.names());
    },

    deleteStat(user: TUser, statName: string): Result<void> {
      const state = requireLocalUser(user);
      if (!state.ok) return state;
      return state.value.document.delete(statName);
    },

    requestFlushToService(user: TUser, highPriority = false): Result<void> {
      const found = requireLocalUser(user);
      if (!found.ok) return found;
      const state = found.value;

      const now = nowMs();
      if (!highPriority && state.lastForcedFlushAtMs !== null && now - state.lastForcedFlushAtMs < flushCooldownMs) {
        return err("THROTTLED", "Flush requested too soon after the previous one.", {
          retryAfterMs: state.lastForcedFlushAtMs + flushCooldownMs - now
        });
      }
      state.lastForcedFlushAtMs = now;
      scheduleFlush(state, "forced");
      return ok(undefined);
    },

    getLeaderboard(user: TUser, statName: string, query: LeaderboardQuery = {}): Result<void> {
      const state = requireLocalUser(user);
      if (!state.ok) return state;
      const request = validateLeaderboardQuery(statName, query);
      if (!request.ok) return request;
      startLeaderboardQuery(state.value.userId, request.value);
      return ok(undefined);
    },

    getSocialLeaderboard(user: TUser, statName: string, socialGroup: string, query: LeaderboardQuery = {}): Result<void> {
      const state = requireLocalUser(user);
      if (!state.ok) return state;
      const request = validateLeaderboardQuery(statName, query, socialGroup);
      if (!request.ok) return request;
      startLeaderboardQuery(state.value.userId, request.value);
      return ok(undefined);
    },

    doWork(): ReadonlyArray<StatEvent> {
      return eventQueue.drain();
    },

    listLocalUsers(): ReadonlyArray<string> {
      return Array.from(users.keys());
    },

    flushDirtyUsers,

    settle,

    async close(): Promise<void> {
      if (autoFlush) {
        autoFlush.stop();
        autoFlush = null;
      }
      for (const state of users.values()) {
        if (state.document.isDirty()) scheduleFlush(state, "final");
      }
      await settle();
    }
  };
}

export function createStringStatsManager(
  deps: Omit<StatsManagerDeps<string>, "userRegistry">
): StatsManager<string> {
  return createStatsManager({ ...deps, userRegistry: createStringUserRegistry() });
}
