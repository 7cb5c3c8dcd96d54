import { describeUnknownError, err, ok, type Result } from "./result";

export type StatValue = Readonly<{ kind: "number"; value: number }> | Readonly<{ kind: "string"; value: string }>;

export type StatKind = StatValue["kind"];

export type StatUpsert = Readonly<{
  name: string;
  value: StatValue;
}>;

export type StatDelta = Readonly<{
  userId: string;
  upserts: ReadonlyArray<StatUpsert>;
  deletes: ReadonlyArray<string>;
}>;

export type LeaderboardOrder = "ascending" | "descending";

export type LeaderboardQuery = Readonly<{
  skipToRank?: number;
  maxItems?: number;
  order?: LeaderboardOrder;
}>;

export type LeaderboardRequest = Readonly<{
  statName: string;
  socialGroup?: string;
  skipToRank: number;
  maxItems: number;
  order: LeaderboardOrder;
}>;

export type LeaderboardRow = Readonly<{
  rank: number;
  userId: string;
  value: number;
}>;

export type LeaderboardResult = Readonly<{
  statName: string;
  socialGroup?: string;
  totalRowCount: number;
  rows: ReadonlyArray<LeaderboardRow>;
  nextQuery: LeaderboardQuery | null;
}>;

// Collaborators report their own failure codes (HTTP statuses, driver codes, ...).
export type RemoteError = Readonly<{
  code: string;
  message: string;
}>;

export type RemoteResult<T> = { ok: true; value: T } | { ok: false; error: RemoteError };

/**
 * The remote side of synchronization. Presence and flush calls answer with the
 * heartbeat interval (in minutes) the service wants before the next write.
 */
export type RemoteStatClient = Readonly<{
  setPresence(userId: string, active: boolean): Promise<RemoteResult<number>>;
  flush(delta: StatDelta): Promise<RemoteResult<number>>;
  queryLeaderboard(userId: string, request: LeaderboardRequest): Promise<RemoteResult<LeaderboardResult>>;
}>;

export type PresenceHandle = Readonly<{
  setPresence(active: boolean): Promise<RemoteResult<number>>;
}>;

export function createPresenceHandle(client: RemoteStatClient, userId: string): PresenceHandle {
  return {
    setPresence(active: boolean): Promise<RemoteResult<number>> {
      return client.setPresence(userId, active);
    }
  };
}

/**
 * Runs a remote call and folds both failure channels (an error result or a
 * rejected promise) into TRANSPORT_ERROR.
 */
export async function settleRemoteCall<T>(call: () => Promise<RemoteResult<T>>): Promise<Result<T>> {
  try {
    const result = await call();
    if (result.ok) return ok(result.value);
    return err("TRANSPORT_ERROR", result.error.message, { transportCode: result.error.code });
  } catch (e: unknown) {
    return err("TRANSPORT_ERROR", describeUnknownError(e));
  }
}

export function nextLeaderboardQuery(request: LeaderboardRequest, totalRowCount: number): LeaderboardQuery | null {
  const nextRank = request.skipToRank + request.maxItems;
  if (nextRank >= totalRowCount) return null;
  return { skipToRank: nextRank, maxItems: request.maxItems, order: request.order };
}
