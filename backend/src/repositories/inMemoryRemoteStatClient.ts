import fs from "node:fs";
import path from "node:path";

import {
  nextLeaderboardQuery,
  type LeaderboardRequest,
  type LeaderboardResult,
  type LeaderboardRow,
  type RemoteResult,
  type RemoteStatClient,
  type StatDelta,
  type StatValue
} from "../services/remoteStatClient";

export type InMemoryRemoteStatClientOptions = Readonly<{
  heartbeatMinutes?: number;
  // owner user id -> group name -> member user ids
  socialGroups?: Readonly<Record<string, Readonly<Record<string, ReadonlyArray<string>>>>>;
  storeFilePath?: string;
}>;

export type InMemoryRemoteStatClient = RemoteStatClient &
  Readonly<{
    isActive(userId: string): boolean;
    storedStats(userId: string): Readonly<Record<string, StatValue>>;
  }>;

const DEFAULT_HEARTBEAT_MINUTES = 5;

function isStatValue(value: unknown): value is StatValue {
  if (typeof value !== "object" || value === null) return false;
  const v = value as Record<string, unknown>;
  return (
    (v.kind === "number" && typeof v.value === "number" && Number.isFinite(v.value)) ||
    (v.kind === "string" && typeof v.value === "string")
  );
}

export function createInMemoryRemoteStatClient(options: InMemoryRemoteStatClientOptions = {}): InMemoryRemoteStatClient {
  const heartbeatMinutes = options.heartbeatMinutes ?? DEFAULT_HEARTBEAT_MINUTES;
  const socialGroups = options.socialGroups ?? {};
  const storeFilePath = options.storeFilePath;

  if (!Number.isSafeInteger(heartbeatMinutes) || heartbeatMinutes <= 0) {
    throw new Error("inMemoryRemoteStatClient requires a positive whole heartbeatMinutes.");
  }

  const activeUsers = new Set<string>();
  const statsByUser = new Map<string, Map<string, StatValue>>();

  function load(filePath: string): void {
    if (!fs.existsSync(filePath)) return;
    const raw = fs.readFileSync(filePath, "utf8");
    if (!raw.trim()) return;
    const parsed = JSON.parse(raw) as { version?: unknown; users?: unknown };
    if (parsed.version !== 1 || typeof parsed.users !== "object" || parsed.users === null) {
      throw new Error("Invalid stat store format.");
    }
    for (const [userId, stats] of Object.entries(parsed.users as Record<string, unknown>)) {
      if (typeof stats !== "object" || stats === null) continue;
      const byName = new Map<string, StatValue>();
      for (const [name, value] of Object.entries(stats as Record<string, unknown>)) {
        if (isStatValue(value)) byName.set(name, value);
      }
      statsByUser.set(userId, byName);
    }
  }

  function persist(filePath: string, snapshot: ReadonlyMap<string, ReadonlyMap<string, StatValue>>): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const users: Record<string, Record<string, StatValue>> = {};
    for (const [userId, byName] of snapshot) {
      users[userId] = Object.fromEntries(byName);
    }
    fs.writeFileSync(filePath, JSON.stringify({ version: 1, users }), "utf8");
  }

  function membersOf(ownerUserId: string, group: string): ReadonlySet<string> {
    return new Set(socialGroups[ownerUserId]?.[group] ?? []);
  }

  if (storeFilePath) load(storeFilePath);

  return {
    async setPresence(userId: string, active: boolean): Promise<RemoteResult<number>> {
      if (active) {
        activeUsers.add(userId);
      } else {
        activeUsers.delete(userId);
      }
      return { ok: true, value: heartbeatMinutes };
    },

    async flush(delta: StatDelta): Promise<RemoteResult<number>> {
      // The delta goes live only once the file write has succeeded.
      const byName = new Map<string, StatValue>(statsByUser.get(delta.userId) ?? []);
      for (const upsert of delta.upserts) {
        byName.set(upsert.name, upsert.value);
      }
      for (const name of delta.deletes) {
        byName.delete(name);
      }
      if (storeFilePath) {
        try {
          persist(storeFilePath, new Map(statsByUser).set(delta.userId, byName));
        } catch (e: unknown) {
          const message = e instanceof Error ? e.message : String(e);
          return { ok: false, error: { code: "STORE_WRITE_FAILED", message } };
        }
      }
      statsByUser.set(delta.userId, byName);
      return { ok: true, value: heartbeatMinutes };
    },

    async queryLeaderboard(userId: string, request: LeaderboardRequest): Promise<RemoteResult<LeaderboardResult>> {
      const members = request.socialGroup === undefined ? null : membersOf(userId, request.socialGroup);
      const candidates: Array<{ userId: string; value: number }> = [];
      for (const [candidateId, byName] of statsByUser) {
        if (members && !members.has(candidateId)) continue;
        const stat = byName.get(request.statName);
        if (!stat || stat.kind !== "number") continue;
        candidates.push({ userId: candidateId, value: stat.value });
      }

      const direction = request.order === "ascending" ? 1 : -1;
      candidates.sort((a, b) => (a.value - b.value) * direction || a.userId.localeCompare(b.userId));

      const rows: LeaderboardRow[] = candidates
        .slice(request.skipToRank, request.skipToRank + request.maxItems)
        .map((candidate, index) => ({ rank: request.skipToRank + index + 1, userId: candidate.userId, value: candidate.value }));

      const result: LeaderboardResult = {
        statName: request.statName,
        totalRowCount: candidates.length,
        rows,
        nextQuery: nextLeaderboardQuery(request, candidates.length)
      };
      return { ok: true, value: request.socialGroup === undefined ? result : { ...result, socialGroup: request.socialGroup } };
    },

    isActive(userId: string): boolean {
      return activeUsers.has(userId);
    },

    storedStats(userId: string): Readonly<Record<string, StatValue>> {
      return Object.fromEntries(statsByUser.get(userId) ?? new Map<string, StatValue>());
    }
  };
}
