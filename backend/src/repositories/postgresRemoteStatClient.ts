import type { Pool, PoolClient } from "pg";

import {
  nextLeaderboardQuery,
  type LeaderboardRequest,
  type LeaderboardResult,
  type LeaderboardRow,
  type RemoteResult,
  type RemoteStatClient,
  type StatDelta
} from "../services/remoteStatClient";
import { describeUnknownError } from "../services/result";

export type PostgresRemoteStatClientOptions = Readonly<{
  heartbeatMinutes?: number;
  nowMs?: () => number;
}>;

const DEFAULT_HEARTBEAT_MINUTES = 5;

function asNumber(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") return Number(value);
  return Number.NaN;
}

function toRow(row: Record<string, unknown>, rank: number): LeaderboardRow | null {
  const userId = typeof row.user_id === "string" ? row.user_id : "";
  const value = asNumber(row.number_value);
  if (!userId || !Number.isFinite(value)) return null;
  return { rank, userId, value };
}

function errorCode(e: unknown): string {
  if (typeof e !== "object" || e === null) return "POSTGRES_ERROR";
  const code = (e as Record<string, unknown>).code;
  return typeof code === "string" ? code : "POSTGRES_ERROR";
}

function failure<T>(e: unknown): RemoteResult<T> {
  return { ok: false, error: { code: errorCode(e), message: describeUnknownError(e) } };
}

export function createPostgresRemoteStatClient(pool: Pool, options: PostgresRemoteStatClientOptions = {}): RemoteStatClient {
  const heartbeatMinutes = options.heartbeatMinutes ?? DEFAULT_HEARTBEAT_MINUTES;
  const nowMs = options.nowMs ?? (() => Date.now());

  if (!Number.isSafeInteger(heartbeatMinutes) || heartbeatMinutes <= 0) {
    throw new Error("postgresRemoteStatClient requires a positive whole heartbeatMinutes.");
  }

  return {
    async setPresence(userId: string, active: boolean): Promise<RemoteResult<number>> {
      try {
        await pool.query(
          `INSERT INTO presence_status (user_id, active, updated_at_ms) VALUES ($1, $2, $3)
           ON CONFLICT (user_id) DO UPDATE SET active = EXCLUDED.active, updated_at_ms = EXCLUDED.updated_at_ms`,
          [userId, active, nowMs()]
        );
        return { ok: true, value: heartbeatMinutes };
      } catch (e: unknown) {
        return failure(e);
      }
    },

    async flush(delta: StatDelta): Promise<RemoteResult<number>> {
      let client: PoolClient;
      try {
        client = await pool.connect();
      } catch (e: unknown) {
        return failure(e);
      }
      try {
        await client.query("BEGIN");
        const updatedAtMs = nowMs();
        for (const upsert of delta.upserts) {
          await client.query(
            `INSERT INTO user_stats (user_id, stat_name, value_kind, number_value, string_value, updated_at_ms)
             VALUES ($1, $2, $3, $4, $5, $6)
             ON CONFLICT (user_id, stat_name) DO UPDATE SET
               value_kind = EXCLUDED.value_kind,
               number_value = EXCLUDED.number_value,
               string_value = EXCLUDED.string_value,
               updated_at_ms = EXCLUDED.updated_at_ms`,
            [
              delta.userId,
              upsert.name,
              upsert.value.kind,
              upsert.value.kind === "number" ? upsert.value.value : null,
              upsert.value.kind === "string" ? upsert.value.value : null,
              updatedAtMs
            ]
          );
        }
        if (delta.deletes.length > 0) {
          await client.query("DELETE FROM user_stats WHERE user_id = $1 AND stat_name = ANY($2::text[])", [
            delta.userId,
            [...delta.deletes]
          ]);
        }
        await client.query("COMMIT");
        return { ok: true, value: heartbeatMinutes };
      } catch (e: unknown) {
        await client.query("ROLLBACK");
        return failure(e);
      } finally {
        client.release();
      }
    },

    async queryLeaderboard(userId: string, request: LeaderboardRequest): Promise<RemoteResult<LeaderboardResult>> {
      const direction = request.order === "ascending" ? "ASC" : "DESC";
      const socialFilter =
        request.socialGroup === undefined
          ? ""
          : "AND user_id IN (SELECT member_user_id FROM social_group_members WHERE owner_user_id = $2 AND group_name = $3)";
      const params: Array<string | number> =
        request.socialGroup === undefined ? [request.statName] : [request.statName, userId, request.socialGroup];
      const limitIndex = params.length + 1;

      try {
        const [countRes, rowsRes] = await Promise.all([
          pool.query(
            `SELECT COUNT(*) AS total FROM user_stats WHERE stat_name = $1 AND value_kind = 'number' ${socialFilter}`,
            params
          ),
          pool.query(
            `SELECT user_id, number_value FROM user_stats
             WHERE stat_name = $1 AND value_kind = 'number' ${socialFilter}
             ORDER BY number_value ${direction}, user_id ASC
             LIMIT $${limitIndex} OFFSET $${limitIndex + 1}`,
            [...params, request.maxItems, request.skipToRank]
          )
        ]);

        const totalRowCount = asNumber((countRes.rows[0] as Record<string, unknown> | undefined)?.total);
        const rows = rowsRes.rows
          .map((row, index) => toRow(row as Record<string, unknown>, request.skipToRank + index + 1))
          .filter((row): row is LeaderboardRow => row !== null);
        const total = Number.isFinite(totalRowCount) ? totalRowCount : rows.length;

        const result: LeaderboardResult = {
          statName: request.statName,
          totalRowCount: total,
          rows,
          nextQuery: nextLeaderboardQuery(request, total)
        };
        return { ok: true, value: request.socialGroup === undefined ? result : { ...result, socialGroup: request.socialGroup } };
      } catch (e: unknown) {
        return failure(e);
      }
    }
  };
}
