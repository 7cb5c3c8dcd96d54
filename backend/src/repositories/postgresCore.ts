import { Pool } from "pg";

export type PostgresSettings = Readonly<{
  connectionString: string;
  ssl?: boolean;
  sourceEnvKey: "DATABASE_URL" | "NEON_DATABASE_URL";
}>;

function asBoolean(value: string | undefined): boolean {
  return typeof value === "string" && value.trim().toLowerCase() === "true";
}

export function resolvePostgresSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): PostgresSettings | null {
  const dbUrl = env.DATABASE_URL;
  const neonDbUrl = env.NEON_DATABASE_URL;
  const connectionString =
    typeof dbUrl === "string" && dbUrl.trim() !== ""
      ? dbUrl.trim()
      : typeof neonDbUrl === "string" && neonDbUrl.trim() !== ""
        ? neonDbUrl.trim()
        : "";
  if (typeof connectionString !== "string" || connectionString.trim() === "") {
    return null;
  }
  return {
    connectionString,
    ssl: asBoolean(env.DATABASE_SSL),
    sourceEnvKey: typeof dbUrl === "string" && dbUrl.trim() !== "" ? "DATABASE_URL" : "NEON_DATABASE_URL"
  };
}

export function createPostgresPool(settings: PostgresSettings): Pool {
  return new Pool({
    connectionString: settings.connectionString,
    max: 20,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
    ssl: settings.ssl === true ? { rejectUnauthorized: false } : undefined
  });
}

export async function ensurePostgresSchema(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS presence_status (
      user_id TEXT PRIMARY KEY,
      active BOOLEAN NOT NULL,
      updated_at_ms BIGINT NOT NULL
    )
  `);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS user_stats (
      user_id TEXT NOT NULL,
      stat_name TEXT NOT NULL,
      value_kind TEXT NOT NULL,
      number_value DOUBLE PRECISION,
      string_value TEXT,
      updated_at_ms BIGINT NOT NULL,
      PRIMARY KEY (user_id, stat_name)
    )
  `);
  await pool.query("CREATE INDEX IF NOT EXISTS idx_user_stats_leaderboard ON user_stats(stat_name, number_value)");

  await pool.query(`
    CREATE TABLE IF NOT EXISTS social_group_members (
      owner_user_id TEXT NOT NULL,
      group_name TEXT NOT NULL,
      member_user_id TEXT NOT NULL,
      PRIMARY KEY (owner_user_id, group_name, member_user_id)
    )
  `);
}
