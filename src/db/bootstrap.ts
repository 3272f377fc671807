import { sql } from "drizzle-orm";
import { logger } from "../config/logger.js";
import { SIGNAL_TYPES } from "../signals/types.js";
import type { DrizzleDb } from "./index.js";

/**
 * Create the signal_type enum and the signals table when they are missing.
 *
 * Idempotent. Runs once during startup, before the service reports ready; it is also
 * how tests lay out a fresh PGlite database.
 */
export async function ensureSignalsTable(db: DrizzleDb, tableName: string): Promise<void> {
  const existing: unknown = await db.execute(sql`SELECT 1 FROM pg_type WHERE typname = 'signal_type'`);
  if (rowCount(existing) === 0) {
    const labels = sql.raw(SIGNAL_TYPES.map((type) => `'${type}'`).join(", "));
    await db.execute(sql`CREATE TYPE signal_type AS ENUM (${labels})`);
  }

  const table = sql.identifier(tableName);
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS ${table} (
      id SERIAL PRIMARY KEY,
      signal_type signal_type NOT NULL,
      value DOUBLE PRECISION NOT NULL,
      timestamp TIMESTAMPTZ NOT NULL
    )
  `);
  await db.execute(
    sql`CREATE INDEX IF NOT EXISTS ${sql.identifier(`${tableName}_type_recent_idx`)} ON ${table} (signal_type, timestamp DESC, id DESC)`,
  );

  logger.info(`Table ${tableName} is ready`);
}

/** Both node-postgres and PGlite resolve execute() with a `{ rows }` result. */
function rowCount(result: unknown): number {
  if (typeof result === "object" && result !== null && "rows" in result && Array.isArray(result.rows)) {
    return result.rows.length;
  }
  return 0;
}
