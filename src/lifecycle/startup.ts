import { logger } from "../config/logger.js";
import { ensureSignalsTable } from "../db/bootstrap.js";
import { captureError } from "../observability/index.js";
import type { SignalConnectionPool } from "../signals/connection-pool.js";
import type { SignalSink } from "../signals/signal-sink.js";
import type { ServiceLifecycle } from "./service-state.js";

export interface StartupDeps {
  lifecycle: ServiceLifecycle;
  sink: Pick<SignalSink, "borrow" | "ping">;
  pool: SignalConnectionPool;
  tableName: string;
}

export type StartupResult = { ok: true } | { ok: false; exitCode: 1; error: unknown };

/**
 * Brings storage up while the service is still `starting`: lays out the signals table
 * and checks the store answers. On failure the service goes straight to `stopped` and
 * the pool is closed; the caller exits with the returned code.
 */
export async function prepareStorage({ lifecycle, sink, pool, tableName }: StartupDeps): Promise<StartupResult> {
  try {
    const connection = await sink.borrow();
    try {
      await ensureSignalsTable(connection.db, tableName);
    } finally {
      connection.release();
    }
    await sink.ping();
    return { ok: true };
  } catch (err) {
    logger.error("Storage unreachable at startup", { error: err instanceof Error ? err.message : String(err) });
    captureError(err, { source: "startup" });
    lifecycle.transition("stopped");
    await pool.end().catch((endErr: unknown) => {
      logger.warn("Failed to close storage pool", { error: endErr instanceof Error ? endErr.message : String(endErr) });
    });
    return { ok: false, exitCode: 1, error: err };
  }
}
