import { setTimeout as sleep } from "node:timers/promises";
import type { IngestionMetrics } from "../observability/ingestion-metrics.js";
import type { PooledConnection } from "./connection-pool.js";
import {
  BackpressureError,
  ConstraintViolationError,
  StorageUnavailableError,
  WriteFailedError,
} from "./errors.js";
import type { SignalSink } from "./signal-sink.js";
import type { NewSignalRecord } from "./types.js";

export interface IngestionPolicy {
  /** Longest a tick may wait for a pooled connection before it is dropped. */
  acquireTimeoutMs: number;
  /** Total insert attempts, including the first. */
  maxAttempts: number;
  /** Delay before the first retry; doubles on each further retry. */
  backoffBaseMs: number;
}

export const DEFAULT_INGESTION_POLICY: IngestionPolicy = {
  acquireTimeoutMs: 250,
  maxAttempts: 3,
  backoffBaseMs: 25,
};

/** Delay before retry number `retry` (1-based). */
export function backoffDelayMs(policy: IngestionPolicy, retry: number): number {
  return policy.backoffBaseMs * 2 ** (retry - 1);
}

/**
 * Single write path for every generator.
 *
 * A tick either lands within a bounded time or is dropped with BackpressureError or
 * WriteFailedError; nothing is queued behind the pool. Each attempt borrows its own
 * connection and returns it before the next one starts.
 */
export class IngestionCoordinator {
  constructor(
    private readonly sink: SignalSink,
    private readonly policy: IngestionPolicy = DEFAULT_INGESTION_POLICY,
    private readonly metrics?: IngestionMetrics,
  ) {}

  async submit(record: NewSignalRecord): Promise<number> {
    const { signalType } = record;
    let lastFailure: StorageUnavailableError | undefined;

    for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt++) {
      if (attempt > 1) {
        this.metrics?.recordRetry(signalType);
        await sleep(backoffDelayMs(this.policy, attempt - 1));
      }

      let connection: PooledConnection;
      try {
        connection = await this.sink.borrow(this.policy.acquireTimeoutMs);
      } catch (err) {
        if (err instanceof BackpressureError) {
          this.metrics?.record(signalType, "backpressure");
          throw err;
        }
        if (err instanceof StorageUnavailableError) {
          lastFailure = err;
          continue;
        }
        throw err;
      }

      let broken: Error | undefined;
      try {
        const id = await this.sink.insertWith(connection, record);
        this.metrics?.record(signalType, "persisted");
        return id;
      } catch (err) {
        if (err instanceof ConstraintViolationError) {
          this.metrics?.record(signalType, "constraintViolation");
          throw err;
        }
        if (!(err instanceof StorageUnavailableError)) throw err;

        broken = err;
        if (!err.transient) {
          this.metrics?.record(signalType, "writeFailed");
          throw new WriteFailedError(signalType, attempt, { cause: err });
        }
        lastFailure = err;
      } finally {
        connection.release(broken);
      }
    }

    this.metrics?.record(signalType, "writeFailed");
    throw new WriteFailedError(signalType, this.policy.maxAttempts, { cause: lastFailure });
  }
}
