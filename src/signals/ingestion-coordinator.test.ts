import type { PGlite } from "@electric-sql/pglite";
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import type { DrizzleDb } from "../db/index.js";
import { signals } from "../db/schema/index.js";
import { IngestionMetrics } from "../observability/ingestion-metrics.js";
import { createTestDb, TEST_TABLE, TestConnectionPool, truncateSignals } from "../test/db.js";
import { driverError, hookedRepositoryFactory, reading } from "../test/signals.js";
import {
  BackpressureError,
  ConstraintViolationError,
  StorageUnavailableError,
  WriteFailedError,
} from "./errors.js";
import { backoffDelayMs, DEFAULT_INGESTION_POLICY, IngestionCoordinator, type IngestionPolicy } from "./ingestion-coordinator.js";
import { SignalSink } from "./signal-sink.js";

const T0 = Date.UTC(2024, 4, 1, 12, 0, 0);
const FAST: IngestionPolicy = { acquireTimeoutMs: 20, maxAttempts: 3, backoffBaseMs: 1 };

describe("backoffDelayMs", () => {
  it("doubles from the base on each retry", () => {
    expect(backoffDelayMs(DEFAULT_INGESTION_POLICY, 1)).toBe(25);
    expect(backoffDelayMs(DEFAULT_INGESTION_POLICY, 2)).toBe(50);
    expect(backoffDelayMs(DEFAULT_INGESTION_POLICY, 3)).toBe(100);
  });
});

describe("IngestionCoordinator", () => {
  let db: DrizzleDb;
  let pglite: PGlite;
  let pool: TestConnectionPool;
  let metrics: IngestionMetrics;

  beforeAll(async () => {
    ({ db, pglite } = await createTestDb());
  });

  afterAll(async () => {
    await pglite.close();
  });

  beforeEach(async () => {
    await truncateSignals(pglite);
    pool = new TestConnectionPool(db, { max: 4 });
    metrics = new IngestionMetrics();
  });

  it("persists a record and returns its id", async () => {
    const sink = SignalSink.forTable(pool, TEST_TABLE);
    const coordinator = new IngestionCoordinator(sink, FAST, metrics);

    expect(await coordinator.submit(reading("power", 305.2, T0))).toBe(1);
    expect((await sink.queryRecent("power")).map((r) => r.value)).toEqual([305.2]);
    expect(metrics.getWindow(5).streams.power.persisted).toBe(1);
    expect(pool.leasedCount).toBe(0);
  });

  it("drops the tick with BackpressureError when the pool stays exhausted", async () => {
    const small = new TestConnectionPool(db, { max: 1 });
    const coordinator = new IngestionCoordinator(SignalSink.forTable(small, TEST_TABLE), FAST, metrics);
    const held = await small.connect();

    await expect(coordinator.submit(reading("power", 300, T0))).rejects.toThrow(new BackpressureError(20));

    const counters = metrics.getWindow(5).streams.power;
    expect(counters.backpressure).toBe(1);
    expect(counters.retries).toBe(0);
    held.release();
  });

  it("retries a transient failure on a fresh connection", async () => {
    const { factory, insertCalls } = hookedRepositoryFactory(signals, {
      beforeInsert: (call) => {
        if (call === 1) throw driverError("Connection terminated unexpectedly", "08006");
      },
    });
    const coordinator = new IngestionCoordinator(new SignalSink(pool, factory), FAST, metrics);

    expect(await coordinator.submit(reading("error", 17, T0))).toBe(1);
    expect(insertCalls()).toBe(2);
    expect(pool.acquisitions).toBe(2);
    expect(pool.leasedCount).toBe(0);
    expect(metrics.getWindow(5).streams.error).toMatchObject({ persisted: 1, retries: 1 });
  });

  it("gives up with WriteFailedError after the last attempt", async () => {
    const { factory, insertCalls } = hookedRepositoryFactory(signals, {
      beforeInsert: () => {
        throw driverError("could not serialize access", "40001");
      },
    });
    const coordinator = new IngestionCoordinator(new SignalSink(pool, factory), FAST, metrics);

    const err = await coordinator.submit(reading("power", 300, T0)).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(WriteFailedError);
    expect(err instanceof WriteFailedError && err.attempts).toBe(3);
    expect(err instanceof Error && err.message).toBe("Write of power signal failed after 3 attempt(s)");
    expect(err instanceof Error && err.cause).toBeInstanceOf(StorageUnavailableError);
    expect(insertCalls()).toBe(3);
    expect(pool.leasedCount).toBe(0);
    expect(metrics.getWindow(5).streams.power).toMatchObject({ writeFailed: 1, retries: 2, persisted: 0 });
  });

  it("does not retry a non-transient storage failure", async () => {
    const { factory, insertCalls } = hookedRepositoryFactory(signals, {
      beforeInsert: () => {
        throw driverError('permission denied for table "machine_signals"', "42501");
      },
    });
    const coordinator = new IngestionCoordinator(new SignalSink(pool, factory), FAST, metrics);

    const err = await coordinator.submit(reading("power", 300, T0)).catch((e: unknown) => e);
    expect(err instanceof WriteFailedError && err.attempts).toBe(1);
    expect(insertCalls()).toBe(1);
    expect(metrics.getWindow(5).streams.power.retries).toBe(0);
  });

  it("never retries a constraint violation", async () => {
    const { factory, insertCalls } = hookedRepositoryFactory(signals, {
      beforeInsert: () => {
        throw driverError('new row violates check constraint "value_range"', "23514");
      },
    });
    const coordinator = new IngestionCoordinator(new SignalSink(pool, factory), FAST, metrics);

    await expect(coordinator.submit(reading("power", 300, T0))).rejects.toBeInstanceOf(ConstraintViolationError);
    expect(insertCalls()).toBe(1);
    expect(pool.leasedCount).toBe(0);
    expect(metrics.getWindow(5).streams.power.constraintViolation).toBe(1);
  });

  it("fails with WriteFailedError when storage stays unreachable", async () => {
    const coordinator = new IngestionCoordinator(SignalSink.forTable(pool, TEST_TABLE), FAST, metrics);
    pool.sever();

    const err = await coordinator.submit(reading("state_change", 1, T0)).catch((e: unknown) => e);
    expect(err instanceof WriteFailedError && err.attempts).toBe(3);
    expect(err instanceof Error && err.cause).toBeInstanceOf(StorageUnavailableError);
    expect(pool.acquisitions).toBe(0);
  });

  it("succeeds after storage comes back between attempts", async () => {
    const coordinator = new IngestionCoordinator(
      SignalSink.forTable(pool, TEST_TABLE),
      { acquireTimeoutMs: 20, maxAttempts: 3, backoffBaseMs: 30 },
      metrics,
    );
    pool.sever();
    setTimeout(() => pool.restore(), 10);

    expect(await coordinator.submit(reading("power", 299, T0))).toBe(1);
    expect(metrics.getWindow(5).streams.power.retries).toBe(1);
  });
});
