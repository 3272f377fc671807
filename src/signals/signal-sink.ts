import type { DrizzleDb } from "../db/index.js";
import { defineSignalsTable } from "../db/schema/index.js";
import { acquireWithTimeout, type PooledConnection, type SignalConnectionPool } from "./connection-pool.js";
import { DrizzleSignalRepository } from "./drizzle-signal-repository.js";
import { BackpressureError, ConstraintViolationError, StorageUnavailableError } from "./errors.js";
import type { ISignalRepository } from "./signal-repository.js";
import { isSignalType, type NewSignalRecord, RECENT_SIGNAL_LIMIT, type SignalRecord, type SignalType } from "./types.js";

export type SignalRepositoryFactory = (db: DrizzleDb) => ISignalRepository;

/** SQLSTATEs worth retrying on a fresh connection. */
const TRANSIENT_SQLSTATES = new Set([
  "40001", // serialization_failure
  "40P01", // deadlock_detected
  "53300", // too_many_connections
  "57P01", // admin_shutdown
  "57P02", // crash_shutdown
  "57P03", // cannot_connect_now
]);

const TRANSIENT_SOCKET_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "EPIPE", "ETIMEDOUT", "EHOSTUNREACH"]);

const TRANSIENT_MESSAGES = [/connection terminated/i, /timeout exceeded/i, /client has encountered a connection error/i];

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("code" in err && typeof err.code === "string") return err.code;
  if ("cause" in err) return errorCode(err.cause);
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Map a driver error onto the sink's taxonomy.
 *
 * SQLSTATE classes 22 (data exception) and 23 (integrity constraint) are the record's
 * fault; connection-class (08) and the codes above are transient; anything else is a
 * storage failure that retrying will not fix.
 */
export function classifyStorageError(err: unknown, operation: string): ConstraintViolationError | StorageUnavailableError {
  if (err instanceof ConstraintViolationError || err instanceof StorageUnavailableError) return err;

  const code = errorCode(err);
  const message = `${operation} failed: ${errorMessage(err)}`;

  if (code && (code.startsWith("22") || code.startsWith("23"))) {
    return new ConstraintViolationError(message, { cause: err });
  }

  const transient =
    (code !== undefined &&
      (code.startsWith("08") || TRANSIENT_SQLSTATES.has(code) || TRANSIENT_SOCKET_CODES.has(code))) ||
    TRANSIENT_MESSAGES.some((pattern) => pattern.test(errorMessage(err)));

  return new StorageUnavailableError(message, { cause: err, transient });
}

/**
 * Storage sink over the append-only signal table.
 *
 * Every operation borrows its own pooled connection and returns it before resolving;
 * no connection is held across operations.
 */
export class SignalSink {
  constructor(
    private readonly pool: SignalConnectionPool,
    private readonly repositoryFor: SignalRepositoryFactory,
  ) {}

  static forTable(pool: SignalConnectionPool, tableName: string): SignalSink {
    const table = defineSignalsTable(tableName);
    return new SignalSink(pool, (db) => new DrizzleSignalRepository(db, table));
  }

  /**
   * Borrow a connection, mapping any failure to establish one to StorageUnavailableError.
   * With `timeoutMs`, an exhausted pool fails with BackpressureError instead of waiting.
   */
  async borrow(timeoutMs?: number): Promise<PooledConnection> {
    try {
      return timeoutMs === undefined ? await this.pool.connect() : await acquireWithTimeout(this.pool, timeoutMs);
    } catch (err) {
      if (err instanceof BackpressureError) throw err;
      throw new StorageUnavailableError(`Cannot reach storage: ${errorMessage(err)}`, { cause: err });
    }
  }

  /** Persist one record on a connection of its own. */
  async insert(record: NewSignalRecord): Promise<number> {
    assertInsertable(record);
    return this.withConnection((repo) => this.insertInto(repo, record));
  }

  /** Persist one record on a connection the caller already holds (and will release). */
  async insertWith(connection: PooledConnection, record: NewSignalRecord): Promise<number> {
    assertInsertable(record);
    return this.insertInto(this.repositoryFor(connection.db), record);
  }

  /** Up to `limit` most recent records of one type, newest first. Empty when none exist. */
  async queryRecent(signalType: SignalType, limit: number = RECENT_SIGNAL_LIMIT): Promise<SignalRecord[]> {
    return this.withConnection(async (repo) => {
      try {
        return await repo.listRecent(signalType, limit);
      } catch (err) {
        throw classifyStorageError(err, "queryRecent");
      }
    });
  }

  /** Single round-trip; never retried. */
  async ping(): Promise<void> {
    await this.withConnection(async (repo) => {
      try {
        await repo.ping();
      } catch (err) {
        throw classifyStorageError(err, "ping");
      }
    });
  }

  private async insertInto(repo: ISignalRepository, record: NewSignalRecord): Promise<number> {
    try {
      return await repo.insert(record);
    } catch (err) {
      throw classifyStorageError(err, `insert ${record.signalType}`);
    }
  }

  private async withConnection<T>(work: (repo: ISignalRepository) => Promise<T>): Promise<T> {
    const connection = await this.borrow();
    let broken: Error | undefined;
    try {
      return await work(this.repositoryFor(connection.db));
    } catch (err) {
      if (err instanceof StorageUnavailableError && err.transient) broken = err;
      throw err;
    } finally {
      connection.release(broken);
    }
  }
}

function assertInsertable(record: NewSignalRecord): void {
  // Records are typed, but the closed set is re-checked at the storage boundary.
  if (!isSignalType(record.signalType)) {
    throw new ConstraintViolationError(`signal_type outside the closed set: ${String(record.signalType)}`);
  }
  if (!Number.isFinite(record.value)) {
    throw new ConstraintViolationError(`value must be a finite number, got ${record.value}`);
  }
  if (Number.isNaN(record.timestamp.getTime())) {
    throw new ConstraintViolationError("timestamp is not a valid date");
  }
}
