import type { Pool, PoolClient, PoolConfig } from "pg";
import pg from "pg";
import { logger } from "../config/logger.js";
import { createDb, type DrizzleDb } from "../db/index.js";
import { BackpressureError } from "./errors.js";

/** One borrowed connection. Owned by exactly one operation until released. */
export interface PooledConnection {
  readonly db: DrizzleDb;
  /** Return the connection. Passing an error marks it broken so the pool discards it. */
  release(err?: Error): void;
}

/** Bounded set of storage connections shared by the generators, the read API and the health check. */
export interface SignalConnectionPool {
  /** Borrow a connection, waiting as long as the pool's own connect timeout allows. */
  connect(): Promise<PooledConnection>;
  /** Connections currently borrowed and not yet released. */
  readonly leasedCount: number;
  readonly totalCount: number;
  readonly idleCount: number;
  readonly waitingCount: number;
  /** Close every connection. Connections still leased are closed as they come back. */
  end(): Promise<void>;
}

export interface PoolStats {
  leased: number;
  total: number;
  idle: number;
  waiting: number;
}

export function poolStats(pool: SignalConnectionPool): PoolStats {
  return {
    leased: pool.leasedCount,
    total: pool.totalCount,
    idle: pool.idleCount,
    waiting: pool.waitingCount,
  };
}

export interface PgPoolOptions {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  max: number;
  connectTimeoutMs: number;
  idleTimeoutMs: number;
  queryTimeoutMs: number;
}

/** Adapts a pg.Pool to SignalConnectionPool, counting leases so drains can report leaks. */
export class PgConnectionPool implements SignalConnectionPool {
  private leased = 0;

  constructor(private readonly pool: Pool) {
    // Idle clients that lose their backend emit on the pool; unhandled, that would crash the process.
    pool.on("error", (err) => {
      logger.warn("Idle storage connection failed", { error: err.message });
    });
  }

  static fromOptions(options: PgPoolOptions): PgConnectionPool {
    const poolConfig: PoolConfig = {
      host: options.host,
      port: options.port,
      user: options.user,
      password: options.password,
      database: options.database,
      max: options.max,
      connectionTimeoutMillis: options.connectTimeoutMs,
      idleTimeoutMillis: options.idleTimeoutMs,
      query_timeout: options.queryTimeoutMs,
    };
    return new PgConnectionPool(new pg.Pool(poolConfig));
  }

  async connect(): Promise<PooledConnection> {
    const client: PoolClient = await this.pool.connect();
    this.leased++;
    let released = false;
    return {
      db: createDb(client),
      release: (err?: Error) => {
        if (released) return;
        released = true;
        this.leased--;
        client.release(err);
      },
    };
  }

  get leasedCount(): number {
    return this.leased;
  }

  get totalCount(): number {
    return this.pool.totalCount;
  }

  get idleCount(): number {
    return this.pool.idleCount;
  }

  get waitingCount(): number {
    return this.pool.waitingCount;
  }

  async end(): Promise<void> {
    await this.pool.end();
  }
}

/**
 * Borrow a connection, giving up with BackpressureError after `timeoutMs`.
 *
 * The pool may still hand over the connection after the caller gave up; that late
 * lease is released immediately so it never leaks.
 */
export async function acquireWithTimeout(pool: SignalConnectionPool, timeoutMs: number): Promise<PooledConnection> {
  let timedOut = false;
  let timer: ReturnType<typeof setTimeout> | undefined;

  const pending = pool.connect();
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      reject(new BackpressureError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([pending, timeout]);
  } finally {
    clearTimeout(timer);
    if (timedOut) {
      pending.then(
        (late) => late.release(),
        (err: unknown) => {
          logger.debug("Abandoned connection request failed", {
            error: err instanceof Error ? err.message : String(err),
          });
        },
      );
    }
  }
}
