import { logger } from "../config/logger.js";
import type { SignalConnectionPool } from "../signals/connection-pool.js";
import type { InFlightTracker } from "./in-flight-tracker.js";
import type { ServiceLifecycle } from "./service-state.js";

/** Something with in-flight work that can be asked to stop and awaited. */
export interface Stoppable {
  stop(): Promise<void>;
}

/** The HTTP listener, seen from the drain: stop taking connections, or drop them all. */
export interface HttpListener {
  /** Stop accepting connections; resolves when existing ones have closed. */
  stopAccepting(): Promise<void>;
  /** Destroy every remaining connection. */
  forceClose(): void;
}

export interface ShutdownDeps {
  lifecycle: ServiceLifecycle;
  generators: readonly Stoppable[];
  requests: InFlightTracker;
  pool: SignalConnectionPool;
  server?: HttpListener;
  gracePeriodMs: number;
  /** How long to wait for the pool to close its connections once the drain is over. */
  poolEndTimeoutMs?: number;
}

export interface ShutdownResult {
  /** Every generator tick and request finished within the grace period. */
  drained: boolean;
  exitCode: 0 | 1;
  abandonedRequests: number;
  leakedConnections: number;
  durationMs: number;
}

const DEFAULT_POOL_END_TIMEOUT_MS = 2_000;

/** Resolves true if `work` settles within `ms`, false otherwise. */
async function settlesWithin(work: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([work.then(() => true as const), expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Sequences the stop of the whole service: ready → draining → stopped.
 *
 * Draining stops new generator ticks and new requests, then waits up to the grace
 * period for in-flight ticks and requests before the pool is closed. Exit code 0
 * means nothing was abandoned and no connection leaked.
 */
export class ShutdownCoordinator {
  private pending: Promise<ShutdownResult> | null = null;

  constructor(private readonly deps: ShutdownDeps) {}

  get inProgress(): boolean {
    return this.pending !== null;
  }

  /** Begin (or join) the shutdown. Repeated signals share the first drain. */
  shutdown(reason: string): Promise<ShutdownResult> {
    if (this.pending) {
      logger.warn(`Shutdown already in progress, ignoring ${reason}`);
      return this.pending;
    }
    this.pending = this.drain(reason);
    return this.pending;
  }

  private async drain(reason: string): Promise<ShutdownResult> {
    const { lifecycle, generators, requests, pool, server, gracePeriodMs } = this.deps;
    const started = Date.now();

    if (lifecycle.state === "starting") {
      logger.warn(`Shutdown requested during startup (${reason})`);
      await this.endPool();
      lifecycle.transition("stopped");
      return this.result(false, requests.count, started);
    }

    lifecycle.transition("draining");
    logger.info(`Draining (${reason})`, {
      gracePeriodMs,
      inFlightRequests: requests.count,
      leasedConnections: pool.leasedCount,
    });

    const work = Promise.allSettled([
      ...generators.map((generator) => generator.stop()),
      requests.whenIdle(),
      ...(server ? [server.stopAccepting()] : []),
    ]).then((outcomes) => {
      for (const outcome of outcomes) {
        if (outcome.status === "rejected") {
          logger.error("Error while draining", {
            error: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason),
          });
        }
      }
    });

    const drained = await settlesWithin(work, gracePeriodMs);
    const abandonedRequests = requests.count;
    if (!drained) {
      logger.warn(`Grace period of ${gracePeriodMs}ms exceeded; abandoning in-flight work`, {
        abandonedRequests,
        leasedConnections: pool.leasedCount,
      });
      server?.forceClose();
    }

    await this.endPool();
    lifecycle.transition("stopped");
    return this.result(drained, abandonedRequests, started);
  }

  private async endPool(): Promise<void> {
    const timeoutMs = this.deps.poolEndTimeoutMs ?? DEFAULT_POOL_END_TIMEOUT_MS;
    const ended = await settlesWithin(
      this.deps.pool.end().catch((err: unknown) => {
        logger.error("Failed to close storage pool", { error: err instanceof Error ? err.message : String(err) });
      }),
      timeoutMs,
    );
    if (!ended) {
      logger.warn(`Storage pool did not close within ${timeoutMs}ms`);
    }
  }

  private result(drained: boolean, abandonedRequests: number, started: number): ShutdownResult {
    const leakedConnections = this.deps.pool.leasedCount;
    const exitCode = drained && leakedConnections === 0 ? 0 : 1;
    const result: ShutdownResult = {
      drained,
      exitCode,
      abandonedRequests,
      leakedConnections,
      durationMs: Date.now() - started,
    };
    logger.info("Stopped", { ...result });
    return result;
  }
}
