import { setTimeout as sleep } from "node:timers/promises";
import { logger } from "../config/logger.js";
import { captureError, captureMessage } from "../observability/sentry.js";
import { BackpressureError, ConstraintViolationError, WriteFailedError } from "./errors.js";
import type { RandomSource, StreamPolicy } from "./stream-policies.js";
import type { NewSignalRecord } from "./types.js";

/** Anything that accepts generated records; the IngestionCoordinator in production. */
export interface SignalSubmitter {
  submit(record: NewSignalRecord): Promise<number>;
}

export interface SignalGeneratorOptions {
  random?: RandomSource;
  now?: () => Date;
  /** Log a warning once every this many backpressure drops. */
  dropSummaryEvery?: number;
}

export interface GeneratorStats {
  produced: number;
  persisted: number;
  dropped: number;
}

/**
 * One telemetry stream: sleeps for the policy's delay, stamps a reading with the current
 * time and submits it, until stopped.
 *
 * Each stream has exactly one generator and submits its ticks one at a time, so a
 * stream's insert order is its generation order. A failed tick is logged and dropped;
 * the loop carries on.
 */
export class SignalGenerator {
  private readonly random: RandomSource;
  private readonly now: () => Date;
  private readonly dropSummaryEvery: number;

  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  private lastValue: number | undefined;
  private lastTimestampMs = Number.NEGATIVE_INFINITY;
  private backpressureSinceSummary = 0;
  private readonly stats: GeneratorStats = { produced: 0, persisted: 0, dropped: 0 };

  constructor(
    private readonly policy: StreamPolicy,
    private readonly submitter: SignalSubmitter,
    options: SignalGeneratorOptions = {},
  ) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.dropSummaryEvery = options.dropSummaryEvery ?? 100;
  }

  get signalType() {
    return this.policy.signalType;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  getStats(): GeneratorStats {
    return { ...this.stats };
  }

  start(): void {
    if (this.loop) {
      logger.warn(`${this.signalType} generator already running`);
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
  }

  /**
   * Stop scheduling ticks. A pending delay is cut short; a tick already submitted is
   * allowed to finish. Resolves once the loop has exited.
   */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.controller?.abort();
    await loop;
    this.loop = null;
    this.controller = null;
  }

  private async run(signal: AbortSignal): Promise<void> {
    logger.info(`Starting ${this.signalType} generator`);
    while (!signal.aborted) {
      try {
        await sleep(this.policy.nextDelayMs(this.random), undefined, { signal });
      } catch (err) {
        if (signal.aborted) break;
        throw err;
      }
      await this.tick();
    }
    logger.info(`${this.signalType} generator stopped`, { ...this.stats });
  }

  /** Produce and submit one reading. Never throws. */
  async tick(): Promise<void> {
    const record = this.nextRecord();
    this.stats.produced++;
    try {
      await this.submitter.submit(record);
      this.stats.persisted++;
    } catch (err) {
      this.stats.dropped++;
      this.reportDrop(err);
    }
  }

  private nextRecord(): NewSignalRecord {
    const value = this.policy.nextValue(this.random, this.lastValue);
    this.lastValue = value;
    // Never step backwards within a stream, even if the wall clock does.
    this.lastTimestampMs = Math.max(this.now().getTime(), this.lastTimestampMs);
    return { signalType: this.signalType, value, timestamp: new Date(this.lastTimestampMs) };
  }

  private reportDrop(err: unknown): void {
    if (err instanceof BackpressureError) {
      logger.debug(`Dropped ${this.signalType} tick: ${err.message}`);
      this.backpressureSinceSummary++;
      if (this.backpressureSinceSummary >= this.dropSummaryEvery) {
        const summary = `Dropped ${this.backpressureSinceSummary} ${this.signalType} ticks under backpressure`;
        logger.warn(summary);
        captureMessage(summary, "warning");
        this.backpressureSinceSummary = 0;
      }
      return;
    }
    if (err instanceof WriteFailedError) {
      logger.warn(`Dropped ${this.signalType} tick: ${err.message}`, {
        cause: err.cause instanceof Error ? err.cause.message : undefined,
      });
      return;
    }
    if (err instanceof ConstraintViolationError) {
      logger.error(`Storage rejected a ${this.signalType} reading (bug)`, { error: err.message });
      captureError(err, { source: "generator", extra: { signalType: this.signalType } });
      return;
    }
    logger.error(`Unexpected failure submitting ${this.signalType} tick`, {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    captureError(err, { source: "generator", extra: { signalType: this.signalType } });
  }
}
