/**
 * In-memory sliding-window counters for the ingestion pipeline.
 *
 * Tracks per-stream outcomes in 1-minute buckets over a configurable window.
 * Read by GET /health/details.
 */
import { SIGNAL_TYPES, type SignalType } from "../signals/types.js";

export type IngestionOutcome = "persisted" | "backpressure" | "writeFailed" | "constraintViolation";

export interface StreamCounters {
  persisted: number;
  backpressure: number;
  writeFailed: number;
  constraintViolation: number;
  retries: number;
}

interface IngestionBucket {
  timestamp: number; // minute-aligned unix epoch ms
  streams: Record<SignalType, StreamCounters>;
}

export interface IngestionWindow {
  totalSubmitted: number;
  totalDropped: number;
  /** Dropped ticks as a percentage of submitted ticks. */
  dropRate: number;
  streams: Record<SignalType, StreamCounters>;
}

const BUCKET_DURATION_MS = 60_000; // 1 minute
const DEFAULT_WINDOW_MINUTES = 60; // keep 60 minutes of history

function emptyCounters(): StreamCounters {
  return { persisted: 0, backpressure: 0, writeFailed: 0, constraintViolation: 0, retries: 0 };
}

function emptyStreams(): Record<SignalType, StreamCounters> {
  return { state_change: emptyCounters(), error: emptyCounters(), power: emptyCounters() };
}

export class IngestionMetrics {
  private buckets: IngestionBucket[] = [];
  private readonly windowMinutes: number;
  private readonly now: () => number;

  constructor(windowMinutes = DEFAULT_WINDOW_MINUTES, now: () => number = Date.now) {
    this.windowMinutes = windowMinutes;
    this.now = now;
  }

  private currentBucket(): IngestionBucket {
    const now = Math.floor(this.now() / BUCKET_DURATION_MS) * BUCKET_DURATION_MS;
    const last = this.buckets[this.buckets.length - 1];
    if (last && last.timestamp === now) return last;

    const bucket: IngestionBucket = { timestamp: now, streams: emptyStreams() };
    this.buckets.push(bucket);
    this.prune();
    return bucket;
  }

  private prune(): void {
    const cutoff = this.now() - this.windowMinutes * BUCKET_DURATION_MS;
    while (this.buckets.length > 0 && this.buckets[0].timestamp < cutoff) {
      this.buckets.shift();
    }
  }

  record(signalType: SignalType, outcome: IngestionOutcome): void {
    this.currentBucket().streams[signalType][outcome]++;
  }

  recordRetry(signalType: SignalType): void {
    this.currentBucket().streams[signalType].retries++;
  }

  /**
   * Aggregate counters over the last N minutes.
   */
  getWindow(minutes: number): IngestionWindow {
    const cutoff = this.now() - minutes * BUCKET_DURATION_MS;
    const streams = emptyStreams();

    for (const bucket of this.buckets) {
      if (bucket.timestamp < cutoff) continue;
      for (const type of SIGNAL_TYPES) {
        const from = bucket.streams[type];
        const into = streams[type];
        into.persisted += from.persisted;
        into.backpressure += from.backpressure;
        into.writeFailed += from.writeFailed;
        into.constraintViolation += from.constraintViolation;
        into.retries += from.retries;
      }
    }

    let totalSubmitted = 0;
    let totalDropped = 0;
    for (const type of SIGNAL_TYPES) {
      const c = streams[type];
      const dropped = c.backpressure + c.writeFailed + c.constraintViolation;
      totalDropped += dropped;
      totalSubmitted += c.persisted + dropped;
    }

    return {
      totalSubmitted,
      totalDropped,
      dropRate: totalSubmitted > 0 ? (totalDropped / totalSubmitted) * 100 : 0,
      streams,
    };
  }
}
