import type { SignalSink } from "./signal-sink.js";

export interface HealthStatus {
  healthy: boolean;
  latencyMs: number;
  error?: string;
}

/**
 * Liveness of the storage sink: one SELECT 1 on a pooled connection.
 * Reads nothing from the signal table and never retries, so each call reports the
 * state at that instant.
 */
export class HealthMonitor {
  constructor(
    private readonly sink: Pick<SignalSink, "ping">,
    private readonly now: () => number = Date.now,
  ) {}

  async check(): Promise<HealthStatus> {
    const started = this.now();
    try {
      await this.sink.ping();
      return { healthy: true, latencyMs: this.now() - started };
    } catch (err) {
      return {
        healthy: false,
        latencyMs: this.now() - started,
        error: err instanceof Error ? err.message : String(err),
      };
    }
  }
}
