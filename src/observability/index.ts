/**
 * Observability — Sentry error tracking and ingestion counters.
 */

export type { IngestionOutcome, IngestionWindow, StreamCounters } from "./ingestion-metrics.js";
export { IngestionMetrics } from "./ingestion-metrics.js";
export { captureError, captureMessage, initSentry } from "./sentry.js";
