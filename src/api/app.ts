import { Hono } from "hono";
import { logger } from "../config/logger.js";
import type { InFlightTracker } from "../lifecycle/in-flight-tracker.js";
import type { ServiceLifecycle } from "../lifecycle/service-state.js";
import type { IngestionMetrics } from "../observability/ingestion-metrics.js";
import { captureError } from "../observability/sentry.js";
import type { SignalConnectionPool } from "../signals/connection-pool.js";
import type { HealthMonitor } from "../signals/health-monitor.js";
import type { SignalSink } from "../signals/signal-sink.js";
import { createHealthRoutes } from "./routes/health.js";
import { createSignalRoutes } from "./routes/signals.js";

export interface AppDeps {
  sink: Pick<SignalSink, "queryRecent">;
  monitor: Pick<HealthMonitor, "check">;
  lifecycle: Pick<ServiceLifecycle, "state" | "accepting">;
  requests: InFlightTracker;
  pool?: SignalConnectionPool;
  metrics?: IngestionMetrics;
}

/**
 * Read API: GET /signals/:signalType and the /health family.
 *
 * Requests are only admitted while the service is ready; once draining starts every
 * new request gets a 503 and the connection is closed. Admitted requests are counted
 * so the drain can wait for them.
 */
export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  app.use("*", async (c, next) => {
    if (!deps.lifecycle.accepting) {
      c.header("Connection", "close");
      return c.json({ error: "Service unavailable", state: deps.lifecycle.state }, 503);
    }
    await deps.requests.track(() => next());
  });

  app.route("/signals", createSignalRoutes(deps.sink));
  app.route("/health", createHealthRoutes(deps));

  app.onError((err, c) => {
    logger.error("Unhandled error in request", {
      error: err.message,
      stack: err.stack,
      path: c.req.path,
      method: c.req.method,
    });
    captureError(err, { route: c.req.path });
    return c.json(
      {
        error: "Internal server error",
        message: "An unexpected error occurred while processing your request",
      },
      500,
    );
  });

  return app;
}
