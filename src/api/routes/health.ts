import { Hono } from "hono";
import type { ServiceLifecycle } from "../../lifecycle/service-state.js";
import type { IngestionMetrics } from "../../observability/ingestion-metrics.js";
import { poolStats, type SignalConnectionPool } from "../../signals/connection-pool.js";
import type { HealthMonitor } from "../../signals/health-monitor.js";

export interface HealthRouteDeps {
  monitor: Pick<HealthMonitor, "check">;
  lifecycle: Pick<ServiceLifecycle, "state">;
  pool?: SignalConnectionPool;
  metrics?: IngestionMetrics;
}

// Public, unauthenticated, used by load balancers and monitoring.
export function createHealthRoutes(deps: HealthRouteDeps): Hono {
  const routes = new Hono();

  routes.get("/", async (c) => {
    const status = await deps.monitor.check();
    if (status.healthy) {
      return c.json({ status: "Service is up and running" });
    }
    return c.json({ status: "Storage unreachable", error: status.error ?? "unknown" }, 503);
  });

  routes.get("/ready", (c) => {
    const state = deps.lifecycle.state;
    if (state === "ready") {
      return c.json({ status: "ready" });
    }
    return c.json({ status: "not ready", state }, 503);
  });

  /**
   * GET /health/details: lifecycle state, pool occupancy and per-stream ingestion
   * counters for the last 5 and 60 minutes.
   */
  routes.get("/details", async (c) => {
    const storage = await deps.monitor.check();
    return c.json({
      timestamp: new Date().toISOString(),
      state: deps.lifecycle.state,
      storage,
      pool: deps.pool ? poolStats(deps.pool) : null,
      ingestion: deps.metrics
        ? {
            last5m: deps.metrics.getWindow(5),
            last60m: deps.metrics.getWindow(60),
          }
        : null,
    });
  });

  return routes;
}
