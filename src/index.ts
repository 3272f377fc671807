import { Server } from "node:http";
import { serve } from "@hono/node-server";
import { createApp } from "./api/app.js";
import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { InFlightTracker } from "./lifecycle/in-flight-tracker.js";
import { ServiceLifecycle } from "./lifecycle/service-state.js";
import { type HttpListener, ShutdownCoordinator } from "./lifecycle/shutdown-coordinator.js";
import { prepareStorage } from "./lifecycle/startup.js";
import { captureError, IngestionMetrics, initSentry } from "./observability/index.js";
import { PgConnectionPool } from "./signals/connection-pool.js";
import { HealthMonitor } from "./signals/health-monitor.js";
import { IngestionCoordinator } from "./signals/ingestion-coordinator.js";
import { SignalGenerator } from "./signals/signal-generator.js";
import { SignalSink } from "./signals/signal-sink.js";
import { STREAM_POLICIES } from "./signals/stream-policies.js";
import { validateEnvVars } from "./validate-env.js";

// Handle unhandled promise rejections (async errors that weren't caught)
export const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
    promise: String(promise),
  });
  captureError(reason instanceof Error ? reason : new Error(String(reason)), {
    source: "unhandledRejection",
  });
  // Keep running: a failed tick or request is not fatal
};

// Handle uncaught exceptions (synchronous errors that weren't caught)
export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", {
    error: err.message,
    stack: err.stack,
    origin,
  });
  captureError(err, { source: "uncaughtException", extra: { origin } });
  // Uncaught exceptions leave the process in an undefined state.
  // Exit immediately after logging (Winston Console transport is synchronous).
  process.exit(1);
};

process.on("unhandledRejection", unhandledRejectionHandler);
process.on("uncaughtException", uncaughtExceptionHandler);

function httpListener(server: ReturnType<typeof serve>): HttpListener {
  return {
    stopAccepting: () =>
      new Promise<void>((resolve) => {
        server.close(() => resolve());
        if (server instanceof Server) server.closeIdleConnections();
      }),
    forceClose: () => {
      if (server instanceof Server) server.closeAllConnections();
    },
  };
}

async function main(): Promise<void> {
  validateEnvVars();
  initSentry(config.sentryDsn, config.nodeEnv);

  logger.info("machine-telemetry starting", {
    db: `${config.db.host}:${config.db.port}/${config.db.database}`,
    table: config.db.tableName,
    poolMax: config.db.poolMax,
  });

  const lifecycle = new ServiceLifecycle();
  lifecycle.onTransition((from, to) => logger.info(`Service state ${from} → ${to}`));

  const pool = PgConnectionPool.fromOptions({ ...config.db, max: config.db.poolMax });
  const sink = SignalSink.forTable(pool, config.db.tableName);
  const metrics = new IngestionMetrics();
  const coordinator = new IngestionCoordinator(sink, config.ingestion, metrics);
  const generators = STREAM_POLICIES.map((policy) => new SignalGenerator(policy, coordinator));
  const requests = new InFlightTracker();
  const monitor = new HealthMonitor(sink);

  // ── Starting: storage must be reachable before anything else runs ───────────
  const startup = await prepareStorage({ lifecycle, sink, pool, tableName: config.db.tableName });
  if (!startup.ok) process.exit(startup.exitCode);

  const app = createApp({ sink, monitor, lifecycle, requests, pool, metrics });
  const server = serve({ fetch: app.fetch, hostname: config.server.host, port: config.server.port }, (info) => {
    logger.info(`machine-telemetry listening on http://${info.address}:${info.port}`);
  });

  const shutdown = new ShutdownCoordinator({
    lifecycle,
    generators,
    requests,
    pool,
    server: httpListener(server),
    gracePeriodMs: config.shutdown.gracePeriodMs,
  });

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown
      .shutdown(signal)
      .then((result) => process.exit(result.exitCode))
      .catch((err: unknown) => {
        logger.error("Shutdown failed", { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  // ── Ready ────────────────────────────────────────────────────────────────────
  lifecycle.transition("ready");
  for (const generator of generators) generator.start();
}

// Only start the service if not imported by tests
if (process.env.NODE_ENV !== "test") {
  main().catch((err: unknown) => {
    logger.error("Fatal startup error", {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    process.exit(1);
  });
}
