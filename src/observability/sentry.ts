import * as Sentry from "@sentry/node";

let enabled = false;

/**
 * Initialize Sentry SDK. Call once at startup, before anything that might throw.
 *
 * If `dsn` is absent or empty, Sentry stays disabled and capture calls are no-ops.
 */
export function initSentry(dsn: string | undefined, environment = process.env.NODE_ENV ?? "development"): void {
  if (!dsn) {
    enabled = false;
    return;
  }

  Sentry.init({
    dsn,
    environment,
    release: process.env.SENTRY_RELEASE ?? undefined,
    // Errors only; the read API is too small to be worth tracing.
    tracesSampleRate: 0,
  });
  enabled = true;
}

/**
 * Capture an exception in Sentry, tagged with the signal stream or route it came from.
 */
export function captureError(
  error: unknown,
  context?: {
    route?: string;
    source?: string;
    extra?: Record<string, unknown>;
  },
): void {
  if (!enabled) return;
  Sentry.captureException(error, {
    tags: {
      ...(context?.route && { route: context.route }),
      ...(context?.source && { source: context.source }),
    },
    extra: context?.extra,
  });
}

export function captureMessage(message: string, level: Sentry.SeverityLevel = "info"): void {
  if (!enabled) return;
  Sentry.captureMessage(message, level);
}
