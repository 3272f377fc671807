import { DB_CONNECTION_DEFAULTS } from "./config/index.js";
import { logger } from "./config/logger.js";

/**
 * Startup environment variable check.
 *
 * Every setting has a default, so nothing here is fatal: it warns when the service
 * is about to run on a fallback that is probably not what the operator meant.
 * Skipped in test environment.
 */
export function validateEnvVars(env: NodeJS.ProcessEnv = process.env): void {
  if (env.NODE_ENV === "test") return;

  const warnings: string[] = [];

  // --- Storage connection (defaults apply) ---
  for (const [name, fallback] of Object.entries(DB_CONNECTION_DEFAULTS)) {
    if (env[name] !== undefined) continue;
    warnings.push(
      fallback === "" ? `${name} is not set; connecting without one.` : `${name} is not set; using "${fallback}".`,
    );
  }

  // --- Recommended ---
  if (!env.SERVER_HOST) {
    warnings.push("SERVER_HOST is not set; the read API binds to 127.0.0.1 only.");
  }
  if (env.NODE_ENV === "production" && !env.SENTRY_DSN) {
    warnings.push("SENTRY_DSN is not set; errors will only be logged.");
  }

  // --- Emit ---
  for (const w of warnings) {
    logger.warn(`[env] ${w}`);
  }
}
