import { z } from "zod";

/** Plain, unquoted SQL identifier. The table name is interpolated into DDL and queries. */
const SQL_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]{0,62}$/;

/** Connection settings used when the matching env var is unset. */
export const DB_CONNECTION_DEFAULTS = {
  DB_HOST: "localhost",
  DB_USER: "postgres",
  DB_PASSWORD: "",
  DB_NAME: "machine_data",
} as const;

/** Writers (one per signal stream) that can hold a connection at the same time. */
export const GENERATOR_TASK_COUNT = 3;

const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** HTTP bind address for the read API. */
  server: z
    .object({
      host: z.string().min(1).default("127.0.0.1"),
      port: z.coerce.number().int().min(0).max(65535).default(8080),
    })
    .default({ host: "127.0.0.1", port: 8080 }),

  /** PostgreSQL connection and pool sizing. */
  db: z
    .object({
      host: z.string().min(1).default(DB_CONNECTION_DEFAULTS.DB_HOST),
      port: z.coerce.number().int().min(1).max(65535).default(5432),
      user: z.string().min(1).default(DB_CONNECTION_DEFAULTS.DB_USER),
      password: z.string().default(DB_CONNECTION_DEFAULTS.DB_PASSWORD),
      database: z.string().min(1).default(DB_CONNECTION_DEFAULTS.DB_NAME),
      tableName: z
        .string()
        .regex(SQL_IDENTIFIER, "DB_TABLE_NAME must be a plain SQL identifier")
        .default("machine_signals"),
      /** Must leave room for every generator plus at least one reader. */
      poolMax: z.coerce
        .number()
        .int()
        .min(GENERATOR_TASK_COUNT + 1)
        .default(10),
      connectTimeoutMs: z.coerce.number().int().positive().default(5_000),
      idleTimeoutMs: z.coerce.number().int().nonnegative().default(30_000),
      queryTimeoutMs: z.coerce.number().int().positive().default(5_000),
    })
    .default({}),

  /** Write-path backpressure and retry policy. */
  ingestion: z
    .object({
      acquireTimeoutMs: z.coerce.number().int().positive().default(250),
      maxAttempts: z.coerce.number().int().min(1).max(10).default(3),
      backoffBaseMs: z.coerce.number().int().nonnegative().default(25),
    })
    .default({}),

  shutdown: z
    .object({
      gracePeriodMs: z.coerce.number().int().positive().default(10_000),
    })
    .default({}),

  sentryDsn: z.string().optional(),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Build the service configuration from environment variables.
 * Unset variables fall back to the schema defaults; invalid values throw a ZodError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL?.toLowerCase(),
    server: {
      host: env.SERVER_HOST,
      port: env.SERVER_PORT,
    },
    db: {
      host: env.DB_HOST,
      port: env.DB_PORT,
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      database: env.DB_NAME,
      tableName: env.DB_TABLE_NAME,
      poolMax: env.DB_POOL_MAX,
      connectTimeoutMs: env.DB_CONNECT_TIMEOUT_MS,
      idleTimeoutMs: env.DB_IDLE_TIMEOUT_MS,
      queryTimeoutMs: env.DB_QUERY_TIMEOUT_MS,
    },
    ingestion: {
      acquireTimeoutMs: env.INGEST_ACQUIRE_TIMEOUT_MS,
      maxAttempts: env.INGEST_MAX_ATTEMPTS,
      backoffBaseMs: env.INGEST_BACKOFF_BASE_MS,
    },
    shutdown: {
      gracePeriodMs: env.SHUTDOWN_GRACE_MS,
    },
    sentryDsn: env.SENTRY_DSN || undefined,
  });
}

export const config = loadConfig();
