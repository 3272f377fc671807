import winston from "winston";
import { config } from "./index.js";

const consoleFormat =
  config.nodeEnv === "production"
    ? winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json())
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.printf(({ level, message, timestamp, ...meta }) => {
          const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
          return `[${level}] ${String(timestamp)} ${String(message)}${extra}`;
        }),
      );

/**
 * Process-wide logger. The Console transport writes synchronously, so lines logged
 * right before process.exit() are not lost.
 */
export const logger = winston.createLogger({
  level: config.logLevel,
  defaultMeta: { service: "machine-telemetry" },
  transports: [new winston.transports.Console({ format: consoleFormat })],
});
