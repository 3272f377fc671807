import { afterEach, describe, expect, it, vi } from "vitest";
import { logger } from "./config/logger.js";
import { validateEnvVars } from "./validate-env.js";

const complete = {
  NODE_ENV: "production",
  DB_HOST: "db.internal",
  DB_USER: "telemetry",
  DB_PASSWORD: "test-secret",
  DB_NAME: "machine_data",
  SERVER_HOST: "0.0.0.0",
  SENTRY_DSN: "https://public@sentry.example.com/1",
};

describe("validateEnvVars", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("warns (does not throw) when DB_HOST falls back to its default", () => {
    const warnSpy = vi.spyOn(logger, "warn").mockImplementation(() => logger);
    const { DB_HOST: _omit, ...env } = complete;
    expect(() => validateEnvVars(env)).not.toThrow();
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith('[env] DB_HOST is not set; using "localhost".');
  });

  it("names the default for every unset connection var", () => {
    const warnSpy = vi.spyOn(logger, "warn").mockImplementation(() => logger);
    validateEnvVars({ NODE_ENV: "development", SERVER_HOST: "0.0.0.0" });
    expect(warnSpy.mock.calls.map(([message]) => message)).toEqual([
      '[env] DB_HOST is not set; using "localhost".',
      '[env] DB_USER is not set; using "postgres".',
      "[env] DB_PASSWORD is not set; connecting without one.",
      '[env] DB_NAME is not set; using "machine_data".',
    ]);
  });

  it("accepts an empty DB_PASSWORD without warning", () => {
    const warnSpy = vi.spyOn(logger, "warn").mockImplementation(() => logger);
    validateEnvVars({ ...complete, DB_PASSWORD: "" });
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it("warns when SERVER_HOST is missing", () => {
    const warnSpy = vi.spyOn(logger, "warn").mockImplementation(() => logger);
    const { SERVER_HOST: _omit, ...env } = complete;
    validateEnvVars(env);
    expect(warnSpy).toHaveBeenCalledWith("[env] SERVER_HOST is not set; the read API binds to 127.0.0.1 only.");
  });

  it("warns about SENTRY_DSN only in production", () => {
    const warnSpy = vi.spyOn(logger, "warn").mockImplementation(() => logger);
    const { SENTRY_DSN: _omit, ...env } = complete;
    validateEnvVars({ ...env, NODE_ENV: "development" });
    expect(warnSpy).not.toHaveBeenCalled();
    validateEnvVars(env);
    expect(warnSpy).toHaveBeenCalledWith("[env] SENTRY_DSN is not set; errors will only be logged.");
  });

  it("does not warn when everything is set", () => {
    const warnSpy = vi.spyOn(logger, "warn").mockImplementation(() => logger);
    validateEnvVars(complete);
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it("skips validation in test env", () => {
    const warnSpy = vi.spyOn(logger, "warn").mockImplementation(() => logger);
    validateEnvVars({ NODE_ENV: "test" });
    expect(warnSpy).not.toHaveBeenCalled();
  });
});
