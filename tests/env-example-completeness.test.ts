import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { DB_CONNECTION_DEFAULTS } from "../src/config/index.js";

const envExample = fileURLToPath(new URL("../.env.example", import.meta.url));

describe(".env.example completeness", () => {
  it("should contain every DB_* connection var", () => {
    const content = readFileSync(envExample, "utf-8");
    for (const name of Object.keys(DB_CONNECTION_DEFAULTS)) {
      expect(content).toContain(`${name}=`);
    }
  });

  it("should contain DB_TABLE_NAME", () => {
    const content = readFileSync(envExample, "utf-8");
    expect(content).toContain("DB_TABLE_NAME=");
  });

  it("should contain SERVER_HOST and SERVER_PORT", () => {
    const content = readFileSync(envExample, "utf-8");
    expect(content).toContain("SERVER_HOST=");
    expect(content).toContain("SERVER_PORT=");
  });

  it("should contain the ingestion and shutdown tunables", () => {
    const content = readFileSync(envExample, "utf-8");
    expect(content).toContain("DB_POOL_MAX=");
    expect(content).toContain("INGEST_ACQUIRE_TIMEOUT_MS=");
    expect(content).toContain("INGEST_MAX_ATTEMPTS=");
    expect(content).toContain("SHUTDOWN_GRACE_MS=");
  });
});
