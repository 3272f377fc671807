import { getTableConfig } from "drizzle-orm/pg-core";
import { describe, expect, it } from "vitest";
import { defineSignalsTable } from "./signals.js";

function sortOrder(column: unknown): unknown {
  if (typeof column !== "object" || column === null || !("indexConfig" in column)) return undefined;
  const indexConfig = column.indexConfig;
  if (typeof indexConfig !== "object" || indexConfig === null || !("order" in indexConfig)) return undefined;
  return indexConfig.order;
}

function columnName(column: unknown): unknown {
  return typeof column === "object" && column !== null && "name" in column ? column.name : undefined;
}

describe("defineSignalsTable", () => {
  it("names the table and its recent-readings index after the configured name", () => {
    const config = getTableConfig(defineSignalsTable("line_7_signals"));
    expect(config.name).toBe("line_7_signals");
    expect(config.indexes.map((idx) => idx.config.name)).toEqual(["line_7_signals_type_recent_idx"]);
  });

  it("orders the index newest first, matching the bootstrap DDL", () => {
    const [idx] = getTableConfig(defineSignalsTable("line_7_signals")).indexes;
    const columns = idx?.config.columns ?? [];
    expect(columns.map(columnName)).toEqual(["signal_type", "timestamp", "id"]);
    expect(sortOrder(columns[0])).not.toBe("desc");
    expect(columns.slice(1).map(sortOrder)).toEqual(["desc", "desc"]);
  });
});
