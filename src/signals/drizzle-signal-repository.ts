import { desc, eq, getTableName, sql } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import type { SignalsTable } from "../db/schema/index.js";
import type { ISignalRepository } from "./signal-repository.js";
import type { NewSignalRecord, SignalRecord, SignalType } from "./types.js";

export class DrizzleSignalRepository implements ISignalRepository {
  constructor(
    private readonly db: DrizzleDb,
    private readonly table: SignalsTable,
  ) {}

  async insert(record: NewSignalRecord): Promise<number> {
    const rows = await this.db
      .insert(this.table)
      .values({
        signalType: record.signalType,
        value: record.value,
        timestamp: record.timestamp,
      })
      .returning({ id: this.table.id });
    const row = rows[0];
    if (!row) {
      throw new Error(`Insert into ${getTableName(this.table)} returned no id`);
    }
    return row.id;
  }

  async listRecent(signalType: SignalType, limit: number): Promise<SignalRecord[]> {
    const rows = await this.db
      .select()
      .from(this.table)
      .where(eq(this.table.signalType, signalType))
      .orderBy(desc(this.table.timestamp), desc(this.table.id))
      .limit(limit);
    return rows.map((row) => ({
      id: row.id,
      signalType: row.signalType,
      value: row.value,
      timestamp: row.timestamp,
    }));
  }

  async ping(): Promise<void> {
    await this.db.execute(sql`SELECT 1`);
  }
}
