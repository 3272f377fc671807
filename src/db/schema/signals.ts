import { doublePrecision, index, pgEnum, pgTable, serial, timestamp } from "drizzle-orm/pg-core";
import { SIGNAL_TYPES } from "../../signals/types.js";

export const DEFAULT_SIGNALS_TABLE = "machine_signals";

export const signalTypeEnum = pgEnum("signal_type", SIGNAL_TYPES);

/**
 * Append-only signal log. The table name comes from configuration, so the table is
 * built by a factory; `signals` is the default-named instance drizzle-kit reads.
 */
export function defineSignalsTable(name: string) {
  return pgTable(
    name,
    {
      id: serial("id").primaryKey(),
      signalType: signalTypeEnum("signal_type").notNull(),
      value: doublePrecision("value").notNull(),
      timestamp: timestamp("timestamp", { withTimezone: true, mode: "date" }).notNull(),
    },
    (table) => ({
      typeRecentIdx: index(`${name}_type_recent_idx`).on(
        table.signalType,
        table.timestamp.desc(),
        table.id.desc(),
      ),
    }),
  );
}

export type SignalsTable = ReturnType<typeof defineSignalsTable>;

export const signals = defineSignalsTable(DEFAULT_SIGNALS_TABLE);
