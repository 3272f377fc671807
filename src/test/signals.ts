import type { SignalsTable } from "../db/schema/index.js";
import { DrizzleSignalRepository } from "../signals/drizzle-signal-repository.js";
import type { SignalRepositoryFactory } from "../signals/signal-sink.js";
import type { NewSignalRecord, SignalType } from "../signals/types.js";

export function reading(signalType: SignalType, value: number, at: Date | number): NewSignalRecord {
  return { signalType, value, timestamp: at instanceof Date ? at : new Date(at) };
}

/** An error shaped like the ones pg and PGlite raise, carrying a SQLSTATE or socket code. */
export function driverError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

export interface RepositoryHooks {
  /** Runs before every insert with its 1-based call number; throw to fail that insert. */
  beforeInsert?: (call: number) => Promise<void> | void;
  beforeList?: () => Promise<void> | void;
}

/**
 * Real Drizzle repositories with hooks in front of them, for simulating slow or
 * failing storage without a real server.
 */
export function hookedRepositoryFactory(
  table: SignalsTable,
  hooks: RepositoryHooks,
): { factory: SignalRepositoryFactory; insertCalls: () => number } {
  let insertCalls = 0;
  const factory: SignalRepositoryFactory = (db) => {
    const real = new DrizzleSignalRepository(db, table);
    return {
      insert: async (record) => {
        insertCalls++;
        await hooks.beforeInsert?.(insertCalls);
        return real.insert(record);
      },
      listRecent: async (signalType, limit) => {
        await hooks.beforeList?.();
        return real.listRecent(signalType, limit);
      },
      ping: () => real.ping(),
    };
  };
  return { factory, insertCalls: () => insertCalls };
}

export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
