import type { NewSignalRecord, SignalRecord, SignalType } from "./types.js";

/** Row-level access to the signal log over one connection. */
export interface ISignalRepository {
  /** Append one record; returns the id the store assigned. */
  insert(record: NewSignalRecord): Promise<number>;
  /** Up to `limit` records of one type, newest first (timestamp desc, then id desc). */
  listRecent(signalType: SignalType, limit: number): Promise<SignalRecord[]>;
  /** Cheapest possible round-trip. */
  ping(): Promise<void>;
}
