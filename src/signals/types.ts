import { z } from "zod";

/** The closed set of telemetry streams a machine emits. */
export const SIGNAL_TYPES = ["state_change", "error", "power"] as const;

export type SignalType = (typeof SIGNAL_TYPES)[number];

export const signalTypeSchema = z.enum(SIGNAL_TYPES);

/** Number of readings the read API returns per stream. Fixed for this version. */
export const RECENT_SIGNAL_LIMIT = 10;

export function isSignalType(value: unknown): value is SignalType {
  return signalTypeSchema.safeParse(value).success;
}

/** A reading as produced by a generator, before the sink assigns an id. */
export interface NewSignalRecord {
  signalType: SignalType;
  value: number;
  /** Generation time, not insert time. */
  timestamp: Date;
}

/** A persisted reading. Immutable once written. */
export interface SignalRecord extends NewSignalRecord {
  id: number;
}

/** Wire shape served by GET /signals/:signalType. */
export interface SignalRecordDto {
  id: number;
  signal_type: SignalType;
  value: number;
  timestamp: string;
}

export function toSignalRecordDto(record: SignalRecord): SignalRecordDto {
  return {
    id: record.id,
    signal_type: record.signalType,
    value: record.value,
    timestamp: record.timestamp.toISOString(),
  };
}
