import type { SignalType } from "./types.js";

/**
 * Signal pipeline error taxonomy.
 *
 * StorageUnavailableError and ConstraintViolationError come from the storage sink;
 * BackpressureError and WriteFailedError from the ingestion coordinator;
 * InvalidSignalTypeError from request validation.
 */

/** The store cannot be reached, or a statement failed for a reason unrelated to the record. */
export class StorageUnavailableError extends Error {
  readonly name = "StorageUnavailableError" as const;
  /** Whether repeating the operation on a fresh connection may succeed. */
  readonly transient: boolean;

  constructor(message: string, options: { cause?: unknown; transient?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.transient = options.transient ?? true;
  }
}

/** A record the store refused. Should not happen given the closed signal set. */
export class ConstraintViolationError extends Error {
  readonly name = "ConstraintViolationError" as const;
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
  }
}

/** No pooled connection became free within the acquire timeout; the tick is dropped. */
export class BackpressureError extends Error {
  readonly name = "BackpressureError" as const;
  constructor(readonly timeoutMs: number) {
    super(`No storage connection available within ${timeoutMs}ms`);
  }
}

/** An insert kept failing after every allowed attempt; the tick is dropped. */
export class WriteFailedError extends Error {
  readonly name = "WriteFailedError" as const;
  constructor(
    readonly signalType: SignalType,
    readonly attempts: number,
    options: { cause?: unknown } = {},
  ) {
    super(`Write of ${signalType} signal failed after ${attempts} attempt(s)`, { cause: options.cause });
  }
}

/** A client asked for a signal type outside the closed set. */
export class InvalidSignalTypeError extends Error {
  readonly name = "InvalidSignalTypeError" as const;
  constructor(readonly signalType: string) {
    super(`Invalid signal type: ${signalType}`);
  }
}
