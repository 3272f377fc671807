/**
 * Service lifecycle state machine — pure logic, zero dependencies.
 *
 * ```
 * starting → ready, stopped   (stopped directly when storage is unreachable at boot)
 * ready    → draining
 * draining → stopped
 * stopped  → (terminal)
 * ```
 */

export const SERVICE_STATES = ["starting", "ready", "draining", "stopped"] as const;

export type ServiceState = (typeof SERVICE_STATES)[number];

export const VALID_TRANSITIONS: Record<ServiceState, readonly ServiceState[]> = {
  starting: ["ready", "stopped"],
  ready: ["draining"],
  draining: ["stopped"],
  stopped: [],
};

/** Check whether a transition from one state to another is allowed. */
export function isValidTransition(from: ServiceState, to: ServiceState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** Thrown when code attempts a transition not in the valid graph. */
export class InvalidTransitionError extends Error {
  readonly name = "InvalidTransitionError" as const;
  constructor(from: ServiceState, to: ServiceState) {
    super(`Invalid service transition: ${from} → ${to}`);
  }
}

export type StateListener = (from: ServiceState, to: ServiceState) => void;

/** Holds the current state and enforces the transition graph. */
export class ServiceLifecycle {
  private current: ServiceState = "starting";
  private readonly listeners: StateListener[] = [];

  get state(): ServiceState {
    return this.current;
  }

  /** Inbound requests and new generator ticks are only accepted while ready. */
  get accepting(): boolean {
    return this.current === "ready";
  }

  transition(to: ServiceState): void {
    const from = this.current;
    if (!isValidTransition(from, to)) {
      throw new InvalidTransitionError(from, to);
    }
    this.current = to;
    for (const listener of this.listeners) listener(from, to);
  }

  onTransition(listener: StateListener): void {
    this.listeners.push(listener);
  }
}
