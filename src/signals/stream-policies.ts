import type { SignalType } from "./types.js";

/** Source of uniform randoms in [0, 1). */
export type RandomSource = () => number;

/** Timing and value model for one telemetry stream. */
export interface StreamPolicy {
  readonly signalType: SignalType;
  /** Delay before the next tick, in milliseconds. */
  nextDelayMs(random: RandomSource): number;
  /** Value of the next reading; `previous` is the last value this stream produced. */
  nextValue(random: RandomSource, previous: number | undefined): number;
}

function uniform(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}

/** Machine on/off state: alternates, starting from a random state. Every 1-5s. */
export const stateChangePolicy: StreamPolicy = {
  signalType: "state_change",
  nextDelayMs: (random) => uniform(random, 1_000, 5_000),
  nextValue: (random, previous) => {
    if (previous === undefined) return random() < 0.5 ? 0 : 1;
    return previous === 0 ? 1 : 0;
  },
};

export const ERROR_CODE_MIN = 1;
export const ERROR_CODE_MAX = 100;

/** Discrete error event carrying an integer code in [1, 100]. Every 10-30s. */
export const errorPolicy: StreamPolicy = {
  signalType: "error",
  nextDelayMs: (random) => uniform(random, 10_000, 30_000),
  nextValue: (random) => ERROR_CODE_MIN + Math.floor(random() * (ERROR_CODE_MAX - ERROR_CODE_MIN + 1)),
};

export const POWER_BASELINE_WATTS = 300;
export const POWER_NOISE_WATTS = 200;

/** Power draw at 100 Hz: baseline plus bounded uniform noise, so readings fall in [100, 500) W. */
export const powerPolicy: StreamPolicy = {
  signalType: "power",
  nextDelayMs: () => 10,
  nextValue: (random) => POWER_BASELINE_WATTS + uniform(random, -POWER_NOISE_WATTS, POWER_NOISE_WATTS),
};

export const STREAM_POLICIES: readonly StreamPolicy[] = [stateChangePolicy, errorPolicy, powerPolicy];
