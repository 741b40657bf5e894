/**
 * Type definitions for @postponable/delay.
 */

/**
 * A point in time, in milliseconds on the timeline of a {@link Clock}.
 */
export type Instant = number;

/**
 * Clock abstraction — injectable for deterministic testing.
 *
 * Production code uses the monotonic `performance.now()` timeline via
 * `defaultClock`. Tests inject a clock driven by fake timers.
 */
export interface Clock {
  readonly now: () => Instant;
  readonly setTimeout: (fn: () => void, ms: number) => unknown;
}

/**
 * Reported to `onWake` each time the delay inspects the shared target.
 */
export interface DelayWakeEvent {
  readonly label: string;
  /** Instant the fired timer was armed for */
  readonly armedFor: Instant;
  /** Shared target at the time of the check */
  readonly target: Instant;
  readonly now: Instant;
  readonly resolved: boolean;
  /** 1-based count of checks so far */
  readonly wakeCount: number;
}

/** Delay configuration */
export interface DelayConfig {
  /** Time source and timer (default: performance.now + globalThis.setTimeout) */
  readonly clock?: Clock;
  /** Longest single timer, longer waits are chunked (default: 2_147_483_647) */
  readonly maxTimerMs?: number;
  /** Name used in metric attributes and log lines (default: "delay") */
  readonly label?: string;
  /** Observer called after every check of the shared target */
  readonly onWake?: (event: DelayWakeEvent) => void;
  /** Receives errors thrown by `onWake` (instead of console.warn) */
  readonly onObserverError?: (error: Error) => void;
}

/** Fully resolved config (defaults applied) */
export interface ResolvedDelayConfig {
  readonly clock: Clock;
  readonly maxTimerMs: number;
  readonly label: string;
  readonly onWake?: (event: DelayWakeEvent) => void;
  readonly onObserverError?: (error: Error) => void;
}
