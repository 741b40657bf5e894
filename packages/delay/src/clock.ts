/**
 * Default clock implementation.
 *
 * Reads the monotonic `performance.now()` timeline and delegates timers to
 * globalThis. Tests inject a fake clock for deterministic behaviour.
 */

import type { Clock, Instant } from "./types.js";

export const defaultClock: Clock = {
  now: () => performance.now(),
  setTimeout: (fn, ms) => globalThis.setTimeout(fn, ms),
};

/**
 * The instant `ms` milliseconds after the clock's current time.
 */
export function fromNow(ms: number, clock: Clock = defaultClock): Instant {
  return clock.now() + ms;
}
