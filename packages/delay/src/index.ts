/**
 * @postponable/delay
 *
 * A delay whose resolution can be pushed back, from anywhere, while it is
 * pending.
 *
 * Provides:
 * - PostponableDelay: awaitable, resolves no sooner than its (moving) target
 * - PostponableDelayHandle: cloneable capability to postpone the target
 * - PostponeResponse: tri-state result of a postpone request
 * - Injectable clock, validated configuration, OTel metrics
 */

// Clock
export { defaultClock, fromNow } from "./clock.js";
// Config
export { DelayConfigSchema, resolveDelayConfig } from "./config.js";
// Constants
export { DEFAULT_LABEL, MAX_TIMER_MS, PACKAGE_NAME } from "./constants.js";
// Delay + handle
export { PostponableDelay } from "./delay.js";
export { PostponableDelayHandle } from "./handle.js";
// Metrics
export { getDelayLateness, getDelayPostpones, getDelayRearms } from "./metrics.js";
// Postpone response
export { assertPostponed, isPostponed, PostponeResponse } from "./response.js";
// Types
export type {
  Clock,
  DelayConfig,
  DelayWakeEvent,
  Instant,
  ResolvedDelayConfig,
} from "./types.js";
