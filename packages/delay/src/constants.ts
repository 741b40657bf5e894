/**
 * Constants for @postponable/delay.
 */

export const PACKAGE_NAME = "@postponable/delay";
/** Largest delay Node.js timers honour; longer values fire after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;
export const DEFAULT_LABEL = "delay";
