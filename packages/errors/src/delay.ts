/**
 * Delay errors — Postponable delay primitive
 *
 * Union: DelayError (matched with isDelayError)
 * Concrete:
 *   - DelayConfigurationError (DELAY_CONFIGURATION_INVALID)
 *   - DelayPostponeRejectedError (DELAY_POSTPONE_REJECTED)
 */

import { ConflictError } from "./bases/conflict-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ValidationIssue } from "./types.js";

// ---------------------------------------------------------------------------
// Union
// ---------------------------------------------------------------------------

/**
 * Marker shared by every delay error.
 *
 * Enables generic catch: `if (isDelayError(e))` while the concrete classes
 * keep their behavioural base (`ValidationError`, `ConflictError`).
 */
export type DelayError = DelayConfigurationError | DelayPostponeRejectedError;

export function isDelayError(error: unknown): error is DelayError {
  return error instanceof DelayConfigurationError || error instanceof DelayPostponeRejectedError;
}

// ---------------------------------------------------------------------------
// Configuration invalid
// ---------------------------------------------------------------------------

/**
 * Thrown when a delay configuration fails validation.
 */
export class DelayConfigurationError extends ValidationError<"DELAY_CONFIGURATION_INVALID"> {
  constructor(issues: readonly ValidationIssue[], cause?: Error) {
    const summary = issues.map((i) => `${i.field}: ${i.message}`).join("; ");
    super({
      code: "DELAY_CONFIGURATION_INVALID",
      message: `Invalid delay configuration: ${summary}`,
      issues,
      cause,
    });
  }
}

// ---------------------------------------------------------------------------
// Postpone rejected — asserted postpone did not apply
// ---------------------------------------------------------------------------

/**
 * Thrown by the postpone assertion helper when a response is anything but ok.
 */
export class DelayPostponeRejectedError extends ConflictError<"DELAY_POSTPONE_REJECTED"> {
  readonly response: string;

  constructor(response: string) {
    super({
      code: "DELAY_POSTPONE_REJECTED",
      message: `Expected postpone to succeed, got "${response}"`,
      metadata: { response },
    });
    this.response = response;
  }
}
