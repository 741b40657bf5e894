import { PostponeResponse } from "./response.js";
import type { Instant } from "./types.js";

/**
 * Target and resolution flag shared by one delay and all of its handles.
 *
 * Methods are synchronous, so each read-compare-write runs to completion
 * before any other task can observe the state. `target` never decreases and
 * `resolved` only goes from false to true.
 */
export class SharedDelayState {
  private _target: Instant;
  private _resolved = false;

  constructor(target: Instant) {
    this._target = target;
  }

  get target(): Instant {
    return this._target;
  }

  get resolved(): boolean {
    return this._resolved;
  }

  postpone(target: Instant): PostponeResponse {
    if (this._resolved) {
      return PostponeResponse.AlreadyResolved;
    }
    // Negated so NaN is refused too
    if (!(target >= this._target)) {
      return PostponeResponse.CantResolveEarlier;
    }
    this._target = target;
    return PostponeResponse.Ok;
  }

  /**
   * Resolve if `now` has reached the target. Called by the owning delay only.
   * @returns whether the state is resolved
   */
  settle(now: Instant): boolean {
    if (!this._resolved && !(this._target > now)) {
      this._resolved = true;
    }
    return this._resolved;
  }
}
