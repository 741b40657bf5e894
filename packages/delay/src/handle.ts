import { getDelayPostpones } from "./metrics.js";
import type { PostponeResponse } from "./response.js";
import type { SharedDelayState } from "./shared-state.js";
import type { Instant } from "./types.js";

/**
 * Lets any caller push back the resolution of a {@link PostponableDelay}.
 *
 * Handles share the delay's state and stay usable after it resolves; from
 * then on every request answers `AlreadyResolved`.
 */
export class PostponableDelayHandle {
  private readonly _state: SharedDelayState;
  private readonly _label: string;

  /** @internal obtain handles through `PostponableDelay.getHandle()` */
  constructor(state: SharedDelayState, label: string) {
    this._state = state;
    this._label = label;
  }

  /**
   * Request that the delay resolve no sooner than `target`.
   *
   * The delay is not woken; it picks up the new target when its current
   * timer fires, which is never later than the previous target.
   */
  postpone(target: Instant): PostponeResponse {
    const response = this._state.postpone(target);
    getDelayPostpones().add(1, { label: this._label, outcome: response });
    return response;
  }

  /** Another handle on the same delay */
  clone(): PostponableDelayHandle {
    return new PostponableDelayHandle(this._state, this._label);
  }

  get target(): Instant {
    return this._state.target;
  }

  get resolved(): boolean {
    return this._state.resolved;
  }
}
