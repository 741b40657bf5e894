/**
 * PostponableDelay — a timer whose deadline can be pushed back while pending.
 *
 * One wake-up loop per delay: sleep until the armed instant, re-read the
 * shared target, and either resolve or re-arm for the new target. Handles
 * only write the shared target; the loop is the sole owner of the timer.
 */

import { getErrorMessage } from "@postponable/errors";
import { resolveDelayConfig } from "./config.js";
import { PACKAGE_NAME } from "./constants.js";
import { PostponableDelayHandle } from "./handle.js";
import { getDelayLateness, getDelayRearms } from "./metrics.js";
import { SharedDelayState } from "./shared-state.js";
import type { Clock, DelayConfig, DelayWakeEvent, Instant, ResolvedDelayConfig } from "./types.js";

/** Promise-based sleep using provided clock */
function sleep(ms: number, clock: Clock): Promise<void> {
  return new Promise((resolve) => {
    clock.setTimeout(() => resolve(), ms);
  });
}

export class PostponableDelay implements PromiseLike<void> {
  private readonly _state: SharedDelayState;
  private readonly _config: ResolvedDelayConfig;
  private _completion: Promise<void> | undefined;

  /**
   * A delay that resolves no sooner than `instant`.
   *
   * Nothing is scheduled until the delay is first awaited.
   *
   * @throws {DelayConfigurationError} when `config` is invalid
   */
  constructor(instant: Instant, config?: DelayConfig) {
    this._config = resolveDelayConfig(config);
    this._state = new SharedDelayState(instant);
  }

  /**
   * Returns a handle to push back the delay's resolution.
   */
  getHandle(): PostponableDelayHandle {
    return new PostponableDelayHandle(this._state, this._config.label);
  }

  /** Current target, including accepted postponements */
  get target(): Instant {
    return this._state.target;
  }

  get resolved(): boolean {
    return this._state.resolved;
  }

  /**
   * Awaiting the delay. The first call starts the wake-up loop; every call
   * shares the same single completion.
   */
  // biome-ignore lint/suspicious/noThenProperty: the delay itself is the awaitable
  then<TResult1 = void, TResult2 = never>(
    onfulfilled?: ((value: void) => TResult1 | PromiseLike<TResult1>) | null | undefined,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null | undefined,
  ): Promise<TResult1 | TResult2> {
    this._completion ??= this._run();
    return this._completion.then(onfulfilled, onrejected);
  }

  // ---------------------------------------------------------------------------
  // Wake-up loop
  // ---------------------------------------------------------------------------

  private async _run(): Promise<void> {
    const { clock, maxTimerMs, label } = this._config;
    let armedFor = this._state.target;
    let wakeCount = 0;

    for (;;) {
      const remaining = armedFor - clock.now();
      if (remaining > 0) {
        await sleep(Math.min(remaining, maxTimerMs), clock);
      }

      wakeCount++;
      const now = clock.now();
      const resolved = this._state.settle(now);
      const target = this._state.target;
      this._notifyWake({ label, armedFor, target, now, resolved, wakeCount });

      if (resolved) {
        const lateness = now - target;
        if (Number.isFinite(lateness)) {
          getDelayLateness().record(lateness, { label });
        }
        return;
      }

      // Postponed (or mid-chunk): re-arm straight away for the current target
      armedFor = target;
      getDelayRearms().add(1, { label });
    }
  }

  private _notifyWake(event: DelayWakeEvent): void {
    const { onWake } = this._config;
    if (onWake === undefined) return;

    try {
      onWake(event);
    } catch (err) {
      this._reportObserverError(event.label, err);
    }
  }

  /** Observer failures never reach the wake-up loop */
  private _reportObserverError(label: string, err: unknown): void {
    const error = err instanceof Error ? err : new Error(getErrorMessage(err));
    const { onObserverError } = this._config;

    if (onObserverError) {
      try {
        onObserverError(error);
        return;
      } catch (handlerErr) {
        console.warn(
          `[${PACKAGE_NAME}] ${label}: onObserverError failed: ${getErrorMessage(handlerErr)}`,
        );
      }
    }
    console.warn(`[${PACKAGE_NAME}] ${label}: onWake observer failed: ${error.message}`);
  }
}
