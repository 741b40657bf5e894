/**
 * OTel metrics for postponable delays.
 *
 * Lazily initialized — instruments are only created on first access.
 * When no meter provider is registered, these return no-op instruments.
 */

import type { Counter, Histogram } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";

const METER_NAME = "postponable";

let _rearms: Counter | undefined;
let _postpones: Counter | undefined;
let _lateness: Histogram | undefined;

/**
 * Counter of timers re-armed because the target moved or a chunk ended.
 */
export function getDelayRearms(): Counter {
  if (_rearms === undefined) {
    _rearms = metrics.getMeter(METER_NAME).createCounter("postponable.delay.rearms", {
      description: "Internal timers re-armed after a wake-up before the target",
    });
  }
  return _rearms;
}

/**
 * Counter of postpone requests, by outcome.
 */
export function getDelayPostpones(): Counter {
  if (_postpones === undefined) {
    _postpones = metrics.getMeter(METER_NAME).createCounter("postponable.delay.postpones", {
      description: "Postpone requests by outcome",
    });
  }
  return _postpones;
}

/**
 * Histogram of how long after its final target a delay resolved.
 */
export function getDelayLateness(): Histogram {
  if (_lateness === undefined) {
    _lateness = metrics.getMeter(METER_NAME).createHistogram("postponable.delay.lateness_ms", {
      description: "Resolution instant minus final target",
      unit: "ms",
    });
  }
  return _lateness;
}
