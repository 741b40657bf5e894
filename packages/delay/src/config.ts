/**
 * Configuration validation and resolution.
 */

import { DelayConfigurationError, type ValidationIssue } from "@postponable/errors";
import { z } from "zod";
import { defaultClock } from "./clock.js";
import { DEFAULT_LABEL, MAX_TIMER_MS } from "./constants.js";
import type { DelayConfig, ResolvedDelayConfig } from "./types.js";

export const ClockSchema = z.object({
  now: z.function(),
  setTimeout: z.function(),
});

export const DelayConfigSchema = z.object({
  clock: ClockSchema.optional(),
  maxTimerMs: z.number().int().min(1).max(MAX_TIMER_MS).optional(),
  label: z.string().min(1).optional(),
  onWake: z.function().optional(),
  onObserverError: z.function().optional(),
});

/**
 * Validates and resolves a {@link DelayConfig} into a fully-resolved
 * config with all defaults applied.
 *
 * The schema only checks shapes; the caller's own functions are kept, not
 * zod's wrapped copies.
 *
 * @throws {DelayConfigurationError} on invalid input
 */
export function resolveDelayConfig(config: DelayConfig = {}): ResolvedDelayConfig {
  const result = DelayConfigSchema.safeParse(config);
  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map((i) => ({
      field: i.path.join("."),
      message: i.message,
      code: i.code,
    }));
    throw new DelayConfigurationError(issues, result.error);
  }

  return {
    clock: config.clock ?? defaultClock,
    maxTimerMs: config.maxTimerMs ?? MAX_TIMER_MS,
    label: config.label ?? DEFAULT_LABEL,
    ...(config.onWake ? { onWake: config.onWake } : {}),
    ...(config.onObserverError ? { onObserverError: config.onObserverError } : {}),
  };
}
