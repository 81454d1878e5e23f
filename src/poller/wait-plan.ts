/**
 * Wait Planning
 *
 * Pure functions for computing how long to wait before the next poll and
 * whether that wait still fits the polling budget.
 */

import type { PollConfig } from '../types';
import { MAX_WAIT_SECONDS, POLL_INTERVAL_SECONDS } from '../types';
import { defaultFailurePredicate, defaultSuccessPredicate } from './classify';

// -----------------------------------------------------------------------------
// Config resolution
// -----------------------------------------------------------------------------

export type PollConfigInput = Partial<PollConfig>;

export const DEFAULT_POLL_CONFIG: PollConfig = Object.freeze({
  interval_ms: POLL_INTERVAL_SECONDS * 1000,
  max_wait_ms: MAX_WAIT_SECONDS * 1000,
  backoff_multiplier: 1,
  max_interval_ms: null,
  success_predicate: defaultSuccessPredicate,
  failure_predicate: defaultFailurePredicate,
});

/**
 * Fills defaults and validates a poll configuration.
 * The returned object is frozen.
 *
 * @throws Error naming the first invalid field
 */
export function resolvePollConfig(input: PollConfigInput = {}): PollConfig {
  const config: PollConfig = {
    interval_ms: input.interval_ms ?? DEFAULT_POLL_CONFIG.interval_ms,
    max_wait_ms: input.max_wait_ms ?? DEFAULT_POLL_CONFIG.max_wait_ms,
    backoff_multiplier: input.backoff_multiplier ?? DEFAULT_POLL_CONFIG.backoff_multiplier,
    max_interval_ms:
      input.max_interval_ms === undefined
        ? DEFAULT_POLL_CONFIG.max_interval_ms
        : input.max_interval_ms,
    success_predicate: input.success_predicate ?? DEFAULT_POLL_CONFIG.success_predicate,
    failure_predicate: input.failure_predicate ?? DEFAULT_POLL_CONFIG.failure_predicate,
  };

  if (!Number.isFinite(config.interval_ms) || config.interval_ms <= 0) {
    throw new Error(`interval_ms must be a positive number, got ${config.interval_ms}`);
  }
  if (!Number.isFinite(config.max_wait_ms) || config.max_wait_ms < 0) {
    throw new Error(`max_wait_ms must be a non-negative number, got ${config.max_wait_ms}`);
  }
  if (!Number.isFinite(config.backoff_multiplier) || config.backoff_multiplier < 1) {
    throw new Error(`backoff_multiplier must be at least 1, got ${config.backoff_multiplier}`);
  }
  if (
    config.max_interval_ms !== null &&
    (!Number.isFinite(config.max_interval_ms) || config.max_interval_ms < config.interval_ms)
  ) {
    throw new Error(
      `max_interval_ms must be at least interval_ms (${config.interval_ms}), got ${config.max_interval_ms}`,
    );
  }

  return Object.freeze(config);
}

// -----------------------------------------------------------------------------
// Wait planning
// -----------------------------------------------------------------------------

export interface WaitPlan {
  /** Milliseconds to wait before the next poll */
  delay_ms: number;
  /** True if waiting would push elapsed time past max_wait_ms */
  exceeds_budget: boolean;
}

/**
 * Delay before the poll following `attempt` (0-based count of waits so far):
 * interval * multiplier^attempt, capped at max_interval_ms.
 */
export function computeDelay(config: PollConfig, attempt: number): number {
  const raw = config.interval_ms * Math.pow(config.backoff_multiplier, Math.max(attempt, 0));
  const capped = config.max_interval_ms === null ? raw : Math.min(raw, config.max_interval_ms);
  return Math.max(Math.round(capped), 0);
}

/**
 * Plans the next wait. A wait that would end beyond the budget is not taken;
 * the caller times out instead.
 */
export function planNextWait(config: PollConfig, attempt: number, elapsedMs: number): WaitPlan {
  const delay_ms = computeDelay(config, attempt);
  return {
    delay_ms,
    exceeds_budget: elapsedMs + delay_ms > config.max_wait_ms,
  };
}
