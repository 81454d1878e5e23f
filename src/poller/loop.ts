/**
 * Operation Poller Loop
 * Layer: poller
 *
 * Drives one submitted remote task to a terminal state by repeated status
 * polling. The operation is submitted by the caller beforehand; this loop
 * only reads its status.
 *
 * Exit paths:
 *   - succeeded / failed  -> OperationResult
 *   - cancelled (signal)  -> OperationResult with status 'cancelled'
 *   - transport failure   -> TransportError (not retried)
 *   - unparseable status  -> ProtocolError
 *   - unknown handle      -> ProtocolError
 *   - budget exhausted    -> TimeoutError
 */

import * as core from '@actions/core';
import type {
  Logger,
  OperationCancelled,
  OperationHandle,
  OperationResult,
  OperationStatus,
  StatusPayload,
} from '../types';
import { ProtocolError, TimeoutError, TransportError } from '../errors';
import { errorMessage, sleep } from '../utils';
import { classifyStatus, extractFailureCause, isStatusPayload } from './classify';
import { planNextWait, resolvePollConfig } from './wait-plan';
import type { PollConfigInput } from './wait-plan';

// -----------------------------------------------------------------------------
// Status fetch port
// -----------------------------------------------------------------------------

export interface FetchStatusSuccess {
  success: true;
  data: unknown;
}

export interface FetchStatusFailure {
  success: false;
  error: string;
  /** The remote side answered that the operation does not exist */
  not_found?: boolean;
  /** The remote side answered with a body that could not be parsed */
  malformed?: boolean;
  raw_body?: string;
}

export type FetchStatusOutcome = FetchStatusSuccess | FetchStatusFailure;

/**
 * Reads the current status of a remote operation.
 * A failure outcome or a rejected promise counts as a transport error, except
 * a `not_found` or `malformed` outcome, which is a protocol error.
 */
export type StatusFetcher = (
  handle: OperationHandle,
  signal?: AbortSignal,
) => Promise<FetchStatusOutcome>;

// -----------------------------------------------------------------------------
// Dependencies
// -----------------------------------------------------------------------------

/**
 * Dependency injection interface for pollOperation.
 * Production defaults are used when not provided by tests.
 */
export interface LoopDeps {
  now: () => number;
  sleep: (ms: number, signal?: AbortSignal) => Promise<boolean>;
  logger: Logger;
}

const defaultDeps: LoopDeps = {
  now: () => Date.now(),
  sleep,
  logger: core,
};

export interface PollOptions {
  /** Aborting stops the loop before the next poll and yields 'cancelled' */
  signal?: AbortSignal;
  deps?: Partial<LoopDeps>;
}

function formatElapsed(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

// -----------------------------------------------------------------------------
// Single fetch
// -----------------------------------------------------------------------------

const CANCELLED = Symbol('cancelled');

async function fetchOnce(
  handle: OperationHandle,
  fetchStatus: StatusFetcher,
  signal: AbortSignal | undefined,
): Promise<unknown> {
  let outcome: FetchStatusOutcome;
  try {
    outcome = await fetchStatus(handle, signal);
  } catch (err: unknown) {
    if (signal?.aborted) return CANCELLED;
    throw new TransportError(
      handle,
      `Failed to fetch status of operation ${handle}: ${errorMessage(err)}`,
      err,
    );
  }

  if (!outcome.success) {
    if (signal?.aborted) return CANCELLED;
    if (outcome.malformed) {
      throw new ProtocolError(
        handle,
        `Malformed status response for operation ${handle}: ${outcome.error}`,
        outcome.raw_body ?? null,
      );
    }
    if (outcome.not_found) {
      throw new ProtocolError(handle, `Operation ${handle} not found: ${outcome.error}`, outcome);
    }
    throw new TransportError(handle, `Failed to fetch status of operation ${handle}: ${outcome.error}`);
  }

  return outcome.data;
}

// -----------------------------------------------------------------------------
// Poll loop
// -----------------------------------------------------------------------------

/**
 * Polls `handle` until it succeeds, fails, is cancelled, or the budget in
 * `config.max_wait_ms` would be exceeded by the next wait.
 *
 * A max_wait_ms of 0 polls exactly once.
 */
export async function pollOperation(
  handle: OperationHandle,
  fetchStatus: StatusFetcher,
  config: PollConfigInput = {},
  options: PollOptions = {},
): Promise<OperationResult> {
  const resolved = resolvePollConfig(config);
  const deps: LoopDeps = { ...defaultDeps, ...options.deps };
  const { signal } = options;
  const { logger } = deps;

  const startMs = deps.now();
  const elapsed = (): number => deps.now() - startMs;

  let polls = 0;
  let attempt = 0;
  let lastRawStatus: string | null = null;

  const cancelled = (): OperationCancelled => {
    const elapsed_ms = elapsed();
    logger.info(`Operation ${handle}: polling cancelled after ${formatElapsed(elapsed_ms)}`);
    return { success: false, status: 'cancelled', polls, elapsed_ms };
  };

  while (true) {
    if (signal?.aborted) {
      return cancelled();
    }

    polls += 1;
    const raw = await fetchOnce(handle, fetchStatus, signal);
    if (raw === CANCELLED) {
      return cancelled();
    }

    if (!isStatusPayload(raw)) {
      throw new ProtocolError(handle, `Malformed status response for operation ${handle}`, raw);
    }

    const payload: StatusPayload = raw;
    const status: OperationStatus = classifyStatus(handle, payload, resolved);
    const elapsedMs = elapsed();

    logger.debug(`Operation ${handle} poll #${polls}: ${payload.status} at ${formatElapsed(elapsedMs)}`);
    if (payload.status !== lastRawStatus) {
      logger.info(`Operation ${handle}: ${payload.status} (${formatElapsed(elapsedMs)} elapsed)`);
      lastRawStatus = payload.status;
    }

    switch (status) {
      case 'succeeded':
        return { success: true, status: 'succeeded', payload, polls, elapsed_ms: elapsedMs };

      case 'failed':
        return {
          success: false,
          status: 'failed',
          cause: extractFailureCause(payload),
          payload,
          polls,
          elapsed_ms: elapsedMs,
        };

      case 'unknown':
        throw new ProtocolError(
          handle,
          `Unrecognized status "${payload.status}" for operation ${handle}`,
          payload,
        );

      case 'enqueued':
      case 'processing':
        break;
    }

    const plan = planNextWait(resolved, attempt, elapsedMs);
    if (plan.exceeds_budget) {
      throw new TimeoutError(handle, elapsedMs, polls, status);
    }

    const completed = await deps.sleep(plan.delay_ms, signal);
    if (!completed) {
      return cancelled();
    }
    attempt += 1;
  }
}
