/**
 * Health Wait
 * Layer: action
 *
 * Waits for a freshly started engine to report itself available.
 * Connection errors count as failed attempts here: unlike task polling,
 * an unreachable engine is expected while it boots.
 */

import * as core from '@actions/core';
import type { Logger } from './types';
import { HEALTH_INTERVAL_MS, HEALTH_MAX_ATTEMPTS } from './types';
import type { MeiliClient } from './meili';
import { sleep } from './utils';

export interface HealthWaitOptions {
  max_attempts?: number;
  interval_ms?: number;
  signal?: AbortSignal;
}

export interface HealthDeps {
  sleep: (ms: number, signal?: AbortSignal) => Promise<boolean>;
  logger: Logger;
}

const defaultDeps: HealthDeps = { sleep, logger: core };

/**
 * Polls /health until the engine reports 'available'.
 *
 * @returns Number of attempts it took
 * @throws Error when attempts are exhausted or the wait is aborted
 */
export async function waitForHealthy(
  client: Pick<MeiliClient, 'getHealth'>,
  options: HealthWaitOptions = {},
  deps: Partial<HealthDeps> = {},
): Promise<number> {
  const { sleep: sleepFn, logger } = { ...defaultDeps, ...deps };
  const maxAttempts = options.max_attempts ?? HEALTH_MAX_ATTEMPTS;
  const intervalMs = options.interval_ms ?? HEALTH_INTERVAL_MS;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const result = await client.getHealth(options.signal);
    if (result.success && result.data.status === 'available') {
      logger.info('Search engine is healthy');
      return attempt;
    }

    const reason = result.success ? `status ${result.data.status}` : result.error;
    logger.info(`Attempt ${attempt}/${maxAttempts}... (${reason})`);

    if (attempt < maxAttempts) {
      const completed = await sleepFn(intervalMs, options.signal);
      if (!completed) {
        throw new Error('Health check cancelled');
      }
    }
  }

  throw new Error(`Search engine failed to become healthy after ${maxAttempts} attempts`);
}
