/**
 * Shared test helpers for poller test modules.
 */

import { vi } from 'vitest';
import type { OperationHandle } from '../../src/types';
import type { FetchStatusOutcome } from '../../src/poller';

export function makeLogger() {
  return { info: vi.fn(), debug: vi.fn(), warning: vi.fn() };
}

/**
 * Virtual clock: sleeping advances time instantly.
 */
export function makeClock(start = 0) {
  let current = start;
  const sleeps: number[] = [];
  return {
    now: (): number => current,
    sleep: vi.fn(async (ms: number, signal?: AbortSignal): Promise<boolean> => {
      if (signal?.aborted) return false;
      sleeps.push(ms);
      current += ms;
      return true;
    }),
    sleeps,
  };
}

/**
 * Fetcher answering with `payloads` in order, repeating the last one.
 */
export function sequenceFetcher(payloads: unknown[]) {
  let index = 0;
  return vi.fn(
    async (_handle: OperationHandle, _signal?: AbortSignal): Promise<FetchStatusOutcome> => {
      const data = payloads[Math.min(index, payloads.length - 1)];
      index += 1;
      return { success: true, data };
    },
  );
}

export function makeTask(status: string, extra: Record<string, unknown> = {}) {
  return { uid: 7, indexUid: 'products', type: 'dumpCreation', status, ...extra };
}

export const SECOND = 1000;
