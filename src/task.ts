/**
 * Task Runner
 * Layer: action
 *
 * Submits one engine task and hands its uid to the poller. Submission
 * happens exactly once; the poller only ever reads status.
 */

import * as core from '@actions/core';
import type { EnqueuedTask, Logger, OperationFailed, OperationSucceeded } from './types';
import type { MeiliClient, MeiliOutcome } from './meili';
import { taskStatusFetcher } from './meili';
import { pollOperation } from './poller';
import type { PollConfigInput } from './poller';

export interface TaskRunOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

export interface TaskRun {
  task: EnqueuedTask;
  result: OperationSucceeded | OperationFailed;
}

/**
 * Submits a task and waits for it to finish.
 *
 * @throws Error if submission fails or polling is cancelled
 * @throws TransportError | TimeoutError | ProtocolError from the poller
 */
export async function submitAndWait(
  client: MeiliClient,
  label: string,
  submit: () => Promise<MeiliOutcome<EnqueuedTask>>,
  pollConfig: PollConfigInput,
  options: TaskRunOptions = {},
): Promise<TaskRun> {
  const logger = options.logger ?? core;

  const submitted = await submit();
  if (!submitted.success) {
    throw new Error(`Failed to submit ${label}: ${submitted.error}`);
  }

  const task = submitted.data;
  logger.info(`${label}: task created with UID ${task.taskUid}`);

  const result = await pollOperation(task.taskUid, taskStatusFetcher(client), pollConfig, {
    signal: options.signal,
    deps: { logger },
  });

  if (result.status === 'cancelled') {
    throw new Error(`Operation cancelled: ${label} (task ${task.taskUid})`);
  }

  return { task, result };
}
