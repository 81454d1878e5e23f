/**
 * Status Classification
 * Layer: poller
 *
 * Single mapping from a raw task-status payload to the closed
 * OperationStatus union. Pure functions, no I/O.
 */

import type {
  FailureCause,
  OperationHandle,
  OperationStatus,
  StatusPayload,
  StatusPredicate,
} from '../types';
import { ProtocolError } from '../errors';
import { isARealObject } from '../utils';

export const TERMINAL_STATUSES: ReadonlySet<OperationStatus> = new Set<OperationStatus>([
  'succeeded',
  'failed',
]);

const PROGRESS_STATUSES: ReadonlyMap<string, OperationStatus> = new Map<string, OperationStatus>([
  ['enqueued', 'enqueued'],
  ['processing', 'processing'],
]);

/** Engine statuses treated as a failed operation. */
const FAILURE_STATUSES: ReadonlySet<string> = new Set(['failed', 'canceled']);

export const defaultSuccessPredicate: StatusPredicate = (payload) => payload.status === 'succeeded';

export const defaultFailurePredicate: StatusPredicate = (payload) =>
  FAILURE_STATUSES.has(payload.status);

export interface Classifier {
  success_predicate: StatusPredicate;
  failure_predicate: StatusPredicate;
}

/**
 * Validates that a raw poll response carries a string status.
 */
export function isStatusPayload(raw: unknown): raw is StatusPayload {
  return isARealObject(raw) && typeof raw['status'] === 'string';
}

export function isTerminal(status: OperationStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * Classifies a payload: success predicate, then failure predicate, then the
 * known progress statuses. Anything else is 'unknown'.
 *
 * @throws ProtocolError when both predicates match
 */
export function classifyStatus(
  handle: OperationHandle,
  payload: StatusPayload,
  classifier: Classifier,
): OperationStatus {
  const succeeded = classifier.success_predicate(payload);
  const failed = classifier.failure_predicate(payload);

  if (succeeded && failed) {
    throw new ProtocolError(
      handle,
      `Contradictory status for operation ${handle}: "${payload.status}" matches both success and failure`,
      payload,
    );
  }
  if (succeeded) return 'succeeded';
  if (failed) return 'failed';

  return PROGRESS_STATUSES.get(payload.status) ?? 'unknown';
}

function stringField(source: Record<string, unknown>, key: string): string | null {
  const value = source[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/**
 * Extracts the failure description from a failed payload.
 * Meilisearch reports `{ message, code, type, link }` under `error`.
 */
export function extractFailureCause(payload: StatusPayload): FailureCause {
  const error = payload.error;

  if (typeof error === 'string' && error.length > 0) {
    return { message: error, code: null, type: null, link: null };
  }

  if (isARealObject(error)) {
    return {
      message:
        stringField(error, 'message') ?? `Operation ${payload.status} without an error message`,
      code: stringField(error, 'code'),
      type: stringField(error, 'type'),
      link: stringField(error, 'link'),
    };
  }

  return {
    message: `Operation ${payload.status} without an error description`,
    code: null,
    type: null,
    link: null,
  };
}
