/**
 * Poller Errors
 * Layer: core
 *
 * Infrastructure failures raised by the operation poller. A remote task that
 * reports failure is not one of these: it comes back as a negative
 * OperationResult.
 */

import type { OperationHandle, OperationStatus } from './types';

/**
 * The status fetch itself failed (network, auth, HTTP error, request timeout).
 */
export class TransportError extends Error {
  constructor(
    public readonly handle: OperationHandle,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * The polling budget ran out while the operation was still in progress.
 */
export class TimeoutError extends Error {
  constructor(
    public readonly handle: OperationHandle,
    public readonly elapsed_ms: number,
    public readonly polls: number,
    public readonly last_status: OperationStatus,
  ) {
    super(
      `Timed out waiting for operation ${handle} after ${elapsed_ms}ms ` +
        `(${polls} poll(s), last status: ${last_status})`,
    );
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * The remote API answered with something the poller cannot interpret.
 */
export class ProtocolError extends Error {
  constructor(
    public readonly handle: OperationHandle,
    message: string,
    public readonly payload: unknown,
  ) {
    super(message);
    this.name = 'ProtocolError';
    Object.setPrototypeOf(this, ProtocolError.prototype);
  }
}

export type PollerError = TransportError | TimeoutError | ProtocolError;

export function isPollerError(error: unknown): error is PollerError {
  return (
    error instanceof TransportError ||
    error instanceof TimeoutError ||
    error instanceof ProtocolError
  );
}
