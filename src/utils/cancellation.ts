/**
 * Cooperative cancellation checkpoints
 *
 * Long-running stages check their AbortSignal before starting and after each
 * major step, and exit early with OperationCancelledError.
 */

import { OperationCancelledError } from '../models/errors';

/**
 * Throw OperationCancelledError when the signal has been aborted
 */
export function checkpoint(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(stage);
  }
}

/**
 * True for errors produced by an aborted operation
 */
export function isCancellation(error: unknown): boolean {
  return (
    error instanceof OperationCancelledError ||
    (error instanceof Error && error.name === 'AbortError')
  );
}


/**
 * Settle with the promise, or reject with OperationCancelledError as soon
 * as the signal aborts
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal, stage: string): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new OperationCancelledError(stage));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new OperationCancelledError(stage));
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
