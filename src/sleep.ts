/**
 * Cancellable Sleep
 *
 * Every blocking wait in the gateway goes through here so that an aborted
 * signal clears the timer and rejects at once.
 */

import { OperationCancelledError } from './errors.js';

/**
 * Resolve after `ms`, or reject with OperationCancelledError as soon as
 * `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal, operation = 'sleep'): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new OperationCancelledError(operation, signal.reason));
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new OperationCancelledError(operation, signal?.reason));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Throw OperationCancelledError if the signal has already fired
 */
export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(operation, signal.reason);
  }
}
