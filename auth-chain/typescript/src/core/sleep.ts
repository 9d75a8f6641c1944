/**
 * Cancellable delays.
 * @module core/sleep
 */

import { AuthError, AuthErrorKind } from '../errors/index.js';

/**
 * Waits for a number of milliseconds, rejecting if the signal aborts.
 */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Builds the error reported when a caller aborts an operation.
 */
export function cancelledError(operation: string): AuthError {
  return new AuthError(AuthErrorKind.Cancelled, `${operation} cancelled`);
}

/**
 * Throws a Cancelled error when the signal has already fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw cancelledError(operation);
  }
}

/**
 * Default sleeper backed by a timer that is cleared on abort.
 */
export const sleep: Sleeper = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelledError('wait'));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(cancelledError('wait'));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
