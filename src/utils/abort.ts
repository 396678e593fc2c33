// src/utils/abort.ts

import { RequestAbortedError } from './errors';

/**
 * Wait on a shared promise on behalf of one caller. Aborting the signal
 * rejects only this caller's wait; the shared promise keeps running.
 */
export function waitFor<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  details?: Record<string, unknown>
): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    return Promise.reject(new RequestAbortedError(undefined, details));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new RequestAbortedError(undefined, details));
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
