import { UpstreamUnavailableError } from './errors.js';

/**
 * Race a promise against a timer.
 *
 * The timer is cleared as soon as the promise settles so no handle outlives
 * the call. On expiry the returned promise rejects with
 * `UpstreamUnavailableError`; the underlying work is not cancelled.
 *
 * @param promise - Work to bound
 * @param timeoutMs - Milliseconds before giving up
 * @param label - Operation name included in the error details
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label = 'operation'): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new UpstreamUnavailableError(`${label} timed out after ${timeoutMs}ms`, { timeoutMs }));
    }, timeoutMs);

    promise.then(
      value => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
