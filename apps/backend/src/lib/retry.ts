export interface RetryOptions {
  retries?: number;
  delayMs?: number;
  factor?: number;
  /** Return false to fail immediately, e.g. for a 4xx that will never succeed. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown) => void;
}

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Run `fn` until it resolves, waiting `delayMs * factor^n` between attempts.
 *
 * @returns The first successful result
 * @throws The last error once `retries` extra attempts are spent or `shouldRetry` declines
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    retries = 3,
    delayMs = 500,
    factor = 2,
    shouldRetry = () => true,
    onRetry
  } = options;

  let attempt = 0;
  let delay = delayMs;

  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= retries || !shouldRetry(error)) {
        throw error instanceof Error ? error : new Error(String(error));
      }
      attempt += 1;
      onRetry?.(attempt, error);
      await sleep(delay);
      delay *= factor;
    }
  }
}
