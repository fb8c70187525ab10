/**
 * Retry and timeout helpers shared by the coordinator and the indexer.
 */

export interface RetryOptions {
  /** Total attempts including the first. Minimum 1. */
  attempts: number;
  /** Delay before retry n is `backoffMs * n`. */
  backoffMs: number;
  /** Called before each retry with the failed attempt number (1-based). */
  onRetry?: (attempt: number, error: unknown) => void;
  /** Return false to stop retrying and rethrow immediately. */
  shouldRetry?: (error: unknown) => boolean;
  /** Injected for tests. */
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn` until it succeeds or the attempt budget runs out.
 * The last error is rethrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const retryable = options.shouldRetry?.(error) ?? true;
      if (!retryable || attempt >= attempts) {
        throw error;
      }
      options.onRetry?.(attempt, error);
      if (options.backoffMs > 0) {
        await wait(options.backoffMs * attempt);
      }
    }
  }
}

/**
 * Race a promise against a deadline. On expiry the error from `onTimeout`
 * is thrown; the underlying operation is not cancelled.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}
