import { isRetryable } from '@pricebase/core';

export type RetryOptions = {
  retries: number;
  baseMs: number;
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
};

/** Runs `fn` until it succeeds, doubling the delay after each retryable failure. */
export async function retryWithBackoff<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const shouldRetry = opts.shouldRetry ?? isRetryable;
  let attempt = 0;
  for (;;) {
    attempt++;
    try {
      return await fn();
    } catch (err) {
      if (attempt > opts.retries || !shouldRetry(err)) throw err;
      const delay = opts.baseMs * Math.pow(2, attempt - 1);
      opts.onRetry?.(err, attempt, delay);
      await new Promise((r) => setTimeout(r, delay));
    }
  }
}
