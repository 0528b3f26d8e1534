/**
 * Retry delay policy for failed batch deliveries.
 */
export interface BackoffOptions {
  /** Delay before the first retry. */
  baseDelayMs: number;
  /** Ceiling for any single delay, jitter included. */
  maxDelayMs: number;
  /** Upper bound of the uniform random component added to each delay. */
  jitterMs: number;
  /** Source of randomness in [0, 1). */
  random?: (() => number) | undefined;
}

export type BackoffPolicy = (retry: number) => number;

/**
 * Exponential backoff with additive jitter, capped.
 *
 * `retry` is 1-based: the delay before the first retry is
 * `baseDelayMs + jitter`, then it doubles each time.
 */
export function exponentialBackoff(options: BackoffOptions): BackoffPolicy {
  const random = options.random ?? Math.random;

  return (retry: number): number => {
    const expo = options.baseDelayMs * Math.pow(2, Math.max(0, retry - 1));
    const jitter = options.jitterMs > 0 ? Math.floor(random() * (options.jitterMs + 1)) : 0;
    return Math.min(options.maxDelayMs, expo + jitter);
  };
}

/**
 * Resolves after `ms`, or immediately once `signal` aborts. Never rejects,
 * so an interrupted wait simply moves on to the next attempt.
 *
 * `unref: true` lets the process exit while the wait is pending.
 */
export function sleep(ms: number, signal?: AbortSignal, options: { unref?: boolean } = {}): Promise<void> {
  if (signal?.aborted === true || ms <= 0) return Promise.resolve();

  return new Promise((resolve) => {
    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    if (options.unref === true) timer.unref();
    signal?.addEventListener('abort', done, { once: true });
  });
}
