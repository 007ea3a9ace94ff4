/**
 * Shared backoff rules for the publish path and for reconnects.
 *
 * Delay ceiling doubles per attempt from `base_delay_ms` and is capped at
 * `max_delay_ms`. With `full` jitter the actual delay is uniform in
 * [0, ceiling); with `none` it is the ceiling itself.
 */
export interface BackoffPolicy {
  base_delay_ms: number;
  max_delay_ms: number;
  /** Total attempts including the first. 0 = unbounded. */
  max_attempts: number;
  jitter: 'none' | 'full';
}

/** Ceiling for the delay that follows failed attempt `attempt` (1-based). */
export function backoffCeiling(policy: BackoffPolicy, attempt: number): number {
  const exponent = Math.max(0, attempt - 1);
  // 2^31 already exceeds any sane cap; avoids Infinity for huge attempt counts
  const factor = 2 ** Math.min(exponent, 31);
  return Math.min(policy.max_delay_ms, policy.base_delay_ms * factor);
}

export function backoffDelay(
  policy: BackoffPolicy,
  attempt: number,
  random: () => number = Math.random,
): number {
  const ceiling = backoffCeiling(policy, attempt);
  if (policy.jitter === 'none') return ceiling;
  return Math.floor(random() * ceiling);
}

/** True when another attempt is allowed after `attempt` attempts have run. */
export function hasAttemptsLeft(policy: BackoffPolicy, attempt: number): boolean {
  return policy.max_attempts === 0 || attempt < policy.max_attempts;
}

export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    function onAbort(): void {
      clearTimeout(timer);
      reject(signal?.reason);
    }
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface RetryOptions {
  policy: BackoffPolicy;
  /** Failures for which this returns false are rethrown at once. */
  isRetryable: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; delay_ms: number; err: unknown }) => void;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

/**
 * Runs `operation` until it succeeds, fails with a non-retryable error, or
 * the attempt budget is spent. The last failure is rethrown unchanged.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const sleep = options.sleep ?? abortableSleep;
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      return await operation(attempt);
    } catch (err: unknown) {
      if (!options.isRetryable(err)) throw err;
      if (!hasAttemptsLeft(options.policy, attempt)) throw err;
      if (options.signal?.aborted) throw err;

      const delay = backoffDelay(options.policy, attempt, options.random);
      options.onRetry?.({ attempt, delay_ms: delay, err });
      await sleep(delay, options.signal);
    }
  }
}
