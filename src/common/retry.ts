import { RetryDeadlineError } from './errors';

/**
 * Capped exponential backoff bounded by an overall deadline
 */
export interface RetryPolicy {
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  deadlineMs: number;
}

/**
 * Time source for the retry loop, swapped for a virtual clock in tests
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise(resolve => setTimeout(resolve, ms)),
};

// Optional injection token for the clock used by producer and worker
export const PIPELINE_CLOCK = Symbol('PIPELINE_CLOCK');

export interface RetryOptions {
  clock?: Clock;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (event: { attempt: number; delayMs: number; error: unknown }) => void;
}

/**
 * Run an operation until it resolves or the policy deadline passes
 * The wait before retry n is initialDelayMs * multiplier^(n-1), capped at maxDelayMs,
 * and never extends past the deadline. Throws RetryDeadlineError once a failed
 * attempt finds no time left.
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  const clock = options.clock ?? systemClock;
  const startedAt = clock.now();
  let delay = policy.initialDelayMs;
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      return await operation(attempt);
    } catch (error) {
      if (options.shouldRetry && !options.shouldRetry(error)) {
        throw error;
      }

      const elapsed = clock.now() - startedAt;
      const remaining = policy.deadlineMs - elapsed;
      if (remaining <= 0) {
        throw new RetryDeadlineError(attempt, elapsed, error);
      }

      const wait = Math.min(delay, policy.maxDelayMs, remaining);
      options.onRetry?.({ attempt, delayMs: wait, error });
      await clock.sleep(wait);
      delay = Math.min(delay * policy.multiplier, policy.maxDelayMs);
    }
  }
}
