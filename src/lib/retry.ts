/**
 * Exponential backoff shared by upload transfers and rate-limited publishes
 */

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the delay randomised in either direction (0 disables) */
  jitter: number;
}

export interface RetryOptions {
  /** Return false to fail immediately with the thrown error */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before the retry that follows `attempt` (1-based)
 */
export function backoffDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random
): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt - 1));
  if (policy.jitter <= 0) return exponential;

  const spread = exponential * policy.jitter;
  return Math.max(0, Math.round(exponential - spread + random() * spread * 2));
}

/**
 * Run `fn` until it resolves or the policy is exhausted. The last error is rethrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const wait = options.sleep ?? sleep;
  let attempt = 0;

  while (true) {
    attempt++;
    try {
      return await fn(attempt);
    } catch (error) {
      const retryable = options.shouldRetry ? options.shouldRetry(error, attempt) : true;
      if (!retryable || attempt >= policy.maxAttempts) {
        throw error;
      }

      const delay = backoffDelay(policy, attempt, options.random);
      options.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }
}
