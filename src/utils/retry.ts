import { RetryExhaustedError } from '../errors.ts';

/** Milliseconds to wait after the given (1-based) failed attempt. */
export type DelayStrategy = (attempt: number) => number;

export interface RetryPolicy {
  attempts: number;
  delay: DelayStrategy;
  /** Called after every failed attempt; `retryInMs` is undefined once attempts are exhausted. */
  onFailure?: (error: unknown, attempt: number, retryInMs: number | undefined) => void;
}

export function constantDelay(ms: number): DelayStrategy {
  return () => ms;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function retry<T>(operation: (attempt: number) => Promise<T>, policy: RetryPolicy): Promise<T> {
  if (policy.attempts < 1) {
    throw new RangeError(`Retry needs at least one attempt, got ${policy.attempts}`);
  }

  let lastError: unknown;
  for (let attempt = 1; attempt <= policy.attempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      const isLast = attempt === policy.attempts;
      const retryInMs = isLast ? undefined : policy.delay(attempt);
      policy.onFailure?.(error, attempt, retryInMs);
      if (retryInMs !== undefined && retryInMs > 0) {
        await sleep(retryInMs);
      }
    }
  }

  throw new RetryExhaustedError(policy.attempts, lastError);
}
