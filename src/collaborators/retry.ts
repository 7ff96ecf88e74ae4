import { setTimeout as delay } from "node:timers/promises";

export interface RetryPolicy {
  maxRetries: number;
  initialDelayMs: number;
  exponentialBase: number;
  retryableStatuses: number[];
}

export const defaultRetryPolicy: RetryPolicy = {
  maxRetries: 5,
  initialDelayMs: 1_000,
  exponentialBase: 7,
  retryableStatuses: [429, 500, 503, 504],
};

/** Delay before retry number `retry` (1-based). */
export const backoffDelay = (policy: RetryPolicy, retry: number): number =>
  policy.initialDelayMs * policy.exponentialBase ** (retry - 1);

export interface RetryOutcome<T> {
  value: T;
  attempts: number;
}

export type Sleep = (ms: number) => Promise<unknown>;

/**
 * Run `operation` until `shouldRetry` says the value is final or the
 * policy runs out of retries. The last value is returned either way.
 */
export const retryWhile = async <T>(
  operation: (attempt: number) => Promise<T>,
  shouldRetry: (value: T) => boolean,
  policy: RetryPolicy,
  sleep: Sleep = delay,
): Promise<RetryOutcome<T>> => {
  let attempts = 1;
  let value = await operation(attempts);

  while (shouldRetry(value) && attempts <= policy.maxRetries) {
    await sleep(backoffDelay(policy, attempts));
    attempts += 1;
    value = await operation(attempts);
  }

  return { value, attempts };
};
