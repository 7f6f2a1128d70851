/**
 * Retry with exponential backoff.
 *
 * Attempt `n` (1-based) that fails with a retryable error waits
 * `min(maxDelayMs, baseDelayMs * 2^(n-1))` ± `jitterPercent`% before attempt
 * `n + 1`. Sleeps are cancellable through an `AbortSignal`; cancellation
 * discards the remaining attempts and rejects with `JobCancelledError`.
 */

import { setTimeout as sleepFor } from 'timers/promises';
import { JobCancelledError } from '../errors';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RetryPolicy {
  /** Total attempts, including the first. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterPercent: number;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryAttemptInfo {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  policy: RetryPolicy;
  isRetryable: (error: unknown) => boolean;
  signal?: AbortSignal;
  sleep?: SleepFn;
  random?: () => number;
  onRetry?: (info: RetryAttemptInfo) => void;
}

/**
 * Raised when every allowed attempt failed with a retryable error.
 * `lastError` is the failure of the final attempt.
 */
export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(`Gave up after ${attempts} attempt(s)`);
    this.name = 'RetryExhaustedError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

export const defaultSleep: SleepFn = async (ms, signal) => {
  try {
    await sleepFor(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) {
      throw new JobCancelledError('Cancelled during retry backoff');
    }
    throw err;
  }
};

export function computeBackoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  const capped = Math.min(policy.maxDelayMs, exponential);
  const jitterRange = capped * (policy.jitterPercent / 100);
  const jitter = random() * jitterRange * 2 - jitterRange;
  return Math.max(0, Math.round(capped + jitter));
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new JobCancelledError();
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Retry loop
// ─────────────────────────────────────────────────────────────────────────────

export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { policy, isRetryable, signal } = options;
  const sleep = options.sleep ?? defaultSleep;
  const random = options.random ?? Math.random;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(signal);
    try {
      return await operation(attempt);
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        throw new RetryExhaustedError(attempt, error);
      }
      const delayMs = computeBackoffDelay(attempt, policy, random);
      options.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs, signal);
    }
  }
}
