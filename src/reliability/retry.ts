import { RetryPolicy } from '../config/schema.js';
import { RandomSource } from './random.js';

export type BackoffPolicy = Pick<RetryPolicy, 'base_delay_ms' | 'backoff_multiplier' | 'jitter'>;

export interface RetryAttemptInfo {
  /** The attempt that just failed (1-based) */
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  random?: RandomSource;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: RetryAttemptInfo) => void;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Delay before the attempt following failed attempt `attempt` (1-based):
 * base * multiplier^(attempt-1), perturbed by up to +/- jitter of itself, never negative.
 */
export function computeDelay(policy: BackoffPolicy, attempt: number, random: RandomSource = Math.random): number {
  const delay = policy.base_delay_ms * Math.pow(policy.backoff_multiplier, attempt - 1);
  const perturbation = delay * policy.jitter * (2 * random() - 1);
  return Math.max(0, delay + perturbation);
}

/**
 * Invoke `operation` up to `max_retries + 1` times.
 *
 * Stops early when `isRetryable` rejects an error. The last error is rethrown
 * as-is so callers keep their own error types.
 */
export async function retry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: BackoffPolicy & Pick<RetryPolicy, 'max_retries'>,
  isRetryable: (error: unknown) => boolean,
  options: RetryOptions = {}
): Promise<T> {
  const random = options.random ?? Math.random;
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt > policy.max_retries || !isRetryable(error)) {
        throw error;
      }
      const delayMs = computeDelay(policy, attempt, random);
      options.onRetry?.({ attempt, delayMs, error });
      await wait(delayMs);
    }
  }
}
