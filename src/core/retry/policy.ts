// src/core/retry/policy.ts
import { RateLimitError } from '../errors.js';

export interface RetryPolicy {
  maxAttempts: number;    // total calls, including the first
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryHooks {
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onRetry?: (attempt: number, delayMs: number, error: RateLimitError) => void;
  signal?: AbortSignal;
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function giveUp(error: RateLimitError, attempt: number): RateLimitError {
  return new RateLimitError(
    `${error.message} (gave up after ${attempt} attempt${attempt === 1 ? '' : 's'})`,
    error.retryAfterMs,
    false
  );
}

/**
 * Wait before the next attempt: exponential backoff from `baseDelayMs`,
 * raised to the platform's suggested wait when that is longer, and never
 * above `maxDelayMs`.
 */
export function computeDelay(policy: RetryPolicy, attempt: number, retryAfterMs?: number): number {
  const backoff = policy.baseDelayMs * 2 ** (attempt - 1);
  const wanted = Math.max(backoff, retryAfterMs ?? 0);
  return Math.min(wanted, policy.maxDelayMs);
}

/**
 * Runs `operation`, retrying only on retryable {@link RateLimitError}s.
 *
 * After `maxAttempts` calls, or once `hooks.signal` aborts, the last error is
 * rethrown as a non-retryable `RateLimitError`. Any other error propagates
 * immediately.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!(error instanceof RateLimitError) || !error.retryable) {
        throw error;
      }

      if (attempt >= maxAttempts || hooks.signal?.aborted) {
        throw giveUp(error, attempt);
      }

      const delayMs = computeDelay(policy, attempt, error.retryAfterMs);
      hooks.onRetry?.(attempt, delayMs, error);
      await wait(delayMs, hooks.signal);

      if (hooks.signal?.aborted) {
        throw giveUp(error, attempt);
      }
    }
  }
}
