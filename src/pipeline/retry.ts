/**
 * Bounded retry with exponential backoff for external-capability calls.
 *
 * One higher-order wrapper applied uniformly to the embedding provider and
 * the generation capability. Only errors classified transient by
 * isTransientError() are retried; everything else fails on the spot.
 */

import type { RetryPolicy } from '../config/pipeline-config.js';
import { CancelledError, isTransientError } from '../shared/errors.js';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryHooks {
  signal?: AbortSignal;
  /** Injected for tests; defaults to a timer that rejects on abort. */
  sleep?: SleepFn;
  /** Source of jitter in [0, 1). Defaults to Math.random. */
  random?: () => number;
  /** Called before each backoff wait. `attempt` is the 1-based attempt that failed. */
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

/**
 * Waits `ms`, rejecting with CancelledError as soon as `signal` aborts.
 */
export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Backoff before retrying after the failed attempt with 0-based index
 * `attempt`: `min(maxDelay, base * 2^attempt)` plus up to
 * `jitterRatio` of that again.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** attempt);
  return exponential + exponential * policy.jitterRatio * random();
}

/**
 * Calls `fn` up to `policy.maxAttempts` times. The last error is rethrown
 * unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  const random = hooks.random ?? Math.random;

  for (let attempt = 1; ; attempt++) {
    if (hooks.signal?.aborted) {
      throw new CancelledError();
    }

    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= policy.maxAttempts || !isTransientError(err) || hooks.signal?.aborted) {
        throw err;
      }

      const delayMs = backoffDelay(policy, attempt - 1, random);
      hooks.onRetry?.({ attempt, delayMs, error: err });
      await wait(delayMs, hooks.signal);
    }
  }
}
