import { describe, it, expect, vi } from 'vitest';

import type { RetryPolicy } from '../../config/pipeline-config.js';
import { CancelledError, InvalidQueryError, RetrievalUnavailableError } from '../../shared/errors.js';
import { backoffDelay, sleep, withRetry } from '../retry.js';

const policy: RetryPolicy = { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 10_000, jitterRatio: 0.25 };

function transient(): RetrievalUnavailableError {
  return new RetrievalUnavailableError('rate limited', { transient: true });
}

function recordingSleep() {
  const delays: number[] = [];
  const fn = async (ms: number): Promise<void> => {
    delays.push(ms);
  };
  return { delays, fn };
}

describe('backoffDelay', () => {
  it('doubles from the base delay', () => {
    expect(backoffDelay(policy, 0, () => 0)).toBe(1000);
    expect(backoffDelay(policy, 1, () => 0)).toBe(2000);
    expect(backoffDelay(policy, 2, () => 0)).toBe(4000);
  });

  it('caps at the maximum delay before adding jitter', () => {
    expect(backoffDelay(policy, 10, () => 0)).toBe(10_000);
    expect(backoffDelay(policy, 10, () => 0.5)).toBe(11_250);
  });

  it('adds up to jitterRatio of the delay', () => {
    expect(backoffDelay(policy, 0, () => 0.5)).toBe(1125);
  });
});

describe('withRetry', () => {
  it('retries transient failures and returns the eventual result', async () => {
    const sleeper = recordingSleep();
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(transient())
      .mockRejectedValueOnce(transient())
      .mockResolvedValueOnce('ok');

    const result = await withRetry(fn, policy, { sleep: sleeper.fn, random: () => 0 });

    expect(result).toBe('ok');
    expect(fn.mock.calls.map((c) => c[0])).toEqual([1, 2, 3]);
    expect(sleeper.delays).toEqual([1000, 2000]);
  });

  it('does not retry non-transient failures', async () => {
    const sleeper = recordingSleep();
    const err = new InvalidQueryError('dimension mismatch');
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(err);

    await expect(withRetry(fn, policy, { sleep: sleeper.fn })).rejects.toBe(err);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleeper.delays).toEqual([]);
  });

  it('rethrows the last error unchanged once attempts run out', async () => {
    const sleeper = recordingSleep();
    const errors = [transient(), transient(), transient()];
    let i = 0;
    const fn = vi.fn(async () => {
      throw errors[i++];
    });

    await expect(withRetry(fn, policy, { sleep: sleeper.fn, random: () => 0 })).rejects.toBe(errors[2]);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleeper.delays).toEqual([1000, 2000]);
  });

  it('reports each scheduled retry', async () => {
    const sleeper = recordingSleep();
    const onRetry = vi.fn();
    const err = transient();
    const fn = vi.fn<(attempt: number) => Promise<number>>().mockRejectedValueOnce(err).mockResolvedValueOnce(1);

    await withRetry(fn, policy, { sleep: sleeper.fn, random: () => 0, onRetry });

    expect(onRetry).toHaveBeenCalledOnce();
    expect(onRetry).toHaveBeenCalledWith({ attempt: 1, delayMs: 1000, error: err });
  });

  it('stops before the first attempt when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async () => 'never');

    await expect(withRetry(fn, policy, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    expect(fn).not.toHaveBeenCalled();
  });

  it('does not retry after the caller cancels', async () => {
    const controller = new AbortController();
    const sleeper = recordingSleep();
    const fn = vi.fn(async () => {
      controller.abort();
      throw transient();
    });

    await expect(withRetry(fn, policy, { signal: controller.signal, sleep: sleeper.fn })).rejects.toBeInstanceOf(
      RetrievalUnavailableError,
    );
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleeper.delays).toEqual([]);
  });
});

describe('sleep', () => {
  it('rejects with CancelledError when aborted mid-wait', async () => {
    vi.useFakeTimers();
    try {
      const controller = new AbortController();
      const pending = sleep(5000, controller.signal);
      controller.abort();
      await expect(pending).rejects.toBeInstanceOf(CancelledError);
    } finally {
      vi.useRealTimers();
    }
  });

  it('resolves after the delay', async () => {
    vi.useFakeTimers();
    try {
      const pending = sleep(1000);
      await vi.advanceTimersByTimeAsync(1000);
      await expect(pending).resolves.toBeUndefined();
    } finally {
      vi.useRealTimers();
    }
  });
});
