import { CancelledError, TimeoutError } from '../shared/errors.js';

/**
 * Runs `fn` with a deadline.
 *
 * `fn` receives a signal that aborts when the deadline passes or the
 * caller's `signal` aborts, so fetch-style calls stop doing work. The
 * returned promise settles as soon as either happens, even if `fn`
 * ignores its signal.
 */
export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operation: string,
  signal?: AbortSignal,
): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError());
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const finish = (): boolean => {
      if (settled) return false;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      return true;
    };

    const onAbort = (): void => {
      if (!finish()) return;
      controller.abort();
      reject(new CancelledError());
    };

    const timer = setTimeout(() => {
      if (!finish()) return;
      controller.abort();
      reject(new TimeoutError(timeoutMs, operation));
    }, timeoutMs);

    signal?.addEventListener('abort', onAbort, { once: true });

    const fail = (err: unknown): void => {
      if (finish()) reject(err);
    };

    try {
      void fn(controller.signal).then((value) => {
        if (finish()) resolve(value);
      }, fail);
    } catch (err) {
      fail(err);
    }
  });
}
