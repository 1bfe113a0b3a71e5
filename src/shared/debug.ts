import { isDebugEnabled } from './config.js';

/** Whether coach debug output is on. Read from config once per process. */
let debugMode: boolean | undefined;

function debugOn(): boolean {
  debugMode ??= isDebugEnabled();
  return debugMode;
}

/**
 * One stderr line: `[2024-03-09T08:00:00.000Z] [COACH:retrieve] Query embedded {"topK":3}`.
 */
export function formatDebugLine(
  at: Date,
  category: string,
  message: string,
  data?: Record<string, unknown>,
): string {
  const head = `[${at.toISOString()}] [COACH:${category}] ${message}`;
  return data === undefined ? head : `${head} ${JSON.stringify(data)}`;
}

/**
 * Writes a pipeline trace line to stderr. Silent unless HEALTH_COACH_DEBUG
 * or `config.json` turned debug mode on.
 *
 * `data` goes through JSON.stringify, so pass ids, counts and short
 * strings. Never embeddings or full chunk text.
 */
export function debug(
  category: string,
  message: string,
  data?: Record<string, unknown>,
): void {
  if (!debugOn()) return;
  process.stderr.write(`${formatDebugLine(new Date(), category, message, data)}\n`);
}

/**
 * Runs `fn` and logs how long it took under `category`. An async `fn` is
 * timed until its promise settles; the promise itself is returned
 * untouched, rejection included.
 */
export function debugTimed<T>(
  category: string,
  message: string,
  fn: () => T,
): T {
  if (!debugOn()) return fn();

  const started = performance.now();
  const logElapsed = (): void => {
    debug(category, `${message} (${(performance.now() - started).toFixed(2)}ms)`);
  };

  const result = fn();
  if (result instanceof Promise) {
    void result.then(logElapsed, logElapsed);
  } else {
    logElapsed();
  }
  return result;
}

/** Message of a caught value, whatever was thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
