import { mkdirSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import type { DatabaseConfig } from './types.js';

/**
 * Cached debug-enabled flag.
 * Resolved once per process -- debug mode does not change at runtime.
 */
let _debugCached: boolean | null = null;

/**
 * Returns whether debug logging is enabled for this process.
 *
 * Resolution order:
 * 1. `HEALTH_COACH_DEBUG` env var -- `"1"` or `"true"` enables debug mode
 * 2. `<dataDir>/config.json` -- `{ "debug": true }` enables debug mode
 * 3. Default: disabled
 *
 * The result is cached after the first call.
 */
export function isDebugEnabled(): boolean {
  if (_debugCached !== null) {
    return _debugCached;
  }

  const envVal = process.env.HEALTH_COACH_DEBUG;
  if (envVal === '1' || envVal === 'true') {
    _debugCached = true;
    return true;
  }

  if (readConfigJson().debug === true) {
    _debugCached = true;
    return true;
  }

  _debugCached = false;
  return false;
}

/**
 * Default busy timeout in milliseconds.
 * Must be >= 5000ms to prevent SQLITE_BUSY under concurrent load.
 */
export const DEFAULT_BUSY_TIMEOUT = 5000;

/**
 * Returns the health coach data directory.
 * Default: ~/.health-coach/
 * Creates the directory recursively if it does not exist.
 *
 * HEALTH_COACH_DATA_DIR redirects all data storage, which the tests use
 * to stay inside a temp directory.
 */
export function getConfigDir(): string {
  const dir = process.env.HEALTH_COACH_DATA_DIR || join(homedir(), '.health-coach');
  mkdirSync(dir, { recursive: true });
  return dir;
}

/**
 * Returns the path to the SQLite database holding logs, chunks and
 * suggestion history.
 */
export function getDbPath(): string {
  return join(getConfigDir(), 'coach.db');
}

/**
 * Reads `<dataDir>/config.json` as a loose record.
 * Missing or unparseable files read as `{}`.
 */
export function readConfigJson(): Record<string, unknown> {
  try {
    const raw = readFileSync(join(getConfigDir(), 'config.json'), 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return parsed as Record<string, unknown>;
    }
  } catch {
    // Config file doesn't exist or is invalid -- that's fine
  }
  return {};
}

/**
 * Returns the default database configuration.
 */
export function getDatabaseConfig(): DatabaseConfig {
  return {
    dbPath: getDbPath(),
    busyTimeout: DEFAULT_BUSY_TIMEOUT,
  };
}

/**
 * Clears the cached debug flag. Used for testing.
 */
export function resetConfigCache(): void {
  _debugCached = null;
}
