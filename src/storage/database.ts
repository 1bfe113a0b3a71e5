import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { debug } from '../shared/debug.js';
import type { DatabaseConfig } from '../shared/types.js';
import { runMigrations } from './migrations.js';

/**
 * Wrapper around a configured better-sqlite3 database instance.
 * Provides lifecycle methods (close, checkpoint).
 */
export interface CoachDatabase {
  db: Database.Database;
  close(): void;
  checkpoint(): void;
}

/**
 * Opens a SQLite database with WAL mode, correct PRAGMA order and schema
 * migrations.
 *
 * Single connection per process -- better-sqlite3 is synchronous, so
 * connection pooling adds nothing.
 *
 * @param config - Database path and busy timeout configuration
 */
export function openDatabase(config: DatabaseConfig): CoachDatabase {
  mkdirSync(dirname(config.dbPath), { recursive: true });

  const db = new Database(config.dbPath);

  // WAL mode MUST be first -- synchronous = NORMAL is only safe with WAL
  const journalMode = db.pragma('journal_mode = WAL', {
    simple: true,
  }) as string;
  if (journalMode !== 'wal') {
    debug('db', 'WAL mode not active', { journalMode });
  }

  // busy_timeout -- per-connection, must set every time
  db.pragma(`busy_timeout = ${config.busyTimeout}`);
  db.pragma('synchronous = NORMAL');
  db.pragma('cache_size = -16000');
  db.pragma('foreign_keys = ON');
  db.pragma('temp_store = MEMORY');

  runMigrations(db);
  debug('db', 'Database opened', { dbPath: config.dbPath });

  return {
    db,

    close(): void {
      try {
        db.pragma('wal_checkpoint(PASSIVE)');
      } catch (err) {
        // Locked by another reader -- closing flushes anyway
        debug('db', 'Checkpoint before close failed', { error: String(err) });
      }
      db.close();
    },

    checkpoint(): void {
      db.pragma('wal_checkpoint(PASSIVE)');
    },
  };
}
