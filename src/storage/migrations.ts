import type BetterSqlite3 from 'better-sqlite3';

/**
 * A versioned schema migration.
 * Migrations are applied in order and tracked in the _migrations table.
 */
export interface Migration {
  version: number;
  name: string;
  up: string; // SQL to execute
}

/**
 * All schema migrations in order.
 *
 * Migration 001: health_logs, one row per observation, newest-first index per user.
 * Migration 002: document_chunks, knowledge chunks with Float32 embeddings
 *   keyed by embedding engine and source content hash.
 * Migration 003: suggestions, history written by the request boundary.
 */
export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'create_health_logs',
    up: `
      CREATE TABLE health_logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        activity_minutes REAL,
        sleep_hours REAL,
        water_intake_ml REAL,
        steps REAL,
        heart_rate REAL,
        calories REAL,
        mood TEXT
      );

      CREATE INDEX idx_health_logs_user_time ON health_logs(user_id, timestamp DESC);
    `,
  },
  {
    version: 2,
    name: 'create_document_chunks',
    up: `
      CREATE TABLE document_chunks (
        id TEXT NOT NULL,
        engine TEXT NOT NULL,
        source_id TEXT NOT NULL,
        source_hash TEXT NOT NULL,
        chunk_index INTEGER NOT NULL,
        text TEXT NOT NULL,
        embedding BLOB NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        PRIMARY KEY (engine, id)
      );

      CREATE INDEX idx_document_chunks_source ON document_chunks(engine, source_id);
    `,
  },
  {
    version: 3,
    name: 'create_suggestions',
    up: `
      CREATE TABLE suggestions (
        id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        query TEXT NOT NULL,
        candidate_id TEXT NOT NULL,
        category TEXT NOT NULL,
        text TEXT NOT NULL,
        score REAL NOT NULL,
        source TEXT NOT NULL,
        trace TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX idx_suggestions_user ON suggestions(user_id, created_at DESC);
    `,
  },
];

/**
 * Applies unapplied schema migrations in order.
 *
 * Creates a _migrations tracking table if it does not exist, then applies
 * each migration whose version exceeds the current max applied version.
 * Each migration runs inside a transaction.
 */
export function runMigrations(db: BetterSqlite3.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const maxVersion = db.prepare(
    'SELECT COALESCE(MAX(version), 0) FROM _migrations',
  ).pluck().get() as number;

  const insertMigration = db.prepare(
    'INSERT INTO _migrations (version, name) VALUES (?, ?)',
  );

  const applyMigration = db.transaction((m: Migration) => {
    db.exec(m.up);
    insertMigration.run(m.version, m.name);
  });

  for (const migration of MIGRATIONS) {
    if (migration.version <= maxVersion) {
      continue;
    }
    applyMigration(migration);
  }
}
