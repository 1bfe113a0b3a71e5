import type BetterSqlite3 from 'better-sqlite3';

import { debug } from '../shared/debug.js';
import {
  HealthLogInsertSchema,
  rowToHealthLog,
  type HealthLogEntry,
  type HealthLogInsert,
  type HealthLogRow,
  type HealthLogSource,
} from '../shared/types.js';

/**
 * Repository for health log entries.
 *
 * Logs are append-only: there is no update or delete. All SQL statements
 * are prepared once in the constructor and reused for every call.
 */
export class HealthLogRepository implements HealthLogSource {
  private readonly stmtInsert: BetterSqlite3.Statement;
  private readonly stmtGetById: BetterSqlite3.Statement;
  private readonly stmtRecent: BetterSqlite3.Statement;
  private readonly stmtRecentAsOf: BetterSqlite3.Statement;
  private readonly stmtCount: BetterSqlite3.Statement;

  constructor(db: BetterSqlite3.Database) {
    this.stmtInsert = db.prepare(`
      INSERT INTO health_logs (user_id, timestamp, activity_minutes, sleep_hours, water_intake_ml, steps, heart_rate, calories, mood)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.stmtGetById = db.prepare('SELECT * FROM health_logs WHERE id = ?');

    // id breaks ties between logs recorded with the same timestamp
    this.stmtRecent = db.prepare(`
      SELECT * FROM health_logs
      WHERE user_id = ?
      ORDER BY timestamp DESC, id DESC
      LIMIT ?
    `);

    // Stored timestamps are all toISOString() output, so text order is time order
    this.stmtRecentAsOf = db.prepare(`
      SELECT * FROM health_logs
      WHERE user_id = ? AND timestamp <= ?
      ORDER BY timestamp DESC, id DESC
      LIMIT ?
    `);

    this.stmtCount = db.prepare(
      'SELECT COUNT(*) AS count FROM health_logs WHERE user_id = ?',
    );
  }

  /**
   * Records a log entry. Validates input with Zod at runtime; a missing
   * timestamp means "now".
   */
  insert(input: HealthLogInsert): HealthLogEntry {
    const validated = HealthLogInsertSchema.parse(input);
    const timestamp = validated.timestamp ?? new Date().toISOString();

    const info = this.stmtInsert.run(
      validated.userId,
      timestamp,
      validated.activityMinutes,
      validated.sleepHours,
      validated.waterIntakeMl,
      validated.steps,
      validated.heartRate,
      validated.calories,
      validated.mood,
    );

    const row = this.stmtGetById.get(info.lastInsertRowid) as HealthLogRow | undefined;
    if (!row) {
      throw new Error('Failed to retrieve newly recorded health log');
    }

    debug('db', 'Health log recorded', { userId: validated.userId, id: row.id });
    return rowToHealthLog(row);
  }

  /**
   * Returns up to `limit` logs for a user, newest first. Logs dated after
   * `asOf` are skipped rather than counted against the limit.
   */
  fetchRecentLogs(userId: string, limit: number, asOf?: Date): HealthLogEntry[] {
    const n = Math.max(0, Math.floor(limit));
    const rows = (
      asOf ? this.stmtRecentAsOf.all(userId, asOf.toISOString(), n) : this.stmtRecent.all(userId, n)
    ) as HealthLogRow[];
    debug('db', 'Fetched recent logs', { userId, limit, asOf: asOf?.toISOString(), count: rows.length });
    return rows.map(rowToHealthLog);
  }

  count(userId: string): number {
    const row = this.stmtCount.get(userId) as { count: number };
    return row.count;
  }
}
