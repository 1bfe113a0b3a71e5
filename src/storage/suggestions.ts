import type BetterSqlite3 from 'better-sqlite3';
import { randomBytes } from 'node:crypto';
import { z } from 'zod';

import { debug } from '../shared/debug.js';
import type { ReasoningTrace, Suggestion, SuggestionSource } from '../pipeline/types.js';

interface SuggestionRow {
  id: string;
  user_id: string;
  query: string;
  candidate_id: string;
  category: string;
  text: string;
  score: number;
  source: string;
  trace: string; // JSON string
  created_at: string;
}

/**
 * A suggestion as stored in the history table.
 */
export interface StoredSuggestion extends Suggestion {
  userId: string;
  query: string;
  createdAt: string;
}

const StoredTraceSchema = z.object({
  chunkIds: z.array(z.string()).catch([]),
  relationIds: z.array(z.string()).catch([]),
  signals: z.array(z.string()).catch([]),
});

function parseTrace(raw: string, candidateId: string): ReasoningTrace {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    json = {};
  }
  const parsed = StoredTraceSchema.safeParse(json);
  if (!parsed.success) {
    return { candidateId, chunkIds: [], relationIds: [], signals: [] };
  }
  return { candidateId, ...parsed.data };
}

function toSource(s: string): SuggestionSource {
  return s === 'generated' || s === 'trace' ? s : 'template';
}

/**
 * Suggestion history. Written by the request boundary after a successful
 * run; the pipeline itself never persists anything.
 */
export class SuggestionRepository {
  private readonly db: BetterSqlite3.Database;
  private readonly stmtInsert: BetterSqlite3.Statement;
  private readonly stmtList: BetterSqlite3.Statement;

  constructor(db: BetterSqlite3.Database) {
    this.db = db;

    this.stmtInsert = db.prepare(`
      INSERT INTO suggestions (id, user_id, query, candidate_id, category, text, score, source, trace)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.stmtList = db.prepare(`
      SELECT * FROM suggestions
      WHERE user_id = ?
      ORDER BY created_at DESC, rowid DESC
      LIMIT ?
    `);
  }

  /**
   * Stores one response's suggestions in a single transaction.
   * Each stored row gets its own id; the candidate id stays in the trace.
   */
  saveAll(userId: string, query: string, suggestions: Suggestion[]): string[] {
    const ids: string[] = [];
    const insertAll = this.db.transaction((items: Suggestion[]) => {
      for (const s of items) {
        const id = randomBytes(16).toString('hex');
        this.stmtInsert.run(
          id,
          userId,
          query,
          s.trace.candidateId,
          s.category,
          s.text,
          s.score,
          s.source,
          JSON.stringify(s.trace),
        );
        ids.push(id);
      }
    });
    insertAll(suggestions);

    debug('db', 'Suggestions stored', { userId, count: ids.length });
    return ids;
  }

  listForUser(userId: string, limit = 20): StoredSuggestion[] {
    const rows = this.stmtList.all(userId, limit) as SuggestionRow[];
    return rows.map((row) => ({
      id: row.id,
      userId: row.user_id,
      query: row.query,
      category: row.category,
      text: row.text,
      score: row.score,
      source: toSource(row.source),
      trace: parseTrace(row.trace, row.candidate_id),
      createdAt: row.created_at,
    }));
  }
}
