import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';

import type { Suggestion } from '../../pipeline/types.js';
import { runMigrations } from '../migrations.js';
import { SuggestionRepository } from '../suggestions.js';

function suggestion(id: string, overrides: Partial<Suggestion> = {}): Suggestion {
  return {
    id,
    category: 'sleep',
    text: `text for ${id}`,
    score: 0.8,
    source: 'template',
    trace: { candidateId: id, chunkIds: ['sleep/duration#0'], relationIds: ['sleep:influences:stress'], signals: [] },
    ...overrides,
  };
}

describe('SuggestionRepository', () => {
  let db: Database.Database;
  let repo: SuggestionRepository;

  beforeEach(() => {
    db = new Database(':memory:');
    runMigrations(db);
    repo = new SuggestionRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  it('stores each suggestion under a fresh id', () => {
    const ids = repo.saveAll('user-1', 'sleep better', [suggestion('a'), suggestion('b')]);

    expect(ids).toHaveLength(2);
    expect(ids[0]).toMatch(/^[0-9a-f]{32}$/);
    expect(ids[0]).not.toBe(ids[1]);
  });

  it('lists a user\'s history newest first with traces intact', () => {
    const [first, second] = repo.saveAll('user-1', 'sleep better', [
      suggestion('a', { source: 'generated' }),
      suggestion('b', { score: 0.75 }),
    ]);
    repo.saveAll('user-2', 'other', [suggestion('c')]);

    const history = repo.listForUser('user-1');

    expect(history.map((s) => s.id)).toEqual([second, first]);
    expect(history[1]).toMatchObject({
      userId: 'user-1',
      query: 'sleep better',
      category: 'sleep',
      text: 'text for a',
      score: 0.8,
      source: 'generated',
      trace: {
        candidateId: 'a',
        chunkIds: ['sleep/duration#0'],
        relationIds: ['sleep:influences:stress'],
        signals: [],
      },
    });
  });

  it('honours the limit', () => {
    repo.saveAll('user-1', 'q', [suggestion('a'), suggestion('b'), suggestion('c')]);
    expect(repo.listForUser('user-1', 2)).toHaveLength(2);
  });

  it('reads back a corrupt trace as an empty one', () => {
    db.prepare(`
      INSERT INTO suggestions (id, user_id, query, candidate_id, category, text, score, source, trace)
      VALUES ('x', 'user-1', 'q', 'walk', 'exercise', 'Walk.', 0.9, 'unknown', 'not json')
    `).run();

    const [row] = repo.listForUser('user-1');

    expect(row.source).toBe('template');
    expect(row.trace).toEqual({ candidateId: 'walk', chunkIds: [], relationIds: [], signals: [] });
  });
});
