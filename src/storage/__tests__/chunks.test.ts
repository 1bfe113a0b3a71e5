import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';

import type { DocumentChunk } from '../../knowledge/types.js';
import { ChunkRepository } from '../chunks.js';
import { runMigrations } from '../migrations.js';

function chunks(sourceId: string, count: number): DocumentChunk[] {
  return Array.from({ length: count }, (_, i) => ({
    id: `${sourceId}#${i}`,
    sourceId,
    chunkIndex: i,
    text: `${sourceId} part ${i}`,
    embedding: Float32Array.from([i, 0.5, -0.25]),
  }));
}

describe('ChunkRepository', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
    runMigrations(db);
  });

  afterEach(() => {
    db.close();
  });

  it('returns stored chunks in order when the hash matches', () => {
    const repo = new ChunkRepository(db, 'hashing-256');
    repo.saveSource('sleep/duration', 'h1', chunks('sleep/duration', 2));

    const loaded = repo.loadSource('sleep/duration', 'h1');

    expect(loaded?.map((c) => [c.id, c.chunkIndex, c.text, Array.from(c.embedding)])).toEqual([
      ['sleep/duration#0', 0, 'sleep/duration part 0', [0, 0.5, -0.25]],
      ['sleep/duration#1', 1, 'sleep/duration part 1', [1, 0.5, -0.25]],
    ]);
  });

  it('returns null when the source changed or was never stored', () => {
    const repo = new ChunkRepository(db, 'hashing-256');
    repo.saveSource('sleep/duration', 'h1', chunks('sleep/duration', 1));

    expect(repo.loadSource('sleep/duration', 'h2')).toBeNull();
    expect(repo.loadSource('stress/breathing', 'h1')).toBeNull();
  });

  it('replaces every chunk of a source on save', () => {
    const repo = new ChunkRepository(db, 'hashing-256');
    repo.saveSource('sleep/duration', 'h1', chunks('sleep/duration', 3));
    repo.saveSource('sleep/duration', 'h2', chunks('sleep/duration', 1));

    expect(repo.loadSource('sleep/duration', 'h2')).toHaveLength(1);
  });

  it('keeps engines apart', () => {
    new ChunkRepository(db, 'hashing-256').saveSource('sleep/duration', 'h1', chunks('sleep/duration', 1));

    expect(new ChunkRepository(db, 'http-1536').loadSource('sleep/duration', 'h1')).toBeNull();
  });

  it('prunes sources missing from the document set', () => {
    const repo = new ChunkRepository(db, 'hashing-256');
    repo.saveSource('sleep/duration', 'h1', chunks('sleep/duration', 2));
    repo.saveSource('stress/breathing', 'h1', chunks('stress/breathing', 1));

    expect(repo.pruneExcept(['sleep/duration'])).toBe(1);
    expect(repo.loadSource('stress/breathing', 'h1')).toBeNull();
    expect(repo.loadSource('sleep/duration', 'h1')).toHaveLength(2);
  });
});
