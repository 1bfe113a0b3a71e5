/**
 * ChunkRepository persists embedded knowledge chunks so a restart can
 * rebuild the KnowledgeStore without re-embedding unchanged documents.
 *
 * Rows are keyed by (engine, chunk id): switching embedding engines never
 * mixes vectors of different models or dimensions. Float32Array embeddings
 * are stored as raw BLOBs and viewed back without copying.
 */

import type BetterSqlite3 from 'better-sqlite3';

import { debug } from '../shared/debug.js';
import type { DocumentChunk } from '../knowledge/types.js';

interface ChunkRow {
  id: string;
  engine: string;
  source_id: string;
  source_hash: string;
  chunk_index: number;
  text: string;
  embedding: Buffer;
}

function bufferToFloat32(buf: Buffer): Float32Array {
  // Copy into an aligned buffer -- SQLite blobs carry no alignment guarantee
  const copy = new Uint8Array(buf.byteLength);
  copy.set(buf);
  return new Float32Array(copy.buffer, 0, buf.byteLength / 4);
}

export class ChunkRepository {
  private readonly db: BetterSqlite3.Database;
  private readonly stmtInsert: BetterSqlite3.Statement;
  private readonly stmtBySource: BetterSqlite3.Statement;
  private readonly stmtHashBySource: BetterSqlite3.Statement;
  private readonly stmtDeleteSource: BetterSqlite3.Statement;
  private readonly stmtDeleteStale: BetterSqlite3.Statement;

  constructor(
    db: BetterSqlite3.Database,
    private readonly engine: string,
  ) {
    this.db = db;

    this.stmtInsert = db.prepare(`
      INSERT OR REPLACE INTO document_chunks (id, engine, source_id, source_hash, chunk_index, text, embedding)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);

    this.stmtBySource = db.prepare(`
      SELECT * FROM document_chunks
      WHERE engine = ? AND source_id = ?
      ORDER BY chunk_index
    `);

    this.stmtHashBySource = db.prepare(`
      SELECT source_hash FROM document_chunks
      WHERE engine = ? AND source_id = ?
      LIMIT 1
    `);

    this.stmtDeleteSource = db.prepare(
      'DELETE FROM document_chunks WHERE engine = ? AND source_id = ?',
    );

    this.stmtDeleteStale = db.prepare(`
      DELETE FROM document_chunks
      WHERE engine = ? AND source_id NOT IN (SELECT value FROM json_each(?))
    `);
  }

  /**
   * Returns the stored chunks of a source when they were embedded from
   * content with the given hash, or null when they must be rebuilt.
   */
  loadSource(sourceId: string, sourceHash: string): DocumentChunk[] | null {
    const stored = this.stmtHashBySource.get(this.engine, sourceId) as
      | { source_hash: string }
      | undefined;
    if (!stored || stored.source_hash !== sourceHash) {
      return null;
    }

    const rows = this.stmtBySource.all(this.engine, sourceId) as ChunkRow[];
    return rows.map((row) => ({
      id: row.id,
      sourceId: row.source_id,
      chunkIndex: row.chunk_index,
      text: row.text,
      embedding: bufferToFloat32(row.embedding),
    }));
  }

  /**
   * Replaces all stored chunks of a source in one transaction.
   */
  saveSource(sourceId: string, sourceHash: string, chunks: DocumentChunk[]): void {
    const replace = this.db.transaction(() => {
      this.stmtDeleteSource.run(this.engine, sourceId);
      for (const chunk of chunks) {
        this.stmtInsert.run(
          chunk.id,
          this.engine,
          sourceId,
          sourceHash,
          chunk.chunkIndex,
          chunk.text,
          Buffer.from(chunk.embedding.buffer, chunk.embedding.byteOffset, chunk.embedding.byteLength),
        );
      }
    });
    replace();
    debug('knowledge', 'Persisted chunks', { sourceId, count: chunks.length });
  }

  /**
   * Deletes chunks of sources no longer present in the document set.
   * Returns the number of rows removed.
   */
  pruneExcept(sourceIds: string[]): number {
    const info = this.stmtDeleteStale.run(this.engine, JSON.stringify(sourceIds));
    return info.changes;
  }
}
