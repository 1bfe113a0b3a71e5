/**
 * KnowledgeStore -- exact nearest-neighbor search over embedded chunks.
 *
 * Lifecycle is build-then-freeze: `index()` may be called (and repeated)
 * while the store is open; `freeze()` closes it; `query()` is only served
 * once frozen. After the barrier the store is immutable and safe to share
 * across concurrent requests without locking.
 *
 * Scoring is brute-force cosine similarity. The curated corpus is small
 * enough that an ANN index would only add nondeterminism.
 */

import { debug, debugTimed } from '../shared/debug.js';
import { InvalidQueryError, KnowledgeStoreNotReadyError } from '../shared/errors.js';
import { cosineSimilarity } from '../shared/similarity.js';
import type { DocumentChunk, ScoredChunk } from './types.js';

export class KnowledgeStore {
  private chunks: readonly DocumentChunk[] = [];
  private byId = new Map<string, DocumentChunk>();
  private dims: number | null = null;
  private frozen = false;

  /**
   * Replaces the indexed set with `chunks`.
   *
   * Idempotent: indexing the same chunks again yields the same retrievable
   * set in the same order. Duplicate ids keep their first occurrence.
   *
   * @throws KnowledgeStoreNotReadyError after freeze()
   * @throws InvalidQueryError when chunk embeddings disagree on dimensionality
   */
  index(chunks: readonly DocumentChunk[]): void {
    if (this.frozen) {
      throw new KnowledgeStoreNotReadyError('KnowledgeStore is frozen; build a new store to re-index');
    }

    const byId = new Map<string, DocumentChunk>();
    const ordered: DocumentChunk[] = [];
    let dims: number | null = null;

    for (const chunk of chunks) {
      if (byId.has(chunk.id)) {
        debug('knowledge', 'Skipping duplicate chunk id', { id: chunk.id });
        continue;
      }
      if (dims === null) {
        dims = chunk.embedding.length;
      } else if (chunk.embedding.length !== dims) {
        throw new InvalidQueryError(
          `Chunk ${chunk.id} has ${chunk.embedding.length} dimensions, expected ${dims}`,
        );
      }
      byId.set(chunk.id, chunk);
      ordered.push(chunk);
    }

    this.chunks = ordered;
    this.byId = byId;
    this.dims = dims;
    debug('knowledge', 'Indexed chunks', { count: ordered.length, dimensions: dims });
  }

  /**
   * Closes the build phase. Idempotent.
   */
  freeze(): this {
    if (!this.frozen) {
      this.frozen = true;
      debug('knowledge', 'KnowledgeStore frozen', { count: this.chunks.length });
    }
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  get size(): number {
    return this.chunks.length;
  }

  /** Dimensionality of the indexed embeddings; null while empty. */
  dimensions(): number | null {
    return this.dims;
  }

  getChunk(id: string): DocumentChunk | undefined {
    return this.byId.get(id);
  }

  /**
   * Top `topK` chunks by cosine similarity, descending. Equal scores keep
   * insertion order.
   *
   * @throws KnowledgeStoreNotReadyError before freeze()
   * @throws InvalidQueryError for topK < 1 or a dimensionality mismatch
   */
  query(queryEmbedding: Float32Array, topK: number): ScoredChunk[] {
    if (!this.frozen) {
      throw new KnowledgeStoreNotReadyError('KnowledgeStore queried before its build completed');
    }
    if (!Number.isInteger(topK) || topK < 1) {
      throw new InvalidQueryError(`topK must be an integer >= 1, got ${topK}`);
    }
    if (this.dims !== null && queryEmbedding.length !== this.dims) {
      throw new InvalidQueryError(
        `Query embedding has ${queryEmbedding.length} dimensions, index has ${this.dims}`,
      );
    }
    if (!queryEmbedding.every(Number.isFinite)) {
      throw new InvalidQueryError('Query embedding contains non-finite values');
    }

    return debugTimed('knowledge', 'Knowledge query', () => {
      const scored = this.chunks.map((chunk) => ({
        chunk,
        score: cosineSimilarity(queryEmbedding, chunk.embedding),
      }));
      // Array.prototype.sort is stable, so ties stay in insertion order
      scored.sort((a, b) => b.score - a.score);
      return scored.slice(0, topK);
    });
  }
}
