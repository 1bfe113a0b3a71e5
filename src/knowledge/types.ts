/**
 * Knowledge base types: source documents and the embedded chunks the
 * KnowledgeStore indexes.
 */

/**
 * A curated source document, or one section of one.
 */
export interface SourceDocument {
  /** Stable id, e.g. "sleep/duration" for the "Duration" section of sleep.md. */
  id: string;
  title: string;
  text: string;
}

/**
 * A bounded slice of a source document with its precomputed embedding.
 * Immutable after the index build.
 */
export interface DocumentChunk {
  /** `${sourceId}#${chunkIndex}` */
  readonly id: string;
  readonly sourceId: string;
  readonly chunkIndex: number;
  readonly text: string;
  readonly embedding: Float32Array;
}

export interface ScoredChunk {
  chunk: DocumentChunk;
  /** Cosine similarity in [-1, 1]. */
  score: number;
}
