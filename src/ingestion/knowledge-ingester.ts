/**
 * Knowledge ingester for curated markdown documents.
 *
 * Turns a directory of markdown files into a frozen KnowledgeStore:
 * parse sections, chunk, embed, index, freeze. Embedded chunks are
 * persisted per source with a hash of the text and chunking options, so a
 * restart only re-embeds documents whose text or chunking changed.
 *
 * `build()` is the one-shot initialization barrier: concurrent callers
 * share a single build, and nothing can query the store before it
 * resolves.
 */

import { createHash } from 'node:crypto';
import { existsSync, statSync } from 'node:fs';
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { EmbeddingEngine } from '../analysis/embedder.js';
import { KnowledgeStore } from '../knowledge/knowledge-store.js';
import type { DocumentChunk, SourceDocument } from '../knowledge/types.js';
import { getConfigDir } from '../shared/config.js';
import { debug, errorMessage } from '../shared/debug.js';
import type { ChunkRepository } from '../storage/chunks.js';
import { chunkText, type ChunkOptions } from './chunker.js';
import { markdownToDocuments } from './markdown-parser.js';

export const BUNDLED_KNOWLEDGE_DIR = fileURLToPath(
  new URL('../../data/knowledge', import.meta.url),
);

/**
 * Statistics from a build.
 */
export interface IngestionStats {
  documentsProcessed: number;
  chunksEmbedded: number;
  chunksReused: number;
  sourcesPruned: number;
}

export interface KnowledgeBuild {
  store: KnowledgeStore;
  stats: IngestionStats;
}

function hashText(text: string): string {
  return createHash('sha256').update(text).digest('hex').slice(0, 16);
}

/**
 * Key under which a document's chunks are persisted. Chunking options are
 * part of it: the same text chunked with another size is a different set.
 */
export function sourceHash(doc: SourceDocument, { chunkSize, overlap }: ChunkOptions): string {
  return hashText(`${chunkSize}:${overlap}:${doc.text}`);
}

export class KnowledgeIngester {
  private building: Promise<KnowledgeBuild> | null = null;

  constructor(
    private readonly engine: EmbeddingEngine,
    private readonly chunking: ChunkOptions,
    private readonly repository: ChunkRepository | null = null,
  ) {}

  /**
   * Picks the knowledge directory. Checks in order:
   * 1. HEALTH_COACH_KNOWLEDGE_DIR
   * 2. <dataDir>/knowledge/
   * 3. the documents bundled with the package
   */
  static detectKnowledgeDir(): string {
    const candidates = [
      process.env.HEALTH_COACH_KNOWLEDGE_DIR,
      join(getConfigDir(), 'knowledge'),
    ];

    for (const candidate of candidates) {
      if (!candidate) continue;
      try {
        if (existsSync(candidate) && statSync(candidate).isDirectory()) {
          return candidate;
        }
      } catch {
        // Unreadable candidate, try next
      }
    }

    return BUNDLED_KNOWLEDGE_DIR;
  }

  /**
   * Reads every .md file in `dirPath` (sorted by name, so the index order
   * is stable) into source documents.
   */
  static async loadDirectory(dirPath: string): Promise<SourceDocument[]> {
    const files = (await readdir(dirPath)).filter((f) => f.endsWith('.md')).sort();

    const documents: SourceDocument[] = [];
    for (const file of files) {
      const content = await readFile(join(dirPath, file), 'utf-8');
      documents.push(...markdownToDocuments(content, file));
    }
    return documents;
  }

  /**
   * Builds and freezes the store once. Later and concurrent calls return
   * the same build. A failed build is forgotten so the caller may retry.
   */
  build(source: string | SourceDocument[]): Promise<KnowledgeBuild> {
    if (!this.building) {
      this.building = this.runBuild(source).catch((err: unknown) => {
        this.building = null;
        throw err;
      });
    }
    return this.building;
  }

  /**
   * Chunks and embeds documents, reusing persisted embeddings whose source
   * text and chunking options are unchanged.
   */
  async embedDocuments(documents: SourceDocument[]): Promise<{ chunks: DocumentChunk[]; stats: IngestionStats }> {
    const chunks: DocumentChunk[] = [];
    let chunksEmbedded = 0;
    let chunksReused = 0;

    for (const doc of documents) {
      const hash = sourceHash(doc, this.chunking);
      const stored = this.repository?.loadSource(doc.id, hash) ?? null;
      if (stored && stored.length > 0) {
        chunks.push(...stored);
        chunksReused += stored.length;
        continue;
      }

      const texts = chunkText(doc.text, this.chunking);
      const embeddings = await this.engine.embedBatch(texts);
      const built = texts.map((text, chunkIndex) => ({
        id: `${doc.id}#${chunkIndex}`,
        sourceId: doc.id,
        chunkIndex,
        text,
        embedding: embeddings[chunkIndex],
      }));

      this.repository?.saveSource(doc.id, hash, built);
      chunks.push(...built);
      chunksEmbedded += built.length;
    }

    const sourcesPruned = this.repository?.pruneExcept(documents.map((d) => d.id)) ?? 0;

    return {
      chunks,
      stats: { documentsProcessed: documents.length, chunksEmbedded, chunksReused, sourcesPruned },
    };
  }

  private async runBuild(source: string | SourceDocument[]): Promise<KnowledgeBuild> {
    const documents =
      typeof source === 'string' ? await KnowledgeIngester.loadDirectory(source) : source;

    try {
      const { chunks, stats } = await this.embedDocuments(documents);
      const store = new KnowledgeStore();
      store.index(chunks);
      store.freeze();
      debug('knowledge', 'Knowledge build complete', { engine: this.engine.name(), ...stats });
      return { store, stats };
    } catch (err) {
      debug('knowledge', 'Knowledge build failed', { error: errorMessage(err) });
      throw err;
    }
  }
}
