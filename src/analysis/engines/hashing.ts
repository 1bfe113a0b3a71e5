/**
 * Deterministic local embedding engine.
 *
 * Hashes unigrams and adjacent-word bigrams into a fixed number of signed
 * buckets (the "hashing trick") and L2-normalizes the result. No model
 * download, no network: identical text always yields identical vectors,
 * which keeps retrieval reproducible.
 */

import type { EmbeddingEngine } from '../embedder.js';
import { l2Normalize } from '../../shared/similarity.js';

export const DEFAULT_HASHING_DIMENSIONS = 256;

/**
 * Related health texts score about 0.25-0.45 against each other here, far
 * below what semantic embeddings give.
 */
export const HASHING_SIMILARITY_THRESHOLD = 0.2;

const STOPWORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'can', 'do', 'for',
  'from', 'how', 'i', 'in', 'is', 'it', 'me', 'my', 'of', 'on', 'or',
  'should', 'so', 'that', 'the', 'to', 'vs', 'was', 'what', 'with', 'you',
  'your',
]);

/** 32-bit FNV-1a. */
function fnv1a(text: string, seed = 0x811c9dc5): number {
  let hash = seed;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Lowercases, splits on anything that is not a letter or digit, drops
 * stopwords and strips a plural "s" so "nights" and "night" collide.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((w) => w.length > 1 && !STOPWORDS.has(w))
    .map((w) => (w.length > 3 && w.endsWith('s') && !w.endsWith('ss') ? w.slice(0, -1) : w));
}

export class HashingEngine implements EmbeddingEngine {
  private ready = false;

  constructor(private readonly dims: number = DEFAULT_HASHING_DIMENSIONS) {
    if (!Number.isInteger(dims) || dims < 8) {
      throw new RangeError(`HashingEngine needs at least 8 integer dimensions, got ${dims}`);
    }
  }

  async embed(text: string): Promise<Float32Array> {
    return this.vectorize(text);
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    return texts.map((t) => this.vectorize(t));
  }

  private vectorize(text: string): Float32Array {
    const vector = new Float32Array(this.dims);
    const tokens = tokenize(text);

    const add = (feature: string, weight: number): void => {
      const h = fnv1a(feature);
      const bucket = h % this.dims;
      // Independent hash picks the sign so collisions cancel instead of pile up
      const sign = fnv1a(feature, 0x9747b28c) & 1 ? 1 : -1;
      vector[bucket] += sign * weight;
    };

    for (let i = 0; i < tokens.length; i++) {
      add(tokens[i], 1);
      if (i + 1 < tokens.length) {
        add(`${tokens[i]} ${tokens[i + 1]}`, 0.5);
      }
    }

    return l2Normalize(vector);
  }

  dimensions(): number {
    return this.dims;
  }

  name(): string {
    return `hashing-${this.dims}`;
  }

  async initialize(): Promise<boolean> {
    this.ready = true;
    return true;
  }

  isReady(): boolean {
    return this.ready;
  }

  recommendedThreshold(): number {
    return HASHING_SIMILARITY_THRESHOLD;
  }
}
