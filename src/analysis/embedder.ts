/**
 * EmbeddingEngine interface and factory.
 *
 * Defines the pluggable abstraction for text embedding.
 * All consumers depend on this interface -- never on concrete engines.
 */

import type { EmbeddingConfig } from '../config/embedding-config.js';
import { debug } from '../shared/debug.js';
import { HashingEngine } from './engines/hashing.js';
import { HttpEmbeddingEngine } from './engines/http-embedding.js';

/**
 * Pluggable embedding engine abstraction.
 *
 * Engines must be deterministic for identical input. Unlike storage
 * lookups, embedding failures throw: the orchestrator's retry policy needs
 * the error to decide whether another attempt is worthwhile.
 */
export interface EmbeddingEngine {
  /** Embed a single text. Empty text yields a zero vector. */
  embed(text: string, signal?: AbortSignal): Promise<Float32Array>;

  /** Embed multiple texts, preserving order. */
  embedBatch(texts: string[], signal?: AbortSignal): Promise<Float32Array[]>;

  /** Embedding dimensions (0 until initialized for remote engines). */
  dimensions(): number;

  /** Engine identifier string; also keys persisted chunk embeddings. */
  name(): string;

  /** Lazy initialization. Returns true on success, false on failure. */
  initialize(): Promise<boolean>;

  /** Whether initialize() has been called and succeeded. */
  isReady(): boolean;

  /**
   * Recommendation similarity threshold matched to this engine's score
   * range. Engines without one get the pipeline default (0.7).
   */
  recommendedThreshold?(): number;
}

/**
 * Creates and initializes an embedding engine.
 *
 * Uses the HTTP engine when an endpoint is configured. If it cannot be
 * reached at startup, falls back to the local HashingEngine so the
 * process still serves suggestions.
 *
 * Never throws -- always returns a ready engine.
 */
export async function createEmbeddingEngine(config: EmbeddingConfig): Promise<EmbeddingEngine> {
  if (config.url) {
    const httpEngine = new HttpEmbeddingEngine({
      url: config.url,
      model: config.model,
      apiKey: config.apiKey,
      dimensions: config.dimensions,
    });
    if (await httpEngine.initialize()) {
      return httpEngine;
    }
    debug('embed', 'HTTP embedding engine unavailable, falling back to hashing engine', {
      url: config.url,
    });
  }

  const hashing = new HashingEngine(config.hashingDimensions);
  await hashing.initialize();
  return hashing;
}
