/**
 * Embedding engine configuration.
 *
 * Resolution order for each field: environment variable > config.json >
 * default. Without an endpoint URL the local hashing engine is used.
 */

import { readConfigJson } from '../shared/config.js';
import { DEFAULT_HASHING_DIMENSIONS } from '../analysis/engines/hashing.js';

export interface EmbeddingConfig {
  url: string | null;
  model: string;
  apiKey: string | null;
  dimensions: number | null;
  hashingDimensions: number;
}

function positiveInt(value: unknown): number | null {
  const n = typeof value === 'string' ? Number(value) : value;
  return typeof n === 'number' && Number.isInteger(n) && n > 0 ? n : null;
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

export function loadEmbeddingConfig(): EmbeddingConfig {
  const file = readConfigJson();
  const embedding =
    file.embedding !== null && typeof file.embedding === 'object'
      ? (file.embedding as Record<string, unknown>)
      : {};

  return {
    url: nonEmptyString(process.env.HEALTH_COACH_EMBEDDING_URL) ?? nonEmptyString(embedding.url),
    model:
      nonEmptyString(process.env.HEALTH_COACH_EMBEDDING_MODEL) ??
      nonEmptyString(embedding.model) ??
      'text-embedding-3-small',
    apiKey:
      nonEmptyString(process.env.HEALTH_COACH_EMBEDDING_API_KEY) ?? nonEmptyString(embedding.apiKey),
    dimensions:
      positiveInt(process.env.HEALTH_COACH_EMBEDDING_DIMENSIONS) ?? positiveInt(embedding.dimensions),
    hashingDimensions: positiveInt(embedding.hashingDimensions) ?? DEFAULT_HASHING_DIMENSIONS,
  };
}
