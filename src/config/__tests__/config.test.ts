import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { DEFAULT_HASHING_DIMENSIONS } from '../../analysis/engines/hashing.js';
import { getDbPath, readConfigJson } from '../../shared/config.js';
import { loadEmbeddingConfig } from '../embedding-config.js';
import { loadGenerationConfig } from '../generation-config.js';
import { DEFAULT_PIPELINE_CONFIG, loadPipelineConfig } from '../pipeline-config.js';

let dir: string;

function writeJson(name: string, value: unknown): void {
  writeFileSync(join(dir, name), typeof value === 'string' ? value : JSON.stringify(value));
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'health-coach-config-'));
  vi.stubEnv('HEALTH_COACH_DATA_DIR', dir);
  for (const key of [
    'HEALTH_COACH_EMBEDDING_URL',
    'HEALTH_COACH_EMBEDDING_MODEL',
    'HEALTH_COACH_EMBEDDING_API_KEY',
    'HEALTH_COACH_EMBEDDING_DIMENSIONS',
    'HEALTH_COACH_GENERATION',
  ]) {
    vi.stubEnv(key, '');
  }
});

afterEach(() => {
  vi.unstubAllEnvs();
  rmSync(dir, { recursive: true, force: true });
});

describe('shared config', () => {
  it('keeps the database inside the data directory', () => {
    expect(getDbPath()).toBe(join(dir, 'coach.db'));
  });

  it('reads a missing, broken or non-object config.json as empty', () => {
    expect(readConfigJson()).toEqual({});
    writeJson('config.json', '{ nope');
    expect(readConfigJson()).toEqual({});
    writeJson('config.json', [1, 2]);
    expect(readConfigJson()).toEqual({});
  });
});

describe('loadPipelineConfig', () => {
  it('returns the defaults without a file', () => {
    expect(loadPipelineConfig()).toEqual(DEFAULT_PIPELINE_CONFIG);
  });

  it('has the documented defaults', () => {
    expect(DEFAULT_PIPELINE_CONFIG).toMatchObject({
      windowSize: 7,
      digestCharCap: 300,
      topK: 3,
      maxHops: 2,
      chunkSize: 512,
      chunkOverlap: 50,
      similarityThreshold: 0.7,
      diversityCutoff: 0.85,
      maxResults: 3,
      requestTimeoutMs: 10_000,
      retry: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 10_000, jitterRatio: 0.25 },
    });
  });

  it('merges a partial file over the defaults', () => {
    writeJson('pipeline.json', { topK: 5, retry: { maxAttempts: 2 } });

    const config = loadPipelineConfig();

    expect(config.topK).toBe(5);
    expect(config.retry).toEqual({ maxAttempts: 2, baseDelayMs: 1000, maxDelayMs: 10_000, jitterRatio: 0.25 });
    expect(config.windowSize).toBe(7);
  });

  it('ignores an invalid file wholesale', () => {
    writeJson('pipeline.json', { topK: 5, chunkSize: 100, chunkOverlap: 100 });
    expect(loadPipelineConfig()).toEqual(DEFAULT_PIPELINE_CONFIG);
  });

  it('applies caller defaults beneath the file', () => {
    expect(loadPipelineConfig({ similarityThreshold: 0.2 }).similarityThreshold).toBe(0.2);

    writeJson('pipeline.json', { topK: 5 });
    expect(loadPipelineConfig({ similarityThreshold: 0.2 })).toMatchObject({ topK: 5, similarityThreshold: 0.2 });

    writeJson('pipeline.json', { similarityThreshold: 0.5 });
    expect(loadPipelineConfig({ similarityThreshold: 0.2 }).similarityThreshold).toBe(0.5);

    writeJson('pipeline.json', { chunkSize: 100, chunkOverlap: 100 });
    expect(loadPipelineConfig({ similarityThreshold: 0.2 }).similarityThreshold).toBe(0.2);
  });

  it('never hands out the shared default object', () => {
    const config = loadPipelineConfig();
    config.retry.maxAttempts = 9;
    expect(DEFAULT_PIPELINE_CONFIG.retry.maxAttempts).toBe(3);
  });
});

describe('loadEmbeddingConfig', () => {
  it('defaults to the local hashing engine', () => {
    expect(loadEmbeddingConfig()).toEqual({
      url: null,
      model: 'text-embedding-3-small',
      apiKey: null,
      dimensions: null,
      hashingDimensions: DEFAULT_HASHING_DIMENSIONS,
    });
  });

  it('reads the embedding section of config.json', () => {
    writeJson('config.json', {
      embedding: { url: 'http://localhost:11434/v1/embeddings', model: 'nomic-embed-text', dimensions: 768, hashingDimensions: 128 },
    });

    expect(loadEmbeddingConfig()).toEqual({
      url: 'http://localhost:11434/v1/embeddings',
      model: 'nomic-embed-text',
      apiKey: null,
      dimensions: 768,
      hashingDimensions: 128,
    });
  });

  it('lets environment variables win over the file', () => {
    writeJson('config.json', { embedding: { url: 'http://file.invalid', model: 'from-file' } });
    vi.stubEnv('HEALTH_COACH_EMBEDDING_URL', 'http://env.invalid/embeddings');
    vi.stubEnv('HEALTH_COACH_EMBEDDING_API_KEY', 'test-secret');
    vi.stubEnv('HEALTH_COACH_EMBEDDING_DIMENSIONS', '256');

    expect(loadEmbeddingConfig()).toMatchObject({
      url: 'http://env.invalid/embeddings',
      model: 'from-file',
      apiKey: 'test-secret',
      dimensions: 256,
    });
  });

  it('ignores dimensions that are not positive integers', () => {
    vi.stubEnv('HEALTH_COACH_EMBEDDING_DIMENSIONS', '12.5');
    writeJson('config.json', { embedding: { dimensions: -3 } });
    expect(loadEmbeddingConfig().dimensions).toBeNull();
  });
});

describe('loadGenerationConfig', () => {
  it('is disabled by default', () => {
    expect(loadGenerationConfig()).toEqual({ enabled: false, model: 'claude-haiku-4-5' });
  });

  it('is enabled by config.json with a custom model', () => {
    writeJson('config.json', { generation: true, generationModel: 'claude-sonnet-4-5' });
    expect(loadGenerationConfig()).toEqual({ enabled: true, model: 'claude-sonnet-4-5' });
  });

  it('lets the environment override config.json either way', () => {
    writeJson('config.json', { generation: true });
    vi.stubEnv('HEALTH_COACH_GENERATION', '0');
    expect(loadGenerationConfig().enabled).toBe(false);

    vi.stubEnv('HEALTH_COACH_GENERATION', 'true');
    writeJson('config.json', {});
    expect(loadGenerationConfig().enabled).toBe(true);
  });
});
