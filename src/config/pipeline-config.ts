// ---------------------------------------------------------------------------
// Pipeline Configuration
// ---------------------------------------------------------------------------
// Tuning knobs for the analyzer window, retrieval breadth, recommendation
// thresholds and the external-call retry policy.
//
// Loaded from <dataDir>/pipeline.json with safe defaults when the file does
// not exist. Every field is optional; an invalid file is ignored wholesale
// rather than half-applied. The 0.7 similarity threshold suits semantic
// embeddings; an engine with another score range passes its own default,
// which pipeline.json still overrides.
// ---------------------------------------------------------------------------

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

import { getConfigDir } from '../shared/config.js';
import { debug } from '../shared/debug.js';

const RetryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1).max(10).default(3),
  baseDelayMs: z.number().nonnegative().default(1000),
  maxDelayMs: z.number().nonnegative().default(10_000),
  jitterRatio: z.number().min(0).max(1).default(0.25),
});

export const PipelineConfigSchema = z
  .object({
    /** Most recent logs the analyzer looks at. */
    windowSize: z.number().int().min(1).default(7),
    /** Hard character cap on the summary digest. */
    digestCharCap: z.number().int().min(1).default(300),
    /** Latest value further than this many std devs from baseline is an anomaly. */
    anomalyStdMultiplier: z.number().positive().default(1.5),
    /** Values a metric needs inside the window before a trend is reported. */
    minTrendSamples: z.number().int().min(2).default(2),
    /** Relative change at or below which a trend reads as steady. */
    steadyTolerance: z.number().min(0).default(0.05),
    topK: z.number().int().min(1).default(3),
    maxHops: z.number().int().min(0).default(2),
    chunkSize: z.number().int().min(32).default(512),
    chunkOverlap: z.number().int().min(0).default(50),
    similarityThreshold: z.number().min(-1).max(1).default(0.7),
    diversityCutoff: z.number().min(-1).max(1).default(0.85),
    maxResults: z.number().int().min(1).default(3),
    retry: RetryPolicySchema.default({}),
    /** Per external call, independent of retries. */
    requestTimeoutMs: z.number().int().positive().default(10_000),
  })
  .refine((c) => c.chunkOverlap < c.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  })
  .refine((c) => c.retry.baseDelayMs <= c.retry.maxDelayMs, {
    message: 'retry.baseDelayMs must not exceed retry.maxDelayMs',
    path: ['retry', 'baseDelayMs'],
  });

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type RetryPolicy = PipelineConfig['retry'];

/** Defaults with no file present. */
export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = PipelineConfigSchema.parse({});

/** Defaults a caller may move before pipeline.json is applied. */
export type PipelineDefaults = Partial<Pick<PipelineConfig, 'similarityThreshold'>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Loads pipeline configuration from disk.
 *
 * Reads pipeline.json from the data directory. Falls back to defaults if
 * the file does not exist, cannot be parsed or fails validation. Keys
 * present in the file win over `defaults`.
 */
export function loadPipelineConfig(defaults: PipelineDefaults = {}): PipelineConfig {
  const configPath = join(getConfigDir(), 'pipeline.json');
  const fallback = (): PipelineConfig => PipelineConfigSchema.parse(defaults);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch {
    debug('config', 'No pipeline config found, using defaults', { ...defaults });
    return fallback();
  }

  const parsed = PipelineConfigSchema.safeParse(isRecord(raw) ? { ...defaults, ...raw } : raw);
  if (!parsed.success) {
    debug('config', 'Invalid pipeline config, using defaults', {
      path: configPath,
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
    return fallback();
  }

  debug('config', 'Loaded pipeline config', { path: configPath });
  return parsed.data;
}
