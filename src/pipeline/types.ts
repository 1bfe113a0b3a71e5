/**
 * Types flowing between the pipeline stages.
 *
 * Analyzer -> UserSummary -> Retriever -> EvidenceSet -> Recommender -> Suggestion[]
 */

import type { ScoredChunk } from '../knowledge/types.js';
import type { OntologyEdge, OntologyNode } from '../ontology/types.js';
import type { MetricKey } from '../shared/types.js';

// =============================================================================
// Analyzer Output
// =============================================================================

export type TrendDirection = 'up' | 'down' | 'steady';

export interface MetricTrendOk {
  metric: MetricKey;
  status: 'ok';
  direction: TrendDirection;
  latest: number;
  /** Mean of the window excluding the latest value. */
  baselineMean: number;
  /** latest - baselineMean */
  delta: number;
  /** |delta| relative to |baselineMean|; 0 when the baseline is 0. */
  magnitude: number;
  /** Population std dev of the whole window. */
  stdDev: number;
  anomaly: boolean;
  samples: number;
}

export interface MetricTrendInsufficient {
  metric: MetricKey;
  status: 'insufficient_data';
  latest: number | null;
  samples: number;
}

export type MetricTrend = MetricTrendOk | MetricTrendInsufficient;

/**
 * Per-request behavioral summary of a bounded log window.
 * `digest.length` never exceeds the configured cap.
 */
export interface UserSummary {
  userId: string;
  window: {
    count: number;
    from: string | null;
    to: string | null;
  };
  trends: MetricTrend[];
  latestMood: string | null;
  moodCounts: Record<string, number>;
  daysSinceLastLog: number | null;
  digest: string;
}

// =============================================================================
// Retriever Output
// =============================================================================

/**
 * Evidence for one query. Chunk scores are non-increasing and
 * `chunks.length <= topK`; concepts are unique by id.
 */
export interface EvidenceSet {
  chunks: ScoredChunk[];
  /** Concepts matched directly in the query text. */
  matchedConcepts: string[];
  /** Concepts reached from the matched ones within the hop limit. */
  concepts: OntologyNode[];
  /** Edges traversed to reach `concepts`. */
  relations: OntologyEdge[];
}

// =============================================================================
// Recommender Types
// =============================================================================

export interface RecommendationCandidate {
  readonly id: string;
  readonly category: string;
  readonly text: string;
  readonly embedding: Float32Array;
}

/**
 * Which evidence justified a suggestion, by id only, so it can be
 * reproduced from the same evidence set.
 */
export interface ReasoningTrace {
  candidateId: string;
  chunkIds: string[];
  relationIds: string[];
  /** Summary signals, e.g. "sleepHours:down:anomaly". */
  signals: string[];
}

export type SuggestionSource = 'template' | 'generated' | 'trace';

export interface Suggestion {
  id: string;
  category: string;
  text: string;
  /** Cosine similarity between the candidate and the combined context. */
  score: number;
  source: SuggestionSource;
  trace: ReasoningTrace;
}

// =============================================================================
// External Capabilities
// =============================================================================

/** Embeds text; the orchestrator hands stages a retried, time-bounded one. */
export type EmbedFn = (text: string, signal?: AbortSignal) => Promise<Float32Array>;

/** Generates text from a prompt. */
export type GenerateFn = (prompt: string, signal?: AbortSignal) => Promise<string>;
