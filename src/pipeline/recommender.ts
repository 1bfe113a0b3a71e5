/**
 * Recommender stage: scores candidate templates against the evidence and
 * user summary, thresholds, diversifies and explains.
 *
 * Zero candidates above the threshold is an empty result, not an error.
 */

import { debug } from '../shared/debug.js';
import { GenerationUnavailableError } from '../shared/errors.js';
import { cosineSimilarity } from '../shared/similarity.js';
import type { OntologyEdge } from '../ontology/types.js';
import { summarySignals } from './analyzer.js';
import type {
  EmbedFn,
  EvidenceSet,
  GenerateFn,
  ReasoningTrace,
  RecommendationCandidate,
  Suggestion,
  UserSummary,
} from './types.js';

export interface RecommenderOptions {
  similarityThreshold: number;
  diversityCutoff: number;
}

export interface RecommenderDeps {
  embed: EmbedFn;
  /** Optional phrasing capability. Without it, template text is used as-is. */
  generate?: GenerateFn;
}

/** Most chunk ids cited per suggestion. */
const MAX_TRACE_CHUNKS = 2;

interface PhrasingState {
  generate?: GenerateFn;
}

interface Scored {
  candidate: RecommendationCandidate;
  score: number;
  order: number;
}

// =============================================================================
// Digests
// =============================================================================

function conceptText(id: string): string {
  return id.replace(/_/g, ' ');
}

function describeRelation(edge: OntologyEdge): string {
  return `${conceptText(edge.source)} ${edge.kind.replace(/_/g, ' ')} ${conceptText(edge.target)}`;
}

/**
 * Text form of an evidence set: retrieved chunk texts in score order, then
 * the related concept labels.
 */
export function evidenceDigest(evidence: EvidenceSet): string {
  const parts = evidence.chunks.map((c) => c.chunk.text);
  const labels = [...evidence.matchedConcepts.map(conceptText), ...evidence.concepts.map((c) => c.label)];
  if (labels.length > 0) {
    parts.push(`Related concepts: ${labels.join(', ')}.`);
  }
  return parts.join('\n');
}

/** Context embedded for scoring: evidence digest followed by the summary digest. */
export function recommendationContext(evidence: EvidenceSet, summary: UserSummary): string {
  return [evidenceDigest(evidence), summary.digest].filter((s) => s.length > 0).join('\n');
}

// =============================================================================
// Trace
// =============================================================================

/**
 * Cites the evidence behind one candidate by id: chunks that point the
 * same way as the candidate, relations touching a concept the candidate
 * names, and the summary's notable trends.
 */
export function buildTrace(
  candidate: RecommendationCandidate,
  evidence: EvidenceSet,
  signals: string[],
): ReasoningTrace {
  const chunkIds = evidence.chunks
    .map((c, order) => ({ id: c.chunk.id, sim: cosineSimilarity(candidate.embedding, c.chunk.embedding), order }))
    .filter((c) => c.sim > 0)
    .sort((a, b) => b.sim - a.sim || a.order - b.order)
    .slice(0, MAX_TRACE_CHUNKS)
    .map((c) => c.id);

  const haystack = `${candidate.category} ${candidate.text}`.toLowerCase();
  const relationIds = evidence.relations
    .filter((r) => haystack.includes(conceptText(r.source)) || haystack.includes(conceptText(r.target)))
    .map((r) => r.id);

  return { candidateId: candidate.id, chunkIds, relationIds, signals: [...signals] };
}

/**
 * Suggestion text built from the trace alone, used when phrasing fails.
 */
export function renderTrace(
  candidate: RecommendationCandidate,
  trace: ReasoningTrace,
  evidence: EvidenceSet,
): string {
  const parts = [candidate.text];
  if (trace.chunkIds.length > 0) {
    parts.push(`Sources: ${trace.chunkIds.join(', ')}.`);
  }
  const links = trace.relationIds
    .map((id) => evidence.relations.find((r) => r.id === id))
    .filter((r): r is OntologyEdge => r !== undefined)
    .map(describeRelation);
  if (links.length > 0) {
    parts.push(`Links: ${links.join('; ')}.`);
  }
  if (trace.signals.length > 0) {
    parts.push(`Signals: ${trace.signals.join(', ')}.`);
  }
  return parts.join(' ');
}

/**
 * Prompt asking the generator to phrase one suggestion from its evidence.
 */
export function buildPhrasingPrompt(
  candidate: RecommendationCandidate,
  trace: ReasoningTrace,
  evidence: EvidenceSet,
  summary: UserSummary,
): string {
  const chunks = evidence.chunks
    .filter((c) => trace.chunkIds.includes(c.chunk.id))
    .map((c) => `- [${c.chunk.id}] ${c.chunk.text}`);
  const relations = evidence.relations
    .filter((r) => trace.relationIds.includes(r.id))
    .map((r) => `- ${describeRelation(r)}`);

  return [
    'Rewrite the recommendation below as one or two friendly, specific sentences for this user.',
    'Use only the facts given. Do not add medical claims.',
    '',
    `Recommendation (${candidate.category}): ${candidate.text}`,
    `User summary: ${summary.digest}`,
    chunks.length > 0 ? `Evidence:\n${chunks.join('\n')}` : 'Evidence: none',
    relations.length > 0 ? `Concept links:\n${relations.join('\n')}` : 'Concept links: none',
    '',
    'Reply with the rewritten recommendation only.',
  ].join('\n');
}

// =============================================================================
// Recommender
// =============================================================================

export class Recommender {
  constructor(
    private readonly deps: RecommenderDeps,
    private readonly options: RecommenderOptions,
  ) {}

  async recommend(
    evidence: EvidenceSet,
    summary: UserSummary,
    candidates: readonly RecommendationCandidate[],
    maxResults: number,
    signal?: AbortSignal,
  ): Promise<Suggestion[]> {
    if (candidates.length === 0 || maxResults < 1) {
      return [];
    }

    const context = await this.deps.embed(recommendationContext(evidence, summary), signal);
    const accepted = this.select(context, candidates, maxResults);
    const signals = summarySignals(summary);

    // Cleared by the first GenerationUnavailableError: the rest of this
    // request is rendered from traces without calling the generator again
    const phrasing: PhrasingState = { generate: this.deps.generate };

    const suggestions: Suggestion[] = [];
    for (const { candidate, score } of accepted) {
      const trace = buildTrace(candidate, evidence, signals);
      const phrased = await this.phrase(phrasing, candidate, trace, evidence, summary, signal);
      suggestions.push({
        id: candidate.id,
        category: candidate.category,
        text: phrased.text,
        score,
        source: phrased.source,
        trace,
      });
    }

    debug('recommend', 'Suggestions ranked', {
      candidates: candidates.length,
      accepted: suggestions.map((s) => s.id),
    });

    return suggestions;
  }

  /**
   * Thresholds and sorts candidates, then walks the ranking greedily,
   * accepting a candidate only when it is less similar than the cutoff to
   * everything already accepted.
   */
  select(
    context: Float32Array,
    candidates: readonly RecommendationCandidate[],
    maxResults: number,
  ): Scored[] {
    const ranked = candidates
      .map((candidate, order) => ({ candidate, score: cosineSimilarity(candidate.embedding, context), order }))
      .filter((s) => s.score >= this.options.similarityThreshold)
      .sort((a, b) => b.score - a.score || a.order - b.order);

    const accepted: Scored[] = [];
    for (const entry of ranked) {
      if (accepted.length >= maxResults) break;
      const tooClose = accepted.some(
        (a) => cosineSimilarity(a.candidate.embedding, entry.candidate.embedding) >= this.options.diversityCutoff,
      );
      if (tooClose) {
        debug('recommend', 'Candidate dropped by diversity filter', { candidateId: entry.candidate.id });
        continue;
      }
      accepted.push(entry);
    }
    return accepted;
  }

  private async phrase(
    phrasing: PhrasingState,
    candidate: RecommendationCandidate,
    trace: ReasoningTrace,
    evidence: EvidenceSet,
    summary: UserSummary,
    signal?: AbortSignal,
  ): Promise<{ text: string; source: Suggestion['source'] }> {
    if (!this.deps.generate) {
      return { text: candidate.text, source: 'template' };
    }
    if (!phrasing.generate) {
      return { text: renderTrace(candidate, trace, evidence), source: 'trace' };
    }

    try {
      const text = (await phrasing.generate(buildPhrasingPrompt(candidate, trace, evidence, summary), signal)).trim();
      if (text.length > 0) {
        return { text, source: 'generated' };
      }
      debug('recommend', 'Generator returned empty text, using trace', { candidateId: candidate.id });
    } catch (err) {
      if (!(err instanceof GenerationUnavailableError)) throw err;
      phrasing.generate = undefined;
      debug('recommend', 'Generation unavailable, using traces for the rest of the request', {
        candidateId: candidate.id,
        error: err.message,
      });
    }
    return { text: renderTrace(candidate, trace, evidence), source: 'trace' };
  }
}
