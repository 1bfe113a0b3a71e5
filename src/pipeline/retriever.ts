/**
 * Retriever stage: semantic search over the knowledge store joined with
 * bounded ontology traversal from concepts named in the query.
 *
 * Ontology evidence is supplementary: a concept lookup that fails with
 * UnknownConceptError is logged and skipped, never raised. An empty
 * evidence set is a valid result.
 */

import type { KnowledgeStore } from '../knowledge/knowledge-store.js';
import type { OntologyGraph } from '../ontology/ontology-graph.js';
import { RELATION_KINDS, type OntologyEdge, type OntologyNode } from '../ontology/types.js';
import { debug, errorMessage } from '../shared/debug.js';
import {
  CancelledError,
  CoachError,
  RetrievalUnavailableError,
  UnknownConceptError,
  isTransientError,
} from '../shared/errors.js';
import type { EmbedFn, EvidenceSet, UserSummary } from './types.js';

export interface RetrieverDeps {
  ontology: OntologyGraph;
  store: KnowledgeStore;
  embed: EmbedFn;
  maxHops: number;
}

/**
 * Text embedded for the knowledge query: the question plus the user's
 * digest, so retrieval leans toward what the logs show.
 */
export function retrievalText(queryText: string, summary: UserSummary): string {
  return [queryText.trim(), summary.digest].filter((s) => s.length > 0).join('\n');
}

export class Retriever {
  constructor(private readonly deps: RetrieverDeps) {}

  async retrieve(
    queryText: string,
    summary: UserSummary,
    topK: number,
    signal?: AbortSignal,
  ): Promise<EvidenceSet> {
    const queryEmbedding = await this.embedQuery(retrievalText(queryText, summary), signal);
    const chunks = this.deps.store.query(queryEmbedding, topK);

    const { matchedConcepts, concepts, relations } = this.ontologyEvidence(queryText);

    debug('retrieve', 'Evidence assembled', {
      chunks: chunks.map((c) => c.chunk.id),
      matchedConcepts,
      concepts: concepts.length,
      relations: relations.length,
    });

    return { chunks, matchedConcepts, concepts, relations };
  }

  /**
   * Concepts matched in the query text, plus everything within `maxHops`
   * along any relation kind, deduplicated by concept id.
   */
  ontologyEvidence(queryText: string): Omit<EvidenceSet, 'chunks'> {
    const matched = this.deps.ontology.matchConcepts(queryText).map((n) => n.id);
    const matchedSet = new Set(matched);
    const concepts = new Map<string, OntologyNode>();
    const relations = new Map<string, OntologyEdge>();

    for (const conceptId of matched) {
      try {
        for (const step of this.deps.ontology.traverse(conceptId, RELATION_KINDS, this.deps.maxHops)) {
          if (!matchedSet.has(step.node.id) && !concepts.has(step.node.id)) {
            concepts.set(step.node.id, step.node);
          }
          if (!relations.has(step.via.id)) {
            relations.set(step.via.id, step.via);
          }
        }
      } catch (err) {
        if (!(err instanceof UnknownConceptError)) throw err;
        debug('retrieve', 'Concept missing from ontology, skipping', { conceptId });
      }
    }

    return {
      matchedConcepts: matched,
      concepts: [...concepts.values()],
      relations: [...relations.values()],
    };
  }

  private async embedQuery(text: string, signal?: AbortSignal): Promise<Float32Array> {
    try {
      return await this.deps.embed(text, signal);
    } catch (err) {
      // Already classified: bad input, cancellation, provider failure
      if (
        err instanceof RetrievalUnavailableError ||
        err instanceof CancelledError ||
        (err instanceof CoachError && !err.transient)
      ) {
        throw err;
      }
      throw new RetrievalUnavailableError(`Query embedding failed: ${errorMessage(err)}`, {
        transient: isTransientError(err),
        cause: err,
      });
    }
  }
}
