// Library entry: pipeline stages, composition root and storage API

export * from './storage/index.js';
export { createCoachApp } from './app.js';
export type { CoachApp, CoachAppOptions } from './app.js';

export { OntologyGraph, OntologyValidationError } from './ontology/ontology-graph.js';
export { buildOntology, loadOntology } from './ontology/loader.js';
export type { OntologyEdge, OntologyNode, RelationKind } from './ontology/types.js';
export { KnowledgeStore } from './knowledge/knowledge-store.js';
export type { DocumentChunk, ScoredChunk, SourceDocument } from './knowledge/types.js';
export { KnowledgeIngester } from './ingestion/knowledge-ingester.js';

export { analyze } from './pipeline/analyzer.js';
export { Retriever } from './pipeline/retriever.js';
export { Recommender } from './pipeline/recommender.js';
export { Orchestrator } from './pipeline/orchestrator.js';
export type { OrchestratorState, SuggestionOutcome, SuggestionRequest } from './pipeline/orchestrator.js';
export { withRetry } from './pipeline/retry.js';
export { withTimeout } from './pipeline/timeout.js';
export type * from './pipeline/types.js';

export { createEmbeddingEngine } from './analysis/embedder.js';
export type { EmbeddingEngine } from './analysis/embedder.js';
export * from './shared/errors.js';
export { debug, debugTimed } from './shared/debug.js';
