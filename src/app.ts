/**
 * Composition root: wires storage, configuration, the frozen ontology and
 * knowledge store, and the orchestrator for one process.
 *
 * Shared structures are built here once and passed explicitly to the
 * stages; nothing downstream reaches for a module-level singleton.
 */

import { createEmbeddingEngine, type EmbeddingEngine } from './analysis/embedder.js';
import { loadEmbeddingConfig } from './config/embedding-config.js';
import { loadGenerationConfig } from './config/generation-config.js';
import { loadPipelineConfig, type PipelineConfig, type PipelineDefaults } from './config/pipeline-config.js';
import { KnowledgeIngester, type IngestionStats } from './ingestion/knowledge-ingester.js';
import { createGenerator } from './intelligence/generation-client.js';
import type { KnowledgeStore } from './knowledge/knowledge-store.js';
import { loadOntology } from './ontology/loader.js';
import type { OntologyGraph } from './ontology/ontology-graph.js';
import { embedCandidates, loadTemplates } from './pipeline/candidates.js';
import { Orchestrator } from './pipeline/orchestrator.js';
import type { GenerateFn } from './pipeline/types.js';
import { getDatabaseConfig } from './shared/config.js';
import { debug } from './shared/debug.js';
import {
  ChunkRepository,
  HealthLogRepository,
  SuggestionRepository,
  openDatabase,
  type CoachDatabase,
} from './storage/index.js';

export interface CoachAppOptions {
  /** Overrides pipeline.json and the engine's defaults. */
  config?: PipelineConfig;
  /** Overrides the embedding engine chosen from configuration. */
  engine?: EmbeddingEngine;
  /** Overrides the generation capability; `null` disables it. */
  generate?: GenerateFn | null;
  /** Knowledge directory; defaults to KnowledgeIngester.detectKnowledgeDir(). */
  knowledgeDir?: string;
  ontologyPath?: string;
  templatesPath?: string;
  /** Clock for the analyzer window. */
  now?: () => Date;
}

export interface CoachApp {
  db: CoachDatabase;
  config: PipelineConfig;
  engine: EmbeddingEngine;
  ontology: OntologyGraph;
  store: KnowledgeStore;
  knowledgeStats: IngestionStats;
  logs: HealthLogRepository;
  suggestions: SuggestionRepository;
  orchestrator: Orchestrator;
  close(): void;
}

function engineDefaults(engine: EmbeddingEngine): PipelineDefaults {
  const threshold = engine.recommendedThreshold?.();
  return threshold === undefined ? {} : { similarityThreshold: threshold };
}

/**
 * Builds everything a request needs. Resolves only after the knowledge
 * store is built and frozen, so no request can reach an unready store.
 */
export async function createCoachApp(options: CoachAppOptions = {}): Promise<CoachApp> {
  const engine = options.engine ?? (await createEmbeddingEngine(loadEmbeddingConfig()));
  const config = options.config ?? loadPipelineConfig(engineDefaults(engine));
  const db = openDatabase(getDatabaseConfig());

  try {
    const ontology = loadOntology(options.ontologyPath);

    const ingester = new KnowledgeIngester(
      engine,
      { chunkSize: config.chunkSize, overlap: config.chunkOverlap },
      new ChunkRepository(db.db, engine.name()),
    );
    const { store, stats } = await ingester.build(
      options.knowledgeDir ?? KnowledgeIngester.detectKnowledgeDir(),
    );

    const candidates = await embedCandidates(loadTemplates(options.templatesPath), engine);

    let generate: GenerateFn | undefined;
    if (options.generate !== undefined) {
      generate = options.generate ?? undefined;
    } else {
      const generation = loadGenerationConfig();
      generate = generation.enabled ? createGenerator(generation) : undefined;
    }

    const logs = new HealthLogRepository(db.db);
    const suggestions = new SuggestionRepository(db.db);
    const orchestrator = new Orchestrator({
      logs,
      ontology,
      store,
      engine,
      candidates,
      config,
      generate,
      now: options.now,
    });

    debug('orchestrator', 'Coach ready', {
      engine: engine.name(),
      similarityThreshold: config.similarityThreshold,
      chunks: store.size,
      candidates: candidates.length,
      generation: generate !== undefined,
    });

    return {
      db,
      config,
      engine,
      ontology,
      store,
      knowledgeStats: stats,
      logs,
      suggestions,
      orchestrator,
      close: () => db.close(),
    };
  } catch (err) {
    db.close();
    throw err;
  }
}
