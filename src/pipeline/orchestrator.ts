/**
 * Orchestrator: runs one suggestion request through
 * Analyzer -> Retriever -> Recommender as an explicit state machine.
 *
 * Each `suggest()` call owns its own run; the ontology, knowledge store and
 * candidate list are shared read-only. External calls (embedding and
 * generation) go through one guard: a per-call timeout inside a bounded
 * retry. A request either completes with suggestions or fails with a
 * StageFailure naming the stage -- never partial output.
 */

import type { EmbeddingEngine } from '../analysis/embedder.js';
import type { PipelineConfig } from '../config/pipeline-config.js';
import type { KnowledgeStore } from '../knowledge/knowledge-store.js';
import type { OntologyGraph } from '../ontology/ontology-graph.js';
import { debug, debugTimed, errorMessage } from '../shared/debug.js';
import {
  CancelledError,
  CoachError,
  GenerationUnavailableError,
  StageFailure,
  isTransientError,
  type PipelineStage,
} from '../shared/errors.js';
import type { HealthLogSource } from '../shared/types.js';
import { analyze } from './analyzer.js';
import { Recommender } from './recommender.js';
import { Retriever } from './retriever.js';
import { withRetry, type SleepFn } from './retry.js';
import { withTimeout } from './timeout.js';
import type {
  EmbedFn,
  EvidenceSet,
  GenerateFn,
  RecommendationCandidate,
  Suggestion,
  UserSummary,
} from './types.js';

// =============================================================================
// States
// =============================================================================

export const ORCHESTRATOR_STATES = [
  'idle',
  'analyzing',
  'retrieving',
  'recommending',
  'done',
  'failed',
] as const;

export type OrchestratorState = (typeof ORCHESTRATOR_STATES)[number];

const ALLOWED_TRANSITIONS: Record<OrchestratorState, readonly OrchestratorState[]> = {
  idle: ['analyzing'],
  analyzing: ['retrieving', 'failed'],
  retrieving: ['recommending', 'failed'],
  recommending: ['done', 'failed'],
  done: [],
  failed: [],
};

export interface StateTransition {
  from: OrchestratorState;
  to: OrchestratorState;
}

export class IllegalTransitionError extends CoachError {
  constructor(from: OrchestratorState, to: OrchestratorState) {
    super(`Illegal orchestrator transition ${from} -> ${to}`);
  }
}

/**
 * State of a single request. Records every transition for the caller.
 */
class SuggestionRun {
  state: OrchestratorState = 'idle';
  readonly transitions: StateTransition[] = [];
  /** Calls made to the external capability that failed last in this stage. */
  attempts = 0;

  transition(to: OrchestratorState): void {
    if (!ALLOWED_TRANSITIONS[this.state].includes(to)) {
      throw new IllegalTransitionError(this.state, to);
    }
    this.transitions.push({ from: this.state, to });
    this.state = to;
  }

  enter(stage: PipelineStage, signal?: AbortSignal): void {
    this.transition(stage);
    this.attempts = 0;
    if (signal?.aborted) {
      throw new CancelledError();
    }
  }
}

// =============================================================================
// Request / Outcome
// =============================================================================

export interface SuggestionRequest {
  userId: string;
  query: string;
}

export interface SuggestOptions {
  signal?: AbortSignal;
}

export type SuggestionOutcome =
  | {
      ok: true;
      suggestions: Suggestion[];
      evidence: EvidenceSet;
      summary: UserSummary;
      transitions: StateTransition[];
    }
  | {
      ok: false;
      failure: StageFailure;
      transitions: StateTransition[];
    };

export interface OrchestratorDeps {
  logs: HealthLogSource;
  ontology: OntologyGraph;
  store: KnowledgeStore;
  engine: EmbeddingEngine;
  candidates: readonly RecommendationCandidate[];
  config: PipelineConfig;
  generate?: GenerateFn;
  /** Clock for the analyzer window. Defaults to the wall clock. */
  now?: () => Date;
  /** Backoff timer, injectable for tests. */
  sleep?: SleepFn;
  /** Jitter source in [0, 1). */
  random?: () => number;
}

// =============================================================================
// Orchestrator
// =============================================================================

export class Orchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  async suggest(request: SuggestionRequest, options: SuggestOptions = {}): Promise<SuggestionOutcome> {
    const { signal } = options;
    const { config } = this.deps;
    const run = new SuggestionRun();
    let stage: PipelineStage = 'analyzing';

    try {
      run.enter(stage, signal);
      const now = this.deps.now?.() ?? new Date();
      const logs = await this.deps.logs.fetchRecentLogs(request.userId, config.windowSize, now);
      const summary = debugTimed('orchestrator', 'Analyzed logs', () =>
        analyze(request.userId, logs, now, config),
      );

      stage = 'retrieving';
      run.enter(stage, signal);
      const embed = this.guardedEmbed(run, signal);
      const retriever = new Retriever({
        ontology: this.deps.ontology,
        store: this.deps.store,
        embed,
        maxHops: config.maxHops,
      });
      const evidence = await debugTimed('orchestrator', 'Retrieved evidence', () =>
        retriever.retrieve(request.query, summary, config.topK, signal),
      );

      stage = 'recommending';
      run.enter(stage, signal);
      const recommender = new Recommender(
        { embed, generate: this.guardedGenerate(run, signal) },
        { similarityThreshold: config.similarityThreshold, diversityCutoff: config.diversityCutoff },
      );
      const suggestions = await debugTimed('orchestrator', 'Ranked suggestions', () =>
        recommender.recommend(evidence, summary, this.deps.candidates, config.maxResults, signal),
      );

      // A cancel that lands during the last stage still discards its output
      if (signal?.aborted) {
        throw new CancelledError();
      }

      run.transition('done');
      debug('orchestrator', 'Request complete', {
        userId: request.userId,
        suggestions: suggestions.length,
      });
      return { ok: true, suggestions, evidence, summary, transitions: run.transitions };
    } catch (err) {
      if (err instanceof IllegalTransitionError) throw err;

      const failure = new StageFailure(stage, errorMessage(err), Math.max(1, run.attempts), err);
      run.transition('failed');
      debug('orchestrator', 'Request failed', { userId: request.userId, ...failure.toJSON() });
      return { ok: false, failure, transitions: run.transitions };
    }
  }

  /**
   * Wraps one external call in timeout + retry, counting attempts on the
   * run so a StageFailure can report them.
   */
  private guard<T>(
    run: SuggestionRun,
    operation: string,
    call: (signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const { retry, requestTimeoutMs } = this.deps.config;
    return withRetry(
      (attempt) => {
        run.attempts = attempt;
        return withTimeout(call, requestTimeoutMs, operation, signal);
      },
      retry,
      {
        signal,
        sleep: this.deps.sleep,
        random: this.deps.random,
        onRetry: ({ attempt, delayMs, error }) => {
          debug('orchestrator', 'Retrying external call', {
            operation,
            attempt,
            delayMs: Math.round(delayMs),
            error: errorMessage(error),
          });
        },
      },
    );
  }

  private guardedEmbed(run: SuggestionRun, signal?: AbortSignal): EmbedFn {
    return (text) => this.guard(run, 'embed', (s) => this.deps.engine.embed(text, s), signal);
  }

  /**
   * Generation errors that survive the guard are reported as
   * GenerationUnavailableError so the recommender can fall back to trace
   * text. Cancellation still aborts the request.
   */
  private guardedGenerate(run: SuggestionRun, signal?: AbortSignal): GenerateFn | undefined {
    const generate = this.deps.generate;
    if (!generate) return undefined;

    return async (prompt) => {
      try {
        return await this.guard(run, 'generate', (s) => generate(prompt, s), signal);
      } catch (err) {
        if (err instanceof CancelledError || err instanceof GenerationUnavailableError) throw err;
        throw new GenerationUnavailableError(`Generation failed: ${errorMessage(err)}`, {
          transient: isTransientError(err),
          cause: err,
        });
      }
    };
  }
}
