/**
 * Error taxonomy for the suggestion pipeline.
 *
 * Every error raised by the core extends CoachError and states whether a
 * retry could plausibly succeed. The Orchestrator's retry wrapper only
 * consults `isTransientError()`, so classification lives here and nowhere
 * else.
 */

export type PipelineStage = 'analyzing' | 'retrieving' | 'recommending';

export interface CoachErrorOptions {
  transient?: boolean;
  cause?: unknown;
}

export class CoachError extends Error {
  readonly transient: boolean;

  constructor(message: string, options: CoachErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.transient = options.transient ?? false;
  }
}

/** Concept id absent from the ontology. Callers treat it as "no ontology evidence". */
export class UnknownConceptError extends CoachError {
  constructor(readonly conceptId: string) {
    super(`Unknown ontology concept: ${conceptId}`);
  }
}

/** Malformed query: bad top_k, dimensionality or shape mismatch. Never retried. */
export class InvalidQueryError extends CoachError {}

/** Knowledge store queried before its build barrier, or mutated after it. */
export class KnowledgeStoreNotReadyError extends CoachError {}

/** Embedding provider or knowledge store failure. */
export class RetrievalUnavailableError extends CoachError {}

/** External text generation failure. */
export class GenerationUnavailableError extends CoachError {}

/** An external call exceeded the request-level timeout. */
export class TimeoutError extends CoachError {
  constructor(readonly timeoutMs: number, operation: string) {
    super(`${operation} timed out after ${timeoutMs}ms`, { transient: true });
  }
}

/** The caller aborted the request. */
export class CancelledError extends CoachError {
  constructor(reason = 'Request cancelled') {
    super(reason);
  }
}

/** Malformed input at a request boundary. */
export class ValidationError extends CoachError {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
  }
}

/**
 * Wraps a stage's terminal error with the stage that failed.
 * `attempts` counts calls made to the failing external capability
 * (1 when the error was not retried).
 */
export class StageFailure extends CoachError {
  constructor(
    readonly stage: PipelineStage,
    readonly reason: string,
    readonly attempts: number,
    cause: unknown,
  ) {
    super(`${stage} failed: ${reason}`, { cause, transient: isTransientError(cause) });
  }

  toJSON(): { stage: PipelineStage; reason: string; attempts: number; transient: boolean; kind: string } {
    return {
      stage: this.stage,
      reason: this.reason,
      attempts: this.attempts,
      transient: this.transient,
      kind: this.cause instanceof Error ? this.cause.name : 'Error',
    };
  }
}

// =============================================================================
// Transient classification
// =============================================================================

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EPIPE',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

const TRANSIENT_MESSAGE = /rate.?limit|overloaded|too many requests|temporarily unavailable|socket hang up/i;

function readField(err: object, key: string): unknown {
  return key in err ? (err as Record<string, unknown>)[key] : undefined;
}

/**
 * Returns true for failures a retry could resolve: rate limits, timeouts
 * and connection resets. Malformed input and dimension mismatches are
 * never transient.
 */
export function isTransientError(err: unknown): boolean {
  if (err instanceof CoachError) {
    return err.transient;
  }
  if (err === null || typeof err !== 'object') {
    return false;
  }

  const code = readField(err, 'code');
  if (typeof code === 'string' && TRANSIENT_CODES.has(code)) {
    return true;
  }

  const status = readField(err, 'status');
  if (typeof status === 'number' && (status === 408 || status === 429 || status >= 500)) {
    return true;
  }

  if (err instanceof Error) {
    // AbortSignal.timeout() rejects with a DOMException named TimeoutError
    if (err.name === 'TimeoutError') {
      return true;
    }
    if (err.name === 'AbortError') {
      return false;
    }
    if (TRANSIENT_MESSAGE.test(err.message)) {
      return true;
    }
    if (err.cause !== undefined && err.cause !== err) {
      return isTransientError(err.cause);
    }
  }

  return false;
}
