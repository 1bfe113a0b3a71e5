/**
 * Remote embedding engine for OpenAI-compatible `/embeddings` endpoints.
 *
 * Uses the global fetch. HTTP and network failures are raised as
 * RetrievalUnavailableError with the transient flag derived from the
 * status code or socket error, so the orchestrator retries rate limits
 * and resets but not bad requests.
 */

import { z } from 'zod';

import type { EmbeddingEngine } from '../embedder.js';
import { debug, errorMessage } from '../../shared/debug.js';
import {
  InvalidQueryError,
  RetrievalUnavailableError,
  isTransientError,
} from '../../shared/errors.js';

const EmbeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        index: z.number().int().nonnegative(),
        embedding: z.array(z.number()),
      }),
    )
    .min(1),
});

export interface HttpEmbeddingOptions {
  url: string;
  model: string;
  apiKey: string | null;
  /** Known dimensions; when null, learned from a probe during initialize(). */
  dimensions: number | null;
}

/**
 * Error from the embedding endpoint with the HTTP status attached.
 * 408, 429 and 5xx are transient.
 */
export class EmbeddingHttpError extends RetrievalUnavailableError {
  constructor(
    readonly status: number,
    body: string,
  ) {
    super(`Embedding endpoint returned ${status}: ${body.slice(0, 200)}`, {
      transient: status === 408 || status === 429 || status >= 500,
    });
  }
}

export class HttpEmbeddingEngine implements EmbeddingEngine {
  private ready = false;
  private dims: number;

  constructor(private readonly options: HttpEmbeddingOptions) {
    this.dims = options.dimensions ?? 0;
  }

  async initialize(): Promise<boolean> {
    try {
      const [probe] = await this.request(['dimension probe']);
      if (this.dims !== 0 && probe.length !== this.dims) {
        debug('embed', 'Configured dimensions disagree with endpoint', {
          configured: this.dims,
          actual: probe.length,
        });
        return false;
      }
      this.dims = probe.length;
      this.ready = true;
      debug('embed', 'HTTP embedding engine ready', { model: this.options.model, dimensions: this.dims });
      return true;
    } catch (err) {
      debug('embed', 'HTTP embedding engine failed to initialize', { error: errorMessage(err) });
      this.ready = false;
      return false;
    }
  }

  async embed(text: string, signal?: AbortSignal): Promise<Float32Array> {
    const [vector] = await this.embedBatch([text], signal);
    return vector;
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<Float32Array[]> {
    if (texts.length === 0) {
      return [];
    }
    if (!this.ready) {
      throw new RetrievalUnavailableError('HTTP embedding engine is not initialized');
    }

    // Empty strings are rejected by most endpoints; they embed to zero vectors
    const nonEmpty = texts.map((t, i) => ({ t, i })).filter(({ t }) => t.trim().length > 0);
    const results: Float32Array[] = texts.map(() => new Float32Array(this.dims));
    if (nonEmpty.length === 0) {
      return results;
    }

    const vectors = await this.request(nonEmpty.map(({ t }) => t), signal);
    vectors.forEach((vector, k) => {
      if (vector.length !== this.dims) {
        throw new InvalidQueryError(
          `Embedding endpoint returned ${vector.length} dimensions, expected ${this.dims}`,
        );
      }
      results[nonEmpty[k].i] = vector;
    });
    return results;
  }

  dimensions(): number {
    return this.dims;
  }

  name(): string {
    return `http-${this.options.model}`;
  }

  isReady(): boolean {
    return this.ready;
  }

  private async request(input: string[], signal?: AbortSignal): Promise<Float32Array[]> {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.options.apiKey) {
      headers.authorization = `Bearer ${this.options.apiKey}`;
    }

    let response: Response;
    try {
      response = await fetch(this.options.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ model: this.options.model, input }),
        signal,
      });
    } catch (err) {
      if (signal?.aborted) {
        throw err;
      }
      // undici reports socket failures as TypeError('fetch failed') with the code on .cause
      throw new RetrievalUnavailableError(`Embedding request failed: ${errorMessage(err)}`, {
        transient: isTransientError(err) || err instanceof TypeError,
        cause: err,
      });
    }

    if (!response.ok) {
      throw new EmbeddingHttpError(response.status, await response.text());
    }

    const parsed = EmbeddingResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new RetrievalUnavailableError(
        `Malformed embedding response: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`,
      );
    }

    const ordered = [...parsed.data.data].sort((a, b) => a.index - b.index);
    if (ordered.length !== input.length) {
      throw new RetrievalUnavailableError(
        `Embedding endpoint returned ${ordered.length} vectors for ${input.length} inputs`,
      );
    }
    return ordered.map((d) => Float32Array.from(d.embedding));
  }
}
