/**
 * Text generation through the Claude Agent SDK.
 *
 * Routes phrasing calls through the Agent SDK's one-shot `query()` with no
 * tools, so the model only ever returns text. Every failure surfaces as
 * GenerationUnavailableError carrying a transient flag the retry wrapper
 * can act on.
 */

import { query } from '@anthropic-ai/claude-agent-sdk';

import type { GenerationConfig } from '../config/generation-config.js';
import { debug, errorMessage } from '../shared/debug.js';
import { CancelledError, GenerationUnavailableError, isTransientError } from '../shared/errors.js';
import type { GenerateFn } from '../pipeline/types.js';

const SYSTEM_PROMPT =
  'You phrase health coaching suggestions. Stay within the facts you are given and answer in plain text.';

/**
 * Creates a GenerateFn bound to `config.model`.
 *
 * The caller's signal aborts the underlying SDK call.
 */
export function createGenerator(config: GenerationConfig): GenerateFn {
  return async (prompt, signal) => {
    if (signal?.aborted) {
      throw new CancelledError();
    }

    const abortController = new AbortController();
    const onAbort = (): void => abortController.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const stream = query({
        prompt,
        options: {
          model: config.model,
          systemPrompt: SYSTEM_PROMPT,
          allowedTools: [], // No tools -- pure text completion only
          maxTurns: 1,
          abortController,
        },
      });

      for await (const msg of stream) {
        if (msg.type !== 'result') continue;
        if (msg.subtype === 'success') {
          return msg.result;
        }
        // Runs cut short by turn limits will fail the same way again
        throw new GenerationUnavailableError(`Generation failed: ${msg.subtype}`, {
          transient: msg.subtype === 'error_during_execution',
        });
      }
      throw new GenerationUnavailableError('Generation returned no result');
    } catch (err) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      if (err instanceof GenerationUnavailableError) {
        throw err;
      }
      debug('generate', 'Generation call failed', { error: errorMessage(err) });
      throw new GenerationUnavailableError(`Generation failed: ${errorMessage(err)}`, {
        transient: isTransientError(err),
        cause: err,
      });
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  };
}
