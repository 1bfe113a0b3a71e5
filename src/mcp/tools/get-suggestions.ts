/**
 * MCP tool: personalized suggestions for a user.
 *
 * Runs one orchestrator request and stores the result in the suggestion
 * history. Pipeline failures come back as an error result naming the
 * stage, never as partial suggestions.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import type { Orchestrator, SuggestionOutcome } from '../../pipeline/orchestrator.js';
import { debug, errorMessage } from '../../shared/debug.js';
import type { SuggestionRepository } from '../../storage/suggestions.js';

export const DEFAULT_QUERY = 'Give me personalized health recommendations';

function textResponse(text: string) {
  return { content: [{ type: 'text' as const, text }] };
}

function errorResponse(text: string) {
  return { content: [{ type: 'text' as const, text }], isError: true };
}

/**
 * Formats an outcome for the model: one numbered line per suggestion with
 * its score and trace ids, or the failing stage.
 */
export function formatOutcome(outcome: SuggestionOutcome): string {
  if (!outcome.ok) {
    const f = outcome.failure;
    return `Suggestion request failed at ${f.stage} after ${f.attempts} attempt${f.attempts === 1 ? '' : 's'}: ${f.reason}${f.transient ? ' (transient, retry later)' : ''}`;
  }

  const lines: string[] = [`## Suggestions`, `Summary: ${outcome.summary.digest}`, ''];
  if (outcome.suggestions.length === 0) {
    lines.push('No confident suggestion for this query.');
    return lines.join('\n');
  }

  outcome.suggestions.forEach((s, i) => {
    lines.push(`${i + 1}. [${s.category}] ${s.text} (score ${s.score.toFixed(2)})`);
    const cites = [...s.trace.chunkIds, ...s.trace.relationIds];
    if (cites.length > 0) {
      lines.push(`   evidence: ${cites.join(', ')}`);
    }
    if (s.trace.signals.length > 0) {
      lines.push(`   signals: ${s.trace.signals.join(', ')}`);
    }
  });
  return lines.join('\n');
}

export function registerGetSuggestions(
  server: McpServer,
  orchestrator: Orchestrator,
  suggestions: SuggestionRepository,
): void {
  server.registerTool(
    'get_suggestions',
    {
      title: 'Get Health Suggestions',
      description:
        'Get explainable, personalized health suggestions for a user from their recent logs, the knowledge base and the concept ontology.',
      inputSchema: {
        user_id: z.string().min(1).describe('User whose logs drive the suggestions'),
        query: z
          .string()
          .min(1)
          .optional()
          .describe(`Free-text question (default: "${DEFAULT_QUERY}")`),
      },
    },
    async (args) => {
      const query = args.query ?? DEFAULT_QUERY;
      try {
        debug('mcp', 'get_suggestions: request', { userId: args.user_id });
        const outcome = await orchestrator.suggest({ userId: args.user_id, query });
        if (!outcome.ok) {
          return errorResponse(formatOutcome(outcome));
        }
        suggestions.saveAll(args.user_id, query, outcome.suggestions);
        return textResponse(formatOutcome(outcome));
      } catch (err) {
        const message = errorMessage(err);
        debug('mcp', 'get_suggestions: error', { error: message });
        return errorResponse(`Suggestion error: ${message}`);
      }
    },
  );
}
