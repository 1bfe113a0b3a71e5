/**
 * MCP tool: walk the concept ontology from one concept.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import type { OntologyGraph } from '../../ontology/ontology-graph.js';
import { RELATION_KINDS, type RelationKind } from '../../ontology/types.js';
import { debug } from '../../shared/debug.js';

export interface ExploreArgs {
  concept: string;
  relationKinds?: RelationKind[];
  maxHops: number;
}

/**
 * Lists concepts reachable from `concept`, one line per hop with the edge
 * that reached it. Unknown concepts return null.
 */
export function exploreOntology(ontology: OntologyGraph, args: ExploreArgs): string | null {
  const kinds = args.relationKinds && args.relationKinds.length > 0 ? args.relationKinds : RELATION_KINDS;

  if (!ontology.hasConcept(args.concept)) return null;

  const root = ontology.getNode(args.concept);
  const steps = ontology.traverse(args.concept, kinds, args.maxHops);
  const lines = [`## ${root.label} (${root.category})`];
  if (steps.length === 0) {
    lines.push('No related concepts within range.');
    return lines.join('\n');
  }
  for (const step of steps) {
    const strength = step.via.strength === undefined ? '' : ` [${step.via.strength}]`;
    lines.push(
      `- hop ${step.depth}: ${step.node.label} (${step.node.category}) via ${step.via.source} ${step.via.kind} ${step.via.target}${strength}`,
    );
  }
  return lines.join('\n');
}

export function registerExploreOntology(server: McpServer, ontology: OntologyGraph): void {
  server.registerTool(
    'explore_ontology',
    {
      title: 'Explore Health Ontology',
      description:
        'List health concepts related to a concept (e.g. "sleep") by influence and association, up to a hop limit.',
      inputSchema: {
        concept: z.string().min(1).describe('Concept id, e.g. "sleep" or "heart_health"'),
        relation_kinds: z
          .array(z.enum(RELATION_KINDS))
          .optional()
          .describe(`Relation kinds to follow: ${RELATION_KINDS.join(', ')} (default: all)`),
        max_hops: z
          .number()
          .int()
          .min(1)
          .max(4)
          .default(2)
          .describe('Traversal depth (default: 2, max: 4)'),
      },
    },
    async (args) => {
      debug('mcp', 'explore_ontology: request', { concept: args.concept });
      const text = exploreOntology(ontology, {
        concept: args.concept,
        relationKinds: args.relation_kinds,
        maxHops: args.max_hops,
      });
      if (text === null) {
        const known = ontology.nodes().map((n) => n.id).join(', ');
        return {
          content: [{ type: 'text' as const, text: `Unknown concept "${args.concept}". Known concepts: ${known}` }],
          isError: true,
        };
      }
      return { content: [{ type: 'text' as const, text }] };
    },
  );
}
