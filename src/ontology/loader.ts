/**
 * Loads the ontology from a static JSON source.
 *
 * The bundled data/ontology.json ships with the package; callers may pass
 * another path (fixtures, a curated variant) with the same shape.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { debug } from '../shared/debug.js';
import { OntologyGraph, OntologyValidationError } from './ontology-graph.js';
import { CONCEPT_CATEGORIES, RELATION_KINDS } from './types.js';

export const DEFAULT_ONTOLOGY_PATH = fileURLToPath(
  new URL('../../data/ontology.json', import.meta.url),
);

const OntologySourceSchema = z.object({
  nodes: z.array(
    z.object({
      id: z.string().regex(/^[a-z][a-z0-9_]*$/, 'concept ids are lower_snake_case'),
      label: z.string().min(1),
      category: z.enum(CONCEPT_CATEGORIES),
    }),
  ),
  edges: z.array(
    z.object({
      source: z.string(),
      target: z.string(),
      kind: z.enum(RELATION_KINDS),
      strength: z.number().min(0).max(1).optional(),
    }),
  ),
});

export type OntologySource = z.infer<typeof OntologySourceSchema>;

/**
 * Builds a graph from already-parsed source data.
 *
 * @throws OntologyValidationError on schema or graph invariant violations
 */
export function buildOntology(source: unknown): OntologyGraph {
  const parsed = OntologySourceSchema.safeParse(source);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new OntologyValidationError(
      `Invalid ontology source at ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'unknown'}`,
    );
  }
  return new OntologyGraph(parsed.data.nodes, parsed.data.edges);
}

export function loadOntology(path: string = DEFAULT_ONTOLOGY_PATH): OntologyGraph {
  const graph = buildOntology(JSON.parse(readFileSync(path, 'utf-8')));
  debug('ontology', 'Ontology loaded', { path, ...graph.size });
  return graph;
}
