/**
 * Type definitions for the health concept ontology.
 *
 * Relation kinds and concept categories are fixed const arrays with
 * derived union types (not enums), so the JSON loader can validate
 * against the same source of truth.
 */

// =============================================================================
// Relation Kinds (FIXED)
// =============================================================================

export const RELATION_KINDS = ['influences', 'influenced_by', 'related_to'] as const;

export type RelationKind = (typeof RELATION_KINDS)[number];

// =============================================================================
// Concept Categories
// =============================================================================

export const CONCEPT_CATEGORIES = [
  'behavior',
  'physiology',
  'wellbeing',
  'outcome',
] as const;

export type ConceptCategory = (typeof CONCEPT_CATEGORIES)[number];

// =============================================================================
// Node / Edge
// =============================================================================

/**
 * A health concept, e.g. "hydration" or "sleep". Immutable, loaded once.
 */
export interface OntologyNode {
  readonly id: string;
  readonly label: string;
  readonly category: ConceptCategory;
}

/**
 * A directed, typed relation between two concepts.
 *
 * - id: `source:kind:target` of the stored (canonical) edge, stable across
 *   loads so reasoning traces can cite it
 * - strength: optional weight in [0, 1]
 */
export interface OntologyEdge {
  readonly id: string;
  readonly source: string;
  readonly target: string;
  readonly kind: RelationKind;
  readonly strength?: number;
}

/**
 * One BFS step: the node reached, the edge it was reached through and its
 * hop distance from the start concept.
 */
export interface TraversalStep {
  node: OntologyNode;
  via: OntologyEdge;
  depth: number;
}

// =============================================================================
// Type Guards
// =============================================================================

export function isRelationKind(s: string): s is RelationKind {
  return (RELATION_KINDS as readonly string[]).includes(s);
}

export function edgeId(source: string, kind: RelationKind, target: string): string {
  return `${source}:${kind}:${target}`;
}
