/**
 * In-memory health concept graph.
 *
 * Built once from typed node/edge collections and read-only afterwards,
 * so one instance is shared by every concurrent request.
 *
 * Storage is canonical: an `influenced_by` edge A->B is stored as
 * `influences` B->A. The `influenced_by` relation kind is then answered by
 * walking `influences` edges backwards, which makes query results identical
 * whichever way the source data spelled the relation.
 */

import { UnknownConceptError } from '../shared/errors.js';
import {
  edgeId,
  type OntologyEdge,
  type OntologyNode,
  type RelationKind,
  type TraversalStep,
} from './types.js';

/** Thrown at construction for data that violates graph invariants. */
export class OntologyValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OntologyValidationError';
  }
}

export interface EdgeInput {
  source: string;
  target: string;
  kind: RelationKind;
  strength?: number;
}

interface Adjacency {
  out: OntologyEdge[];
  in: OntologyEdge[];
}

function canonicalize(input: EdgeInput): OntologyEdge {
  const flipped = input.kind === 'influenced_by';
  const source = flipped ? input.target : input.source;
  const target = flipped ? input.source : input.target;
  const kind: RelationKind = flipped ? 'influences' : input.kind;

  const edge: OntologyEdge = { id: edgeId(source, kind, target), source, target, kind };
  return input.strength === undefined ? edge : { ...edge, strength: input.strength };
}

/** related_to is symmetric: a->b and b->a are the same relation. */
function dedupKey(edge: OntologyEdge): string {
  if (edge.kind === 'related_to' && edge.target < edge.source) {
    return edgeId(edge.target, edge.kind, edge.source);
  }
  return edge.id;
}

export class OntologyGraph {
  private readonly nodesById = new Map<string, OntologyNode>();
  private readonly adjacency = new Map<string, Adjacency>();
  private readonly edgeList: OntologyEdge[] = [];

  constructor(nodes: readonly OntologyNode[], edges: readonly EdgeInput[]) {
    for (const node of nodes) {
      if (this.nodesById.has(node.id)) {
        throw new OntologyValidationError(`Duplicate concept id: ${node.id}`);
      }
      this.nodesById.set(node.id, Object.freeze({ ...node }));
      this.adjacency.set(node.id, { out: [], in: [] });
    }

    const seen = new Set<string>();
    for (const input of edges) {
      if (input.source === input.target) {
        throw new OntologyValidationError(`Self-loop on concept: ${input.source}`);
      }
      for (const endpoint of [input.source, input.target]) {
        if (!this.nodesById.has(endpoint)) {
          throw new OntologyValidationError(`Edge references unknown concept: ${endpoint}`);
        }
      }
      if (input.strength !== undefined && !(input.strength >= 0 && input.strength <= 1)) {
        throw new OntologyValidationError(
          `Edge strength must be in [0, 1]: ${input.source} -> ${input.target} (${input.strength})`,
        );
      }

      const edge = Object.freeze(canonicalize(input));
      const key = dedupKey(edge);
      if (seen.has(key)) continue;
      seen.add(key);

      this.edgeList.push(edge);
      this.adjacencyOf(edge.source).out.push(edge);
      this.adjacencyOf(edge.target).in.push(edge);
    }
  }

  get size(): { nodes: number; edges: number } {
    return { nodes: this.nodesById.size, edges: this.edgeList.length };
  }

  nodes(): readonly OntologyNode[] {
    return [...this.nodesById.values()];
  }

  edges(): readonly OntologyEdge[] {
    return [...this.edgeList];
  }

  hasConcept(conceptId: string): boolean {
    return this.nodesById.has(conceptId);
  }

  getNode(conceptId: string): OntologyNode {
    const node = this.nodesById.get(conceptId);
    if (!node) {
      throw new UnknownConceptError(conceptId);
    }
    return node;
  }

  /**
   * Breadth-first walk from `conceptId` along the given relation kinds,
   * up to `maxHops`. Each reachable concept appears once, at its shortest
   * distance, with the edge it was first reached through. The start
   * concept is never included.
   */
  traverse(
    conceptId: string,
    relationKinds: Iterable<RelationKind>,
    maxHops: number,
  ): TraversalStep[] {
    this.getNode(conceptId);

    const kinds = new Set(relationKinds);
    const visited = new Set<string>([conceptId]);
    const steps: TraversalStep[] = [];
    let frontier = [conceptId];

    for (let depth = 1; depth <= maxHops && frontier.length > 0; depth++) {
      const next: string[] = [];
      for (const current of frontier) {
        for (const [neighborId, via] of this.step(current, kinds)) {
          if (visited.has(neighborId)) continue;
          visited.add(neighborId);
          steps.push({ node: this.getNode(neighborId), via, depth });
          next.push(neighborId);
        }
      }
      frontier = next;
    }

    return steps;
  }

  /**
   * Concepts reachable from `conceptId` within `maxHops` along the given
   * relation kinds.
   *
   * @throws UnknownConceptError when `conceptId` is not in the graph
   */
  neighbors(
    conceptId: string,
    relationKinds: Iterable<RelationKind>,
    maxHops: number,
  ): OntologyNode[] {
    return this.traverse(conceptId, relationKinds, maxHops).map((s) => s.node);
  }

  /**
   * Edges joining `a` and `b`, read from `a`'s side: an `influences` edge
   * b->a comes back as `influenced_by` a->b, keeping the stored edge id.
   *
   * @throws UnknownConceptError when either concept is not in the graph
   */
  edgesBetween(a: string, b: string): OntologyEdge[] {
    this.getNode(a);
    this.getNode(b);

    const result: OntologyEdge[] = [];
    for (const edge of this.adjacencyOf(a).out) {
      if (edge.target === b) result.push(edge);
    }
    for (const edge of this.adjacencyOf(a).in) {
      if (edge.source !== b) continue;
      const kind: RelationKind = edge.kind === 'influences' ? 'influenced_by' : edge.kind;
      result.push({ ...edge, source: a, target: b, kind });
    }
    return result;
  }

  /**
   * Concepts whose label or id (underscores read as spaces) occurs in
   * `text`, case-insensitively, in node order.
   */
  matchConcepts(text: string): OntologyNode[] {
    const haystack = text.toLowerCase();
    if (haystack.trim().length === 0) return [];

    return this.nodes().filter((node) => {
      const label = node.label.toLowerCase();
      const idPhrase = node.id.toLowerCase().replace(/_/g, ' ');
      return haystack.includes(label) || haystack.includes(idPhrase);
    });
  }

  private *step(
    current: string,
    kinds: ReadonlySet<RelationKind>,
  ): Generator<[string, OntologyEdge]> {
    const adj = this.adjacencyOf(current);
    for (const edge of adj.out) {
      if (edge.kind === 'influences' && kinds.has('influences')) yield [edge.target, edge];
      if (edge.kind === 'related_to' && kinds.has('related_to')) yield [edge.target, edge];
    }
    for (const edge of adj.in) {
      if (edge.kind === 'influences' && kinds.has('influenced_by')) yield [edge.source, edge];
      if (edge.kind === 'related_to' && kinds.has('related_to')) yield [edge.source, edge];
    }
  }

  private adjacencyOf(conceptId: string): Adjacency {
    const adj = this.adjacency.get(conceptId);
    if (!adj) {
      throw new UnknownConceptError(conceptId);
    }
    return adj;
  }
}
