import { describe, it, expect } from 'vitest';

import { UnknownConceptError } from '../../shared/errors.js';
import { OntologyGraph, OntologyValidationError } from '../ontology-graph.js';
import type { OntologyNode } from '../types.js';

function node(id: string): OntologyNode {
  return { id, label: id.replace(/_/g, ' '), category: 'behavior' };
}

function ids(nodes: readonly OntologyNode[]): string[] {
  return nodes.map((n) => n.id);
}

// hydration -> energy -> focus, sleep -> stress, sleep ~ exercise
function fixture(): OntologyGraph {
  return new OntologyGraph(
    ['hydration', 'energy', 'focus', 'sleep', 'stress', 'exercise', 'heart_health'].map(node),
    [
      { source: 'hydration', target: 'energy', kind: 'influences', strength: 0.8 },
      { source: 'energy', target: 'focus', kind: 'influences', strength: 0.6 },
      { source: 'sleep', target: 'stress', kind: 'influences' },
      { source: 'sleep', target: 'exercise', kind: 'related_to' },
    ],
  );
}

describe('OntologyGraph.neighbors', () => {
  it('follows influences forward only, within the hop limit', () => {
    const graph = fixture();
    expect(ids(graph.neighbors('hydration', ['influences'], 1))).toEqual(['energy']);
    expect(ids(graph.neighbors('hydration', ['influences'], 2))).toEqual(['energy', 'focus']);
    expect(ids(graph.neighbors('energy', ['influences'], 2))).toEqual(['focus']);
  });

  it('answers influenced_by by walking influences backwards', () => {
    const graph = fixture();
    expect(ids(graph.neighbors('focus', ['influenced_by'], 2))).toEqual(['energy', 'hydration']);
    expect(ids(graph.neighbors('hydration', ['influenced_by'], 2))).toEqual([]);
  });

  it('follows related_to in both directions', () => {
    const graph = fixture();
    expect(ids(graph.neighbors('sleep', ['related_to'], 1))).toEqual(['exercise']);
    expect(ids(graph.neighbors('exercise', ['related_to'], 1))).toEqual(['sleep']);
  });

  it('reaches stress and exercise from sleep', () => {
    const graph = fixture();
    expect(ids(graph.neighbors('sleep', ['influences', 'influenced_by', 'related_to'], 2))).toEqual([
      'stress',
      'exercise',
    ]);
  });

  it('never includes the start concept, even around a cycle', () => {
    const graph = new OntologyGraph(
      ['a', 'b', 'c'].map(node),
      [
        { source: 'a', target: 'b', kind: 'influences' },
        { source: 'b', target: 'c', kind: 'influences' },
        { source: 'c', target: 'a', kind: 'influences' },
      ],
    );
    expect(ids(graph.neighbors('a', ['influences'], 5))).toEqual(['b', 'c']);
  });

  it('returns nothing for zero hops', () => {
    expect(fixture().neighbors('hydration', ['influences'], 0)).toEqual([]);
  });

  it('throws UnknownConceptError for an absent concept', () => {
    expect(() => fixture().neighbors('caffeine', ['influences'], 1)).toThrow(UnknownConceptError);
  });
});

describe('influenced_by source edges', () => {
  it('gives identical results to the equivalent influences edges', () => {
    const forward = new OntologyGraph(['sleep', 'mood'].map(node), [
      { source: 'sleep', target: 'mood', kind: 'influences', strength: 0.8 },
    ]);
    const backward = new OntologyGraph(['sleep', 'mood'].map(node), [
      { source: 'mood', target: 'sleep', kind: 'influenced_by', strength: 0.8 },
    ]);

    expect(backward.edges()).toEqual(forward.edges());
    for (const kind of ['influences', 'influenced_by'] as const) {
      for (const start of ['sleep', 'mood']) {
        expect(backward.traverse(start, [kind], 2)).toEqual(forward.traverse(start, [kind], 2));
      }
    }
  });
});

describe('OntologyGraph.traverse', () => {
  it('records the edge and depth each concept was reached through', () => {
    const steps = fixture().traverse('hydration', ['influences'], 2);
    expect(steps.map((s) => [s.node.id, s.via.id, s.depth])).toEqual([
      ['energy', 'hydration:influences:energy', 1],
      ['focus', 'energy:influences:focus', 2],
    ]);
  });
});

describe('OntologyGraph.edgesBetween', () => {
  it('reports edges from the first concept\'s side', () => {
    const graph = fixture();
    expect(graph.edgesBetween('hydration', 'energy')).toEqual([
      { id: 'hydration:influences:energy', source: 'hydration', target: 'energy', kind: 'influences', strength: 0.8 },
    ]);
    expect(graph.edgesBetween('energy', 'hydration')).toEqual([
      { id: 'hydration:influences:energy', source: 'energy', target: 'hydration', kind: 'influenced_by', strength: 0.8 },
    ]);
    expect(graph.edgesBetween('exercise', 'sleep')).toEqual([
      { id: 'sleep:related_to:exercise', source: 'exercise', target: 'sleep', kind: 'related_to' },
    ]);
  });

  it('is empty for unconnected concepts and throws for unknown ones', () => {
    const graph = fixture();
    expect(graph.edgesBetween('hydration', 'sleep')).toEqual([]);
    expect(() => graph.edgesBetween('hydration', 'caffeine')).toThrow(UnknownConceptError);
  });
});

describe('OntologyGraph.matchConcepts', () => {
  it('matches labels and ids case-insensitively in node order', () => {
    const graph = fixture();
    expect(ids(graph.matchConcepts('How can I SLEEP better and lower stress?'))).toEqual(['sleep', 'stress']);
    expect(ids(graph.matchConcepts('my heart health'))).toEqual(['heart_health']);
    expect(graph.matchConcepts('   ')).toEqual([]);
  });
});

describe('OntologyGraph construction', () => {
  it('rejects self-loops', () => {
    expect(() => new OntologyGraph([node('a')], [{ source: 'a', target: 'a', kind: 'related_to' }])).toThrow(
      OntologyValidationError,
    );
  });

  it('rejects dangling endpoints', () => {
    expect(() => new OntologyGraph([node('a')], [{ source: 'a', target: 'b', kind: 'influences' }])).toThrow(
      'Edge references unknown concept: b',
    );
  });

  it('rejects strengths outside [0, 1]', () => {
    expect(
      () => new OntologyGraph(['a', 'b'].map(node), [{ source: 'a', target: 'b', kind: 'influences', strength: 1.5 }]),
    ).toThrow(OntologyValidationError);
  });

  it('rejects duplicate concept ids', () => {
    expect(() => new OntologyGraph([node('a'), node('a')], [])).toThrow('Duplicate concept id: a');
  });

  it('stores a related_to pair once whichever way it is spelled', () => {
    const graph = new OntologyGraph(['a', 'b'].map(node), [
      { source: 'a', target: 'b', kind: 'related_to' },
      { source: 'b', target: 'a', kind: 'related_to' },
    ]);
    expect(graph.size).toEqual({ nodes: 2, edges: 1 });
  });
});
