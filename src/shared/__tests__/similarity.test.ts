import { describe, it, expect } from 'vitest';

import { cosineSimilarity, l2Normalize, mean, stdDev } from '../similarity.js';

describe('cosineSimilarity', () => {
  it('is 1 for identical directions and -1 for opposite ones', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [-3, 0])).toBe(-1);
  });

  it('is 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 0, 0], [0, 1, 0])).toBe(0);
  });

  it('is 0 when either vector is zero', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity(new Float32Array(3), new Float32Array(3))).toBe(0);
  });
});

describe('l2Normalize', () => {
  it('scales to unit length in place', () => {
    const v = Float32Array.from([3, 4]);
    const out = l2Normalize(v);
    expect(out).toBe(v);
    expect(v[0]).toBeCloseTo(0.6, 6);
    expect(v[1]).toBeCloseTo(0.8, 6);
  });

  it('leaves zero vectors alone', () => {
    expect(Array.from(l2Normalize(new Float32Array(2)))).toEqual([0, 0]);
  });
});

describe('mean / stdDev', () => {
  it('computes the population standard deviation', () => {
    expect(mean([2, 4, 4, 4, 5, 5, 7, 9])).toBe(5);
    expect(stdDev([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
  });
});
