import { describe, it, expect } from 'vitest';

import { chunkText } from '../chunker.js';

describe('chunkText', () => {
  it('packs whole words up to the chunk size', () => {
    expect(chunkText('alpha beta gamma delta epsilon', { chunkSize: 12, overlap: 0 })).toEqual([
      'alpha beta',
      'gamma delta',
      'epsilon',
    ]);
  });

  it('carries trailing words into the next chunk within the overlap budget', () => {
    expect(chunkText('alpha beta gamma delta epsilon', { chunkSize: 12, overlap: 6 })).toEqual([
      'alpha beta',
      'beta gamma',
      'gamma delta',
      'delta',
      'epsilon',
    ]);
  });

  it('returns a short text as a single chunk', () => {
    expect(chunkText('  Drink water\n\tdaily. ', { chunkSize: 512, overlap: 50 })).toEqual(['Drink water daily.']);
  });

  it('splits a word longer than the chunk size', () => {
    expect(chunkText('abcdefghij', { chunkSize: 4, overlap: 0 })).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('never exceeds the chunk size and always advances', () => {
    const text = Array.from({ length: 200 }, (_, i) => `word${i}`).join(' ');
    const chunks = chunkText(text, { chunkSize: 40, overlap: 15 });
    expect(chunks.every((c) => c.length <= 40)).toBe(true);
    expect(chunks[chunks.length - 1].endsWith('word199')).toBe(true);
  });

  it('yields nothing for blank text', () => {
    expect(chunkText(' \n ', { chunkSize: 10, overlap: 0 })).toEqual([]);
  });

  it('rejects invalid sizes', () => {
    expect(() => chunkText('x', { chunkSize: 0, overlap: 0 })).toThrow(RangeError);
    expect(() => chunkText('x', { chunkSize: 10, overlap: 10 })).toThrow(RangeError);
  });
});
