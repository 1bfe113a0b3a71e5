/**
 * Splits document text into bounded, overlapping chunks.
 *
 * Chunks break on whitespace only, so no word is cut unless a single word
 * is itself longer than the chunk size. Consecutive chunks share up to
 * `overlap` characters of trailing words so a sentence straddling a
 * boundary is retrievable from either side.
 */

export interface ChunkOptions {
  chunkSize: number;
  overlap: number;
}

function splitOversized(word: string, size: number): string[] {
  const pieces: string[] = [];
  for (let i = 0; i < word.length; i += size) {
    pieces.push(word.slice(i, i + size));
  }
  return pieces;
}

/**
 * Every returned chunk has `length <= chunkSize`. Empty or whitespace-only
 * text yields no chunks.
 */
export function chunkText(text: string, { chunkSize, overlap }: ChunkOptions): string[] {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (overlap < 0 || overlap >= chunkSize) {
    throw new RangeError(`overlap must be in [0, chunkSize), got ${overlap}`);
  }

  const words = text
    .split(/\s+/)
    .filter((w) => w.length > 0)
    .flatMap((w) => (w.length > chunkSize ? splitOversized(w, chunkSize) : [w]));

  const chunks: string[] = [];
  let start = 0;

  while (start < words.length) {
    let end = start;
    let length = 0;
    while (end < words.length) {
      const added = (end > start ? 1 : 0) + words[end].length;
      if (length + added > chunkSize) break;
      length += added;
      end++;
    }

    chunks.push(words.slice(start, end).join(' '));
    if (end >= words.length) break;

    // Step back over trailing words that fit in the overlap budget,
    // always leaving the next chunk at least one word further on
    let next = end;
    let carried = 0;
    while (next - 1 > start) {
      const added = words[next - 1].length + (carried > 0 ? 1 : 0);
      if (carried + added > overlap) break;
      carried += added;
      next--;
    }
    start = next;
  }

  return chunks;
}
