/**
 * Vector similarity utilities shared across modules.
 */

/**
 * Cosine similarity in [-1, 1].
 *
 * Zero vectors have no direction; their similarity to anything is 0.
 * Callers are responsible for checking that the lengths agree.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;

  const score = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  // Clamp float drift so identical vectors never report 1.0000000002
  return Math.max(-1, Math.min(1, score));
}

/**
 * Scales a vector to unit length in place. Zero vectors are left as-is.
 */
export function l2Normalize(vector: Float32Array): Float32Array {
  let norm = 0;
  for (let i = 0; i < vector.length; i++) {
    norm += vector[i] * vector[i];
  }
  if (norm === 0) return vector;

  const scale = 1 / Math.sqrt(norm);
  for (let i = 0; i < vector.length; i++) {
    vector[i] *= scale;
  }
  return vector;
}

/**
 * Arithmetic mean. Empty input yields NaN, which callers must not reach.
 */
export function mean(values: readonly number[]): number {
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Population standard deviation.
 */
export function stdDev(values: readonly number[]): number {
  const m = mean(values);
  let sq = 0;
  for (const v of values) sq += (v - m) * (v - m);
  return Math.sqrt(sq / values.length);
}
