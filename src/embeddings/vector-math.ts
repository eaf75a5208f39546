/**
 * Vector Operations
 */

import type { EmbeddingVector } from './types';

export function dotProduct(a: EmbeddingVector, b: EmbeddingVector): number {
  let result = 0;
  for (let i = 0; i < a.length; i++) result += a[i] * b[i];
  return result;
}

export function vectorNorm(v: EmbeddingVector): number {
  return Math.sqrt(dotProduct(v, v));
}

/**
 * Scale a vector to unit length. A zero vector is returned unchanged.
 */
export function normalize(v: EmbeddingVector): EmbeddingVector {
  const norm = vectorNorm(v);
  if (norm === 0) return v;
  return v.map(x => x / norm);
}

/**
 * Cosine similarity in [-1, 1]; 0 when either side has no magnitude.
 * Pass precomputed norms to skip recomputing them on every comparison.
 */
export function cosineSimilarity(
  a: EmbeddingVector,
  b: EmbeddingVector,
  normA: number = vectorNorm(a),
  normB: number = vectorNorm(b)
): number {
  if (a.length !== b.length) return 0;
  if (normA === 0 || normB === 0) return 0;
  const score = dotProduct(a, b) / (normA * normB);
  // Rounding can push parallel vectors a hair past 1
  return Math.max(-1, Math.min(1, score));
}

export function isZeroVector(v: EmbeddingVector): boolean {
  return v.every(x => x === 0);
}
