/**
 * Vector Math Tests
 */

import { cosineSimilarity, dotProduct, isZeroVector, normalize, vectorNorm } from '../vector-math';

describe('vector math', () => {
  it('should compute dot products and norms', () => {
    expect(dotProduct([1, 2, 3], [4, 5, 6])).toBe(32);
    expect(vectorNorm([3, 4])).toBe(5);
  });

  it('should normalize to unit length', () => {
    expect(normalize([3, 4])).toEqual([0.6, 0.8]);
  });

  it('should leave a zero vector unchanged', () => {
    expect(normalize([0, 0])).toEqual([0, 0]);
    expect(isZeroVector([0, 0])).toBe(true);
    expect(isZeroVector([0, 1])).toBe(false);
  });

  it('should compute cosine similarity', () => {
    expect(cosineSimilarity([1, 0], [2, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('should return 0 for zero vectors and mismatched lengths', () => {
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
  });
});
