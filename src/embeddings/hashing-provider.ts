/**
 * Hashing Embeddings
 *
 * Local, dependency-free embedder for the lightweight mode: word tokens are
 * hashed into a fixed number of buckets and the counts are L2-normalized.
 * Similar wording yields similar vectors; there is no semantic model behind it.
 */

import { ProviderError } from '../errors';
import type { EmbeddingProvider, EmbeddingVector } from './types';
import { normalizeEmbeddingInput, tokenize } from './text';
import { normalize } from './vector-math';

export const DEFAULT_HASHING_DIMENSION = 384;

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * 32-bit FNV-1a hash of a string's UTF-16 code units
 */
export function fnv1a(input: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'hashing-bow';
  readonly dimension: number;

  constructor(dimension: number = DEFAULT_HASHING_DIMENSION) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new ProviderError(`Invalid embedding dimension: ${dimension}`, 'DIMENSION_MISMATCH', {
        dimension,
      });
    }
    this.dimension = dimension;
  }

  async embed(text: string): Promise<EmbeddingVector> {
    return this.embedSync(text);
  }

  async embedBatch(texts: string[]): Promise<EmbeddingVector[]> {
    return texts.map(text => this.embedSync(text));
  }

  private embedSync(text: string): EmbeddingVector {
    const normalized = normalizeEmbeddingInput(text);
    const tokens = tokenize(normalized);

    if (tokens.length === 0) {
      throw new ProviderError('Embedding input contains no word tokens', 'ZERO_VECTOR', {
        preview: normalized.slice(0, 50),
      });
    }

    const buckets: number[] = new Array(this.dimension).fill(0);
    for (const token of tokens) {
      buckets[fnv1a(token) % this.dimension] += 1;
    }

    return normalize(buckets);
  }
}
