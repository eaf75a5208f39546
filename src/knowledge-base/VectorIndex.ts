/**
 * Vector Index
 *
 * Exact brute-force cosine index. Holds one vector per document id and
 * answers k-nearest-neighbour queries with a deterministic order: descending
 * score, then earlier insertion first.
 */

import { IndexConfigurationError } from '../errors';
import type { EmbeddingVector } from '../embeddings/types';
import { cosineSimilarity, vectorNorm } from '../embeddings/vector-math';
import type { IndexEntry, QueryHit } from './types';

export class VectorIndex {
  private entries: Map<string, IndexEntry> = new Map();
  private nextSequence = 0;
  private fixedDimension: number | null;

  /**
   * @param dimension - Fixes the vector length up front; when omitted the
   *   first insert fixes it for the lifetime of the index.
   */
  constructor(dimension?: number) {
    this.fixedDimension = dimension ?? null;
  }

  get dimension(): number | null {
    return this.fixedDimension;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Insert or overwrite the vector for a document. An overwrite retires the
   * old entry; the new one ranks as the latest insertion.
   */
  insert(documentId: string, vector: EmbeddingVector): void {
    this.assertDimension(vector);

    if (this.fixedDimension === null) {
      this.fixedDimension = vector.length;
    }

    this.entries.delete(documentId);
    this.entries.set(documentId, {
      documentId,
      vector: [...vector],
      norm: vectorNorm(vector),
      sequence: this.nextSequence++,
    });
  }

  remove(documentId: string): boolean {
    return this.entries.delete(documentId);
  }

  has(documentId: string): boolean {
    return this.entries.has(documentId);
  }

  /**
   * Top-k entries by cosine similarity to `vector`. Entries rejected by
   * `accept` are not ranked.
   */
  query(vector: EmbeddingVector, k: number, accept?: (documentId: string) => boolean): QueryHit[] {
    if (k <= 0 || this.entries.size === 0) {
      return [];
    }
    this.assertDimension(vector);

    const queryNorm = vectorNorm(vector);
    const scored: Array<{ entry: IndexEntry; score: number }> = [];

    for (const entry of this.entries.values()) {
      if (accept && !accept(entry.documentId)) continue;
      scored.push({ entry, score: cosineSimilarity(vector, entry.vector, queryNorm, entry.norm) });
    }

    scored.sort((a, b) => b.score - a.score || a.entry.sequence - b.entry.sequence);

    return scored.slice(0, k).map(({ entry, score }) => ({ documentId: entry.documentId, score }));
  }

  /**
   * Entries in insertion order, for persistence
   */
  *list(): IterableIterator<IndexEntry> {
    yield* this.entries.values();
  }

  clear(): void {
    this.entries.clear();
  }

  private assertDimension(vector: EmbeddingVector): void {
    if (this.fixedDimension !== null && vector.length !== this.fixedDimension) {
      throw new IndexConfigurationError(this.fixedDimension, vector.length);
    }
  }
}
