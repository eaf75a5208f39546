/**
 * Document Store
 *
 * In-memory map of canonical documents keyed by id, iterated in insertion order.
 */

import type { Document } from './types';

export class DocumentStore {
  private documents: Map<string, Document> = new Map();

  get size(): number {
    return this.documents.size;
  }

  /**
   * Store a document, replacing any previous version with the same id.
   * A replaced document keeps its original position in `list()`.
   */
  put(document: Document): string {
    this.documents.set(document.id, document);
    return document.id;
  }

  get(id: string): Document | undefined {
    return this.documents.get(id);
  }

  has(id: string): boolean {
    return this.documents.has(id);
  }

  delete(id: string): boolean {
    return this.documents.delete(id);
  }

  /**
   * True when `id` holds a document with the same title, content and url
   */
  isIdentical(id: string, candidate: Pick<Document, 'title' | 'content' | 'url'>): boolean {
    const existing = this.documents.get(id);
    return (
      existing !== undefined &&
      existing.title === candidate.title &&
      existing.content === candidate.content &&
      existing.url === candidate.url
    );
  }

  /**
   * Lazy iteration in insertion order; each call starts over
   */
  *list(): IterableIterator<Document> {
    yield* this.documents.values();
  }

  clear(): void {
    this.documents.clear();
  }
}
