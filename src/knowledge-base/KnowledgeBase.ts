/**
 * Knowledge Base
 *
 * Keeps the document store and the vector index in lockstep. Every write goes
 * through one write lock and updates both structures in a single synchronous
 * step, so a reader can never observe a vector without its document or the
 * other way round. Reads are synchronous and take no lock.
 */

import { IndexConsistencyError, SnapshotError } from '../errors';
import type { EmbeddingVector } from '../embeddings/types';
import type { Logger } from '../logger';
import { NullLogger } from '../logger';
import { DocumentStore } from './DocumentStore';
import { VectorIndex } from './VectorIndex';
import { WriteLock } from './write-lock';
import { matchesFilter } from './metadata';
import type {
  Document,
  KnowledgeBaseSnapshot,
  KnowledgeBaseStats,
  MetadataFilter,
  ResolvedHit,
} from './types';

export const SNAPSHOT_VERSION = 1;

export type CommitOutcome = 'inserted' | 'replaced' | 'skipped';

export interface KnowledgeBaseOptions {
  /** Fix the vector dimension up front */
  dimension?: number;
  lockTimeoutMs?: number;
  logger?: Logger;
}

export class KnowledgeBase {
  private readonly store = new DocumentStore();
  private readonly index: VectorIndex;
  private readonly lock: WriteLock;
  private readonly logger: Logger;
  private revision = 0;

  constructor(options: KnowledgeBaseOptions = {}) {
    this.index = new VectorIndex(options.dimension);
    this.lock = new WriteLock(options.lockTimeoutMs);
    this.logger = options.logger ?? new NullLogger();
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  get dimension(): number | null {
    return this.index.dimension;
  }

  /**
   * Bumped by every write that changes the contents. Results computed under
   * one version must not be cached once it has moved on.
   */
  get version(): number {
    return this.revision;
  }

  get(id: string): Document | undefined {
    return this.store.get(id);
  }

  isIdentical(id: string, candidate: Pick<Document, 'title' | 'content' | 'url'>): boolean {
    return this.store.isIdentical(id, candidate);
  }

  listDocuments(): IterableIterator<Document> {
    return this.store.list();
  }

  /**
   * Nearest documents to `vector`, restricted to `filter` when given. Index
   * entries without a document are logged and left out of the result.
   */
  query(vector: EmbeddingVector, k: number, filter?: MetadataFilter): ResolvedHit[] {
    const accept = filter
      ? (documentId: string) => {
          const document = this.store.get(documentId);
          return document === undefined || matchesFilter(document.metadata, filter);
        }
      : undefined;
    const hits = this.index.query(vector, k, accept);
    const resolved: ResolvedHit[] = [];

    for (const hit of hits) {
      const document = this.store.get(hit.documentId);
      if (!document) {
        const problem = new IndexConsistencyError(hit.documentId);
        this.logger.error(problem.message, problem.toJSON());
        continue;
      }
      resolved.push({ document, score: hit.score });
    }

    return resolved;
  }

  /**
   * True while both structures hold the same number of records
   */
  isConsistent(): boolean {
    return this.index.size === this.store.size;
  }

  stats(): KnowledgeBaseStats {
    return {
      documents: this.store.size,
      indexSize: this.index.size,
      dimension: this.index.dimension,
    };
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  /**
   * Store documents with their vectors. Documents identical to the stored
   * version are skipped; the check runs under the lock so concurrent ingests of
   * the same document store it once.
   */
  async commit(items: Array<{ document: Document; vector: EmbeddingVector }>): Promise<CommitOutcome[]> {
    return this.lock.runExclusive(() => items.map(({ document, vector }) => this.commitOne(document, vector)));
  }

  /**
   * Remove a document and its vector together
   */
  async retire(id: string): Promise<boolean> {
    return this.lock.runExclusive(() => {
      const removedVector = this.index.remove(id);
      const removedDocument = this.store.delete(id);
      if (removedVector || removedDocument) {
        this.revision++;
      }
      return removedVector || removedDocument;
    });
  }

  async clear(): Promise<void> {
    await this.lock.runExclusive(() => {
      this.index.clear();
      this.store.clear();
      this.revision++;
    });
  }

  private commitOne(document: Document, vector: EmbeddingVector): CommitOutcome {
    if (this.store.isIdentical(document.id, document)) {
      return 'skipped';
    }

    const existed = this.store.has(document.id);

    // Insert first: a dimension mismatch throws before anything has changed
    this.index.insert(document.id, vector);
    this.store.put(document);
    this.revision++;

    return existed ? 'replaced' : 'inserted';
  }

  // ===========================================================================
  // Persistence
  // ===========================================================================

  toSnapshot(embeddingModel: string): KnowledgeBaseSnapshot {
    const documents = [...this.store.list()];
    const vectors = [...this.index.list()].map(entry => ({
      documentId: entry.documentId,
      vector: entry.vector,
    }));

    return {
      version: SNAPSHOT_VERSION,
      embeddingModel,
      dimension: this.index.dimension,
      savedAt: new Date().toISOString(),
      documents,
      vectors,
    };
  }

  /**
   * Replace the current contents with a snapshot. The snapshot must have been
   * written by the same embedding model.
   */
  async restore(snapshot: KnowledgeBaseSnapshot, embeddingModel: string, source: string = 'snapshot'): Promise<void> {
    if (snapshot.version !== SNAPSHOT_VERSION) {
      throw new SnapshotError(`Unsupported snapshot version ${snapshot.version}`, source);
    }
    if (snapshot.embeddingModel !== embeddingModel) {
      throw new SnapshotError(
        `Snapshot was built with ${snapshot.embeddingModel}, current model is ${embeddingModel}`,
        source
      );
    }

    const byId = new Map(snapshot.documents.map(document => [document.id, document]));
    for (const { documentId } of snapshot.vectors) {
      if (!byId.has(documentId)) {
        throw new SnapshotError(`Snapshot vector has no document: ${documentId}`, source);
      }
    }
    if (snapshot.vectors.length !== byId.size) {
      throw new SnapshotError('Snapshot documents and vectors are out of step', source);
    }

    const expectedDimension = this.index.dimension ?? snapshot.dimension ?? snapshot.vectors[0]?.vector.length ?? null;
    if (expectedDimension !== null && snapshot.vectors.some(({ vector }) => vector.length !== expectedDimension)) {
      throw new SnapshotError(`Snapshot vectors are not ${expectedDimension}-dimensional`, source);
    }

    await this.lock.runExclusive(() => {
      this.index.clear();
      this.store.clear();
      this.revision++;

      for (const document of snapshot.documents) {
        this.store.put(document);
      }
      for (const { documentId, vector } of snapshot.vectors) {
        this.index.insert(documentId, vector);
      }
    });

    this.logger.info(`Restored ${snapshot.documents.length} documents from ${source}`);
  }
}
