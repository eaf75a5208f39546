/**
 * Knowledge Base Types
 *
 * Documents, their vectors, and the snapshot format used for persistence.
 */

import type { EmbeddingVector } from '../embeddings/types';

// =============================================================================
// Documents
// =============================================================================

export type MetadataValue = string | number | boolean | MetadataMap;

export interface MetadataMap {
  [key: string]: MetadataValue;
}

/**
 * Exact-match conditions on top-level metadata keys
 */
export type MetadataFilter = Record<string, string | number | boolean>;

/**
 * Canonical document record
 */
export interface Document {
  /** Stable id: caller-assigned, or derived from content and url */
  id: string;
  title: string;
  content: string;
  url: string;
  metadata: MetadataMap;
  /** ISO timestamp of the ingest that stored this version */
  createdAt: string;
}

/**
 * Raw document as handed to ingest
 */
export interface DocumentInput {
  id?: string;
  title: string;
  content: string;
  url: string;
  metadata?: MetadataMap;
}

// =============================================================================
// Index
// =============================================================================

export interface IndexEntry {
  documentId: string;
  vector: EmbeddingVector;
  /** Cached L2 norm of `vector` */
  norm: number;
  /** Insertion counter; lower wins ties */
  sequence: number;
}

export interface QueryHit {
  documentId: string;
  score: number;
}

export interface ResolvedHit {
  document: Document;
  score: number;
}

// =============================================================================
// Persistence
// =============================================================================

export interface KnowledgeBaseSnapshot {
  version: number;
  embeddingModel: string;
  dimension: number | null;
  savedAt: string;
  documents: Document[];
  /** Parallel to `documents` by id; index order is preserved */
  vectors: Array<{ documentId: string; vector: EmbeddingVector }>;
}

export interface KnowledgeBaseStats {
  documents: number;
  indexSize: number;
  dimension: number | null;
}
