/**
 * Knowledge Base Module
 *
 * Document store, vector index and the lock that keeps them in step.
 */

export type {
  Document,
  DocumentInput,
  MetadataFilter,
  MetadataMap,
  MetadataValue,
  IndexEntry,
  QueryHit,
  ResolvedHit,
  KnowledgeBaseSnapshot,
  KnowledgeBaseStats,
} from './types';

export { VectorIndex } from './VectorIndex';
export { DocumentStore } from './DocumentStore';
export { WriteLock, DEFAULT_LOCK_TIMEOUT_MS } from './write-lock';
export { KnowledgeBase, SNAPSHOT_VERSION } from './KnowledgeBase';
export type { CommitOutcome, KnowledgeBaseOptions } from './KnowledgeBase';
export { deriveDocumentId } from './document-id';
export { findMetadataIssues, isMetadataMap, isMetadataValue, matchesFilter } from './metadata';
export type { MetadataIssue } from './metadata';
export { readSnapshotFile, writeSnapshotFile, parseSnapshot } from './snapshot-file';
