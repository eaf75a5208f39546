/**
 * Result Cache Types
 */

import type { GenerateResponse, SearchResponse } from '../orchestrator/types';

export type CacheOperation = 'search' | 'generate';

export interface CachedSearchPayload {
  kind: 'search';
  response: SearchResponse;
}

export interface CachedGeneratePayload {
  kind: 'generate';
  response: GenerateResponse;
}

/**
 * Cached payloads are tagged by the operation that produced them
 */
export type CachedPayload = CachedSearchPayload | CachedGeneratePayload;

export interface CacheStats {
  hits: number;
  misses: number;
  sets: number;
  evictions: number;
  /** Live entries; -1 when the backend cannot tell cheaply */
  size: number;
  hitRate: number;
}

/**
 * Time-bounded fingerprint -> payload store. Expired entries read as a miss.
 * Whole payloads are replaced on every set; the last write wins.
 */
export interface ResultCache {
  readonly backend: 'memory' | 'redis';
  get(fingerprint: string): Promise<CachedPayload | null>;
  set(fingerprint: string, payload: CachedPayload, ttlMs: number): Promise<void>;
  delete(fingerprint: string): Promise<boolean>;
  clear(): Promise<void>;
  stats(): CacheStats;
}
