/**
 * Memory Result Cache
 *
 * In-process cache with per-entry TTL and a byte budget. Expired entries are
 * evicted when read; `prune()` sweeps them proactively.
 */

import type { CacheStats, CachedPayload, ResultCache } from './types';
import { deserializeEntry, serializePayload } from './payload';

// ============================================================================
// Cache Entry
// ============================================================================

interface CacheEntry {
  key: string;
  serialized: string;
  timestamp: number;
  hits: number;
  size: number;
  ttl: number;
}

export interface MemoryResultCacheOptions {
  /** Byte budget for stored payloads (default 50MB) */
  maxSizeBytes?: number;
  /** Clock, injectable for tests */
  now?: () => number;
}

const DEFAULT_MAX_SIZE_BYTES = 50 * 1024 * 1024;

// ============================================================================
// Memory Result Cache
// ============================================================================

export class MemoryResultCache implements ResultCache {
  readonly backend = 'memory' as const;

  private cache: Map<string, CacheEntry> = new Map();
  private readonly maxSizeBytes: number;
  private readonly now: () => number;

  private bytes = 0;
  private counters = { hits: 0, misses: 0, sets: 0, evictions: 0 };

  constructor(options: MemoryResultCacheOptions = {}) {
    this.maxSizeBytes = options.maxSizeBytes ?? DEFAULT_MAX_SIZE_BYTES;
    this.now = options.now ?? Date.now;
  }

  async get(fingerprint: string): Promise<CachedPayload | null> {
    const entry = this.cache.get(fingerprint);

    if (!entry) {
      this.counters.misses++;
      return null;
    }

    if (this.isExpired(entry)) {
      this.remove(fingerprint);
      this.counters.misses++;
      return null;
    }

    const payload = deserializeEntry(fingerprint, entry.serialized);
    if (!payload) {
      this.remove(fingerprint);
      this.counters.misses++;
      return null;
    }

    entry.hits++;
    this.counters.hits++;
    return payload;
  }

  async set(fingerprint: string, payload: CachedPayload, ttlMs: number): Promise<void> {
    const serialized = serializePayload(payload);
    // UTF-16
    const size = serialized.length * 2;

    this.remove(fingerprint);

    if (size > this.maxSizeBytes) {
      return;
    }

    while (this.bytes + size > this.maxSizeBytes && this.cache.size > 0) {
      this.evictLRU();
    }

    this.cache.set(fingerprint, {
      key: fingerprint,
      serialized,
      timestamp: this.now(),
      hits: 0,
      size,
      ttl: ttlMs,
    });
    this.bytes += size;
    this.counters.sets++;
  }

  async delete(fingerprint: string): Promise<boolean> {
    return this.remove(fingerprint);
  }

  async clear(): Promise<void> {
    this.cache.clear();
    this.bytes = 0;
  }

  /**
   * Drop every expired entry; returns how many were removed
   */
  prune(): number {
    let removed = 0;
    for (const entry of [...this.cache.values()]) {
      if (this.isExpired(entry)) {
        this.remove(entry.key);
        removed++;
      }
    }
    return removed;
  }

  stats(): CacheStats {
    const lookups = this.counters.hits + this.counters.misses;
    return {
      ...this.counters,
      size: this.cache.size,
      hitRate: lookups > 0 ? this.counters.hits / lookups : 0,
    };
  }

  get sizeBytes(): number {
    return this.bytes;
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.timestamp >= entry.ttl;
  }

  private remove(key: string): boolean {
    const entry = this.cache.get(key);
    if (!entry) return false;

    this.cache.delete(key);
    this.bytes -= entry.size;
    return true;
  }

  /**
   * Evict the entry with the lowest recency score: creation time, pushed
   * forward a minute for every hit
   */
  private evictLRU(): void {
    let oldestKey: string | null = null;
    let oldestScore = Infinity;

    for (const [key, entry] of this.cache.entries()) {
      const score = entry.timestamp + entry.hits * 60_000;
      if (score < oldestScore) {
        oldestScore = score;
        oldestKey = key;
      }
    }

    if (oldestKey !== null) {
      this.remove(oldestKey);
      this.counters.evictions++;
    }
  }
}
