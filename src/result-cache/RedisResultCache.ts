/**
 * Redis Result Cache
 *
 * Shares cached responses across processes through Redis. TTLs are enforced by
 * Redis itself (`SET ... PX`). A Redis outage degrades to cache misses; it never
 * fails the request that consulted the cache.
 */

import { describeError } from '../errors';
import type { Logger } from '../logger';
import { NullLogger } from '../logger';
import type { CacheStats, CachedPayload, ResultCache } from './types';
import { deserializeEntry, serializePayload } from './payload';

/**
 * The subset of the ioredis client this cache talks to
 */
export interface RedisCacheClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, millisecondsToken: 'PX', milliseconds: number): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  scan(
    cursor: string,
    patternToken: 'MATCH',
    pattern: string,
    countToken: 'COUNT',
    count: number
  ): Promise<[string, string[]]>;
}

export interface RedisResultCacheOptions {
  keyPrefix?: string;
  logger?: Logger;
}

const DEFAULT_KEY_PREFIX = 'grounded-rag:cache:';
const SCAN_BATCH = 200;

export class RedisResultCache implements ResultCache {
  readonly backend = 'redis' as const;

  private readonly keyPrefix: string;
  private readonly logger: Logger;
  private counters = { hits: 0, misses: 0, sets: 0, evictions: 0 };

  constructor(private readonly client: RedisCacheClient, options: RedisResultCacheOptions = {}) {
    this.keyPrefix = options.keyPrefix ?? DEFAULT_KEY_PREFIX;
    this.logger = options.logger ?? new NullLogger();
  }

  async get(fingerprint: string): Promise<CachedPayload | null> {
    let raw: string | null;
    try {
      raw = await this.client.get(this.key(fingerprint));
    } catch (error) {
      this.logger.warn('Redis read failed, treating as miss', { fingerprint, error: describeError(error) });
      this.counters.misses++;
      return null;
    }

    const payload = raw === null ? null : deserializeEntry(fingerprint, raw);
    if (!payload) {
      this.counters.misses++;
      return null;
    }

    this.counters.hits++;
    return payload;
  }

  async set(fingerprint: string, payload: CachedPayload, ttlMs: number): Promise<void> {
    // Redis rejects a non-positive PX
    const ttl = Math.max(1, Math.round(ttlMs));
    try {
      await this.client.set(this.key(fingerprint), serializePayload(payload), 'PX', ttl);
      this.counters.sets++;
    } catch (error) {
      this.logger.warn('Redis write failed, response not cached', { fingerprint, error: describeError(error) });
    }
  }

  async delete(fingerprint: string): Promise<boolean> {
    return (await this.client.del(this.key(fingerprint))) > 0;
  }

  /**
   * Delete every key under this cache's prefix
   */
  async clear(): Promise<void> {
    let cursor = '0';
    do {
      const [next, keys] = await this.client.scan(cursor, 'MATCH', `${this.keyPrefix}*`, 'COUNT', SCAN_BATCH);
      if (keys.length > 0) {
        await this.client.del(...keys);
      }
      cursor = next;
    } while (cursor !== '0');
  }

  stats(): CacheStats {
    const lookups = this.counters.hits + this.counters.misses;
    return {
      ...this.counters,
      size: -1,
      hitRate: lookups > 0 ? this.counters.hits / lookups : 0,
    };
  }

  private key(fingerprint: string): string {
    return `${this.keyPrefix}${fingerprint}`;
  }
}
