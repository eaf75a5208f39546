/**
 * Result Cache Module
 */

export type {
  CacheOperation,
  CachedPayload,
  CachedSearchPayload,
  CachedGeneratePayload,
  CacheStats,
  ResultCache,
} from './types';

export {
  fingerprint,
  searchFingerprint,
  canonicalFilter,
  generateFingerprint,
  normalizeQuery,
  roundTemperature,
  operationOf,
} from './fingerprint';
export { serializePayload, deserializePayload, deserializeEntry, isCachedPayload } from './payload';
export { MemoryResultCache } from './MemoryResultCache';
export type { MemoryResultCacheOptions } from './MemoryResultCache';
export { RedisResultCache } from './RedisResultCache';
export type { RedisCacheClient, RedisResultCacheOptions } from './RedisResultCache';
