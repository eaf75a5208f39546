/**
 * Request Fingerprints
 *
 * Cache keys for search and generate requests. Parameters are normalized first
 * so trivially different requests ("  Hello" vs "hello") share an entry.
 */

import { createHash } from 'crypto';
import type { MetadataFilter } from '../knowledge-base/types';
import type { CacheOperation } from './types';

const TEMPERATURE_PRECISION = 2;

export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function roundTemperature(temperature: number): string {
  return temperature.toFixed(TEMPERATURE_PRECISION);
}

/**
 * `<operation>:<sha256>` over the operation and its normalized parameters
 */
export function fingerprint(operation: CacheOperation, params: Array<string | number>): string {
  const hash = createHash('sha256').update(JSON.stringify([operation, ...params])).digest('hex');
  return `${operation}:${hash}`;
}

/**
 * Filter entries sorted by key, so key order does not change the fingerprint
 */
export function canonicalFilter(filter: MetadataFilter): string {
  const entries = Object.entries(filter).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify(entries);
}

export function searchFingerprint(query: string, limit: number, filter?: MetadataFilter): string {
  const params: Array<string | number> = [normalizeQuery(query), limit];
  if (filter) {
    params.push(canonicalFilter(filter));
  }
  return fingerprint('search', params);
}

export function generateFingerprint(query: string, maxLength: number, temperature: number): string {
  return fingerprint('generate', [normalizeQuery(query), maxLength, roundTemperature(temperature)]);
}

export function operationOf(key: string): CacheOperation | null {
  const separator = key.indexOf(':');
  if (separator === -1) return null;
  const prefix = key.slice(0, separator);
  return prefix === 'search' || prefix === 'generate' ? prefix : null;
}
