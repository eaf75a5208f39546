/**
 * Payload Serialization
 *
 * Both cache backends store payloads as JSON text and validate the shape on the
 * way out, so a corrupted or foreign entry reads as a miss.
 */

import type { CachedPayload } from './types';
import { operationOf } from './fingerprint';

export function serializePayload(payload: CachedPayload): string {
  return JSON.stringify(payload);
}

export function deserializePayload(text: string): CachedPayload | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  return isCachedPayload(value) ? value : null;
}

/**
 * Deserialize an entry read under `fingerprint`. A payload of another
 * operation than the fingerprint names is rejected.
 */
export function deserializeEntry(fingerprint: string, text: string): CachedPayload | null {
  const payload = deserializePayload(text);
  const operation = operationOf(fingerprint);
  if (!payload || (operation !== null && operation !== payload.kind)) {
    return null;
  }
  return payload;
}

export function isCachedPayload(value: unknown): value is CachedPayload {
  if (!isRecord(value) || !isRecord(value.response)) {
    return false;
  }

  const response = value.response;
  if (typeof response.responseTimeMs !== 'number') {
    return false;
  }

  switch (value.kind) {
    case 'search':
      return Array.isArray(response.results) && typeof response.count === 'number';
    case 'generate':
      return (
        typeof response.content === 'string' &&
        Array.isArray(response.sources) &&
        typeof response.tokensUsed === 'number'
      );
    default:
      return false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
