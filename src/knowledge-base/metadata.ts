/**
 * Document Metadata
 *
 * Metadata is an open map with a closed set of value shapes: string, finite
 * number, boolean, or a nested map of the same.
 */

import type { MetadataFilter, MetadataMap, MetadataValue } from './types';

const MAX_METADATA_DEPTH = 8;

export interface MetadataIssue {
  path: string;
  message: string;
}

/**
 * Collect every value that falls outside the permitted shapes
 */
export function findMetadataIssues(value: unknown, path: string = 'metadata', depth: number = 0): MetadataIssue[] {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return [{ path, message: 'must be an object' }];
  }
  if (depth >= MAX_METADATA_DEPTH) {
    return [{ path, message: `nesting deeper than ${MAX_METADATA_DEPTH} levels` }];
  }

  const issues: MetadataIssue[] = [];

  for (const [key, entry] of Object.entries(value)) {
    const entryPath = `${path}.${key}`;

    if (typeof entry === 'string' || typeof entry === 'boolean') {
      continue;
    }
    if (typeof entry === 'number') {
      if (!Number.isFinite(entry)) {
        issues.push({ path: entryPath, message: 'must be a finite number' });
      }
      continue;
    }
    if (typeof entry === 'object' && entry !== null && !Array.isArray(entry)) {
      issues.push(...findMetadataIssues(entry, entryPath, depth + 1));
      continue;
    }

    const shape = Array.isArray(entry) ? 'array' : entry === null ? 'null' : typeof entry;
    issues.push({ path: entryPath, message: `unsupported value type: ${shape}` });
  }

  return issues;
}

/**
 * True when every filter key is present with an equal value
 */
export function matchesFilter(metadata: MetadataMap, filter: MetadataFilter): boolean {
  return Object.entries(filter).every(([key, value]) => Object.hasOwn(metadata, key) && metadata[key] === value);
}

export function isMetadataMap(value: unknown): value is MetadataMap {
  return findMetadataIssues(value).length === 0;
}

export function isMetadataValue(value: unknown): value is MetadataValue {
  if (typeof value === 'string' || typeof value === 'boolean') return true;
  if (typeof value === 'number') return Number.isFinite(value);
  return isMetadataMap(value);
}
