/**
 * Request Validation
 *
 * Checks run before any side effect: a rejected request never touches the
 * cache, the embedder or the metrics.
 */

import { ValidationError } from '../errors';
import { findMetadataIssues, isMetadataMap } from '../knowledge-base/metadata';
import type { DocumentInput, MetadataFilter } from '../knowledge-base/types';

export const MAX_TEMPERATURE = 2;

export function validateQuery(query: unknown): string {
  if (typeof query !== 'string') {
    throw new ValidationError('Query must be a string', 'query');
  }

  const trimmed = query.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Query cannot be empty', 'query');
  }

  return trimmed;
}

export function validateLimit(limit: unknown, maxLimit: number): number {
  if (typeof limit !== 'number' || !Number.isInteger(limit) || limit <= 0) {
    throw new ValidationError(`Limit must be a positive integer, got ${String(limit)}`, 'limit');
  }
  if (limit > maxLimit) {
    throw new ValidationError(`Limit must be at most ${maxLimit}, got ${limit}`, 'limit');
  }
  return limit;
}

export function validateMaxLength(maxLength: unknown): number {
  if (typeof maxLength !== 'number' || !Number.isInteger(maxLength) || maxLength <= 0) {
    throw new ValidationError(`maxLength must be a positive integer, got ${String(maxLength)}`, 'maxLength');
  }
  return maxLength;
}

export function validateTemperature(temperature: unknown): number {
  if (typeof temperature !== 'number' || !Number.isFinite(temperature)) {
    throw new ValidationError(`Temperature must be a finite number, got ${String(temperature)}`, 'temperature');
  }
  if (temperature < 0 || temperature > MAX_TEMPERATURE) {
    throw new ValidationError(
      `Temperature must be between 0 and ${MAX_TEMPERATURE}, got ${temperature}`,
      'temperature'
    );
  }
  return temperature;
}

export function validateDocumentId(id: unknown): string {
  if (typeof id !== 'string' || id.trim().length === 0) {
    throw new ValidationError('Document id must be a non-empty string', 'id');
  }
  return id;
}

/**
 * Search filters: a map of scalar values. An empty map means no filter.
 */
export function validateFilters(filters: unknown): MetadataFilter | undefined {
  if (filters === undefined) {
    return undefined;
  }
  if (typeof filters !== 'object' || filters === null || Array.isArray(filters)) {
    throw new ValidationError('Filters must be an object', 'filters');
  }

  const record: Record<string, unknown> = Object.fromEntries(Object.entries(filters));
  const filter: MetadataFilter = {};
  for (const [key, value] of Object.entries(record)) {
    if (!isFilterValue(value)) {
      throw new ValidationError(`Filter ${key} must be a string, finite number or boolean`, 'filters');
    }
    filter[key] = value;
  }

  return Object.keys(filter).length > 0 ? filter : undefined;
}

function isFilterValue(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'boolean' || (typeof value === 'number' && Number.isFinite(value));
}

// ============================================================================
// Documents
// ============================================================================

/**
 * Narrow one submitted document. Throws `ValidationError` naming the first
 * offending field.
 */
export function parseDocument(value: unknown): DocumentInput {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ValidationError('Document must be an object', 'document');
  }

  const record: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  const title = requireText(record, 'title');
  const content = requireText(record, 'content');
  const url = requireText(record, 'url');

  const document: DocumentInput = { title, content, url };

  if (record.id !== undefined) {
    document.id = validateDocumentId(record.id);
  }

  if (record.metadata !== undefined) {
    const metadata = record.metadata;
    if (!isMetadataMap(metadata)) {
      const [issue] = findMetadataIssues(metadata);
      throw new ValidationError(`Invalid metadata at ${issue.path}: ${issue.message}`, issue.path);
    }
    document.metadata = metadata;
  }

  return document;
}

function requireText(record: Record<string, unknown>, field: string): string {
  const value = record[field];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`Document ${field} must be a non-empty string`, field);
  }
  return value;
}

/**
 * Id a failed document would have had, when one can be read off it
 */
export function peekDocumentId(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || !('id' in value)) {
    return undefined;
  }
  return typeof value.id === 'string' && value.id.length > 0 ? value.id : undefined;
}
