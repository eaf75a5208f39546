/**
 * Text Normalization
 */

import { ProviderError } from '../errors';

/**
 * Trim and collapse whitespace. Throws when nothing is left to embed.
 */
export function normalizeEmbeddingInput(text: string): string {
  if (typeof text !== 'string') {
    throw new ProviderError('Embedding input must be a string', 'EMPTY_INPUT');
  }

  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized.length === 0) {
    throw new ProviderError('Embedding input is empty after normalization', 'EMPTY_INPUT');
  }

  return normalized;
}

/**
 * Lower-cased word tokens (letters and digits, any script)
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}
