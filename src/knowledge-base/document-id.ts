/**
 * Document Identity
 */

import { createHash } from 'crypto';

const DOCUMENT_ID_PREFIX = 'doc_';
const HASH_LENGTH = 32;

/**
 * Deterministic id for a document without a caller-assigned one.
 * Identical content at the same url always maps to the same id.
 */
export function deriveDocumentId(content: string, url: string): string {
  const hash = createHash('sha256').update(content).update('\u0000').update(url).digest('hex');
  return `${DOCUMENT_ID_PREFIX}${hash.slice(0, HASH_LENGTH)}`;
}
