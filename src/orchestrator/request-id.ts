/**
 * Request IDs
 *
 * Short, sortable ids that tie together the log lines of one request.
 */

import { customAlphabet } from 'nanoid';

const REQUEST_ID_PREFIX = 'req_';
const RANDOM_LENGTH = 8;
const ALPHABET = '0123456789abcdefghijklmnopqrstuvwxyz';

const nanoid = customAlphabet(ALPHABET, RANDOM_LENGTH);

export function generateRequestId(): string {
  return `${REQUEST_ID_PREFIX}${Date.now()}_${nanoid()}`;
}

export function isValidRequestId(requestId: string): boolean {
  const match = /^req_(\d+)_([0-9a-z]+)$/.exec(requestId);
  return match !== null && match[2].length === RANDOM_LENGTH;
}
