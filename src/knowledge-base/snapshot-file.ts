/**
 * Snapshot Files
 *
 * Reads and writes knowledge-base snapshots as JSON.
 */

import { existsSync } from 'fs';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import * as path from 'path';
import { SnapshotError, describeError } from '../errors';
import type { Document, KnowledgeBaseSnapshot, MetadataMap } from './types';
import { isMetadataMap } from './metadata';

/**
 * Write a snapshot next to its final path, then move it into place
 */
export async function writeSnapshotFile(filePath: string, snapshot: KnowledgeBaseSnapshot): Promise<void> {
  const resolved = path.resolve(filePath);
  const tempPath = `${resolved}.tmp`;

  try {
    await mkdir(path.dirname(resolved), { recursive: true });
    await writeFile(tempPath, JSON.stringify(snapshot), 'utf-8');
    await rename(tempPath, resolved);
  } catch (error) {
    throw new SnapshotError(`Failed to write snapshot: ${describeError(error)}`, resolved);
  }
}

/**
 * Load a snapshot; `null` when the file does not exist yet
 */
export async function readSnapshotFile(filePath: string): Promise<KnowledgeBaseSnapshot | null> {
  const resolved = path.resolve(filePath);
  if (!existsSync(resolved)) {
    return null;
  }

  let data: unknown;
  try {
    data = JSON.parse(await readFile(resolved, 'utf-8'));
  } catch (error) {
    throw new SnapshotError(`Failed to read snapshot: ${describeError(error)}`, resolved);
  }

  return parseSnapshot(data, resolved);
}

export function parseSnapshot(data: unknown, source: string): KnowledgeBaseSnapshot {
  if (!isRecord(data)) {
    throw new SnapshotError('Snapshot is not an object', source);
  }

  const { version, embeddingModel, dimension, savedAt, documents, vectors } = data;

  if (typeof version !== 'number' || typeof embeddingModel !== 'string' || typeof savedAt !== 'string') {
    throw new SnapshotError('Snapshot header is malformed', source);
  }
  if (dimension !== null && typeof dimension !== 'number') {
    throw new SnapshotError('Snapshot dimension is malformed', source);
  }
  if (!Array.isArray(documents) || !Array.isArray(vectors)) {
    throw new SnapshotError('Snapshot body is malformed', source);
  }

  return {
    version,
    embeddingModel,
    dimension,
    savedAt,
    documents: documents.map((item: unknown, i) => parseDocument(item, i, source)),
    vectors: vectors.map((item: unknown, i) => parseVector(item, i, source)),
  };
}

function parseDocument(item: unknown, position: number, source: string): Document {
  if (
    !isRecord(item) ||
    typeof item.id !== 'string' ||
    typeof item.title !== 'string' ||
    typeof item.content !== 'string' ||
    typeof item.url !== 'string' ||
    typeof item.createdAt !== 'string'
  ) {
    throw new SnapshotError(`Snapshot document ${position} is malformed`, source);
  }

  const metadata: MetadataMap = isMetadataMap(item.metadata) ? item.metadata : {};

  return {
    id: item.id,
    title: item.title,
    content: item.content,
    url: item.url,
    metadata,
    createdAt: item.createdAt,
  };
}

function parseVector(item: unknown, position: number, source: string): { documentId: string; vector: number[] } {
  if (!isRecord(item) || typeof item.documentId !== 'string' || !Array.isArray(item.vector)) {
    throw new SnapshotError(`Snapshot vector ${position} is malformed`, source);
  }

  const vector: number[] = [];
  for (const value of item.vector) {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new SnapshotError(`Snapshot vector ${position} holds a non-numeric value`, source);
    }
    vector.push(value);
  }

  return { documentId: item.documentId, vector };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
