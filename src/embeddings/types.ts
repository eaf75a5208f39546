/**
 * Embedding Types
 */

export type EmbeddingVector = number[];

/**
 * Converts text into fixed-length vectors.
 *
 * Implementations are deterministic for a fixed model configuration: the same
 * text always yields the same vector.
 */
export interface EmbeddingProvider {
  /** Model identifier, recorded in snapshots and stats */
  readonly model: string;

  /** Length of every vector this provider returns */
  readonly dimension: number;

  embed(text: string): Promise<EmbeddingVector>;

  /** Embed many texts, preserving input order and count */
  embedBatch(texts: string[]): Promise<EmbeddingVector[]>;
}

export type EmbeddingProviderKind = 'hashing' | 'ollama' | 'openai';

export interface HttpEmbeddingConfig {
  baseUrl: string;
  model: string;
  dimension: number;
  apiKey?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}
