/**
 * HTTP Embedding Providers
 *
 * Remote embedders: Ollama's `/api/embeddings` and any OpenAI-compatible
 * `/embeddings` endpoint.
 */

import { IndexConfigurationError, ProviderError, describeError } from '../errors';
import type { EmbeddingProvider, EmbeddingVector, HttpEmbeddingConfig } from './types';
import { normalizeEmbeddingInput } from './text';
import { isZeroVector } from './vector-math';

const DEFAULT_TIMEOUT_MS = 30_000;

// ============================================================================
// Shared Base
// ============================================================================

abstract class HttpEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  readonly dimension: number;

  protected readonly baseUrl: string;
  protected readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: HttpEmbeddingConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.model = config.model;
    this.dimension = config.dimension;
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  abstract embed(text: string): Promise<EmbeddingVector>;
  abstract embedBatch(texts: string[]): Promise<EmbeddingVector[]>;

  protected async postJson(path: string, body: object): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new ProviderError(
          `Embedding request failed with status ${response.status}`,
          'BACKEND_FAILURE',
          { model: this.model, statusCode: response.status }
        );
      }

      return await response.json();
    } catch (error) {
      if (error instanceof ProviderError) throw error;

      const message = controller.signal.aborted
        ? `Embedding request timed out after ${this.timeoutMs}ms`
        : `Embedding request failed: ${describeError(error)}`;
      throw new ProviderError(message, 'BACKEND_FAILURE', { model: this.model });
    } finally {
      clearTimeout(timer);
    }
  }

  protected checkVector(value: unknown): EmbeddingVector {
    if (!Array.isArray(value) || !value.every((x): x is number => typeof x === 'number' && Number.isFinite(x))) {
      throw new ProviderError('Embedding response did not contain a numeric vector', 'BACKEND_FAILURE', {
        model: this.model,
      });
    }

    // Configured dimension and model disagree
    if (value.length !== this.dimension) {
      throw new IndexConfigurationError(
        this.dimension,
        value.length,
        `Embedding model ${this.model} returned ${value.length} dimensions, expected ${this.dimension}`
      );
    }

    if (isZeroVector(value)) {
      throw new ProviderError('Embedding model returned a zero vector', 'ZERO_VECTOR', { model: this.model });
    }

    return value;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Ollama
// ============================================================================

export class OllamaEmbeddingProvider extends HttpEmbeddingProvider {
  async embed(text: string): Promise<EmbeddingVector> {
    const prompt = normalizeEmbeddingInput(text);
    const data = await this.postJson('/api/embeddings', { model: this.model, prompt });

    if (!isRecord(data)) {
      throw new ProviderError('Malformed Ollama embedding response', 'BACKEND_FAILURE', { model: this.model });
    }
    return this.checkVector(data.embedding);
  }

  /**
   * Ollama embeds one prompt per request; texts are sent sequentially
   */
  async embedBatch(texts: string[]): Promise<EmbeddingVector[]> {
    const embeddings: EmbeddingVector[] = [];
    for (const text of texts) {
      embeddings.push(await this.embed(text));
    }
    return embeddings;
  }
}

// ============================================================================
// OpenAI-compatible
// ============================================================================

export class OpenAIEmbeddingProvider extends HttpEmbeddingProvider {
  async embed(text: string): Promise<EmbeddingVector> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<EmbeddingVector[]> {
    if (texts.length === 0) return [];

    const input = texts.map(normalizeEmbeddingInput);
    const data = await this.postJson('/embeddings', { model: this.model, input });

    if (!isRecord(data) || !Array.isArray(data.data) || data.data.length !== input.length) {
      throw new ProviderError('Malformed embedding response', 'BACKEND_FAILURE', { model: this.model });
    }

    // Items carry their input position; order is not guaranteed
    const ordered: EmbeddingVector[] = new Array(input.length);
    for (const [position, item] of data.data.entries()) {
      if (!isRecord(item)) {
        throw new ProviderError('Malformed embedding item', 'BACKEND_FAILURE', { model: this.model });
      }
      const index = typeof item.index === 'number' ? item.index : position;
      if (!Number.isInteger(index) || index < 0 || index >= input.length || ordered[index] !== undefined) {
        throw new ProviderError(`Embedding item has invalid index ${index}`, 'BACKEND_FAILURE', {
          model: this.model,
        });
      }
      ordered[index] = this.checkVector(item.embedding);
    }

    return ordered;
  }
}
