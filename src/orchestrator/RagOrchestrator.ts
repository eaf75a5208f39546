/**
 * RAG Orchestrator
 *
 * Ingest, search and generate over one knowledge base. All collaborators are
 * injected; the orchestrator owns no global state.
 *
 * Write path: validate -> embed (no lock held) -> commit under the write lock.
 * Read path: cache -> embed query -> index query -> resolve documents
 *            (-> model call, after retrieval has finished) -> cache -> metrics.
 */

import type { EmbeddingProvider, EmbeddingVector } from '../embeddings/types';
import {
  GenerationError,
  IndexConfigurationError,
  ProviderError,
  RagError,
  ValidationError,
  describeError,
} from '../errors';
import type { GenerationClient } from '../generation/types';
import type { CommitOutcome, KnowledgeBase } from '../knowledge-base/KnowledgeBase';
import { deriveDocumentId } from '../knowledge-base/document-id';
import type { Document, MetadataFilter, ResolvedHit } from '../knowledge-base/types';
import type { Logger } from '../logger';
import { NullLogger } from '../logger';
import type { MetricsAggregator } from '../metrics/MetricsAggregator';
import type { Endpoint, MetricsSnapshot } from '../metrics/types';
import { generateFingerprint, searchFingerprint } from '../result-cache/fingerprint';
import type { CachedPayload, ResultCache } from '../result-cache/types';
import { buildPrompt, buildSnippet, composeContext } from './prompt';
import { generateRequestId } from './request-id';
import type {
  GenerateOptions,
  GenerateResponse,
  GenerationSource,
  HealthReport,
  IngestFailure,
  IngestResponse,
  OrchestratorOptions,
  OrchestratorStats,
  RagOrchestratorDeps,
  SearchResponse,
  SearchResult,
} from './types';
import { DEFAULT_ORCHESTRATOR_OPTIONS } from './types';
import {
  parseDocument,
  peekDocumentId,
  validateDocumentId,
  validateFilters,
  validateLimit,
  validateMaxLength,
  validateQuery,
  validateTemperature,
} from './validation';

export const DEFAULT_SEARCH_LIMIT = 10;
export const DEFAULT_MAX_LENGTH = 500;
export const DEFAULT_TEMPERATURE = 0.7;

interface PendingDocument {
  index: number;
  document: Document;
}

// ============================================================================
// RAG Orchestrator
// ============================================================================

export class RagOrchestrator {
  readonly options: OrchestratorOptions;

  private readonly embedder: EmbeddingProvider;
  private readonly knowledgeBase: KnowledgeBase;
  private readonly cache: ResultCache;
  private readonly generator: GenerationClient;
  private readonly metricsAggregator: MetricsAggregator;
  private readonly logger: Logger;

  constructor(deps: RagOrchestratorDeps) {
    this.embedder = deps.embedder;
    this.knowledgeBase = deps.knowledgeBase;
    this.cache = deps.cache;
    this.generator = deps.generator;
    this.metricsAggregator = deps.metrics;
    this.logger = deps.logger ?? new NullLogger();
    this.options = { ...DEFAULT_ORCHESTRATOR_OPTIONS, ...deps.options };
  }

  // ============================================================================
  // Ingest
  // ============================================================================

  /**
   * Store a batch of documents. Invalid documents and embedding failures are
   * reported per document; the rest of the batch still goes in.
   */
  async ingest(documents: unknown): Promise<IngestResponse> {
    if (!Array.isArray(documents)) {
      throw new ValidationError('Documents must be an array', 'documents');
    }

    const requestId = generateRequestId();
    const startTime = Date.now();
    const failures: IngestFailure[] = [];
    const pending: PendingDocument[] = [];
    let processedCount = 0;
    let skippedCount = 0;
    let corpusChanged = false;

    try {
      documents.forEach((value: unknown, index) => {
        try {
          const input = parseDocument(value);
          const id = input.id ?? deriveDocumentId(input.content, input.url);

          if (this.knowledgeBase.isIdentical(id, input)) {
            skippedCount++;
            return;
          }

          pending.push({
            index,
            document: {
              id,
              title: input.title,
              content: input.content,
              url: input.url,
              metadata: input.metadata ?? {},
              createdAt: new Date().toISOString(),
            },
          });
        } catch (error) {
          failures.push(toIngestFailure(index, peekDocumentId(value), error));
        }
      });

      for (let offset = 0; offset < pending.length; offset += this.options.embedBatchSize) {
        const batch = pending.slice(offset, offset + this.options.embedBatchSize);

        const vectors = await this.embedBatch(batch, failures);
        if (!vectors) continue;

        let outcomes: CommitOutcome[];
        try {
          outcomes = await this.knowledgeBase.commit(
            batch.map(({ document }, position) => ({ document, vector: vectors[position] }))
          );
        } catch (error) {
          // Part of the batch may already be committed
          corpusChanged = true;
          throw error;
        }

        for (const outcome of outcomes) {
          if (outcome === 'skipped') {
            skippedCount++;
          } else {
            processedCount++;
            corpusChanged = true;
          }
        }
      }
    } catch (error) {
      this.recordFailure('ingest', startTime, error, requestId);
      throw error;
    } finally {
      if (corpusChanged) {
        await this.invalidateCache(requestId);
      }
    }

    const responseTimeMs = Date.now() - startTime;
    this.metricsAggregator.recordRequest('ingest', responseTimeMs, failures.length === 0, false);
    for (const failure of failures) {
      this.metricsAggregator.recordError('ingest', failure.kind, failure.message);
    }

    this.logger.info(
      `Ingested ${processedCount} documents (${skippedCount} unchanged, ${failures.length} failed)`,
      { requestId, responseTimeMs }
    );

    return { processedCount, skippedCount, failures, responseTimeMs };
  }

  /**
   * Embed one batch. On failure every document of the batch is reported and
   * null is returned; a dimension misconfiguration is rethrown.
   */
  private async embedBatch(batch: PendingDocument[], failures: IngestFailure[]): Promise<EmbeddingVector[] | null> {
    try {
      const vectors = await this.embedder.embedBatch(batch.map(({ document }) => embeddingText(document)));
      if (vectors.length !== batch.length) {
        throw new ProviderError(
          `Embedding backend returned ${vectors.length} vectors for ${batch.length} documents`,
          'BACKEND_FAILURE'
        );
      }
      return vectors;
    } catch (error) {
      if (error instanceof IndexConfigurationError) throw error;

      this.logger.warn(`Embedding failed for a batch of ${batch.length} documents`, {
        error: describeError(error),
      });
      for (const { index, document } of batch) {
        failures.push(toIngestFailure(index, document.id, error));
      }
      return null;
    }
  }

  // ============================================================================
  // Search
  // ============================================================================

  /**
   * Top `limit` documents for a query. `filters` keeps only documents whose
   * metadata holds every given key with exactly the given value.
   */
  async search(query: unknown, limit: unknown = DEFAULT_SEARCH_LIMIT, filters?: unknown): Promise<SearchResponse> {
    const text = validateQuery(query);
    const k = validateLimit(limit, this.options.maxSearchLimit);
    const filter = validateFilters(filters);

    const requestId = generateRequestId();
    const startTime = Date.now();
    const key = searchFingerprint(text, k, filter);

    try {
      const cached = await this.cache.get(key);
      if (cached?.kind === 'search') {
        this.metricsAggregator.recordRequest('search', Date.now() - startTime, true, true);
        this.logger.debug('Search served from cache', { requestId });
        return cached.response;
      }

      const version = this.knowledgeBase.version;
      const hits = await this.retrieve(text, k, filter);
      const results = hits.map(hit => this.toSearchResult(hit));
      const response: SearchResponse = {
        results,
        count: results.length,
        responseTimeMs: Date.now() - startTime,
      };

      await this.cacheIfCurrent(key, { kind: 'search', response }, this.options.searchTtlMs, version, requestId);
      this.metricsAggregator.recordRequest('search', response.responseTimeMs, true, false);
      this.logger.debug(`Search returned ${response.count} results`, { requestId, responseTimeMs: response.responseTimeMs });

      return response;
    } catch (error) {
      this.recordFailure('search', startTime, error, requestId);
      throw error;
    }
  }

  // ============================================================================
  // Generate
  // ============================================================================

  /**
   * Answer a query from the top retrieved documents. Failed and aborted calls
   * are never cached.
   */
  async generate(
    query: unknown,
    maxLength: unknown = DEFAULT_MAX_LENGTH,
    temperature: unknown = DEFAULT_TEMPERATURE,
    options: GenerateOptions = {}
  ): Promise<GenerateResponse> {
    const text = validateQuery(query);
    const maxTokens = validateMaxLength(maxLength);
    const temp = validateTemperature(temperature);

    const requestId = generateRequestId();
    const startTime = Date.now();
    const key = generateFingerprint(text, maxTokens, temp);

    try {
      const cached = await this.cache.get(key);
      if (cached?.kind === 'generate') {
        this.metricsAggregator.recordRequest('generate', Date.now() - startTime, true, true);
        this.logger.debug('Generation served from cache', { requestId });
        return cached.response;
      }

      // Retrieval completes before the model call; no lock is held past this point
      const version = this.knowledgeBase.version;
      const hits = await this.retrieve(text, this.options.contextDocuments);
      const context = composeContext(hits, this.options.maxContextTokens);
      const prompt = buildPrompt(text, context.text);

      const completion = await this.callModel(prompt, maxTokens, temp, options);

      const response: GenerateResponse = {
        content: completion.text,
        sources: context.used.map(hit => this.toSource(hit)),
        tokensUsed: completion.tokenUsage.totalTokens,
        responseTimeMs: Date.now() - startTime,
      };

      await this.cacheIfCurrent(key, { kind: 'generate', response }, this.options.generateTtlMs, version, requestId);
      this.metricsAggregator.recordRequest('generate', response.responseTimeMs, true, false, response.tokensUsed);
      this.logger.info(`Generated ${response.tokensUsed} tokens from ${response.sources.length} sources`, {
        requestId,
        responseTimeMs: response.responseTimeMs,
      });

      return response;
    } catch (error) {
      this.recordFailure('generate', startTime, error, requestId);
      throw error;
    }
  }

  private async callModel(prompt: string, maxTokens: number, temperature: number, options: GenerateOptions) {
    const controller = new AbortController();
    let timedOut = false;
    const onCallerAbort = () => controller.abort();

    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }
    const timer = options.timeoutMs !== undefined
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, options.timeoutMs)
      : undefined;

    try {
      const completion = await this.generator.complete({
        prompt,
        maxTokens,
        temperature,
        signal: controller.signal,
      });
      if (controller.signal.aborted) {
        throw new GenerationError('Generation aborted by caller', 'aborted');
      }
      return completion;
    } catch (error) {
      if (timedOut) {
        throw new GenerationError(`Generation timed out after ${options.timeoutMs}ms`, 'timeout');
      }
      throw error;
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  // ============================================================================
  // Corpus Management
  // ============================================================================

  /**
   * Remove one document and its vector. Returns whether anything was removed.
   */
  async remove(documentId: unknown): Promise<boolean> {
    const id = validateDocumentId(documentId);
    const requestId = generateRequestId();

    const removed = await this.knowledgeBase.retire(id);
    if (removed) {
      await this.invalidateCache(requestId);
      this.logger.info(`Removed document ${id}`, { requestId });
    }
    return removed;
  }

  async clear(): Promise<void> {
    const requestId = generateRequestId();
    await this.knowledgeBase.clear();
    await this.invalidateCache(requestId);
    this.logger.info('Knowledge base cleared', { requestId });
  }

  // ============================================================================
  // Introspection
  // ============================================================================

  metrics(): MetricsSnapshot {
    return this.metricsAggregator.snapshot();
  }

  health(): HealthReport {
    const consistent = this.knowledgeBase.isConsistent();
    const generation = this.generator.state;
    const { documents, dimension } = this.knowledgeBase.stats();

    return {
      status: consistent && generation !== 'failed' ? 'healthy' : 'unhealthy',
      checks: {
        knowledgeBase: consistent ? 'ok' : 'inconsistent',
        generation,
        documents,
        dimension,
      },
      timestamp: new Date().toISOString(),
    };
  }

  stats(): OrchestratorStats {
    return {
      ...this.knowledgeBase.stats(),
      embeddingModel: this.embedder.model,
      cache: { backend: this.cache.backend, ...this.cache.stats() },
    };
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private async retrieve(query: string, k: number, filter?: MetadataFilter): Promise<ResolvedHit[]> {
    if (k <= 0 || this.knowledgeBase.stats().indexSize === 0) {
      return [];
    }
    const vector = await this.embedder.embed(query);
    return this.knowledgeBase.query(vector, k, filter);
  }

  private toSearchResult({ document, score }: ResolvedHit): SearchResult {
    return {
      documentId: document.id,
      title: document.title,
      url: document.url,
      score,
      snippet: buildSnippet(document.content, this.options.snippetLength),
    };
  }

  private toSource(hit: ResolvedHit): GenerationSource {
    return this.toSearchResult(hit);
  }

  private recordFailure(endpoint: Endpoint, startTime: number, error: unknown, requestId: string): void {
    const kind = error instanceof RagError ? error.kind : 'InternalError';
    const message = describeError(error);

    this.metricsAggregator.recordRequest(endpoint, Date.now() - startTime, false, false);
    this.metricsAggregator.recordError(endpoint, kind, message);
    this.logger.warn(`${endpoint} failed: ${message}`, { requestId, kind });
  }

  /**
   * Cache a response unless the corpus changed after its retrieval started. A
   * change that lands while the write is in flight removes the entry again.
   */
  private async cacheIfCurrent(
    key: string,
    payload: CachedPayload,
    ttlMs: number,
    version: number,
    requestId: string
  ): Promise<void> {
    if (this.knowledgeBase.version !== version) {
      this.logger.debug('Corpus changed during the request, response not cached', { requestId });
      return;
    }

    await this.cache.set(key, payload, ttlMs);

    if (this.knowledgeBase.version !== version) {
      await this.cache.delete(key);
    }
  }

  /**
   * Drop every cached response after the corpus changed. Failures are logged;
   * a cache backend outage does not fail the write that triggered it.
   */
  private async invalidateCache(requestId: string): Promise<void> {
    try {
      await this.cache.clear();
    } catch (error) {
      this.logger.error(`Cache invalidation failed: ${describeError(error)}`, { requestId });
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

function embeddingText(document: Document): string {
  return `${document.title}\n${document.content}`;
}

function toIngestFailure(index: number, documentId: string | undefined, error: unknown): IngestFailure {
  return {
    index,
    ...(documentId !== undefined ? { documentId } : {}),
    kind: error instanceof RagError ? error.kind : 'InternalError',
    message: describeError(error),
  };
}
