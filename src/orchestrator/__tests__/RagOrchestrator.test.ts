/**
 * RAG Orchestrator Tests
 */

import { HashingEmbeddingProvider } from '../../embeddings/hashing-provider';
import { OpenAIEmbeddingProvider } from '../../embeddings/http-providers';
import type { EmbeddingProvider, EmbeddingVector } from '../../embeddings/types';
import { GenerationError, IndexConfigurationError, ProviderError, ValidationError } from '../../errors';
import type {
  CompletionRequest,
  CompletionResult,
  GenerationClient,
  GenerationClientState,
} from '../../generation/types';
import { KnowledgeBase } from '../../knowledge-base/KnowledgeBase';
import { MetricsAggregator } from '../../metrics/MetricsAggregator';
import { MemoryResultCache } from '../../result-cache/MemoryResultCache';
import type { CachedPayload, ResultCache } from '../../result-cache/types';
import { RagOrchestrator } from '../RagOrchestrator';
import type { OrchestratorOptions } from '../types';

// ============================================================================
// Fixtures
// ============================================================================

const DIMENSION = 64;

const ML_INTRO = {
  id: 'ml',
  title: 'ML Intro',
  content: 'Machine learning is a subset of AI...',
  url: 'https://x/ml',
};
const PASTA = {
  id: 'pasta',
  title: 'Cooking Pasta',
  content: 'Boil water, add salt and cook the pasta for ten minutes.',
  url: 'https://x/pasta',
};
const NEURAL_NETWORKS = {
  id: 'nn',
  title: 'Neural Networks',
  content: 'Neural networks are machine learning models built from layers.',
  url: 'https://x/nn',
};
const GARDENING = {
  id: 'garden',
  title: 'Gardening',
  content: 'Plant tomatoes in spring after the last frost.',
  url: 'https://x/garden',
};

const COMPLETION: CompletionResult = {
  text: 'Machine learning lets computers learn from data.',
  tokenUsage: { promptTokens: 100, completionTokens: 20, totalTokens: 120 },
  model: 'fake-model',
  finishReason: 'stop',
};

class FakeGenerationClient implements GenerationClient {
  readonly model = 'fake-model';
  state: GenerationClientState = 'unknown';

  complete = jest.fn<Promise<CompletionResult>, [CompletionRequest]>(async () => ({ ...COMPLETION }));
}

/**
 * Fails the first `failures` batch calls, then embeds normally
 */
class FlakyEmbedder implements EmbeddingProvider {
  readonly model = 'hashing-bow';
  readonly dimension = DIMENSION;
  private readonly inner = new HashingEmbeddingProvider(DIMENSION);

  constructor(private failures: number) {}

  embed(text: string): Promise<EmbeddingVector> {
    return this.inner.embed(text);
  }

  async embedBatch(texts: string[]): Promise<EmbeddingVector[]> {
    if (this.failures > 0) {
      this.failures--;
      throw new ProviderError('backend down', 'BACKEND_FAILURE');
    }
    return this.inner.embedBatch(texts);
  }
}

function createGate() {
  let open: () => void = () => undefined;
  const opened = new Promise<void>(resolve => {
    open = resolve;
  });
  return { opened, open: () => open() };
}

/**
 * Holds the next write until released
 */
class GatedCache extends MemoryResultCache {
  readonly writeStarted = createGate();
  readonly releaseWrite = createGate();
  private gated = true;

  async set(fingerprint: string, payload: CachedPayload, ttlMs: number): Promise<void> {
    if (this.gated) {
      this.gated = false;
      this.writeStarted.open();
      await this.releaseWrite.opened;
    }
    await super.set(fingerprint, payload, ttlMs);
  }
}

/** Never settles until the request signal aborts */
const hangUntilAborted = (request: CompletionRequest): Promise<CompletionResult> =>
  new Promise((_resolve, reject) => {
    const abort = () => reject(new GenerationError('Generation aborted by caller', 'aborted'));
    if (request.signal?.aborted) {
      abort();
      return;
    }
    request.signal?.addEventListener('abort', abort, { once: true });
  });

function createHarness(
  options: {
    embedder?: EmbeddingProvider;
    dimension?: number;
    cache?: ResultCache;
    orchestrator?: Partial<OrchestratorOptions>;
  } = {}
) {
  const embedder = options.embedder ?? new HashingEmbeddingProvider(DIMENSION);
  const knowledgeBase = new KnowledgeBase({ dimension: options.dimension ?? DIMENSION });
  const cache = options.cache ?? new MemoryResultCache();
  const generator = new FakeGenerationClient();
  const metrics = new MetricsAggregator();
  const orchestrator = new RagOrchestrator({
    embedder,
    knowledgeBase,
    cache,
    generator,
    metrics,
    options: options.orchestrator,
  });

  return { orchestrator, knowledgeBase, cache, generator, metrics };
}

// ============================================================================
// Tests
// ============================================================================

describe('RagOrchestrator', () => {
  describe('end to end', () => {
    it('should search and generate over an ingested document', async () => {
      const { orchestrator, generator } = createHarness();
      const { title, content, url } = ML_INTRO;

      const ingest = await orchestrator.ingest([{ title, content, url }]);
      expect(ingest.processedCount).toBe(1);
      expect(ingest.failures).toEqual([]);

      const search = await orchestrator.search('machine learning', 1);
      expect(search.count).toBe(1);
      expect(search.results).toHaveLength(1);
      expect(search.results[0].title).toBe('ML Intro');
      expect(search.results[0].url).toBe('https://x/ml');
      expect(search.results[0].documentId).toMatch(/^doc_[0-9a-f]{32}$/);
      expect(search.results[0].score).toBeGreaterThan(0);

      const answer = await orchestrator.generate('what is machine learning?');
      expect(answer.content).toBe('Machine learning lets computers learn from data.');
      expect(answer.tokensUsed).toBe(120);
      expect(answer.sources).toHaveLength(1);
      expect(answer.sources[0]).toMatchObject({ title: 'ML Intro', url: 'https://x/ml' });

      const request = generator.complete.mock.calls[0][0];
      expect(request.maxTokens).toBe(500);
      expect(request.temperature).toBe(0.7);
      expect(request.prompt).toContain(
        '[Source 1] ML Intro (https://x/ml)\nMachine learning is a subset of AI...\n\nUser Query: what is machine learning?'
      );
    });
  });

  // ==========================================================================
  // Ingest
  // ==========================================================================

  describe('ingest', () => {
    it('should skip documents identical to the stored version', async () => {
      const { orchestrator } = createHarness();

      const first = await orchestrator.ingest([ML_INTRO]);
      const second = await orchestrator.ingest([ML_INTRO]);

      expect(first).toMatchObject({ processedCount: 1, skippedCount: 0 });
      expect(second).toMatchObject({ processedCount: 0, skippedCount: 1 });
      expect(orchestrator.stats().indexSize).toBe(1);
      expect(orchestrator.stats().documents).toBe(1);
    });

    it('should store a duplicate within one batch once', async () => {
      const { orchestrator } = createHarness();

      const result = await orchestrator.ingest([ML_INTRO, ML_INTRO]);

      expect(result).toMatchObject({ processedCount: 1, skippedCount: 1 });
      expect(orchestrator.stats().indexSize).toBe(1);
    });

    it('should replace a document whose content changed', async () => {
      const { orchestrator, knowledgeBase } = createHarness();

      await orchestrator.ingest([ML_INTRO]);
      const result = await orchestrator.ingest([{ ...ML_INTRO, content: 'Machine learning, revised.' }]);

      expect(result.processedCount).toBe(1);
      expect(knowledgeBase.get('ml')?.content).toBe('Machine learning, revised.');
      expect(orchestrator.stats().indexSize).toBe(1);
    });

    it('should report invalid documents and keep the rest', async () => {
      const { orchestrator, metrics } = createHarness();

      const result = await orchestrator.ingest([
        ML_INTRO,
        { id: 'bad', title: '', content: 'x', url: 'https://x/bad' },
        { title: 'Tagged', content: 'c', url: 'https://x/tagged', metadata: { tags: ['a'] } },
        'oops',
      ]);

      expect(result.processedCount).toBe(1);
      expect(result.failures).toEqual([
        { index: 1, documentId: 'bad', kind: 'ValidationError', message: 'Document title must be a non-empty string' },
        {
          index: 2,
          kind: 'ValidationError',
          message: 'Invalid metadata at metadata.tags: unsupported value type: array',
        },
        { index: 3, kind: 'ValidationError', message: 'Document must be an object' },
      ]);

      const snapshot = metrics.snapshot();
      expect(snapshot.failedRequests).toBe(1);
      expect(snapshot.errorSummary).toEqual({ 'ingest:ValidationError': 3 });
    });

    it('should fail every document of a batch the embedder rejects', async () => {
      const { orchestrator } = createHarness({
        embedder: new FlakyEmbedder(1),
        orchestrator: { embedBatchSize: 2 },
      });

      const result = await orchestrator.ingest([ML_INTRO, PASTA, GARDENING]);

      expect(result.processedCount).toBe(1);
      expect(result.failures).toEqual([
        { index: 0, documentId: 'ml', kind: 'ProviderError', message: 'backend down' },
        { index: 1, documentId: 'pasta', kind: 'ProviderError', message: 'backend down' },
      ]);
      expect(orchestrator.stats().documents).toBe(1);
    });

    it('should reject a non-array batch', async () => {
      const { orchestrator, metrics } = createHarness();

      await expect(orchestrator.ingest({ title: 'x' })).rejects.toThrow(ValidationError);
      expect(metrics.snapshot().totalRequests).toBe(0);
    });

    it('should abort the ingest on a vector dimension mismatch', async () => {
      const { orchestrator, metrics } = createHarness({ embedder: new HashingEmbeddingProvider(32) });

      await expect(orchestrator.ingest([ML_INTRO])).rejects.toThrow(IndexConfigurationError);
      expect(orchestrator.stats().documents).toBe(0);
      expect(metrics.snapshot().errorSummary).toEqual({ 'ingest:IndexConfigurationError': 1 });
    });

    it('should abort the ingest when a remote embedder returns the wrong dimension', async () => {
      const fetchImpl = jest.fn(
        async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> =>
          new Response(JSON.stringify({ data: [{ index: 0, embedding: [0.1, 0.2, 0.3] }] }), { status: 200 })
      );
      const embedder = new OpenAIEmbeddingProvider({
        baseUrl: 'http://localhost:8080/v1',
        model: 'text-embedding-test',
        dimension: 4,
        apiKey: 'test-secret',
        fetchImpl,
      });
      const { orchestrator, metrics } = createHarness({ embedder, dimension: 4 });

      await expect(orchestrator.ingest([ML_INTRO])).rejects.toBeInstanceOf(IndexConfigurationError);
      expect(orchestrator.stats().documents).toBe(0);
      expect(metrics.snapshot().errorSummary).toEqual({ 'ingest:IndexConfigurationError': 1 });
    });
  });

  // ==========================================================================
  // Search
  // ==========================================================================

  describe('search', () => {
    it('should rank results by descending score', async () => {
      const { orchestrator } = createHarness();
      await orchestrator.ingest([ML_INTRO, PASTA, NEURAL_NETWORKS, GARDENING]);

      const { results } = await orchestrator.search('machine learning', 4);
      const scores = results.map(result => result.score);

      expect(results.map(result => result.documentId)).toEqual(['ml', 'nn', 'pasta', 'garden']);
      for (let i = 1; i < scores.length; i++) {
        expect(scores[i]).toBeLessThanOrEqual(scores[i - 1]);
      }
    });

    it('should return the same order on repeated queries', async () => {
      const { orchestrator, cache } = createHarness();
      await orchestrator.ingest([ML_INTRO, PASTA, NEURAL_NETWORKS, GARDENING]);

      const first = await orchestrator.search('machine learning', 3);
      await cache.clear();
      const second = await orchestrator.search('machine learning', 3);

      expect(second.results.map(result => result.documentId)).toEqual(
        first.results.map(result => result.documentId)
      );
    });

    it('should return no results from an empty index', async () => {
      const { orchestrator } = createHarness();

      const response = await orchestrator.search('anything at all');

      expect(response.results).toEqual([]);
      expect(response.count).toBe(0);
    });

    it('should serve repeated queries from the cache', async () => {
      const { orchestrator, metrics } = createHarness();
      await orchestrator.ingest([ML_INTRO]);

      const first = await orchestrator.search('machine learning');
      const second = await orchestrator.search('  machine learning ');

      expect(JSON.stringify(second)).toBe(JSON.stringify(first));
      expect(metrics.snapshot().endpoints.search.cacheHits).toBe(1);
    });

    it('should cut snippets to the configured length', async () => {
      const { orchestrator } = createHarness({ orchestrator: { snippetLength: 10 } });
      await orchestrator.ingest([ML_INTRO]);

      const { results } = await orchestrator.search('machine learning', 1);

      expect(results[0].snippet).toBe('Machine le...');
    });

    it('should reject invalid requests without recording metrics', async () => {
      const { orchestrator, metrics, cache } = createHarness();

      await expect(orchestrator.search('   ')).rejects.toThrow('Query cannot be empty');
      await expect(orchestrator.search('ml', 0)).rejects.toThrow(ValidationError);
      await expect(orchestrator.search('ml', 101)).rejects.toThrow('Limit must be at most 100, got 101');

      expect(metrics.snapshot().totalRequests).toBe(0);
      expect(cache.stats().misses).toBe(0);
    });

    it('should keep only documents matching every filter', async () => {
      const { orchestrator, metrics } = createHarness();
      await orchestrator.ingest([
        { ...ML_INTRO, metadata: { level: 'intro' } },
        { ...NEURAL_NETWORKS, metadata: { level: 'advanced', lang: 'en' } },
        { ...PASTA, metadata: { level: 'advanced', lang: 'it' } },
      ]);

      const advanced = await orchestrator.search('machine learning', 10, { level: 'advanced' });
      const english = await orchestrator.search('machine learning', 10, { level: 'advanced', lang: 'en' });
      const unfiltered = await orchestrator.search('machine learning', 10);

      expect(advanced.results.map(result => result.documentId)).toEqual(['nn', 'pasta']);
      expect(english.results.map(result => result.documentId)).toEqual(['nn']);
      expect(unfiltered.results.map(result => result.documentId)).toEqual(['ml', 'nn', 'pasta']);
      expect(metrics.snapshot().endpoints.search.cacheHits).toBe(0);
    });

    it('should reject malformed filters without recording metrics', async () => {
      const { orchestrator, metrics } = createHarness();

      await expect(orchestrator.search('ml', 10, 'level=intro')).rejects.toThrow('Filters must be an object');
      await expect(orchestrator.search('ml', 10, { tags: ['a'] })).rejects.toThrow(
        'Filter tags must be a string, finite number or boolean'
      );

      expect(metrics.snapshot().totalRequests).toBe(0);
    });
  });

  // ==========================================================================
  // Generate
  // ==========================================================================

  describe('generate', () => {
    it('should answer from the top three documents', async () => {
      const { orchestrator } = createHarness();
      await orchestrator.ingest([ML_INTRO, PASTA, NEURAL_NETWORKS, GARDENING]);

      const response = await orchestrator.generate('what is machine learning?');

      expect(response.sources.map(source => source.documentId)).toEqual(['ml', 'nn', 'pasta']);
    });

    it('should still call the model when nothing is indexed', async () => {
      const { orchestrator, generator } = createHarness();

      const response = await orchestrator.generate('what is ml?', 200, 0.2);

      expect(response.sources).toEqual([]);
      expect(generator.complete).toHaveBeenCalledTimes(1);
      const request = generator.complete.mock.calls[0][0];
      expect(request.prompt).toContain('Context Information:\n\n\nUser Query: what is ml?');
      expect(request.maxTokens).toBe(200);
      expect(request.temperature).toBe(0.2);
    });

    it('should return cached responses unchanged', async () => {
      const { orchestrator, generator, metrics } = createHarness();
      await orchestrator.ingest([ML_INTRO]);

      const first = await orchestrator.generate('what is machine learning?', 300, 0.5);
      const second = await orchestrator.generate('what is machine learning?', 300, 0.5);

      expect(JSON.stringify(second)).toBe(JSON.stringify(first));
      expect(generator.complete).toHaveBeenCalledTimes(1);
      expect(metrics.snapshot().cacheHits).toBe(1);
    });

    it('should key the cache on generation parameters', async () => {
      const { orchestrator, generator } = createHarness();

      await orchestrator.generate('what is ml?', 300, 0.5);
      await orchestrator.generate('what is ml?', 300, 0.9);

      expect(generator.complete).toHaveBeenCalledTimes(2);
    });

    it('should not cache failed generations', async () => {
      const { orchestrator, generator } = createHarness();
      generator.complete.mockRejectedValueOnce(new GenerationError('Rate limited', 'rate_limited', true, 429));

      await expect(orchestrator.generate('what is ml?')).rejects.toMatchObject({ reason: 'rate_limited' });
      await orchestrator.generate('what is ml?');

      expect(generator.complete).toHaveBeenCalledTimes(2);
    });

    it('should stop and not cache when the caller aborts', async () => {
      const { orchestrator, generator } = createHarness();
      generator.complete.mockImplementationOnce(hangUntilAborted);
      const controller = new AbortController();

      const pending = orchestrator.generate('what is ml?', 500, 0.7, { signal: controller.signal });
      controller.abort();

      await expect(pending).rejects.toMatchObject({ kind: 'GenerationError', reason: 'aborted' });
      await orchestrator.generate('what is ml?');
      expect(generator.complete).toHaveBeenCalledTimes(2);
    });

    it('should report a timeout when the deadline passes', async () => {
      const { orchestrator, generator, metrics } = createHarness();
      generator.complete.mockImplementationOnce(hangUntilAborted);

      await expect(orchestrator.generate('what is ml?', 500, 0.7, { timeoutMs: 10 })).rejects.toMatchObject({
        reason: 'timeout',
        message: 'Generation timed out after 10ms',
      });
      expect(metrics.snapshot().errorSummary).toEqual({ 'generate:GenerationError': 1 });
    });

    it('should reject out-of-range parameters before calling the model', async () => {
      const { orchestrator, generator, metrics } = createHarness();

      await expect(orchestrator.generate('what is ml?', 0)).rejects.toThrow(ValidationError);
      await expect(orchestrator.generate('what is ml?', 500, 2.5)).rejects.toThrow(
        'Temperature must be between 0 and 2, got 2.5'
      );

      expect(generator.complete).not.toHaveBeenCalled();
      expect(metrics.snapshot().totalRequests).toBe(0);
    });
  });

  // ==========================================================================
  // Corpus Changes
  // ==========================================================================

  describe('remove and clear', () => {
    it('should never return a removed document', async () => {
      const { orchestrator } = createHarness();
      await orchestrator.ingest([ML_INTRO, NEURAL_NETWORKS]);

      const before = await orchestrator.search('machine learning', 2);
      expect(before.results[0].documentId).toBe('ml');

      expect(await orchestrator.remove('ml')).toBe(true);
      const after = await orchestrator.search('machine learning', 2);

      expect(after.results.map(result => result.documentId)).toEqual(['nn']);
      expect(await orchestrator.remove('ml')).toBe(false);
    });

    it('should not cache an answer built before a concurrent remove', async () => {
      const { orchestrator, generator } = createHarness();
      const entered = createGate();
      const release = createGate();
      generator.complete.mockImplementationOnce(async () => {
        entered.open();
        await release.opened;
        return { ...COMPLETION };
      });
      await orchestrator.ingest([ML_INTRO]);

      const pending = orchestrator.generate('what is machine learning?');
      await entered.opened;
      await orchestrator.remove('ml');
      release.open();

      const stale = await pending;
      const fresh = await orchestrator.generate('what is machine learning?');

      expect(stale.sources.map(source => source.documentId)).toEqual(['ml']);
      expect(fresh.sources).toEqual([]);
      expect(generator.complete).toHaveBeenCalledTimes(2);
    });

    it('should drop a search result written while the corpus changed', async () => {
      const cache = new GatedCache();
      const { orchestrator } = createHarness({ cache });
      await orchestrator.ingest([ML_INTRO, NEURAL_NETWORKS]);

      const pending = orchestrator.search('machine learning', 2);
      await cache.writeStarted.opened;
      await orchestrator.remove('ml');
      cache.releaseWrite.open();

      const stale = await pending;
      const fresh = await orchestrator.search('machine learning', 2);

      expect(stale.results.map(result => result.documentId)).toEqual(['ml', 'nn']);
      expect(fresh.results.map(result => result.documentId)).toEqual(['nn']);
      expect(cache.stats().size).toBe(1);
    });

    it('should invalidate cached answers when documents are ingested', async () => {
      const { orchestrator } = createHarness();

      const before = await orchestrator.search('neural networks');
      await orchestrator.ingest([NEURAL_NETWORKS]);
      const after = await orchestrator.search('neural networks');

      expect(before.count).toBe(0);
      expect(after.results.map(result => result.documentId)).toEqual(['nn']);
    });

    it('should empty the knowledge base on clear', async () => {
      const { orchestrator } = createHarness();
      await orchestrator.ingest([ML_INTRO, PASTA]);

      await orchestrator.clear();

      expect(orchestrator.stats()).toMatchObject({ documents: 0, indexSize: 0 });
      expect((await orchestrator.search('machine learning')).count).toBe(0);
    });
  });

  // ==========================================================================
  // Metrics, Health & Stats
  // ==========================================================================

  describe('metrics', () => {
    it('should count successes, failures and tokens', async () => {
      const { orchestrator, generator } = createHarness();
      generator.complete
        .mockRejectedValueOnce(new GenerationError('Rate limited', 'rate_limited', true, 429))
        .mockRejectedValueOnce(new GenerationError('Model provider unavailable (503)', 'upstream_failure', true, 503));

      for (let i = 0; i < 5; i++) {
        await orchestrator.generate(`question ${i}`).catch(() => undefined);
      }

      const snapshot = orchestrator.metrics();
      expect(snapshot.totalRequests).toBe(5);
      expect(snapshot.successfulRequests).toBe(3);
      expect(snapshot.failedRequests).toBe(2);
      expect(snapshot.successRate).toBeCloseTo(0.6);
      expect(snapshot.totalTokensUsed).toBe(360);
      expect(snapshot.errorSummary).toEqual({ 'generate:GenerationError': 2 });
      expect(snapshot.recentErrors.map(error => error.message)).toEqual([
        'Rate limited',
        'Model provider unavailable (503)',
      ]);
    });
  });

  describe('health and stats', () => {
    it('should be healthy until the model client fails', async () => {
      const { orchestrator, generator } = createHarness();
      await orchestrator.ingest([ML_INTRO]);

      expect(orchestrator.health()).toMatchObject({
        status: 'healthy',
        checks: { knowledgeBase: 'ok', generation: 'unknown', documents: 1, dimension: DIMENSION },
      });

      generator.state = 'failed';
      expect(orchestrator.health().status).toBe('unhealthy');
    });

    it('should describe the corpus and the cache', async () => {
      const { orchestrator } = createHarness();
      await orchestrator.ingest([ML_INTRO]);
      await orchestrator.search('machine learning');

      expect(orchestrator.stats()).toMatchObject({
        documents: 1,
        indexSize: 1,
        dimension: DIMENSION,
        embeddingModel: 'hashing-bow',
        cache: { backend: 'memory', misses: 1, sets: 1, size: 1 },
      });
    });
  });
});
