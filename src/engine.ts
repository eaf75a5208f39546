/**
 * Engine Factory
 *
 * Wires configured components into a ready orchestrator.
 */

import Redis from 'ioredis';
import type { RagConfig } from './config';
import type { EmbeddingProvider } from './embeddings/types';
import { HashingEmbeddingProvider } from './embeddings/hashing-provider';
import { OllamaEmbeddingProvider, OpenAIEmbeddingProvider } from './embeddings/http-providers';
import { OpenAIGenerationClient } from './generation/OpenAIGenerationClient';
import type { GenerationClient } from './generation/types';
import { KnowledgeBase } from './knowledge-base/KnowledgeBase';
import type { Logger } from './logger';
import { createLogger } from './logger';
import { MetricsAggregator } from './metrics/MetricsAggregator';
import { RagOrchestrator } from './orchestrator/RagOrchestrator';
import { MemoryResultCache } from './result-cache/MemoryResultCache';
import { RedisResultCache } from './result-cache/RedisResultCache';
import type { ResultCache } from './result-cache/types';

export interface RagEngine {
  orchestrator: RagOrchestrator;
  knowledgeBase: KnowledgeBase;
  embedder: EmbeddingProvider;
  cache: ResultCache;
  generator: GenerationClient;
  metrics: MetricsAggregator;
  logger: Logger;
  /** Release external connections */
  close(): Promise<void>;
}

/**
 * Components a caller can supply instead of the configured ones
 */
export interface RagEngineOverrides {
  embedder?: EmbeddingProvider;
  cache?: ResultCache;
  generator?: GenerationClient;
  logger?: Logger;
  fetchImpl?: typeof fetch;
}

export function createEmbeddingProvider(config: RagConfig, fetchImpl?: typeof fetch): EmbeddingProvider {
  const { embeddings, generation } = config;

  switch (embeddings.provider) {
    case 'hashing':
      return new HashingEmbeddingProvider(embeddings.dimension);
    case 'ollama':
      return new OllamaEmbeddingProvider({
        baseUrl: embeddings.ollamaBaseUrl,
        model: embeddings.model,
        dimension: embeddings.dimension,
        timeoutMs: generation.timeoutMs,
        fetchImpl,
      });
    case 'openai':
      return new OpenAIEmbeddingProvider({
        baseUrl: generation.baseUrl,
        model: embeddings.model,
        dimension: embeddings.dimension,
        apiKey: generation.apiKey,
        timeoutMs: generation.timeoutMs,
        fetchImpl,
      });
  }
}

export function createRagEngine(config: RagConfig, overrides: RagEngineOverrides = {}): RagEngine {
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const embedder = overrides.embedder ?? createEmbeddingProvider(config, overrides.fetchImpl);

  let redis: Redis | undefined;
  let cache = overrides.cache;
  if (!cache && config.cache.redis) {
    const { host, port, db, password } = config.cache.redis;
    redis = new Redis({ host, port, db, password, lazyConnect: true, maxRetriesPerRequest: 1 });
    redis.on('error', (error: Error) => logger.child('Cache').warn(`Redis connection error: ${error.message}`));
    cache = new RedisResultCache(redis, { logger: logger.child('Cache') });
  }
  cache ??= new MemoryResultCache();

  const generator =
    overrides.generator ??
    new OpenAIGenerationClient({
      baseUrl: config.generation.baseUrl,
      model: config.generation.model,
      apiKey: config.generation.apiKey,
      timeoutMs: config.generation.timeoutMs,
      fetchImpl: overrides.fetchImpl,
      logger: logger.child('Generation'),
    });

  const knowledgeBase = new KnowledgeBase({
    dimension: embedder.dimension,
    logger: logger.child('KnowledgeBase'),
  });
  const metrics = new MetricsAggregator({ logger: logger.child('Metrics') });

  const orchestrator = new RagOrchestrator({
    embedder,
    knowledgeBase,
    cache,
    generator,
    metrics,
    logger: logger.child('Orchestrator'),
    options: {
      maxSearchLimit: config.search.maxResults,
      embedBatchSize: config.embeddings.batchSize,
      searchTtlMs: config.cache.ttlMs,
      generateTtlMs: config.cache.ttlMs,
    },
  });

  return {
    orchestrator,
    knowledgeBase,
    embedder,
    cache,
    generator,
    metrics,
    logger,
    async close() {
      if (redis?.status === 'ready') {
        await redis.quit();
      } else {
        redis?.disconnect();
      }
    },
  };
}
