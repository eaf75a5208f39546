/**
 * grounded-rag
 *
 * Retrieval-augmented generation core: embeddings, knowledge base, result
 * cache, generation client, metrics and the orchestrator that ties them.
 */

// Engine
export { createRagEngine, createEmbeddingProvider } from './engine';
export type { RagEngine, RagEngineOverrides } from './engine';

// Configuration
export { loadConfig, DEFAULT_CONFIG } from './config';
export type { RagConfig, RedisConfig } from './config';

// Errors & Logging
export * from './errors';
export { ConsoleLogger, NullLogger, createLogger, isLogLevel, LOG_LEVELS } from './logger';
export type { Logger, LogLevel } from './logger';

// Components
export * from './embeddings';
export * from './knowledge-base';
export * from './result-cache';
export * from './generation';
export * from './metrics';
export * from './orchestrator';
