/**
 * Embeddings Module
 */

export type { EmbeddingVector, EmbeddingProvider, EmbeddingProviderKind, HttpEmbeddingConfig } from './types';

export { normalizeEmbeddingInput, tokenize } from './text';
export { cosineSimilarity, dotProduct, normalize, vectorNorm, isZeroVector } from './vector-math';
export { HashingEmbeddingProvider, DEFAULT_HASHING_DIMENSION, fnv1a } from './hashing-provider';
export { OllamaEmbeddingProvider, OpenAIEmbeddingProvider } from './http-providers';
