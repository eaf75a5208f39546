/**
 * Orchestrator Types
 *
 * Request and response shapes of the RAG pipeline.
 */

import type { Logger } from '../logger';
import type { ErrorKind } from '../errors';
import type { EmbeddingProvider } from '../embeddings/types';
import type { GenerationClient, GenerationClientState } from '../generation/types';
import type { KnowledgeBase } from '../knowledge-base/KnowledgeBase';
import type { MetricsAggregator } from '../metrics/MetricsAggregator';
import type { CacheStats, ResultCache } from '../result-cache/types';

// =============================================================================
// Search
// =============================================================================

export interface SearchResult {
  documentId: string;
  title: string;
  url: string;
  /** Cosine similarity in [-1, 1] */
  score: number;
  snippet: string;
}

export interface SearchResponse {
  results: SearchResult[];
  count: number;
  responseTimeMs: number;
}

// =============================================================================
// Generate
// =============================================================================

export interface GenerationSource {
  documentId: string;
  title: string;
  url: string;
  snippet: string;
  score: number;
}

export interface GenerateResponse {
  content: string;
  sources: GenerationSource[];
  tokensUsed: number;
  responseTimeMs: number;
}

export interface GenerateOptions {
  /** Caller-side cancellation */
  signal?: AbortSignal;
  /** Overall deadline for the model call */
  timeoutMs?: number;
}

// =============================================================================
// Ingest
// =============================================================================

export interface IngestFailure {
  /** Position in the submitted batch */
  index: number;
  documentId?: string;
  kind: ErrorKind;
  message: string;
}

export interface IngestResponse {
  processedCount: number;
  skippedCount: number;
  failures: IngestFailure[];
  responseTimeMs: number;
}

// =============================================================================
// Health & Stats
// =============================================================================

export interface HealthReport {
  status: 'healthy' | 'unhealthy';
  checks: {
    knowledgeBase: 'ok' | 'inconsistent';
    generation: GenerationClientState;
    documents: number;
    dimension: number | null;
  };
  timestamp: string;
}

export interface OrchestratorStats {
  documents: number;
  indexSize: number;
  dimension: number | null;
  embeddingModel: string;
  cache: CacheStats & { backend: 'memory' | 'redis' };
}

// =============================================================================
// Options
// =============================================================================

export interface OrchestratorOptions {
  maxSearchLimit: number;
  snippetLength: number;
  contextDocuments: number;
  maxContextTokens: number;
  embedBatchSize: number;
  searchTtlMs: number;
  generateTtlMs: number;
}

export const DEFAULT_ORCHESTRATOR_OPTIONS: OrchestratorOptions = {
  maxSearchLimit: 100,
  snippetLength: 200,
  contextDocuments: 3,
  maxContextTokens: 4000,
  embedBatchSize: 100,
  searchTtlMs: 60 * 60 * 1000,
  generateTtlMs: 60 * 60 * 1000,
};

export interface RagOrchestratorDeps {
  embedder: EmbeddingProvider;
  knowledgeBase: KnowledgeBase;
  cache: ResultCache;
  generator: GenerationClient;
  metrics: MetricsAggregator;
  logger?: Logger;
  options?: Partial<OrchestratorOptions>;
}
