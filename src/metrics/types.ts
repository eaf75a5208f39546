/**
 * Metrics Types
 */

import type { Logger } from '../logger';

export type Endpoint = 'ingest' | 'search' | 'generate';

export const RESPONSE_TIME_BUCKETS = ['0-50ms', '50-100ms', '100-200ms', '200-500ms', '500ms+'] as const;

export type ResponseTimeBucket = (typeof RESPONSE_TIME_BUCKETS)[number];

export interface RequestRecord {
  endpoint: Endpoint;
  durationMs: number;
  success: boolean;
  cacheHit: boolean;
  tokensUsed: number;
  timestamp: number;
}

export interface ErrorRecord {
  endpoint: Endpoint;
  kind: string;
  message: string;
  timestamp: string;
}

export interface EndpointStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  successRate: number;
  cacheHits: number;
  cacheHitRate: number;
  averageResponseTimeMs: number;
  tokensUsed: number;
}

export interface MetricsSnapshot {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  successRate: number;
  cacheHits: number;
  cacheHitRate: number;
  totalTokensUsed: number;
  /** Over the bounded response-time window */
  averageResponseTimeMs: number;
  p50ResponseTimeMs: number;
  p95ResponseTimeMs: number;
  responseTimeDistribution: Record<ResponseTimeBucket, number>;
  endpoints: Record<string, EndpointStats>;
  /** `endpoint:kind` -> count */
  errorSummary: Record<string, number>;
  recentErrors: ErrorRecord[];
  requestsPerMinute: number;
  uptimeSeconds: number;
  startedAt: string;
  healthScore: number;
}

export interface MetricsAggregatorOptions {
  /** Response-time window size */
  windowSize?: number;
  maxRecentErrors?: number;
  now?: () => number;
  logger?: Logger;
}
