/**
 * Metrics Aggregator
 *
 * Request counters, latency window and error history for the RAG endpoints.
 * Every update is a single synchronous step, so interleaved requests on the
 * event loop never observe a half-applied record.
 */

import type { Logger } from '../logger';
import { NullLogger } from '../logger';
import { describeError } from '../errors';
import type {
  Endpoint,
  EndpointStats,
  ErrorRecord,
  MetricsAggregatorOptions,
  MetricsSnapshot,
  RequestRecord,
  ResponseTimeBucket,
} from './types';

const DEFAULT_WINDOW_SIZE = 1000;
const DEFAULT_MAX_RECENT_ERRORS = 100;
const RECENT_WINDOW_MS = 5 * 60 * 1000;
const SLOW_RESPONSE_MS = 200;

interface EndpointCounters {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  cacheHits: number;
  totalResponseTimeMs: number;
  tokensUsed: number;
}

export function bucketFor(durationMs: number): ResponseTimeBucket {
  if (durationMs < 50) return '0-50ms';
  if (durationMs < 100) return '50-100ms';
  if (durationMs < 200) return '100-200ms';
  if (durationMs < 500) return '200-500ms';
  return '500ms+';
}

function emptyDistribution(): Record<ResponseTimeBucket, number> {
  return { '0-50ms': 0, '50-100ms': 0, '100-200ms': 0, '200-500ms': 0, '500ms+': 0 };
}

// ============================================================================
// Metrics Aggregator
// ============================================================================

export class MetricsAggregator {
  private readonly windowSize: number;
  private readonly maxRecentErrors: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  private startedAt: number;
  private totalRequests = 0;
  private successfulRequests = 0;
  private failedRequests = 0;
  private cacheHits = 0;
  private totalTokensUsed = 0;

  private history: RequestRecord[] = [];
  private distribution = emptyDistribution();
  private endpointCounters = new Map<Endpoint, EndpointCounters>();
  private errorCounts = new Map<string, number>();
  private recentErrors: ErrorRecord[] = [];

  constructor(options: MetricsAggregatorOptions = {}) {
    this.windowSize = options.windowSize ?? DEFAULT_WINDOW_SIZE;
    this.maxRecentErrors = options.maxRecentErrors ?? DEFAULT_MAX_RECENT_ERRORS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? new NullLogger();
    this.startedAt = this.now();
  }

  // ============================================================================
  // Recording
  // ============================================================================

  /**
   * Record one finished request. Never throws.
   */
  recordRequest(
    endpoint: Endpoint,
    durationMs: number,
    success: boolean,
    cacheHit: boolean,
    tokensUsed: number = 0
  ): void {
    try {
      const duration = Number.isFinite(durationMs) && durationMs > 0 ? durationMs : 0;
      const tokens = Number.isFinite(tokensUsed) && tokensUsed > 0 ? tokensUsed : 0;

      this.totalRequests++;
      if (success) {
        this.successfulRequests++;
      } else {
        this.failedRequests++;
      }
      if (cacheHit) {
        this.cacheHits++;
      }
      this.totalTokensUsed += tokens;

      this.history.push({ endpoint, durationMs: duration, success, cacheHit, tokensUsed: tokens, timestamp: this.now() });
      if (this.history.length > this.windowSize) {
        this.history.shift();
      }
      this.distribution[bucketFor(duration)]++;

      const counters = this.countersFor(endpoint);
      counters.totalRequests++;
      if (success) {
        counters.successfulRequests++;
      } else {
        counters.failedRequests++;
      }
      if (cacheHit) {
        counters.cacheHits++;
      }
      counters.totalResponseTimeMs += duration;
      counters.tokensUsed += tokens;
    } catch (error) {
      this.logger.error(`Failed to record request metric: ${describeError(error)}`);
    }
  }

  /**
   * Record an error for the error summary. Never throws.
   */
  recordError(endpoint: Endpoint, kind: string, message: string): void {
    try {
      const key = `${endpoint}:${kind}`;
      this.errorCounts.set(key, (this.errorCounts.get(key) ?? 0) + 1);

      this.recentErrors.push({ endpoint, kind, message, timestamp: new Date(this.now()).toISOString() });
      if (this.recentErrors.length > this.maxRecentErrors) {
        this.recentErrors.shift();
      }
    } catch (error) {
      this.logger.error(`Failed to record error metric: ${describeError(error)}`);
    }
  }

  // ============================================================================
  // Reading
  // ============================================================================

  snapshot(): MetricsSnapshot {
    const now = this.now();
    const durations = this.history.map(record => record.durationMs);
    const sorted = [...durations].sort((a, b) => a - b);
    const averageResponseTimeMs = durations.length > 0
      ? durations.reduce((sum, value) => sum + value, 0) / durations.length
      : 0;
    const recentCount = this.history.filter(record => record.timestamp > now - RECENT_WINDOW_MS).length;

    const endpoints: Record<string, EndpointStats> = {};
    for (const [endpoint, counters] of this.endpointCounters) {
      endpoints[endpoint] = {
        totalRequests: counters.totalRequests,
        successfulRequests: counters.successfulRequests,
        failedRequests: counters.failedRequests,
        successRate: counters.successfulRequests / counters.totalRequests,
        cacheHits: counters.cacheHits,
        cacheHitRate: counters.cacheHits / counters.totalRequests,
        averageResponseTimeMs: counters.totalResponseTimeMs / counters.totalRequests,
        tokensUsed: counters.tokensUsed,
      };
    }

    return {
      totalRequests: this.totalRequests,
      successfulRequests: this.successfulRequests,
      failedRequests: this.failedRequests,
      successRate: this.totalRequests > 0 ? this.successfulRequests / this.totalRequests : 0,
      cacheHits: this.cacheHits,
      cacheHitRate: this.totalRequests > 0 ? this.cacheHits / this.totalRequests : 0,
      totalTokensUsed: this.totalTokensUsed,
      averageResponseTimeMs,
      p50ResponseTimeMs: sorted[Math.floor(sorted.length * 0.5)] ?? 0,
      p95ResponseTimeMs: sorted[Math.floor(sorted.length * 0.95)] ?? 0,
      responseTimeDistribution: { ...this.distribution },
      endpoints,
      errorSummary: Object.fromEntries(this.errorCounts),
      recentErrors: this.recentErrors.map(record => ({ ...record })),
      requestsPerMinute: recentCount / (RECENT_WINDOW_MS / 60_000),
      uptimeSeconds: Math.max(0, (now - this.startedAt) / 1000),
      startedAt: new Date(this.startedAt).toISOString(),
      healthScore: this.healthScore(averageResponseTimeMs),
    };
  }

  /**
   * 100, minus up to 50 for the failure rate and up to 25 for an average
   * response time above 200ms
   */
  private healthScore(averageResponseTimeMs: number): number {
    let score = 100;

    if (this.totalRequests > 0) {
      score -= (this.failedRequests / this.totalRequests) * 50;
    }
    if (averageResponseTimeMs > SLOW_RESPONSE_MS) {
      score -= Math.min(25, (averageResponseTimeMs - SLOW_RESPONSE_MS) / 10);
    }

    return Math.max(0, Math.min(100, score));
  }

  reset(): void {
    this.startedAt = this.now();
    this.totalRequests = 0;
    this.successfulRequests = 0;
    this.failedRequests = 0;
    this.cacheHits = 0;
    this.totalTokensUsed = 0;
    this.history = [];
    this.distribution = emptyDistribution();
    this.endpointCounters.clear();
    this.errorCounts.clear();
    this.recentErrors = [];
  }

  private countersFor(endpoint: Endpoint): EndpointCounters {
    let counters = this.endpointCounters.get(endpoint);
    if (!counters) {
      counters = {
        totalRequests: 0,
        successfulRequests: 0,
        failedRequests: 0,
        cacheHits: 0,
        totalResponseTimeMs: 0,
        tokensUsed: 0,
      };
      this.endpointCounters.set(endpoint, counters);
    }
    return counters;
  }
}

