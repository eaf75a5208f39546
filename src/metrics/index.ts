/**
 * Metrics Module
 */

export { MetricsAggregator, bucketFor } from './MetricsAggregator';
export { RESPONSE_TIME_BUCKETS } from './types';
export type {
  Endpoint,
  ResponseTimeBucket,
  RequestRecord,
  ErrorRecord,
  EndpointStats,
  MetricsSnapshot,
  MetricsAggregatorOptions,
} from './types';
