/**
 * Generation Types
 */

import type { Logger } from '../logger';
import type { RetryPolicy } from './retry-policy';

export interface CompletionRequest {
  prompt: string;
  maxTokens: number;
  temperature: number;
  /** Aborts the pending call, including any retry wait */
  signal?: AbortSignal;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionResult {
  text: string;
  tokenUsage: TokenUsage;
  model: string;
  finishReason: string;
}

/**
 * Last known condition of the upstream model:
 * - unknown: no call made yet
 * - ready: last call succeeded
 * - degraded: last call hit a transient failure (timeout, rate limit, 5xx)
 * - failed: last call was rejected for credentials; further calls will fail too
 */
export type GenerationClientState = 'unknown' | 'ready' | 'degraded' | 'failed';

export interface GenerationClient {
  readonly model: string;
  readonly state: GenerationClientState;
  complete(request: CompletionRequest): Promise<CompletionResult>;
}

export interface OpenAIGenerationConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
  /** Per-attempt request timeout */
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}
