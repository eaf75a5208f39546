/**
 * OpenAI Generation Client
 *
 * Non-streaming chat completions against any OpenAI-compatible endpoint
 * (OpenAI itself, or a local server exposing `/v1/chat/completions`).
 */

import { GenerationError, describeError } from '../errors';
import type { Logger } from '../logger';
import { NullLogger } from '../logger';
import { RetryPolicy } from './retry-policy';
import type {
  CompletionRequest,
  CompletionResult,
  GenerationClient,
  GenerationClientState,
  OpenAIGenerationConfig,
} from './types';

// ============================================================================
// OpenAI API Types
// ============================================================================

interface ChatCompletionResponse {
  model?: string;
  choices: Array<{
    message: { role: string; content: string | null };
    finish_reason?: string | null;
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

const DEFAULT_TIMEOUT_MS = 30_000;
const TRANSIENT_STATUSES = [502, 503, 504];
const CREDENTIAL_STATUSES = [401, 403];

// ============================================================================
// Client
// ============================================================================

export class OpenAIGenerationClient implements GenerationClient {
  readonly model: string;

  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;
  private currentState: GenerationClientState = 'unknown';

  constructor(config: OpenAIGenerationConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.model = config.model;
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryPolicy = config.retryPolicy ?? new RetryPolicy();
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.logger = config.logger ?? new NullLogger();
  }

  get state(): GenerationClientState {
    return this.currentState;
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    if (typeof request.prompt !== 'string' || request.prompt.length === 0) {
      throw new GenerationError('Prompt must be a non-empty string', 'invalid_request');
    }
    if (!Number.isInteger(request.maxTokens) || request.maxTokens <= 0) {
      throw new GenerationError(`Invalid maxTokens: ${request.maxTokens}`, 'invalid_request');
    }

    try {
      const result = await this.retryPolicy.execute(attempt => this.attempt(request, attempt), {
        signal: request.signal,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn(`Generation attempt ${attempt} failed, retrying in ${delayMs}ms`, {
            error: describeError(error),
          });
        },
      });
      this.currentState = 'ready';
      return result;
    } catch (error) {
      const failure =
        error instanceof GenerationError
          ? error
          : new GenerationError(`Generation failed: ${describeError(error)}`, 'upstream_failure');
      this.noteFailure(failure);
      throw failure;
    }
  }

  // ============================================================================
  // Single Attempt
  // ============================================================================

  private async attempt(request: CompletionRequest, attempt: number): Promise<CompletionResult> {
    if (request.signal?.aborted) {
      throw new GenerationError('Generation aborted by caller', 'aborted');
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    request.signal?.addEventListener('abort', onCallerAbort, { once: true });

    this.logger.debug(`Requesting completion from ${this.model} (attempt ${attempt})`);

    try {
      const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: this.getHeaders(),
        body: JSON.stringify({
          model: this.model,
          messages: [{ role: 'user', content: request.prompt }],
          max_tokens: request.maxTokens,
          temperature: request.temperature,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const detail = await response.text().catch(() => '');
        throw this.errorForStatus(response.status, detail);
      }

      let data: unknown;
      try {
        data = await response.json();
      } catch (error) {
        if (controller.signal.aborted) throw error;
        throw new GenerationError('Malformed completion response', 'upstream_failure', false, response.status, {
          cause: describeError(error),
        });
      }
      return this.parseResponse(data);
    } catch (error) {
      if (error instanceof GenerationError) throw error;

      if (timedOut) {
        throw new GenerationError(`Generation timed out after ${this.timeoutMs}ms`, 'timeout');
      }
      if (request.signal?.aborted) {
        throw new GenerationError('Generation aborted by caller', 'aborted');
      }
      throw new GenerationError(`Network error: ${describeError(error)}`, 'upstream_failure', true);
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private errorForStatus(status: number, detail: string): GenerationError {
    const suffix = detail ? `: ${detail.slice(0, 200)}` : '';

    if (status === 429) {
      return new GenerationError(`Rate limited by model provider${suffix}`, 'rate_limited', false, status);
    }
    if (status >= 500) {
      return new GenerationError(
        `Model provider error ${status}${suffix}`,
        'upstream_failure',
        TRANSIENT_STATUSES.includes(status),
        status
      );
    }
    return new GenerationError(`Model provider rejected the request (${status})${suffix}`, 'invalid_request', false, status);
  }

  private parseResponse(data: unknown): CompletionResult {
    if (!isChatCompletionResponse(data)) {
      throw new GenerationError('Malformed completion response', 'upstream_failure');
    }

    const choice = data.choices[0];
    const text = choice.message.content ?? '';
    const promptTokens = data.usage?.prompt_tokens ?? 0;
    const completionTokens = data.usage?.completion_tokens ?? 0;

    return {
      text,
      tokenUsage: {
        promptTokens,
        completionTokens,
        totalTokens: data.usage?.total_tokens ?? promptTokens + completionTokens,
      },
      model: data.model ?? this.model,
      finishReason: choice.finish_reason ?? 'unknown',
    };
  }

  private noteFailure(error: GenerationError): void {
    if (error.statusCode !== undefined && CREDENTIAL_STATUSES.includes(error.statusCode)) {
      this.currentState = 'failed';
    } else if (error.reason === 'timeout' || error.reason === 'rate_limited' || error.reason === 'upstream_failure') {
      this.currentState = 'degraded';
    }
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }
    return headers;
  }
}

function isChatCompletionResponse(value: unknown): value is ChatCompletionResponse {
  if (typeof value !== 'object' || value === null) return false;
  if (!('choices' in value) || !Array.isArray(value.choices) || value.choices.length === 0) return false;

  const [choice] = value.choices;
  if (typeof choice !== 'object' || choice === null || !('message' in choice)) return false;

  const message = choice.message;
  return (
    typeof message === 'object' &&
    message !== null &&
    'content' in message &&
    (typeof message.content === 'string' || message.content === null)
  );
}
