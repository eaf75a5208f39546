/**
 * Generation Module
 */

export type {
  CompletionRequest,
  CompletionResult,
  TokenUsage,
  GenerationClient,
  GenerationClientState,
  OpenAIGenerationConfig,
} from './types';

export { RetryPolicy, DEFAULT_RETRY_POLICY_CONFIG, isTransientGenerationError } from './retry-policy';
export type { RetryPolicyConfig, RetryHooks } from './retry-policy';
export { OpenAIGenerationClient } from './OpenAIGenerationClient';
