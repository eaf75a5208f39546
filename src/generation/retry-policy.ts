/**
 * Retry Policy
 *
 * One object owns the retry decision for generation calls: how many attempts,
 * how long to wait between them, and which errors are worth another try.
 */

import { GenerationError } from '../errors';

export interface RetryPolicyConfig {
  /** Total attempts including the first */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitter: boolean;
  isRetryable: (error: unknown) => boolean;
}

/**
 * Network failures and gateway errors; never a timeout, rate limit or a
 * rejected request
 */
export function isTransientGenerationError(error: unknown): boolean {
  return error instanceof GenerationError && error.transient;
}

export const DEFAULT_RETRY_POLICY_CONFIG: RetryPolicyConfig = {
  maxAttempts: 2,
  initialDelayMs: 250,
  maxDelayMs: 2_000,
  backoffMultiplier: 2,
  jitter: true,
  isRetryable: isTransientGenerationError,
};

export interface RetryHooks {
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export class RetryPolicy {
  readonly config: RetryPolicyConfig;

  constructor(config: Partial<RetryPolicyConfig> = {}) {
    this.config = { ...DEFAULT_RETRY_POLICY_CONFIG, ...config };
  }

  /**
   * Delay after the given failed attempt (1-based): exponential, capped,
   * optionally with +/-20% jitter
   */
  getDelay(attempt: number): number {
    let delay = this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    delay = Math.min(delay, this.config.maxDelayMs);

    if (this.config.jitter) {
      const jitterAmount = delay * 0.2;
      delay = delay - jitterAmount + Math.random() * jitterAmount * 2;
    }

    return Math.floor(delay);
  }

  shouldRetry(error: unknown, attempt: number): boolean {
    return attempt < this.config.maxAttempts && this.config.isRetryable(error);
  }

  /**
   * Run `fn` until it succeeds, fails with a non-retryable error, or runs out
   * of attempts. The last error is rethrown unchanged.
   */
  async execute<T>(fn: (attempt: number) => Promise<T>, hooks: RetryHooks = {}): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (error) {
        if (hooks.signal?.aborted || !this.shouldRetry(error, attempt)) {
          throw error;
        }

        const delay = this.getDelay(attempt);
        hooks.onRetry?.(error, attempt, delay);
        await sleep(delay, hooks.signal);
      }
    }
  }
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}
