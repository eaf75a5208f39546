/**
 * Error Types
 *
 * Every error surfaced by the RAG core carries a machine-readable kind and code,
 * a human-readable message and the time it was raised.
 */

export type ErrorKind =
  | 'ValidationError'
  | 'ProviderError'
  | 'GenerationError'
  | 'IndexConsistencyError'
  | 'IndexConfigurationError'
  | 'ConfigurationError'
  | 'LockTimeoutError'
  | 'SnapshotError'
  | 'InternalError';

export type ErrorContext = Record<string, unknown>;

// ============================================================================
// Base Error
// ============================================================================

export class RagError extends Error {
  public readonly kind: ErrorKind;
  public readonly code: string;
  public readonly context?: ErrorContext;
  public readonly timestamp: Date;

  constructor(kind: ErrorKind, message: string, code: string, context?: ErrorContext) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.code = code;
    this.context = context;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      kind: this.kind,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
    };
  }
}

// ============================================================================
// Request Errors
// ============================================================================

export class ValidationError extends RagError {
  constructor(message: string, public readonly field?: string, context?: ErrorContext) {
    super('ValidationError', message, 'VALIDATION_FAILED', { ...context, field });
  }
}

export type ProviderErrorCode = 'EMPTY_INPUT' | 'ZERO_VECTOR' | 'DIMENSION_MISMATCH' | 'BACKEND_FAILURE';

export class ProviderError extends RagError {
  constructor(message: string, code: ProviderErrorCode, context?: ErrorContext) {
    super('ProviderError', message, code, context);
  }
}

export type GenerationFailureReason =
  | 'timeout'
  | 'rate_limited'
  | 'invalid_request'
  | 'upstream_failure'
  | 'aborted';

export class GenerationError extends RagError {
  constructor(
    message: string,
    public readonly reason: GenerationFailureReason,
    public readonly transient: boolean = false,
    public readonly statusCode?: number,
    context?: ErrorContext
  ) {
    super('GenerationError', message, reason.toUpperCase(), { ...context, statusCode });
  }

  toJSON() {
    return { ...super.toJSON(), reason: this.reason };
  }
}

// ============================================================================
// Index Errors
// ============================================================================

export class IndexConsistencyError extends RagError {
  constructor(documentId: string) {
    super(
      'IndexConsistencyError',
      `Index entry has no matching document: ${documentId}`,
      'DANGLING_INDEX_ENTRY',
      { documentId }
    );
  }
}

export class IndexConfigurationError extends RagError {
  constructor(
    expected: number,
    actual: number,
    message: string = `Vector dimension mismatch: index holds ${expected}-dimensional vectors, got ${actual}`
  ) {
    super('IndexConfigurationError', message, 'DIMENSION_MISMATCH', { expected, actual });
  }
}

// ============================================================================
// Infrastructure Errors
// ============================================================================

export class ConfigurationError extends RagError {
  constructor(message: string, public readonly variable?: string) {
    super('ConfigurationError', message, 'INVALID_CONFIGURATION', { variable });
  }
}

export class LockTimeoutError extends RagError {
  constructor(timeoutMs: number) {
    super('LockTimeoutError', `Write lock acquisition timed out after ${timeoutMs}ms`, 'LOCK_TIMEOUT', {
      timeoutMs,
    });
  }
}

export class SnapshotError extends RagError {
  constructor(message: string, path: string) {
    super('SnapshotError', message, 'SNAPSHOT_FAILED', { path });
  }
}

// ============================================================================
// Error Payloads
// ============================================================================

export interface ErrorPayload {
  error: {
    kind: ErrorKind;
    code: string;
    message: string;
    timestamp: string;
    reason?: GenerationFailureReason;
  };
}

/**
 * Render any thrown value as the payload adapters hand back to callers
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof RagError) {
    return {
      error: {
        kind: error.kind,
        code: error.code,
        message: error.message,
        timestamp: error.timestamp.toISOString(),
        ...(error instanceof GenerationError ? { reason: error.reason } : {}),
      },
    };
  }

  return {
    error: {
      kind: 'InternalError',
      code: 'INTERNAL_ERROR',
      message: error instanceof Error ? error.message : String(error),
      timestamp: new Date().toISOString(),
    },
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
