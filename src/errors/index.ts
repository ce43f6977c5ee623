/**
 * Centralized Error Types
 *
 * Typed, categorized errors for the chat pipeline and its collaborators.
 *
 * Error Categories:
 * - TRANSIENT: Network, timeout - retryable
 * - PERMANENT: Auth, config - not retryable
 * - RATE_LIMITED: Provider rate limits hit
 * - DEPENDENCY: Document store or provider failures
 * - CANCELLED: Caller went away
 *
 * @example
 * ```typescript
 * throw new StoreError('Insert failed', 'insertMany', { collection: 'messages' }, cause);
 * ```
 */

// =============================================================================
// ERROR CATEGORIES
// =============================================================================

export enum ErrorCategory {
  /** Transient errors - may resolve on retry (network, timeout) */
  TRANSIENT = 'TRANSIENT',

  /** Permanent errors - will not resolve on retry (auth, bad config) */
  PERMANENT = 'PERMANENT',

  /** Rate limited - retry after delay */
  RATE_LIMITED = 'RATE_LIMITED',

  /** Dependency errors - external service failures */
  DEPENDENCY = 'DEPENDENCY',

  /** Internal errors - unexpected internal failures */
  INTERNAL = 'INTERNAL',

  /** Cancelled - operation was cancelled */
  CANCELLED = 'CANCELLED',
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all pipeline errors.
 */
export class PipelineError extends Error {
  /** Error category for recovery decisions */
  readonly category: ErrorCategory;

  /** Whether the error may resolve on retry */
  readonly recoverable: boolean;

  readonly timestamp: Date;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Original error that caused this one (if wrapping) */
  readonly cause?: Error;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = 'PipelineError';
    this.category = category;
    this.recoverable = recoverable;
    this.timestamp = new Date();
    this.context = context ?? {};
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toLogString(): string {
    const parts = [`[${this.name}]`, `(${this.category})`, this.message];

    if (Object.keys(this.context).length > 0) {
      parts.push(`context=${JSON.stringify(this.context)}`);
    }

    return parts.join(' ');
  }
}

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * Error from the document store.
 */
export class StoreError extends PipelineError {
  /** Store operation that failed (find, insertMany, upsert...) */
  readonly operation: string;

  constructor(
    message: string,
    operation: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, ErrorCategory.DEPENDENCY, true, { ...context, operation }, cause);
    this.name = 'StoreError';
    this.operation = operation;
  }

  static fromError(error: unknown, operation: string, context?: Record<string, unknown>): StoreError {
    const err = toError(error);
    return new StoreError(err.message, operation, context, err);
  }
}

/**
 * Error from text-generation provider calls.
 */
export class ProviderError extends PipelineError {
  readonly providerName: string;

  /** HTTP status code if applicable */
  readonly statusCode?: number;

  constructor(
    message: string,
    category: ErrorCategory,
    recoverable: boolean,
    providerName: string,
    statusCode?: number,
    cause?: Error
  ) {
    super(message, category, recoverable, { provider: providerName, statusCode }, cause);
    this.name = 'ProviderError';
    this.providerName = providerName;
    this.statusCode = statusCode;
  }

  static rateLimited(providerName: string, retryAfter?: number): ProviderError {
    const suffix = retryAfter !== undefined ? ` (retry after ${retryAfter}s)` : '';
    return new ProviderError(
      `Rate limited by ${providerName}${suffix}`,
      ErrorCategory.RATE_LIMITED,
      true,
      providerName,
      429
    );
  }

  static authenticationFailed(providerName: string, statusCode = 401): ProviderError {
    return new ProviderError(
      `Authentication failed for ${providerName}`,
      ErrorCategory.PERMANENT,
      false,
      providerName,
      statusCode
    );
  }

  static serverError(providerName: string, statusCode: number, detail?: string): ProviderError {
    return new ProviderError(
      `Server error from ${providerName}: ${statusCode}${detail ? ` ${detail}` : ''}`,
      statusCode >= 500 ? ErrorCategory.TRANSIENT : ErrorCategory.PERMANENT,
      statusCode >= 500,
      providerName,
      statusCode
    );
  }

  static notConfigured(providerName: string, missing: string): ProviderError {
    return new ProviderError(
      `${providerName} is not configured: ${missing} is not set`,
      ErrorCategory.PERMANENT,
      false,
      providerName
    );
  }
}

/**
 * Error when an operation is cancelled.
 */
export class CancellationError extends PipelineError {
  readonly reason: string;

  constructor(reason: string = 'Operation cancelled') {
    super(reason, ErrorCategory.CANCELLED, false, { reason });
    this.name = 'CancellationError';
    this.reason = reason;
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function isCancellationError(error: unknown): error is CancellationError {
  return error instanceof CancellationError;
}

/**
 * Plain message for callers (the `error` stream event, HTTP error bodies).
 */
export function formatError(error: unknown): string {
  if (error instanceof PipelineError) {
    return `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Format error for logging with full details.
 */
export function formatErrorForLog(error: unknown): string {
  if (error instanceof PipelineError) {
    return error.toLogString();
  }
  if (error instanceof Error) {
    return `[Error] ${error.message}`;
  }
  return `[Unknown] ${String(error)}`;
}
