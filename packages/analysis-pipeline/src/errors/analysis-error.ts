import { APICallError, NoObjectGeneratedError } from 'ai';

/**
 * AnalysisError
 *
 * Base error class for analysis pipeline failures.
 */
export class AnalysisError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AnalysisError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create AnalysisError from unknown error with context
   */
  static fromError(context: string, error: unknown): AnalysisError {
    return new AnalysisError(
      `${context}: ${AnalysisError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * ConfigurationError
 *
 * Invalid options or a model/content-kind mismatch. Never retried.
 */
export class ConfigurationError extends AnalysisError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(
      issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message,
    );
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export type TransientReason =
  | 'timeout'
  | 'rate_limit'
  | 'transport'
  | 'malformed_response';

/**
 * TransientCallError
 *
 * A retryable failure that exhausted the retry policy.
 */
export class TransientCallError extends AnalysisError {
  readonly reason: TransientReason;
  readonly attempts: number;

  constructor(
    reason: TransientReason,
    attempts: number,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'TransientCallError';
    this.reason = reason;
    this.attempts = attempts;
  }
}

/**
 * SchemaValidationError
 *
 * The response never conformed to the analysis schema.
 */
export class SchemaValidationError extends AnalysisError {
  readonly attempts: number;

  constructor(attempts: number, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SchemaValidationError';
    this.attempts = attempts;
  }
}

/**
 * ModelCallError
 *
 * Non-retryable provider failure (bad request, authentication, etc.)
 */
export class ModelCallError extends AnalysisError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ModelCallError';
    this.statusCode = statusCode;
  }
}

export type AbortReason = 'deadline' | 'cancelled';

/**
 * AnalysisAbortedError
 *
 * The request deadline elapsed or the caller cancelled.
 */
export class AnalysisAbortedError extends AnalysisError {
  readonly reason: AbortReason;

  constructor(reason: AbortReason, options?: ErrorOptions) {
    super(
      reason === 'deadline'
        ? 'Analysis deadline exceeded'
        : 'Analysis cancelled by caller',
      options,
    );
    this.name = 'AnalysisAbortedError';
    this.reason = reason;
  }
}

export interface ChunkFailure {
  chunkIndex: number;
  error: Error;
}

/**
 * ChunkedAnalysisError
 *
 * Every chunk of a chunked analysis failed.
 */
export class ChunkedAnalysisError extends AnalysisError {
  readonly failures: ChunkFailure[];

  constructor(failures: ChunkFailure[]) {
    super(
      `All ${failures.length} chunk(s) failed: ${failures
        .map((f) => `#${f.chunkIndex} ${f.error.message}`)
        .join('; ')}`,
    );
    this.name = 'ChunkedAnalysisError';
    this.failures = failures;
  }
}

/**
 * Retry classification of a provider error
 */
export type ModelErrorClass =
  | { retryable: true; reason: TransientReason }
  | { retryable: false; statusCode?: number };

/**
 * Classify an error thrown by the model provider.
 *
 * - `APICallError` with `isRetryable`: 429 → rate_limit, otherwise transport
 * - `NoObjectGeneratedError` → malformed_response
 * - `TimeoutError` → timeout
 * - `TypeError` raised by fetch → transport
 * - everything else, including caller aborts, is not retried
 */
export function classifyModelError(error: unknown): ModelErrorClass {
  if (APICallError.isInstance(error)) {
    if (!error.isRetryable) {
      return { retryable: false, statusCode: error.statusCode };
    }
    return {
      retryable: true,
      reason: error.statusCode === 429 ? 'rate_limit' : 'transport',
    };
  }
  if (NoObjectGeneratedError.isInstance(error)) {
    return { retryable: true, reason: 'malformed_response' };
  }
  if (error instanceof Error) {
    if (error.name === 'TimeoutError') {
      return { retryable: true, reason: 'timeout' };
    }
    if (error instanceof TypeError && /fetch/i.test(error.message)) {
      return { retryable: true, reason: 'transport' };
    }
  }
  return { retryable: false };
}

export function isRetryableModelError(error: unknown): boolean {
  return classifyModelError(error).retryable;
}
