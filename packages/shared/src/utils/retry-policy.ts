import { delay } from 'es-toolkit';

/**
 * Options for RetryPolicy
 */
export interface RetryPolicyOptions {
  /**
   * Total attempts including the first one (default: 4)
   */
  maxAttempts?: number;

  /**
   * Delay before the second attempt in milliseconds (default: 1000)
   */
  baseDelayMs?: number;

  /**
   * Upper bound for any single delay in milliseconds (default: 30000)
   */
  maxDelayMs?: number;

  /**
   * Growth factor between consecutive delays (default: 2)
   */
  multiplier?: number;

  /**
   * Decides whether a failure is worth another attempt (default: always)
   */
  isRetryable?: (error: unknown) => boolean;

  /**
   * Wait implementation, replaceable in tests (default: abortable delay)
   */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Information passed to the onRetry hook before each backoff wait
 */
export interface RetryAttemptInfo {
  /**
   * 1-based number of the attempt that just failed
   */
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryExecuteOptions {
  abortSignal?: AbortSignal;
  onRetry?: (info: RetryAttemptInfo) => void;
}

/**
 * RetryExhaustedError
 *
 * Thrown when every attempt failed with a retryable error.
 * The last failure is kept as `lastError` (and as `cause`).
 */
export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    const reason =
      lastError instanceof Error ? lastError.message : String(lastError);
    super(`Gave up after ${attempts} attempt(s): ${reason}`, {
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * RetryPolicy - bounded exponential backoff
 *
 * Delay after failed attempt n is `baseDelayMs * multiplier^(n-1)`, capped at
 * `maxDelayMs`. Non-retryable errors and aborts are rethrown as-is without
 * waiting.
 *
 * @example
 * ```typescript
 * const policy = RetryPolicy.fromMaxRetries(3, {
 *   baseDelayMs: 1000,
 *   isRetryable: (error) => error instanceof TimeoutError,
 * });
 *
 * const result = await policy.execute(() => callProvider());
 * // waits 1000ms, 2000ms, 4000ms between the four attempts
 * ```
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly multiplier: number;
  private readonly retryable: (error: unknown) => boolean;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? 4));
    this.baseDelayMs = Math.max(0, options.baseDelayMs ?? 1000);
    this.maxDelayMs = Math.max(this.baseDelayMs, options.maxDelayMs ?? 30_000);
    this.multiplier = Math.max(1, options.multiplier ?? 2);
    this.retryable = options.isRetryable ?? (() => true);
    this.sleep =
      options.sleep ?? ((ms, signal) => delay(ms, { signal }));
  }

  /**
   * Create a policy from a retry count (attempts = maxRetries + 1)
   */
  static fromMaxRetries(
    maxRetries: number,
    options: Omit<RetryPolicyOptions, 'maxAttempts'> = {},
  ): RetryPolicy {
    return new RetryPolicy({ ...options, maxAttempts: maxRetries + 1 });
  }

  /**
   * Backoff delay after the given failed attempt (1-based)
   */
  delayFor(attempt: number): number {
    const exponent = Math.max(0, attempt - 1);
    return Math.min(
      this.maxDelayMs,
      this.baseDelayMs * Math.pow(this.multiplier, exponent),
    );
  }

  isRetryable(error: unknown): boolean {
    return this.retryable(error);
  }

  /**
   * Run the operation until it succeeds, fails with a non-retryable error,
   * or runs out of attempts.
   *
   * @throws RetryExhaustedError when every attempt failed with a retryable error
   */
  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryExecuteOptions = {},
  ): Promise<T> {
    let attempt = 0;

    for (;;) {
      attempt++;
      try {
        return await operation(attempt);
      } catch (error) {
        if (options.abortSignal?.aborted || !this.retryable(error)) {
          throw error;
        }
        if (attempt >= this.maxAttempts) {
          throw new RetryExhaustedError(attempt, error);
        }

        const delayMs = this.delayFor(attempt);
        options.onRetry?.({ attempt, delayMs, error });
        await this.sleep(delayMs, options.abortSignal);
      }
    }
  }
}
