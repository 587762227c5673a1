import type { LoggerMethods } from '@legisight/logger';
import type {
  ExtendedTokenUsage,
  LLMCallResult,
  LLMRetryInfo,
  LLMTokenUsageAggregator,
  ModelCallLimiter,
} from '@legisight/shared';
import type { LanguageModel, ModelMessage } from 'ai';
import type { z } from 'zod';

import { LLMCallFailedError, LLMCaller, RetryPolicy } from '@legisight/shared';
import { ZodError } from 'zod';

import {
  AnalysisAbortedError,
  AnalysisError,
  ModelCallError,
  SchemaValidationError,
  TransientCallError,
  classifyModelError,
  isRetryableModelError,
} from '../errors';

/**
 * Base options for all LLM-based components
 */
export interface BaseLLMComponentOptions {
  /**
   * Maximum retry count per model (default: 3)
   */
  maxRetries?: number;

  /**
   * Delay before the first retry in milliseconds (default: 1000)
   */
  retryBaseDelayMs?: number;

  /**
   * Upper bound for a single retry delay in milliseconds (default: 30000)
   */
  retryMaxDelayMs?: number;

  /**
   * Temperature for LLM generation (default: 0.2)
   */
  temperature?: number;

  /**
   * Process-wide cap on in-flight model calls
   */
  limiter?: ModelCallLimiter;

  /**
   * Replaces the backoff wait, mainly for tests
   */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

interface CallOptions {
  phase: string;
  abortSignal?: AbortSignal;
}

/**
 * Abstract base class for all LLM-based components
 *
 * Provides common functionality:
 * - Consistent logging with component name prefix
 * - Token usage tracking via optional aggregator
 * - A shared retry policy and call limiter for every model call
 * - Translation of provider failures into the AnalysisError taxonomy
 */
export abstract class BaseLLMComponent {
  protected readonly logger: LoggerMethods;
  protected readonly model: LanguageModel;
  protected readonly fallbackModel?: LanguageModel;
  protected readonly temperature: number;
  protected readonly componentName: string;
  protected readonly aggregator?: LLMTokenUsageAggregator;
  protected readonly retryPolicy: RetryPolicy;
  protected readonly limiter?: ModelCallLimiter;

  /**
   * @param componentName - Name of the component for logging (e.g., "ModelClient")
   * @param fallbackModel - Optional fallback model tried after the primary gives up
   * @param aggregator - Optional token usage aggregator for tracking LLM calls
   */
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    componentName: string,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    this.logger = logger;
    this.model = model;
    this.componentName = componentName;
    this.temperature = options?.temperature ?? 0.2;
    this.fallbackModel = fallbackModel;
    this.aggregator = aggregator;
    this.limiter = options?.limiter;
    this.retryPolicy = RetryPolicy.fromMaxRetries(options?.maxRetries ?? 3, {
      baseDelayMs: options?.retryBaseDelayMs,
      maxDelayMs: options?.retryMaxDelayMs,
      isRetryable: isRetryableModelError,
      sleep: options?.sleep,
    });
  }

  /**
   * Log a message with consistent component name prefix
   */
  protected log(
    level: 'debug' | 'info' | 'warn' | 'error',
    message: string,
    ...args: unknown[]
  ): void {
    const formattedMessage = `[${this.componentName}] ${message}`;
    this.logger[level](formattedMessage, ...args);
  }

  /**
   * Track token usage to aggregator if available
   */
  protected trackUsage(usage: ExtendedTokenUsage): void {
    if (this.aggregator) {
      this.aggregator.track(usage);
    }
  }

  /**
   * Call the model with text prompts
   *
   * @throws AnalysisError subclass describing the failure
   */
  protected async callTextLLM<TOutput>(
    schema: z.ZodType<TOutput>,
    schemaName: string,
    systemPrompt: string,
    userPrompt: string,
    options: CallOptions,
  ): Promise<LLMCallResult<TOutput>> {
    return this.execute(options, () =>
      LLMCaller.call({
        ...this.callSettings(options),
        schema,
        schemaName,
        systemPrompt,
        userPrompt,
      }),
    );
  }

  /**
   * Call the model with messages carrying file or image parts
   *
   * @throws AnalysisError subclass describing the failure
   */
  protected async callVisionLLM<TOutput>(
    schema: z.ZodType<TOutput>,
    schemaName: string,
    systemPrompt: string,
    messages: ModelMessage[],
    options: CallOptions,
  ): Promise<LLMCallResult<TOutput>> {
    return this.execute(options, () =>
      LLMCaller.callVision({
        ...this.callSettings(options),
        schema,
        schemaName,
        systemPrompt,
        messages,
      }),
    );
  }

  private callSettings(options: CallOptions) {
    return {
      primaryModel: this.model,
      fallbackModel: this.fallbackModel,
      retryPolicy: this.retryPolicy,
      limiter: this.limiter,
      temperature: this.temperature,
      abortSignal: options.abortSignal,
      component: this.componentName,
      phase: options.phase,
      onRetry: (info: LLMRetryInfo) =>
        this.log(
          'warn',
          `${options.phase} call to ${info.modelName} failed (attempt ${info.attempt}), retrying in ${info.delayMs}ms: ${AnalysisError.getErrorMessage(info.error)}`,
        ),
    };
  }

  private async execute<TOutput>(
    options: CallOptions,
    call: () => Promise<LLMCallResult<TOutput>>,
  ): Promise<LLMCallResult<TOutput>> {
    try {
      const result = await call();
      this.trackUsage(result.usage);
      if (result.usedFallback) {
        this.log(
          'warn',
          `${options.phase} call succeeded on fallback model ${result.usage.modelName}`,
        );
      }
      return result;
    } catch (error) {
      throw this.toAnalysisError(error, options.abortSignal);
    }
  }

  /**
   * Map an LLMCaller failure to the AnalysisError taxonomy
   */
  protected toAnalysisError(
    error: unknown,
    abortSignal?: AbortSignal,
  ): AnalysisError {
    if (error instanceof AnalysisError) return error;

    if (abortSignal?.aborted) {
      return new AnalysisAbortedError(abortReasonOf(abortSignal), {
        cause: error,
      });
    }

    const attempts = error instanceof LLMCallFailedError ? error.attempts : 1;
    const cause = error instanceof LLMCallFailedError ? error.cause : error;
    const message = AnalysisError.getErrorMessage(error);

    if (cause instanceof ZodError) {
      return new SchemaValidationError(attempts, message, { cause });
    }

    const classification = classifyModelError(cause);
    if (!classification.retryable) {
      return new ModelCallError(message, classification.statusCode, {
        cause,
      });
    }
    if (classification.reason === 'malformed_response') {
      return new SchemaValidationError(attempts, message, { cause });
    }
    return new TransientCallError(classification.reason, attempts, message, {
      cause,
    });
  }
}

/**
 * Whether an aborted signal fired because of a timeout or a caller cancel
 */
export function abortReasonOf(signal: AbortSignal): 'deadline' | 'cancelled' {
  const reason: unknown = signal.reason;
  return typeof reason === 'object' &&
    reason !== null &&
    'name' in reason &&
    reason.name === 'TimeoutError'
    ? 'deadline'
    : 'cancelled';
}
