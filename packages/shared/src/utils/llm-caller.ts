import type { z } from 'zod';

import {
  type LanguageModel,
  type LanguageModelUsage,
  type ModelMessage,
  generateObject,
} from 'ai';

import type { ModelCallLimiter } from './model-call-limiter';
import type { RetryAttemptInfo, RetryPolicy } from './retry-policy';

import {
  type ProviderType,
  detectProvider,
  getModelId,
} from './provider-detector';
import { RetryExhaustedError } from './retry-policy';

/**
 * Options shared by text and vision calls
 */
interface LLMCallBaseConfig<TSchema extends z.ZodType> {
  /**
   * Zod schema for response validation
   */
  schema: TSchema;

  /**
   * Name and description handed to the provider alongside the JSON schema
   */
  schemaName?: string;
  schemaDescription?: string;

  /**
   * Primary model for the call (required)
   */
  primaryModel: LanguageModel;

  /**
   * Fallback model, tried once the primary model exhausts its retry policy
   */
  fallbackModel?: LanguageModel;

  /**
   * Backoff policy applied per model
   */
  retryPolicy: RetryPolicy;

  /**
   * Shared concurrency cap; each attempt holds one slot, backoff waits do not
   */
  limiter?: ModelCallLimiter;

  /**
   * Temperature for generation (optional, 0-1)
   */
  temperature?: number;

  /**
   * Abort signal for cancellation and deadlines
   */
  abortSignal?: AbortSignal;

  /**
   * Component name for tracking (e.g., 'ModelClient', 'SummarySynthesizer')
   */
  component: string;

  /**
   * Phase name for tracking (e.g., 'direct', 'chunk', 'vision')
   */
  phase: string;

  /**
   * Called before each backoff wait
   */
  onRetry?: (info: LLMRetryInfo) => void;
}

/**
 * Configuration for a text call
 */
export interface LLMCallConfig<TSchema extends z.ZodType>
  extends LLMCallBaseConfig<TSchema> {
  systemPrompt: string;
  userPrompt: string;
}

/**
 * Configuration for a vision call with message format
 */
export interface LLMVisionCallConfig<TSchema extends z.ZodType>
  extends LLMCallBaseConfig<TSchema> {
  systemPrompt?: string;

  /**
   * Messages carrying image or file parts (instead of userPrompt)
   */
  messages: ModelMessage[];
}

export interface LLMRetryInfo extends RetryAttemptInfo {
  modelName: string;
  role: 'primary' | 'fallback';
}

/**
 * Token usage information with model tracking
 */
export interface ExtendedTokenUsage {
  component: string;
  phase: string;
  model: 'primary' | 'fallback';
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Result of LLM call including usage information
 */
export interface LLMCallResult<T> {
  output: T;
  usage: ExtendedTokenUsage;
  usedFallback: boolean;

  /**
   * Attempts made across primary and fallback models
   */
  attempts: number;

  provider: ProviderType;
}

/**
 * Failure raised after the primary (and fallback, if any) model gave up.
 * `cause` is the last underlying provider error.
 */
export class LLMCallFailedError extends Error {
  readonly attempts: number;
  readonly modelName: string;

  constructor(modelName: string, attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `LLM call to ${modelName} failed after ${attempts} attempt(s): ${reason}`,
      { cause },
    );
    this.name = 'LLMCallFailedError';
    this.attempts = attempts;
    this.modelName = modelName;
  }
}

type PromptInput =
  | { kind: 'text'; system: string; prompt: string }
  | { kind: 'messages'; system?: string; messages: ModelMessage[] };

type GenerateSettings = Pick<
  LLMCallBaseConfig<z.ZodType>,
  'schemaName' | 'schemaDescription' | 'temperature' | 'abortSignal'
>;

interface GenerateResponse {
  object: unknown;
  usage: LanguageModelUsage;
}

/**
 * LLMCaller - Centralized LLM API caller with retry and fallback support
 *
 * Wraps AI SDK's generateObject with the caller's retry strategy:
 * 1. Try primary model under the retry policy (SDK-level retries disabled)
 * 2. If it gives up and fallbackModel provided, try fallback under the same policy
 * 3. Return usage data with model type indicator
 *
 * @example
 * ```typescript
 * const result = await LLMCaller.call({
 *   schema: AnalysisSchema,
 *   systemPrompt: 'You are a legislative analyst',
 *   userPrompt: 'Analyze the following bill...',
 *   primaryModel: openai('gpt-4o'),
 *   fallbackModel: anthropic('claude-sonnet-4'),
 *   retryPolicy: RetryPolicy.fromMaxRetries(3),
 *   component: 'ModelClient',
 *   phase: 'direct',
 * });
 *
 * console.log(result.output);        // Parsed result
 * console.log(result.usage);         // Token usage with model info
 * console.log(result.usedFallback);  // Whether fallback was used
 * ```
 */
export class LLMCaller {
  /**
   * Call LLM with retry and fallback support
   *
   * @throws LLMCallFailedError when every attempt on every model failed
   */
  static async call<TOutput = unknown>(
    config: LLMCallConfig<z.ZodType<TOutput>>,
  ): Promise<LLMCallResult<TOutput>> {
    return this.executeWithFallback(config, {
      kind: 'text',
      system: config.systemPrompt,
      prompt: config.userPrompt,
    });
  }

  /**
   * Call LLM for vision tasks with message format support
   *
   * Same retry and fallback logic as call(), using messages instead of a user prompt.
   */
  static async callVision<TOutput = unknown>(
    config: LLMVisionCallConfig<z.ZodType<TOutput>>,
  ): Promise<LLMCallResult<TOutput>> {
    return this.executeWithFallback(config, {
      kind: 'messages',
      system: config.systemPrompt,
      messages: config.messages,
    });
  }

  private static async executeWithFallback<TOutput>(
    config: LLMCallBaseConfig<z.ZodType<TOutput>>,
    input: PromptInput,
  ): Promise<LLMCallResult<TOutput>> {
    const fallbackModel = config.fallbackModel;
    let primaryAttempts: number;

    try {
      const result = await this.runWithPolicy(
        config,
        input,
        config.primaryModel,
        'primary',
      );
      return { ...result, usedFallback: false };
    } catch (primaryError) {
      // If aborted, don't try fallback - re-throw immediately
      if (config.abortSignal?.aborted || !fallbackModel) {
        throw primaryError;
      }
      primaryAttempts = this.attemptsOf(primaryError);
    }

    try {
      const result = await this.runWithPolicy(
        config,
        input,
        fallbackModel,
        'fallback',
      );
      return {
        ...result,
        attempts: primaryAttempts + result.attempts,
        usedFallback: true,
      };
    } catch (fallbackError) {
      if (fallbackError instanceof LLMCallFailedError) {
        throw new LLMCallFailedError(
          fallbackError.modelName,
          primaryAttempts + fallbackError.attempts,
          fallbackError.cause,
        );
      }
      throw fallbackError;
    }
  }

  /**
   * Run one model under the retry policy.
   *
   * @throws LLMCallFailedError carrying the attempt count and the last provider error
   */
  private static async runWithPolicy<TOutput>(
    config: LLMCallBaseConfig<z.ZodType<TOutput>>,
    input: PromptInput,
    model: LanguageModel,
    role: 'primary' | 'fallback',
  ): Promise<Omit<LLMCallResult<TOutput>, 'usedFallback'>> {
    const modelName = getModelId(model);
    let attempts = 0;
    let response: GenerateResponse;

    try {
      response = await config.retryPolicy.execute(
        (attempt) => {
          attempts = attempt;
          const generate = () =>
            this.generate(config.schema, config, input, model);
          return config.limiter
            ? config.limiter.run(generate, config.abortSignal)
            : generate();
        },
        {
          abortSignal: config.abortSignal,
          onRetry: (info) => config.onRetry?.({ ...info, modelName, role }),
        },
      );
    } catch (error) {
      const cause =
        error instanceof RetryExhaustedError ? error.lastError : error;
      throw new LLMCallFailedError(modelName, attempts, cause);
    }

    return {
      output: config.schema.parse(response.object),
      usage: {
        component: config.component,
        phase: config.phase,
        model: role,
        modelName,
        inputTokens: response.usage.inputTokens ?? 0,
        outputTokens: response.usage.outputTokens ?? 0,
        totalTokens: response.usage.totalTokens ?? 0,
      },
      attempts,
      provider: detectProvider(model),
    };
  }

  private static async generate(
    schema: z.ZodType<unknown>,
    config: GenerateSettings,
    input: PromptInput,
    model: LanguageModel,
  ): Promise<GenerateResponse> {
    const common = {
      model,
      schema,
      schemaName: config.schemaName,
      schemaDescription: config.schemaDescription,
      temperature: config.temperature,
      abortSignal: config.abortSignal,
      maxRetries: 0,
    };

    if (input.kind === 'text') {
      const result = await generateObject({
        ...common,
        system: input.system,
        prompt: input.prompt,
      });
      return { object: result.object, usage: result.usage };
    }

    const result = await generateObject({
      ...common,
      system: input.system,
      messages: input.messages,
    });
    return { object: result.object, usage: result.usage };
  }

  private static attemptsOf(error: unknown): number {
    return error instanceof LLMCallFailedError ? error.attempts : 1;
  }
}
