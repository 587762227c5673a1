import type { LoggerMethods } from '@legisight/logger';
import type { AnalysisContent } from '@legisight/model';
import type {
  ExtendedTokenUsage,
  LLMTokenUsageAggregator,
} from '@legisight/shared';
import type { LanguageModel } from 'ai';

import type { PromptBundle } from '../prompts/prompt-builder';

import { getModelId } from '@legisight/shared';

import { resolveModelProfile } from '../config/model-profiles';
import {
  BaseLLMComponent,
  type BaseLLMComponentOptions,
} from '../core/base-llm-component';
import {
  AnalysisError,
  ConfigurationError,
  SchemaValidationError,
  TransientCallError,
} from '../errors';
import { normalizeAnalysisContent } from '../schemas/structured-analysis-schema';

/**
 * Content attached to a model call. Text content travels inside the prompt
 * bundle; PDF bytes are sent as a file part on the vision path.
 */
export type ModelContent =
  | { kind: 'text' }
  | { kind: 'pdf'; data: Uint8Array; filename?: string };

export type ModelCallPhase = 'direct' | 'chunk' | 'vision';

export interface ModelCallOptions {
  phase?: ModelCallPhase;
  abortSignal?: AbortSignal;

  /**
   * Chunk being analyzed, for telemetry and logs
   */
  chunkIndex?: number;
}

export interface ModelCallResult {
  content: AnalysisContent;
  modelId: string;
  usage: ExtendedTokenUsage;
  usedFallback: boolean;
  attempts: number;
  durationMs: number;
}

/**
 * One structured-extraction call against the model provider
 */
export interface AnalysisModelClient {
  /**
   * Identifier of the primary model, used for fingerprints and token counting
   */
  readonly modelId: string;

  /**
   * Whether the client can take PDF content
   */
  readonly supportsVision: boolean;

  /**
   * @throws AnalysisError subclass on failure
   */
  analyze(
    prompt: PromptBundle,
    content: ModelContent,
    options?: ModelCallOptions,
  ): Promise<ModelCallResult>;
}

/**
 * Per-call latency and outcome record
 */
export interface ModelCallTelemetry {
  component: string;
  phase: ModelCallPhase;
  modelId: string;
  chunkIndex?: number;
  outcome: 'success' | 'failure';
  errorName?: string;
  attempts: number;
  durationMs: number;
  usedFallback: boolean;
  inputTokens: number;
  outputTokens: number;
}

/**
 * Per-document record of a chunked analysis
 */
export interface ChunkedAnalysisTelemetry {
  documentId: string;
  chunkCount: number;
  contributingChunks: number;
  droppedChunks: number;
  hasStructure: boolean;
  outcome: 'success' | 'failure';
  durationMs: number;
}

/**
 * Receives telemetry without blocking the pipeline
 */
export interface TelemetrySink {
  record(event: ModelCallTelemetry): void | Promise<void>;
  recordChunkedAnalysis?(event: ChunkedAnalysisTelemetry): void | Promise<void>;
}

/**
 * Hand an event to a sink without awaiting it. Sync throws and async
 * rejections both go to `onFailure`.
 */
export function dispatchTelemetry(
  deliver: () => void | Promise<void>,
  onFailure: (error: unknown) => void,
): void {
  try {
    const pending = deliver();
    if (pending) {
      void pending.catch(onFailure);
    }
  } catch (error) {
    onFailure(error);
  }
}

export interface ModelClientOptions extends BaseLLMComponentOptions {
  telemetry?: TelemetrySink;
}

/**
 * ModelClient - structured analysis calls through LLMCaller
 *
 * The only component that talks to the model provider. Retries transient
 * failures with the shared retry policy, tries the fallback model when the
 * primary gives up, and reports every call to the telemetry sink.
 *
 * @example
 * ```typescript
 * const client = new ModelClient(logger, openai('gpt-4o'), {
 *   maxRetries: 3,
 *   limiter: new ModelCallLimiter(4),
 * });
 *
 * const bundle = PromptBuilder.forDocument(text, metadata, ANALYSIS_SCHEMA_VERSION);
 * const { content } = await client.analyze(bundle, { kind: 'text' });
 * ```
 */
export class ModelClient
  extends BaseLLMComponent
  implements AnalysisModelClient
{
  readonly modelId: string;
  readonly supportsVision: boolean;
  private readonly telemetry?: TelemetrySink;

  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    options?: ModelClientOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(logger, model, 'ModelClient', options, fallbackModel, aggregator);
    this.modelId = getModelId(model);
    this.supportsVision =
      resolveModelProfile(this.modelId).vision &&
      (!fallbackModel || resolveModelProfile(getModelId(fallbackModel)).vision);
    this.telemetry = options?.telemetry;
  }

  async analyze(
    prompt: PromptBundle,
    content: ModelContent,
    options: ModelCallOptions = {},
  ): Promise<ModelCallResult> {
    const phase =
      options.phase ?? (content.kind === 'pdf' ? 'vision' : 'direct');

    if (content.kind === 'pdf' && !this.supportsVision) {
      throw new ConfigurationError(
        `Model "${this.modelId}" cannot analyze PDF content: vision support is required`,
      );
    }

    const startedAt = Date.now();
    const label =
      options.chunkIndex === undefined
        ? phase
        : `${phase} #${options.chunkIndex}`;
    this.log('debug', `Starting ${label} call`);

    try {
      const result =
        content.kind === 'pdf'
          ? await this.callVisionLLM(
              prompt.schema,
              prompt.schemaName,
              prompt.systemPrompt,
              [
                {
                  role: 'user',
                  content: [
                    { type: 'text', text: prompt.userPrompt },
                    {
                      type: 'file',
                      data: content.data,
                      mediaType: 'application/pdf',
                      filename: content.filename,
                    },
                  ],
                },
              ],
              { phase, abortSignal: options.abortSignal },
            )
          : await this.callTextLLM(
              prompt.schema,
              prompt.schemaName,
              prompt.systemPrompt,
              prompt.userPrompt,
              { phase, abortSignal: options.abortSignal },
            );

      const durationMs = Date.now() - startedAt;
      this.emit({
        component: this.componentName,
        phase,
        modelId: result.usage.modelName,
        chunkIndex: options.chunkIndex,
        outcome: 'success',
        attempts: result.attempts,
        durationMs,
        usedFallback: result.usedFallback,
        inputTokens: result.usage.inputTokens,
        outputTokens: result.usage.outputTokens,
      });

      return {
        content: normalizeAnalysisContent(result.output),
        modelId: result.usage.modelName,
        usage: result.usage,
        usedFallback: result.usedFallback,
        attempts: result.attempts,
        durationMs,
      };
    } catch (error) {
      const durationMs = Date.now() - startedAt;
      const attempts =
        error instanceof TransientCallError ||
        error instanceof SchemaValidationError
          ? error.attempts
          : 1;
      this.log(
        'error',
        `${label} call failed after ${durationMs}ms: ${AnalysisError.getErrorMessage(error)}`,
      );
      this.emit({
        component: this.componentName,
        phase,
        modelId: this.modelId,
        chunkIndex: options.chunkIndex,
        outcome: 'failure',
        errorName: error instanceof Error ? error.name : 'Error',
        attempts,
        durationMs,
        usedFallback: false,
        inputTokens: 0,
        outputTokens: 0,
      });
      throw error;
    }
  }

  private emit(event: ModelCallTelemetry): void {
    const telemetry = this.telemetry;
    if (!telemetry) return;

    dispatchTelemetry(
      () => telemetry.record(event),
      (error) => this.reportTelemetryFailure(error),
    );
  }

  private reportTelemetryFailure(error: unknown): void {
    this.log(
      'warn',
      `Telemetry sink failed: ${AnalysisError.getErrorMessage(error)}`,
    );
  }
}
