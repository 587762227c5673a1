import type { LoggerMethods } from '@legisight/logger';
import type {
  AnalysisContent,
  AnalysisOutcome,
  AnalysisProvenance,
  AnalysisVersion,
  AnalysisWarning,
  DocumentMetadata,
  StructuredAnalysis,
  TokenUsageReport,
} from '@legisight/model';
import type { LanguageModel } from 'ai';

import type {
  AnalysisModelClient,
  TelemetrySink,
} from './clients/model-client';
import type { TokenCounter } from './tokenization/token-counter';
import type {
  AnalysisRequest,
  CachedAnalysis,
  RecordOptions,
  RecordedAnalysis,
} from './types';
import type { AnalysisVersionStore } from './versioning/analysis-version-store';

import {
  LLMTokenUsageAggregator,
  ModelCallLimiter,
  getModelId,
} from '@legisight/shared';

import {
  AnalysisCache,
  type AnalysisCacheStats,
} from './cache/analysis-cache';
import { TextChunker } from './chunking/text-chunker';
import { ModelClient } from './clients/model-client';
import {
  type PipelineConfigInput,
  type ResolvedPipelineConfig,
  resolvePipelineConfig,
} from './config/pipeline-config';
import { abortReasonOf } from './core/base-llm-component';
import {
  AnalysisAbortedError,
  AnalysisError,
  ConfigurationError,
} from './errors';
import { ChunkOrchestrator } from './orchestrator/chunk-orchestrator';
import { SummarySynthesizer } from './orchestrator/summary-synthesizer';
import { PromptBuilder } from './prompts/prompt-builder';
import {
  createInsufficientTextContent,
  getAnalysisSchema,
  isInsufficientTextResponse,
} from './schemas/structured-analysis-schema';
import { GptTokenCounter } from './tokenization/token-counter';
import {
  ContentNormalizer,
  type NormalizedContent,
} from './utils/content-normalizer';
import { computeFingerprint } from './utils/fingerprint';

/**
 * AnalysisPipeline Options
 */
export interface AnalysisPipelineOptions extends PipelineConfigInput {
  /**
   * Logger instance
   */
  logger: LoggerMethods;

  /**
   * Model used for every analysis call
   */
  model: LanguageModel;

  /**
   * Tried with its own retry budget when the primary model gives up
   */
  fallbackModel?: LanguageModel;

  /**
   * Replaces the ModelClient built from `model`
   */
  client?: AnalysisModelClient;

  /**
   * Replaces the SummarySynthesizer built from `model`
   */
  synthesizer?: Pick<SummarySynthesizer, 'synthesize'>;

  /**
   * Replaces the gpt-tokenizer based counter
   */
  tokenCounter?: TokenCounter;

  /**
   * Process-wide limiter on in-flight model calls. Pipelines in one process
   * should share one; by default each pipeline creates its own with
   * `maxConcurrentCalls`.
   */
  limiter?: ModelCallLimiter;

  /**
   * Cache shared with other pipelines; by default each pipeline creates its
   * own from `cacheMaxEntries` and `cacheTtlMs`
   */
  cache?: AnalysisCache<CachedAnalysis>;

  telemetry?: TelemetrySink;

  /**
   * Replaces the retry backoff wait, mainly for tests
   */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

interface ComputedAnalysis {
  status: CachedAnalysis['status'];
  content: AnalysisContent;
  insufficientText: boolean;
  modelId: string;
  provenance: Omit<
    AnalysisProvenance,
    | 'fingerprint'
    | 'modelId'
    | 'schemaVersion'
    | 'processingDurationMs'
    | 'completedAt'
  >;
  warnings: AnalysisWarning[];
}

/**
 * AnalysisPipeline
 *
 * Entry point that turns one document into a structured analysis.
 *
 * ## Request flow
 *
 * 1. Normalize the content and compute its fingerprint
 * 2. Consult the single-flight cache; concurrent identical requests share
 *    one computation
 * 3. On a miss, route:
 *    - PDF → one vision call
 *    - fewer than `minAnalyzableTokens` tokens → insufficient-text result,
 *      no model call
 *    - within `maxContextTokens` → one direct call
 *    - otherwise → chunked, analyzed concurrently and merged
 * 4. Package the analysis with provenance and warnings
 *
 * @example
 * ```typescript
 * import { openai } from '@ai-sdk/openai';
 * import { getLogger } from '@legisight/logger';
 * import { AnalysisPipeline, InMemoryAnalysisVersionStore } from '@legisight/analysis-pipeline';
 *
 * const pipeline = new AnalysisPipeline({
 *   logger: getLogger(),
 *   model: openai('gpt-4o'),
 *   maxConcurrentCalls: 4,
 *   deadlineMs: 120_000,
 * });
 *
 * const outcome = await pipeline.analyze({
 *   content: billText,
 *   metadata: { documentId: 'tx-hb-1234', identifier: 'HB 1234' },
 * });
 *
 * const store = new InMemoryAnalysisVersionStore();
 * const { version } = await pipeline.analyzeAndRecord(request, store);
 * ```
 */
export class AnalysisPipeline {
  private readonly logger: LoggerMethods;
  private readonly config: ResolvedPipelineConfig;
  private readonly client: AnalysisModelClient;
  private readonly counter: TokenCounter;
  private readonly chunker: TextChunker;
  private readonly orchestrator: ChunkOrchestrator;
  private readonly cache: AnalysisCache<CachedAnalysis>;
  private readonly usageAggregator = new LLMTokenUsageAggregator();

  /**
   * @throws ConfigurationError when options are invalid
   */
  constructor(options: AnalysisPipelineOptions) {
    const {
      logger,
      model,
      fallbackModel,
      client,
      synthesizer,
      tokenCounter,
      limiter,
      cache,
      telemetry,
      sleep,
      ...configInput
    } = options;

    this.logger = logger;
    this.config = resolvePipelineConfig(
      configInput,
      client?.modelId ?? getModelId(model),
    );
    // throws for an unknown schema version
    getAnalysisSchema(this.config.schemaVersion);

    const componentOptions = {
      maxRetries: this.config.maxRetries,
      retryBaseDelayMs: this.config.retryBaseDelayMs,
      retryMaxDelayMs: this.config.retryMaxDelayMs,
      temperature: this.config.temperature,
      limiter: limiter ?? new ModelCallLimiter(this.config.maxConcurrentCalls),
      sleep,
    };
    this.client =
      client ??
      new ModelClient(
        logger,
        model,
        { ...componentOptions, telemetry },
        fallbackModel,
        this.usageAggregator,
      );

    this.counter = tokenCounter ?? new GptTokenCounter(logger);
    this.chunker = new TextChunker(this.counter, logger);
    this.orchestrator = new ChunkOrchestrator(
      logger,
      this.client,
      this.config.synthesizeSummary
        ? (synthesizer ??
            new SummarySynthesizer(
              logger,
              model,
              componentOptions,
              fallbackModel,
              this.usageAggregator,
            ))
        : undefined,
      telemetry,
    );
    this.cache =
      cache ??
      new AnalysisCache<CachedAnalysis>(logger, {
        maxEntries: this.config.cacheMaxEntries,
        ttlMs: this.config.cacheTtlMs,
      });
  }

  /**
   * Settings in effect after defaults and model limits were applied
   */
  getConfig(): ResolvedPipelineConfig {
    return { ...this.config };
  }

  getCacheStats(): AnalysisCacheStats {
    return this.cache.getStats();
  }

  /**
   * Token usage of every model call made by this pipeline
   */
  getTokenUsageReport(): TokenUsageReport {
    return this.usageAggregator.getReport();
  }

  logTokenUsageSummary(): void {
    this.usageAggregator.logSummary(this.logger);
  }

  /**
   * Analyze one document
   *
   * @throws ConfigurationError for content the configured model cannot take
   * @throws AnalysisAbortedError when the deadline elapsed or the caller aborted
   * @throws ChunkedAnalysisError when every chunk of a chunked analysis failed
   * @throws AnalysisError subclass when the direct or vision call failed
   */
  async analyze(request: AnalysisRequest): Promise<AnalysisOutcome> {
    const { metadata } = request;
    const content = ContentNormalizer.normalize(
      request.content,
      request.contentKind,
    );

    if (content.kind === 'pdf' && !this.client.supportsVision) {
      throw new ConfigurationError(
        `Model "${this.client.modelId}" cannot analyze PDF content: vision support is required`,
      );
    }

    const fingerprint = computeFingerprint(
      content,
      this.client.modelId,
      this.config.schemaVersion,
    );
    this.logger.info(
      `[AnalysisPipeline] Document ${metadata.documentId}: fingerprint ${fingerprint.slice(0, 12)}, cache ${this.cache.getState(fingerprint)}`,
    );

    let computedHere = false;
    const cached = await this.cache.getOrCompute(fingerprint, () => {
      computedHere = true;
      return this.compute(content, request, fingerprint);
    });

    return { ...structuredClone(cached), cacheHit: !computedHere };
  }

  /**
   * Analyze a document and append the result as a new version
   *
   * Nothing is appended when `previous` was computed from the same
   * fingerprint, unless `force` is set.
   */
  async analyzeAndRecord(
    request: AnalysisRequest,
    store: AnalysisVersionStore,
    previous?: AnalysisVersion,
    options: RecordOptions = {},
  ): Promise<RecordedAnalysis> {
    const outcome = await this.analyze(request);
    const { fingerprint } = outcome.provenance;

    if (previous && previous.fingerprint === fingerprint && !options.force) {
      this.logger.info(
        `[AnalysisPipeline] Document ${request.metadata.documentId} unchanged since version ${previous.version}, not recording`,
      );
      return { outcome, version: previous, appended: false };
    }

    const version = await store.append({
      documentId: request.metadata.documentId,
      fingerprint,
      previousVersion: previous?.version ?? null,
      analysis: outcome.analysis,
      provenance: outcome.provenance,
    });
    this.logger.info(
      `[AnalysisPipeline] Recorded version ${version.version} of document ${version.documentId}`,
    );
    return { outcome, version, appended: true };
  }

  private async compute(
    content: NormalizedContent,
    request: AnalysisRequest,
    fingerprint: string,
  ): Promise<CachedAnalysis> {
    const startedAt = Date.now();
    const signal = this.createSignal(request);
    const { documentId } = request.metadata;

    try {
      if (signal?.aborted) {
        throw new AnalysisAbortedError(abortReasonOf(signal));
      }

      const computed =
        content.kind === 'pdf'
          ? await this.analyzeVision(content.data, request, signal)
          : await this.analyzeText(content.text, request.metadata, signal);

      const processingDurationMs = Date.now() - startedAt;
      const analysis: StructuredAnalysis = {
        ...computed.content,
        schemaVersion: this.config.schemaVersion,
        modelId: computed.modelId,
        processingDurationMs,
        insufficientText: computed.insufficientText,
      };

      this.logger.info(
        `[AnalysisPipeline] Document ${documentId} completed via ${computed.provenance.route} in ${processingDurationMs}ms`,
      );

      return {
        status: computed.status,
        analysis,
        provenance: {
          ...computed.provenance,
          fingerprint,
          modelId: computed.modelId,
          schemaVersion: this.config.schemaVersion,
          processingDurationMs,
          completedAt: new Date().toISOString(),
        },
        warnings: computed.warnings,
      };
    } catch (error) {
      this.logger.error(
        `[AnalysisPipeline] Analysis of document ${documentId} failed: ${AnalysisError.getErrorMessage(error)}`,
      );
      throw error;
    }
  }

  private async analyzeText(
    text: string,
    metadata: DocumentMetadata,
    signal?: AbortSignal,
  ): Promise<ComputedAnalysis> {
    const modelId = this.client.modelId;
    const tokenCount = this.counter.count(text, modelId);

    if (tokenCount < this.config.minAnalyzableTokens) {
      this.logger.info(
        `[AnalysisPipeline] Document ${metadata.documentId}: ${tokenCount} tokens is below the minimum of ${this.config.minAnalyzableTokens}, skipping model call`,
      );
      return {
        status: 'insufficient_text',
        content: createInsufficientTextContent(),
        insufficientText: true,
        modelId: 'none',
        provenance: {
          route: 'insufficient_text',
          tokenCount,
          usedFallback: false,
        },
        warnings: [],
      };
    }

    if (tokenCount <= this.config.maxContextTokens) {
      this.logger.info(
        `[AnalysisPipeline] Document ${metadata.documentId}: direct call (${tokenCount} tokens, limit ${this.config.maxContextTokens})`,
      );
      const result = await this.client.analyze(
        PromptBuilder.forDocument(text, metadata, this.config.schemaVersion),
        { kind: 'text' },
        { phase: 'direct', abortSignal: signal },
      );
      return this.fromSingleCall(result.content, result.modelId, {
        route: 'direct',
        tokenCount,
        usedFallback: result.usedFallback,
      });
    }

    const { chunks, hasStructure } = this.chunker.split(
      text,
      this.config.chunkTokenBudget,
      modelId,
    );
    this.logger.info(
      `[AnalysisPipeline] Document ${metadata.documentId}: chunked call (${tokenCount} tokens, limit ${this.config.maxContextTokens}, ${chunks.length} chunks of at most ${this.config.chunkTokenBudget})`,
    );

    const result = await this.orchestrator.analyzeChunked({
      chunks,
      hasStructure,
      metadata,
      schemaVersion: this.config.schemaVersion,
      abortSignal: signal,
    });

    return {
      status: result.insufficientText ? 'insufficient_text' : 'done',
      content: result.content,
      insufficientText: result.insufficientText,
      modelId: result.modelId,
      provenance: {
        route: 'chunked',
        tokenCount,
        chunkCount: chunks.length,
        contributingChunks: result.contributingChunks,
        droppedChunks: result.droppedChunks,
        hasStructure,
        usedFallback: result.usedFallback,
      },
      warnings: result.warnings,
    };
  }

  private async analyzeVision(
    data: Uint8Array,
    request: AnalysisRequest,
    signal?: AbortSignal,
  ): Promise<ComputedAnalysis> {
    this.logger.info(
      `[AnalysisPipeline] Document ${request.metadata.documentId}: vision call (${data.byteLength} bytes)`,
    );
    const result = await this.client.analyze(
      PromptBuilder.forVision(request.metadata, this.config.schemaVersion),
      { kind: 'pdf', data, filename: request.filename },
      { phase: 'vision', abortSignal: signal },
    );
    return this.fromSingleCall(result.content, result.modelId, {
      route: 'vision',
      usedFallback: result.usedFallback,
    });
  }

  private fromSingleCall(
    content: AnalysisContent,
    modelId: string,
    provenance: ComputedAnalysis['provenance'],
  ): ComputedAnalysis {
    const insufficientText = isInsufficientTextResponse(content);
    return {
      status: insufficientText ? 'insufficient_text' : 'done',
      content: insufficientText ? createInsufficientTextContent() : content,
      insufficientText,
      modelId,
      provenance,
      warnings: [],
    };
  }

  /**
   * Combine caller cancellation with the request deadline
   */
  private createSignal(request: AnalysisRequest): AbortSignal | undefined {
    const deadlineMs = request.deadlineMs ?? this.config.deadlineMs;
    const signals = [
      request.abortSignal,
      deadlineMs === undefined ? undefined : AbortSignal.timeout(deadlineMs),
    ].filter((signal) => signal !== undefined);

    if (signals.length === 0) return undefined;
    return signals.length === 1 ? signals[0] : AbortSignal.any(signals);
  }
}
