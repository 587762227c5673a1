/**
 * @legisight/analysis-pipeline
 *
 * Turns legislative documents into structured analyses with an LLM.
 *
 * ## Key Features
 *
 * - Direct, chunked and vision (PDF) analysis routes chosen by token count
 * - Section-aware chunking within a token budget
 * - Concurrent chunk analysis with a deterministic merge
 * - Retries with backoff, fallback model, deadlines and cancellation
 * - Single-flight cache keyed by content fingerprint
 * - Append-only analysis versions
 *
 * @packageDocumentation
 */

export { AnalysisPipeline } from './analysis-pipeline';
export type { AnalysisPipelineOptions } from './analysis-pipeline';
export type {
  AnalysisRequest,
  CachedAnalysis,
  RecordOptions,
  RecordedAnalysis,
} from './types';
export { BaseLLMComponent, abortReasonOf } from './core';
export type { BaseLLMComponentOptions } from './core';
export { ModelClient } from './clients/model-client';
export type {
  AnalysisModelClient,
  ChunkedAnalysisTelemetry,
  ModelCallOptions,
  ModelCallPhase,
  ModelCallResult,
  ModelCallTelemetry,
  ModelClientOptions,
  ModelContent,
  TelemetrySink,
} from './clients/model-client';
export {
  AnalysisMerger,
  MERGE_LIMITS,
} from './orchestrator/analysis-merger';
export type {
  ChunkAnalysis,
  MergedAnalysis,
} from './orchestrator/analysis-merger';
export { ChunkOrchestrator } from './orchestrator/chunk-orchestrator';
export type {
  ChunkedAnalysisRequest,
  ChunkedAnalysisResult,
} from './orchestrator/chunk-orchestrator';
export {
  SummarySynthesizer,
  SynthesizedSummarySchema,
} from './orchestrator/summary-synthesizer';
export { AnalysisCache } from './cache/analysis-cache';
export type {
  AnalysisCacheOptions,
  AnalysisCacheStats,
  CacheEntryState,
} from './cache/analysis-cache';
export { SECTION_PATTERNS, TextChunker } from './chunking/text-chunker';
export type { ChunkResult } from './chunking/text-chunker';
export { GptTokenCounter } from './tokenization/token-counter';
export type { TokenCounter } from './tokenization/token-counter';
export { PromptBuilder } from './prompts/prompt-builder';
export type { ChunkPosition, PromptBundle } from './prompts/prompt-builder';
export {
  DEFAULT_MODEL_PROFILE,
  MODEL_PROFILES,
  findModelProfile,
  normalizeModelId,
  resolveModelProfile,
} from './config/model-profiles';
export type { ModelProfile, TokenizerEncoding } from './config/model-profiles';
export {
  pipelineConfigSchema,
  resolvePipelineConfig,
} from './config/pipeline-config';
export type {
  PipelineConfigInput,
  ResolvedPipelineConfig,
} from './config/pipeline-config';
export {
  ANALYSIS_SCHEMA_NAME,
  ANALYSIS_SCHEMA_VERSION,
  AnalysisContentSchema,
  INSUFFICIENT_TEXT_FOR_ANALYSIS,
  KeyPointSchema,
  createEmptyAnalysisContent,
  createInsufficientTextContent,
  getAnalysisSchema,
  isInsufficientTextResponse,
  normalizeAnalysisContent,
} from './schemas/structured-analysis-schema';
export * from './errors';
export * from './versioning';
export { ContentNormalizer } from './utils/content-normalizer';
export type {
  ContentKind,
  NormalizedContent,
  RawContent,
} from './utils/content-normalizer';
export { computeFingerprint } from './utils/fingerprint';
