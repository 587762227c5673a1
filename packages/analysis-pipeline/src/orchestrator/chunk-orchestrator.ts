import type { LoggerMethods } from '@legisight/logger';
import type {
  AnalysisContent,
  AnalysisWarning,
  Chunk,
  DocumentMetadata,
} from '@legisight/model';

import type {
  AnalysisModelClient,
  ChunkedAnalysisTelemetry,
  TelemetrySink,
} from '../clients/model-client';
import type { SummarySynthesizer } from './summary-synthesizer';

import { dispatchTelemetry } from '../clients/model-client';
import { abortReasonOf } from '../core/base-llm-component';
import {
  AnalysisAbortedError,
  AnalysisError,
  type ChunkFailure,
  ChunkedAnalysisError,
} from '../errors';
import { PromptBuilder } from '../prompts/prompt-builder';
import { AnalysisMerger, type ChunkAnalysis } from './analysis-merger';

export interface ChunkedAnalysisRequest {
  chunks: Chunk[];

  /**
   * Whether the chunker split along section headings
   */
  hasStructure: boolean;

  metadata: DocumentMetadata;
  schemaVersion: string;
  abortSignal?: AbortSignal;
}

export interface ChunkedAnalysisResult {
  content: AnalysisContent;
  insufficientText: boolean;
  modelId: string;
  contributingChunks: number[];
  droppedChunks: number[];
  failures: ChunkFailure[];
  usedFallback: boolean;
  warnings: AnalysisWarning[];
}

/**
 * ChunkOrchestrator - analyzes every chunk of a document and merges them
 *
 * All chunk calls are dispatched at once in chunk order; the model client's
 * shared limiter bounds how many are actually in flight. Once every call has
 * settled the successful ones are merged. Failed or cancelled chunks are
 * reported as dropped, and the request fails only when no chunk succeeded.
 * Chunk counts of every document go to the telemetry sink, if it takes them.
 */
export class ChunkOrchestrator {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly client: AnalysisModelClient,
    private readonly synthesizer?: Pick<SummarySynthesizer, 'synthesize'>,
    private readonly telemetry?: TelemetrySink,
  ) {}

  /**
   * @throws ChunkedAnalysisError when every chunk failed
   * @throws AnalysisAbortedError when the request was aborted before any chunk finished
   */
  async analyzeChunked(
    request: ChunkedAnalysisRequest,
  ): Promise<ChunkedAnalysisResult> {
    const { chunks, metadata, schemaVersion, abortSignal } = request;
    if (chunks.length === 0) {
      throw new RangeError('Chunked analysis needs at least one chunk');
    }

    this.logger.info(
      `[ChunkOrchestrator] Analyzing ${chunks.length} chunks of document ${metadata.documentId}`,
    );
    const startedAt = Date.now();

    const settled = await Promise.allSettled(
      chunks.map((chunk) =>
        this.client.analyze(
          PromptBuilder.forChunk(chunk.text, metadata, schemaVersion, {
            index: chunk.index,
            total: chunks.length,
            hasStructure: request.hasStructure,
          }),
          { kind: 'text' },
          { phase: 'chunk', chunkIndex: chunk.index, abortSignal },
        ),
      ),
    );

    const analyses: ChunkAnalysis[] = [];
    const failures: ChunkFailure[] = [];
    let usedFallback = false;

    settled.forEach((outcome, i) => {
      const chunk = chunks[i];
      if (outcome.status === 'fulfilled') {
        analyses.push({
          chunkIndex: chunk.index,
          tokenCount: chunk.tokenCount,
          content: outcome.value.content,
        });
        usedFallback ||= outcome.value.usedFallback;
      } else {
        const error =
          outcome.reason instanceof Error
            ? outcome.reason
            : new AnalysisError(AnalysisError.getErrorMessage(outcome.reason));
        failures.push({ chunkIndex: chunk.index, error });
        this.logger.warn(
          `[ChunkOrchestrator] Chunk #${chunk.index} failed: ${error.message}`,
        );
      }
    });

    const report = (outcome: ChunkedAnalysisTelemetry['outcome']) =>
      this.emit({
        documentId: metadata.documentId,
        chunkCount: chunks.length,
        contributingChunks: analyses.length,
        droppedChunks: failures.length,
        hasStructure: request.hasStructure,
        outcome,
        durationMs: Date.now() - startedAt,
      });

    if (analyses.length === 0) {
      report('failure');
      if (abortSignal?.aborted) {
        throw new AnalysisAbortedError(abortReasonOf(abortSignal), {
          cause: new ChunkedAnalysisError(failures),
        });
      }
      this.logger.error(
        `[ChunkOrchestrator] All ${chunks.length} chunks failed for document ${metadata.documentId}`,
      );
      throw new ChunkedAnalysisError(failures);
    }

    report('success');
    const merged = AnalysisMerger.merge(analyses);
    const contributingChunks = analyses
      .map((analysis) => analysis.chunkIndex)
      .sort((a, b) => a - b);
    const droppedChunks = failures
      .map((failure) => failure.chunkIndex)
      .sort((a, b) => a - b);
    const warnings: AnalysisWarning[] = [];

    if (droppedChunks.length > 0) {
      const message = `Partial coverage: ${contributingChunks.length} of ${chunks.length} chunks merged, dropped [${droppedChunks.join(', ')}]`;
      this.logger.warn(`[ChunkOrchestrator] ${message}`);
      warnings.push({
        code: 'partial_coverage',
        message,
        droppedChunks,
        contributingChunks,
      });
    }

    const hardSplit = chunks
      .filter((chunk) => chunk.hardSplit)
      .map((chunk) => chunk.index);
    if (hardSplit.length > 0) {
      warnings.push({
        code: 'hard_split_chunks',
        message: `${hardSplit.length} chunk(s) were cut at token boundaries and may exceed the chunk budget`,
        chunkIndices: hardSplit,
      });
    }

    let content = merged.content;
    if (this.synthesizer && merged.summaries.length > 1) {
      try {
        content = {
          ...content,
          summary: await this.synthesizer.synthesize(
            merged.summaries,
            metadata,
            abortSignal,
          ),
        };
      } catch (error) {
        const message = `Summary synthesis failed, keeping concatenated summary: ${AnalysisError.getErrorMessage(error)}`;
        this.logger.warn(`[ChunkOrchestrator] ${message}`);
        warnings.push({ code: 'summary_synthesis_failed', message });
      }
    }

    this.logger.info(
      `[ChunkOrchestrator] Merged ${contributingChunks.length} of ${chunks.length} chunks for document ${metadata.documentId}`,
    );

    return {
      content,
      insufficientText: merged.insufficientText,
      modelId: this.client.modelId,
      contributingChunks,
      droppedChunks,
      failures,
      usedFallback,
      warnings,
    };
  }

  private emit(event: ChunkedAnalysisTelemetry): void {
    const telemetry = this.telemetry;
    if (!telemetry?.recordChunkedAnalysis) return;

    dispatchTelemetry(
      () => telemetry.recordChunkedAnalysis?.(event),
      (error) =>
        this.logger.warn(
          `[ChunkOrchestrator] Telemetry sink failed: ${AnalysisError.getErrorMessage(error)}`,
        ),
    );
  }
}
