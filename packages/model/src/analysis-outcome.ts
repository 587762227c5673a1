import type { StructuredAnalysis } from './structured-analysis';

/**
 * Path an analysis request took through the pipeline
 *
 * - `direct`: whole text in one model call
 * - `chunked`: text split, chunks analyzed concurrently and merged
 * - `vision`: PDF bytes submitted to a vision-capable model
 * - `insufficient_text`: below the analyzable minimum, no model call
 */
export type AnalysisRoute = 'direct' | 'chunked' | 'vision' | 'insufficient_text';

/**
 * Where a completed analysis came from
 *
 * Handed to the persistence store together with the analysis so each version
 * records how it was produced.
 */
export interface AnalysisProvenance {
  /**
   * Content fingerprint the analysis was computed from
   */
  fingerprint: string;

  route: AnalysisRoute;
  modelId: string;
  schemaVersion: string;
  processingDurationMs: number;

  /**
   * Token count of the normalized text (absent for PDF content)
   */
  tokenCount?: number;

  /**
   * Number of chunks the document was split into (chunked route only)
   */
  chunkCount?: number;

  /**
   * Indices of chunks whose analyses were merged (chunked route only)
   */
  contributingChunks?: number[];

  /**
   * Indices of chunks that failed or were cancelled (chunked route only)
   */
  droppedChunks?: number[];

  /**
   * Whether the chunker detected section structure (chunked route only)
   */
  hasStructure?: boolean;

  /**
   * True when any call had to fall back to the fallback model
   */
  usedFallback: boolean;

  /**
   * ISO-8601 completion time
   */
  completedAt: string;
}

/**
 * Recoverable degradation surfaced with an otherwise successful outcome
 */
export type AnalysisWarning =
  | {
      code: 'partial_coverage';
      message: string;
      droppedChunks: number[];
      contributingChunks: number[];
    }
  | {
      code: 'summary_synthesis_failed';
      message: string;
    }
  | {
      code: 'hard_split_chunks';
      message: string;
      chunkIndices: number[];
    };

/**
 * Final result of one analysis request
 */
export interface AnalysisOutcome {
  status: 'done' | 'insufficient_text';
  analysis: StructuredAnalysis;
  provenance: AnalysisProvenance;
  warnings: AnalysisWarning[];

  /**
   * True when the result was served from the cache (including joining a
   * computation another caller started)
   */
  cacheHit: boolean;
}
