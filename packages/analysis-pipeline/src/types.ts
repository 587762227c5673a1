import type {
  AnalysisOutcome,
  AnalysisVersion,
  DocumentMetadata,
} from '@legisight/model';

import type { ContentKind, RawContent } from './utils/content-normalizer';

/**
 * One document to analyze
 */
export interface AnalysisRequest {
  /**
   * Text, or bytes holding UTF-8 text or a PDF
   */
  content: RawContent;

  /**
   * Declared content kind. Detected from the bytes when omitted.
   */
  contentKind?: ContentKind;

  metadata: DocumentMetadata;

  /**
   * Caller cancellation
   */
  abortSignal?: AbortSignal;

  /**
   * Deadline for this request in milliseconds, overriding `deadlineMs`
   */
  deadlineMs?: number;

  /**
   * File name passed along with PDF content
   */
  filename?: string;
}

/**
 * What the cache holds for a fingerprint
 */
export type CachedAnalysis = Omit<AnalysisOutcome, 'cacheHit'>;

export interface RecordOptions {
  /**
   * Append a new version even when the fingerprint is unchanged
   */
  force?: boolean;
}

export interface RecordedAnalysis {
  outcome: AnalysisOutcome;

  /**
   * The appended version, or `previous` when nothing changed
   */
  version: AnalysisVersion;

  appended: boolean;
}
