import type { AnalysisProvenance } from './analysis-outcome';
import type { StructuredAnalysis } from './structured-analysis';

/**
 * Immutable snapshot of one analysis of a document
 *
 * Versions of a document are numbered from 1 and strictly increase; the
 * highest number is current. Older versions are retained.
 */
export interface AnalysisVersion {
  documentId: string;
  version: number;
  fingerprint: string;

  /**
   * Version this one supersedes, or null for the first version
   */
  previousVersion: number | null;

  /**
   * ISO-8601 creation time
   */
  createdAt: string;

  analysis: StructuredAnalysis;
  provenance: AnalysisProvenance;
}

/**
 * What the pipeline hands to the store when appending a version
 *
 * The store assigns `version` and `createdAt`.
 */
export interface NewAnalysisVersion {
  documentId: string;
  fingerprint: string;
  previousVersion: number | null;
  analysis: StructuredAnalysis;
  provenance: AnalysisProvenance;
}
