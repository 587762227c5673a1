import type {
  AnalysisContent,
  ImpactLevel,
  KeyPoint,
  RelevanceLevel,
} from '@legisight/model';

import { uniqBy } from 'es-toolkit';

import {
  createInsufficientTextContent,
  isInsufficientTextResponse,
} from '../schemas/structured-analysis-schema';

/**
 * Analysis produced for one chunk
 */
export interface ChunkAnalysis {
  chunkIndex: number;

  /**
   * Token count of the chunk, used to weight its confidence
   */
  tokenCount: number;

  content: AnalysisContent;
}

export interface MergedAnalysis {
  content: AnalysisContent;

  /**
   * Summaries of the merged chunks, in chunk order
   */
  summaries: string[];

  /**
   * True only when every chunk reported insufficient text
   */
  insufficientText: boolean;
}

export const MERGE_LIMITS = {
  keyPoints: 15,
  impactList: 10,
  structuredImpactList: 8,
  recommendedActions: 8,
  immediateActions: 5,
  resourceNeeds: 5,
  summaryLength: 2000,
} as const;

const IMPACT_LEVEL_RANK: Record<ImpactLevel, number> = {
  low: 1,
  moderate: 2,
  high: 3,
  critical: 4,
};

const RELEVANCE_RANK: Record<RelevanceLevel, number> = {
  low: 1,
  moderate: 2,
  high: 3,
};

/**
 * AnalysisMerger - combines per-chunk analyses into one
 *
 * Pure and deterministic: inputs are sorted by chunk index first, so the
 * result does not depend on the order chunk calls completed in.
 *
 * Per-field rules:
 * - summary: chunk summaries joined with a space, capped at 2000 characters
 * - lists: unioned in chunk order, de-duplicated by normalized text, capped
 * - impactSummary: most severe impact level (earliest chunk on ties) with
 *   that chunk's category, highest jurisdiction relevance across chunks
 * - confidence: mean weighted by each chunk's token count, rounded to 3 places
 *
 * Chunks that reported insufficient text are left out when at least one chunk
 * had something to say.
 */
export class AnalysisMerger {
  static merge(analyses: readonly ChunkAnalysis[]): MergedAnalysis {
    if (analyses.length === 0) {
      throw new RangeError('Cannot merge zero chunk analyses');
    }

    const ordered = [...analyses].sort((a, b) => a.chunkIndex - b.chunkIndex);
    const sufficient = ordered.filter(
      (analysis) => !isInsufficientTextResponse(analysis.content),
    );

    if (sufficient.length === 0) {
      return {
        content: createInsufficientTextContent(),
        summaries: [],
        insufficientText: true,
      };
    }

    const contents = sufficient.map((analysis) => analysis.content);
    const summaries = contents
      .map((content) => content.summary.trim())
      .filter((summary) => summary.length > 0);

    const unionOf = (pick: (content: AnalysisContent) => string[], limit: number) =>
      this.unionStrings(contents.map(pick), limit);

    return {
      content: {
        summary: this.capSummary(summaries.join(' ')),
        keyPoints: this.unionKeyPoints(contents.map((c) => c.keyPoints)),
        publicHealthImpacts: {
          directEffects: unionOf(
            (c) => c.publicHealthImpacts.directEffects,
            MERGE_LIMITS.structuredImpactList,
          ),
          indirectEffects: unionOf(
            (c) => c.publicHealthImpacts.indirectEffects,
            MERGE_LIMITS.structuredImpactList,
          ),
          fundingImpact: unionOf(
            (c) => c.publicHealthImpacts.fundingImpact,
            MERGE_LIMITS.structuredImpactList,
          ),
          vulnerablePopulations: unionOf(
            (c) => c.publicHealthImpacts.vulnerablePopulations,
            MERGE_LIMITS.structuredImpactList,
          ),
        },
        localGovernmentImpacts: {
          administrative: unionOf(
            (c) => c.localGovernmentImpacts.administrative,
            MERGE_LIMITS.structuredImpactList,
          ),
          fiscal: unionOf(
            (c) => c.localGovernmentImpacts.fiscal,
            MERGE_LIMITS.structuredImpactList,
          ),
          implementation: unionOf(
            (c) => c.localGovernmentImpacts.implementation,
            MERGE_LIMITS.structuredImpactList,
          ),
        },
        economicImpacts: {
          directCosts: unionOf(
            (c) => c.economicImpacts.directCosts,
            MERGE_LIMITS.structuredImpactList,
          ),
          economicEffects: unionOf(
            (c) => c.economicImpacts.economicEffects,
            MERGE_LIMITS.structuredImpactList,
          ),
          benefits: unionOf(
            (c) => c.economicImpacts.benefits,
            MERGE_LIMITS.structuredImpactList,
          ),
          longTermImpact: unionOf(
            (c) => c.economicImpacts.longTermImpact,
            MERGE_LIMITS.structuredImpactList,
          ),
        },
        environmentalImpacts: unionOf(
          (c) => c.environmentalImpacts,
          MERGE_LIMITS.impactList,
        ),
        educationImpacts: unionOf(
          (c) => c.educationImpacts,
          MERGE_LIMITS.impactList,
        ),
        infrastructureImpacts: unionOf(
          (c) => c.infrastructureImpacts,
          MERGE_LIMITS.impactList,
        ),
        recommendedActions: unionOf(
          (c) => c.recommendedActions,
          MERGE_LIMITS.recommendedActions,
        ),
        immediateActions: unionOf(
          (c) => c.immediateActions,
          MERGE_LIMITS.immediateActions,
        ),
        resourceNeeds: unionOf(
          (c) => c.resourceNeeds,
          MERGE_LIMITS.resourceNeeds,
        ),
        impactSummary: this.mergeImpactSummary(contents),
        confidence: this.weightedConfidence(sufficient),
      },
      summaries,
      insufficientText: false,
    };
  }

  /**
   * Text key used for de-duplication
   */
  static normalizeText(text: string): string {
    return text.trim().replace(/\s+/g, ' ').toLowerCase();
  }

  static capSummary(summary: string): string {
    if (summary.length <= MERGE_LIMITS.summaryLength) return summary;

    let cut = MERGE_LIMITS.summaryLength - 3;
    // keep surrogate pairs whole
    if (isHighSurrogate(summary.charCodeAt(cut - 1))) cut--;
    return `${summary.slice(0, cut)}...`;
  }

  private static unionStrings(lists: string[][], limit: number): string[] {
    const items = lists
      .flat()
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
    return uniqBy(items, (item) => this.normalizeText(item)).slice(0, limit);
  }

  private static unionKeyPoints(lists: KeyPoint[][]): KeyPoint[] {
    const points = lists
      .flat()
      .map((keyPoint) => ({ ...keyPoint, point: keyPoint.point.trim() }))
      .filter((keyPoint) => keyPoint.point.length > 0);
    return uniqBy(points, (keyPoint) => this.normalizeText(keyPoint.point)).slice(
      0,
      MERGE_LIMITS.keyPoints,
    );
  }

  private static mergeImpactSummary(
    contents: AnalysisContent[],
  ): AnalysisContent['impactSummary'] {
    let mostSevere = contents[0].impactSummary;
    let relevance = mostSevere.jurisdictionRelevance;

    for (const { impactSummary } of contents.slice(1)) {
      if (
        IMPACT_LEVEL_RANK[impactSummary.impactLevel] >
        IMPACT_LEVEL_RANK[mostSevere.impactLevel]
      ) {
        mostSevere = impactSummary;
      }
      if (
        RELEVANCE_RANK[impactSummary.jurisdictionRelevance] >
        RELEVANCE_RANK[relevance]
      ) {
        relevance = impactSummary.jurisdictionRelevance;
      }
    }

    return {
      primaryCategory: mostSevere.primaryCategory,
      impactLevel: mostSevere.impactLevel,
      jurisdictionRelevance: relevance,
    };
  }

  private static weightedConfidence(analyses: ChunkAnalysis[]): number {
    const totalTokens = analyses.reduce(
      (sum, analysis) => sum + Math.max(0, analysis.tokenCount),
      0,
    );

    const value =
      totalTokens > 0
        ? analyses.reduce(
            (sum, analysis) =>
              sum +
              analysis.content.confidence *
                (Math.max(0, analysis.tokenCount) / totalTokens),
            0,
          )
        : analyses.reduce((sum, analysis) => sum + analysis.content.confidence, 0) /
          analyses.length;

    return Math.round(value * 1000) / 1000;
  }
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}
