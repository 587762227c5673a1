import type { AnalysisContent } from '@legisight/model';

import { describe, expect, test } from 'vitest';

import {
  INSUFFICIENT_TEXT_FOR_ANALYSIS,
  createInsufficientTextContent,
} from '../schemas/structured-analysis-schema';
import { createAnalysisContent } from '../testing/analysis-fixtures';
import { AnalysisMerger, type ChunkAnalysis } from './analysis-merger';

function chunk(
  chunkIndex: number,
  tokenCount: number,
  overrides: Partial<AnalysisContent> = {},
): ChunkAnalysis {
  return {
    chunkIndex,
    tokenCount,
    content: createAnalysisContent(overrides),
  };
}

describe('AnalysisMerger', () => {
  test('rejects an empty input', () => {
    expect(() => AnalysisMerger.merge([])).toThrow(
      'Cannot merge zero chunk analyses',
    );
  });

  test('joins summaries in chunk order', () => {
    const merged = AnalysisMerger.merge([
      chunk(1, 100, { summary: 'Second part.' }),
      chunk(0, 100, { summary: ' First part. ' }),
    ]);

    expect(merged.content.summary).toBe('First part. Second part.');
    expect(merged.summaries).toEqual(['First part.', 'Second part.']);
    expect(merged.insufficientText).toBe(false);
  });

  test('caps the concatenated summary at 2000 characters', () => {
    const merged = AnalysisMerger.merge([
      chunk(0, 100, { summary: 'a'.repeat(1500) }),
      chunk(1, 100, { summary: 'b'.repeat(1500) }),
    ]);

    expect(merged.content.summary).toHaveLength(2000);
    expect(merged.content.summary.endsWith('b...')).toBe(true);
  });

  test('does not cut a surrogate pair when capping the summary', () => {
    const summary = `${'a'.repeat(1996)}😀${'b'.repeat(10)}`;

    expect(AnalysisMerger.capSummary(summary)).toBe(`${'a'.repeat(1996)}...`);
    const fitting = `${'a'.repeat(1995)}😀${'b'.repeat(10)}`;
    expect(AnalysisMerger.capSummary(fitting)).toBe(`${'a'.repeat(1995)}😀...`);
  });

  test('de-duplicates list entries by normalized text', () => {
    const merged = AnalysisMerger.merge([
      chunk(0, 100, {
        environmentalImpacts: ['Protects wetlands', 'Limits runoff'],
        keyPoints: [{ point: 'Funds clinics', impactType: 'positive' }],
      }),
      chunk(1, 100, {
        environmentalImpacts: ['  protects   WETLANDS ', 'Adds permits', ''],
        keyPoints: [
          { point: 'funds clinics', impactType: 'negative' },
          { point: 'Adds reporting duties', impactType: 'neutral' },
        ],
      }),
    ]);

    expect(merged.content.environmentalImpacts).toEqual([
      'Protects wetlands',
      'Limits runoff',
      'Adds permits',
    ]);
    expect(merged.content.keyPoints).toEqual([
      { point: 'Funds clinics', impactType: 'positive' },
      { point: 'Adds reporting duties', impactType: 'neutral' },
    ]);
  });

  test('caps merged lists', () => {
    const items = (prefix: string, count: number) =>
      Array.from({ length: count }, (_, i) => `${prefix} ${i}`);

    const merged = AnalysisMerger.merge([
      chunk(0, 100, {
        keyPoints: items('point', 12).map((point) => ({
          point,
          impactType: 'neutral' as const,
        })),
        educationImpacts: items('education', 7),
        recommendedActions: items('recommend', 6),
        immediateActions: items('now', 4),
        publicHealthImpacts: {
          directEffects: items('direct', 6),
          indirectEffects: [],
          fundingImpact: [],
          vulnerablePopulations: [],
        },
      }),
      chunk(1, 100, {
        keyPoints: items('other point', 12).map((point) => ({
          point,
          impactType: 'neutral' as const,
        })),
        educationImpacts: items('other education', 7),
        recommendedActions: items('other recommend', 6),
        immediateActions: items('other now', 4),
        publicHealthImpacts: {
          directEffects: items('other direct', 6),
          indirectEffects: [],
          fundingImpact: [],
          vulnerablePopulations: [],
        },
      }),
    ]);

    expect(merged.content.keyPoints).toHaveLength(15);
    expect(merged.content.educationImpacts).toHaveLength(10);
    expect(merged.content.recommendedActions).toHaveLength(8);
    expect(merged.content.immediateActions).toHaveLength(5);
    expect(merged.content.publicHealthImpacts.directEffects).toHaveLength(8);
    expect(merged.content.publicHealthImpacts.directEffects[6]).toBe(
      'other direct 0',
    );
  });

  test('keeps the most severe impact level with its category', () => {
    const merged = AnalysisMerger.merge([
      chunk(0, 100, {
        impactSummary: {
          primaryCategory: 'public_health',
          impactLevel: 'moderate',
          jurisdictionRelevance: 'high',
        },
      }),
      chunk(1, 100, {
        impactSummary: {
          primaryCategory: 'economic',
          impactLevel: 'high',
          jurisdictionRelevance: 'low',
        },
      }),
      chunk(2, 100, {
        impactSummary: {
          primaryCategory: 'education',
          impactLevel: 'high',
          jurisdictionRelevance: 'moderate',
        },
      }),
    ]);

    expect(merged.content.impactSummary).toEqual({
      primaryCategory: 'economic',
      impactLevel: 'high',
      jurisdictionRelevance: 'high',
    });
  });

  test('weights confidence by token share', () => {
    const merged = AnalysisMerger.merge([
      chunk(0, 3000, { confidence: 0.9 }),
      chunk(1, 1000, { confidence: 0.5 }),
    ]);

    // 0.9 * 0.75 + 0.5 * 0.25
    expect(merged.content.confidence).toBe(0.8);
  });

  test('averages confidence when no chunk has tokens', () => {
    const merged = AnalysisMerger.merge([
      chunk(0, 0, { confidence: 0.2 }),
      chunk(1, 0, { confidence: 0.5 }),
    ]);

    expect(merged.content.confidence).toBe(0.35);
  });

  test('leaves out chunks that reported insufficient text', () => {
    const merged = AnalysisMerger.merge([
      chunk(0, 500, { summary: INSUFFICIENT_TEXT_FOR_ANALYSIS }),
      chunk(1, 500, { summary: 'Real findings.', confidence: 0.6 }),
    ]);

    expect(merged.insufficientText).toBe(false);
    expect(merged.content.summary).toBe('Real findings.');
    expect(merged.content.confidence).toBe(0.6);
  });

  test('reports insufficient text when every chunk did', () => {
    const merged = AnalysisMerger.merge([
      chunk(0, 500, { summary: INSUFFICIENT_TEXT_FOR_ANALYSIS }),
      chunk(1, 500, { summary: ` ${INSUFFICIENT_TEXT_FOR_ANALYSIS}\n` }),
    ]);

    expect(merged.insufficientText).toBe(true);
    expect(merged.content).toEqual(createInsufficientTextContent());
    expect(merged.summaries).toEqual([]);
  });

  test('yields identical output for any input order', () => {
    const analyses = [
      chunk(0, 800, {
        summary: 'Alpha.',
        environmentalImpacts: ['Shared', 'Only alpha'],
        confidence: 0.7,
      }),
      chunk(1, 1200, {
        summary: 'Beta.',
        environmentalImpacts: ['shared', 'Only beta'],
        confidence: 0.4,
      }),
      chunk(2, 400, {
        summary: 'Gamma.',
        impactSummary: {
          primaryCategory: 'infrastructure',
          impactLevel: 'critical',
          jurisdictionRelevance: 'moderate',
        },
        confidence: 0.95,
      }),
    ];
    const expected = JSON.stringify(AnalysisMerger.merge(analyses));

    const permutations = [
      [2, 1, 0],
      [1, 2, 0],
      [0, 2, 1],
    ].map((order) => order.map((i) => analyses[i]));

    for (const permutation of permutations) {
      expect(JSON.stringify(AnalysisMerger.merge(permutation))).toBe(expected);
    }
  });
});
