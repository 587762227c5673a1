import type { AnalysisContent, KeyPoint } from '@legisight/model';

import { z } from 'zod';

import { ConfigurationError } from '../errors';

/**
 * Version of the analysis schema below. Part of every fingerprint, so
 * changing the schema invalidates cached results.
 */
export const ANALYSIS_SCHEMA_VERSION = '2025-01';

/**
 * Summary value the model returns when the text cannot be analyzed
 */
export const INSUFFICIENT_TEXT_FOR_ANALYSIS = 'INSUFFICIENT_TEXT_FOR_ANALYSIS';

const textList = (description: string) =>
  z.array(z.string()).describe(description);

export const KeyPointSchema: z.ZodType<KeyPoint> = z.object({
  point: z.string().describe('One provision or finding, in a sentence'),
  impactType: z
    .enum(['positive', 'negative', 'neutral'])
    .describe('Polarity of the provision for affected parties'),
});

/**
 * Schema the structured-generation call must conform to
 */
export const AnalysisContentSchema: z.ZodType<AnalysisContent> = z.object({
  summary: z
    .string()
    .describe(
      `Concise summary of the legislation, or ${INSUFFICIENT_TEXT_FOR_ANALYSIS}`,
    ),
  keyPoints: z.array(KeyPointSchema).describe('Key provisions'),
  publicHealthImpacts: z.object({
    directEffects: textList('Direct effects on public health'),
    indirectEffects: textList('Indirect or secondary effects'),
    fundingImpact: textList('Effects on public health funding'),
    vulnerablePopulations: textList('Populations disproportionately affected'),
  }),
  localGovernmentImpacts: z.object({
    administrative: textList('Administrative changes for local government'),
    fiscal: textList('Budget and revenue effects'),
    implementation: textList('Implementation requirements'),
  }),
  economicImpacts: z.object({
    directCosts: textList('Direct costs imposed'),
    economicEffects: textList('Broader economic effects'),
    benefits: textList('Economic benefits'),
    longTermImpact: textList('Long-term economic consequences'),
  }),
  environmentalImpacts: textList('Environmental effects'),
  educationImpacts: textList('Effects on education'),
  infrastructureImpacts: textList('Effects on infrastructure'),
  recommendedActions: textList('Recommended responses for affected agencies'),
  immediateActions: textList('Actions needed right away'),
  resourceNeeds: textList('Staff, funding or tools needed to respond'),
  impactSummary: z.object({
    primaryCategory: z
      .enum([
        'public_health',
        'local_gov',
        'economic',
        'environmental',
        'education',
        'infrastructure',
      ])
      .describe('Area most affected'),
    impactLevel: z
      .enum(['low', 'moderate', 'high', 'critical'])
      .describe('Overall severity'),
    jurisdictionRelevance: z
      .enum(['low', 'moderate', 'high'])
      .describe('Relevance to the monitored jurisdiction'),
  }),
  confidence: z
    .number()
    .describe('Confidence in this analysis from 0 (none) to 1 (certain)'),
});

export const ANALYSIS_SCHEMA_NAME = 'LegislativeAnalysis';

/**
 * Analysis with every section present and empty
 */
export function createEmptyAnalysisContent(): AnalysisContent {
  return {
    summary: '',
    keyPoints: [],
    publicHealthImpacts: {
      directEffects: [],
      indirectEffects: [],
      fundingImpact: [],
      vulnerablePopulations: [],
    },
    localGovernmentImpacts: {
      administrative: [],
      fiscal: [],
      implementation: [],
    },
    economicImpacts: {
      directCosts: [],
      economicEffects: [],
      benefits: [],
      longTermImpact: [],
    },
    environmentalImpacts: [],
    educationImpacts: [],
    infrastructureImpacts: [],
    recommendedActions: [],
    immediateActions: [],
    resourceNeeds: [],
    impactSummary: {
      primaryCategory: 'public_health',
      impactLevel: 'low',
      jurisdictionRelevance: 'low',
    },
    confidence: 0,
  };
}

const UNDETERMINED = ['Unable to determine due to insufficient text'];

/**
 * Canonical content for documents without enough analyzable text
 */
export function createInsufficientTextContent(): AnalysisContent {
  return {
    summary: 'Insufficient text available for detailed analysis.',
    keyPoints: [
      { point: 'Insufficient text for detailed analysis', impactType: 'neutral' },
    ],
    publicHealthImpacts: {
      directEffects: [...UNDETERMINED],
      indirectEffects: [...UNDETERMINED],
      fundingImpact: [...UNDETERMINED],
      vulnerablePopulations: [...UNDETERMINED],
    },
    localGovernmentImpacts: {
      administrative: [...UNDETERMINED],
      fiscal: [...UNDETERMINED],
      implementation: [...UNDETERMINED],
    },
    economicImpacts: {
      directCosts: [...UNDETERMINED],
      economicEffects: [...UNDETERMINED],
      benefits: [...UNDETERMINED],
      longTermImpact: [...UNDETERMINED],
    },
    environmentalImpacts: [...UNDETERMINED],
    educationImpacts: [...UNDETERMINED],
    infrastructureImpacts: [...UNDETERMINED],
    recommendedActions: ['Monitor for more detailed information'],
    immediateActions: ['None required at this time'],
    resourceNeeds: ['None identified due to insufficient text'],
    impactSummary: {
      primaryCategory: 'public_health',
      impactLevel: 'low',
      jurisdictionRelevance: 'low',
    },
    confidence: 0,
  };
}

/**
 * Whether model output signals that the text could not be analyzed
 */
export function isInsufficientTextResponse(content: AnalysisContent): boolean {
  return content.summary.trim() === INSUFFICIENT_TEXT_FOR_ANALYSIS;
}

/**
 * Clamp confidence into [0, 1] and trim free text
 */
export function normalizeAnalysisContent(
  content: AnalysisContent,
): AnalysisContent {
  const confidence = Number.isFinite(content.confidence)
    ? Math.min(1, Math.max(0, content.confidence))
    : 0;
  return { ...content, summary: content.summary.trim(), confidence };
}

const ANALYSIS_SCHEMAS: Readonly<Record<string, z.ZodType<AnalysisContent>>> =
  {
    [ANALYSIS_SCHEMA_VERSION]: AnalysisContentSchema,
  };

/**
 * Schema registered for a schema version
 *
 * @throws ConfigurationError for an unknown version
 */
export function getAnalysisSchema(
  schemaVersion: string,
): z.ZodType<AnalysisContent> {
  const schema = ANALYSIS_SCHEMAS[schemaVersion];
  if (!schema) {
    throw new ConfigurationError(
      `Unknown analysis schema version "${schemaVersion}"`,
      [`supported versions: ${Object.keys(ANALYSIS_SCHEMAS).join(', ')}`],
    );
  }
  return schema;
}
