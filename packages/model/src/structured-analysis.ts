/**
 * Structured analysis types
 *
 * The canonical, fixed-shape output of the analysis pipeline. Every section is
 * always present; a section with nothing to report is an empty list, never an
 * omitted key.
 */

/**
 * Polarity of a key point's effect
 */
export type ImpactType = 'positive' | 'negative' | 'neutral';

/**
 * Impact category a document primarily affects
 */
export type ImpactCategory =
  | 'public_health'
  | 'local_gov'
  | 'economic'
  | 'environmental'
  | 'education'
  | 'infrastructure';

/**
 * Severity of the overall impact, ordered low → critical
 */
export type ImpactLevel = 'low' | 'moderate' | 'high' | 'critical';

/**
 * Relevance of the document to the monitored jurisdiction, ordered low → high
 */
export type RelevanceLevel = 'low' | 'moderate' | 'high';

export interface KeyPoint {
  point: string;
  impactType: ImpactType;
}

export interface PublicHealthImpacts {
  directEffects: string[];
  indirectEffects: string[];
  fundingImpact: string[];
  vulnerablePopulations: string[];
}

export interface LocalGovernmentImpacts {
  administrative: string[];
  fiscal: string[];
  implementation: string[];
}

export interface EconomicImpacts {
  directCosts: string[];
  economicEffects: string[];
  benefits: string[];
  longTermImpact: string[];
}

export interface ImpactSummary {
  primaryCategory: ImpactCategory;
  impactLevel: ImpactLevel;
  jurisdictionRelevance: RelevanceLevel;
}

/**
 * The part of an analysis produced by the language model
 *
 * This is the shape the structured-generation call must conform to.
 */
export interface AnalysisContent {
  summary: string;
  keyPoints: KeyPoint[];
  publicHealthImpacts: PublicHealthImpacts;
  localGovernmentImpacts: LocalGovernmentImpacts;
  economicImpacts: EconomicImpacts;
  environmentalImpacts: string[];
  educationImpacts: string[];
  infrastructureImpacts: string[];
  recommendedActions: string[];
  immediateActions: string[];
  resourceNeeds: string[];
  impactSummary: ImpactSummary;

  /**
   * Model's confidence in the analysis, 0 (none) to 1 (certain)
   */
  confidence: number;
}

/**
 * Complete structured analysis
 *
 * Model-produced content plus the fields the pipeline fills in.
 */
export interface StructuredAnalysis extends AnalysisContent {
  /**
   * Schema version the analysis validates against
   */
  schemaVersion: string;

  /**
   * Identifier of the model that produced the content ('none' for
   * insufficient-text results, which involve no model call)
   */
  modelId: string;

  /**
   * Wall-clock time spent producing the analysis, in milliseconds
   */
  processingDurationMs: number;

  /**
   * True when the source lacked enough analyzable material
   */
  insufficientText: boolean;
}
