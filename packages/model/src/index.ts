export type {
  AnalysisOutcome,
  AnalysisProvenance,
  AnalysisRoute,
  AnalysisWarning,
} from './analysis-outcome';
export type { AnalysisVersion, NewAnalysisVersion } from './analysis-version';
export type { Chunk } from './chunk';
export type { DocumentMetadata } from './document-metadata';
export type {
  AnalysisContent,
  EconomicImpacts,
  ImpactCategory,
  ImpactLevel,
  ImpactSummary,
  ImpactType,
  KeyPoint,
  LocalGovernmentImpacts,
  PublicHealthImpacts,
  RelevanceLevel,
  StructuredAnalysis,
} from './structured-analysis';
export type {
  ComponentUsageReport,
  ModelUsageDetail,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from './token-usage-report';
