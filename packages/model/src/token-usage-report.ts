/**
 * Token usage report types
 *
 * Breakdown of LLM token consumption across one analysis run, by component,
 * phase and model role (primary vs fallback).
 */

/**
 * Token usage report for an analysis run
 */
export interface TokenUsageReport {
  /**
   * Breakdown by component, in the order components first reported usage
   */
  components: ComponentUsageReport[];

  /**
   * Grand total across all components and phases
   */
  total: TokenUsageSummary;
}

/**
 * Token usage for one component
 *
 * Examples: ModelClient, SummarySynthesizer
 */
export interface ComponentUsageReport {
  component: string;

  /**
   * Breakdown by phase (e.g. 'direct', 'chunk', 'vision', 'synthesis')
   */
  phases: PhaseUsageReport[];

  total: TokenUsageSummary;
}

/**
 * Token usage for one phase of a component
 *
 * A phase may carry both primary and fallback usage when the primary model
 * exhausted its retries on some calls.
 */
export interface PhaseUsageReport {
  phase: string;

  /**
   * Present when at least one call in this phase succeeded on the primary model
   */
  primary?: ModelUsageDetail;

  /**
   * Present when at least one call in this phase succeeded on the fallback model
   */
  fallback?: ModelUsageDetail;

  /**
   * Sum of primary and fallback usage
   */
  total: TokenUsageSummary;
}

/**
 * Usage for a specific model within a phase
 */
export interface ModelUsageDetail {
  /**
   * Model identifier, e.g. 'gpt-4o-2024-08-06'
   */
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Minimal token count triple used for aggregation
 */
export interface TokenUsageSummary {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}
