import type { LoggerMethods } from '@legisight/logger';
import type {
  ComponentUsageReport,
  ModelUsageDetail,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from '@legisight/model';

import type { ExtendedTokenUsage } from './llm-caller';

/**
 * Token usage totals
 */
export type TokenUsage = TokenUsageSummary;

/**
 * Format token usage as a human-readable string
 *
 * @returns Formatted string like "1500 input, 300 output, 1800 total"
 */
function formatTokens(usage: TokenUsage): string {
  return `${usage.inputTokens} input, ${usage.outputTokens} output, ${usage.totalTokens} total`;
}

function emptyUsage(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
}

function addUsage(target: TokenUsage, usage: TokenUsage): void {
  target.inputTokens += usage.inputTokens;
  target.outputTokens += usage.outputTokens;
  target.totalTokens += usage.totalTokens;
}

interface PhaseAggregate {
  primary?: ModelUsageDetail;
  fallback?: ModelUsageDetail;
  total: TokenUsage;
}

/**
 * Aggregated token usage for a specific component
 */
interface ComponentAggregate {
  component: string;
  phases: Map<string, PhaseAggregate>;
  total: TokenUsage;
}

/**
 * LLMTokenUsageAggregator - Aggregates token usage across all LLM calls
 *
 * Collects usage from every model call made by the pipeline and reports it
 * grouped by:
 * - Component (ModelClient, SummarySynthesizer)
 * - Phase (direct, chunk, vision, synthesis)
 * - Model (primary vs fallback)
 *
 * @example
 * ```typescript
 * const aggregator = new LLMTokenUsageAggregator();
 *
 * aggregator.track({
 *   component: 'ModelClient',
 *   phase: 'chunk',
 *   model: 'primary',
 *   modelName: 'gpt-4o',
 *   inputTokens: 1500,
 *   outputTokens: 300,
 *   totalTokens: 1800,
 * });
 *
 * aggregator.logSummary(logger);
 * // [AnalysisPipeline] Token usage summary:
 * // ModelClient:
 * //   - chunk:
 * //       primary (gpt-4o): 1500 input, 300 output, 1800 total
 * //       subtotal: 1500 input, 300 output, 1800 total
 * //   ModelClient total: 1500 input, 300 output, 1800 total
 * // --- Summary ---
 * // Primary total: 1500 input, 300 output, 1800 total
 * // Grand total: 1500 input, 300 output, 1800 total
 * ```
 */
export class LLMTokenUsageAggregator {
  private usage = new Map<string, ComponentAggregate>();

  /**
   * Track token usage from an LLM call
   */
  track(usage: ExtendedTokenUsage): void {
    let component = this.usage.get(usage.component);
    if (!component) {
      component = {
        component: usage.component,
        phases: new Map(),
        total: emptyUsage(),
      };
      this.usage.set(usage.component, component);
    }

    let phase = component.phases.get(usage.phase);
    if (!phase) {
      phase = { total: emptyUsage() };
      component.phases.set(usage.phase, phase);
    }

    const detail = (phase[usage.model] ??= {
      modelName: usage.modelName,
      ...emptyUsage(),
    });
    addUsage(detail, usage);
    addUsage(phase.total, usage);
    addUsage(component.total, usage);
  }

  /**
   * Get token usage report in structured format
   *
   * Components and phases appear in the order they first reported usage.
   */
  getReport(): TokenUsageReport {
    const components: ComponentUsageReport[] = [];

    for (const component of this.usage.values()) {
      const phases: PhaseUsageReport[] = [];

      for (const [phaseName, phaseData] of component.phases) {
        const phaseReport: PhaseUsageReport = {
          phase: phaseName,
          total: { ...phaseData.total },
        };
        if (phaseData.primary) phaseReport.primary = { ...phaseData.primary };
        if (phaseData.fallback) {
          phaseReport.fallback = { ...phaseData.fallback };
        }
        phases.push(phaseReport);
      }

      components.push({
        component: component.component,
        phases,
        total: { ...component.total },
      });
    }

    return { components, total: this.getTotalUsage() };
  }

  /**
   * Get total usage across all components and phases
   */
  getTotalUsage(): TokenUsage {
    const total = emptyUsage();
    for (const component of this.usage.values()) {
      addUsage(total, component.total);
    }
    return total;
  }

  /**
   * Log comprehensive token usage summary
   *
   * Shows primary and fallback token usage separately for each phase.
   */
  logSummary(logger: LoggerMethods): void {
    const report = this.getReport();

    if (report.components.length === 0) {
      logger.info('[AnalysisPipeline] No token usage to report');
      return;
    }

    logger.info('[AnalysisPipeline] Token usage summary:');

    const primaryTotal = emptyUsage();
    const fallbackTotal = emptyUsage();

    for (const component of report.components) {
      logger.info(`${component.component}:`);

      for (const phase of component.phases) {
        logger.info(`  - ${phase.phase}:`);
        if (phase.primary) {
          logger.info(
            `      primary (${phase.primary.modelName}): ${formatTokens(phase.primary)}`,
          );
          addUsage(primaryTotal, phase.primary);
        }
        if (phase.fallback) {
          logger.info(
            `      fallback (${phase.fallback.modelName}): ${formatTokens(phase.fallback)}`,
          );
          addUsage(fallbackTotal, phase.fallback);
        }
        logger.info(`      subtotal: ${formatTokens(phase.total)}`);
      }

      logger.info(
        `  ${component.component} total: ${formatTokens(component.total)}`,
      );
    }

    logger.info('--- Summary ---');
    if (primaryTotal.totalTokens > 0) {
      logger.info(`Primary total: ${formatTokens(primaryTotal)}`);
    }
    if (fallbackTotal.totalTokens > 0) {
      logger.info(`Fallback total: ${formatTokens(fallbackTotal)}`);
    }
    logger.info(`Grand total: ${formatTokens(report.total)}`);
  }

  /**
   * Reset all tracked usage
   */
  reset(): void {
    this.usage = new Map();
  }
}
