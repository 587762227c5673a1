import type { LoggerMethods } from '@legisight/logger';
import type { DocumentMetadata } from '@legisight/model';
import type { LLMTokenUsageAggregator } from '@legisight/shared';
import type { LanguageModel } from 'ai';

import { z } from 'zod';

import {
  BaseLLMComponent,
  type BaseLLMComponentOptions,
} from '../core/base-llm-component';
import { PromptBuilder } from '../prompts/prompt-builder';
import { AnalysisMerger } from './analysis-merger';

export const SynthesizedSummarySchema = z.object({
  summary: z
    .string()
    .min(1)
    .describe('One coherent summary of the whole bill, at most 2000 characters'),
});

/**
 * SummarySynthesizer - condenses per-chunk summaries into one
 *
 * Runs after a chunked analysis when more than one chunk contributed. The
 * chunk summaries arrive in chunk order; the result reads as a summary of the
 * whole document rather than a list of parts.
 */
export class SummarySynthesizer extends BaseLLMComponent {
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(
      logger,
      model,
      'SummarySynthesizer',
      options,
      fallbackModel,
      aggregator,
    );
  }

  /**
   * @throws AnalysisError subclass when the model call fails
   */
  async synthesize(
    summaries: string[],
    metadata: DocumentMetadata,
    abortSignal?: AbortSignal,
  ): Promise<string> {
    if (summaries.length === 0) {
      throw new RangeError('No summaries to synthesize');
    }
    if (summaries.length === 1) {
      return AnalysisMerger.capSummary(summaries[0]);
    }

    const { output } = await this.callTextLLM(
      SynthesizedSummarySchema,
      'SynthesizedSummary',
      this.buildSystemPrompt(),
      this.buildUserPrompt(summaries, metadata),
      { phase: 'synthesis', abortSignal },
    );

    const summary = AnalysisMerger.capSummary(output.summary.trim());
    this.log(
      'info',
      `Condensed ${summaries.length} chunk summaries into ${summary.length} characters`,
    );
    return summary;
  }

  protected buildSystemPrompt(): string {
    return (
      'You are a legislative analysis assistant. You receive summaries of consecutive parts of one bill, ' +
      'written separately. Combine them into a single summary of the whole bill. ' +
      'Keep every substantive provision, remove repetition, and do not add information that is not in the summaries.'
    );
  }

  protected buildUserPrompt(
    summaries: string[],
    metadata: DocumentMetadata,
  ): string {
    const parts = summaries
      .map((summary, i) => `PART ${i + 1} OF ${summaries.length}:\n${summary}`)
      .join('\n\n');
    const context = PromptBuilder.buildContext(metadata);

    return [
      'Write one summary of the bill from these part summaries.',
      context,
      parts,
    ]
      .filter((section) => section !== undefined)
      .join('\n\n');
  }
}
