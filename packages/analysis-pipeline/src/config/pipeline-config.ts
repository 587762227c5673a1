import { z } from 'zod';

import { ConfigurationError } from '../errors';
import { ANALYSIS_SCHEMA_VERSION } from '../schemas/structured-analysis-schema';
import { resolveModelProfile } from './model-profiles';

/**
 * Tunable pipeline settings. Every field is optional on input.
 */
export const pipelineConfigSchema = z
  .object({
    minAnalyzableTokens: z.number().int().min(0).default(300),
    maxContextTokens: z.number().int().min(1_000).max(1_000_000).optional(),
    safetyBuffer: z.number().int().min(0).default(20_000),
    chunkTokenBudget: z.number().int().positive().optional(),
    maxConcurrentCalls: z.number().int().min(1).max(64).default(4),
    maxRetries: z.number().int().min(0).max(10).default(3),
    retryBaseDelayMs: z.number().positive().max(10_000).default(1_000),
    retryMaxDelayMs: z.number().positive().default(30_000),
    cacheMaxEntries: z.number().int().min(1).default(500),
    cacheTtlMs: z
      .number()
      .positive()
      .default(30 * 60 * 1_000),
    deadlineMs: z.number().positive().optional(),
    temperature: z.number().min(0).max(2).default(0.2),
    synthesizeSummary: z.boolean().default(true),
    schemaVersion: z.string().min(1).default(ANALYSIS_SCHEMA_VERSION),
  })
  .refine((config) => config.retryMaxDelayMs >= config.retryBaseDelayMs, {
    message: 'retryMaxDelayMs must be greater than or equal to retryBaseDelayMs',
    path: ['retryMaxDelayMs'],
  });

export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

/**
 * Pipeline settings after defaults and model-derived limits are applied
 */
export interface ResolvedPipelineConfig
  extends Omit<
    z.output<typeof pipelineConfigSchema>,
    'maxContextTokens' | 'chunkTokenBudget'
  > {
  maxContextTokens: number;
  chunkTokenBudget: number;
}

const MIN_TOKEN_LIMIT = 1_000;

/**
 * Validate settings and derive token limits for the given model.
 *
 * - maxContextTokens defaults to the model's context window minus safetyBuffer
 * - chunkTokenBudget defaults to maxContextTokens minus safetyBuffer
 *
 * Both derived values are floored at 1 000 tokens.
 *
 * @throws ConfigurationError listing every violated constraint
 */
export function resolvePipelineConfig(
  input: PipelineConfigInput,
  modelId: string,
): ResolvedPipelineConfig {
  const parsed = pipelineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid analysis pipeline options',
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    );
  }

  const config = parsed.data;
  const profile = resolveModelProfile(modelId);
  const maxContextTokens =
    config.maxContextTokens ??
    Math.max(MIN_TOKEN_LIMIT, profile.contextWindow - config.safetyBuffer);
  const chunkTokenBudget =
    config.chunkTokenBudget ??
    Math.max(MIN_TOKEN_LIMIT, maxContextTokens - config.safetyBuffer);

  if (chunkTokenBudget > maxContextTokens) {
    throw new ConfigurationError('Invalid analysis pipeline options', [
      `chunkTokenBudget: ${chunkTokenBudget} exceeds maxContextTokens ${maxContextTokens}`,
    ]);
  }

  return { ...config, maxContextTokens, chunkTokenBudget };
}
