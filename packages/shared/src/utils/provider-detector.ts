import type { LanguageModel } from 'ai';

export type ProviderType =
  | 'openai'
  | 'google'
  | 'anthropic'
  | 'togetherai'
  | 'unknown';

/**
 * Detect the provider type from a LanguageModel.
 *
 * Model objects expose a `provider` field (e.g. 'openai.chat'); gateway model
 * strings carry the provider as their first path segment
 * (e.g. 'anthropic/claude-sonnet-4'). Falls back to 'unknown' if unrecognized.
 */
export function detectProvider(model: LanguageModel): ProviderType {
  const providerId =
    typeof model === 'string'
      ? model.includes('/')
        ? model.split('/')[0]
        : ''
      : model.provider;
  if (!providerId) return 'unknown';

  if (providerId.includes('openai')) return 'openai';
  if (providerId.includes('google')) return 'google';
  if (providerId.includes('anthropic')) return 'anthropic';
  if (providerId.includes('together')) return 'togetherai';

  return 'unknown';
}

/**
 * Model identifier without any provider prefix.
 *
 * 'openai/gpt-4o' and a model object with modelId 'gpt-4o' both yield 'gpt-4o'.
 */
export function getModelId(model: LanguageModel): string {
  if (typeof model !== 'string') return model.modelId;
  const slash = model.indexOf('/');
  return slash === -1 ? model : model.slice(slash + 1);
}
