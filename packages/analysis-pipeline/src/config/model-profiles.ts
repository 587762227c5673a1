/**
 * Tokenizer encodings supported by the token counter
 */
export type TokenizerEncoding = 'o200k_base' | 'cl100k_base';

/**
 * Capabilities of a model family
 */
export interface ModelProfile {
  /**
   * Context window in tokens
   */
  contextWindow: number;

  /**
   * Whether the model accepts PDF/image input
   */
  vision: boolean;

  encoding: TokenizerEncoding;
}

/**
 * Model profiles keyed by model-id prefix.
 *
 * Lookup uses the longest matching prefix, so 'gpt-4o-mini-2024-07-18'
 * resolves to 'gpt-4o-mini' and 'gpt-4-0613' to 'gpt-4'.
 */
export const MODEL_PROFILES: Readonly<Record<string, ModelProfile>> = {
  'gpt-4o': { contextWindow: 128_000, vision: true, encoding: 'o200k_base' },
  'gpt-4o-mini': {
    contextWindow: 128_000,
    vision: true,
    encoding: 'o200k_base',
  },
  'gpt-4.1': { contextWindow: 1_000_000, vision: true, encoding: 'o200k_base' },
  'gpt-4-turbo': {
    contextWindow: 128_000,
    vision: true,
    encoding: 'cl100k_base',
  },
  'gpt-4': { contextWindow: 8_192, vision: false, encoding: 'cl100k_base' },
  'gpt-3.5-turbo': {
    contextWindow: 16_385,
    vision: false,
    encoding: 'cl100k_base',
  },
  o1: { contextWindow: 200_000, vision: true, encoding: 'o200k_base' },
  'o3-mini': { contextWindow: 200_000, vision: false, encoding: 'o200k_base' },
  claude: { contextWindow: 200_000, vision: true, encoding: 'cl100k_base' },
  gemini: { contextWindow: 1_000_000, vision: true, encoding: 'cl100k_base' },
};

export const DEFAULT_MODEL_PROFILE: Readonly<ModelProfile> = {
  contextWindow: 128_000,
  vision: false,
  encoding: 'cl100k_base',
};

/**
 * Strip a 'provider/' gateway prefix from a model id
 */
export function normalizeModelId(modelId: string): string {
  const slash = modelId.lastIndexOf('/');
  return (slash === -1 ? modelId : modelId.slice(slash + 1)).toLowerCase();
}

/**
 * Find the profile for a model id, or undefined when no prefix matches
 */
export function findModelProfile(modelId: string): ModelProfile | undefined {
  const id = normalizeModelId(modelId);
  let bestKey: string | undefined;

  for (const key of Object.keys(MODEL_PROFILES)) {
    if (id.startsWith(key) && (!bestKey || key.length > bestKey.length)) {
      bestKey = key;
    }
  }

  return bestKey ? MODEL_PROFILES[bestKey] : undefined;
}

/**
 * Profile for a model id, falling back to DEFAULT_MODEL_PROFILE
 */
export function resolveModelProfile(modelId: string): ModelProfile {
  return findModelProfile(modelId) ?? DEFAULT_MODEL_PROFILE;
}
