import type { LoggerMethods } from '@legisight/logger';

import * as cl100k from 'gpt-tokenizer/encoding/cl100k_base';
import * as o200k from 'gpt-tokenizer/encoding/o200k_base';

import {
  DEFAULT_MODEL_PROFILE,
  type TokenizerEncoding,
  findModelProfile,
} from '../config/model-profiles';

/**
 * Counts tokens under a model's tokenization scheme
 */
export interface TokenCounter {
  /**
   * Number of tokens in `text` for the given model. Deterministic.
   */
  count(text: string, modelId: string): number;

  /**
   * Length in characters of the longest prefix of `text` that ends on a token
   * boundary and holds at most `maxTokens` tokens. Always at least one code
   * point for non-empty text.
   */
  sliceAtTokenBoundary(text: string, maxTokens: number, modelId: string): number;
}

interface Encoder {
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

const ENCODERS: Record<TokenizerEncoding, Encoder> = {
  o200k_base: { encode: o200k.encode, decode: o200k.decode },
  cl100k_base: { encode: cl100k.encode, decode: cl100k.decode },
};

/**
 * GptTokenCounter - BPE token counting with gpt-tokenizer
 *
 * Models are mapped to an encoding through the model profile table. Unknown
 * models use the default profile's encoding; the first lookup of each
 * unknown model id is reported as a warning.
 */
export class GptTokenCounter implements TokenCounter {
  private readonly logger: LoggerMethods;
  private readonly warnedModels = new Set<string>();

  constructor(logger: LoggerMethods) {
    this.logger = logger;
  }

  count(text: string, modelId: string): number {
    if (!text) return 0;
    return this.encoderFor(modelId).encode(text).length;
  }

  sliceAtTokenBoundary(
    text: string,
    maxTokens: number,
    modelId: string,
  ): number {
    if (!text) return 0;

    const encoder = this.encoderFor(modelId);
    const tokens = encoder.encode(text);
    if (tokens.length <= maxTokens) return text.length;

    // Decoding a prefix may cut a multi-byte character; shrink until the
    // decoded prefix is a real prefix of the text.
    for (let n = Math.max(0, maxTokens); n > 0; n--) {
      const prefix = encoder.decode(tokens.slice(0, n));
      if (
        prefix.length > 0 &&
        text.startsWith(prefix) &&
        encoder.encode(prefix).length <= maxTokens
      ) {
        return prefix.length;
      }
    }

    return firstCodePointLength(text);
  }

  private encoderFor(modelId: string): Encoder {
    const profile = findModelProfile(modelId);
    if (!profile) {
      if (!this.warnedModels.has(modelId)) {
        this.warnedModels.add(modelId);
        this.logger.warn(
          `[TokenCounter] Unknown model "${modelId}", counting with ${DEFAULT_MODEL_PROFILE.encoding}`,
        );
      }
      return ENCODERS[DEFAULT_MODEL_PROFILE.encoding];
    }
    return ENCODERS[profile.encoding];
  }
}

export function firstCodePointLength(text: string): number {
  const codePoint = text.codePointAt(0);
  if (codePoint === undefined) return 0;
  return codePoint > 0xffff ? 2 : 1;
}
