import type { LoggerMethods } from '@legisight/logger';
import type { Chunk } from '@legisight/model';

import type { TokenCounter } from '../tokenization/token-counter';

import { firstCodePointLength } from '../tokenization/token-counter';

/**
 * Headings that mark legislative structure. Each is matched at line start.
 */
export const SECTION_PATTERNS: readonly RegExp[] = [
  /^(?:Section|SEC\.|SECTION|Article|ARTICLE|Title|TITLE)\s+\d+\.?/gm,
  /^§+\s*\d+/gm,
  /^\d+\.\s+[A-Z]/gm,
  /^[A-Z][A-Z ]+$/gm,
  /^\*\*\*.*?\*\*\*/gm,
];

/**
 * A pattern must occur more often than this for the text to count as structured
 */
const STRUCTURE_THRESHOLD = 3;

const PARAGRAPH_BREAK = /\n[ \t]*\n\s*/g;
const SENTENCE_END = /[.!?]+["')\]]*\s+/g;

type SplitLevel = 'section' | 'paragraph' | 'sentence';

interface Span {
  start: number;
  end: number;
  hardSplit: boolean;
}

/**
 * Span with its own token count
 */
interface Unit extends Span {
  tokens: number;
}

/**
 * Characters per budget token in the first hard-split window
 */
const HARD_SPLIT_WINDOW_FACTOR = 8;

export interface ChunkResult {
  /**
   * Ordered, gapless chunks covering the whole text
   */
  chunks: Chunk[];

  /**
   * Whether section structure was detected and used for splitting
   */
  hasStructure: boolean;
}

/**
 * TextChunker - token-budget-aware document segmentation
 *
 * Splits text into contiguous spans so that concatenating the chunk texts in
 * index order reproduces the input exactly. Units are sections when the text
 * has recognizable legislative structure, paragraphs otherwise. Units larger
 * than the budget are split into paragraphs, then sentences, then at token
 * boundaries. Token-boundary pieces become their own chunks, flagged
 * `hardSplit`.
 *
 * @example
 * ```typescript
 * const chunker = new TextChunker(new GptTokenCounter(logger), logger);
 * const { chunks, hasStructure } = chunker.split(billText, 2_000, 'gpt-4o');
 * ```
 */
export class TextChunker {
  private readonly counter: TokenCounter;
  private readonly logger: LoggerMethods;

  constructor(counter: TokenCounter, logger: LoggerMethods) {
    this.counter = counter;
    this.logger = logger;
  }

  /**
   * Whether any section pattern occurs more than three times
   */
  static detectStructure(text: string): boolean {
    return SECTION_PATTERNS.some(
      (pattern) =>
        (text.match(new RegExp(pattern)) ?? []).length > STRUCTURE_THRESHOLD,
    );
  }

  split(text: string, maxTokens: number, modelId: string): ChunkResult {
    if (!Number.isInteger(maxTokens) || maxTokens < 1) {
      throw new RangeError(
        `maxTokens must be a positive integer, got ${maxTokens}`,
      );
    }
    if (!text) return { chunks: [], hasStructure: false };

    const total = this.counter.count(text, modelId);
    if (total <= maxTokens) {
      return {
        chunks: [
          {
            index: 0,
            text,
            tokenCount: total,
            start: 0,
            end: text.length,
            hardSplit: false,
          },
        ],
        hasStructure: false,
      };
    }

    const hasStructure = TextChunker.detectStructure(text);
    const level: SplitLevel = hasStructure ? 'section' : 'paragraph';
    const units = this.refine(
      text,
      { start: 0, end: text.length, hardSplit: false },
      level,
      maxTokens,
      modelId,
    );
    const chunks = this.pack(text, units, maxTokens, modelId);

    this.logger.info(
      `[TextChunker] Split ${total} tokens into ${chunks.length} chunks (hasStructure=${hasStructure})`,
    );
    const hardSplit = chunks.filter((chunk) => chunk.hardSplit);
    if (hardSplit.length > 0) {
      this.logger.warn(
        `[TextChunker] ${hardSplit.length} chunk(s) were hard-split at token boundaries`,
      );
    }

    return { chunks, hasStructure };
  }

  /**
   * Break a span into units that each fit the budget, descending through
   * split levels as needed.
   */
  private refine(
    text: string,
    span: Span,
    level: SplitLevel | 'token',
    maxTokens: number,
    modelId: string,
  ): Unit[] {
    if (level === 'token') {
      return this.hardSplit(text, span, maxTokens, modelId);
    }

    const next = nextLevel(level);
    const pieces = splitSpan(text, span, level);
    const result: Unit[] = [];

    for (const piece of pieces) {
      const tokens = this.counter.count(
        text.slice(piece.start, piece.end),
        modelId,
      );
      if (tokens <= maxTokens) {
        result.push({ ...piece, tokens });
      } else {
        result.push(...this.refine(text, piece, next, maxTokens, modelId));
      }
    }

    return result;
  }

  /**
   * Cut a span at token boundaries. Each cut only encodes a window ahead of
   * the offset; the window doubles until the budget is reached inside it.
   */
  private hardSplit(
    text: string,
    span: Span,
    maxTokens: number,
    modelId: string,
  ): Unit[] {
    const pieces: Unit[] = [];
    let offset = span.start;

    while (offset < span.end) {
      let window = maxTokens * HARD_SPLIT_WINDOW_FACTOR;
      let length = 0;

      for (;;) {
        const windowEnd = Math.min(span.end, offset + window);
        const slice = text.slice(offset, windowEnd);
        length = this.counter.sliceAtTokenBoundary(slice, maxTokens, modelId);
        if (length < slice.length || windowEnd === span.end) break;
        window *= 2;
      }

      if (length <= 0) {
        length = firstCodePointLength(text.slice(offset, offset + 2));
      }
      const end = offset + length;
      pieces.push({
        start: offset,
        end,
        hardSplit: true,
        tokens: this.counter.count(text.slice(offset, end), modelId),
      });
      offset = end;
    }

    return pieces;
  }

  /**
   * Greedily accumulate units into chunks on their summed token counts, then
   * count each chunk once. Hard-split units stand alone.
   */
  private pack(
    text: string,
    units: Unit[],
    maxTokens: number,
    modelId: string,
  ): Chunk[] {
    const groups: Unit[][] = [];
    let current: Unit[] = [];
    let currentTokens = 0;

    for (const unit of units) {
      if (unit.hardSplit) {
        if (current.length > 0) groups.push(current);
        groups.push([unit]);
        current = [];
        currentTokens = 0;
        continue;
      }

      if (current.length > 0 && currentTokens + unit.tokens <= maxTokens) {
        current.push(unit);
        currentTokens += unit.tokens;
        continue;
      }

      if (current.length > 0) groups.push(current);
      current = [unit];
      currentTokens = unit.tokens;
    }
    if (current.length > 0) groups.push(current);

    const spans: Unit[] = [];
    for (const group of groups) {
      spans.push(...this.measure(text, group, maxTokens, modelId));
    }

    return spans.map((span, index) => ({
      index,
      text: text.slice(span.start, span.end),
      tokenCount: span.tokens,
      start: span.start,
      end: span.end,
      hardSplit: span.hardSplit,
    }));
  }

  /**
   * Exact count of a group. Joined text can tokenize to more than the sum of
   * its units; such a group is re-packed by exact counts.
   */
  private measure(
    text: string,
    group: Unit[],
    maxTokens: number,
    modelId: string,
  ): Unit[] {
    const first = group[0];
    const last = group[group.length - 1];
    const tokens = this.counter.count(
      text.slice(first.start, last.end),
      modelId,
    );
    if (tokens <= maxTokens || group.length === 1) {
      return [
        { start: first.start, end: last.end, hardSplit: first.hardSplit, tokens },
      ];
    }

    const spans: Unit[] = [];
    let current: Unit = { ...first };
    for (const unit of group.slice(1)) {
      const joined = this.counter.count(
        text.slice(current.start, unit.end),
        modelId,
      );
      if (joined <= maxTokens) {
        current = { ...current, end: unit.end, tokens: joined };
      } else {
        spans.push(current);
        current = { ...unit };
      }
    }
    spans.push(current);
    return spans;
  }
}

function nextLevel(level: SplitLevel): SplitLevel | 'token' {
  switch (level) {
    case 'section':
      return 'paragraph';
    case 'paragraph':
      return 'sentence';
    case 'sentence':
      return 'token';
  }
}

/**
 * Split a span into contiguous sub-spans at the boundaries of the given level
 */
function splitSpan(
  text: string,
  span: Span,
  level: SplitLevel,
): Span[] {
  const boundaries = new Set<number>();
  const slice = text.slice(span.start, span.end);

  if (level === 'section') {
    for (const pattern of SECTION_PATTERNS) {
      for (const match of slice.matchAll(new RegExp(pattern))) {
        if (match.index !== undefined && match.index > 0) {
          boundaries.add(match.index);
        }
      }
    }
  } else {
    const separator = level === 'paragraph' ? PARAGRAPH_BREAK : SENTENCE_END;
    for (const match of slice.matchAll(new RegExp(separator))) {
      const end = (match.index ?? 0) + match[0].length;
      if (end > 0 && end < slice.length) boundaries.add(end);
    }
  }

  const offsets = [0, ...[...boundaries].sort((a, b) => a - b), slice.length];
  const spans: Span[] = [];
  for (let i = 0; i < offsets.length - 1; i++) {
    if (offsets[i] < offsets[i + 1]) {
      spans.push({
        start: span.start + offsets[i],
        end: span.start + offsets[i + 1],
        hardSplit: false,
      });
    }
  }
  return spans;
}
