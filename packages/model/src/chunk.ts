/**
 * A contiguous segment of a source document
 *
 * Chunks of one document partition it: indices are 0-based and gapless, spans
 * do not overlap, and concatenating `text` in index order reproduces the
 * document exactly.
 */
export interface Chunk {
  /**
   * Position in the chunk sequence (0-based)
   */
  index: number;

  /**
   * Exact source text of the span
   */
  text: string;

  /**
   * Token count of `text` under the model's tokenization
   */
  tokenCount: number;

  /**
   * Start offset in the source document (inclusive, UTF-16 code units)
   */
  start: number;

  /**
   * End offset in the source document (exclusive)
   */
  end: number;

  /**
   * True when the chunk was produced by cutting a single oversized unit at a
   * token boundary. Only hard-split chunks may exceed the token budget.
   */
  hardSplit: boolean;
}
