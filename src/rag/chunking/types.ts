import type { Chunk, Document } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";

export interface ChunkingStrategy {
  readonly name: string;
  chunk(document: Document): Chunk[];
}

export interface ChunkingOptions {
  /** Window size W in tokens. */
  windowSize: number;
  /** Fraction of W repeated at the start of the next window. */
  overlapRatio: number;
  /** Fraction of W, at the end of a window, searched for a paragraph or sentence break. */
  boundaryLookbackRatio: number;
}

export type ChunkingStrategyFactory = (
  tokenizer: Tokenizer,
  options?: Partial<ChunkingOptions>,
) => ChunkingStrategy;
