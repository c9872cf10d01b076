import { z } from "zod";
import { RAG_CONFIG } from "../config.js";
import type { Chunk, Document } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import type { ChunkingOptions, ChunkingStrategy } from "./types.js";

const chunkSchema = z.object({
  chunkId: z.string().min(1),
  text: z.string().min(1),
  tokenCount: z.number().int().positive(),
  sourceFilename: z.string().min(1),
  sourcePage: z.number().int().positive(),
  documentId: z.string().min(1),
  sequenceIndex: z.number().int().nonnegative(),
});

export function chunkIdFor(documentId: string, sequenceIndex: number): string {
  return `${documentId}-${String(sequenceIndex).padStart(5, "0")}`;
}

export function createChunk(fields: Omit<Chunk, "chunkId">): Chunk {
  return chunkSchema.parse({
    ...fields,
    chunkId: chunkIdFor(fields.documentId, fields.sequenceIndex),
  });
}

interface StreamToken {
  id: number;
  page: number;
  piece: string;
  /** False when this token continues a character begun by the one before it. */
  startsCharacter: boolean;
}

const REPLACEMENT_CHARACTER = "\uFFFD";
// UTF-8 needs at most four bytes per character; a run of partial tokens
// longer than this comes from replacement characters in the source text.
const MAX_PARTIAL_RUN = 8;

const PARAGRAPH_BREAK = /\n/;
const SENTENCE_END = /[.!?]["'”’)\]]*\s*$/;

/**
 * Fixed-size token windows with overlap. A window may run across pages of
 * the same document and is attributed to the page of its first
 * non-whitespace token.
 */
export class TokenWindowChunker implements ChunkingStrategy {
  static readonly strategyName = "token-window";
  readonly name = TokenWindowChunker.strategyName;

  private readonly windowSize: number;
  private readonly overlap: number;
  private readonly lookback: number;

  constructor(
    private readonly tokenizer: Tokenizer,
    options: Partial<ChunkingOptions> = {},
  ) {
    const windowSize = options.windowSize ?? RAG_CONFIG.windowSize;
    const overlapRatio = options.overlapRatio ?? RAG_CONFIG.overlapRatio;
    const lookbackRatio = options.boundaryLookbackRatio ?? RAG_CONFIG.boundaryLookbackRatio;

    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new RangeError(`windowSize must be a positive integer, got ${windowSize}`);
    }
    for (const [label, ratio] of [
      ["overlapRatio", overlapRatio],
      ["boundaryLookbackRatio", lookbackRatio],
    ] as const) {
      if (!(ratio >= 0 && ratio < 1)) {
        throw new RangeError(`${label} must be in [0, 1), got ${ratio}`);
      }
    }

    this.windowSize = windowSize;
    this.overlap = Math.floor(windowSize * overlapRatio);
    this.lookback = Math.floor(windowSize * lookbackRatio);

    if (this.overlap + this.lookback >= windowSize) {
      throw new RangeError(
        `overlap (${this.overlap}) plus boundary lookback (${this.lookback}) must be smaller than windowSize (${windowSize})`,
      );
    }
  }

  chunk(document: Document): Chunk[] {
    const stream = this.tokenize(document);
    const chunks: Chunk[] = [];

    let start = 0;
    while (start < stream.length) {
      let end = Math.min(start + this.windowSize, stream.length);
      if (end < stream.length) {
        end = this.snapBack(stream, start, this.findBreak(stream, start, end));
      }

      const window = stream.slice(start, end);
      const text = this.tokenizer.decode(window.map((t) => t.id)).trim();
      const first = window.find((t) => t.piece.trim() !== "");

      if (text && first) {
        chunks.push(
          createChunk({
            text,
            tokenCount: window.length,
            sourceFilename: document.filename,
            sourcePage: first.page,
            documentId: document.id,
            sequenceIndex: chunks.length,
          }),
        );
      }

      if (end >= stream.length) break;
      start = this.nextStart(stream, start, end);
    }

    return chunks;
  }

  private tokenize(document: Document): StreamToken[] {
    const pages = document.pages
      .map((page) => ({ pageNumber: page.pageNumber, text: page.text.trim() }))
      .filter((page) => page.text !== "");

    const stream: StreamToken[] = [];
    let partial: number[] = [];
    pages.forEach((page, i) => {
      const text = i < pages.length - 1 ? `${page.text}\n\n` : page.text;
      for (const id of this.tokenizer.encode(text)) {
        stream.push({
          id,
          page: page.pageNumber,
          piece: this.tokenizer.decode([id]),
          startsCharacter: partial.length === 0,
        });
        partial.push(id);
        const decoded = this.tokenizer.decode(partial);
        if (!decoded.endsWith(REPLACEMENT_CHARACTER) || partial.length >= MAX_PARTIAL_RUN) {
          partial = [];
        }
      }
    });
    return stream;
  }

  /** Moves a cut back until it falls between characters. */
  private snapBack(stream: StreamToken[], start: number, end: number): number {
    let cut = end;
    while (cut > start + 1 && stream[cut]?.startsCharacter === false) cut--;
    return stream[cut]?.startsCharacter === false ? end : cut;
  }

  /**
   * Start of the next window: `overlap` tokens before `end`, moved back to a
   * character start, or forward when moving back would not make progress.
   */
  private nextStart(stream: StreamToken[], start: number, end: number): number {
    const target = Math.max(start + 1, end - this.overlap);
    let next = target;
    while (next > start + 1 && stream[next]?.startsCharacter === false) next--;
    if (stream[next]?.startsCharacter !== false) return next;
    next = target;
    while (next < end && stream[next]?.startsCharacter === false) next++;
    return next;
  }

  /**
   * Returns the exclusive end of the window: just after the last paragraph
   * break inside the lookback region, else just after the last sentence end,
   * else the hard limit.
   */
  private findBreak(stream: StreamToken[], start: number, end: number): number {
    const floor = Math.max(start + 1, end - this.lookback);
    for (const pattern of [PARAGRAPH_BREAK, SENTENCE_END]) {
      for (let i = end - 1; i >= floor; i--) {
        const token = stream[i];
        if (token && pattern.test(token.piece)) return i + 1;
      }
    }
    return end;
  }
}
