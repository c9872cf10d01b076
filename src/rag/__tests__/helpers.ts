import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { createChunk } from "../chunking/index.js";
import type { EmbeddingFunction } from "../embedding-service.js";
import type { Tokenizer } from "../tokenizer.js";
import type { Chunk } from "../types.js";

/**
 * One token per word together with the whitespace after it; leading
 * whitespace is a token of its own. decode(encode(x)) === x.
 */
export class WordTokenizer implements Tokenizer {
  readonly name = "words";
  private readonly ids = new Map<string, number>();
  private readonly pieces: string[] = [];

  encode(text: string): number[] {
    return (text.match(/\S+\s*|\s+/g) ?? []).map((piece) => {
      let id = this.ids.get(piece);
      if (id === undefined) {
        id = this.pieces.length;
        this.ids.set(piece, id);
        this.pieces.push(piece);
      }
      return id;
    });
  }

  decode(tokens: number[]): string {
    return tokens.map((id) => this.pieces[id] ?? "").join("");
  }
}

/** One token per UTF-8 byte, so most non-ASCII characters span several tokens. */
export class ByteTokenizer implements Tokenizer {
  readonly name = "bytes";
  private readonly encoder = new TextEncoder();
  private readonly decoder = new TextDecoder();

  encode(text: string): number[] {
    return Array.from(this.encoder.encode(text));
  }

  decode(tokens: number[]): string {
    return this.decoder.decode(Uint8Array.from(tokens));
  }
}

export function words(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .map((w) => w.replace(/[^a-z0-9-]/g, ""))
    .filter((w) => w !== "");
}

/**
 * Counts vocabulary words, one dimension each. Every other word adds 0.01 to
 * a trailing dimension so no text maps to the zero vector.
 */
export function bagOfWords(text: string, vocabulary: readonly string[]): number[] {
  const vector = new Array<number>(vocabulary.length + 1).fill(0);
  for (const word of words(text)) {
    const i = vocabulary.indexOf(word);
    if (i >= 0) {
      vector[i] = (vector[i] ?? 0) + 1;
    } else {
      vector[vocabulary.length] = (vector[vocabulary.length] ?? 0) + 0.01;
    }
  }
  return vector;
}

export interface RecordingEmbedder extends EmbeddingFunction {
  /** Inputs of every embed() call, in call order. */
  calls: string[][];
}

export function createBagOfWordsEmbedder(vocabulary: readonly string[]): RecordingEmbedder {
  const calls: string[][] = [];
  return {
    model: "bag-of-words",
    calls,
    async embed(texts) {
      calls.push([...texts]);
      return texts.map((text) => bagOfWords(text, vocabulary));
    },
  };
}

/** Looks each text up in `table`; unknown texts reject. */
export function createTableEmbedder(table: Record<string, number[]>): RecordingEmbedder {
  const calls: string[][] = [];
  return {
    model: "table",
    calls,
    async embed(texts) {
      calls.push([...texts]);
      return texts.map((text) => {
        const vector = table[text];
        if (!vector) throw new Error(`no vector for "${text}"`);
        return vector;
      });
    },
  };
}

export function makeChunk(
  documentId: string,
  sequenceIndex: number,
  text: string,
  overrides: { filename?: string; page?: number } = {},
): Chunk {
  return createChunk({
    text,
    tokenCount: text.split(" ").length,
    sourceFilename: overrides.filename ?? "a.pdf",
    sourcePage: overrides.page ?? 1,
    documentId,
    sequenceIndex,
  });
}

export function repeatWord(word: string, count: number): string {
  return Array.from({ length: count }, () => word).join(" ");
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "pagecite-"));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
