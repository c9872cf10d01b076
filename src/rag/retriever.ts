import { RAG_CONFIG } from "./config.js";
import type { EmbeddingFunction } from "./embedding-service.js";
import { EmbeddingFailure } from "./errors.js";
import type { Tokenizer } from "./tokenizer.js";
import type { RetrievalResult } from "./types.js";
import type { EmbeddingIndex } from "./vector-store.js";

export interface RetrieverDeps {
  embedder: EmbeddingFunction;
  index: EmbeddingIndex;
  tokenizer: Tokenizer;
}

export interface RetrieveOptions {
  topK?: number;
  /** Results scoring below this are dropped before de-duplication. */
  minScore?: number;
  /** Shared token-run share above which a same-page result counts as a duplicate. */
  dedupOverlap?: number;
}

export async function retrieve(
  question: string,
  deps: RetrieverDeps,
  options: RetrieveOptions = {},
): Promise<RetrievalResult[]> {
  const topK = options.topK ?? RAG_CONFIG.topK;
  const minScore = options.minScore ?? 0;
  const dedupOverlap = options.dedupOverlap ?? RAG_CONFIG.dedupOverlapThreshold;

  const queryVector = await embedQuestion(question, deps.embedder);
  const results = await deps.index.query(queryVector, topK);

  return deduplicateResults(
    results.filter((r) => r.score >= minScore),
    deps.tokenizer,
    dedupOverlap,
  );
}

/** The question goes through the same embedding function as the chunks, unchanged. */
async function embedQuestion(question: string, embedder: EmbeddingFunction): Promise<number[]> {
  let vectors: number[][];
  try {
    vectors = await embedder.embed([question]);
  } catch (err) {
    if (err instanceof EmbeddingFailure) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new EmbeddingFailure(`Question embedding failed: ${reason}`, { cause: err });
  }
  const [vector] = vectors;
  if (!vector) {
    throw new EmbeddingFailure("Question embedding returned no vector");
  }
  return vector;
}

function shingles(tokens: readonly number[], size: number): Set<string> {
  if (tokens.length === 0) return new Set();
  if (tokens.length <= size) return new Set([tokens.join(",")]);
  const result = new Set<string>();
  for (let i = 0; i + size <= tokens.length; i++) {
    result.add(tokens.slice(i, i + size).join(","));
  }
  return result;
}

/**
 * Share of the shorter text's token runs of length `size` that also occur in
 * the other text. Common words alone never match; repeated passages do.
 */
export function tokenOverlap(
  a: readonly number[],
  b: readonly number[],
  size: number = RAG_CONFIG.dedupShingleSize,
): number {
  const shinglesA = shingles(a, size);
  const shinglesB = shingles(b, size);
  const smaller = shinglesA.size <= shinglesB.size ? shinglesA : shinglesB;
  const larger = smaller === shinglesA ? shinglesB : shinglesA;
  if (smaller.size === 0) return 0;
  let shared = 0;
  for (const shingle of smaller) {
    if (larger.has(shingle)) shared++;
  }
  return shared / smaller.size;
}

/**
 * Drops results that repeat a higher-scored result from the same file and
 * page. Expects `results` in descending score order and keeps that order.
 */
export function deduplicateResults(
  results: RetrievalResult[],
  tokenizer: Tokenizer,
  threshold: number,
): RetrievalResult[] {
  const kept: Array<{ result: RetrievalResult; tokens: number[] }> = [];

  for (const result of results) {
    const tokens = tokenizer.encode(result.text);
    const duplicate = kept.some(
      (k) =>
        k.result.filename === result.filename &&
        k.result.page === result.page &&
        tokenOverlap(k.tokens, tokens) > threshold,
    );
    if (!duplicate) kept.push({ result, tokens });
  }

  return kept.map((k) => k.result);
}
