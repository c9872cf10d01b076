import { RAG_CONFIG } from "./config.js";
import { countTokens, type Tokenizer } from "./tokenizer.js";
import type { Citation, RetrievalResult } from "./types.js";

export const ANSWER_INSTRUCTIONS = [
  "You answer questions about a private document collection.",
  "Use only the document excerpts under Retrieved Context. Do not use outside knowledge.",
  "If the excerpts do not contain the answer, say plainly that the provided documents do not contain enough information to answer.",
  "Cite the excerpts you rely on with their [Source: file, Page N] labels.",
].join("\n");

export interface PromptOptions {
  tokenizer: Tokenizer;
  maxContextTokens?: number;
}

export interface BuiltPrompt {
  prompt: string;
  /** Results that made it into the prompt, in prompt order. */
  included: RetrievalResult[];
  citations: Citation[];
}

function formatExcerpt(result: RetrievalResult, position: number): string {
  return `[${position}] (Source: ${result.filename}, Page ${result.page})\n${result.text}`;
}

/**
 * Lays out instructions, excerpts and question. Excerpts are added in
 * retrieval order until the context budget is spent; the first one is
 * always included.
 */
export function buildPrompt(
  question: string,
  results: RetrievalResult[],
  options: PromptOptions,
): BuiltPrompt {
  const budget = options.maxContextTokens ?? RAG_CONFIG.maxContextTokens;
  const included: RetrievalResult[] = [];
  const excerpts: string[] = [];
  let used = 0;

  for (const result of results) {
    const excerpt = formatExcerpt(result, included.length + 1);
    const cost = countTokens(options.tokenizer, excerpt);
    if (included.length > 0 && used + cost > budget) break;
    included.push(result);
    excerpts.push(excerpt);
    used += cost;
  }

  const prompt =
    `${ANSWER_INSTRUCTIONS}\n\n` +
    "--- Retrieved Context ---\n" +
    `${excerpts.join("\n\n")}\n` +
    "--- End of Context ---\n\n" +
    `Question: ${question.trim()}`;

  return { prompt, included, citations: collectCitations(included) };
}

/** Distinct (filename, page) pairs in order of first appearance. */
export function collectCitations(results: RetrievalResult[]): Citation[] {
  const seen = new Set<string>();
  const citations: Citation[] = [];
  for (const result of results) {
    const key = `${result.filename}\u0000${result.page}`;
    if (seen.has(key)) continue;
    seen.add(key);
    citations.push({ filename: result.filename, page: result.page });
  }
  return citations;
}

/** One line for the UI: `a.pdf p.4, p.2 | b.pdf p.1`, files in citation order. */
export function formatCitations(citations: Citation[]): string {
  const byFile = new Map<string, number[]>();
  for (const { filename, page } of citations) {
    const pages = byFile.get(filename) ?? [];
    pages.push(page);
    byFile.set(filename, pages);
  }
  return [...byFile]
    .map(([filename, pages]) => `${filename} ${pages.map((p) => `p.${p}`).join(", ")}`)
    .join(" | ");
}
