import { buildPrompt } from "./context-builder.js";
import { GenerationFailure } from "./errors.js";
import type { Completion, LanguageModel } from "./language-model.js";
import type { Tokenizer } from "./tokenizer.js";
import type { Answer, RetrievalResult } from "./types.js";

export const INSUFFICIENT_CONTEXT_ANSWER =
  "The provided documents do not contain enough information to answer this question.";

export interface ComposerDeps {
  model: LanguageModel;
  tokenizer: Tokenizer;
  maxContextTokens?: number;
}

/**
 * One model call over the retrieved excerpts. With no excerpts the model is
 * not called and the fixed insufficient-context answer comes back. Failures
 * surface as GenerationFailure; retrying is the caller's decision.
 */
export async function composeAnswer(
  question: string,
  results: RetrievalResult[],
  deps: ComposerDeps,
): Promise<Answer> {
  if (results.length === 0) {
    return {
      text: INSUFFICIENT_CONTEXT_ANSWER,
      citations: [],
      promptTokens: 0,
      completionTokens: 0,
      model: null,
    };
  }

  const { prompt, citations } = buildPrompt(question, results, {
    tokenizer: deps.tokenizer,
    ...(deps.maxContextTokens !== undefined && { maxContextTokens: deps.maxContextTokens }),
  });

  let completion: Completion;
  try {
    completion = await deps.model.complete(prompt);
  } catch (err) {
    if (err instanceof GenerationFailure) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new GenerationFailure(`Model call failed: ${reason}`, { retryable: false, cause: err });
  }

  return {
    text: completion.text.trim(),
    citations,
    promptTokens: completion.promptTokens,
    completionTokens: completion.completionTokens,
    model: completion.model,
  };
}
