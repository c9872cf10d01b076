import { setTimeout as sleep } from "node:timers/promises";
import { layerLogger, truncateText, type Logger } from "../logger.js";
import { composeAnswer } from "./answer-composer.js";
import { RAG_CONFIG } from "./config.js";
import type { QuerySession } from "./cost-tracker.js";
import type { EmbeddingFunction } from "./embedding-service.js";
import { GenerationFailure } from "./errors.js";
import type { LanguageModel } from "./language-model.js";
import { retrieve } from "./retriever.js";
import type { Tokenizer } from "./tokenizer.js";
import type { Answer, RetrievalResult, SessionReport } from "./types.js";
import type { EmbeddingIndex } from "./vector-store.js";

export interface QueryEngineDeps {
  embedder: EmbeddingFunction;
  index: EmbeddingIndex;
  tokenizer: Tokenizer;
  model: LanguageModel;
  logger?: Logger;
}

export interface QueryOptions {
  topK?: number;
  minScore?: number;
  dedupOverlap?: number;
  maxContextTokens?: number;
  /** Extra attempts after a retryable GenerationFailure. */
  retries?: number;
  retryBaseDelayMs?: number;
}

/**
 * Retrieve, compose, then charge the session. The session is only charged
 * for usage the model API reported, including usage reported on failed
 * attempts; `costThisCall` sums every charge made for this question.
 */
export async function askQuestion(
  question: string,
  session: QuerySession,
  deps: QueryEngineDeps,
  options: QueryOptions = {},
): Promise<SessionReport> {
  const log = (deps.logger ?? layerLogger("rag")).child({ question: truncateText(question) });
  const t0 = performance.now();
  session.countQuestion();

  const results = await retrieve(question, deps, {
    topK: options.topK ?? RAG_CONFIG.topK,
    minScore: options.minScore ?? RAG_CONFIG.scoreThreshold,
    dedupOverlap: options.dedupOverlap ?? RAG_CONFIG.dedupOverlapThreshold,
  });
  log.debug(
    { chunks: results.length, topScore: results[0]?.score, ms: Math.round(performance.now() - t0) },
    "retrieval done",
  );

  const charges: number[] = [];
  const answer = await composeWithRetry(question, results, session, charges, deps, options, log);

  if (answer.model !== null && answer.model !== deps.model.model) {
    // The session is priced for the configured model only.
    log.warn(
      { requestedModel: deps.model.model, servedModel: answer.model },
      "served model differs from the priced model; cost may be inaccurate",
    );
  }
  if (answer.model !== null) {
    charges.push(session.record(answer.promptTokens, answer.completionTokens));
  }
  const costThisCall = charges.reduce((sum, cost) => sum + cost, 0);

  log.info(
    {
      citations: answer.citations.length,
      promptTokens: answer.promptTokens,
      completionTokens: answer.completionTokens,
      costUsd: costThisCall,
      ms: Math.round(performance.now() - t0),
    },
    answer.model === null ? "answered without model call" : "answered",
  );

  return {
    answerText: answer.text,
    citations: answer.citations,
    costThisCall,
    cumulativeCost: session.sessionTotal(),
    promptTokens: answer.promptTokens,
    completionTokens: answer.completionTokens,
  };
}

async function composeWithRetry(
  question: string,
  results: RetrievalResult[],
  session: QuerySession,
  charges: number[],
  deps: QueryEngineDeps,
  options: QueryOptions,
  log: Logger,
): Promise<Answer> {
  const retries = options.retries ?? RAG_CONFIG.generationRetries;
  const baseDelay = options.retryBaseDelayMs ?? RAG_CONFIG.retryBaseDelayMs;

  for (let attempt = 0; ; attempt++) {
    try {
      return await composeAnswer(question, results, {
        model: deps.model,
        tokenizer: deps.tokenizer,
        ...(options.maxContextTokens !== undefined && {
          maxContextTokens: options.maxContextTokens,
        }),
      });
    } catch (err) {
      if (!(err instanceof GenerationFailure)) throw err;
      if (err.usage) {
        charges.push(session.record(err.usage.promptTokens, err.usage.completionTokens));
      }
      if (!err.retryable || attempt >= retries) {
        log.error({ err, attempt }, "generation failed");
        throw err;
      }
      const delay = Math.max(baseDelay * 2 ** attempt, err.retryAfterMs ?? 0);
      log.warn({ attempt, delayMs: delay, status: err.status }, "generation failed, retrying");
      await sleep(delay);
    }
  }
}
