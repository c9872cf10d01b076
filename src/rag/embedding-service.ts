import { z } from "zod";
import { RAG_CONFIG } from "./config.js";
import { runWithConcurrency } from "./concurrency.js";
import { EmbeddingFailure, isTimeoutError } from "./errors.js";

const OPENROUTER_EMBEDDINGS_URL = "https://openrouter.ai/api/v1/embeddings";

/** Maps texts to fixed-length vectors, one per input, in input order. */
export interface EmbeddingFunction {
  readonly model: string;
  embed(texts: string[]): Promise<number[][]>;
}

export interface OpenRouterEmbeddingOptions {
  apiKey: string;
  model?: string;
  batchSize?: number;
  concurrency?: number;
  timeoutMs?: number;
  url?: string;
  onProgress?: (done: number, total: number) => void;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int().nonnegative().optional(),
    }),
  ),
});

async function embedBatch(
  batch: string[],
  options: Required<Pick<OpenRouterEmbeddingOptions, "apiKey" | "model" | "timeoutMs" | "url">>,
): Promise<number[][]> {
  let res: Response;
  try {
    res = await fetch(options.url, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${options.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: options.model,
        input: batch,
      }),
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (err) {
    if (isTimeoutError(err)) {
      throw new EmbeddingFailure(`Embedding API timed out after ${options.timeoutMs}ms`, {
        cause: err,
      });
    }
    throw new EmbeddingFailure("Embedding API unreachable", { cause: err });
  }

  if (!res.ok) {
    const text = await res.text();
    throw new EmbeddingFailure(`Embedding API error (${res.status}): ${text}`);
  }

  const parsed = embeddingResponseSchema.safeParse(await res.json());
  if (!parsed.success) {
    throw new EmbeddingFailure("Embedding API returned a malformed payload", {
      cause: parsed.error,
    });
  }
  if (parsed.data.data.length !== batch.length) {
    throw new EmbeddingFailure(
      `Embedding API returned ${parsed.data.data.length} vectors for ${batch.length} inputs`,
    );
  }

  const vectors: number[][] = new Array(batch.length);
  parsed.data.data.forEach((item, position) => {
    vectors[item.index ?? position] = item.embedding;
  });
  return vectors;
}

export function createOpenRouterEmbeddings(
  options: OpenRouterEmbeddingOptions,
): EmbeddingFunction {
  const model = options.model ?? RAG_CONFIG.embeddingModel;
  const batchSize = options.batchSize ?? RAG_CONFIG.embeddingBatchSize;
  const concurrency = options.concurrency ?? RAG_CONFIG.embeddingConcurrency;
  const request = {
    apiKey: options.apiKey,
    model,
    timeoutMs: options.timeoutMs ?? RAG_CONFIG.embeddingTimeoutMs,
    url: options.url ?? OPENROUTER_EMBEDDINGS_URL,
  };

  return {
    model,
    async embed(texts: string[]): Promise<number[][]> {
      // Split into batches
      const batches: { texts: string[]; startIdx: number }[] = [];
      for (let i = 0; i < texts.length; i += batchSize) {
        batches.push({ texts: texts.slice(i, i + batchSize), startIdx: i });
      }

      const results: number[][] = new Array(texts.length);
      let completed = 0;

      await runWithConcurrency(batches, concurrency, async (batch) => {
        const embeddings = await embedBatch(batch.texts, request);
        embeddings.forEach((embedding, j) => {
          results[batch.startIdx + j] = embedding;
        });
        completed += batch.texts.length;
        options.onProgress?.(Math.min(completed, texts.length), texts.length);
      });

      return results;
    },
  };
}
