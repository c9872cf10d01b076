import path from "node:path";
import { z } from "zod";

const CACHE_DIR = path.resolve(".rag-cache");

export const RAG_CONFIG = {
  dataDir: path.resolve("data"),
  vectorsDir: path.join(CACHE_DIR, "vectors"),
  logFile: path.join(CACHE_DIR, "rag.log"),
  priceTablePath: path.resolve("config/prices.json"),

  embeddingModel: "qwen/qwen3-embedding-8b",
  embeddingBatchSize: 20,
  embeddingConcurrency: 5,
  embeddingTimeoutMs: 30_000,

  chatModel: "qwen/qwen3.5-27b",
  chatTemperature: 0,
  chatMaxTokens: 1024,
  generationTimeoutMs: 60_000,
  generationRetries: 2,
  retryBaseDelayMs: 1_000,

  tokenizerEncoding: "cl100k_base",

  defaultChunkingStrategy: "token-window",
  windowSize: 500,
  overlapRatio: 0.1,
  boundaryLookbackRatio: 0.1,

  indexConcurrency: 3,
  embeddingFailurePolicy: "skip",

  topK: 5,
  scoreThreshold: 0.3,
  dedupOverlapThreshold: 0.5,
  dedupShingleSize: 4,
  maxContextTokens: 6_000,
} as const;

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .default("false")
  .transform((value) => value === "true" || value === "1" || value === "yes");

const envSchema = z.object({
  OPENROUTER_API_KEY: z.string().min(1, "OPENROUTER_API_KEY environment variable is required"),
  RAG_RESET: booleanFlag,
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  LOG_FILE: z.string().min(1).default(RAG_CONFIG.logFile),
  DATA_DIR: z.string().min(1).default(RAG_CONFIG.dataDir),
  CHAT_MODEL: z.string().min(1).default(RAG_CONFIG.chatModel),
  EMBEDDING_MODEL: z.string().min(1).default(RAG_CONFIG.embeddingModel),
  PRICE_TABLE_PATH: z.string().min(1).default(RAG_CONFIG.priceTablePath),
});

export type RagEnv = z.infer<typeof envSchema>;

/**
 * Validates the process environment. Throws with every problem listed,
 * one per line.
 */
export function loadEnv(env: NodeJS.ProcessEnv = process.env): RagEnv {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `  ${issue.path.join(".")}: ${issue.message}`,
    );
    throw new Error(`Invalid environment:\n${problems.join("\n")}`);
  }
  return parsed.data;
}
