import type { Tokenizer } from "../tokenizer.js";
import type { ChunkingOptions, ChunkingStrategy, ChunkingStrategyFactory } from "./types.js";
import { TokenWindowChunker } from "./token-window-chunker.js";

const registry = new Map<string, ChunkingStrategyFactory>();

export function registerChunkingStrategy(
  name: string,
  factory: ChunkingStrategyFactory,
): void {
  registry.set(name, factory);
}

export function getChunkingStrategy(
  name: string,
  tokenizer: Tokenizer,
  options?: Partial<ChunkingOptions>,
): ChunkingStrategy {
  const factory = registry.get(name);
  if (!factory) {
    throw new Error(`Unknown chunking strategy: ${name}`);
  }
  return factory(tokenizer, options);
}

// Register defaults
registerChunkingStrategy(
  TokenWindowChunker.strategyName,
  (tokenizer, options) => new TokenWindowChunker(tokenizer, options),
);

export { TokenWindowChunker, createChunk } from "./token-window-chunker.js";
export type { ChunkingOptions, ChunkingStrategy, ChunkingStrategyFactory } from "./types.js";
