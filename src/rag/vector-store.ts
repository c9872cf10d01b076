import { ItemSelector, LocalIndex, type IndexItem } from "vectra";
import { z } from "zod";
import { contentHash } from "./document.js";
import type { EmbeddingFunction } from "./embedding-service.js";
import { EmbeddingFailure, IndexWriteFailure } from "./errors.js";
import { layerLogger, type Logger } from "../logger.js";
import type { Chunk, EmbeddingFailurePolicy, RetrievalResult } from "./types.js";

const chunkMetadataSchema = z.object({
  documentId: z.string(),
  filename: z.string(),
  page: z.number().int().positive(),
  sequenceIndex: z.number().int().nonnegative(),
  tokenCount: z.number().int().positive(),
  text: z.string(),
  contentHash: z.string(),
  // Records written before the model was stored read as "" and never match.
  embeddingModel: z.string().default(""),
});

export type ChunkMetadata = z.infer<typeof chunkMetadataSchema>;

interface EmbeddingRecord {
  chunkId: string;
  vector: number[];
  metadata: ChunkMetadata;
}

/** Identity and content hash of a stored chunk, without its vector. */
export interface StoredChunkRef {
  chunkId: string;
  documentId: string;
  filename: string;
  contentHash: string;
  embeddingModel: string;
}

export interface EmbeddingIndexOptions {
  folder: string;
  embedder: EmbeddingFunction;
  /** Expected vector length. When omitted, each batch must agree with its first vector. */
  dimensions?: number;
  logger?: Logger;
}

export interface InsertOptions {
  failurePolicy?: EmbeddingFailurePolicy;
}

export interface InsertResult {
  inserted: string[];
  failures: EmbeddingFailure[];
}

/**
 * Checks that a vector can take part in cosine ranking and returns its norm.
 * Throws EmbeddingFailure otherwise.
 */
export function validateVector(
  vector: number[] | undefined,
  expectedDimensions: number | undefined,
): number {
  if (!vector || vector.length === 0) {
    throw new EmbeddingFailure("empty vector");
  }
  if (expectedDimensions !== undefined && vector.length !== expectedDimensions) {
    throw new EmbeddingFailure(
      `expected ${expectedDimensions} dimensions, got ${vector.length}`,
    );
  }
  if (!vector.every((value) => Number.isFinite(value))) {
    throw new EmbeddingFailure("vector contains non-finite values");
  }
  const norm = ItemSelector.normalize(vector);
  if (norm === 0) {
    throw new EmbeddingFailure("zero vector has no direction");
  }
  return norm;
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Chunk vectors and their metadata in a vectra LocalIndex. Similarity is
 * cosine over the raw vectors (vectra keeps each item's norm), so nothing is
 * normalized at insert or query time.
 *
 * Every write goes through one queue: concurrent upserts of the same chunk id
 * land one after another and the last one wins.
 */
export class EmbeddingIndex {
  private readonly index: LocalIndex;
  private readonly embedder: EmbeddingFunction;
  private readonly dimensions: number | undefined;
  private readonly log: Logger;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(options: EmbeddingIndexOptions) {
    this.index = new LocalIndex(options.folder);
    this.embedder = options.embedder;
    this.dimensions = options.dimensions;
    this.log = options.logger ?? layerLogger("index");
  }

  /** Model whose vectors this index writes and queries with. */
  get embeddingModel(): string {
    return this.embedder.model;
  }

  async insert(chunks: Chunk[], options: InsertOptions = {}): Promise<InsertResult> {
    const policy = options.failurePolicy ?? "abort";
    if (chunks.length === 0) return { inserted: [], failures: [] };

    const vectors = await this.embedChunks(chunks, policy);
    const failures: EmbeddingFailure[] = [];
    const records: EmbeddingRecord[] = [];
    let expected = this.dimensions;

    chunks.forEach((chunk, i) => {
      const outcome = vectors[i];
      if (outcome instanceof EmbeddingFailure) {
        failures.push(outcome);
        return;
      }
      try {
        validateVector(outcome, expected);
      } catch (err) {
        if (!(err instanceof EmbeddingFailure)) throw err;
        failures.push(err.withChunkId(chunk.chunkId));
        return;
      }
      if (!outcome) return;
      expected ??= outcome.length;
      records.push({
        chunkId: chunk.chunkId,
        vector: outcome,
        metadata: {
          documentId: chunk.documentId,
          filename: chunk.sourceFilename,
          page: chunk.sourcePage,
          sequenceIndex: chunk.sequenceIndex,
          tokenCount: chunk.tokenCount,
          text: chunk.text,
          contentHash: contentHash(chunk.text),
          embeddingModel: this.embedder.model,
        },
      });
    });

    const [firstFailure] = failures;
    if (policy === "abort" && firstFailure) throw firstFailure;
    for (const failure of failures) {
      this.log.warn({ chunkId: failure.chunkId, err: failure }, "skipping chunk after embedding failure");
    }

    if (records.length > 0) {
      await this.enqueueWrite("upsert", async () => {
        for (const record of records) {
          await this.index.upsertItem({
            id: record.chunkId,
            vector: record.vector,
            metadata: record.metadata,
          });
        }
      });
    }

    this.log.debug({ inserted: records.length, failed: failures.length }, "chunks upserted");
    return { inserted: records.map((r) => r.chunkId), failures };
  }

  /**
   * Top-k records by descending cosine similarity, ties by ascending chunk id.
   * Returns every record when fewer than `topK` exist.
   */
  async query(vector: number[], topK: number): Promise<RetrievalResult[]> {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new RangeError(`topK must be a positive integer, got ${topK}`);
    }
    const norm = validateVector(vector, this.dimensions);
    const items = await this.readItems();
    const mismatched = items.find((item) => item.vector.length !== vector.length);
    if (mismatched) {
      throw new EmbeddingFailure(
        `query vector has ${vector.length} dimensions but record ${mismatched.id} has ${mismatched.vector.length}; re-index with RAG_RESET=true`,
      );
    }

    return items
      .map((item) => ({
        item,
        score: ItemSelector.normalizedCosineSimilarity(vector, norm, item.vector, item.norm),
      }))
      .sort((a, b) => b.score - a.score || compareIds(a.item.id, b.item.id))
      .slice(0, topK)
      .map(({ item, score }) => {
        const metadata = this.parseMetadata(item);
        return {
          chunkId: item.id,
          text: metadata.text,
          filename: metadata.filename,
          page: metadata.page,
          score,
        };
      });
  }

  async listChunks(): Promise<StoredChunkRef[]> {
    const items = await this.readItems();
    return items.map((item) => {
      const metadata = this.parseMetadata(item);
      return {
        chunkId: item.id,
        documentId: metadata.documentId,
        filename: metadata.filename,
        contentHash: metadata.contentHash,
        embeddingModel: metadata.embeddingModel,
      };
    });
  }

  async count(): Promise<number> {
    return (await this.readItems()).length;
  }

  async deleteChunks(chunkIds: string[]): Promise<void> {
    if (chunkIds.length === 0) return;
    await this.enqueueWrite("delete", async () => {
      for (const id of chunkIds) {
        await this.index.deleteItem(id);
      }
    });
  }

  async deleteAll(): Promise<void> {
    const run = async () => {
      try {
        if (await this.index.isIndexCreated()) {
          await this.index.deleteIndex();
        }
        await this.index.createIndex();
      } catch (err) {
        throw new IndexWriteFailure(
          `could not reset index: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err },
        );
      }
    };
    await this.schedule(run);
    this.log.info("index cleared");
  }

  private async embedChunks(
    chunks: Chunk[],
    policy: EmbeddingFailurePolicy,
  ): Promise<Array<number[] | EmbeddingFailure>> {
    try {
      return await this.embedder.embed(chunks.map((c) => c.text));
    } catch (err) {
      if (chunks.length === 1 && chunks[0]) {
        return [this.toFailure(err, chunks[0].chunkId)];
      }
      this.log.debug({ err }, "batched embedding failed, retrying chunk by chunk");
    }

    const outcomes: Array<number[] | EmbeddingFailure> = [];
    for (const chunk of chunks) {
      try {
        const [vector] = await this.embedder.embed([chunk.text]);
        outcomes.push(vector ?? this.toFailure(new Error("no vector returned"), chunk.chunkId));
      } catch (err) {
        const failure = this.toFailure(err, chunk.chunkId);
        if (policy === "abort") throw failure;
        outcomes.push(failure);
      }
    }
    return outcomes;
  }

  private toFailure(err: unknown, chunkId: string): EmbeddingFailure {
    if (err instanceof EmbeddingFailure) return err.withChunkId(chunkId);
    const reason = err instanceof Error ? err.message : String(err);
    return new EmbeddingFailure(reason, { chunkId, cause: err });
  }

  private async readItems(): Promise<IndexItem[]> {
    if (!(await this.index.isIndexCreated())) return [];
    return this.index.listItems();
  }

  private parseMetadata(item: IndexItem): ChunkMetadata {
    const parsed = chunkMetadataSchema.safeParse(item.metadata);
    if (!parsed.success) {
      throw new IndexWriteFailure(`record ${item.id} has malformed metadata`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  /** Runs one all-or-nothing vectra update on the write queue. */
  private async enqueueWrite(operation: string, apply: () => Promise<void>): Promise<void> {
    await this.schedule(async () => {
      try {
        if (!(await this.index.isIndexCreated())) {
          await this.index.createIndex();
        }
        await this.index.beginUpdate();
      } catch (err) {
        throw new IndexWriteFailure(
          `could not open index for ${operation}: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err },
        );
      }

      try {
        await apply();
        await this.index.endUpdate();
      } catch (err) {
        this.index.cancelUpdate();
        throw new IndexWriteFailure(
          `${operation} failed: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err },
        );
      }
    });
  }

  private schedule(task: () => Promise<void>): Promise<void> {
    const run = this.writeQueue.then(task);
    // The caller of this write receives the rejection; the queue moves on.
    this.writeQueue = run.catch(() => undefined);
    return run;
  }
}
