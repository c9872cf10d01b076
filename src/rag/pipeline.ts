import path from "node:path";
import { layerLogger, type Logger } from "../logger.js";
import { getChunkingStrategy, type ChunkingStrategy } from "./chunking/index.js";
import { RAG_CONFIG } from "./config.js";
import { runWithConcurrency } from "./concurrency.js";
import type { QuerySession } from "./cost-tracker.js";
import { contentHash } from "./document.js";
import { createOpenRouterEmbeddings, type EmbeddingFunction } from "./embedding-service.js";
import { EmbeddingFailure } from "./errors.js";
import { loadDocuments, scanPdfFiles, type DocumentExtractor } from "./file-scanner.js";
import { createOpenRouterChatModel, type LanguageModel } from "./language-model.js";
import { extractPdf } from "./pdf-extractor.js";
import { askQuestion, type QueryOptions } from "./query-engine.js";
import { createTiktokenTokenizer, type Tokenizer } from "./tokenizer.js";
import type {
  Chunk,
  Document,
  EmbeddingFailurePolicy,
  IndexReport,
  SessionReport,
} from "./types.js";
import { EmbeddingIndex, type StoredChunkRef } from "./vector-store.js";

export interface IndexingDeps {
  chunker: ChunkingStrategy;
  index: EmbeddingIndex;
  logger?: Logger;
}

export interface IndexingOptions {
  /** Clear every stored record before indexing. */
  reset?: boolean;
  failurePolicy?: EmbeddingFailurePolicy;
  concurrency?: number;
  /** When set, stored chunks of any file not named here are removed. */
  retainFilenames?: string[];
  onProgress?: (msg: string) => void;
}

function sameChunkSet(stored: StoredChunkRef[], chunks: Chunk[]): boolean {
  if (stored.length !== chunks.length) return false;
  const byId = new Map(stored.map((ref) => [ref.chunkId, ref.contentHash]));
  return chunks.every((chunk) => byId.get(chunk.chunkId) === contentHash(chunk.text));
}

/**
 * Chunks, embeds and upserts each document. Documents whose stored chunks
 * already match are skipped without embedding calls; a stored record from
 * another embedding model clears the index first. A failing document is
 * reported in `errors`; the others carry on. IndexWriteFailure, and
 * EmbeddingFailure under the "abort" policy, end the run.
 */
export async function indexDocuments(
  documents: Document[],
  deps: IndexingDeps,
  options: IndexingOptions = {},
): Promise<IndexReport> {
  const log = deps.logger ?? layerLogger("index");
  const progress = options.onProgress ?? (() => {});
  const failurePolicy = options.failurePolicy ?? RAG_CONFIG.embeddingFailurePolicy;
  const report: IndexReport = {
    documentsIndexed: 0,
    documentsUnchanged: 0,
    chunksIndexed: 0,
    chunksSkipped: 0,
    errors: [],
  };

  if (options.reset) {
    progress("RAG: reset requested, clearing index");
    await deps.index.deleteAll();
  }

  let stored = await deps.index.listChunks();

  // Vectors from different models are not comparable: one foreign record
  // means the whole index is rebuilt with the current model.
  const model = deps.index.embeddingModel;
  const foreign = stored.find((ref) => ref.embeddingModel !== model);
  if (foreign) {
    progress(`RAG: embedding model changed to ${model}, rebuilding index`);
    log.warn({ previousModel: foreign.embeddingModel || "unknown", model }, "embedding model changed");
    await deps.index.deleteAll();
    stored = [];
  }

  if (options.retainFilenames) {
    const present = new Set(options.retainFilenames);
    const orphaned = stored.filter((ref) => !present.has(ref.filename));
    if (orphaned.length > 0) {
      progress(`RAG: removing ${orphaned.length} chunk(s) of deleted file(s)`);
      await deps.index.deleteChunks(orphaned.map((ref) => ref.chunkId));
    }
  }

  await runWithConcurrency(
    documents,
    options.concurrency ?? RAG_CONFIG.indexConcurrency,
    async (doc) => {
      let chunks: Chunk[];
      try {
        chunks = deps.chunker.chunk(doc);
      } catch (err) {
        report.errors.push({
          filename: doc.filename,
          documentId: doc.id,
          kind: "chunking",
          message: err instanceof Error ? err.message : String(err),
        });
        return;
      }

      const existing = stored.filter((ref) => ref.documentId === doc.id);
      if (chunks.length > 0 && sameChunkSet(existing, chunks)) {
        report.documentsUnchanged++;
        report.chunksSkipped += chunks.length;
        progress(`RAG: ${doc.filename} unchanged, skipping`);
        return;
      }

      const current = new Set(chunks.map((c) => c.chunkId));
      const stale = stored.filter(
        (ref) =>
          (ref.documentId === doc.id && !current.has(ref.chunkId)) ||
          (ref.filename === doc.filename && ref.documentId !== doc.id),
      );
      await deps.index.deleteChunks(stale.map((ref) => ref.chunkId));

      if (chunks.length === 0) {
        progress(`RAG: ${doc.filename} produced no chunks, skipping`);
        return;
      }

      progress(`RAG: embedding ${doc.filename} (${chunks.length} chunks)...`);
      const { inserted, failures } = await deps.index.insert(chunks, { failurePolicy });

      for (const failure of failures) {
        report.errors.push({
          filename: doc.filename,
          documentId: doc.id,
          ...(failure.chunkId !== undefined && { chunkId: failure.chunkId }),
          kind: "embedding",
          message: failure.message,
        });
      }
      report.documentsIndexed++;
      report.chunksIndexed += inserted.length;
      report.chunksSkipped += failures.length;
      progress(`RAG: ${doc.filename} done (${inserted.length} chunks)`);
    },
  ).catch((err: unknown) => {
    if (err instanceof EmbeddingFailure) {
      log.error({ err }, "indexing aborted after embedding failure");
    }
    throw err;
  });

  log.info(report, "indexing finished");
  return report;
}

export interface RagPipelineOptions {
  apiKey: string;
  dataDir?: string;
  vectorsDir?: string;
  chatModel?: string;
  embeddingModel?: string;
  reset?: boolean;
  logger?: Logger;
  onProgress?: (msg: string) => void;
  // Swappable collaborators; the OpenRouter, tiktoken and unpdf versions are used otherwise.
  tokenizer?: Tokenizer;
  embedder?: EmbeddingFunction;
  model?: LanguageModel;
  extract?: DocumentExtractor;
  query?: QueryOptions;
}

export interface RagPipeline {
  report: IndexReport;
  documentCount: number;
  chunkCount: number;
  model: string;
  ask(question: string, session: QuerySession): Promise<SessionReport>;
}

export async function initRagPipeline(options: RagPipelineOptions): Promise<RagPipeline> {
  const log = options.logger ?? layerLogger("rag");
  const progress = options.onProgress ?? ((msg: string) => log.info(msg));

  const tokenizer = options.tokenizer ?? createTiktokenTokenizer(RAG_CONFIG.tokenizerEncoding);
  const embedder =
    options.embedder ??
    createOpenRouterEmbeddings({
      apiKey: options.apiKey,
      model: options.embeddingModel ?? RAG_CONFIG.embeddingModel,
    });
  const model =
    options.model ??
    createOpenRouterChatModel({
      apiKey: options.apiKey,
      model: options.chatModel ?? RAG_CONFIG.chatModel,
    });
  const index = new EmbeddingIndex({
    folder: options.vectorsDir ?? RAG_CONFIG.vectorsDir,
    embedder,
    logger: log.child({ layer: "index" }),
  });
  const chunker = getChunkingStrategy(RAG_CONFIG.defaultChunkingStrategy, tokenizer);

  const dataDir = options.dataDir ?? RAG_CONFIG.dataDir;
  progress(`RAG: scanning ${dataDir} for PDFs...`);
  const files = await scanPdfFiles(dataDir);
  const { documents, errors: extractionErrors } = await loadDocuments(
    files,
    options.extract ?? extractPdf,
  );
  for (const error of extractionErrors) {
    progress(`RAG: ${error.message}`);
  }

  const report = await indexDocuments(
    documents,
    { chunker, index, logger: log.child({ layer: "index" }) },
    {
      reset: options.reset ?? false,
      retainFilenames: files.map((file) => path.basename(file)),
      onProgress: progress,
    },
  );
  report.errors.unshift(...extractionErrors);

  const chunkCount = await index.count();
  progress(`RAG ready: ${documents.length} document(s), ${chunkCount} chunks`);

  return {
    report,
    documentCount: documents.length,
    chunkCount,
    model: model.model,
    ask: (question, session) =>
      askQuestion(
        question,
        session,
        { embedder, index, tokenizer, model, logger: log },
        options.query,
      ),
  };
}
