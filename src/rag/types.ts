export interface PageText {
  pageNumber: number;
  text: string;
}

export interface Document {
  id: string;
  filename: string;
  filePath?: string;
  pages: PageText[];
}

export interface Chunk {
  chunkId: string;
  text: string;
  tokenCount: number;
  sourceFilename: string;
  sourcePage: number;
  documentId: string;
  sequenceIndex: number;
}

export interface RetrievalResult {
  chunkId: string;
  text: string;
  filename: string;
  page: number;
  score: number;
}

export interface Citation {
  filename: string;
  page: number;
}

export interface Answer {
  text: string;
  citations: Citation[];
  promptTokens: number;
  completionTokens: number;
  /** Model that produced the text, or null when no model call was made. */
  model: string | null;
}

export type EmbeddingFailurePolicy = "skip" | "abort";

export interface IndexErrorEntry {
  filename: string;
  documentId?: string;
  chunkId?: string;
  kind: "extraction" | "chunking" | "embedding";
  message: string;
}

export interface IndexReport {
  documentsIndexed: number;
  documentsUnchanged: number;
  chunksIndexed: number;
  chunksSkipped: number;
  errors: IndexErrorEntry[];
}

export interface SessionReport {
  answerText: string;
  citations: Citation[];
  costThisCall: number;
  cumulativeCost: number;
  promptTokens: number;
  completionTokens: number;
}
