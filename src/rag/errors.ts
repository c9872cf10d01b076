export class RagError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RagError";
  }
}

/** The extractor could not read a source file. Fatal to that document only. */
export class ExtractionFailure extends RagError {
  constructor(
    readonly filename: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Extraction failed for ${filename}: ${message}`, options);
    this.name = "ExtractionFailure";
  }
}

/**
 * The embedding function failed or returned an unusable vector.
 * `chunkId` is set when the failing input was a chunk (as opposed to a question).
 */
export class EmbeddingFailure extends RagError {
  readonly chunkId: string | undefined;
  readonly reason: string;

  constructor(reason: string, options?: { chunkId?: string; cause?: unknown }) {
    super(
      options?.chunkId ? `Embedding failed for chunk ${options.chunkId}: ${reason}` : reason,
      options,
    );
    this.name = "EmbeddingFailure";
    this.chunkId = options?.chunkId;
    this.reason = reason;
  }

  withChunkId(chunkId: string): EmbeddingFailure {
    return new EmbeddingFailure(this.reason, { chunkId, cause: this.cause });
  }
}

export class IndexWriteFailure extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Index write failed: ${message}`, options);
    this.name = "IndexWriteFailure";
  }
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface GenerationFailureDetails {
  retryable: boolean;
  retryAfterMs?: number;
  status?: number;
  /** Token usage the API reported for the failed call, when it reported any. */
  usage?: TokenUsage;
  cause?: unknown;
}

export class GenerationFailure extends RagError {
  readonly retryable: boolean;
  readonly retryAfterMs: number | undefined;
  readonly status: number | undefined;
  readonly usage: TokenUsage | undefined;

  constructor(message: string, details: GenerationFailureDetails) {
    super(message, { cause: details.cause });
    this.name = "GenerationFailure";
    this.retryable = details.retryable;
    this.retryAfterMs = details.retryAfterMs;
    this.status = details.status;
    this.usage = details.usage;
  }
}

export function isTimeoutError(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

export function describeError(err: unknown): string {
  if (err instanceof GenerationFailure && err.retryable) {
    return `${err.message} (temporary, try again shortly)`;
  }
  return err instanceof Error ? err.message : String(err);
}
