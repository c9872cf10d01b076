import { readdir } from "node:fs/promises";
import path from "node:path";
import { runWithConcurrency } from "./concurrency.js";
import { ExtractionFailure } from "./errors.js";
import type { Document, IndexErrorEntry } from "./types.js";

export type DocumentExtractor = (filePath: string) => Promise<Document>;

export interface LoadResult {
  documents: Document[];
  errors: IndexErrorEntry[];
}

/** PDF files directly inside `dir`, sorted by name. A missing directory has none. */
export async function scanPdfFiles(dir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
    throw err;
  }
  return entries
    .filter((f) => f.toLowerCase().endsWith(".pdf"))
    .sort()
    .map((f) => path.join(dir, f));
}

/**
 * Extracts every file. An unreadable file is reported in `errors` and does
 * not stop the others.
 */
export async function loadDocuments(
  filePaths: string[],
  extract: DocumentExtractor,
  concurrency = 2,
): Promise<LoadResult> {
  const loaded: Array<Document | undefined> = new Array(filePaths.length);
  const errors: IndexErrorEntry[] = [];

  await runWithConcurrency(filePaths, concurrency, async (filePath, i) => {
    try {
      loaded[i] = await extract(filePath);
    } catch (err) {
      if (!(err instanceof ExtractionFailure)) throw err;
      errors.push({ filename: err.filename, kind: "extraction", message: err.message });
    }
  });

  return {
    documents: loaded.filter((doc): doc is Document => doc !== undefined),
    errors,
  };
}
