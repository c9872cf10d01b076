import { readFile } from "node:fs/promises";
import path from "node:path";
import { getDocumentProxy } from "unpdf";
import { createDocument } from "./document.js";
import { ExtractionFailure } from "./errors.js";
import type { Document, PageText } from "./types.js";

const SOFT_HYPHEN = /\u00AD/g;

/**
 * Removes common extraction artefacts: soft hyphens, indentation and trailing
 * spaces on each line, and runs of blank lines beyond one.
 */
export function cleanPageText(raw: string): string {
  return raw
    .replace(SOFT_HYPHEN, "")
    .split("\n")
    .map((line) => line.trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export async function extractPdf(filePath: string): Promise<Document> {
  const filename = path.basename(filePath);
  try {
    const buffer = await readFile(filePath);
    const pdf = await getDocumentProxy(new Uint8Array(buffer));

    const pages: PageText[] = [];
    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      const textContent = await page.getTextContent();
      let raw = "";
      for (const item of textContent.items) {
        if ("str" in item) raw += item.str + (item.hasEOL ? "\n" : " ");
      }
      pages.push({ pageNumber: i, text: cleanPageText(raw) });
    }

    return createDocument(filename, pages, path.resolve(filePath));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ExtractionFailure(filename, reason, { cause: err });
  }
}
