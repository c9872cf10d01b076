import { createHash } from "node:crypto";
import { z } from "zod";
import type { Document, PageText } from "./types.js";

const pageSchema = z.object({
  pageNumber: z.number().int().positive(),
  text: z.string(),
});

/**
 * Builds a Document whose id is a content hash over the filename and every
 * page, so re-extracting an unchanged file yields the same id.
 */
export function createDocument(
  filename: string,
  pages: PageText[],
  filePath?: string,
): Document {
  if (!filename.trim()) {
    throw new TypeError("Document filename must not be empty");
  }

  const validated = pages.map((page) => pageSchema.parse(page));
  validated.sort((a, b) => a.pageNumber - b.pageNumber);
  for (let i = 1; i < validated.length; i++) {
    if (validated[i]?.pageNumber === validated[i - 1]?.pageNumber) {
      throw new TypeError(
        `Duplicate page ${validated[i]?.pageNumber} in ${filename}`,
      );
    }
  }

  const hash = createHash("sha256").update(filename).update("\0");
  for (const page of validated) {
    hash.update(`${page.pageNumber}\u0001${page.text}\u0002`);
  }

  return {
    id: hash.digest("hex").slice(0, 16),
    filename,
    ...(filePath !== undefined && { filePath }),
    pages: validated,
  };
}

export function contentHash(text: string): string {
  return createHash("sha256").update(text).digest("hex").slice(0, 16);
}
