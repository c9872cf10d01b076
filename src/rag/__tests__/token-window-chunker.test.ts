import { describe, expect, it } from "vitest";
import { getChunkingStrategy, registerChunkingStrategy, TokenWindowChunker } from "../chunking/index.js";
import { chunkIdFor } from "../chunking/token-window-chunker.js";
import { createDocument } from "../document.js";
import { createTiktokenTokenizer } from "../tokenizer.js";
import { ByteTokenizer, WordTokenizer } from "./helpers.js";

function numbered(prefix: string, count: number): string {
  return Array.from({ length: count }, (_, i) => `${prefix}${i + 1}`).join(" ");
}

describe("TokenWindowChunker", () => {
  it("cuts fixed windows that overlap by floor(W * ratio) tokens", () => {
    const chunker = new TokenWindowChunker(new WordTokenizer(), {
      windowSize: 10,
      overlapRatio: 0.2,
      boundaryLookbackRatio: 0.2,
    });
    const doc = createDocument("a.pdf", [{ pageNumber: 1, text: numbered("w", 25) }]);

    const chunks = chunker.chunk(doc);

    expect(chunks.map((c) => c.text)).toEqual([
      numbered("w", 10),
      "w9 w10 w11 w12 w13 w14 w15 w16 w17 w18",
      "w17 w18 w19 w20 w21 w22 w23 w24 w25",
    ]);
    expect(chunks.map((c) => c.tokenCount)).toEqual([10, 10, 9]);
    expect(chunks.map((c) => c.sequenceIndex)).toEqual([0, 1, 2]);
    expect(chunks.map((c) => c.chunkId)).toEqual([
      `${doc.id}-00000`,
      `${doc.id}-00001`,
      `${doc.id}-00002`,
    ]);
  });

  it("ends a window after a sentence inside the lookback region", () => {
    const chunker = new TokenWindowChunker(new WordTokenizer(), {
      windowSize: 10,
      overlapRatio: 0.1,
      boundaryLookbackRatio: 0.3,
    });
    const doc = createDocument("a.pdf", [
      { pageNumber: 1, text: "w1 w2 w3 w4 w5 w6 w7 w8. w9 w10 w11 w12 w13" },
    ]);

    const [first, second] = chunker.chunk(doc);

    expect(first?.text).toBe("w1 w2 w3 w4 w5 w6 w7 w8.");
    expect(first?.tokenCount).toBe(8);
    expect(second?.text.startsWith("w8. w9")).toBe(true);
  });

  it("prefers a paragraph break over a later sentence end", () => {
    const chunker = new TokenWindowChunker(new WordTokenizer(), {
      windowSize: 10,
      overlapRatio: 0.1,
      boundaryLookbackRatio: 0.3,
    });
    const doc = createDocument("a.pdf", [
      { pageNumber: 1, text: "w1 w2 w3 w4 w5 w6 w7 w8\nw9. w10 w11 w12" },
    ]);

    const [first] = chunker.chunk(doc);

    expect(first?.text).toBe("w1 w2 w3 w4 w5 w6 w7 w8");
  });

  it("lets a window span pages and attributes it to its first page", () => {
    const chunker = new TokenWindowChunker(new WordTokenizer(), {
      windowSize: 10,
      overlapRatio: 0.2,
      boundaryLookbackRatio: 0.2,
    });
    const doc = createDocument("a.pdf", [
      { pageNumber: 1, text: "p1a p1b p1c" },
      { pageNumber: 2, text: numbered("q", 12) },
    ]);

    const chunks = chunker.chunk(doc);

    expect(chunks).toHaveLength(2);
    expect(chunks[0]?.text).toBe("p1a p1b p1c\n\nq1 q2 q3 q4 q5 q6 q7");
    expect(chunks[0]?.sourcePage).toBe(1);
    expect(chunks[1]?.text).toBe("q6 q7 q8 q9 q10 q11 q12");
    expect(chunks[1]?.sourcePage).toBe(2);
    expect(chunks.every((c) => c.sourceFilename === "a.pdf")).toBe(true);
  });

  it("skips blank pages and returns nothing for a document without text", () => {
    const chunker = new TokenWindowChunker(new WordTokenizer(), { windowSize: 10 });
    const blank = createDocument("blank.pdf", [
      { pageNumber: 1, text: "   " },
      { pageNumber: 2, text: "\n" },
    ]);
    expect(chunker.chunk(blank)).toEqual([]);

    const sparse = createDocument("sparse.pdf", [
      { pageNumber: 1, text: "" },
      { pageNumber: 2, text: "only words here" },
    ]);
    const chunks = chunker.chunk(sparse);
    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.sourcePage).toBe(2);
    expect(chunks[0]?.text).toBe("only words here");
  });

  it("is deterministic", () => {
    const tokenizer = new WordTokenizer();
    const chunker = new TokenWindowChunker(tokenizer, { windowSize: 8 });
    const doc = createDocument("a.pdf", [{ pageNumber: 1, text: numbered("w", 30) }]);
    expect(chunker.chunk(doc)).toEqual(chunker.chunk(doc));
  });

  it("keeps every chunk within W tokens under the real tokenizer", () => {
    const tokenizer = createTiktokenTokenizer("cl100k_base");
    const chunker = new TokenWindowChunker(tokenizer);
    const sentence = "The employee handbook sets out leave, notice and probation rules. ";
    const doc = createDocument("handbook.pdf", [
      { pageNumber: 1, text: sentence.repeat(60) },
      { pageNumber: 2, text: sentence.repeat(60) },
    ]);

    const chunks = chunker.chunk(doc);

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.tokenCount).toBeGreaterThan(0);
      expect(chunk.tokenCount).toBeLessThanOrEqual(500);
    }
  });

  it("never cuts a multibyte character at a window edge", () => {
    const chunker = new TokenWindowChunker(new ByteTokenizer(), {
      windowSize: 10,
      overlapRatio: 0.2,
      boundaryLookbackRatio: 0.2,
    });
    // Ten three-byte characters: window edges fall on byte 10, 16, 22...
    const doc = createDocument("euro.pdf", [{ pageNumber: 1, text: "€".repeat(10) }]);

    const chunks = chunker.chunk(doc);

    expect(chunks.map((c) => c.text)).toEqual(["€€€", "€€€", "€€€", "€€€", "€€"]);
    expect(chunks.map((c) => c.tokenCount)).toEqual([9, 9, 9, 9, 6]);
  });

  it("keeps CJK text and emoji intact under the real tokenizer", () => {
    const chunker = new TokenWindowChunker(createTiktokenTokenizer("cl100k_base"), {
      windowSize: 50,
    });
    const doc = createDocument("policy.pdf", [
      { pageNumber: 1, text: "试用期结束后的通知期为一个月。👍🏽 ".repeat(40) },
    ]);

    const chunks = chunker.chunk(doc);

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.text).not.toContain("\uFFFD");
      expect(chunk.tokenCount).toBeLessThanOrEqual(50);
    }
  });

  it("rejects options that leave no room between overlap and lookback", () => {
    const tokenizer = new WordTokenizer();
    expect(() => new TokenWindowChunker(tokenizer, { windowSize: 0 })).toThrow(RangeError);
    expect(() => new TokenWindowChunker(tokenizer, { overlapRatio: 1 })).toThrow(RangeError);
    expect(
      () =>
        new TokenWindowChunker(tokenizer, {
          windowSize: 10,
          overlapRatio: 0.5,
          boundaryLookbackRatio: 0.5,
        }),
    ).toThrow(RangeError);
  });
});

describe("chunking registry", () => {
  it("builds the token-window strategy by name", () => {
    const strategy = getChunkingStrategy("token-window", new WordTokenizer(), { windowSize: 5 });
    expect(strategy.name).toBe("token-window");
  });

  it("throws for unknown strategies", () => {
    expect(() => getChunkingStrategy("semantic", new WordTokenizer())).toThrow(
      "Unknown chunking strategy: semantic",
    );
  });

  it("accepts custom strategies", () => {
    registerChunkingStrategy("single", () => ({
      name: "single",
      chunk: () => [],
    }));
    expect(getChunkingStrategy("single", new WordTokenizer()).name).toBe("single");
  });
});

describe("chunkIdFor", () => {
  it("pads the sequence index", () => {
    expect(chunkIdFor("abc", 7)).toBe("abc-00007");
  });
});
