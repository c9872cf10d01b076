import { getEncoding, type TiktokenEncoding } from "js-tiktoken";

/**
 * Token boundaries used for chunk sizing, retrieval de-duplication and
 * context budgeting. Inject the same instance everywhere so those figures
 * stay comparable.
 */
export interface Tokenizer {
  readonly name: string;
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

export function createTiktokenTokenizer(
  encoding: TiktokenEncoding = "cl100k_base",
): Tokenizer {
  const enc = getEncoding(encoding);
  return {
    name: `tiktoken:${encoding}`,
    // Special-token strings inside documents are encoded as ordinary text.
    encode: (text) => enc.encode(text, [], []),
    decode: (tokens) => enc.decode(tokens),
  };
}

export function countTokens(tokenizer: Tokenizer, text: string): number {
  return tokenizer.encode(text).length;
}
