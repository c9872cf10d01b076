import { readFile } from "node:fs/promises";
import { z } from "zod";

const modelPriceSchema = z.object({
  promptPerMillion: z.number().nonnegative(),
  completionPerMillion: z.number().nonnegative(),
});

const priceTableSchema = z.object({
  version: z.string().min(1),
  currency: z.literal("USD"),
  models: z.record(modelPriceSchema),
});

/** USD per million tokens, per model. */
export type ModelPrice = z.infer<typeof modelPriceSchema>;
export type PriceTable = z.infer<typeof priceTableSchema>;

export interface QuerySessionState {
  /** Questions asked, whether answered, failed or answered without a model call. */
  questions: number;
  promptTokens: number;
  completionTokens: number;
  costUsd: number;
  calls: number;
}

export function parsePriceTable(data: unknown): PriceTable {
  return priceTableSchema.parse(data);
}

export async function loadPriceTable(filePath: string): Promise<PriceTable> {
  const raw = await readFile(filePath, "utf-8");
  try {
    return parsePriceTable(JSON.parse(raw));
  } catch (err) {
    throw new Error(`Invalid price table ${filePath}`, { cause: err });
  }
}

export function priceFor(table: PriceTable, model: string): ModelPrice {
  const price = table.models[model];
  if (!price) {
    throw new Error(`No price for model ${model} in price table ${table.version}`);
  }
  return price;
}

function assertTokenCount(label: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${label} must be a non-negative integer, got ${value}`);
  }
}

export function computeCost(
  price: ModelPrice,
  promptTokens: number,
  completionTokens: number,
): number {
  assertTokenCount("promptTokens", promptTokens);
  assertTokenCount("completionTokens", completionTokens);
  return (
    (promptTokens * price.promptPerMillion + completionTokens * price.completionPerMillion) /
    1_000_000
  );
}

/**
 * Running token and cost totals for one session. Pass the instance to each
 * query; sessions share nothing with each other.
 */
export class QuerySession {
  private state: QuerySessionState = {
    questions: 0,
    promptTokens: 0,
    completionTokens: 0,
    costUsd: 0,
    calls: 0,
  };

  constructor(readonly price: ModelPrice) {}

  /** Adds one model call's usage and returns what that call cost. */
  record(promptTokens: number, completionTokens: number): number {
    const cost = computeCost(this.price, promptTokens, completionTokens);
    const prev = this.state;
    // Single replacement: no await between read and write.
    this.state = {
      ...prev,
      promptTokens: prev.promptTokens + promptTokens,
      completionTokens: prev.completionTokens + completionTokens,
      costUsd: prev.costUsd + cost,
      calls: prev.calls + 1,
    };
    return cost;
  }

  countQuestion(): void {
    this.state = { ...this.state, questions: this.state.questions + 1 };
  }

  sessionTotal(): number {
    return this.state.costUsd;
  }

  snapshot(): QuerySessionState {
    return { ...this.state };
  }
}

export function formatUsd(amount: number): string {
  return `$${amount.toFixed(6)}`;
}

/** Lines for the `stats` command and the exit summary. */
export function describeSession(state: QuerySessionState, model: string): string[] {
  const totalTokens = state.promptTokens + state.completionTokens;
  return [
    `Model: ${model}`,
    `Questions: ${state.questions}`,
    `Model calls: ${state.calls}`,
    `Tokens: ${totalTokens.toLocaleString("en-US")} (prompt ${state.promptTokens.toLocaleString("en-US")}, completion ${state.completionTokens.toLocaleString("en-US")})`,
    `Cost: ${formatUsd(state.costUsd)}`,
  ];
}
