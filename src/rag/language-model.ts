import { z } from "zod";
import { RAG_CONFIG } from "./config.js";
import { GenerationFailure, isTimeoutError, type TokenUsage } from "./errors.js";

const OPENROUTER_API_URL = "https://openrouter.ai/api/v1/chat/completions";

export interface Completion {
  text: string;
  promptTokens: number;
  completionTokens: number;
  model: string;
}

export interface LanguageModel {
  readonly model: string;
  complete(prompt: string): Promise<Completion>;
}

export interface OpenRouterChatOptions {
  apiKey: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  url?: string;
}

const usageSchema = z.object({
  prompt_tokens: z.number().int().nonnegative(),
  completion_tokens: z.number().int().nonnegative(),
});

const completionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
  usage: usageSchema,
});

const errorPayloadSchema = z.object({
  error: z.object({
    message: z.string().optional(),
    code: z.union([z.number(), z.string()]).optional(),
  }),
  usage: usageSchema.optional(),
});

const DEFAULT_RETRY_AFTER_MS = 1_000;

function toUsage(usage: z.infer<typeof usageSchema> | undefined): TokenUsage | undefined {
  return usage
    ? { promptTokens: usage.prompt_tokens, completionTokens: usage.completion_tokens }
    : undefined;
}

function parseRetryAfter(header: string | null): number {
  if (!header) return DEFAULT_RETRY_AFTER_MS;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const date = Date.parse(header);
  return Number.isNaN(date) ? DEFAULT_RETRY_AFTER_MS : Math.max(0, date - Date.now());
}

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 409 || status === 429 || status >= 500;
}

async function readJson(res: Response): Promise<unknown> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export function createOpenRouterChatModel(options: OpenRouterChatOptions): LanguageModel {
  const model = options.model ?? RAG_CONFIG.chatModel;
  const timeoutMs = options.timeoutMs ?? RAG_CONFIG.generationTimeoutMs;
  const url = options.url ?? OPENROUTER_API_URL;

  return {
    model,
    async complete(prompt: string): Promise<Completion> {
      let res: Response;
      try {
        res = await fetch(url, {
          method: "POST",
          headers: {
            Authorization: `Bearer ${options.apiKey}`,
            "Content-Type": "application/json",
          },
          body: JSON.stringify({
            model,
            messages: [{ role: "user", content: prompt }],
            temperature: options.temperature ?? RAG_CONFIG.chatTemperature,
            max_tokens: options.maxTokens ?? RAG_CONFIG.chatMaxTokens,
          }),
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (err) {
        const message = isTimeoutError(err)
          ? `Model call timed out after ${timeoutMs}ms`
          : "Model API unreachable";
        throw new GenerationFailure(message, { retryable: true, cause: err });
      }

      const body = await readJson(res);
      const errorPayload = errorPayloadSchema.safeParse(body);

      if (!res.ok) {
        const detail = errorPayload.success
          ? errorPayload.data.error.message
          : typeof body === "string"
            ? body
            : undefined;
        throw new GenerationFailure(
          `API error (${res.status})${detail ? `: ${detail}` : ""}`,
          {
            retryable: isRetryableStatus(res.status),
            status: res.status,
            ...(res.status === 429 && {
              retryAfterMs: parseRetryAfter(res.headers.get("retry-after")),
            }),
            ...(errorPayload.success && { usage: toUsage(errorPayload.data.usage) }),
          },
        );
      }

      if (errorPayload.success) {
        throw new GenerationFailure(
          `Model returned an error: ${errorPayload.data.error.message ?? "unknown error"}`,
          { retryable: false, status: res.status, usage: toUsage(errorPayload.data.usage) },
        );
      }

      const parsed = completionSchema.safeParse(body);
      if (!parsed.success) {
        throw new GenerationFailure("Model returned a malformed response", {
          retryable: false,
          status: res.status,
          cause: parsed.error,
        });
      }

      const [choice] = parsed.data.choices;
      return {
        text: choice?.message.content ?? "",
        promptTokens: parsed.data.usage.prompt_tokens,
        completionTokens: parsed.data.usage.completion_tokens,
        model: parsed.data.model ?? model,
      };
    },
  };
}
