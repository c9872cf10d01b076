import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { GenerationFailure } from "../errors.js";
import { createOpenRouterChatModel } from "../language-model.js";

const mockFetch = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
    ...init,
  });
}

async function failureOf(promise: Promise<unknown>): Promise<GenerationFailure> {
  const err = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  if (!(err instanceof GenerationFailure)) {
    throw new Error(`expected GenerationFailure, got ${String(err)}`);
  }
  return err;
}

describe("createOpenRouterChatModel", () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const model = createOpenRouterChatModel({
    apiKey: "test-key",
    model: "test/model",
    url: "http://llm.test/v1/chat/completions",
  });

  it("sends the prompt as one user message and returns text with usage", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        model: "test/model-2026",
        choices: [{ message: { content: "One month." } }],
        usage: { prompt_tokens: 120, completion_tokens: 8 },
      }),
    );

    const completion = await model.complete("PROMPT");

    expect(completion).toEqual({
      text: "One month.",
      promptTokens: 120,
      completionTokens: 8,
      model: "test/model-2026",
    });
    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(url).toBe("http://llm.test/v1/chat/completions");
    expect(init?.headers).toMatchObject({ Authorization: "Bearer test-key" });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test/model",
      messages: [{ role: "user", content: "PROMPT" }],
      temperature: 0,
      max_tokens: 1024,
    });
  });

  it("falls back to the configured model name and empty text", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        choices: [{ message: { content: null } }],
        usage: { prompt_tokens: 5, completion_tokens: 0 },
      }),
    );
    const completion = await model.complete("PROMPT");
    expect(completion.model).toBe("test/model");
    expect(completion.text).toBe("");
  });

  it("marks rate limits retryable with the Retry-After delay", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse(
        { error: { message: "slow down" } },
        { status: 429, headers: { "Retry-After": "2" } },
      ),
    );

    const err = await failureOf(model.complete("PROMPT"));

    expect(err.message).toBe("API error (429): slow down");
    expect(err.retryable).toBe(true);
    expect(err.retryAfterMs).toBe(2000);
    expect(err.status).toBe(429);
  });

  it("marks server errors retryable and client errors not", async () => {
    mockFetch.mockResolvedValueOnce(new Response("upstream unavailable", { status: 503 }));
    const server = await failureOf(model.complete("PROMPT"));
    expect(server.message).toBe("API error (503): upstream unavailable");
    expect(server.retryable).toBe(true);
    expect(server.retryAfterMs).toBeUndefined();

    mockFetch.mockResolvedValueOnce(jsonResponse({ error: { message: "bad model" } }, { status: 400 }));
    const client = await failureOf(model.complete("PROMPT"));
    expect(client.retryable).toBe(false);
    expect(client.status).toBe(400);
  });

  it("marks network errors retryable", async () => {
    mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));
    const err = await failureOf(model.complete("PROMPT"));
    expect(err.message).toBe("Model API unreachable");
    expect(err.retryable).toBe(true);
  });

  it("reports timeouts", async () => {
    mockFetch.mockRejectedValueOnce(Object.assign(new Error("timed out"), { name: "TimeoutError" }));
    const err = await failureOf(model.complete("PROMPT"));
    expect(err.message).toBe("Model call timed out after 60000ms");
    expect(err.retryable).toBe(true);
  });

  it("surfaces an error payload on a 2xx response with its usage", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({
        error: { message: "provider refused", code: 502 },
        usage: { prompt_tokens: 40, completion_tokens: 0 },
      }),
    );

    const err = await failureOf(model.complete("PROMPT"));

    expect(err.message).toBe("Model returned an error: provider refused");
    expect(err.retryable).toBe(false);
    expect(err.usage).toEqual({ promptTokens: 40, completionTokens: 0 });
  });

  it("rejects responses without choices or usage", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ choices: [] }));
    const err = await failureOf(model.complete("PROMPT"));
    expect(err.message).toBe("Model returned a malformed response");
    expect(err.retryable).toBe(false);
  });
});
