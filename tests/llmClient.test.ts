// ============================================
// LLM Client Tests: OpenAI adapter against a fake chat API
// ============================================

import { describe, it, expect } from "vitest";
import {
  decodeJson,
  OpenAICompletionClient,
  type ChatCompletionLike,
  type ChatCompletionsApi,
  type ChatRequest,
} from "../src/llm/client.js";
import { CLASSIFICATION_SCHEMA } from "../src/router/classifier.js";
import { isSupportBotError } from "../src/lib/errors.js";

/** Chat API double returning scripted content */
function fakeChatApi(reply: string | null | Error) {
  const requests: ChatRequest[] = [];
  const api: ChatCompletionsApi = {
    chat: {
      completions: {
        create: async (body: ChatRequest): Promise<ChatCompletionLike> => {
          requests.push(body);
          if (reply instanceof Error) throw reply;
          return { choices: [{ message: { content: reply } }] };
        },
      },
    },
  };
  return { api, requests };
}

const PROMPT = { system: "You classify.", user: "Classify this customer query: hi" };

function clientFor(api: ChatCompletionsApi): OpenAICompletionClient {
  return new OpenAICompletionClient(api, { model: "gpt-4o-mini", temperature: 0.1, timeoutMs: 1000, maxTokens: 200 });
}

describe("decodeJson", () => {
  it("parses a bare object", () => {
    expect(decodeJson('{"a": 1}')).toEqual({ a: 1 });
  });

  it("unwraps a fenced block", () => {
    expect(decodeJson('Here you go:\n```json\n{"a": 2}\n```')).toEqual({ a: 2 });
  });

  it("rejects empty output as malformed", () => {
    expect(() => decodeJson("   ")).toThrow("Completion output is empty");
  });

  it("rejects invalid JSON as malformed", () => {
    try {
      decodeJson("category: products");
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(isSupportBotError(err, "MALFORMED_OUTPUT")).toBe(true);
    }
  });
});

describe("OpenAICompletionClient", () => {
  it("sends system and user messages with the configured model settings", async () => {
    const { api, requests } = fakeChatApi("Hello there");

    const text = await clientFor(api).completeText(PROMPT);

    expect(text).toBe("Hello there");
    expect(requests).toEqual([
      {
        model: "gpt-4o-mini",
        messages: [
          { role: "system", content: "You classify." },
          { role: "user", content: "Classify this customer query: hi" },
        ],
        temperature: 0.1,
        max_tokens: 200,
      },
    ]);
  });

  it("returns an empty string when the model sends no content", async () => {
    const { api } = fakeChatApi(null);

    await expect(clientFor(api).completeText(PROMPT)).resolves.toBe("");
  });

  it("decodes structured output through the schema", async () => {
    const { api, requests } = fakeChatApi('{"category": "returns", "confidence": 0.9, "reasoning": "Refund"}');

    const result = await clientFor(api).completeStructured(PROMPT, CLASSIFICATION_SCHEMA);

    expect(result).toEqual({ category: "returns", confidence: 0.9, reasoning: "Refund" });
    expect(requests[0]?.response_format).toEqual({ type: "json_object" });
    expect(requests[0]?.messages[0]?.content).toContain("Respond with a single JSON object (QueryClassification) and nothing else:");
  });

  it("rejects structured output missing a field", async () => {
    const { api } = fakeChatApi('{"category": "returns", "confidence": 0.9}');

    await expect(clientFor(api).completeStructured(PROMPT, CLASSIFICATION_SCHEMA)).rejects.toMatchObject({
      code: "MALFORMED_OUTPUT",
      message: "Completion output does not match QueryClassification",
    });
  });

  it("rejects non-JSON structured output", async () => {
    const { api } = fakeChatApi("I think this is about returns.");

    await expect(clientFor(api).completeStructured(PROMPT, CLASSIFICATION_SCHEMA)).rejects.toMatchObject({
      code: "MALFORMED_OUTPUT",
      message: "Completion output is not valid JSON",
    });
  });

  it("wraps transport errors as generation failures", async () => {
    const { api } = fakeChatApi(new Error("429 Rate limit reached"));

    await expect(clientFor(api).completeText(PROMPT, { requestId: "req-l" })).rejects.toMatchObject({
      code: "GENERATION_FAILED",
      message: "Completion request failed: 429 Rate limit reached",
      requestId: "req-l",
    });
  });

  it("times out a slow completion and aborts the request", async () => {
    let requestSignal: AbortSignal | undefined;
    const api: ChatCompletionsApi = {
      chat: {
        completions: {
          create: (_body, options) => {
            requestSignal = options?.signal;
            return new Promise<ChatCompletionLike>(() => {});
          },
        },
      },
    };
    const client = new OpenAICompletionClient(api, { model: "gpt-4o-mini", temperature: 0.3, timeoutMs: 20 });

    await expect(client.completeText(PROMPT)).rejects.toMatchObject({
      code: "TIMEOUT",
      message: "completion (gpt-4o-mini) timed out after 20ms",
    });
    expect(requestSignal?.aborted).toBe(true);
  });
});
