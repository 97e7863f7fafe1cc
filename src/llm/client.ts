// ============================================
// LLM Client: OpenAI chat completions behind the Text Completion Port
// ============================================

import type OpenAI from "openai";
import { logger } from "../lib/logger.js";
import { describeCause, generationError, malformedOutputError, isSupportBotError } from "../lib/errors.js";
import { withTimeout } from "../lib/timeout.js";
import type { CompletionOptions, CompletionPrompt, CompletionSchema, TextCompletionPort } from "./completion.js";

/**
 * Model defaults.
 * Classification runs cold for consistent labels; answering gets a little room.
 */
export const CLASSIFIER_TEMPERATURE = 0.1;
export const RESPONDER_TEMPERATURE = 0.3;
export const DEFAULT_MAX_TOKENS = 800;

type ChatMessage = { role: "system"; content: string } | { role: "user"; content: string };

export type ChatRequest = {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
  response_format?: { type: "json_object" };
};

export type ChatCompletionLike = {
  choices: Array<{ message: { content: string | null } }>;
};

/** The slice of the OpenAI SDK this adapter calls */
export interface ChatCompletionsApi {
  chat: {
    completions: {
      create(body: ChatRequest, options?: { signal?: AbortSignal }): Promise<ChatCompletionLike>;
    };
  };
}

export function chatApiFrom(openai: OpenAI): ChatCompletionsApi {
  return {
    chat: {
      completions: {
        create: (body, options) => openai.chat.completions.create(body, options),
      },
    },
  };
}

export type CompletionClientOptions = {
  model: string;
  temperature: number;
  timeoutMs: number;
  maxTokens?: number;
};

export class OpenAICompletionClient implements TextCompletionPort {
  private readonly api: ChatCompletionsApi;
  private readonly options: Required<CompletionClientOptions>;

  constructor(api: ChatCompletionsApi, options: CompletionClientOptions) {
    this.api = api;
    this.options = { maxTokens: DEFAULT_MAX_TOKENS, ...options };
  }

  async completeText(prompt: CompletionPrompt, options: CompletionOptions = {}): Promise<string> {
    return this.request(prompt, false, options);
  }

  async completeStructured<T>(
    prompt: CompletionPrompt,
    schema: CompletionSchema<T>,
    options: CompletionOptions = {}
  ): Promise<T> {
    const system = `${prompt.system}\n\nRespond with a single JSON object (${schema.name}) and nothing else:\n${schema.description}`;
    const raw = await this.request({ system, user: prompt.user }, true, options);

    const decoded = decodeJson(raw);
    const result = schema.schema.safeParse(decoded);

    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
      throw malformedOutputError(`Completion output does not match ${schema.name}`, result.error, { issues });
    }

    return result.data;
  }

  private async request(prompt: CompletionPrompt, jsonMode: boolean, options: CompletionOptions): Promise<string> {
    const { model, temperature, maxTokens, timeoutMs } = this.options;

    const body: ChatRequest = {
      model,
      messages: [
        { role: "system", content: prompt.system },
        { role: "user", content: prompt.user },
      ],
      temperature,
      max_tokens: maxTokens,
      ...(jsonMode && { response_format: { type: "json_object" as const } }),
    };

    try {
      const response = await withTimeout(
        `completion (${model})`,
        (signal) => this.api.chat.completions.create(body, { signal }),
        timeoutMs,
        options.signal
      );

      return response.choices[0]?.message.content ?? "";
    } catch (err) {
      logger.error("LLM completion failed", {
        stage: "llm",
        requestId: options.requestId,
        model,
        error: err,
      });
      if (isSupportBotError(err)) {
        throw err;
      }
      throw generationError(`Completion request failed: ${describeCause(err)}`, options.requestId, err);
    }
  }
}

/**
 * Decode a JSON completion.
 * Accepts a bare object or one wrapped in a markdown code fence; anything else is malformed.
 */
export function decodeJson(raw: string): unknown {
  const fenced = raw.match(/```(?:json)?\s*([\s\S]*?)```/);
  const jsonStr = (fenced?.[1] ?? raw).trim();

  if (!jsonStr) {
    throw malformedOutputError("Completion output is empty");
  }

  try {
    return JSON.parse(jsonStr);
  } catch (err) {
    throw malformedOutputError("Completion output is not valid JSON", err, {
      responsePreview: raw.slice(0, 100),
    });
  }
}
