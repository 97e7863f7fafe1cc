// ============================================
// Text Completion Port
// Classification uses structured output; answering uses free text
// ============================================

import type { z } from "zod";

export type CompletionPrompt = {
  system: string;
  user: string;
};

/**
 * Declared output shape for a structured completion.
 * Implementations must decode the raw output with `schema` and reject
 * with MALFORMED_OUTPUT when decoding fails.
 */
export type CompletionSchema<T> = {
  name: string;
  description: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
};

export type CompletionOptions = {
  signal?: AbortSignal;
  requestId?: string;
};

export interface TextCompletionPort {
  /** Free-text completion. Resolves with the raw text, which may be empty. */
  completeText(prompt: CompletionPrompt, options?: CompletionOptions): Promise<string>;

  /** Structured completion decoded against `schema`. */
  completeStructured<T>(
    prompt: CompletionPrompt,
    schema: CompletionSchema<T>,
    options?: CompletionOptions
  ): Promise<T>;
}
