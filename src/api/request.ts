// ============================================
// Inbound request contract
// ============================================

import { z } from "zod";
import { validationError } from "../lib/errors.js";

export const MAX_QUERY_LENGTH = 2000;

/**
 * Body accepted by the chat handler.
 * session_id is opaque and passed through untouched.
 */
export const chatRequestSchema = z.object({
  query: z
    .string({ required_error: "query is required" })
    .trim()
    .min(1, "Query cannot be empty")
    .max(MAX_QUERY_LENGTH, `Query cannot exceed ${MAX_QUERY_LENGTH} characters`),
  session_id: z.string().max(200).optional(),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

export type FieldIssue = {
  field: string;
  message: string;
};

/**
 * Validate an untrusted body.
 * Throws VALIDATION_ERROR carrying per-field issues.
 */
export function parseChatRequest(body: unknown): ChatRequest {
  const result = chatRequestSchema.safeParse(body);

  if (!result.success) {
    const details: FieldIssue[] = result.error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
    }));
    throw validationError("Invalid request body", { details });
  }

  return result.data;
}
