// ============================================
// LLM Prompts: classification and grounded answering
// ============================================

import { CATEGORY_CATALOG, CATEGORIES, type AnswerableCategory } from "../router/types.js";
import type { CompletionPrompt } from "./completion.js";

/**
 * Placed in the context block when retrieval found nothing.
 * The answering prompt tells the model what to do when it sees it.
 */
export const NO_CONTEXT_MARKER = "[NO MATCHING CONTEXT FOUND]";

/**
 * Separator between passages in the context block.
 * Passages keep retrieval order: most relevant first.
 */
export const PASSAGE_SEPARATOR = "\n\n";

/**
 * System prompt for the classifier.
 * Category coverage comes from CATEGORY_CATALOG so the listing and the prompt never drift.
 */
export function buildClassificationPrompt(brandName: string): string {
  const sections = CATEGORIES.map((category, i) => {
    const info = CATEGORY_CATALOG[category];
    const covers = info.covers.map((line) => `   - ${line}`).join("\n");
    return `${i + 1}. **${category}** - ${category === "unhandled" ? "Queries that are" : "Questions about"}:\n${covers}`;
  });

  return `You are a customer support query classifier for ${brandName}.

Your ONLY job is to categorize customer queries into one of these categories:

${sections.join("\n\n")}

Provide a confidence score (0.0 to 1.0) and a one-sentence reasoning for your classification.

IMPORTANT:
- You are ONLY classifying. Do NOT answer the question.
- Use exactly one of: ${CATEGORIES.join(", ")}.`;
}

export function buildClassificationMessage(query: string): string {
  return `Classify this customer query: ${query}`;
}

/** JSON shape shown to the model alongside the classification schema */
export const CLASSIFICATION_OUTPUT_DESCRIPTION = `{
  "category": "products" | "returns" | "general" | "unhandled",
  "confidence": <number between 0.0 and 1.0>,
  "reasoning": "<one sentence>"
}`;

// ============================================
// Answering prompts
// ============================================

type CategoryPromptParts = {
  contextLabel: string;
  task: string;
  closing: string;
};

const ANSWER_PROMPT_PARTS: Record<AnswerableCategory, CategoryPromptParts> = {
  products: {
    contextLabel: "Product Information",
    task: "Use the following product information to answer the customer's question about our products.",
    closing: "Provide a clear, accurate response. If the information isn't in the context, say so politely.",
  },
  returns: {
    contextLabel: "Information",
    task: "Use the following information to answer the customer's question about returns, refunds, or exchanges.",
    closing: "Provide a clear, professional response about our return policies.",
  },
  general: {
    contextLabel: "Information",
    task: "Use the following information to answer the customer's general question.",
    closing: "Provide a helpful, professional response. Include contact information if relevant.",
  },
};

/**
 * Join passages into the context block, preserving order.
 */
export function buildContextBlock(passages: readonly string[]): string {
  if (passages.length === 0) {
    return NO_CONTEXT_MARKER;
  }
  return passages.join(PASSAGE_SEPARATOR);
}

/**
 * Category-specific answering prompt with the retrieved context embedded.
 */
export function buildAnswerPrompt(
  brandName: string,
  category: AnswerableCategory,
  query: string,
  passages: readonly string[]
): CompletionPrompt {
  const parts = ANSWER_PROMPT_PARTS[category];

  const system = `You are a helpful customer support assistant for ${brandName}.
${parts.task}

${parts.contextLabel}:
${buildContextBlock(passages)}

${parts.closing}
If the context is ${NO_CONTEXT_MARKER}, tell the customer you could not find information about this and do not invent details.`;

  return { system, user: query };
}
