// ============================================
// Classifier: query → (category, confidence, reasoning)
// Never throws: failures become "unhandled" with zero confidence
// ============================================

import { z } from "zod";
import { createRequestLogger } from "../lib/logger.js";
import { describeCause } from "../lib/errors.js";
import type { CompletionSchema, TextCompletionPort } from "../llm/completion.js";
import {
  buildClassificationMessage,
  buildClassificationPrompt,
  CLASSIFICATION_OUTPUT_DESCRIPTION,
} from "../llm/prompts.js";
import { isCategory, VALIDATION_FAILED_REASONING, type ClassificationResult } from "./types.js";

/**
 * Shape decoded from the completion.
 * Only the shape is enforced here; label and range checks belong to validateClassification.
 */
export const rawClassificationSchema = z.object({
  category: z.string(),
  confidence: z.number(),
  reasoning: z.string(),
});

export type RawClassification = z.infer<typeof rawClassificationSchema>;

export const CLASSIFICATION_SCHEMA: CompletionSchema<RawClassification> = {
  name: "QueryClassification",
  description: CLASSIFICATION_OUTPUT_DESCRIPTION,
  schema: rawClassificationSchema,
};

export type ClassifyOptions = {
  signal?: AbortSignal;
  requestId?: string;
};

export type ClassifierDeps = {
  completion: TextCompletionPort;
  brandName: string;
};

/**
 * Fallback result for any classification failure.
 */
export function classificationFailure(cause: string): ClassificationResult {
  return {
    category: "unhandled",
    confidence: 0,
    reasoning: `classification error: ${cause}`,
  };
}

/**
 * Check a decoded classification against the category labels and the [0, 1] range.
 * Anything outside is forced to unhandled / 0.0 rather than passed downstream.
 */
export function validateClassification(raw: RawClassification): ClassificationResult {
  const { category, confidence, reasoning } = raw;

  if (!isCategory(category) || !isValidConfidence(confidence)) {
    return {
      category: "unhandled",
      confidence: 0,
      reasoning: VALIDATION_FAILED_REASONING,
    };
  }

  return { category, confidence, reasoning };
}

function isValidConfidence(confidence: number): boolean {
  return Number.isFinite(confidence) && confidence >= 0 && confidence <= 1;
}

export class Classifier {
  private readonly completion: TextCompletionPort;
  private readonly systemPrompt: string;

  constructor(deps: ClassifierDeps) {
    this.completion = deps.completion;
    this.systemPrompt = buildClassificationPrompt(deps.brandName);
  }

  async classify(query: string, options: ClassifyOptions = {}): Promise<ClassificationResult> {
    const log = createRequestLogger(options.requestId ?? "-", "classifier");
    const trimmed = query.trim();

    if (!trimmed) {
      log.warn("Empty query, skipping classification");
      return classificationFailure("query is empty");
    }

    let raw: RawClassification;
    try {
      raw = await this.completion.completeStructured(
        { system: this.systemPrompt, user: buildClassificationMessage(trimmed) },
        CLASSIFICATION_SCHEMA,
        { signal: options.signal, requestId: options.requestId }
      );
    } catch (err) {
      log.warn("Classification call failed, treating as unhandled", { error: err });
      return classificationFailure(describeCause(err));
    }

    const result = validateClassification(raw);

    if (!isCategory(raw.category) || !isValidConfidence(raw.confidence)) {
      log.warn("Classification failed validation", {
        rawCategory: raw.category,
        rawConfidence: raw.confidence,
      });
    } else {
      log.info("Query classified", {
        category: result.category,
        confidence: result.confidence.toFixed(2),
      });
    }

    return result;
  }
}
