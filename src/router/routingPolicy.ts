// ============================================
// Routing Policy: the single gate between answering and escalation
// ============================================

import type { AnswerableCategory, ClassificationResult } from "./types.js";

export type RouteDecision =
  | { route: "rag"; category: AnswerableCategory }
  | { route: "escalation"; reason: "unhandled_category" | "low_confidence" };

/**
 * Decide the branch for a classified query.
 *
 * rag iff the category is answerable AND confidence >= threshold.
 * The bound is inclusive. A NaN confidence fails the comparison and escalates.
 * "unhandled" is checked first so it reports its own reason even at low confidence.
 */
export function decideRoute(classification: ClassificationResult, threshold: number): RouteDecision {
  const { category, confidence } = classification;

  if (category === "unhandled") {
    return { route: "escalation", reason: "unhandled_category" };
  }

  if (!(confidence >= threshold)) {
    return { route: "escalation", reason: "low_confidence" };
  }

  return { route: "rag", category };
}
