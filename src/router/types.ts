// ============================================
// Router Types: Classification and routing contracts
// ============================================

/**
 * Query categories.
 * The first three are answered from the knowledge base; "unhandled" always escalates.
 */
export const CATEGORIES = ["products", "returns", "general", "unhandled"] as const;

export type Category = (typeof CATEGORIES)[number];

export type AnswerableCategory = Exclude<Category, "unhandled">;

export function isCategory(value: string): value is Category {
  return CATEGORIES.some((category) => category === value);
}

/**
 * Classifier output.
 * Confidence is always within [0, 1]; category is always one of CATEGORIES.
 */
export type ClassificationResult = {
  category: Category;
  confidence: number;
  reasoning: string;
};

/** Default minimum confidence for the answering branch (inclusive) */
export const DEFAULT_CONFIDENCE_THRESHOLD = 0.7;

/** Default number of passages retrieved per query */
export const DEFAULT_TOP_K = 4;

/** Reasoning recorded when the classifier output fails validation */
export const VALIDATION_FAILED_REASONING = "classification failed validation";

// ============================================
// Category catalog
// ============================================

export type CategoryInfo = {
  name: Category;
  description: string;
  covers: string[];
  examples: string[];
  action: "answer_from_knowledge_base" | "escalate_to_human";
};

/**
 * What each category covers.
 * Feeds both the classification prompt and the public category listing.
 */
export const CATEGORY_CATALOG: Record<Category, CategoryInfo> = {
  products: {
    name: "products",
    description: "Questions about product specifications, prices, features, and availability",
    covers: [
      "Product specifications, features, prices",
      "Product comparisons",
      "Product availability",
      "What products are offered",
    ],
    examples: [
      "What is the price of the SmartWatch Pro X?",
      "Tell me about your gaming laptops",
      "What features do the wireless earbuds have?",
    ],
    action: "answer_from_knowledge_base",
  },
  returns: {
    name: "returns",
    description: "Questions about return policy, refunds, and exchanges",
    covers: ["Return policy", "Refund process", "Exchange procedures", "How to return items"],
    examples: ["What is your return policy?", "How do I return a product?", "Can I get a refund?"],
    action: "answer_from_knowledge_base",
  },
  general: {
    name: "general",
    description: "General inquiries about warranty, support, shipping, and company info",
    covers: [
      "Warranty information",
      "Customer support contact",
      "Shipping information",
      "Store hours and locations",
      "General company information",
    ],
    examples: [
      "What are your customer support hours?",
      "How long is the warranty on earbuds?",
      "How can I contact support?",
    ],
    action: "answer_from_knowledge_base",
  },
  unhandled: {
    name: "unhandled",
    description: "Queries that are inappropriate, unclear, or outside the store's scope",
    covers: [
      "Inappropriate or offensive requests",
      "Topics unrelated to the store",
      "Queries too vague or unclear to act on",
      "Requests for illegal activities",
      "Personal complaints or rants",
    ],
    examples: [
      "Can you help me hack something?",
      "The weather is nice today",
    ],
    action: "escalate_to_human",
  },
};
