// ============================================
// Escalation: human handoff or a request for details
// Pure: no external calls, cannot fail
// ============================================

import { DEFAULT_CONFIDENCE_THRESHOLD, type Category } from "../router/types.js";

export type EscalationReason = "unhandled_category" | "low_confidence" | "responder_failure" | "internal_error";

export type SupportContact = {
  email: string;
  hours: string;
  responseTime: string;
};

export const DEFAULT_SUPPORT_CONTACT: SupportContact = {
  email: "support@techgear.com",
  hours: "Mon-Sat, 9AM-6PM IST",
  responseTime: "24 hours",
};

/** Kinds of issue the human team takes over */
export const HUMAN_TEAM_SCOPE = [
  "Complex technical issues",
  "Account-specific inquiries",
  "Special requests and customizations",
  "Detailed product consultations",
] as const;

/** Questions asked back when a query is too vague to route */
export const CLARIFICATION_PROMPTS = [
  "What product or service you're asking about?",
  "What specific information do you need?",
  "Is this related to a purchase, return, or general inquiry?",
] as const;

/** Below this confidence a low-confidence escalation asks for details instead of handing off */
export const CLARIFICATION_CONFIDENCE = 0.5;

export const DEFAULT_BRAND_NAME = "TechGear Electronics";

export type EscalationTemplate = "handoff" | "clarification";

export type EscalationInput = {
  query: string;
  category: Category;
  confidence: number;
  reason?: EscalationReason;
  reasoning?: string;
  /** Routing threshold used to derive `reason` when it is omitted */
  threshold?: number;
  brandName?: string;
};

/**
 * Handoff record for a ticketing system.
 * Returned with the run, never stored by the core.
 */
export type EscalationRecord = {
  reason: EscalationReason;
  template: EscalationTemplate;
  query: string;
  category: Category;
  confidence: number;
  reasoning: string;
  status: "escalated";
  timestamp: string;
  contact: SupportContact;
};

export type EscalationOutcome = {
  response: string;
  record: EscalationRecord;
};

const REASON_LINES: Record<EscalationReason, string> = {
  unhandled_category: "This query requires human assistance",
  low_confidence: "The query needs clarification",
  responder_failure: "This request needs specialized support",
  internal_error: "This request needs specialized support",
};

export function describeEscalationReason(reason: EscalationReason): string {
  return REASON_LINES[reason];
}

/**
 * Reason for a handoff when the caller did not name one.
 */
export function deriveEscalationReason(
  category: Category,
  confidence: number,
  threshold: number = DEFAULT_CONFIDENCE_THRESHOLD
): EscalationReason {
  if (category === "unhandled") return "unhandled_category";
  if (!(confidence >= threshold)) return "low_confidence";
  return "responder_failure";
}

/**
 * Vague queries (low confidence well under the gate) get a request for details.
 * Everything else gets the human handoff.
 */
export function selectEscalationTemplate(reason: EscalationReason, confidence: number): EscalationTemplate {
  return reason === "low_confidence" && confidence < CLARIFICATION_CONFIDENCE ? "clarification" : "handoff";
}

function handoffMessage(query: string, reason: EscalationReason, contact: SupportContact): string {
  const scope = HUMAN_TEAM_SCOPE.map((item) => `• ${item}`).join("\n");

  return [
    "I apologize, but I need to connect you with a human support agent for this request.",
    "",
    `**Your Query:** "${query}"`,
    "",
    `**Reason:** ${describeEscalationReason(reason)}`,
    "",
    "Our support team is here to help you with:",
    scope,
    "",
    "**Contact Information:**",
    `📧 **Email:** ${contact.email}`,
    `⏰ **Hours:** ${contact.hours}`,
    `⏱️ **Response Time:** Within ${contact.responseTime}`,
    "",
    "A support agent will review your request and respond as soon as possible.",
    "",
    "Thank you for your patience!",
  ].join("\n");
}

function clarificationMessage(query: string, brandName: string, contact: SupportContact): string {
  const prompts = CLARIFICATION_PROMPTS.map((item) => `• ${item}`).join("\n");

  return [
    `Thank you for contacting ${brandName}!`,
    "",
    "I'd be happy to help, but I need a bit more information to provide you with the best answer.",
    "",
    `**Your Query:** "${query}"`,
    "",
    "Could you please provide more details about:",
    prompts,
    "",
    "Alternatively, you can:",
    `📧 **Email us:** ${contact.email} with detailed information`,
    `⏰ **Available:** ${contact.hours}`,
    "",
    "Thank you for your understanding!",
  ].join("\n");
}

/**
 * Build the escalation message for a query.
 */
export function escalate(
  input: EscalationInput,
  contact: SupportContact = DEFAULT_SUPPORT_CONTACT,
  now: () => Date = () => new Date()
): EscalationOutcome {
  const reason = input.reason ?? deriveEscalationReason(input.category, input.confidence, input.threshold);
  const template = selectEscalationTemplate(reason, input.confidence);

  const response =
    template === "clarification"
      ? clarificationMessage(input.query, input.brandName ?? DEFAULT_BRAND_NAME, contact)
      : handoffMessage(input.query, reason, contact);

  return {
    response,
    record: {
      reason,
      template,
      query: input.query,
      category: input.category,
      confidence: input.confidence,
      reasoning: input.reasoning ?? "",
      status: "escalated",
      timestamp: now().toISOString(),
      contact: { ...contact },
    },
  };
}
