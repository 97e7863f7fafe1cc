// ============================================
// Escalation Tests: handoff message and record
// ============================================

import { describe, it, expect } from "vitest";
import {
  deriveEscalationReason,
  escalate,
  DEFAULT_SUPPORT_CONTACT,
  HUMAN_TEAM_SCOPE,
} from "../src/escalation/escalate.js";
import { FIXED_NOW, fixedClock } from "./helpers/fakes.js";

describe("deriveEscalationReason", () => {
  it("prefers unhandled over low confidence", () => {
    expect(deriveEscalationReason("unhandled", 0.1)).toBe("unhandled_category");
  });

  it("flags low confidence below the default threshold", () => {
    expect(deriveEscalationReason("products", 0.69)).toBe("low_confidence");
    expect(deriveEscalationReason("products", 0.8, 0.9)).toBe("low_confidence");
    expect(deriveEscalationReason("products", 0.5, 0.4)).toBe("responder_failure");
  });
});

describe("escalate", () => {
  it("builds the full handoff message", () => {
    const { response } = escalate(
      { query: "I want to cancel my order", category: "unhandled", confidence: 0.85 },
      DEFAULT_SUPPORT_CONTACT,
      fixedClock
    );

    expect(response).toBe(
      [
        "I apologize, but I need to connect you with a human support agent for this request.",
        "",
        '**Your Query:** "I want to cancel my order"',
        "",
        "**Reason:** This query requires human assistance",
        "",
        "Our support team is here to help you with:",
        "• Complex technical issues",
        "• Account-specific inquiries",
        "• Special requests and customizations",
        "• Detailed product consultations",
        "",
        "**Contact Information:**",
        "📧 **Email:** support@techgear.com",
        "⏰ **Hours:** Mon-Sat, 9AM-6PM IST",
        "⏱️ **Response Time:** Within 24 hours",
        "",
        "A support agent will review your request and respond as soon as possible.",
        "",
        "Thank you for your patience!",
      ].join("\n")
    );
  });

  it("uses the clarification line for low confidence above the clarification floor", () => {
    const { response, record } = escalate({ query: "hmm", category: "general", confidence: 0.6 });

    expect(record.reason).toBe("low_confidence");
    expect(record.template).toBe("handoff");
    expect(response).toContain("**Reason:** The query needs clarification");
  });

  it("asks for details when confidence is below the clarification floor", () => {
    const { response, record } = escalate(
      { query: "The thing is broken", category: "general", confidence: 0.45 },
      DEFAULT_SUPPORT_CONTACT,
      fixedClock
    );

    expect(record.reason).toBe("low_confidence");
    expect(record.template).toBe("clarification");
    expect(record.status).toBe("escalated");
    expect(response).toBe(
      [
        "Thank you for contacting TechGear Electronics!",
        "",
        "I'd be happy to help, but I need a bit more information to provide you with the best answer.",
        "",
        '**Your Query:** "The thing is broken"',
        "",
        "Could you please provide more details about:",
        "• What product or service you're asking about?",
        "• What specific information do you need?",
        "• Is this related to a purchase, return, or general inquiry?",
        "",
        "Alternatively, you can:",
        "📧 **Email us:** support@techgear.com with detailed information",
        "⏰ **Available:** Mon-Sat, 9AM-6PM IST",
        "",
        "Thank you for your understanding!",
      ].join("\n")
    );
  });

  it("names the configured brand in the clarification", () => {
    const { response } = escalate({ query: "q", category: "products", confidence: 0.2, brandName: "Test Shop" });

    expect(response.split("\n")[0]).toBe("Thank you for contacting Test Shop!");
  });

  it("hands off unhandled queries even at low confidence", () => {
    const { record } = escalate({ query: "q", category: "unhandled", confidence: 0.1 });

    expect(record.template).toBe("handoff");
  });

  it("hands off failures even when confidence is below the floor", () => {
    const { record } = escalate({ query: "q", category: "products", confidence: 0.3, reason: "internal_error" });

    expect(record.template).toBe("handoff");
  });

  it("derives the reason from the given threshold", () => {
    const { record } = escalate({ query: "q", category: "returns", confidence: 0.8, threshold: 0.9 });

    expect(record.reason).toBe("low_confidence");
    expect(record.template).toBe("handoff");
  });

  it("uses the specialized-support line for responder and internal failures", () => {
    for (const reason of ["responder_failure", "internal_error"] as const) {
      const { response } = escalate({ query: "q", category: "products", confidence: 0.9, reason });
      expect(response).toContain("**Reason:** This request needs specialized support");
    }
  });

  it("lists every scope item once", () => {
    const { response } = escalate({ query: "q", category: "unhandled", confidence: 0 });

    for (const item of HUMAN_TEAM_SCOPE) {
      expect(response.split(`• ${item}`)).toHaveLength(2);
    }
  });

  it("uses the configured contact details", () => {
    const contact = { email: "help@example.com", hours: "24/7", responseTime: "2 hours" };

    const { response, record } = escalate({ query: "q", category: "unhandled", confidence: 0 }, contact);

    expect(response).toContain("📧 **Email:** help@example.com");
    expect(response).toContain("⏰ **Hours:** 24/7");
    expect(response).toContain("⏱️ **Response Time:** Within 2 hours");
    expect(record.contact).toEqual(contact);
    expect(record.contact).not.toBe(contact);
  });

  it("returns a handoff record", () => {
    const { record } = escalate(
      {
        query: "Can I speak to a manager?",
        category: "unhandled",
        confidence: 0.9,
        reasoning: "Requests a human",
      },
      DEFAULT_SUPPORT_CONTACT,
      fixedClock
    );

    expect(record).toEqual({
      reason: "unhandled_category",
      template: "handoff",
      query: "Can I speak to a manager?",
      category: "unhandled",
      confidence: 0.9,
      reasoning: "Requests a human",
      status: "escalated",
      timestamp: FIXED_NOW.toISOString(),
      contact: DEFAULT_SUPPORT_CONTACT,
    });
  });

  it("is deterministic for the same input", () => {
    const input = { query: "same", category: "general" as const, confidence: 0.3 };

    expect(escalate(input, DEFAULT_SUPPORT_CONTACT, fixedClock)).toEqual(
      escalate(input, DEFAULT_SUPPORT_CONTACT, fixedClock)
    );
  });
});
