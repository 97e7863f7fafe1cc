// ============================================
// Classifier Tests: decoding, validation, fault absorption
// ============================================

import { describe, it, expect } from "vitest";
import { Classifier, validateClassification } from "../src/router/classifier.js";
import { VALIDATION_FAILED_REASONING } from "../src/router/types.js";
import { generationError } from "../src/lib/errors.js";
import { FakeCompletion } from "./helpers/fakes.js";

const BRAND = "Test Shop";

function classifierWith(completion: FakeCompletion): Classifier {
  return new Classifier({ completion, brandName: BRAND });
}

describe("validateClassification", () => {
  it("passes a well-formed result through unchanged", () => {
    expect(validateClassification({ category: "returns", confidence: 0.92, reasoning: "Refund window question" })).toEqual({
      category: "returns",
      confidence: 0.92,
      reasoning: "Refund window question",
    });
  });

  it("accepts both ends of the confidence range", () => {
    expect(validateClassification({ category: "general", confidence: 0, reasoning: "r" }).confidence).toBe(0);
    expect(validateClassification({ category: "general", confidence: 1, reasoning: "r" }).confidence).toBe(1);
  });

  it("forces out-of-range confidence to unhandled", () => {
    expect(validateClassification({ category: "products", confidence: 1.4, reasoning: "sure" })).toEqual({
      category: "unhandled",
      confidence: 0,
      reasoning: VALIDATION_FAILED_REASONING,
    });
    expect(validateClassification({ category: "products", confidence: -0.1, reasoning: "sure" }).category).toBe("unhandled");
  });

  it("forces an unknown label to unhandled", () => {
    expect(validateClassification({ category: "billing", confidence: 0.9, reasoning: "invoice" })).toEqual({
      category: "unhandled",
      confidence: 0,
      reasoning: "classification failed validation",
    });
  });

  it("rejects NaN confidence", () => {
    expect(validateClassification({ category: "general", confidence: Number.NaN, reasoning: "r" }).category).toBe("unhandled");
  });
});

describe("Classifier.classify", () => {
  it("returns the decoded classification", async () => {
    const completion = FakeCompletion.structured({
      category: "products",
      confidence: 0.95,
      reasoning: "Asks about a product feature",
    });

    const result = await classifierWith(completion).classify("Does the X200 support wireless charging?");

    expect(result).toEqual({
      category: "products",
      confidence: 0.95,
      reasoning: "Asks about a product feature",
    });
  });

  it("sends the trimmed query with the brand-specific system prompt", async () => {
    const completion = FakeCompletion.structured({ category: "general", confidence: 0.8, reasoning: "Hours" });

    await classifierWith(completion).classify("   What are your hours?  ", { requestId: "req-1" });

    expect(completion.calls).toHaveLength(1);
    const call = completion.calls[0];
    expect(call?.kind).toBe("structured");
    expect(call?.schemaName).toBe("QueryClassification");
    expect(call?.prompt.user).toBe("Classify this customer query: What are your hours?");
    expect(call?.prompt.system).toContain("You are a customer support query classifier for Test Shop.");
    expect(call?.options?.requestId).toBe("req-1");
  });

  it("lists every category in the system prompt", async () => {
    const completion = FakeCompletion.structured({ category: "general", confidence: 0.8, reasoning: "r" });

    await classifierWith(completion).classify("hello");

    expect(completion.calls[0]?.prompt.system).toContain("Use exactly one of: products, returns, general, unhandled.");
  });

  it("forces out-of-range confidence from the model to unhandled", async () => {
    const completion = FakeCompletion.structured({ category: "products", confidence: 1.4, reasoning: "very sure" });

    const result = await classifierWith(completion).classify("Tell me about the X200");

    expect(result).toEqual({ category: "unhandled", confidence: 0, reasoning: "classification failed validation" });
  });

  it("absorbs a port error into an unhandled result", async () => {
    const result = await classifierWith(FakeCompletion.failing(new Error("boom"))).classify("Where is my order?");

    expect(result).toEqual({ category: "unhandled", confidence: 0, reasoning: "classification error: boom" });
  });

  it("absorbs a non-Error throw", async () => {
    const result = await classifierWith(FakeCompletion.failing("socket hang up")).classify("Where is my order?");

    expect(result.reasoning).toBe("classification error: socket hang up");
  });

  it("absorbs output that does not match the schema", async () => {
    const completion = FakeCompletion.structured({ category: "products", confidence: "high" });

    const result = await classifierWith(completion).classify("Tell me about the X200");

    expect(result).toEqual({
      category: "unhandled",
      confidence: 0,
      reasoning: "classification error: Completion output does not match QueryClassification",
    });
  });

  it("absorbs a typed error from the port", async () => {
    const err = generationError("Completion request failed: rate limited");

    const result = await classifierWith(FakeCompletion.failing(err)).classify("Where is my order?");

    expect(result.reasoning).toBe("classification error: Completion request failed: rate limited");
  });

  it("does not call the model for an empty query", async () => {
    const completion = FakeCompletion.structured({ category: "general", confidence: 1, reasoning: "r" });

    const result = await classifierWith(completion).classify("   ");

    expect(result).toEqual({ category: "unhandled", confidence: 0, reasoning: "classification error: query is empty" });
    expect(completion.calls).toHaveLength(0);
  });
});
