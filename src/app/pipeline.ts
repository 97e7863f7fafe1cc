// ============================================
// Pipeline: classify, route, answer or escalate
// ============================================

import crypto from "crypto";
import { createRequestLogger, type RequestLogger } from "../lib/logger.js";
import { cancelledError, describeCause, isSupportBotError } from "../lib/errors.js";
import type { Classifier } from "../router/classifier.js";
import { classificationFailure } from "../router/classifier.js";
import { decideRoute } from "../router/routingPolicy.js";
import { DEFAULT_CONFIDENCE_THRESHOLD, type ClassificationResult } from "../router/types.js";
import type { Responder, ResponderOutcome } from "../answer/responder.js";
import {
  DEFAULT_BRAND_NAME,
  DEFAULT_SUPPORT_CONTACT,
  escalate,
  type EscalationReason,
  type SupportContact,
} from "../escalation/escalate.js";
import type { Phase, RunOptions, WorkflowState } from "./types.js";

export const PIPELINE_VERSION = "pipeline.v1.0";

export type PipelineDeps = {
  classifier: Pick<Classifier, "classify">;
  responder: Pick<Responder, "respond">;
  confidenceThreshold?: number;
  contact?: SupportContact;
  brandName?: string;
  now?: () => Date;
};

type Classified = {
  classification: ClassificationResult;
  /** Classifier threw instead of absorbing its own failure */
  faulted: boolean;
};

/**
 * Routes one query at a time through the workflow.
 *
 * Flow:
 * 1. Classify (never fails; faults become "unhandled")
 * 2. Route (single threshold gate)
 * 3. Answer from the knowledge base, or escalate
 * 4. A failed answer falls through to escalation; nothing is retried
 *
 * Holds only read-only configuration, so one instance serves concurrent runs.
 */
export class SupportPipeline {
  private readonly classifier: Pick<Classifier, "classify">;
  private readonly responder: Pick<Responder, "respond">;
  private readonly now: () => Date;
  readonly confidenceThreshold: number;
  readonly contact: SupportContact;
  readonly brandName: string;

  constructor(deps: PipelineDeps) {
    this.classifier = deps.classifier;
    this.responder = deps.responder;
    this.confidenceThreshold = deps.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
    this.contact = deps.contact ?? DEFAULT_SUPPORT_CONTACT;
    this.brandName = deps.brandName ?? DEFAULT_BRAND_NAME;
    this.now = deps.now ?? (() => new Date());
  }

  async run(query: string, options: RunOptions = {}): Promise<WorkflowState> {
    const requestId = options.requestId ?? crypto.randomUUID().slice(0, 8);
    const { signal } = options;
    const log = createRequestLogger(requestId, "pipeline");
    const startTime = Date.now();
    const transitions: Phase[] = ["INIT"];

    log.info("Pipeline started", {
      sessionId: options.sessionId,
      queryPreview: query.slice(0, 80),
    });

    throwIfCancelled(signal, requestId);

    // INIT -> CLASSIFIED
    const { classification, faulted } = await this.classify(query, signal, requestId, log);
    throwIfCancelled(signal, requestId);
    transitions.push("CLASSIFIED");

    const base = {
      requestId,
      query,
      category: classification.category,
      confidence: classification.confidence,
      reasoning: classification.reasoning,
    };

    const finishEscalated = (reason: EscalationReason, retrievedPassages: readonly string[]): WorkflowState => {
      const { response, record } = escalate(
        { ...base, reason, threshold: this.confidenceThreshold, brandName: this.brandName },
        this.contact,
        this.now
      );
      transitions.push("ESCALATED", "DONE");

      log.info("Pipeline complete", {
        nodeExecuted: "escalation",
        reason,
        template: record.template,
        latencyMs: Date.now() - startTime,
      });

      return {
        ...base,
        retrievedPassages,
        response,
        nodeExecuted: "escalation",
        requiresEscalation: true,
        escalation: record,
        transitions,
      };
    };

    if (faulted) {
      return finishEscalated("internal_error", []);
    }

    // CLASSIFIED -> routing decision
    const decision = decideRoute(classification, this.confidenceThreshold);

    log.withStage("router").info("Routing decision", {
      route: decision.route,
      category: classification.category,
      confidence: classification.confidence.toFixed(2),
      threshold: this.confidenceThreshold,
    });

    if (decision.route === "escalation") {
      return finishEscalated(decision.reason, []);
    }

    // rag -> RESPONDED, or ESCALATED when the responder cannot answer
    let outcome: ResponderOutcome;
    try {
      outcome = await this.responder.respond(query, decision.category, { signal, requestId });
    } catch (err) {
      if (isSupportBotError(err, "RUN_CANCELLED")) throw err;
      throwIfCancelled(signal, requestId);
      log.error("Responder raised unexpectedly, escalating", { error: err });
      return finishEscalated("internal_error", []);
    }

    throwIfCancelled(signal, requestId);

    if (!outcome.ok) {
      if (outcome.error.code === "RUN_CANCELLED") throw outcome.error;
      log.warn("Responder failed, escalating", {
        errorCode: outcome.error.code,
        errorMessage: outcome.error.message,
      });
      return finishEscalated("responder_failure", outcome.retrievedPassages);
    }

    if (!outcome.response.trim()) {
      log.warn("Responder returned a blank answer, escalating");
      return finishEscalated("responder_failure", outcome.retrievedPassages);
    }

    transitions.push("RESPONDED", "DONE");

    log.info("Pipeline complete", {
      nodeExecuted: "rag_responder",
      passageCount: outcome.retrievedPassages.length,
      latencyMs: Date.now() - startTime,
    });

    return {
      ...base,
      retrievedPassages: outcome.retrievedPassages,
      response: outcome.response,
      nodeExecuted: "rag_responder",
      requiresEscalation: false,
      transitions,
    };
  }

  private async classify(
    query: string,
    signal: AbortSignal | undefined,
    requestId: string,
    log: RequestLogger
  ): Promise<Classified> {
    try {
      const classification = await this.classifier.classify(query, { signal, requestId });
      return { classification, faulted: false };
    } catch (err) {
      throwIfCancelled(signal, requestId);
      log.error("Classifier raised unexpectedly, escalating", { error: err });
      return { classification: classificationFailure(describeCause(err)), faulted: true };
    }
  }
}

function throwIfCancelled(signal: AbortSignal | undefined, requestId: string): void {
  if (signal?.aborted) {
    throw cancelledError(requestId, signal.reason);
  }
}
