// ============================================
// Application Types: per-query workflow state
// ============================================

import type { EscalationRecord } from "../escalation/escalate.js";
import type { Category } from "../router/types.js";

/** Branch that produced the response */
export type NodeExecuted = "rag_responder" | "escalation";

/**
 * Orchestrator phases.
 * INIT -> CLASSIFIED -> {RESPONDED | ESCALATED} -> DONE; no cycles.
 * A failed answer lands in ESCALATED instead of RESPONDED; it never rewinds.
 */
export type Phase = "INIT" | "CLASSIFIED" | "RESPONDED" | "ESCALATED" | "DONE";

/**
 * Completed record for one query.
 * Every field is written once by its owning stage.
 */
export type WorkflowState = {
  readonly requestId: string;
  readonly query: string;
  readonly category: Category;
  readonly confidence: number;
  readonly reasoning: string;
  readonly retrievedPassages: readonly string[];
  readonly response: string;
  readonly nodeExecuted: NodeExecuted;
  readonly requiresEscalation: boolean;
  readonly escalation?: EscalationRecord;
  readonly transitions: readonly Phase[];
};

export type RunOptions = {
  /** Aborts the run at the next suspension point */
  signal?: AbortSignal;
  /** Correlation id for logs; generated when absent */
  requestId?: string;
  /** Opaque; logged, never interpreted */
  sessionId?: string;
};
