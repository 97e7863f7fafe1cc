// ============================================
// Request handler: transport-agnostic chat entry point
// ============================================

import crypto from "crypto";
import { logger } from "../lib/logger.js";
import { wrapError } from "../lib/errors.js";
import { PIPELINE_VERSION, type SupportPipeline } from "../app/pipeline.js";
import type { NodeExecuted, WorkflowState } from "../app/types.js";
import { CATEGORIES, CATEGORY_CATALOG, type Category, type CategoryInfo } from "../router/types.js";
import { parseChatRequest, type ChatRequest } from "./request.js";

// ============================================
// Types
// ============================================

export interface ChatResponse {
  response: string;
  category: Category;
  confidence: number;
  reasoning: string;
  node_executed: NodeExecuted;
  requires_escalation: boolean;
  retrieved_passages: string[];
  timestamp: string;
  session_id: string | null;
}

export interface SimpleChatResponse {
  response: string;
}

export interface HealthResponse {
  status: "ok";
  version: string;
  timestamp: string;
}

export type HandlerOptions = {
  signal?: AbortSignal;
  requestId?: string;
  now?: () => Date;
};

// ============================================
// Serialization
// ============================================

/**
 * Outbound record for a completed run.
 */
export function toChatResponse(
  state: WorkflowState,
  sessionId: string | undefined,
  now: () => Date = () => new Date()
): ChatResponse {
  return {
    response: state.response,
    category: state.category,
    confidence: state.confidence,
    reasoning: state.reasoning,
    node_executed: state.nodeExecuted,
    requires_escalation: state.requiresEscalation,
    retrieved_passages: [...state.retrievedPassages],
    timestamp: now().toISOString(),
    session_id: sessionId ?? null,
  };
}

// ============================================
// Handlers
// ============================================

/**
 * Validate a chat body, run it, and serialize the result.
 *
 * Rejects with VALIDATION_ERROR for a bad body and RUN_CANCELLED when aborted.
 * Every business-logic failure already resolved to an escalation inside the pipeline.
 */
export async function handleChatRequest(
  pipeline: Pick<SupportPipeline, "run">,
  body: unknown,
  options: HandlerOptions = {}
): Promise<ChatResponse> {
  const requestId = options.requestId ?? crypto.randomUUID().slice(0, 8);
  const startTime = Date.now();

  let request: ChatRequest;
  try {
    request = parseChatRequest(body);
  } catch (err) {
    logger.warn("Chat request rejected", { stage: "api", requestId, error: err });
    throw wrapError(err, requestId);
  }

  const state = await pipeline.run(request.query, {
    requestId,
    signal: options.signal,
    sessionId: request.session_id,
  });

  logger.info("Chat request completed", {
    stage: "api",
    requestId,
    sessionId: request.session_id,
    nodeExecuted: state.nodeExecuted,
    latencyMs: Date.now() - startTime,
  });

  return toChatResponse(state, request.session_id, options.now);
}

/**
 * Same run, response text only.
 */
export async function handleSimpleChatRequest(
  pipeline: Pick<SupportPipeline, "run">,
  body: unknown,
  options: HandlerOptions = {}
): Promise<SimpleChatResponse> {
  const { response } = await handleChatRequest(pipeline, body, options);
  return { response };
}

/** Categories the bot recognizes and what happens to each */
export function listCategories(): CategoryInfo[] {
  return CATEGORIES.map((category) => CATEGORY_CATALOG[category]);
}

export function healthCheck(now: () => Date = () => new Date()): HealthResponse {
  return {
    status: "ok",
    version: PIPELINE_VERSION,
    timestamp: now().toISOString(),
  };
}
