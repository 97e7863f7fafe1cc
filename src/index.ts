// ============================================
// Public surface
// ============================================

export { createSupportBot, createSupportBotFromEnv, createProductionPorts, type SupportBotPorts } from "./bot.js";
export { SupportPipeline, PIPELINE_VERSION, type PipelineDeps } from "./app/pipeline.js";
export type { WorkflowState, NodeExecuted, Phase, RunOptions } from "./app/types.js";

export { Classifier, validateClassification, CLASSIFICATION_SCHEMA } from "./router/classifier.js";
export { decideRoute, type RouteDecision } from "./router/routingPolicy.js";
export {
  CATEGORIES,
  CATEGORY_CATALOG,
  DEFAULT_CONFIDENCE_THRESHOLD,
  DEFAULT_TOP_K,
  type Category,
  type AnswerableCategory,
  type ClassificationResult,
} from "./router/types.js";

export { Responder, type ResponderOutcome } from "./answer/responder.js";
export {
  escalate,
  CLARIFICATION_CONFIDENCE,
  DEFAULT_SUPPORT_CONTACT,
  type EscalationReason,
  type EscalationRecord,
  type EscalationTemplate,
  type SupportContact,
} from "./escalation/escalate.js";

export type { TextCompletionPort, CompletionPrompt, CompletionSchema } from "./llm/completion.js";
export type { PassageRetriever } from "./retrieval/retriever.js";

export * from "./api/index.js";
export { loadConfig, parseEnv, type AppConfig, type Env } from "./config/env.js";
export { SupportBotError, getUserMessage, type ErrorCode } from "./lib/errors.js";
