// ============================================
// API Module: inbound/outbound contracts for any transport
// ============================================

export {
  chatRequestSchema,
  parseChatRequest,
  MAX_QUERY_LENGTH,
  type ChatRequest,
  type FieldIssue,
} from "./request.js";

export {
  handleChatRequest,
  handleSimpleChatRequest,
  toChatResponse,
  listCategories,
  healthCheck,
  type ChatResponse,
  type SimpleChatResponse,
  type HealthResponse,
  type HandlerOptions,
} from "./handler.js";
