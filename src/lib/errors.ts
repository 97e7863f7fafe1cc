// ============================================
// Standard error types for consistent handling
// ============================================

export type ErrorCode =
  | "MALFORMED_OUTPUT"
  | "RETRIEVAL_FAILED"
  | "GENERATION_FAILED"
  | "EMPTY_RESPONSE"
  | "TIMEOUT"
  | "RUN_CANCELLED"
  | "CONFIG_ERROR"
  | "CORE_UNAVAILABLE"
  | "VALIDATION_ERROR"
  | "UNKNOWN_ERROR";

export interface AppError {
  code: ErrorCode;
  message: string;
  requestId?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class SupportBotError extends Error implements AppError {
  code: ErrorCode;
  requestId?: string;
  override cause?: unknown;
  context?: Record<string, unknown>;

  constructor(options: AppError) {
    super(options.message);
    this.name = "SupportBotError";
    this.code = options.code;
    this.requestId = options.requestId;
    this.cause = options.cause;
    this.context = options.context;
  }

  toJSON(): AppError {
    return {
      code: this.code,
      message: this.message,
      requestId: this.requestId,
      context: this.context,
    };
  }
}

export function isSupportBotError(err: unknown, code?: ErrorCode): err is SupportBotError {
  return err instanceof SupportBotError && (code === undefined || err.code === code);
}

/** Completion output could not be decoded into the requested schema */
export function malformedOutputError(message: string, cause?: unknown, context?: Record<string, unknown>): SupportBotError {
  return new SupportBotError({ code: "MALFORMED_OUTPUT", message, cause, context });
}

export function retrievalError(message: string, requestId?: string, cause?: unknown): SupportBotError {
  return new SupportBotError({ code: "RETRIEVAL_FAILED", message, requestId, cause });
}

export function generationError(message: string, requestId?: string, cause?: unknown): SupportBotError {
  return new SupportBotError({ code: "GENERATION_FAILED", message, requestId, cause });
}

export function emptyResponseError(requestId?: string): SupportBotError {
  return new SupportBotError({
    code: "EMPTY_RESPONSE",
    message: "Generation returned an empty response",
    requestId,
  });
}

export function timeoutError(operation: string, timeoutMs: number): SupportBotError {
  return new SupportBotError({
    code: "TIMEOUT",
    message: `${operation} timed out after ${timeoutMs}ms`,
    context: { operation, timeoutMs },
  });
}

export function cancelledError(requestId?: string, cause?: unknown): SupportBotError {
  return new SupportBotError({
    code: "RUN_CANCELLED",
    message: "Run was cancelled by the caller",
    requestId,
    cause,
  });
}

export function configError(message: string, context?: Record<string, unknown>): SupportBotError {
  return new SupportBotError({ code: "CONFIG_ERROR", message, context });
}

export function coreUnavailableError(message: string, cause?: unknown): SupportBotError {
  return new SupportBotError({ code: "CORE_UNAVAILABLE", message, cause });
}

export function validationError(message: string, context?: Record<string, unknown>): SupportBotError {
  return new SupportBotError({ code: "VALIDATION_ERROR", message, context });
}

/** Wrap unknown errors */
export function wrapError(err: unknown, requestId?: string): SupportBotError {
  if (err instanceof SupportBotError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  return new SupportBotError({
    code: "UNKNOWN_ERROR",
    message,
    requestId,
    cause: err,
  });
}

/** Short cause text for reasoning strings and log lines */
export function describeCause(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name;
  }
  return String(err);
}

/** Customer-safe messages */
export function getUserMessage(error: AppError): string {
  switch (error.code) {
    case "VALIDATION_ERROR":
      return "Your request could not be read. Please send a non-empty question.";
    case "RUN_CANCELLED":
      return "The request was cancelled before it finished.";
    case "CONFIG_ERROR":
    case "CORE_UNAVAILABLE":
      return "The support assistant is temporarily unavailable. Please try again later.";
    default:
      return "Something went wrong. Please try again.";
  }
}
