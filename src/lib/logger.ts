// ============================================
// Structured JSON logging
// One JSON object per line: timestamp, level, message, stage, requestId
// ============================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Stage =
  | "startup"
  | "config"
  | "classifier"
  | "router"
  | "responder"
  | "retrieval"
  | "escalation"
  | "llm"
  | "pipeline"
  | "api"
  | "db";

export interface LogContext {
  requestId?: string;
  stage?: Stage;
  sessionId?: string;
  [key: string]: unknown;
}

interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  message: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Minimum level written. LOG_LEVEL wins; otherwise debug is dropped in production.
 */
function minimumLevel(): LogLevel {
  const configured = process.env["LOG_LEVEL"];
  if (configured === "debug" || configured === "info" || configured === "warn" || configured === "error") {
    return configured;
  }
  return process.env["NODE_ENV"] === "production" ? "info" : "debug";
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel()];
}

function formatLog(level: LogLevel, message: string, context: LogContext = {}): string {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...context,
  };
  return JSON.stringify(entry);
}

function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { errorName: error.name, errorMessage: error.message, errorStack: error.stack };
  }
  if (error === undefined || error === null) {
    return {};
  }
  return { errorMessage: String(error) };
}

/** Process-wide logger */
export const logger = {
  debug(message: string, context?: LogContext): void {
    if (shouldLog("debug")) {
      console.log(formatLog("debug", message, context));
    }
  },

  info(message: string, context?: LogContext): void {
    if (shouldLog("info")) {
      console.log(formatLog("info", message, context));
    }
  },

  warn(message: string, context?: LogContext & { error?: unknown }): void {
    if (shouldLog("warn")) {
      const { error, ...rest } = context ?? {};
      console.warn(formatLog("warn", message, { ...rest, ...describeError(error) }));
    }
  },

  error(message: string, context?: LogContext & { error?: unknown }): void {
    const { error, ...rest } = context ?? {};
    console.error(formatLog("error", message, { ...rest, ...describeError(error) }));
  },
};

type StageContext = Omit<LogContext, "requestId" | "stage">;

/** Logger bound to one run of the pipeline */
export function createRequestLogger(requestId: string, stage?: Stage) {
  return {
    requestId,

    debug(message: string, context?: StageContext): void {
      logger.debug(message, { ...context, requestId, stage });
    },

    info(message: string, context?: StageContext): void {
      logger.info(message, { ...context, requestId, stage });
    },

    warn(message: string, context?: StageContext & { error?: unknown }): void {
      logger.warn(message, { ...context, requestId, stage });
    },

    error(message: string, context?: StageContext & { error?: unknown }): void {
      logger.error(message, { ...context, requestId, stage });
    },

    withStage(newStage: Stage) {
      return createRequestLogger(requestId, newStage);
    },
  };
}

export type RequestLogger = ReturnType<typeof createRequestLogger>;
