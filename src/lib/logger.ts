// ============================================
// Structured JSON logging
// One line per entry: timestamp, level, message, stage, requestId
// ============================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Stage =
  | "startup"
  | "slack"
  | "intent"
  | "retrieval"
  | "filter"
  | "context"
  | "llm"
  | "answer"
  | "conversation"
  | "pipeline"
  | "api"
  | "db";

interface LogContext {
  requestId?: string;
  stage?: Stage;
  workspaceId?: string;
  conversationId?: string;
  channelId?: string;
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  stage?: Stage;
  requestId?: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Minimum level, read from LOG_LEVEL on every call so tests and scripts
 * can change it without reloading the module. Production defaults to info.
 */
function minimumLevel(): LogLevel {
  const raw = process.env["LOG_LEVEL"];
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") {
    return raw;
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
    return { errorMessage: error.message, errorStack: error.stack };
  }
  return error === undefined ? {} : { errorMessage: String(error) };
}

export const logger = {
  debug(message: string, context?: LogContext): void {
    if (shouldLog("debug")) console.log(formatLog("debug", message, context));
  },

  info(message: string, context?: LogContext): void {
    if (shouldLog("info")) console.log(formatLog("info", message, context));
  },

  warn(message: string, context?: LogContext & { error?: unknown }): void {
    if (!shouldLog("warn")) return;
    const { error, ...rest } = context ?? {};
    console.warn(formatLog("warn", message, { ...rest, ...describeError(error) }));
  },

  error(message: string, context?: LogContext & { error?: unknown }): void {
    const { error, ...rest } = context ?? {};
    console.error(formatLog("error", message, { ...rest, ...describeError(error) }));
  },
};

/** Create a logger bound to a specific request */
export function createRequestLogger(requestId: string, stage?: Stage) {
  return {
    debug(message: string, context?: Omit<LogContext, "requestId">): void {
      logger.debug(message, { ...context, requestId, stage });
    },

    info(message: string, context?: Omit<LogContext, "requestId">): void {
      logger.info(message, { ...context, requestId, stage });
    },

    warn(message: string, context?: Omit<LogContext, "requestId"> & { error?: unknown }): void {
      logger.warn(message, { ...context, requestId, stage });
    },

    error(message: string, context?: Omit<LogContext, "requestId"> & { error?: unknown }): void {
      logger.error(message, { ...context, requestId, stage });
    },
  };
}
