// ============================================
// Error types shared by the pipeline and its outer surfaces
// ============================================

export type ErrorCode =
  | "CONFIG_ERROR"
  | "RETRIEVAL_FAILED"
  | "GENERATION_FAILED"
  | "LOOKUP_FAILED"
  | "CONVERSATION_STORE_FAILED"
  | "UNKNOWN_ERROR";

export interface AppError {
  code: ErrorCode;
  message: string;
  requestId?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class RecallError extends Error implements AppError {
  code: ErrorCode;
  requestId?: string;
  override cause?: unknown;
  context?: Record<string, unknown>;

  constructor(options: AppError) {
    super(options.message);
    this.name = "RecallError";
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

export function isRecallError(err: unknown, code?: ErrorCode): err is RecallError {
  return err instanceof RecallError && (code === undefined || err.code === code);
}

/** Missing or invalid setup. Always fatal, never defaulted. */
export function configError(message: string, context?: Record<string, unknown>): RecallError {
  return new RecallError({ code: "CONFIG_ERROR", message, context });
}

export function retrievalError(message: string, requestId?: string, cause?: unknown): RecallError {
  return new RecallError({ code: "RETRIEVAL_FAILED", message, requestId, cause });
}

export function generationError(message: string, requestId?: string, cause?: unknown): RecallError {
  return new RecallError({ code: "GENERATION_FAILED", message, requestId, cause });
}

export function lookupError(message: string, cause?: unknown): RecallError {
  return new RecallError({ code: "LOOKUP_FAILED", message, cause });
}

export function conversationStoreError(message: string, cause?: unknown): RecallError {
  return new RecallError({ code: "CONVERSATION_STORE_FAILED", message, cause });
}

export function wrapError(err: unknown, requestId?: string): RecallError {
  if (err instanceof RecallError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  return new RecallError({
    code: "UNKNOWN_ERROR",
    message,
    requestId,
    cause: err,
  });
}

/** Text shown to people in Slack or API clients. */
export function getUserMessage(error: AppError): string {
  switch (error.code) {
    case "CONFIG_ERROR":
      return "I'm not set up for this workspace yet. Ask an admin to check my configuration.";
    case "RETRIEVAL_FAILED":
      return "I couldn't search the message history. Please try again.";
    case "GENERATION_FAILED":
      return "I found some messages but couldn't generate an answer. Please try again.";
    default:
      return "Something went wrong. Please try again.";
  }
}
