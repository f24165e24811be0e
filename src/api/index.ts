// ============================================
// API Module — REST surface over the answering pipeline
// ============================================

export {
  authenticateApiKey,
  findApiKey,
  rateLimit,
  askRequestSchema,
  validationErrorBody,
  addRequestId,
  corsMiddleware,
  type ApiRequest,
  type ApiResponse,
  type AskRequest,
} from "./middleware.js";

export {
  createApiHandlers,
  API_CHANNEL_ID,
  type ApiHandlers,
  type AskResponse,
  type ApiErrorResponse,
  type ConversationResponse,
  type HealthResponse,
} from "./handler.js";
