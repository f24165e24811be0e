// ============================================
// API Handlers — /api/v1 endpoints
// ============================================

import crypto from "crypto";
import { answerFollowUp, answerQuestion, PIPELINE_VERSION, suggestRelatedQuestions } from "../app/pipeline.js";
import { createConversationTracker } from "../conversation/tracker.js";
import { logger } from "../lib/logger.js";
import { getUserMessage, wrapError } from "../lib/errors.js";
import { askRequestSchema, validationErrorBody, type ApiRequest, type ApiResponse } from "./middleware.js";
import type { AnswerResponse, PipelineDeps } from "../app/types.js";
import type { ConversationSummary, ConversationTurn } from "../conversation/types.js";

// ============================================
// Types
// ============================================

export interface AskResponse extends AnswerResponse {
  requestId: string;
  conversationId: string | null;
  suggestions: string[];
  metadata: {
    latencyMs: number;
    pipelineVersion: string;
  };
}

export interface ApiErrorResponse {
  error: string;
  message: string;
  requestId?: string;
  details?: unknown;
}

export interface ConversationResponse {
  conversationId: string;
  turns: Array<Pick<ConversationTurn, "role" | "content" | "createdAt">>;
}

export interface RecentConversationsResponse {
  conversations: ConversationSummary[];
}

export interface HealthResponse {
  status: "ok";
  version: string;
  llm: "available" | "unavailable";
  timestamp: string;
}

export type ApiHandler = (req: ApiRequest, res: ApiResponse) => Promise<void>;

export interface ApiHandlers {
  ask: ApiHandler;
  getConversation: ApiHandler;
  deleteConversation: ApiHandler;
  listConversations: ApiHandler;
  health: (req: ApiRequest, res: ApiResponse) => void;
}

/** Channel id stored with turns that arrive through the API without one. */
export const API_CHANNEL_ID = "api";

const DEFAULT_RECENT_LIMIT = 10;
const MAX_RECENT_LIMIT = 100;

function parseLimit(value: unknown): number {
  const parsed = typeof value === "string" ? Number.parseInt(value, 10) : NaN;
  if (!Number.isFinite(parsed) || parsed < 1) return DEFAULT_RECENT_LIMIT;
  return Math.min(parsed, MAX_RECENT_LIMIT);
}

// ============================================
// Handlers
// ============================================

/**
 * Bind the API handlers to the pipeline collaborators and workspace.
 */
export function createApiHandlers(deps: PipelineDeps, workspaceId: string): ApiHandlers {
  const tracker = createConversationTracker(deps.conversations, workspaceId);

  async function suggestionsFor(question: string, requestId: string): Promise<string[]> {
    try {
      return await suggestRelatedQuestions(deps.search, workspaceId, question);
    } catch (err) {
      logger.warn("Related questions unavailable", { stage: "api", requestId, error: err });
      return [];
    }
  }

  return {
    async ask(req, res) {
      const requestId = req.requestId ?? crypto.randomUUID().slice(0, 8);
      const startTime = Date.now();

      const parsed = askRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json(validationErrorBody(parsed.error, requestId));
        return;
      }

      const { question, channel, daysBack, maxSources, conversationId, channelId } = parsed.data;

      logger.info("API request received", {
        stage: "api",
        requestId,
        apiKeyId: req.apiKeyId,
        questionLength: question.length,
        conversationId,
      });

      try {
        const answer = conversationId
          ? await answerFollowUp(deps, {
              workspaceId,
              conversationId,
              channelId: channelId ?? API_CHANNEL_ID,
              question,
              contextSize: maxSources,
              channelFilter: channel,
              daysBack,
            })
          : await answerQuestion(
              deps,
              { text: question, workspaceId, contextSize: maxSources, channelFilter: channel, daysBack },
              { requestId }
            );

        const suggestions = await suggestionsFor(question, requestId);

        const response: AskResponse = {
          ...answer,
          requestId,
          conversationId: conversationId ?? null,
          suggestions,
          metadata: {
            latencyMs: Date.now() - startTime,
            pipelineVersion: PIPELINE_VERSION,
          },
        };

        logger.info("API request completed", {
          stage: "api",
          requestId,
          model: answer.model,
          confidence: answer.confidence,
          latencyMs: response.metadata.latencyMs,
        });

        res.status(200).json(response);
      } catch (err) {
        const appError = wrapError(err, requestId);

        logger.error("API request failed", {
          stage: "api",
          requestId,
          apiKeyId: req.apiKeyId,
          errorCode: appError.code,
          error: err,
        });

        const errorResponse: ApiErrorResponse =
          appError.code === "RETRIEVAL_FAILED"
            ? { error: "RETRIEVAL_FAILED", message: getUserMessage(appError), requestId }
            : {
                error: "INTERNAL_ERROR",
                message: "An error occurred processing your request. Please try again.",
                requestId,
              };

        res.status(appError.code === "RETRIEVAL_FAILED" ? 502 : 500).json(errorResponse);
      }
    },

    async getConversation(req, res) {
      const conversationId = req.params["id"] ?? "";
      const turns = await tracker.history(conversationId);

      const response: ConversationResponse = {
        conversationId,
        turns: turns.map(({ role, content, createdAt }) => ({ role, content, createdAt })),
      };

      res.status(200).json(response);
    },

    async deleteConversation(req, res) {
      const conversationId = req.params["id"] ?? "";
      const cleared = await tracker.clear(conversationId);

      if (!cleared) {
        const errorResponse: ApiErrorResponse = {
          error: "CONVERSATION_STORE_FAILED",
          message: "Could not clear the conversation. Please try again.",
          requestId: req.requestId,
        };
        res.status(500).json(errorResponse);
        return;
      }

      res.status(200).json({ conversationId, cleared: true });
    },

    async listConversations(req, res) {
      const channelId = req.query["channelId"];
      const conversations = await tracker.recentConversations(
        typeof channelId === "string" && channelId ? channelId : null,
        parseLimit(req.query["limit"])
      );

      const response: RecentConversationsResponse = { conversations };
      res.status(200).json(response);
    },

    health(_req, res) {
      const response: HealthResponse = {
        status: "ok",
        version: PIPELINE_VERSION,
        llm: deps.completion.kind,
        timestamp: new Date().toISOString(),
      };

      res.status(200).json(response);
    },
  };
}
