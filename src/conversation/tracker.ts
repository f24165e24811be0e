// ============================================
// Conversation Tracker — multi-turn context per thread
// empty → has-history on first append; back to empty on clear
// ============================================

import { logger } from "../lib/logger.js";
import { configError } from "../lib/errors.js";
import {
  CONVERSATION_ROLES,
  type ConversationRole,
  type ConversationStore,
  type ConversationSummary,
  type ConversationTurn,
} from "./types.js";

/** Turns kept per conversation when building context. */
export const MAX_HISTORY_TURNS = 10;

/** A turn is a user message plus the assistant reply. */
export const DEFAULT_HISTORY_LIMIT = MAX_HISTORY_TURNS * 2;

export function isConversationRole(role: string): role is ConversationRole {
  return CONVERSATION_ROLES.some((r) => r === role);
}

/**
 * Render history ahead of a new question. No history ⇒ question unchanged.
 */
export function formatContextPrompt(history: readonly ConversationTurn[], newQuestion: string): string {
  if (history.length === 0) return newQuestion;

  const lines = ["Previous conversation:"];
  for (const turn of history) {
    lines.push(`${turn.role === "user" ? "User" : "Assistant"}: ${turn.content}`);
  }
  lines.push(`\nNew question: ${newQuestion}`);

  return lines.join("\n");
}

export interface ConversationTracker {
  append(conversationId: string, channelId: string, role: string, content: string): Promise<boolean>;
  history(conversationId: string, limit?: number): Promise<ConversationTurn[]>;
  buildPrompt(conversationId: string, newQuestion: string): Promise<string>;
  clear(conversationId: string): Promise<boolean>;
  recentConversations(channelId?: string | null, limit?: number): Promise<ConversationSummary[]>;
}

/**
 * Tracker bound to one workspace.
 * Store failures are logged and reported as false / empty, never thrown.
 */
export function createConversationTracker(store: ConversationStore, workspaceId: string): ConversationTracker {
  if (!workspaceId) {
    throw configError("workspaceId is required for conversation tracking");
  }

  async function history(conversationId: string, limit: number = DEFAULT_HISTORY_LIMIT): Promise<ConversationTurn[]> {
    try {
      const turns = await store.listTurns(workspaceId, conversationId, limit);

      logger.debug("Loaded conversation history", {
        stage: "conversation",
        conversationId,
        turns: turns.length,
      });

      return turns;
    } catch (err) {
      logger.error("Failed to load conversation history", {
        stage: "conversation",
        conversationId,
        error: err,
      });
      return [];
    }
  }

  return {
    async append(conversationId, channelId, role, content) {
      if (!isConversationRole(role)) {
        logger.error("Invalid conversation role", {
          stage: "conversation",
          conversationId,
          role,
        });
        return false;
      }

      try {
        await store.insertTurn(workspaceId, { conversationId, channelId, role, content });
        logger.debug("Stored conversation turn", { stage: "conversation", conversationId, role });
        return true;
      } catch (err) {
        logger.error("Failed to store conversation turn", {
          stage: "conversation",
          conversationId,
          role,
          error: err,
        });
        return false;
      }
    },

    history,

    async buildPrompt(conversationId, newQuestion) {
      return formatContextPrompt(await history(conversationId), newQuestion);
    },

    async clear(conversationId) {
      try {
        const deleted = await store.deleteTurns(workspaceId, conversationId);
        logger.info("Cleared conversation", { stage: "conversation", conversationId, deleted });
        return true;
      } catch (err) {
        logger.error("Failed to clear conversation", {
          stage: "conversation",
          conversationId,
          error: err,
        });
        return false;
      }
    },

    async recentConversations(channelId = null, limit = 10) {
      try {
        return await store.listRecent(workspaceId, channelId, limit);
      } catch (err) {
        logger.error("Failed to list recent conversations", {
          stage: "conversation",
          channelId: channelId ?? undefined,
          error: err,
        });
        return [];
      }
    },
  };
}
