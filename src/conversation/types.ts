// ============================================
// Conversation Types — thread-scoped Q&A history
// ============================================

export type ConversationRole = "user" | "assistant";

export const CONVERSATION_ROLES: readonly ConversationRole[] = ["user", "assistant"];

/**
 * One stored message of a conversation. Never updated after insertion.
 */
export type ConversationTurn = {
  /** Thread identity (Slack thread ts, or an API-supplied id) */
  conversationId: string;
  channelId: string;
  role: ConversationRole;
  content: string;
  /** ISO-8601 */
  createdAt: string;
};

export type NewConversationTurn = Omit<ConversationTurn, "createdAt">;

export type ConversationSummary = {
  conversationId: string;
  channelId: string;
  /** ISO-8601 time of the newest turn */
  lastUpdated: string;
};

/**
 * Append-only store keyed by (workspace, conversation id).
 * Implementations throw on failure; the tracker decides what to surface.
 */
export interface ConversationStore {
  insertTurn(workspaceId: string, turn: NewConversationTurn): Promise<void>;

  /** Oldest first, at most `limit` turns */
  listTurns(workspaceId: string, conversationId: string, limit: number): Promise<ConversationTurn[]>;

  /** Returns the number of turns removed */
  deleteTurns(workspaceId: string, conversationId: string): Promise<number>;

  /** Newest conversation first */
  listRecent(workspaceId: string, channelId: string | null, limit: number): Promise<ConversationSummary[]>;
}
