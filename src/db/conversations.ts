// ============================================
// Conversation History — Supabase persistence
// ============================================

import type { SupabaseClient } from "@supabase/supabase-js";
import { conversationStoreError } from "../lib/errors.js";
import type {
  ConversationRole,
  ConversationStore,
  ConversationSummary,
  ConversationTurn,
} from "../conversation/types.js";

interface ConversationRow {
  thread_ts: string;
  channel_id: string;
  role: ConversationRole;
  content: string;
  created_at: string;
}

interface RecentConversationRow {
  thread_ts: string;
  channel_id: string;
  last_updated: string;
}

/**
 * Conversation store on the conversation_history table.
 * Ordering ties on created_at are broken by the serial id.
 */
export function createSupabaseConversationStore(client: SupabaseClient): ConversationStore {
  return {
    async insertTurn(workspaceId, turn) {
      const { error } = await client.from("conversation_history").insert({
        workspace_id: workspaceId,
        thread_ts: turn.conversationId,
        channel_id: turn.channelId,
        role: turn.role,
        content: turn.content,
      });

      if (error) {
        throw conversationStoreError(`insert failed: ${error.message}`, error);
      }
    },

    async listTurns(workspaceId, conversationId, limit) {
      const { data, error } = await client
        .from("conversation_history")
        .select("thread_ts, channel_id, role, content, created_at")
        .eq("workspace_id", workspaceId)
        .eq("thread_ts", conversationId)
        .order("created_at", { ascending: true })
        .order("id", { ascending: true })
        .limit(limit);

      if (error) {
        throw conversationStoreError(`read failed: ${error.message}`, error);
      }

      const rows: ConversationRow[] = data ?? [];
      return rows.map(
        (row): ConversationTurn => ({
          conversationId: row.thread_ts,
          channelId: row.channel_id,
          role: row.role,
          content: row.content,
          createdAt: row.created_at,
        })
      );
    },

    async deleteTurns(workspaceId, conversationId) {
      const { error, count } = await client
        .from("conversation_history")
        .delete({ count: "exact" })
        .eq("workspace_id", workspaceId)
        .eq("thread_ts", conversationId);

      if (error) {
        throw conversationStoreError(`delete failed: ${error.message}`, error);
      }

      return count ?? 0;
    },

    async listRecent(workspaceId, channelId, limit) {
      const { data, error } = await client.rpc("recent_conversations", {
        p_workspace_id: workspaceId,
        p_channel_id: channelId,
        p_limit: limit,
      });

      if (error) {
        throw conversationStoreError(`recent conversations failed: ${error.message}`, error);
      }

      const rows: RecentConversationRow[] = Array.isArray(data) ? data : [];
      return rows.map(
        (row): ConversationSummary => ({
          conversationId: row.thread_ts,
          channelId: row.channel_id,
          lastUpdated: row.last_updated,
        })
      );
    },
  };
}
