// ============================================
// Channel Directory — channel id → name
// ============================================

import type { SupabaseClient } from "@supabase/supabase-js";
import { logger } from "../lib/logger.js";
import { lookupError } from "../lib/errors.js";
import type { ChannelDirectory } from "../app/types.js";

interface ChannelRow {
  channel_name: string | null;
}

export function createSupabaseChannelDirectory(client: SupabaseClient): ChannelDirectory {
  return {
    async findChannelName(workspaceId, channelId) {
      const { data, error } = await client
        .from("channels")
        .select("channel_name")
        .eq("workspace_id", workspaceId)
        .eq("channel_id", channelId)
        .maybeSingle();

      if (error) {
        logger.error("Error finding channel", {
          stage: "db",
          channelId,
          error: error.message,
        });
        throw lookupError(`channel lookup failed: ${error.message}`, error);
      }

      const row: ChannelRow | null = data;
      return row?.channel_name ?? null;
    },
  };
}
