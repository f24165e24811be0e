// ============================================
// User Directory — Slack users synced into the users table
// ============================================

import type { SupabaseClient } from "@supabase/supabase-js";
import { logger } from "../lib/logger.js";
import { lookupError } from "../lib/errors.js";
import type { UserDirectory, UserNames } from "../app/types.js";

interface UserRow {
  user_id: string;
  user_name: string | null;
  real_name: string | null;
  display_name: string | null;
}

export function createSupabaseUserDirectory(client: SupabaseClient): UserDirectory {
  return {
    async lookupUsers(workspaceId, userIds) {
      const names = new Map<string, UserNames>();
      if (userIds.length === 0) return names;

      const { data, error } = await client
        .from("users")
        .select("user_id, user_name, real_name, display_name")
        .eq("workspace_id", workspaceId)
        .in("user_id", [...userIds]);

      if (error) {
        logger.error("Error looking up users", {
          stage: "db",
          workspaceId,
          error: error.message,
        });
        throw lookupError(`user lookup failed: ${error.message}`, error);
      }

      const rows: UserRow[] = data ?? [];
      for (const row of rows) {
        names.set(row.user_id, {
          displayName: row.display_name,
          realName: row.real_name,
          userName: row.user_name,
        });
      }

      return names;
    },
  };
}
