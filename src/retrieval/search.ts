// ============================================
// Message Search — semantic search over the archive
// The index lives behind the match_messages RPC.
// ============================================

import type { SupabaseClient } from "@supabase/supabase-js";
import { logger } from "../lib/logger.js";
import { retrievalError } from "../lib/errors.js";
import type { Candidate } from "../evidence/types.js";
import type { MessageSearch, SearchRequest } from "../app/types.js";

/**
 * How many more candidates to fetch than the pipeline keeps.
 * The quality filter is lossy; retrieval always over-fetches by this factor.
 */
export const RETRIEVAL_OVERFETCH_FACTOR = 3;

/** Row shape returned by match_messages. */
interface MatchMessagesRow {
  message_text: string | null;
  distance: number | null;
  channel_id: string | null;
  channel_name: string | null;
  user_id: string | null;
  user_name: string | null;
  slack_ts: string | null;
}

function toCandidate(row: MatchMessagesRow): Candidate {
  return {
    text: row.message_text ?? "",
    distance: row.distance ?? 0,
    metadata: {
      channelId: row.channel_id ?? "",
      channelName: row.channel_name ?? "",
      userId: row.user_id ?? "",
      userName: row.user_name ?? "",
      timestamp: row.slack_ts ?? "",
    },
  };
}

/**
 * Earliest timestamp included by a lookback window, as ISO-8601.
 */
export function sinceForDaysBack(daysBack: number | null, now: Date = new Date()): string | null {
  if (daysBack === null) return null;
  return new Date(now.getTime() - daysBack * 24 * 60 * 60 * 1000).toISOString();
}

/**
 * Sort by ascending distance without reordering ties.
 */
export function sortByDistance(candidates: Candidate[]): Candidate[] {
  return candidates
    .map((candidate, index) => ({ candidate, index }))
    .sort((a, b) => a.candidate.distance - b.candidate.distance || a.index - b.index)
    .map(({ candidate }) => candidate);
}

/**
 * Message search backed by the Supabase match_messages function.
 * Errors are thrown as RETRIEVAL_FAILED, never reported as "no results".
 */
export function createSupabaseMessageSearch(client: SupabaseClient): MessageSearch {
  return {
    async search(request: SearchRequest): Promise<Candidate[]> {
      const startTime = Date.now();

      const { data, error } = await client.rpc("match_messages", {
        p_workspace_id: request.workspaceId,
        p_query: request.query,
        p_match_count: request.limit,
        p_channel_name: request.channelFilter,
        p_since: sinceForDaysBack(request.daysBack),
      });

      if (error) {
        logger.error("Message search failed", {
          stage: "retrieval",
          workspaceId: request.workspaceId,
          error: error.message,
        });
        throw retrievalError(`retrieval failed: ${error.message}`, undefined, error);
      }

      const rows: MatchMessagesRow[] = Array.isArray(data) ? data : [];
      const candidates = sortByDistance(rows.map(toCandidate));

      logger.info("Message search complete", {
        stage: "retrieval",
        requested: request.limit,
        returned: candidates.length,
        channelFilter: request.channelFilter,
        daysBack: request.daysBack,
        latencyMs: Date.now() - startTime,
      });

      return candidates;
    },
  };
}
