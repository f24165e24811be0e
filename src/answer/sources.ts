// ============================================
// Source List — numbered citations returned with every answer
// ============================================

import { logger } from "../lib/logger.js";
import { codePointLength, sliceCodePoints } from "../lib/text.js";
import type { FilteredSet, SourceCitation } from "../evidence/types.js";
import type { UserDirectory, UserNames } from "../app/types.js";

export const MAX_SOURCES = 10;
export const SOURCE_TEXT_LENGTH = 200;

function sourceName(names: UserNames | undefined): string | null {
  if (!names) return null;
  return names.displayName || names.realName || names.userName || null;
}

/**
 * Up to 10 sources with 1-based reference numbers.
 * Authors missing from the archive metadata are looked up in one batch;
 * a failed lookup leaves them as "unknown".
 */
export async function formatSources(
  filtered: FilteredSet,
  workspaceId: string,
  users: UserDirectory
): Promise<SourceCitation[]> {
  const top = filtered.slice(0, MAX_SOURCES);

  const missing = [
    ...new Set(top.filter((c) => !c.metadata.userName && c.metadata.userId).map((c) => c.metadata.userId)),
  ];

  let directory = new Map<string, UserNames>();
  if (missing.length > 0) {
    try {
      directory = await users.lookupUsers(workspaceId, missing);
    } catch (err) {
      logger.warn("Source author lookup failed", {
        stage: "answer",
        userCount: missing.length,
        error: err,
      });
    }
  }

  return top.map((candidate, i) => {
    const { text, distance, metadata } = candidate;

    return {
      referenceNumber: i + 1,
      text:
        codePointLength(text) > SOURCE_TEXT_LENGTH ? `${sliceCodePoints(text, SOURCE_TEXT_LENGTH)}...` : text,
      channel: metadata.channelName || "unknown",
      user: metadata.userName || sourceName(directory.get(metadata.userId)) || "unknown",
      timestamp: metadata.timestamp,
      distance,
    };
  });
}
