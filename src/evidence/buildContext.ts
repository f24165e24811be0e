// ============================================
// Context Assembly — filtered messages → LLM context block
// ============================================

import { logger } from "../lib/logger.js";
import { collectMentionIds, lookupNames, replaceMentions } from "./mentions.js";
import type { FilteredSet } from "./types.js";
import type { UserDirectory } from "../app/types.js";

/**
 * Format one context block. Index is 1-based and matches the source list.
 */
export function formatContextBlock(index: number, channel: string, author: string, text: string): string {
  return `[${index}] [#${channel}] (from ${author}):\n${text}`;
}

/**
 * Build the context string the model answers from.
 *
 * Mentions across all messages, plus authors the archive has no name for,
 * are resolved with a single directory lookup. No lookup happens when every
 * mention carries its own name and every author is named.
 */
export async function buildContext(
  filtered: FilteredSet,
  workspaceId: string,
  users: UserDirectory
): Promise<string> {
  const mentionIds = collectMentionIds(filtered.map((c) => c.text));
  const unnamedAuthors = filtered
    .filter((c) => !c.metadata.userName && c.metadata.userId)
    .map((c) => c.metadata.userId);

  const lookupIds = [...new Set([...mentionIds, ...unnamedAuthors])];
  const names = await lookupNames(workspaceId, lookupIds, users);

  const blocks = filtered.map((candidate, i) => {
    const { channelName, userName, userId } = candidate.metadata;
    const author = userName || names.get(userId) || userId || "unknown";
    return formatContextBlock(i + 1, channelName || "unknown", author, replaceMentions(candidate.text, names));
  });

  logger.debug("Context assembled", {
    stage: "context",
    blocks: blocks.length,
    lookedUp: lookupIds.length,
    resolved: names.size,
  });

  return blocks.join("\n\n");
}
