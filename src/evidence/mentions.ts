// ============================================
// Mention Resolution — <@U123> → @name
// ============================================

import { logger } from "../lib/logger.js";
import type { UserDirectory, UserNames } from "../app/types.js";

/**
 * Slack user mention: <@U0123ABC> or <@U0123ABC|alice>.
 */
export const USER_MENTION_PATTERN = /<@([A-Z0-9]+)(?:\|([^>]+))?>/g;

/**
 * Ids mentioned without an inline name, deduplicated, in order of appearance.
 */
export function collectMentionIds(texts: readonly string[]): string[] {
  const ids = new Set<string>();

  for (const text of texts) {
    for (const match of text.matchAll(USER_MENTION_PATTERN)) {
      const [, userId, inlineName] = match;
      if (userId && !inlineName) ids.add(userId);
    }
  }

  return [...ids];
}

/**
 * Display name, then real name. Null when the directory has neither.
 */
export function preferredName(names: UserNames | undefined): string | null {
  if (!names) return null;
  return names.displayName || names.realName || null;
}

/**
 * One batched directory lookup for the given ids.
 * Never throws: a failed lookup returns an empty map and ids stay raw.
 */
export async function lookupNames(
  workspaceId: string,
  userIds: readonly string[],
  users: UserDirectory
): Promise<Map<string, string>> {
  const resolved = new Map<string, string>();
  if (userIds.length === 0) return resolved;

  try {
    const directory = await users.lookupUsers(workspaceId, userIds);
    for (const userId of userIds) {
      const name = preferredName(directory.get(userId));
      if (name) resolved.set(userId, name);
    }
  } catch (err) {
    logger.warn("User lookup failed, showing raw ids", {
      stage: "context",
      userCount: userIds.length,
      error: err,
    });
  }

  return resolved;
}

/**
 * Replace every mention with "@name".
 * An inline name wins over the lookup; unknown ids render as "@U123".
 */
export function replaceMentions(text: string, names: ReadonlyMap<string, string>): string {
  return text.replace(USER_MENTION_PATTERN, (_mention, userId: string, inlineName?: string) => {
    if (inlineName) return `@${inlineName}`;
    return `@${names.get(userId) ?? userId}`;
  });
}
