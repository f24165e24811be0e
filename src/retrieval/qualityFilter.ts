// ============================================
// Quality Filter — drop low-signal messages
// Preserves retrieval order; stops at the limit.
// ============================================

import { logger } from "../lib/logger.js";
import type { Candidate, FilteredSet } from "../evidence/types.js";

/** Messages shorter than this (after trimming) carry no content. */
export const MIN_MESSAGE_LENGTH = 10;

/** Reject when mentions make up more than this share of the words. */
export const MAX_MENTION_RATIO = 0.5;

/**
 * Slack system notifications. Matched as case-insensitive substrings.
 */
export const SYSTEM_NOTIFICATION_PHRASES: readonly string[] = [
  "has joined the channel",
  "has left the channel",
  "set the channel topic",
  "set the channel description",
  "uploaded a file",
  "renamed the channel",
  "archived the channel",
  "pinned a message",
];

export type RejectReason = "too_short" | "system_notification" | "mention_heavy";

/**
 * Why a message would be rejected, or null when it passes.
 */
export function rejectReason(text: string): RejectReason | null {
  const lower = text.toLowerCase();

  if (lower.trim().length < MIN_MESSAGE_LENGTH) {
    return "too_short";
  }

  if (SYSTEM_NOTIFICATION_PHRASES.some((phrase) => lower.includes(phrase))) {
    return "system_notification";
  }

  const mentionCount = lower.split("<@").length - 1;
  const wordCount = lower.split(/\s+/).filter(Boolean).length;
  if (wordCount > 0 && mentionCount / wordCount > MAX_MENTION_RATIO) {
    return "mention_heavy";
  }

  return null;
}

/**
 * Keep the first `limit` candidates that pass the quality checks.
 * An empty result is valid: it means nothing substantive was found.
 */
export function filterQualityMessages(candidates: readonly Candidate[], limit: number): FilteredSet {
  const accepted: Candidate[] = [];
  const rejected: Record<RejectReason, number> = {
    too_short: 0,
    system_notification: 0,
    mention_heavy: 0,
  };

  for (const candidate of candidates) {
    if (accepted.length >= limit) break;

    const reason = rejectReason(candidate.text);
    if (reason) {
      rejected[reason]++;
      continue;
    }

    accepted.push(candidate);
  }

  logger.info("Filtered retrieved messages", {
    stage: "filter",
    retrieved: candidates.length,
    accepted: accepted.length,
    rejected,
  });

  return accepted;
}
