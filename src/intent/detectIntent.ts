// ============================================
// Intent Detection — time window and channel filters
// Pure string matching, except one channel-name lookup
// for bare channel mentions.
// ============================================

import { logger } from "../lib/logger.js";
import {
  TIME_PHRASES,
  CHANNEL_KEYWORDS,
  CHANNEL_SURFACE_FORMS,
  CHANNEL_MENTION_PATTERN,
} from "./tables.js";
import type { ChannelDirectory, IntentFilters } from "../app/types.js";

export type ChannelMention = {
  channelId: string;
  /** Inline label from the mention, null when absent or empty */
  channelName: string | null;
};

/**
 * Lookback window implied by the question, or null to search all history.
 */
export function detectTimeFilter(question: string): number | null {
  const lower = question.toLowerCase();

  for (const [phrase, days] of TIME_PHRASES) {
    if (lower.includes(phrase)) {
      logger.debug("Detected time filter", { stage: "intent", phrase, days });
      return days;
    }
  }

  return null;
}

/**
 * First Slack channel mention in the text, if any.
 */
export function parseChannelMention(question: string): ChannelMention | null {
  const match = CHANNEL_MENTION_PATTERN.exec(question);
  if (!match || !match[1]) return null;

  return {
    channelId: match[1],
    channelName: match[2] ? match[2] : null,
  };
}

/**
 * Channel keyword mentioned in plain text ("#standup", "in design").
 */
export function detectChannelKeyword(question: string): string | null {
  const lower = question.toLowerCase();

  for (const channel of CHANNEL_KEYWORDS) {
    if (CHANNEL_SURFACE_FORMS.some((form) => lower.includes(form(channel)))) {
      return channel;
    }
  }

  return null;
}

/**
 * Channel the question is scoped to.
 *
 * A channel mention wins over keywords. A mention without a label is resolved
 * through the channel directory; a miss or a failed lookup yields the raw id.
 */
export async function detectChannelFilter(
  question: string,
  workspaceId: string,
  channels: ChannelDirectory
): Promise<string | null> {
  const mention = parseChannelMention(question);

  if (mention) {
    if (mention.channelName) {
      return mention.channelName;
    }

    try {
      const name = await channels.findChannelName(workspaceId, mention.channelId);
      if (name) return name;

      logger.info("Channel not found, filtering by id", {
        stage: "intent",
        channelId: mention.channelId,
      });
    } catch (err) {
      logger.warn("Channel lookup failed, filtering by id", {
        stage: "intent",
        channelId: mention.channelId,
        error: err,
      });
    }

    return mention.channelId;
  }

  return detectChannelKeyword(question);
}

/**
 * Classify a question into optional time and channel constraints.
 * Filters the caller already set are kept and not detected.
 * Never throws.
 */
export async function detectIntent(
  question: string,
  workspaceId: string,
  channels: ChannelDirectory,
  explicit: Partial<IntentFilters> = {}
): Promise<IntentFilters> {
  const daysBack = explicit.daysBack ?? detectTimeFilter(question);
  const channelFilter = explicit.channelFilter ?? (await detectChannelFilter(question, workspaceId, channels));

  logger.info("Intent detected", {
    stage: "intent",
    daysBack,
    channelFilter,
  });

  return { daysBack, channelFilter };
}
