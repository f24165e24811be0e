// ============================================
// Evidence Section — "What I found:" excerpts appended to answers
// ============================================

import { codePointLength, sliceCodePoints } from "../lib/text.js";
import type { FilteredSet } from "../evidence/types.js";

export const EVIDENCE_MAX_SOURCES = 3;
export const EVIDENCE_QUOTE_LENGTH = 150;

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

/** Slack message ts: epoch seconds with optional microseconds. */
const SLACK_TS = /^\d{10}(?:\.\d+)?$/;

/** ISO date-time without an offset; read as UTC rather than host time. */
const ZONELESS_ISO = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?$/;

export function parseMessageTimestamp(timestamp: string): Date | null {
  const trimmed = timestamp.trim();
  if (!trimmed) return null;

  if (SLACK_TS.test(trimmed)) {
    return new Date(Number(trimmed) * 1000);
  }

  const iso = ZONELESS_ISO.test(trimmed) ? `${trimmed.replace(" ", "T")}Z` : trimmed;
  const parsed = Date.parse(iso);
  return Number.isNaN(parsed) ? null : new Date(parsed);
}

/**
 * "Dec 15, 2pm" in UTC, or "recently" when the timestamp can't be read.
 */
export function formatFriendlyTimestamp(timestamp: string): string {
  const date = parseMessageTimestamp(timestamp);
  if (!date) return "recently";

  const hour = date.getUTCHours();
  const time = hour === 0 ? "12am" : hour < 12 ? `${hour}am` : hour === 12 ? "12pm" : `${hour - 12}pm`;

  return `${MONTHS[date.getUTCMonth()]} ${date.getUTCDate()}, ${time}`;
}

export function truncateQuote(text: string, maxLength: number = EVIDENCE_QUOTE_LENGTH): string {
  const quote = text.trim();
  return codePointLength(quote) > maxLength ? `${sliceCodePoints(quote, maxLength - 3)}...` : quote;
}

/**
 * Append the top messages as quoted excerpts. Same input, same bytes.
 */
export function formatEvidenceSection(
  answerText: string,
  filtered: FilteredSet,
  maxSources: number = EVIDENCE_MAX_SOURCES
): string {
  if (filtered.length === 0) return answerText;

  const lines = ["\n\nWhat I found:"];

  for (const candidate of filtered.slice(0, maxSources)) {
    const { userName, channelName, timestamp } = candidate.metadata;
    lines.push(
      `• ${userName || "unknown"}'s update in #${channelName || "unknown"} (${formatFriendlyTimestamp(
        timestamp
      )}): "${truncateQuote(candidate.text)}"`
    );
  }

  if (filtered.length > maxSources) {
    lines.push(`\n...and ${filtered.length - maxSources} more`);
  }

  return answerText + lines.join("\n");
}
