// ============================================
// Intent Tables — ordered keyword lookups
// First match in table order wins.
// ============================================

/**
 * Time phrase → lookback window in days.
 *
 * "last week" and "last month" are rolling 14 and 60 day windows, not
 * calendar periods. Matched as substrings of the lower-cased question, so
 * "recent" also catches "recently".
 */
export const TIME_PHRASES: ReadonlyArray<readonly [phrase: string, days: number]> = [
  ["today", 1],
  ["yesterday", 2],
  ["this week", 7],
  ["past week", 7],
  ["last week", 14],
  ["this month", 30],
  ["past month", 30],
  ["last month", 60],
  ["recent", 7],
  ["recently", 7],
  ["latest", 7],
];

/**
 * Channel names common enough to detect from plain text.
 * Any other channel has to be referenced with a Slack channel mention.
 */
export const CHANNEL_KEYWORDS: readonly string[] = [
  "general",
  "standup",
  "hackathons",
  "random",
  "engineering",
  "design",
  "product",
  "marketing",
  "sales",
  "support",
  "dev",
  "testing",
  "qa",
  "operations",
  "announcements",
];

/**
 * Ways a channel keyword shows up in a question: "#general",
 * "general channel", "in general".
 */
export const CHANNEL_SURFACE_FORMS: ReadonlyArray<(name: string) => string> = [
  (name) => `#${name}`,
  (name) => `${name} channel`,
  (name) => `in ${name}`,
];

/**
 * Slack channel mention: <#C0123ABC> or <#C0123ABC|general>.
 * Recent Slack clients send an empty label (<#C0123ABC|>).
 */
export const CHANNEL_MENTION_PATTERN = /<#([A-Z0-9]+)(?:\|([a-zA-Z0-9_-]*))?>/;
