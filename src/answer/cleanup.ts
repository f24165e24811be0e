// ============================================
// Answer Cleanup — ordered text transforms over model output
// Each step is pure; order is part of the contract.
// ============================================

import { CONFIDENCE_LINE_PATTERN } from "./confidence.js";

export type TextTransform = {
  name: string;
  apply: (text: string) => string;
};

const CONFIDENCE_LINES = new RegExp(CONFIDENCE_LINE_PATTERN.source, "gim");

/**
 * A header line ("Sources:", ":link: **Related Links:**") and everything after
 * it up to the next blank line or the end of the text.
 */
function sectionPattern(label: string): RegExp {
  return new RegExp(
    `^[ \\t]*(?::[\\w+-]+:[ \\t]*)*\\**${label}:?\\**[ \\t]*(?:\\n[\\s\\S]*?)?(?=\\n\\n|(?![\\s\\S]))`,
    "gim"
  );
}

const RELATED_LINKS_SECTION = sectionPattern("Related Links?");
const SOURCES_SECTION = sectionPattern("Sources?");

/** "[1] #standup - alice: _shipping today_" */
const CITATION_LINE = /^[ \t]*\[\d+\][ \t]+#[\w-]+.*(?:\n|$)/gm;

/** ":wave:", ":white_check_mark:". Must start with a letter so "10:30:00" survives. */
const EMOJI_SHORTCODE = /:[a-z][a-z0-9_+-]*:/gi;

const MARKDOWN_BOLD = /\*\*([^*]+?)\*\*/g;

/**
 * Cleanup steps in application order.
 *
 * 1. confidence line: pre: may contain "Confidence: N% - why" lines.
 *    post: none remain. Must precede 5 and 6.
 * 2. related links / 3. sources: post: no model-written link or source
 *    sections; the pipeline renders its own.
 * 4. citation lines: post: no "[n] #channel ..." lines.
 * 5. emoji shortcodes: post: no ":name:" tokens. Runs after 1-3:
 *    those patterns accept a leading shortcode.
 * 6. bold: pre: may contain **x**. post: only Slack *x* bold.
 * 7. blank lines: post: at most one blank line in a row, no outer whitespace.
 */
export const ANSWER_CLEANUP_STEPS: readonly TextTransform[] = [
  { name: "confidence_line", apply: (text) => text.replace(CONFIDENCE_LINES, "") },
  { name: "related_links_section", apply: (text) => text.replace(RELATED_LINKS_SECTION, "") },
  { name: "sources_section", apply: (text) => text.replace(SOURCES_SECTION, "") },
  { name: "citation_lines", apply: (text) => text.replace(CITATION_LINE, "") },
  { name: "emoji_shortcodes", apply: (text) => text.replace(EMOJI_SHORTCODE, "") },
  { name: "bold", apply: (text) => text.replace(MARKDOWN_BOLD, "*$1*") },
  { name: "blank_lines", apply: (text) => text.replace(/\n{3,}/g, "\n\n").trim() },
];

export function cleanupAnswerText(text: string): string {
  return ANSWER_CLEANUP_STEPS.reduce((current, step) => step.apply(current), text);
}
