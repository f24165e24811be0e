// ============================================
// LLM Prompts — answer synthesis over Slack history
// ============================================

import type { IntentFilters } from "../app/types.js";

/**
 * Sentence the model uses when the messages don't answer the question.
 * The confidence heuristic keys on "don't have".
 */
export const NO_INFO_SENTENCE = "I don't have recent info on this in the Slack history";

/**
 * System prompt for answer synthesis.
 * The trailing confidence line is parsed and removed by the post-processor.
 */
export const ANSWER_SYSTEM_PROMPT = `You are Recall, a helpful teammate answering questions about your Slack workspace.

## Critical Rules (NEVER BREAK THESE)
1. ONLY answer based on the provided messages - NO external knowledge or assumptions
2. If the messages don't contain the answer, say "${NO_INFO_SENTENCE}"
3. NEVER add information that is not explicitly in the messages
4. Include ALL relevant details from the messages (who, what, when, blockers)

## Tone
- Conversational and friendly, like chatting with a coworker
- Professional but approachable
- Call out blockers, issues, or waiting-on items explicitly

## Response Structure
1. Start with a short casual opener ("Hey!", "So...", "Alright,") or go straight to the answer
2. Answer in 2-4 sentences with names, dates and context
3. Include URLs inline when relevant (e.g. "The repo is at https://github.com/...")
4. Do NOT add a "What I found", "Sources" or "Related Links" section - those are added for you

## Formatting (Slack, not Markdown)
- Use *single asterisks* for bold. NEVER use **double asterisks**.
- Use _underscores_ for italic
- No emojis or emoji codes

## Confidence (REQUIRED)
End with exactly one line in this format:
Confidence: <0-100>% - <one short sentence explaining why>`;

/**
 * User prompt: the question plus the numbered message context.
 */
export function buildAnswerUserPrompt(question: string, context: string): string {
  return `Question: ${question}

Slack Message History:
${context}

Answer the question based on these messages. Be comprehensive and include all relevant details.`;
}

/**
 * Human-readable list of active filters, e.g. "last 7 days and #general channel".
 */
export function describeFilters(filters: IntentFilters): string | null {
  const parts: string[] = [];
  if (filters.daysBack) parts.push(`last ${filters.daysBack} days`);
  if (filters.channelFilter) parts.push(`#${filters.channelFilter} channel`);
  return parts.length > 0 ? parts.join(" and ") : null;
}

/**
 * Answer for an empty filtered set. Names the active filters so the user
 * knows what to relax.
 */
export function getNoResultsMessage(filters: IntentFilters): string {
  const described = describeFilters(filters);

  if (!described) {
    return "I couldn't find any relevant information in the Slack history to answer this question.";
  }

  return `I couldn't find any substantive messages in the ${described}. There may be very little activity during this period, or the messages might be too short to be useful (like emoji reactions or join notifications).

Try:
• Asking about a different time period
• Asking without specifying a channel
• Asking about a more general topic`;
}
