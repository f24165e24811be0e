// ============================================
// Answer Post-Processing — raw generator output → GeneratedAnswer
// ============================================

import { extractConfidence } from "./confidence.js";
import { cleanupAnswerText } from "./cleanup.js";
import { extractProjectLinks } from "./links.js";
import type { RawAnswer } from "../llm/generate.js";
import type { FilteredSet, GeneratedAnswer } from "../evidence/types.js";

/**
 * Post-process model text: pull out the confidence line, strip model
 * artifacts, collect links from the retrieved messages.
 */
export function postprocessAnswer(rawText: string, filtered: FilteredSet): GeneratedAnswer {
  const { confidence, explanation } = extractConfidence(rawText);

  return {
    text: cleanupAnswerText(rawText),
    confidence,
    confidenceExplanation: explanation,
    links: extractProjectLinks(filtered),
  };
}

/**
 * GeneratedAnswer for any generator outcome.
 * Fallback answers keep their fixed confidence; failures report 0.
 */
export function toGeneratedAnswer(raw: RawAnswer, filtered: FilteredSet): GeneratedAnswer {
  switch (raw.kind) {
    case "generated":
      return postprocessAnswer(raw.text, filtered);

    case "fallback":
      return {
        text: raw.text,
        confidence: raw.confidence,
        confidenceExplanation: raw.explanation,
        links: extractProjectLinks(filtered),
      };

    case "failed":
      return {
        text: `I found relevant messages but encountered an error generating an answer: ${raw.error.message}`,
        confidence: 0,
        confidenceExplanation: `Error: ${raw.error.message}`,
        links: [],
      };
  }
}
