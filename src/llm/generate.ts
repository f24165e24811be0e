// ============================================
// Answer Generation — prompt the model, or fall back
// ============================================

import { ANSWER_MAX_TOKENS, type CompletionCapability } from "./client.js";
import { ANSWER_SYSTEM_PROMPT, buildAnswerUserPrompt } from "./prompts.js";
import { logger } from "../lib/logger.js";
import { sliceCodePoints } from "../lib/text.js";
import { generationError, type RecallError } from "../lib/errors.js";
import type { FilteredSet } from "../evidence/types.js";

/** Confidence reported for fallback answers. */
export const FALLBACK_CONFIDENCE = 50;

/** Code points of the top message quoted by a fallback answer. */
export const FALLBACK_EXCERPT_LENGTH = 200;

export const FALLBACK_EXPLANATION =
  "Fallback mode - medium confidence estimate (no language model configured)";

/**
 * Raw generator output, before post-processing.
 */
export type RawAnswer =
  | { kind: "generated"; text: string; model: string }
  | { kind: "fallback"; text: string; confidence: number; explanation: string }
  | { kind: "failed"; error: RecallError };

/**
 * Deterministic answer from the top-ranked message.
 */
export function buildFallbackAnswer(filtered: FilteredSet): RawAnswer {
  const top = filtered[0];

  const text = top
    ? `Hey! Based on what I saw, ${top.metadata.userName || "someone"} mentioned this in #${
        top.metadata.channelName || "unknown"
      }. ${sliceCodePoints(top.text, FALLBACK_EXCERPT_LENGTH)}`
    : "I couldn't find relevant information to answer this question.";

  return {
    kind: "fallback",
    text,
    confidence: FALLBACK_CONFIDENCE,
    explanation: FALLBACK_EXPLANATION,
  };
}

/**
 * Generate the raw answer text for a question.
 * Never throws: transport failures come back as { kind: "failed" }.
 */
export async function generateAnswer(
  question: string,
  context: string,
  filtered: FilteredSet,
  completion: CompletionCapability,
  requestId?: string
): Promise<RawAnswer> {
  if (completion.kind === "unavailable") {
    logger.info("Using fallback answer", {
      stage: "llm",
      requestId,
      reason: completion.reason,
    });
    return buildFallbackAnswer(filtered);
  }

  const { provider } = completion;
  const startTime = Date.now();

  try {
    const text = await provider.complete(ANSWER_SYSTEM_PROMPT, buildAnswerUserPrompt(question, context), {
      maxTokens: ANSWER_MAX_TOKENS,
    });

    logger.info("Answer generated", {
      stage: "llm",
      requestId,
      model: provider.model,
      answerLength: text.length,
      latencyMs: Date.now() - startTime,
    });

    return { kind: "generated", text, model: provider.model };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);

    logger.error("Answer generation failed", {
      stage: "llm",
      requestId,
      model: provider.model,
      error: err,
    });

    return { kind: "failed", error: generationError(message, requestId, err) };
  }
}
