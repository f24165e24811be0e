// ============================================
// LLM Client — OpenAI chat completions
// The capability is optional: without a key the pipeline
// answers in fallback mode instead of failing.
// ============================================

import OpenAI from "openai";
import { logger } from "../lib/logger.js";

/** Default answer model. */
export const ANSWER_MODEL = "gpt-4o";

/** Output budget for one answer. */
export const ANSWER_MAX_TOKENS = 1000;

export type CompletionOptions = {
  maxTokens?: number;
  temperature?: number;
};

export interface CompletionProvider {
  readonly model: string;
  complete(systemPrompt: string, userPrompt: string, options?: CompletionOptions): Promise<string>;
}

/**
 * Whether a language model can be called.
 * "unavailable" is a normal state, not an error.
 */
export type CompletionCapability =
  | { kind: "available"; provider: CompletionProvider }
  | { kind: "unavailable"; reason: string };

/**
 * Completion provider backed by the OpenAI chat API.
 */
export function createOpenAICompletion(apiKey: string, model: string = ANSWER_MODEL): CompletionProvider {
  const openai = new OpenAI({ apiKey });

  return {
    model,
    async complete(systemPrompt, userPrompt, options = {}) {
      const { maxTokens = ANSWER_MAX_TOKENS, temperature = 0.3 } = options;

      try {
        const response = await openai.chat.completions.create({
          model,
          messages: [
            { role: "system", content: systemPrompt },
            { role: "user", content: userPrompt },
          ],
          temperature,
          max_tokens: maxTokens,
        });

        return response.choices[0]?.message?.content ?? "";
      } catch (err) {
        logger.error("LLM completion failed", {
          stage: "llm",
          model,
          error: err,
        });
        throw err;
      }
    },
  };
}

/**
 * Resolve the completion capability from an optional API key.
 */
export function createCompletionCapability(
  apiKey: string | undefined,
  model: string = ANSWER_MODEL
): CompletionCapability {
  if (!apiKey) {
    logger.warn("OPENAI_API_KEY not set - answering in fallback mode", { stage: "llm" });
    return { kind: "unavailable", reason: "OPENAI_API_KEY not set" };
  }

  return { kind: "available", provider: createOpenAICompletion(apiKey, model) };
}
