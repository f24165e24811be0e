// ============================================
// Pipeline — question in, AnswerResponse out
// ============================================

import crypto from "crypto";
import { detectIntent } from "../intent/detectIntent.js";
import { RETRIEVAL_OVERFETCH_FACTOR } from "../retrieval/search.js";
import { filterQualityMessages } from "../retrieval/qualityFilter.js";
import { buildContext } from "../evidence/buildContext.js";
import { generateAnswer } from "../llm/generate.js";
import { getNoResultsMessage } from "../llm/prompts.js";
import { toGeneratedAnswer } from "../answer/postprocess.js";
import { formatEvidenceSection } from "../answer/evidence.js";
import { formatSources } from "../answer/sources.js";
import { createConversationTracker } from "../conversation/tracker.js";
import { createRequestLogger } from "../lib/logger.js";
import { configError, isRecallError, retrievalError } from "../lib/errors.js";
import type { Candidate } from "../evidence/types.js";
import type { AnswerResponse, MessageSearch, PipelineDeps, Question, SearchRequest } from "./types.js";

export const PIPELINE_VERSION = "pipeline.v1.0";

/** Messages kept after quality filtering when the question doesn't say. */
export const DEFAULT_CONTEXT_SIZE = 10;

export const NO_RESULTS_EXPLANATION = "No relevant messages found after filtering";

/**
 * The workspace scope every pipeline call runs under.
 * Missing scope is a configuration error, never defaulted.
 */
export function requireWorkspaceId(workspaceId: string | null | undefined): string {
  if (!workspaceId || !workspaceId.trim()) {
    throw configError("workspaceId is required: every question must be scoped to a workspace");
  }
  return workspaceId;
}

export type AnswerOptions = {
  /** Text handed to the model instead of the raw question (follow-ups) */
  promptQuestion?: string;
  requestId?: string;
};

/**
 * Answer one question from the workspace's message history.
 *
 * Flow:
 * 1. Detect time/channel filters (explicit filters on the question win)
 * 2. Retrieve 3× the context size
 * 3. Quality filter; empty ⇒ templated "no results" answer
 * 4. Assemble context with mentions resolved
 * 5. Generate (model, fallback, or degraded failure)
 * 6. Post-process, append evidence, format sources
 *
 * Throws only for a missing workspace or a retrieval failure.
 */
export async function answerQuestion(
  deps: PipelineDeps,
  question: Question,
  options: AnswerOptions = {}
): Promise<AnswerResponse> {
  const workspaceId = requireWorkspaceId(question.workspaceId);
  const requestId = options.requestId ?? crypto.randomUUID().slice(0, 8);
  const log = createRequestLogger(requestId, "pipeline");
  const startTime = Date.now();
  const contextSize = question.contextSize ?? deps.defaultContextSize ?? DEFAULT_CONTEXT_SIZE;

  log.info("Pipeline started", {
    workspaceId,
    question: question.text.slice(0, 80),
    contextSize,
  });

  const filters = await detectIntent(question.text, workspaceId, deps.channels, {
    daysBack: question.daysBack,
    channelFilter: question.channelFilter,
  });

  const candidates = await retrieve(
    deps.search,
    {
      workspaceId,
      query: question.text,
      limit: contextSize * RETRIEVAL_OVERFETCH_FACTOR,
      channelFilter: filters.channelFilter,
      daysBack: filters.daysBack,
    },
    requestId
  );

  const filtered = filterQualityMessages(candidates, contextSize);

  if (filtered.length === 0) {
    log.info("No substantive messages", {
      retrieved: candidates.length,
      daysBack: filters.daysBack,
      channelFilter: filters.channelFilter,
    });

    return {
      answer: getNoResultsMessage(filters),
      sources: [],
      confidence: 0,
      confidenceExplanation: NO_RESULTS_EXPLANATION,
      links: [],
      contextUsed: 0,
      model: "none",
      filters,
    };
  }

  const context = await buildContext(filtered, workspaceId, deps.users);
  const raw = await generateAnswer(
    options.promptQuestion ?? question.text,
    context,
    filtered,
    deps.completion,
    requestId
  );
  const generated = toGeneratedAnswer(raw, filtered);
  const sources = await formatSources(filtered, workspaceId, deps.users);

  const answer = raw.kind === "failed" ? generated.text : formatEvidenceSection(generated.text, filtered);

  log.info("Pipeline complete", {
    latencyMs: Date.now() - startTime,
    outcome: raw.kind,
    confidence: generated.confidence,
    contextUsed: filtered.length,
    links: generated.links.length,
  });

  return {
    answer,
    sources,
    confidence: generated.confidence,
    confidenceExplanation: generated.confidenceExplanation,
    links: generated.links,
    contextUsed: filtered.length,
    model: raw.kind === "generated" ? "llm" : raw.kind,
    filters,
  };
}

/**
 * Run the search; every failure surfaces as RETRIEVAL_FAILED.
 */
async function retrieve(search: MessageSearch, request: SearchRequest, requestId: string): Promise<Candidate[]> {
  try {
    return await search.search(request);
  } catch (err) {
    if (isRecallError(err, "RETRIEVAL_FAILED")) {
      if (!err.requestId) err.requestId = requestId;
      throw err;
    }
    throw retrievalError("retrieval failed", requestId, err);
  }
}

export type FollowUpInput = {
  workspaceId: string;
  conversationId: string;
  channelId: string;
  question: string;
  contextSize?: number;
  channelFilter?: string | null;
  daysBack?: number | null;
};

/**
 * Answer a question inside a conversation.
 *
 * History is read before the new question is stored, so the prompt shows
 * earlier turns only. The user turn is stored before generation and is kept
 * even when answering fails; the assistant turn is stored after.
 * Filters and retrieval use the raw question; the model sees the history.
 */
export async function answerFollowUp(deps: PipelineDeps, input: FollowUpInput): Promise<AnswerResponse> {
  const workspaceId = requireWorkspaceId(input.workspaceId);
  const tracker = createConversationTracker(deps.conversations, workspaceId);

  const promptQuestion = await tracker.buildPrompt(input.conversationId, input.question);
  await tracker.append(input.conversationId, input.channelId, "user", input.question);

  const response = await answerQuestion(
    deps,
    {
      text: input.question,
      workspaceId,
      contextSize: input.contextSize,
      channelFilter: input.channelFilter,
      daysBack: input.daysBack,
    },
    { promptQuestion }
  );

  await tracker.append(input.conversationId, input.channelId, "assistant", response.answer);

  return response;
}

/** Canned follow-up suggestions, offered only when there is history to ask about. */
export const RELATED_QUESTION_TEMPLATES = [
  "Who is the expert on this topic?",
  "When was this last discussed?",
  "Are there any related GitHub PRs?",
] as const;

/**
 * Suggest follow-up questions. Empty when the archive has nothing on the topic.
 */
export async function suggestRelatedQuestions(
  search: MessageSearch,
  workspaceId: string,
  question: string,
  count: number = 3
): Promise<string[]> {
  const candidates = await retrieve(
    search,
    {
      workspaceId: requireWorkspaceId(workspaceId),
      query: question,
      limit: 20,
      channelFilter: null,
      daysBack: null,
    },
    crypto.randomUUID().slice(0, 8)
  );

  if (candidates.length === 0) return [];
  return RELATED_QUESTION_TEMPLATES.slice(0, count);
}
