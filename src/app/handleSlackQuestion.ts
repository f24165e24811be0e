// ============================================
// Slack Question Handlers — thin shell around the pipeline
// ============================================

import { answerFollowUp, answerQuestion } from "./pipeline.js";
import { createConversationTracker } from "../conversation/tracker.js";
import {
  renderAnswer,
  renderError,
  renderGreeting,
  renderText,
  renderUsage,
  type SlackResponse,
} from "../slack/renderAnswer.js";
import { logger } from "../lib/logger.js";
import { getUserMessage, wrapError } from "../lib/errors.js";
import type { PipelineDeps } from "./types.js";

/** Mention texts that get the greeting instead of an answer. */
export const GREETING_WORDS = ["", "hi", "hello", "hey"] as const;

export const RESET_COMMAND = "reset";

export const THINKING_TEXT = "🔎 Searching the message history…";

/**
 * The fields of an app_mention event the handler reads.
 */
export interface SlackMention {
  user?: string;
  text: string;
  ts: string;
  thread_ts?: string;
  channel: string;
}

/** The fields of a slash command payload the handler reads. */
export interface SlackCommand {
  command: string;
  text: string;
  user_id: string;
  channel_id: string;
}

/**
 * Slack Web Client interface (minimal).
 */
export interface SlackClient {
  chat: {
    postMessage(params: {
      channel: string;
      thread_ts?: string;
      text: string;
      blocks?: SlackResponse["blocks"];
    }): Promise<{ ts?: string }>;
    postEphemeral(params: {
      channel: string;
      user: string;
      text: string;
      blocks?: SlackResponse["blocks"];
    }): Promise<unknown>;
    update(params: { channel: string; ts: string; text: string; blocks?: SlackResponse["blocks"] }): Promise<unknown>;
  };
}

/** Drop bot mentions and surrounding whitespace. */
export function stripBotMention(text: string): string {
  return text.replace(/<@[A-Z0-9]+(?:\|[^>]*)?>\s*/g, "").trim();
}

function isGreeting(text: string): boolean {
  const normalized = text.toLowerCase();
  return GREETING_WORDS.some((word) => word === normalized);
}

/**
 * Build the reply to a mention. Each thread is one conversation:
 * "reset" clears it, anything else is answered with its history.
 */
export async function respondToMention(
  deps: PipelineDeps,
  workspaceId: string,
  mention: SlackMention
): Promise<SlackResponse> {
  const question = stripBotMention(mention.text);
  const conversationId = mention.thread_ts || mention.ts;
  const userId = mention.user ?? "there";

  if (isGreeting(question)) {
    return renderGreeting(userId);
  }

  try {
    if (question.toLowerCase() === RESET_COMMAND) {
      const tracker = createConversationTracker(deps.conversations, workspaceId);
      const cleared = await tracker.clear(conversationId);
      return renderText(
        cleared ? "Conversation cleared. Ask me something new!" : "I couldn't clear this conversation. Please try again."
      );
    }

    const response = await answerFollowUp(deps, {
      workspaceId,
      conversationId,
      channelId: mention.channel,
      question,
    });

    return renderAnswer(question, response, { kind: "mention" });
  } catch (err) {
    const appError = wrapError(err);

    logger.error("Mention handling failed", {
      stage: "slack",
      channelId: mention.channel,
      conversationId,
      error: err,
    });

    return renderError(getUserMessage(appError));
  }
}

/**
 * Reply to a mention in its thread.
 */
export async function handleAppMention(
  client: SlackClient,
  deps: PipelineDeps,
  workspaceId: string,
  mention: SlackMention
): Promise<void> {
  const response = await respondToMention(deps, workspaceId, mention);

  try {
    await client.chat.postMessage({
      channel: mention.channel,
      thread_ts: mention.thread_ts || mention.ts,
      text: response.text,
      blocks: response.blocks,
    });
  } catch (err) {
    logger.error("Failed to send mention reply", { stage: "slack", channelId: mention.channel, error: err });
  }
}

export type CommandVisibility = "private" | "public";

/**
 * Build the reply to /ask (private) or /askall (public).
 * Slash commands are one-shot: no conversation history.
 */
export async function respondToCommand(
  deps: PipelineDeps,
  workspaceId: string,
  command: SlackCommand,
  visibility: CommandVisibility
): Promise<SlackResponse> {
  const question = command.text.trim();

  if (!question) {
    return renderUsage(command.command);
  }

  try {
    const response = await answerQuestion(deps, { text: question, workspaceId });
    return renderAnswer(
      question,
      response,
      visibility === "private" ? { kind: "private" } : { kind: "public", userId: command.user_id }
    );
  } catch (err) {
    const appError = wrapError(err);

    logger.error("Command handling failed", {
      stage: "slack",
      command: command.command,
      channelId: command.channel_id,
      error: err,
    });

    return renderError(getUserMessage(appError));
  }
}

/**
 * Answer a slash command. Private answers are ephemeral; public answers
 * replace a "searching" message posted to the channel.
 */
export async function handleAskCommand(
  client: SlackClient,
  deps: PipelineDeps,
  workspaceId: string,
  command: SlackCommand,
  visibility: CommandVisibility
): Promise<void> {
  const channel = command.channel_id;

  if (visibility === "private" || !command.text.trim()) {
    const response = await respondToCommand(deps, workspaceId, command, visibility);
    try {
      await client.chat.postEphemeral({ channel, user: command.user_id, text: response.text, blocks: response.blocks });
    } catch (err) {
      logger.error("Failed to send ephemeral answer", { stage: "slack", channelId: channel, error: err });
    }
    return;
  }

  let pendingTs: string | undefined;
  try {
    const pending = await client.chat.postMessage({ channel, text: THINKING_TEXT });
    pendingTs = pending.ts;
  } catch (err) {
    logger.error("Failed to post pending message", { stage: "slack", channelId: channel, error: err });
  }

  const response = await respondToCommand(deps, workspaceId, command, visibility);

  try {
    if (pendingTs) {
      await client.chat.update({ channel, ts: pendingTs, text: response.text, blocks: response.blocks });
    } else {
      await client.chat.postMessage({ channel, text: response.text, blocks: response.blocks });
    }
  } catch (err) {
    logger.error("Failed to send answer", { stage: "slack", channelId: channel, error: err });
  }
}
