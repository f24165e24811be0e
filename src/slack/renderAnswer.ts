// ============================================
// Slack Renderer — AnswerResponse → Slack message
// ============================================

import type { AnswerResponse } from "../app/types.js";
import type { ProjectLink } from "../evidence/types.js";

interface TextObject {
  type: "mrkdwn";
  text: string;
}

type Block =
  | { type: "section"; text: TextObject }
  | { type: "context"; elements: TextObject[] }
  | { type: "divider" };

export interface SlackResponse {
  /** mrkdwn text; also the notification fallback */
  text: string;
  blocks: Block[];
}

/** Slack limit for one section's text. */
const MAX_SECTION_LENGTH = 3000;

/** How the question header is written above the answer. */
export type QuestionHeader =
  | { kind: "mention" }
  | { kind: "private" }
  | { kind: "public"; userId: string };

export function formatQuestionHeader(question: string, header: QuestionHeader): string {
  switch (header.kind) {
    case "mention":
      return `*Q:* ${question}`;
    case "private":
      return `*Question:* ${question}`;
    case "public":
      return `<@${header.userId}> asked: *${question}*`;
  }
}

export function formatLinks(links: readonly ProjectLink[]): string | null {
  if (links.length === 0) return null;

  const lines = links.map((link) => `• <${link.url}> (${link.kind}, #${link.sourceChannel})`);
  return ["*Related links:*", ...lines].join("\n");
}

export function formatConfidenceTag(confidence: number): string {
  return `_CF: ${confidence}%_`;
}

/**
 * Split long text on line boundaries so each piece fits one section block.
 */
export function splitForSections(text: string, maxLength: number = MAX_SECTION_LENGTH): string[] {
  const pieces: string[] = [];
  let current = "";

  for (const line of text.split("\n")) {
    const next = current ? `${current}\n${line}` : line;
    if (next.length <= maxLength) {
      current = next;
      continue;
    }
    if (current) pieces.push(current);
    current = line.length > maxLength ? line.slice(0, maxLength - 3) + "..." : line;
  }

  if (current) pieces.push(current);
  return pieces;
}

/**
 * Render an answer: question header, answer with evidence, links, confidence.
 */
export function renderAnswer(question: string, response: AnswerResponse, header: QuestionHeader): SlackResponse {
  const questionLine = formatQuestionHeader(question, header);
  const links = formatLinks(response.links);
  const confidence = formatConfidenceTag(response.confidence);

  const text = [questionLine, response.answer, links, confidence].filter((part) => part !== null).join("\n\n");

  const blocks: Block[] = [
    { type: "section", text: { type: "mrkdwn", text: questionLine } },
    ...splitForSections(response.answer).map(
      (piece): Block => ({ type: "section", text: { type: "mrkdwn", text: piece } })
    ),
  ];

  if (links) {
    blocks.push({ type: "divider" });
    blocks.push({ type: "section", text: { type: "mrkdwn", text: links } });
  }

  blocks.push({
    type: "context",
    elements: [{ type: "mrkdwn", text: `${confidence} · ${response.confidenceExplanation}` }],
  });

  return { text, blocks };
}

export function renderText(text: string): SlackResponse {
  return {
    text,
    blocks: [{ type: "section", text: { type: "mrkdwn", text } }],
  };
}

export function renderGreeting(userId: string): SlackResponse {
  return renderText(
    `Hi <@${userId}>!\n\nAsk me questions!\n\n*Examples:*\n• What projects are being worked on?\n• Who is working on AI?\n• What are the main topics?`
  );
}

export function renderUsage(command: string): SlackResponse {
  return renderText(`Please provide a question.\n\nUsage: \`${command} What are people discussing?\``);
}

export function renderError(message: string): SlackResponse {
  return renderText(`Sorry, I encountered an error: ${message}`);
}
