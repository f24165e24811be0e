// ============================================
// Pipeline Tests — end to end with in-process fakes
// ============================================

import { describe, it, expect } from "vitest";
import {
  answerFollowUp,
  answerQuestion,
  NO_RESULTS_EXPLANATION,
  RELATED_QUESTION_TEMPLATES,
  suggestRelatedQuestions,
} from "../src/app/pipeline.js";
import { buildAnswerUserPrompt } from "../src/llm/prompts.js";
import { FALLBACK_EXPLANATION } from "../src/llm/generate.js";
import { retrievalError } from "../src/lib/errors.js";
import {
  FakeChannelDirectory,
  FakeSearch,
  InMemoryConversationStore,
  WORKSPACE,
  available,
  makeCandidate,
  makeDeps,
  makeProvider,
} from "./fakes.js";

const POSTGRES = makeCandidate("We picked Postgres for the event store");
const POSTGRES_CONTEXT = "[1] [#general] (from alice):\nWe picked Postgres for the event store";
const POSTGRES_EVIDENCE =
  '\n\nWhat I found:\n• alice\'s update in #general (Dec 15, 2pm): "We picked Postgres for the event store"';

describe("answerQuestion", () => {
  it("returns the no-results answer when every message is filtered out", async () => {
    const search = new FakeSearch(["a", "b", "c", "d", "e"].map((n) => makeCandidate(`${n} has joined the channel`)));
    const response = await answerQuestion(makeDeps({ search }), {
      text: "What hackathon projects are people working on?",
      workspaceId: WORKSPACE,
    });

    expect(response).toEqual({
      answer: "I couldn't find any relevant information in the Slack history to answer this question.",
      sources: [],
      confidence: 0,
      confidenceExplanation: NO_RESULTS_EXPLANATION,
      links: [],
      contextUsed: 0,
      model: "none",
      filters: { daysBack: null, channelFilter: null },
    });
  });

  it("over-fetches three times the context size with detected filters", async () => {
    const search = new FakeSearch();
    await answerQuestion(makeDeps({ search }), {
      text: "what happened in <#C100|general> yesterday",
      workspaceId: WORKSPACE,
    });

    expect(search.requests).toEqual([
      {
        workspaceId: WORKSPACE,
        query: "what happened in <#C100|general> yesterday",
        limit: 30,
        channelFilter: "general",
        daysBack: 2,
      },
    ]);
  });

  it("filters by the raw channel id when the mention cannot be resolved", async () => {
    const search = new FakeSearch();
    const channels = new FakeChannelDirectory();
    await answerQuestion(makeDeps({ search, channels }), {
      text: "what did <#C404> decide?",
      workspaceId: WORKSPACE,
    });

    expect(channels.calls).toEqual(["C404"]);
    expect(search.requests[0]).toMatchObject({ channelFilter: "C404", daysBack: null });
  });

  it("uses explicit filters and the configured context size", async () => {
    const search = new FakeSearch();
    await answerQuestion(makeDeps({ search, defaultContextSize: 4 }), {
      text: "anything today?",
      workspaceId: WORKSPACE,
      channelFilter: "design",
      daysBack: 30,
    });

    expect(search.requests[0]).toMatchObject({ limit: 12, channelFilter: "design", daysBack: 30 });
  });

  it("answers in fallback mode without a model", async () => {
    const response = await answerQuestion(makeDeps({ search: new FakeSearch([POSTGRES]) }), {
      text: "Which database did we pick?",
      workspaceId: WORKSPACE,
    });

    expect(response.answer).toBe(
      "Hey! Based on what I saw, alice mentioned this in #general. We picked Postgres for the event store" +
        POSTGRES_EVIDENCE
    );
    expect(response.confidence).toBe(50);
    expect(response.confidenceExplanation).toBe(FALLBACK_EXPLANATION);
    expect(response.model).toBe("fallback");
    expect(response.contextUsed).toBe(1);
    expect(response.sources).toHaveLength(1);
  });

  it("answers with the model and post-processes its output", async () => {
    const provider = makeProvider("**Postgres** it is.\nConfidence: 90% - Decision stated in #general");
    const response = await answerQuestion(
      makeDeps({ search: new FakeSearch([POSTGRES]), completion: available(provider) }),
      { text: "Which database did we pick?", workspaceId: WORKSPACE }
    );

    expect(response.answer).toBe("*Postgres* it is." + POSTGRES_EVIDENCE);
    expect(response.confidence).toBe(90);
    expect(response.confidenceExplanation).toBe("Decision stated in #general");
    expect(response.model).toBe("llm");
    expect(provider.complete.mock.calls[0]?.[1]).toBe(
      buildAnswerUserPrompt("Which database did we pick?", POSTGRES_CONTEXT)
    );
  });

  it("degrades when the model call fails", async () => {
    const provider = makeProvider(new Error("rate limited"));
    const response = await answerQuestion(
      makeDeps({ search: new FakeSearch([POSTGRES]), completion: available(provider) }),
      { text: "Which database did we pick?", workspaceId: WORKSPACE }
    );

    expect(response.answer).toBe(
      "I found relevant messages but encountered an error generating an answer: rate limited"
    );
    expect(response.confidence).toBe(0);
    expect(response.model).toBe("failed");
    expect(response.sources).toHaveLength(1);
  });

  it("surfaces retrieval failures instead of answering", async () => {
    const search = new FakeSearch();
    search.error = new Error("connection refused");

    await expect(
      answerQuestion(makeDeps({ search }), { text: "anything?", workspaceId: WORKSPACE })
    ).rejects.toMatchObject({ code: "RETRIEVAL_FAILED", message: "retrieval failed" });
  });

  it("keeps a retrieval error raised by the search", async () => {
    const search = new FakeSearch();
    search.error = retrievalError("retrieval failed: timeout");

    await expect(
      answerQuestion(makeDeps({ search }), { text: "anything?", workspaceId: WORKSPACE })
    ).rejects.toMatchObject({ code: "RETRIEVAL_FAILED", message: "retrieval failed: timeout" });
  });

  it("refuses to run without a workspace", async () => {
    const search = new FakeSearch([POSTGRES]);

    await expect(answerQuestion(makeDeps({ search }), { text: "anything?", workspaceId: " " })).rejects.toMatchObject({
      code: "CONFIG_ERROR",
    });
    expect(search.requests).toEqual([]);
  });
});

describe("answerFollowUp", () => {
  it("stores both turns and feeds earlier turns to the model", async () => {
    const conversations = new InMemoryConversationStore();
    const provider = makeProvider("Postgres.\nConfidence: 90% - Stated");
    const search = new FakeSearch([POSTGRES]);
    const deps = makeDeps({ search, conversations, completion: available(provider) });

    const first = await answerFollowUp(deps, {
      workspaceId: WORKSPACE,
      conversationId: "t1",
      channelId: "C100",
      question: "Which DB?",
    });
    await answerFollowUp(deps, {
      workspaceId: WORKSPACE,
      conversationId: "t1",
      channelId: "C100",
      question: "Why?",
    });

    expect(provider.complete.mock.calls[0]?.[1]).toBe(buildAnswerUserPrompt("Which DB?", POSTGRES_CONTEXT));
    expect(provider.complete.mock.calls[1]?.[1]).toBe(
      buildAnswerUserPrompt(
        `Previous conversation:\nUser: Which DB?\nAssistant: ${first.answer}\n\nNew question: Why?`,
        POSTGRES_CONTEXT
      )
    );
    expect(search.requests.map((r) => r.query)).toEqual(["Which DB?", "Why?"]);

    const turns = await conversations.listTurns(WORKSPACE, "t1", 20);
    expect(turns.map((t) => t.role)).toEqual(["user", "assistant", "user", "assistant"]);
  });

  it("keeps the user turn when retrieval fails", async () => {
    const conversations = new InMemoryConversationStore();
    const search = new FakeSearch();
    search.error = new Error("connection refused");

    await expect(
      answerFollowUp(makeDeps({ search, conversations }), {
        workspaceId: WORKSPACE,
        conversationId: "t1",
        channelId: "C100",
        question: "Which DB?",
      })
    ).rejects.toMatchObject({ code: "RETRIEVAL_FAILED" });

    const turns = await conversations.listTurns(WORKSPACE, "t1", 20);
    expect(turns.map((t) => [t.role, t.content])).toEqual([["user", "Which DB?"]]);
  });
});

describe("suggestRelatedQuestions", () => {
  it("suggests nothing when the archive has nothing", async () => {
    await expect(suggestRelatedQuestions(new FakeSearch(), WORKSPACE, "quantum?")).resolves.toEqual([]);
  });

  it("returns the first templates", async () => {
    const search = new FakeSearch([POSTGRES]);
    await expect(suggestRelatedQuestions(search, WORKSPACE, "db?")).resolves.toEqual([...RELATED_QUESTION_TEMPLATES]);
    await expect(suggestRelatedQuestions(search, WORKSPACE, "db?", 2)).resolves.toEqual([
      "Who is the expert on this topic?",
      "When was this last discussed?",
    ]);
    expect(search.requests[0]).toMatchObject({ limit: 20, channelFilter: null, daysBack: null });
  });
});
