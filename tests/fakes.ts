// ============================================
// Test Fakes — in-process stand-ins for the pipeline collaborators
// ============================================

import { vi, type Mock } from "vitest";
import type { Candidate, CandidateMetadata } from "../src/evidence/types.js";
import type {
  ChannelDirectory,
  MessageSearch,
  PipelineDeps,
  SearchRequest,
  UserDirectory,
  UserNames,
} from "../src/app/types.js";
import type { CompletionCapability, CompletionProvider } from "../src/llm/client.js";
import type {
  ConversationStore,
  ConversationSummary,
  ConversationTurn,
  NewConversationTurn,
} from "../src/conversation/types.js";

export const WORKSPACE = "T-TEST";

export function makeCandidate(
  text: string,
  metadata: Partial<CandidateMetadata> = {},
  distance: number = 0.2
): Candidate {
  return {
    text,
    distance,
    metadata: {
      channelId: "C100",
      channelName: "general",
      userId: "U1",
      userName: "alice",
      timestamp: "2024-12-15T14:00:00Z",
      ...metadata,
    },
  };
}

export class FakeSearch implements MessageSearch {
  readonly requests: SearchRequest[] = [];
  error: unknown = null;

  constructor(public results: Candidate[] = []) {}

  async search(request: SearchRequest): Promise<Candidate[]> {
    this.requests.push(request);
    if (this.error) throw this.error;
    return this.results.slice(0, request.limit);
  }
}

export class FakeUserDirectory implements UserDirectory {
  readonly calls: Array<{ workspaceId: string; userIds: string[] }> = [];
  error: unknown = null;

  constructor(private readonly users: Record<string, Partial<UserNames>> = {}) {}

  async lookupUsers(workspaceId: string, userIds: readonly string[]): Promise<Map<string, UserNames>> {
    this.calls.push({ workspaceId, userIds: [...userIds] });
    if (this.error) throw this.error;

    const names = new Map<string, UserNames>();
    for (const id of userIds) {
      const user = this.users[id];
      if (user) {
        names.set(id, { displayName: null, realName: null, userName: null, ...user });
      }
    }
    return names;
  }
}

export class FakeChannelDirectory implements ChannelDirectory {
  readonly calls: string[] = [];
  error: unknown = null;

  constructor(private readonly channels: Record<string, string> = {}) {}

  async findChannelName(_workspaceId: string, channelId: string): Promise<string | null> {
    this.calls.push(channelId);
    if (this.error) throw this.error;
    return this.channels[channelId] ?? null;
  }
}

/**
 * Conversation store kept in memory. Turns are ordered by insertion.
 */
export class InMemoryConversationStore implements ConversationStore {
  private readonly rows: Array<ConversationTurn & { workspaceId: string; seq: number }> = [];
  private seq = 0;
  failWith: unknown = null;

  async insertTurn(workspaceId: string, turn: NewConversationTurn): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.seq++;
    this.rows.push({
      ...turn,
      workspaceId,
      seq: this.seq,
      createdAt: new Date(Date.UTC(2024, 0, 1, 0, 0, this.seq)).toISOString(),
    });
  }

  async listTurns(workspaceId: string, conversationId: string, limit: number): Promise<ConversationTurn[]> {
    if (this.failWith) throw this.failWith;
    return this.rows
      .filter((r) => r.workspaceId === workspaceId && r.conversationId === conversationId)
      .slice(0, limit)
      .map(({ conversationId: id, channelId, role, content, createdAt }) => ({
        conversationId: id,
        channelId,
        role,
        content,
        createdAt,
      }));
  }

  async deleteTurns(workspaceId: string, conversationId: string): Promise<number> {
    if (this.failWith) throw this.failWith;
    let removed = 0;
    for (let i = this.rows.length - 1; i >= 0; i--) {
      const row = this.rows[i];
      if (row && row.workspaceId === workspaceId && row.conversationId === conversationId) {
        this.rows.splice(i, 1);
        removed++;
      }
    }
    return removed;
  }

  async listRecent(workspaceId: string, channelId: string | null, limit: number): Promise<ConversationSummary[]> {
    if (this.failWith) throw this.failWith;
    const latest = new Map<string, ConversationSummary & { seq: number }>();

    for (const row of this.rows) {
      if (row.workspaceId !== workspaceId) continue;
      if (channelId !== null && row.channelId !== channelId) continue;
      latest.set(`${row.conversationId}:${row.channelId}`, {
        conversationId: row.conversationId,
        channelId: row.channelId,
        lastUpdated: row.createdAt,
        seq: row.seq,
      });
    }

    return [...latest.values()]
      .sort((a, b) => b.seq - a.seq)
      .slice(0, limit)
      .map(({ conversationId, channelId: channel, lastUpdated }) => ({
        conversationId,
        channelId: channel,
        lastUpdated,
      }));
  }
}

export function makeProvider(reply: string | Error): {
  model: string;
  complete: Mock<CompletionProvider["complete"]>;
} {
  return {
    model: "test-model",
    complete: vi.fn<CompletionProvider["complete"]>(async () => {
      if (reply instanceof Error) throw reply;
      return reply;
    }),
  };
}

export function available(provider: CompletionProvider): CompletionCapability {
  return { kind: "available", provider };
}

export const UNAVAILABLE: CompletionCapability = { kind: "unavailable", reason: "OPENAI_API_KEY not set" };

export function makeDeps(overrides: Partial<PipelineDeps> = {}): PipelineDeps {
  return {
    search: new FakeSearch(),
    users: new FakeUserDirectory(),
    channels: new FakeChannelDirectory(),
    completion: UNAVAILABLE,
    conversations: new InMemoryConversationStore(),
    ...overrides,
  };
}
