// ============================================
// Application Types — pipeline IO and collaborator contracts
// ============================================

import type { Candidate, ProjectLink, SourceCitation } from "../evidence/types.js";
import type { CompletionCapability } from "../llm/client.js";
import type { ConversationStore } from "../conversation/types.js";

/**
 * A question as submitted by Slack or the API.
 * workspaceId is required; an empty value is a configuration error.
 */
export type Question = {
  text: string;
  workspaceId: string;
  /** Explicit channel name; skips channel detection when set */
  channelFilter?: string | null;
  /** Explicit lookback window; skips time detection when set */
  daysBack?: number | null;
  /** Messages kept after quality filtering (default 10) */
  contextSize?: number;
};

/** Filters derived from the question text. */
export type IntentFilters = {
  daysBack: number | null;
  channelFilter: string | null;
};

/**
 * How the answer text was produced: by the model, by the fallback without a
 * model, degraded after a model failure, or templated when nothing was found.
 */
export type AnswerModel = "llm" | "fallback" | "failed" | "none";

/**
 * Final artifact returned for one question.
 */
export type AnswerResponse = {
  /** Formatted answer including the "What I found" section */
  answer: string;
  /** At most 10 entries */
  sources: SourceCitation[];
  confidence: number;
  confidenceExplanation: string;
  links: ProjectLink[];
  /** Number of filtered messages the answer was built from */
  contextUsed: number;
  model: AnswerModel;
  /** Filters that were in effect for retrieval */
  filters: IntentFilters;
};

// ============================================
// Collaborators
// ============================================

export type SearchRequest = {
  workspaceId: string;
  query: string;
  limit: number;
  channelFilter: string | null;
  daysBack: number | null;
};

/**
 * Semantic search over the message archive.
 * Results must come back sorted by ascending distance.
 */
export interface MessageSearch {
  search(request: SearchRequest): Promise<Candidate[]>;
}

/** Names the user directory knows for one Slack user. */
export type UserNames = {
  displayName: string | null;
  realName: string | null;
  userName: string | null;
};

/**
 * Batched user lookup, scoped to one workspace.
 * Ids the directory doesn't know are simply absent from the map.
 */
export interface UserDirectory {
  lookupUsers(workspaceId: string, userIds: readonly string[]): Promise<Map<string, UserNames>>;
}

export interface ChannelDirectory {
  findChannelName(workspaceId: string, channelId: string): Promise<string | null>;
}

/**
 * Everything the pipeline talks to.
 * Built once at startup and shared by concurrent requests.
 */
export type PipelineDeps = {
  search: MessageSearch;
  users: UserDirectory;
  channels: ChannelDirectory;
  completion: CompletionCapability;
  conversations: ConversationStore;
  /** Context size for questions that don't set one */
  defaultContextSize?: number;
};
