// ============================================
// Evidence Types — retrieved messages and what the answer is built from
// ============================================

/**
 * Metadata stored with every archived message.
 * channelName and userName are empty strings when the archive lacks them.
 */
export type CandidateMetadata = {
  channelId: string;
  channelName: string;
  userId: string;
  userName: string;
  /** Slack ts ("1702648800.000100") or ISO-8601 */
  timestamp: string;
};

/**
 * One retrieved message, pre-filtering.
 * Lower distance = more similar to the query.
 */
export type Candidate = {
  text: string;
  distance: number;
  metadata: CandidateMetadata;
};

/**
 * Order-preserving subsequence of the retrieved candidates that passed the
 * quality filter. Read-only from here on.
 */
export type FilteredSet = readonly Candidate[];

export type LinkKind = "github" | "documentation";

/** A project or documentation URL found in the retrieved messages. */
export type ProjectLink = {
  kind: LinkKind;
  url: string;
  sourceChannel: string;
};

/** Post-processed model output. */
export type GeneratedAnswer = {
  /** Answer text with confidence line and model artifacts removed */
  text: string;
  /** 0-100 */
  confidence: number;
  /** Never empty */
  confidenceExplanation: string;
  links: ProjectLink[];
};

/** One entry of the formal source list returned to callers. */
export type SourceCitation = {
  /** 1-based */
  referenceNumber: number;
  text: string;
  channel: string;
  user: string;
  timestamp: string;
  distance: number;
};
