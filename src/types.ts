export interface ArchiveSegment {
  period: string; // "YYYY-MM"
  text: string;
}

export interface Message {
  id: string;
  threadId: string;
  sender: string;
  subject: string;
  timestamp: string; // ISO 8601
  body: string;
}

export type ProposalStatus =
  | "accepted"
  | "under discussion"
  | "not accepted"
  | "unknown";

export interface Proposal {
  id: number;
  title: string;
  status: ProposalStatus;
  author: string;
  webUrl?: string;
  jira?: string;
  createdAt?: string; // ISO 8601
  lastModifiedAt?: string; // ISO 8601
}

/**
 * Where a proposal appeared in a message: in the subject, as the subject of
 * a [DISCUSS] or [VOTE] thread, or in the body.
 */
export type MentionType = "subject" | "discuss" | "vote" | "body";

export type Vote = "+1" | "0" | "-1";

export interface MentionEvent {
  proposalId: number;
  messageId: string;
  threadId: string;
  timestamp: string; // ISO 8601
  sender: string;
  types: MentionType[];
  vote: Vote | null; // only on "vote" mentions
}

export interface MentionRecord {
  proposalId: number;
  mentionCount: number;
  distinctThreadCount: number;
  firstSeen: string | null; // ISO 8601, null when mentionCount is 0
  lastSeen: string | null;
}

export type Cache = Map<number, MentionRecord>;

// ── Run types ────────────────────────────────────────────

export type RunMode = "init" | "update";

export type Window = { days: number } | { since: Date };

export interface SegmentFailure {
  period: string;
  reason: string;
}

export interface RunSummary {
  runId: string;
  mode: RunMode;
  windowStart: string; // ISO 8601
  periods: {
    fetched: string[];
    reused: string[];
    failed: SegmentFailure[];
  };
  messages: number;
  skippedEntries: number;
  mentions: number;
  duplicateMentions: number;
  unknownProposalMentions: number;
  proposals: number;
  records: number;
}
