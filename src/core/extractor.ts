import type { Message, MentionEvent, MentionType, Vote } from "../types.js";

export interface ProposalUniverse {
  /** Token pattern from createProposalPattern */
  pattern: RegExp;
  /** IDs known to the metadata source; others are still extracted */
  known?: ReadonlySet<number>;
}

export interface ProposalMention {
  proposalId: number;
  types: MentionType[];
  vote: Vote | null;
}

const TYPE_ORDER: readonly MentionType[] = ["subject", "discuss", "vote", "body"];

/**
 * Token pattern for proposal IDs with the given prefix, e.g. "KIP-500".
 * The digit run is matched whole, so "KIP-212" never yields 12, and the
 * prefix must not be glued to a preceding letter or digit.
 */
export function createProposalPattern(prefix: string): RegExp {
  if (!/^[A-Za-z]+$/.test(prefix)) {
    throw new Error(`Proposal prefix must be letters only, got "${prefix}"`);
  }
  return new RegExp(`(?<![A-Za-z0-9])${prefix}-(\\d+)(?!\\d)`, "gi");
}

function idsIn(text: string, pattern: RegExp): number[] {
  // Fresh RegExp per call so the shared pattern's lastIndex is never touched
  const { source, flags } = pattern;
  const global = new RegExp(source, flags.includes("g") ? flags : `${flags}g`);
  const ids: number[] = [];
  for (const match of text.matchAll(global)) {
    const id = Number.parseInt(match[1], 10);
    if (Number.isSafeInteger(id) && !ids.includes(id)) ids.push(id);
  }
  return ids;
}

/**
 * First +1, -1 or 0 on a line that is not quoted (no ">" in its first ten
 * characters), or null when the body casts no vote.
 */
export function parseVote(body: string): Vote | null {
  for (const line of body.split(/\r?\n/)) {
    if (line.slice(0, 10).includes(">")) continue;
    const padded = ` ${line} `;
    if (padded.includes(" +1 ")) return "+1";
    if (padded.includes(" -1 ")) return "-1";
    if (padded.includes(" 0 ")) return "0";
  }
  return null;
}

/**
 * Proposals referenced by a message, with how each was referenced.
 *
 * IDs in the subject are "subject" mentions; in a subject tagged VOTE they
 * are also "vote" mentions carrying the vote read from the body, otherwise
 * in one tagged DISCUSS they are "discuss" mentions. IDs in the body are
 * "body" mentions. Subject IDs come first, in order of appearance.
 */
export function classifyMentions(
  message: Pick<Message, "subject" | "body">,
  universe: ProposalUniverse
): ProposalMention[] {
  const mentions = new Map<number, ProposalMention>();
  const tag = (proposalId: number, type: MentionType): ProposalMention => {
    let mention = mentions.get(proposalId);
    if (!mention) {
      mention = { proposalId, types: [], vote: null };
      mentions.set(proposalId, mention);
    }
    if (!mention.types.includes(type)) mention.types.push(type);
    return mention;
  };

  const isVote = message.subject.includes("VOTE");
  const isDiscuss = !isVote && message.subject.includes("DISCUSS");
  const vote = isVote ? parseVote(message.body) : null;

  for (const id of idsIn(message.subject, universe.pattern)) {
    tag(id, "subject");
    if (isVote) tag(id, "vote").vote = vote;
    if (isDiscuss) tag(id, "discuss");
  }
  for (const id of idsIn(message.body, universe.pattern)) {
    tag(id, "body");
  }

  for (const mention of mentions.values()) {
    mention.types.sort((a, b) => TYPE_ORDER.indexOf(a) - TYPE_ORDER.indexOf(b));
  }
  return Array.from(mentions.values());
}

export function mentionEvents(
  message: Pick<Message, "id" | "threadId" | "timestamp" | "sender">,
  mentions: Iterable<ProposalMention>
): MentionEvent[] {
  return Array.from(mentions, (mention) => ({
    proposalId: mention.proposalId,
    messageId: message.id,
    threadId: message.threadId,
    timestamp: message.timestamp,
    sender: message.sender,
    types: [...mention.types],
    vote: mention.vote,
  }));
}

/**
 * First proposal ID in a page title ("KIP-500: Replace ZooKeeper ..."),
 * or null when the title names none.
 */
export function proposalIdFromTitle(title: string, pattern: RegExp): number | null {
  const match = new RegExp(pattern.source, pattern.flags.replace("g", "")).exec(title);
  if (!match) return null;
  const id = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(id) ? id : null;
}
