import { MergeInvariantViolation } from "./errors.js";
import type { Cache, MentionRecord } from "../types.js";

/**
 * Check mentionCount >= distinctThreadCount >= 0 and, when there are
 * mentions, firstSeen <= lastSeen.
 */
export function assertRecordInvariants(record: MentionRecord): void {
  const { proposalId, mentionCount, distinctThreadCount, firstSeen, lastSeen } = record;

  if (!Number.isInteger(mentionCount) || !Number.isInteger(distinctThreadCount)) {
    throw new MergeInvariantViolation(proposalId, "counts must be whole numbers");
  }
  if (distinctThreadCount < 0) {
    throw new MergeInvariantViolation(proposalId, `negative thread count ${distinctThreadCount}`);
  }
  if (mentionCount < distinctThreadCount) {
    throw new MergeInvariantViolation(
      proposalId,
      `mention count ${mentionCount} is below thread count ${distinctThreadCount}`
    );
  }
  if (mentionCount > 0) {
    if (firstSeen === null || lastSeen === null) {
      throw new MergeInvariantViolation(proposalId, "mentions without first/last seen timestamps");
    }
    if (lastSeen < firstSeen) {
      throw new MergeInvariantViolation(proposalId, `last seen ${lastSeen} precedes first seen ${firstSeen}`);
    }
  }
}

function earliest(a: string | null, b: string | null): string | null {
  if (a === null) return b;
  if (b === null) return a;
  return a < b ? a : b;
}

function latest(a: string | null, b: string | null): string | null {
  if (a === null) return b;
  if (b === null) return a;
  return a > b ? a : b;
}

/**
 * Fold a window's fresh records into the previous cache.
 *
 * Counts add up, firstSeen takes the earlier and lastSeen the later of both
 * sides. Proposals missing from `fresh` carry over unchanged. Neither input
 * is mutated.
 *
 * The caller must make sure `fresh` covers mentions not yet merged into
 * `previous`; this function cannot tell a repeated window from a new one.
 */
export function mergeCache(previous: Cache, fresh: Iterable<MentionRecord>): Cache {
  const next: Cache = new Map();
  for (const [proposalId, record] of previous) {
    next.set(proposalId, { ...record });
  }

  for (const record of fresh) {
    const old = next.get(record.proposalId);
    const merged: MentionRecord = old
      ? {
          proposalId: record.proposalId,
          mentionCount: old.mentionCount + record.mentionCount,
          distinctThreadCount: old.distinctThreadCount + record.distinctThreadCount,
          firstSeen: earliest(old.firstSeen, record.firstSeen),
          lastSeen: latest(old.lastSeen, record.lastSeen),
        }
      : { ...record };
    next.set(record.proposalId, merged);
  }

  for (const record of next.values()) {
    assertRecordInvariants(record);
  }

  return next;
}

/** Latest lastSeen over the whole cache, or null when nothing is dated. */
export function latestMention(cache: Cache): string | null {
  let result: string | null = null;
  for (const record of cache.values()) {
    result = latest(result, record.lastSeen);
  }
  return result;
}
