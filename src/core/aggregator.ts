import type { MentionEvent, MentionRecord } from "../types.js";

interface Tally {
  count: number;
  threads: Set<string>;
  firstSeen: string;
  lastSeen: string;
}

/**
 * Folds mention events into per-proposal statistics.
 *
 * `add` and `merge` are commutative and associative: segments can be
 * accumulated in any order, or separately and then merged.
 */
export class MentionAccumulator {
  private tallies = new Map<number, Tally>();

  add(event: MentionEvent): void {
    const tally = this.tallies.get(event.proposalId);
    if (!tally) {
      this.tallies.set(event.proposalId, {
        count: 1,
        threads: new Set([event.threadId]),
        firstSeen: event.timestamp,
        lastSeen: event.timestamp,
      });
      return;
    }

    tally.count++;
    tally.threads.add(event.threadId);
    if (event.timestamp < tally.firstSeen) tally.firstSeen = event.timestamp;
    if (event.timestamp > tally.lastSeen) tally.lastSeen = event.timestamp;
  }

  merge(other: MentionAccumulator): void {
    for (const [proposalId, theirs] of other.tallies) {
      const ours = this.tallies.get(proposalId);
      if (!ours) {
        this.tallies.set(proposalId, { ...theirs, threads: new Set(theirs.threads) });
        continue;
      }
      ours.count += theirs.count;
      for (const thread of theirs.threads) ours.threads.add(thread);
      if (theirs.firstSeen < ours.firstSeen) ours.firstSeen = theirs.firstSeen;
      if (theirs.lastSeen > ours.lastSeen) ours.lastSeen = theirs.lastSeen;
    }
  }

  get size(): number {
    return this.tallies.size;
  }

  /** One record per observed proposal, sorted by proposal ID. */
  toRecords(): MentionRecord[] {
    return Array.from(this.tallies, ([proposalId, tally]) => ({
      proposalId,
      mentionCount: tally.count,
      distinctThreadCount: tally.threads.size,
      firstSeen: tally.firstSeen,
      lastSeen: tally.lastSeen,
    })).sort((a, b) => a.proposalId - b.proposalId);
  }
}

/** Single reduction pass over a batch of events, such as one segment's. */
export function aggregateMentions(events: Iterable<MentionEvent>): MentionAccumulator {
  const accumulator = new MentionAccumulator();
  for (const event of events) accumulator.add(event);
  return accumulator;
}
