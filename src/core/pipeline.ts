import type Database from "better-sqlite3";
import { existsSync } from "fs";
import { v4 as uuidv4 } from "uuid";
import { MentionAccumulator, aggregateMentions } from "./aggregator.js";
import { fetchSegments, type ArchiveSource } from "./archive.js";
import { commitCache, discardStagedCache, loadCache, stageCache } from "./cache.js";
import {
  clearSegmentFailures,
  getMergedKeys,
  getMeta,
  getSegmentFailures,
  getSegmentRecords,
  ledgerKey,
  recordMentionTypes,
  recordMerged,
  recordSegment,
  recordSegmentFailures,
  recordVotes,
  resetMentionState,
  setMeta,
  type LedgerEntry,
} from "./db.js";
import { classifyMentions, mentionEvents, type ProposalUniverse } from "./extractor.js";
import { acquireLock } from "./lock.js";
import { latestMention, mergeCache } from "./merge.js";
import { messagesOf } from "./parsers/mbox.js";
import { periodOf, periodStart, subtractDays, windowStart } from "./periods.js";
import type { SegmentStore } from "./segments.js";
import { loadProposals, type ProposalSource } from "./wiki.js";
import type { ArchiveSegment, Cache, MentionEvent, RunMode, RunSummary, Window } from "../types.js";

export const DEFAULT_INIT_DAYS = 365;

/** How far before the latest recorded mention an update run starts reading */
export const UPDATE_SAFETY_MARGIN_DAYS = 2;

/**
 * Everything a run touches, passed in explicitly. The cache file is read
 * once at the start of a run and replaced once at the end.
 */
export interface PipelineContext {
  db: Database.Database;
  store: SegmentStore;
  cachePath: string;
  archive: ArchiveSource;
  proposals: ProposalSource;
  proposalPattern: RegExp;
  now?: () => Date;
}

export interface RunOptions {
  mode: RunMode;
  /** Trailing days covered by an init run */
  days?: number;
  /** Re-download stored segments too */
  overwrite?: boolean;
}

export interface ScanResult {
  accumulator: MentionAccumulator;
  /** New events, in archive order */
  events: MentionEvent[];
  ledger: LedgerEntry[];
  messages: number;
  skippedEntries: number;
  mentions: number;
  duplicateMentions: number;
  unknownProposalMentions: number;
}

/**
 * Parse segments, extract mentions and fold them into one accumulator.
 * Events whose `ledgerKey` is in `merged` were merged by an earlier run;
 * events repeated within this scan (the same message archived twice) are
 * always dropped.
 */
export function scanSegments(
  segments: Iterable<ArchiveSegment>,
  universe: ProposalUniverse,
  merged: ReadonlySet<string> = new Set()
): ScanResult {
  const result: ScanResult = {
    accumulator: new MentionAccumulator(),
    events: [],
    ledger: [],
    messages: 0,
    skippedEntries: 0,
    mentions: 0,
    duplicateMentions: 0,
    unknownProposalMentions: 0,
  };
  const seen = new Set<string>();

  for (const segment of segments) {
    let segmentMessages = 0;
    const segmentEvents: MentionEvent[] = [];

    const messages = messagesOf(segment, (error) => {
      result.skippedEntries++;
      console.warn(`  Skipping ${error.message}`);
    });

    for (const message of messages) {
      segmentMessages++;
      for (const event of mentionEvents(message, classifyMentions(message, universe))) {
        const key = ledgerKey(event.messageId, event.proposalId);
        if (seen.has(key) || merged.has(key)) {
          result.duplicateMentions++;
          continue;
        }
        seen.add(key);
        segmentEvents.push(event);
        result.ledger.push({
          messageId: event.messageId,
          proposalId: event.proposalId,
          period: segment.period,
        });
        if (universe.known && !universe.known.has(event.proposalId)) {
          result.unknownProposalMentions++;
        }
      }
    }

    result.accumulator.merge(aggregateMentions(segmentEvents));
    result.events.push(...segmentEvents);
    result.messages += segmentMessages;
    result.mentions += segmentEvents.length;
    console.log(`  ${segment.period}: ${segmentMessages} message(s), ${segmentEvents.length} new mention(s)`);
  }

  return result;
}

/**
 * Where an update run starts: the safety margin before the earliest of the
 * latest recorded mention, the end of the last run and `now`. A mention
 * dated in the future therefore cannot push the window past the present.
 * The window reaches back further to the start of the oldest period whose
 * download failed and has not succeeded since.
 * Overlap with merged data is expected and removed by the merge ledger.
 */
export function updateWindow(cache: Cache, db: Database.Database, now: Date): Window {
  const candidates = [latestMention(cache), getMeta(db, "processed_through")]
    .filter((value): value is string => value !== null)
    .map((value) => Date.parse(value))
    .filter((time) => !Number.isNaN(time));
  if (candidates.length === 0) {
    throw new Error("Nothing processed yet. Run `ipmentions init` first.");
  }

  const watermark = Math.min(...candidates, now.getTime());
  let since = subtractDays(new Date(watermark), UPDATE_SAFETY_MARGIN_DAYS);

  const [oldestFailure] = getSegmentFailures(db);
  if (oldestFailure) {
    const retryFrom = periodStart(oldestFailure.period);
    if (retryFrom.getTime() < since.getTime()) {
      console.log(`  Retrying failed segments from ${oldestFailure.period}`);
      since = retryFrom;
    }
  }
  return { since };
}

/**
 * Run the pipeline: fetch segments, parse, extract, aggregate and merge
 * into the cache. Holds the run lock for its whole duration.
 *
 * `init` rebuilds the cache and merge ledger from scratch over `days`.
 * `update` merges only mentions the ledger has not seen.
 */
export async function runPipeline(context: PipelineContext, options: RunOptions): Promise<RunSummary> {
  const runId = uuidv4();
  const lock = acquireLock(`${context.cachePath}.lock`, runId);
  try {
    return await runLocked(context, options, runId);
  } finally {
    lock.release();
  }
}

async function runLocked(context: PipelineContext, options: RunOptions, runId: string): Promise<RunSummary> {
  const { db } = context;
  const { mode } = options;
  const now = context.now?.() ?? new Date();

  let previous: Cache;
  let window: Window;
  if (mode === "init") {
    previous = new Map();
    window = { days: options.days ?? DEFAULT_INIT_DAYS };
  } else {
    if (!existsSync(context.cachePath)) {
      throw new Error(`No mention cache at ${context.cachePath}. Run \`ipmentions init\` first.`);
    }
    previous = loadCache(context.cachePath);
    window = updateWindow(previous, db, now);
  }
  const start = windowStart(window, now);

  console.log("Refreshing proposal metadata...");
  const { proposals } = await loadProposals({ source: context.proposals, db, mode });
  console.log(`  ${proposals.length} proposal(s)`);

  console.log(`Collecting archive segments since ${start.toISOString()}...`);
  const fetched = await fetchSegments({
    source: context.archive,
    store: context.store,
    window,
    now,
    overwrite: options.overwrite,
    fetchedAt: new Map(getSegmentRecords(db).map((r) => [r.period, r.fetchedAt])),
  });
  const fetchedAt = now.toISOString();
  for (const segment of fetched.segments) {
    if (fetched.fetched.includes(segment.period)) {
      recordSegment(db, segment.period, Buffer.byteLength(segment.text), fetchedAt);
    }
  }

  console.log("Extracting mentions...");
  const universe: ProposalUniverse = {
    pattern: context.proposalPattern,
    known: new Set(proposals.map((p) => p.id)),
  };
  const scan = scanSegments(
    fetched.segments,
    universe,
    mode === "update" ? getMergedKeys(db, periodOf(start)) : undefined
  );

  const merged = mergeCache(previous, scan.accumulator.toRecords());

  const staged = stageCache(context.cachePath, merged);
  try {
    db.transaction(() => {
      if (mode === "init") {
        resetMentionState(db);
        clearSegmentFailures(db);
      }
      recordMerged(db, scan.ledger, fetchedAt);
      recordMentionTypes(db, scan.events);
      recordVotes(db, scan.events);
      clearSegmentFailures(db, [...fetched.fetched, ...fetched.reused]);
      recordSegmentFailures(db, fetched.failed, fetchedAt);
      setMeta(db, "processed_through", fetchedAt);
      setMeta(db, "last_run_id", runId);
      setMeta(db, "last_run_at", fetchedAt);
      setMeta(db, "last_run_mode", mode);
      commitCache(staged, context.cachePath);
    })();
  } catch (err) {
    discardStagedCache(staged);
    throw err;
  }

  return {
    runId,
    mode,
    windowStart: start.toISOString(),
    periods: {
      fetched: fetched.fetched,
      reused: fetched.reused,
      failed: fetched.failed,
    },
    messages: scan.messages,
    skippedEntries: scan.skippedEntries,
    mentions: scan.mentions,
    duplicateMentions: scan.duplicateMentions,
    unknownProposalMentions: scan.unknownProposalMentions,
    proposals: proposals.length,
    records: merged.size,
  };
}
