import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import type { MentionEvent, MentionType, Proposal, ProposalStatus, SegmentFailure, Vote } from "../types.js";

export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  initSchema(db);
  return db;
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS proposals (
      id INTEGER PRIMARY KEY,
      title TEXT NOT NULL,
      status TEXT NOT NULL,
      author TEXT NOT NULL,
      web_url TEXT,
      jira TEXT,
      created_at TEXT,
      last_modified_at TEXT
    );

    CREATE TABLE IF NOT EXISTS segments (
      period TEXT PRIMARY KEY,
      fetched_at TEXT NOT NULL,
      bytes INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS merged_mentions (
      message_id TEXT NOT NULL,
      proposal_id INTEGER NOT NULL,
      period TEXT NOT NULL,
      merged_at TEXT NOT NULL,
      PRIMARY KEY (message_id, proposal_id)
    );

    CREATE TABLE IF NOT EXISTS failed_segments (
      period TEXT PRIMARY KEY,
      reason TEXT NOT NULL,
      failed_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS mention_types (
      proposal_id INTEGER NOT NULL,
      mention_type TEXT NOT NULL,
      last_seen TEXT NOT NULL,
      PRIMARY KEY (proposal_id, mention_type)
    );

    CREATE TABLE IF NOT EXISTS votes (
      proposal_id INTEGER NOT NULL,
      sender TEXT NOT NULL,
      vote TEXT NOT NULL,
      cast_at TEXT NOT NULL,
      message_id TEXT NOT NULL,
      PRIMARY KEY (proposal_id, sender)
    );
  `);
}

// -- Meta operations --

export function getMeta(db: Database.Database, key: string): string | null {
  const row = db.prepare("SELECT value FROM meta WHERE key = ?").get(key) as
    | { value: string }
    | undefined;
  return row?.value ?? null;
}

export function setMeta(
  db: Database.Database,
  key: string,
  value: string
): void {
  db.prepare(
    "INSERT INTO meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value"
  ).run(key, value);
}

// -- Proposal operations --

/**
 * Replace the stored proposal set with a fresh full refresh.
 */
export function replaceProposals(db: Database.Database, proposals: Proposal[]): void {
  const insert = db.prepare(
    `INSERT INTO proposals (id, title, status, author, web_url, jira, created_at, last_modified_at)
     VALUES (@id, @title, @status, @author, @web_url, @jira, @created_at, @last_modified_at)`
  );
  db.transaction(() => {
    db.prepare("DELETE FROM proposals").run();
    for (const p of proposals) {
      insert.run({
        id: p.id,
        title: p.title,
        status: p.status,
        author: p.author,
        web_url: p.webUrl ?? null,
        jira: p.jira ?? null,
        created_at: p.createdAt ?? null,
        last_modified_at: p.lastModifiedAt ?? null,
      });
    }
  })();
}

interface ProposalRow {
  id: number;
  title: string;
  status: string;
  author: string;
  web_url: string | null;
  jira: string | null;
  created_at: string | null;
  last_modified_at: string | null;
}

export function getProposals(db: Database.Database): Proposal[] {
  const rows = db
    .prepare("SELECT * FROM proposals ORDER BY id")
    .all() as ProposalRow[];
  return rows.map(rowToProposal);
}

// -- Segment operations --

export function recordSegment(
  db: Database.Database,
  period: string,
  bytes: number,
  fetchedAt: string = new Date().toISOString()
): void {
  db.prepare(
    `INSERT INTO segments (period, fetched_at, bytes) VALUES (?, ?, ?)
     ON CONFLICT(period) DO UPDATE SET fetched_at = excluded.fetched_at, bytes = excluded.bytes`
  ).run(period, fetchedAt, bytes);
}

export interface SegmentRecord {
  period: string;
  fetchedAt: string;
  bytes: number;
}

export function getSegmentRecords(db: Database.Database): SegmentRecord[] {
  const rows = db
    .prepare("SELECT period, fetched_at, bytes FROM segments ORDER BY period")
    .all() as { period: string; fetched_at: string; bytes: number }[];
  return rows.map((r) => ({ period: r.period, fetchedAt: r.fetched_at, bytes: r.bytes }));
}

/** Periods whose last download failed, oldest first. */
export function getSegmentFailures(db: Database.Database): SegmentFailure[] {
  return db
    .prepare("SELECT period, reason FROM failed_segments ORDER BY period")
    .all() as SegmentFailure[];
}

export function recordSegmentFailures(
  db: Database.Database,
  failures: SegmentFailure[],
  failedAt: string = new Date().toISOString()
): void {
  const upsert = db.prepare(
    `INSERT INTO failed_segments (period, reason, failed_at) VALUES (?, ?, ?)
     ON CONFLICT(period) DO UPDATE SET reason = excluded.reason, failed_at = excluded.failed_at`
  );
  for (const failure of failures) {
    upsert.run(failure.period, failure.reason, failedAt);
  }
}

/** Forget failures for `periods`, or all of them when none are given. */
export function clearSegmentFailures(db: Database.Database, periods?: string[]): void {
  if (periods === undefined) {
    db.prepare("DELETE FROM failed_segments").run();
    return;
  }
  const remove = db.prepare("DELETE FROM failed_segments WHERE period = ?");
  for (const period of periods) remove.run(period);
}

// -- Merge ledger --

export interface LedgerEntry {
  messageId: string;
  proposalId: number;
  period: string;
}

export function ledgerKey(messageId: string, proposalId: number): string {
  return `${messageId}\u0000${proposalId}`;
}

/** Ledger keys (see `ledgerKey`) of the mentions merged from `fromPeriod` onward. */
export function getMergedKeys(db: Database.Database, fromPeriod: string): Set<string> {
  const rows = db
    .prepare("SELECT message_id, proposal_id FROM merged_mentions WHERE period >= ?")
    .all(fromPeriod) as { message_id: string; proposal_id: number }[];
  return new Set(rows.map((row) => ledgerKey(row.message_id, row.proposal_id)));
}

export function recordMerged(
  db: Database.Database,
  entries: LedgerEntry[],
  mergedAt: string = new Date().toISOString()
): void {
  const insert = db.prepare(
    "INSERT OR IGNORE INTO merged_mentions (message_id, proposal_id, period, merged_at) VALUES (?, ?, ?, ?)"
  );
  for (const entry of entries) {
    insert.run(entry.messageId, entry.proposalId, entry.period, mergedAt);
  }
}

export function countMerged(db: Database.Database): number {
  const row = db.prepare("SELECT COUNT(*) AS n FROM merged_mentions").get() as { n: number };
  return row.n;
}

/** Drop everything derived from merged mentions, ahead of a full rebuild. */
export function resetMentionState(db: Database.Database): void {
  db.transaction(() => {
    db.prepare("DELETE FROM merged_mentions").run();
    db.prepare("DELETE FROM mention_types").run();
    db.prepare("DELETE FROM votes").run();
  })();
}

// -- Mention types and votes --

export type MentionTypeDates = Partial<Record<MentionType, string>>;

export function recordMentionTypes(db: Database.Database, events: MentionEvent[]): void {
  const upsert = db.prepare(
    `INSERT INTO mention_types (proposal_id, mention_type, last_seen) VALUES (?, ?, ?)
     ON CONFLICT(proposal_id, mention_type) DO UPDATE SET last_seen = MAX(last_seen, excluded.last_seen)`
  );
  for (const event of events) {
    for (const type of event.types) {
      upsert.run(event.proposalId, type, event.timestamp);
    }
  }
}

/** Latest mention of each type, per proposal. */
export function getMentionTypes(db: Database.Database): Map<number, MentionTypeDates> {
  const rows = db
    .prepare("SELECT proposal_id, mention_type, last_seen FROM mention_types ORDER BY proposal_id")
    .all() as { proposal_id: number; mention_type: string; last_seen: string }[];
  const result = new Map<number, MentionTypeDates>();
  for (const row of rows) {
    const type = MENTION_TYPES.find((t) => t === row.mention_type);
    if (!type) continue;
    const dates = result.get(row.proposal_id) ?? {};
    dates[type] = row.last_seen;
    result.set(row.proposal_id, dates);
  }
  return result;
}

/** Keep each sender's latest vote per proposal. */
export function recordVotes(db: Database.Database, events: MentionEvent[]): void {
  const upsert = db.prepare(
    `INSERT INTO votes (proposal_id, sender, vote, cast_at, message_id) VALUES (?, ?, ?, ?, ?)
     ON CONFLICT(proposal_id, sender) DO UPDATE SET
       vote = excluded.vote, cast_at = excluded.cast_at, message_id = excluded.message_id
     WHERE excluded.cast_at >= votes.cast_at`
  );
  for (const event of events) {
    if (event.vote === null || !event.types.includes("vote")) continue;
    upsert.run(event.proposalId, event.sender, event.vote, event.timestamp, event.messageId);
  }
}

export type VoteTally = Record<Vote, string[]>;

/** Senders per vote, per proposal. */
export function getVoteTallies(db: Database.Database): Map<number, VoteTally> {
  const rows = db
    .prepare("SELECT proposal_id, sender, vote FROM votes ORDER BY proposal_id, sender")
    .all() as { proposal_id: number; sender: string; vote: string }[];
  const result = new Map<number, VoteTally>();
  for (const row of rows) {
    const vote = VOTES.find((v) => v === row.vote);
    if (!vote) continue;
    const tally = result.get(row.proposal_id) ?? { "+1": [], "0": [], "-1": [] };
    tally[vote].push(row.sender);
    result.set(row.proposal_id, tally);
  }
  return result;
}

const MENTION_TYPES: readonly MentionType[] = ["subject", "discuss", "vote", "body"];
const VOTES: readonly Vote[] = ["+1", "0", "-1"];
const STATUSES: readonly ProposalStatus[] = ["accepted", "under discussion", "not accepted", "unknown"];

function rowToProposal(row: ProposalRow): Proposal {
  const status = STATUSES.find((s) => s === row.status) ?? "unknown";
  const proposal: Proposal = { id: row.id, title: row.title, status, author: row.author };
  if (row.web_url !== null) proposal.webUrl = row.web_url;
  if (row.jira !== null) proposal.jira = row.jira;
  if (row.created_at !== null) proposal.createdAt = row.created_at;
  if (row.last_modified_at !== null) proposal.lastModifiedAt = row.last_modified_at;
  return proposal;
}
