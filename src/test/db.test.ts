import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import type Database from "better-sqlite3";
import {
  clearSegmentFailures,
  countMerged,
  getMentionTypes,
  getMergedKeys,
  getMeta,
  getProposals,
  getSegmentFailures,
  getSegmentRecords,
  getVoteTallies,
  ledgerKey,
  openDatabase,
  recordMentionTypes,
  recordMerged,
  recordSegment,
  recordSegmentFailures,
  recordVotes,
  replaceProposals,
  resetMentionState,
  setMeta,
} from "../core/db.js";
import type { MentionEvent } from "../types.js";
import { makeProposal } from "./fixtures.js";

function makeEvent(overrides: Partial<MentionEvent> = {}): MentionEvent {
  return {
    proposalId: 500,
    messageId: "m1@example.org",
    threadId: "subject:[vote] kip-500",
    timestamp: "2024-03-11T10:00:00.000Z",
    sender: "Alice <alice@example.org>",
    types: ["subject", "vote"],
    vote: "+1",
    ...overrides,
  };
}

describe("db", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("stores and overwrites meta values", () => {
    assert.equal(getMeta(db, "processed_through"), null);
    setMeta(db, "processed_through", "2024-03-20T12:00:00.000Z");
    setMeta(db, "processed_through", "2024-04-02T12:00:00.000Z");
    assert.equal(getMeta(db, "processed_through"), "2024-04-02T12:00:00.000Z");
  });

  it("replaces the whole proposal set", () => {
    replaceProposals(db, [makeProposal(), makeProposal({ id: 501, title: "KIP-501", status: "unknown" })]);
    const full = makeProposal({
      id: 12,
      title: "KIP-12",
      status: "under discussion",
      webUrl: "https://wiki.example.org/KIP-12",
      jira: "https://issues.example.org/KAFKA-1",
      createdAt: "2014-01-01T00:00:00.000Z",
      lastModifiedAt: "2015-01-01T00:00:00.000Z",
    });
    replaceProposals(db, [makeProposal(), full]);

    assert.deepEqual(getProposals(db), [full, makeProposal()]);
  });

  it("upserts segment records", () => {
    recordSegment(db, "2024-03", 100, "2024-03-20T12:00:00.000Z");
    recordSegment(db, "2024-03", 250, "2024-04-02T12:00:00.000Z");
    recordSegment(db, "2024-02", 50, "2024-03-20T12:00:00.000Z");
    assert.deepEqual(getSegmentRecords(db), [
      { period: "2024-02", fetchedAt: "2024-03-20T12:00:00.000Z", bytes: 50 },
      { period: "2024-03", fetchedAt: "2024-04-02T12:00:00.000Z", bytes: 250 },
    ]);
  });

  describe("segment failures", () => {
    it("keeps the latest reason per period, oldest period first", () => {
      recordSegmentFailures(db, [{ period: "2024-04", reason: "timeout" }], "2024-04-02T12:00:00.000Z");
      recordSegmentFailures(
        db,
        [
          { period: "2024-02", reason: "HTTP 503" },
          { period: "2024-04", reason: "HTTP 500" },
        ],
        "2024-04-03T12:00:00.000Z"
      );
      assert.deepEqual(getSegmentFailures(db), [
        { period: "2024-02", reason: "HTTP 503" },
        { period: "2024-04", reason: "HTTP 500" },
      ]);
    });

    it("clears the named periods, or all", () => {
      recordSegmentFailures(db, [
        { period: "2024-02", reason: "HTTP 503" },
        { period: "2024-03", reason: "HTTP 503" },
      ]);
      clearSegmentFailures(db, ["2024-03", "2024-05"]);
      assert.deepEqual(getSegmentFailures(db), [{ period: "2024-02", reason: "HTTP 503" }]);
      clearSegmentFailures(db);
      assert.deepEqual(getSegmentFailures(db), []);
    });
  });

  describe("merge ledger", () => {
    it("records each (message, proposal) pair once", () => {
      const entry = { messageId: "m1@example.org", proposalId: 500, period: "2024-03" };
      recordMerged(db, [entry, { ...entry, proposalId: 501 }]);
      recordMerged(db, [entry]);

      assert.equal(countMerged(db), 2);
    });

    it("loads the keys merged from a period onward in one set", () => {
      recordMerged(db, [
        { messageId: "m1@example.org", proposalId: 500, period: "2024-02" },
        { messageId: "m2@example.org", proposalId: 500, period: "2024-03" },
        { messageId: "m3@example.org", proposalId: 501, period: "2024-04" },
      ]);
      assert.deepEqual(
        getMergedKeys(db, "2024-03"),
        new Set([ledgerKey("m2@example.org", 500), ledgerKey("m3@example.org", 501)])
      );
      assert.equal(getMergedKeys(db, "2024-05").size, 0);
    });

    it("keeps message ID and proposal ID apart in the key", () => {
      assert.notEqual(ledgerKey("m1", 15), ledgerKey("m11", 5));
    });

    it("is cleared with the rest of the mention state", () => {
      recordMerged(db, [{ messageId: "m1@example.org", proposalId: 500, period: "2024-03" }]);
      recordMentionTypes(db, [makeEvent()]);
      recordVotes(db, [makeEvent()]);
      resetMentionState(db);
      assert.equal(countMerged(db), 0);
      assert.equal(getMentionTypes(db).size, 0);
      assert.equal(getVoteTallies(db).size, 0);
    });
  });

  describe("mention types", () => {
    it("keeps the latest date of each type", () => {
      recordMentionTypes(db, [
        makeEvent({ timestamp: "2024-03-12T10:00:00.000Z" }),
        makeEvent({ messageId: "m2@example.org", types: ["body"], vote: null }),
      ]);
      recordMentionTypes(db, [
        makeEvent({ messageId: "m3@example.org", timestamp: "2024-03-05T10:00:00.000Z", types: ["subject"], vote: null }),
        makeEvent({ proposalId: 501, types: ["discuss"], vote: null }),
      ]);

      assert.deepEqual(
        getMentionTypes(db),
        new Map([
          [500, { subject: "2024-03-12T10:00:00.000Z", vote: "2024-03-12T10:00:00.000Z", body: "2024-03-11T10:00:00.000Z" }],
          [501, { discuss: "2024-03-11T10:00:00.000Z" }],
        ])
      );
    });
  });

  describe("votes", () => {
    it("tallies each sender's latest vote", () => {
      recordVotes(db, [
        makeEvent(),
        makeEvent({ messageId: "m2@example.org", sender: "Bob <bob@example.org>", vote: "0" }),
        makeEvent({ messageId: "m3@example.org", timestamp: "2024-03-13T10:00:00.000Z", vote: "-1" }),
      ]);
      // An older message read later does not overwrite a newer vote
      recordVotes(db, [makeEvent({ messageId: "m0@example.org", timestamp: "2024-03-01T10:00:00.000Z", vote: "+1" })]);

      assert.deepEqual(
        getVoteTallies(db),
        new Map([[500, { "+1": [], "0": ["Bob <bob@example.org>"], "-1": ["Alice <alice@example.org>"] }]])
      );
    });

    it("ignores events that cast no vote", () => {
      recordVotes(db, [
        makeEvent({ vote: null }),
        makeEvent({ messageId: "m2@example.org", types: ["body"], vote: "+1" }),
      ]);
      assert.equal(getVoteTallies(db).size, 0);
    });
  });
});
