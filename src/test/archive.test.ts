import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { join } from "path";
import { ApacheMailArchive, fetchSegments } from "../core/archive.js";
import { FetchError } from "../core/errors.js";
import { SegmentStore } from "../core/segments.js";
import { FakeArchive, fakeHttp, makeTempDir } from "./fixtures.js";

const NOW = new Date("2024-03-15T12:00:00Z");
const WINDOW = { since: new Date("2024-01-10T00:00:00Z") };

describe("segment store", () => {
  let cleanup: () => void;
  let store: SegmentStore;

  beforeEach(() => {
    const tmp = makeTempDir();
    cleanup = tmp.cleanup;
    store = new SegmentStore(join(tmp.dir, "archives"), "dev");
  });

  afterEach(() => {
    cleanup();
  });

  it("names files by list and period", () => {
    assert.equal(store.pathFor("2024-03"), join(store.dir, "dev-2024-03.mbox"));
    assert.throws(() => store.pathFor("../x"), /Invalid archive period/);
  });

  it("writes, reads and lists segments in period order", () => {
    assert.deepEqual(store.list(), []);
    store.write({ period: "2024-03", text: "march" });
    store.write({ period: "2023-12", text: "december" });
    assert.ok(store.has("2024-03"));
    assert.ok(!store.has("2024-02"));
    assert.deepEqual(store.read("2023-12"), { period: "2023-12", text: "december" });
    assert.deepEqual(store.list(), ["2023-12", "2024-03"]);
  });

  describe("fetchSegments", () => {
    it("reuses stored months and downloads the rest", async () => {
      store.write({ period: "2024-01", text: "stored january" });
      const archive = new FakeArchive({ "2024-02": "february", "2024-03": "march" });

      const result = await fetchSegments({ source: archive, store, window: WINDOW, now: NOW });

      assert.deepEqual(archive.calls, ["2024-02", "2024-03"]);
      assert.deepEqual(result.reused, ["2024-01"]);
      assert.deepEqual(result.fetched, ["2024-02", "2024-03"]);
      assert.deepEqual(result.failed, []);
      assert.deepEqual(
        result.segments.map((s) => s.text),
        ["stored january", "february", "march"]
      );
      assert.equal(store.read("2024-02").text, "february");
    });

    it("always downloads the current month again", async () => {
      store.write({ period: "2024-03", text: "early march" });
      const archive = new FakeArchive({ "2024-03": "all of march" });

      const result = await fetchSegments({ source: archive, store, window: { days: 0 }, now: NOW });

      assert.deepEqual(result.fetched, ["2024-03"]);
      assert.equal(store.read("2024-03").text, "all of march");
    });

    it("downloads a month again when it was stored before the month ended", async () => {
      store.write({ period: "2024-01", text: "january so far" });
      store.write({ period: "2024-02", text: "all of february" });
      const archive = new FakeArchive({ "2024-01": "all of january", "2024-03": "march" });
      const fetchedAt = new Map([
        ["2024-01", "2024-01-20T12:00:00.000Z"],
        ["2024-02", "2024-03-01T00:00:00.000Z"],
      ]);

      const result = await fetchSegments({ source: archive, store, window: WINDOW, now: NOW, fetchedAt });

      assert.deepEqual(archive.calls, ["2024-01", "2024-03"]);
      assert.deepEqual(result.reused, ["2024-02"]);
      assert.equal(store.read("2024-01").text, "all of january");
    });

    it("downloads everything when overwriting", async () => {
      store.write({ period: "2024-01", text: "stale" });
      const archive = new FakeArchive();
      const result = await fetchSegments({ source: archive, store, window: WINDOW, now: NOW, overwrite: true });
      assert.deepEqual(result.fetched, ["2024-01", "2024-02", "2024-03"]);
      assert.deepEqual(result.reused, []);
    });

    it("skips a failed month and keeps going", async () => {
      const archive = new FakeArchive({ "2024-01": "january", "2024-03": "march" });
      archive.failures.add("2024-02");

      const result = await fetchSegments({ source: archive, store, window: WINDOW, now: NOW });

      assert.deepEqual(result.failed, [{ period: "2024-02", reason: "archive unavailable for 2024-02" }]);
      assert.deepEqual(
        result.segments.map((s) => s.period),
        ["2024-01", "2024-03"]
      );
      assert.ok(!store.has("2024-02"));
    });
  });
});

describe("ApacheMailArchive", () => {
  const options = { baseUrl: "https://lists.example.org/api/mbox.lua", list: "dev", domain: "kafka.apache.org" };

  it("requests one month of mbox", async () => {
    const { http, urls } = fakeHttp(() => new Response("mbox text"));
    const archive = new ApacheMailArchive(http, options);

    assert.equal(await archive.fetchSegment("2024-03"), "mbox text");
    assert.deepEqual(urls, ["https://lists.example.org/api/mbox.lua?list=dev&domain=kafka.apache.org&d=2024-3"]);
  });

  it("retries server errors with backoff", async () => {
    const sleeps: number[] = [];
    let calls = 0;
    const { http } = fakeHttp(() => {
      calls++;
      return calls === 1 ? new Response("busy", { status: 503 }) : new Response("mbox text");
    }, sleeps);

    assert.equal(await new ApacheMailArchive(http, options).fetchSegment("2024-03"), "mbox text");
    assert.equal(calls, 2);
    assert.deepEqual(sleeps, [2000]);
  });

  it("fails at once on a client error, tagged with the period", async () => {
    let calls = 0;
    const { http } = fakeHttp(() => {
      calls++;
      return new Response("missing", { status: 404, statusText: "Not Found" });
    });

    await assert.rejects(
      new ApacheMailArchive(http, options).fetchSegment("2024-03"),
      (err: unknown) =>
        err instanceof FetchError &&
        err.period === "2024-03" &&
        err.status === 404 &&
        err.message.startsWith("Could not download dev@kafka.apache.org 2024-03: HTTP 404 Not Found")
    );
    assert.equal(calls, 1);
  });

  it("gives up after the last retry", async () => {
    const sleeps: number[] = [];
    const { http } = fakeHttp(() => new Response("busy", { status: 500 }), sleeps);

    await assert.rejects(new ApacheMailArchive(http, options).fetchSegment("2024-03"), /HTTP 500/);
    assert.deepEqual(sleeps, [2000, 4000, 8000]);
  });
});
