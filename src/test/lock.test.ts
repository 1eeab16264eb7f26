import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { existsSync, readFileSync, readdirSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { LockHeldError } from "../core/errors.js";
import { acquireLock, reclaimStaleLock } from "../core/lock.js";
import { makeTempDir } from "./fixtures.js";

describe("run lock", () => {
  let cleanup: () => void;
  let path: string;

  beforeEach(() => {
    const tmp = makeTempDir();
    cleanup = tmp.cleanup;
    path = join(tmp.dir, "state", "mentions.csv.lock");
  });

  afterEach(() => {
    cleanup();
  });

  it("records the holder and removes the file on release", () => {
    const lock = acquireLock(path, "run-1");
    assert.equal(readFileSync(path, "utf-8"), `${process.pid} run-1\n`);
    lock.release();
    assert.ok(!existsSync(path));
  });

  it("refuses a second holder while the first is alive", () => {
    const lock = acquireLock(path, "run-1");
    assert.throws(
      () => acquireLock(path, "run-2"),
      (err: unknown) => err instanceof LockHeldError && err.message.includes(`pid ${process.pid}, run run-1`)
    );
    lock.release();
    acquireLock(path, "run-2").release();
  });

  it("reclaims a lock left by a process that is gone", () => {
    acquireLock(path, "run-1").release();
    writeFileSync(path, "999999999 old-run\n");

    const lock = acquireLock(path, "run-2");
    assert.equal(readFileSync(path, "utf-8"), `${process.pid} run-2\n`);
    lock.release();
  });

  it("reclaims a lock with unreadable contents", () => {
    acquireLock(path, "run-1").release();
    writeFileSync(path, "");

    const lock = acquireLock(path, "run-2");
    assert.equal(readFileSync(path, "utf-8"), `${process.pid} run-2\n`);
    lock.release();
  });

  it("puts back a lock taken over since it was seen to be stale", () => {
    acquireLock(path, "run-1").release();
    // Another run reclaimed the dead holder's lock and now holds it
    writeFileSync(path, `${process.pid} live-run\n`);

    assert.equal(reclaimStaleLock(path, "999999999 old-run\n", "run-2"), false);
    assert.equal(readFileSync(path, "utf-8"), `${process.pid} live-run\n`);
    assert.deepEqual(readdirSync(dirname(path)), ["mentions.csv.lock"]);
    assert.throws(() => acquireLock(path, "run-2"), LockHeldError);
  });

  it("removes the lock when it still holds the stale contents", () => {
    acquireLock(path, "run-1").release();
    writeFileSync(path, "999999999 old-run\n");

    assert.equal(reclaimStaleLock(path, "999999999 old-run\n", "run-2"), true);
    assert.deepEqual(readdirSync(dirname(path)), []);
  });

  it("reports nothing reclaimed when the lock is already gone", () => {
    acquireLock(path, "run-1").release();
    assert.equal(reclaimStaleLock(path, "999999999 old-run\n", "run-2"), false);
    assert.deepEqual(readdirSync(dirname(path)), []);
  });

  it("releases only once", () => {
    const lock = acquireLock(path, "run-1");
    lock.release();
    const next = acquireLock(path, "run-2");
    lock.release();
    assert.ok(existsSync(path));
    next.release();
  });
});
