import { closeSync, linkSync, mkdirSync, openSync, readFileSync, renameSync, rmSync, writeSync } from "fs";
import { dirname } from "path";
import { LockHeldError, errnoCode } from "./errors.js";

export interface RunLock {
  path: string;
  release(): void;
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return errnoCode(err) === "EPERM";
  }
}

interface LockHolder {
  pid: number;
  runId: string;
}

/** Lock file contents, or null when there is no lock file. */
function readLock(path: string): string | null {
  try {
    return readFileSync(path, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return null;
    throw err;
  }
}

function parseHolder(text: string): LockHolder | null {
  const [pid, runId] = text.trim().split(/\s+/);
  const parsed = Number.parseInt(pid ?? "", 10);
  return Number.isInteger(parsed) ? { pid: parsed, runId: runId ?? "unknown" } : null;
}

/**
 * Remove a lock file whose contents were seen to be `staleText`. The file
 * is first renamed to a name only this run uses, so of several runs
 * reclaiming the same lock only one moves it. If what was moved is no
 * longer the stale lock it is linked back in place (never over a newer
 * lock). Returns whether the stale lock was removed.
 */
export function reclaimStaleLock(path: string, staleText: string, runId: string): boolean {
  const moved = `${path}.${process.pid}.${runId}.stale`;
  try {
    renameSync(path, moved);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return false;
    throw err;
  }

  try {
    if (readLock(moved) === staleText) return true;
    try {
      linkSync(moved, path);
    } catch (err) {
      if (errnoCode(err) !== "EEXIST") throw err;
    }
    return false;
  } finally {
    rmSync(moved, { force: true });
  }
}

/**
 * Take the exclusive run lock by creating `path` with O_EXCL. A lock whose
 * owning process is gone is reclaimed.
 */
export function acquireLock(path: string, runId: string): RunLock {
  mkdirSync(dirname(path), { recursive: true });

  for (let attempt = 0; attempt < 3; attempt++) {
    let fd: number;
    try {
      fd = openSync(path, "wx");
    } catch (err) {
      if (errnoCode(err) !== "EEXIST") throw err;
      const text = readLock(path);
      if (text === null) continue;
      const holder = parseHolder(text);
      if (holder && isAlive(holder.pid)) {
        throw new LockHeldError(path, `pid ${holder.pid}, run ${holder.runId}`);
      }
      if (reclaimStaleLock(path, text, runId)) {
        console.warn(`  Removed stale lock ${path}`);
      }
      continue;
    }

    writeSync(fd, `${process.pid} ${runId}\n`);
    closeSync(fd);

    let released = false;
    return {
      path,
      release() {
        if (released) return;
        released = true;
        rmSync(path, { force: true });
      },
    };
  }

  throw new LockHeldError(path, "lock was re-created while reclaiming it");
}
