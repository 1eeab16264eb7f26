import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import { CacheCorruptError, MergeInvariantViolation } from "./errors.js";
import { assertRecordInvariants } from "./merge.js";
import type { Cache, MentionRecord } from "../types.js";

export const CACHE_COLUMNS = [
  "proposal_id",
  "mention_count",
  "distinct_thread_count",
  "first_seen",
  "last_seen",
] as const;

const count = z.string().regex(/^\d+$/, "expected a non-negative integer").transform(Number);
const timestamp = z
  .string()
  .transform((value, ctx) => {
    if (value === "") return null;
    const ms = Date.parse(value);
    if (!/^\d{4}-\d{2}-\d{2}T/.test(value) || Number.isNaN(ms)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid ISO-8601 timestamp "${value}"` });
      return z.NEVER;
    }
    return new Date(ms).toISOString();
  });

const RowSchema = z.tuple([count, count, count, timestamp, timestamp]);

/**
 * Load the mention cache. A missing file is an empty cache (first run);
 * anything unreadable is a CacheCorruptError.
 */
export function loadCache(path: string): Cache {
  const cache: Cache = new Map();
  if (!existsSync(path)) return cache;

  const lines = readFileSync(path, "utf-8").split(/\r?\n/);
  if (lines[0]?.trim() !== CACHE_COLUMNS.join(",")) {
    throw new CacheCorruptError(`unexpected header "${lines[0] ?? ""}"`, path, 1);
  }

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    const lineNo = i + 1;

    const parsed = RowSchema.safeParse(line.split(","));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue.path.length > 0 ? `${CACHE_COLUMNS[Number(issue.path[0])] ?? "row"}: ` : "";
      throw new CacheCorruptError(`${where}${issue.message}`, path, lineNo);
    }

    const [proposalId, mentionCount, distinctThreadCount, firstSeen, lastSeen] = parsed.data;
    if (cache.has(proposalId)) {
      throw new CacheCorruptError(`duplicate proposal ${proposalId}`, path, lineNo);
    }

    const record: MentionRecord = { proposalId, mentionCount, distinctThreadCount, firstSeen, lastSeen };
    try {
      assertRecordInvariants(record);
    } catch (err) {
      if (err instanceof MergeInvariantViolation) {
        throw new CacheCorruptError(err.message, path, lineNo);
      }
      throw err;
    }
    cache.set(proposalId, record);
  }

  return cache;
}

export function serializeCache(cache: Cache): string {
  const rows = Array.from(cache.values())
    .sort((a, b) => a.proposalId - b.proposalId)
    .map((r) =>
      [r.proposalId, r.mentionCount, r.distinctThreadCount, r.firstSeen ?? "", r.lastSeen ?? ""].join(",")
    );
  return [CACHE_COLUMNS.join(","), ...rows].join("\n") + "\n";
}

/**
 * Write the cache beside its target and return the temp path. Nothing is
 * replaced until `commitCache` renames it.
 */
export function stageCache(path: string, cache: Cache): string {
  mkdirSync(dirname(path), { recursive: true });
  const tmp = `${path}.${process.pid}.tmp`;
  writeFileSync(tmp, serializeCache(cache), "utf-8");
  return tmp;
}

export function commitCache(tmpPath: string, path: string): void {
  renameSync(tmpPath, path);
}

export function discardStagedCache(tmpPath: string): void {
  rmSync(tmpPath, { force: true });
}
