import { existsSync, mkdirSync, readdirSync, readFileSync, renameSync, writeFileSync } from "fs";
import { join } from "path";
import { parsePeriod } from "./periods.js";
import type { ArchiveSegment } from "../types.js";

/**
 * Directory of downloaded archive segments, one `<list>-YYYY-MM.mbox` file
 * per period. Passed explicitly to the fetcher and the pipeline; nothing is
 * cached in memory between calls.
 */
export class SegmentStore {
  readonly dir: string;
  private readonly listName: string;

  constructor(dir: string, list: string) {
    this.dir = dir;
    this.listName = list;
  }

  pathFor(period: string): string {
    parsePeriod(period);
    return join(this.dir, `${this.listName}-${period}.mbox`);
  }

  has(period: string): boolean {
    return existsSync(this.pathFor(period));
  }

  read(period: string): ArchiveSegment {
    return { period, text: readFileSync(this.pathFor(period), "utf-8") };
  }

  /** Write a segment atomically (temp file + rename). */
  write(segment: ArchiveSegment): void {
    mkdirSync(this.dir, { recursive: true });
    const target = this.pathFor(segment.period);
    const tmp = `${target}.${process.pid}.tmp`;
    writeFileSync(tmp, segment.text, "utf-8");
    renameSync(tmp, target);
  }

  /** Stored periods in chronological order. */
  list(): string[] {
    if (!existsSync(this.dir)) return [];
    const prefix = `${this.listName}-`;
    return readdirSync(this.dir)
      .filter((name) => name.startsWith(prefix) && name.endsWith(".mbox"))
      .map((name) => name.slice(prefix.length, -".mbox".length))
      .filter((period) => /^\d{4}-\d{2}$/.test(period))
      .sort();
  }
}
