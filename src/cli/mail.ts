import { fetchSegments } from "../core/archive.js";
import { getSegmentRecords, recordSegment } from "../core/db.js";
import { DEFAULT_INIT_DAYS, scanSegments } from "../core/pipeline.js";
import { archiveFor, openWorkspace, type GlobalOptions } from "./util.js";

/**
 * Download archive segments for the trailing `days` without touching the cache.
 */
export async function mailDownloadCommand(
  global: GlobalOptions,
  options: { days?: number; overwrite?: boolean }
): Promise<void> {
  const workspace = openWorkspace(global);
  try {
    const days = options.days ?? DEFAULT_INIT_DAYS;
    const { config } = workspace;
    console.log(`Downloading ${config.mailingList}@${config.listDomain} for the last ${days} day(s)...`);

    const now = new Date();
    const result = await fetchSegments({
      source: archiveFor(workspace),
      store: workspace.store,
      window: { days },
      now,
      overwrite: options.overwrite,
      fetchedAt: new Map(getSegmentRecords(workspace.db).map((r) => [r.period, r.fetchedAt])),
    });
    for (const segment of result.segments) {
      if (result.fetched.includes(segment.period)) {
        recordSegment(workspace.db, segment.period, Buffer.byteLength(segment.text), now.toISOString());
      }
    }

    console.log(
      `\n${result.fetched.length} downloaded, ${result.reused.length} already stored, ${result.failed.length} failed.`
    );
    for (const failure of result.failed) {
      console.warn(`  ${failure.period}: ${failure.reason}`);
    }
  } finally {
    workspace.db.close();
  }
}

/**
 * Parse every stored segment and print mention counts. Dry run: the cache
 * and merge ledger are left alone.
 */
export function mailProcessCommand(global: GlobalOptions): void {
  const workspace = openWorkspace(global);
  try {
    const periods = workspace.store.list();
    if (periods.length === 0) {
      console.log("No stored segments. Run `ipmentions mail download` first.");
      return;
    }

    console.log(`Processing ${periods.length} stored segment(s)...`);
    const segments = periods.map((period) => workspace.store.read(period));
    const scan = scanSegments(segments, { pattern: workspace.pattern });
    const records = scan.accumulator.toRecords();

    console.log(`\n${scan.messages} message(s), ${scan.skippedEntries} skipped, ${scan.mentions} mention(s).`);
    if (records.length === 0) return;

    console.log();
    for (const r of records) {
      console.log(
        `  ${workspace.config.proposalPrefix}-${r.proposalId}: ${r.mentionCount} mention(s) ` +
          `in ${r.distinctThreadCount} thread(s), ${r.firstSeen} .. ${r.lastSeen}`
      );
    }
  } finally {
    workspace.db.close();
  }
}
