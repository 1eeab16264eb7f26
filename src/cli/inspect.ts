import { cachePath } from "../core/config.js";
import { loadCache } from "../core/cache.js";
import { countMerged, getMentionTypes, getMeta, getProposals, getVoteTallies } from "../core/db.js";
import { openWorkspace, type GlobalOptions } from "./util.js";

export function inspectCommand(global: GlobalOptions, options: { limit?: number }): void {
  const workspace = openWorkspace(global);
  try {
    const { config, db } = workspace;
    const cache = loadCache(cachePath(config));
    if (cache.size === 0) {
      console.log("No mentions cached. Run `ipmentions init` first.");
      return;
    }

    const proposals = new Map(getProposals(db).map((p) => [p.id, p]));
    const types = getMentionTypes(db);
    const tallies = getVoteTallies(db);
    // Most recently mentioned first; undated records last
    const records = Array.from(cache.values()).sort(
      (a, b) => (b.lastSeen ?? "").localeCompare(a.lastSeen ?? "") || a.proposalId - b.proposalId
    );
    const shown = options.limit === undefined ? records : records.slice(0, options.limit);

    const lastRun = getMeta(db, "last_run_at");
    console.log(
      `${cache.size} proposal(s) mentioned, ${countMerged(db)} merged mention(s)` +
        `${lastRun ? `, last run ${lastRun}` : ""}:\n`
    );
    for (const r of shown) {
      const proposal = proposals.get(r.proposalId);
      console.log(`  ${config.proposalPrefix}-${r.proposalId}${proposal ? `  ${proposal.title}` : ""}`);
      console.log(`    Status:   ${proposal?.status ?? "unknown"}`);
      console.log(`    Mentions: ${r.mentionCount} in ${r.distinctThreadCount} thread(s)`);
      console.log(`    Seen:     ${r.firstSeen ?? "-"} .. ${r.lastSeen ?? "-"}`);
      const latest = types.get(r.proposalId);
      if (latest) {
        const parts = (["subject", "discuss", "vote", "body"] as const).flatMap((type) => {
          const at = latest[type];
          return at ? [`${type} ${at}`] : [];
        });
        console.log(`    Latest:   ${parts.join(", ")}`);
      }
      const tally = tallies.get(r.proposalId);
      if (tally) {
        console.log(`    Votes:    +1 ${tally["+1"].length}, 0 ${tally["0"].length}, -1 ${tally["-1"].length}`);
      }
      console.log();
    }
    if (shown.length < records.length) {
      console.log(`  ... ${records.length - shown.length} more`);
    }
  } finally {
    workspace.db.close();
  }
}
