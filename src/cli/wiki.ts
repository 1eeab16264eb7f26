import { loadProposals } from "../core/wiki.js";
import type { ProposalStatus } from "../types.js";
import { openWorkspace, proposalSourceFor, type GlobalOptions } from "./util.js";

export async function wikiDownloadCommand(
  global: GlobalOptions,
  options: { chunk?: number }
): Promise<void> {
  const workspace = openWorkspace(global);
  try {
    const { config } = workspace;
    console.log(`Refreshing proposals from "${config.wikiPageTitle}" (${config.wikiSpaceKey})...`);

    // init mode: a failed refresh is an error here, not a fallback
    const { proposals } = await loadProposals({
      source: proposalSourceFor(workspace, options.chunk),
      db: workspace.db,
      mode: "init",
    });

    const byStatus = new Map<ProposalStatus, number>();
    for (const p of proposals) {
      byStatus.set(p.status, (byStatus.get(p.status) ?? 0) + 1);
    }

    console.log(`\n${proposals.length} proposal(s) stored.`);
    for (const [status, n] of byStatus) {
      console.log(`  ${status}: ${n}`);
    }
  } finally {
    workspace.db.close();
  }
}
