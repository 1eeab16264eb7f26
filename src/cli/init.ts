import { DEFAULT_INIT_DAYS, runPipeline } from "../core/pipeline.js";
import { openWorkspace, pipelineContext, printSummary, type GlobalOptions } from "./util.js";

/**
 * Rebuild the mention cache from scratch over the trailing `days`.
 */
export async function initCommand(
  global: GlobalOptions,
  options: { days?: number; chunk?: number }
): Promise<void> {
  const workspace = openWorkspace(global);
  try {
    const days = options.days ?? DEFAULT_INIT_DAYS;
    console.log(`Building ${workspace.config.proposalPrefix} mention cache for the last ${days} day(s)...\n`);
    const summary = await runPipeline(pipelineContext(workspace, options.chunk), { mode: "init", days });
    printSummary(summary);
  } finally {
    workspace.db.close();
  }
}
