import { runPipeline } from "../core/pipeline.js";
import { openWorkspace, pipelineContext, printSummary, type GlobalOptions } from "./util.js";

export async function updateCommand(global: GlobalOptions): Promise<void> {
  const workspace = openWorkspace(global);
  try {
    console.log(`Updating ${workspace.config.proposalPrefix} mention cache...\n`);
    const summary = await runPipeline(pipelineContext(workspace), { mode: "update" });
    printSummary(summary);
  } finally {
    workspace.db.close();
  }
}
