import { InvalidArgumentError } from "commander";
import type Database from "better-sqlite3";
import { ApacheMailArchive } from "../core/archive.js";
import { cachePath, resolveConfig, segmentDir, statePath, type Config } from "../core/config.js";
import { openDatabase } from "../core/db.js";
import { createProposalPattern } from "../core/extractor.js";
import { HttpClient } from "../core/http.js";
import type { PipelineContext } from "../core/pipeline.js";
import { SegmentStore } from "../core/segments.js";
import { ConfluenceProposalSource } from "../core/wiki.js";
import type { RunSummary } from "../types.js";

export type GlobalOptions = {
  dataDir?: string;
  project?: string;
};

export interface Workspace {
  config: Config;
  db: Database.Database;
  store: SegmentStore;
  http: HttpClient;
  pattern: RegExp;
}

export function openWorkspace(options: GlobalOptions): Workspace {
  const config = resolveConfig(options);
  return {
    config,
    db: openDatabase(statePath(config)),
    store: new SegmentStore(segmentDir(config), config.mailingList),
    http: new HttpClient({ minDelayMs: config.requestDelayMs }),
    pattern: createProposalPattern(config.proposalPrefix),
  };
}

export function archiveFor(workspace: Workspace): ApacheMailArchive {
  const { config } = workspace;
  return new ApacheMailArchive(workspace.http, {
    baseUrl: config.archiveUrl,
    list: config.mailingList,
    domain: config.listDomain,
  });
}

export function proposalSourceFor(workspace: Workspace, chunk?: number): ConfluenceProposalSource {
  const { config } = workspace;
  return new ConfluenceProposalSource(workspace.http, {
    baseUrl: config.wikiUrl,
    spaceKey: config.wikiSpaceKey,
    pageTitle: config.wikiPageTitle,
    pattern: workspace.pattern,
    chunk,
  });
}

export function pipelineContext(workspace: Workspace, chunk?: number): PipelineContext {
  return {
    db: workspace.db,
    store: workspace.store,
    cachePath: cachePath(workspace.config),
    archive: archiveFor(workspace),
    proposals: proposalSourceFor(workspace, chunk),
    proposalPattern: workspace.pattern,
  };
}

/** Commander argument parser for positive whole numbers. */
export function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive whole number.");
  }
  return parsed;
}

export function printSummary(summary: RunSummary): void {
  const { periods } = summary;
  console.log(`\nRun ${summary.runId} (${summary.mode}) complete.`);
  console.log(`  Window start:     ${summary.windowStart}`);
  console.log(
    `  Segments:         ${periods.fetched.length} downloaded, ${periods.reused.length} reused, ` +
      `${periods.failed.length} failed`
  );
  console.log(`  Messages:         ${summary.messages} (${summary.skippedEntries} skipped)`);
  console.log(`  New mentions:     ${summary.mentions} (${summary.duplicateMentions} already merged)`);
  console.log(`  Unknown IDs:      ${summary.unknownProposalMentions}`);
  console.log(`  Proposals:        ${summary.proposals}`);
  console.log(`  Cache records:    ${summary.records}`);

  if (periods.failed.length > 0) {
    console.warn("\nFailed segments:");
    for (const failure of periods.failed) {
      console.warn(`  ${failure.period}: ${failure.reason}`);
    }
  }
}
