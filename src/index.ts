#!/usr/bin/env node

import { Command } from "commander";
import { initCommand } from "./cli/init.js";
import { updateCommand } from "./cli/update.js";
import { mailDownloadCommand, mailProcessCommand } from "./cli/mail.js";
import { wikiDownloadCommand } from "./cli/wiki.js";
import { inspectCommand } from "./cli/inspect.js";
import { positiveInt, type GlobalOptions } from "./cli/util.js";
import { toErrorMessage } from "./core/errors.js";
import { VERSION } from "./version.js";

const program = new Command();

program
  .name("ipmentions")
  .description("Track how often improvement proposals are mentioned on a project mailing list")
  .version(VERSION)
  .option("--data-dir <dir>", "Directory holding the cache, state and archives")
  .option("--project <name>", "Project preset (kafka or flink)");

function globals(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

program
  .command("init")
  .description("Rebuild the mention cache from scratch")
  .option("-d, --days <n>", "Trailing days of mail to read", positiveInt)
  .option("-c, --chunk <n>", "Wiki pages per request", positiveInt)
  .action(async (options: { days?: number; chunk?: number }) => {
    await initCommand(globals(), options);
  });

program
  .command("update")
  .description("Merge mentions since the last run into the cache")
  .action(async () => {
    await updateCommand(globals());
  });

const mail = program.command("mail").description("Mailing list archive commands");

mail
  .command("download")
  .description("Download archive segments without updating the cache")
  .option("-d, --days <n>", "Trailing days of mail to download", positiveInt)
  .option("--overwrite", "Download segments again even when stored")
  .action(async (options: { days?: number; overwrite?: boolean }) => {
    await mailDownloadCommand(globals(), options);
  });

mail
  .command("process")
  .description("Count mentions in stored segments without updating the cache")
  .action(() => {
    mailProcessCommand(globals());
  });

const wiki = program.command("wiki").description("Proposal wiki commands");

wiki
  .command("download")
  .description("Refresh the stored proposal set")
  .option("-c, --chunk <n>", "Wiki pages per request", positiveInt)
  .action(async (options: { chunk?: number }) => {
    await wikiDownloadCommand(globals(), options);
  });

program
  .command("inspect")
  .description("List cached mention records, most recent first")
  .option("-l, --limit <n>", "Show at most n records", positiveInt)
  .action((options: { limit?: number }) => {
    inspectCommand(globals(), options);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${toErrorMessage(err)}`);
  process.exit(1);
});
