import { join } from "path";
import { homedir } from "os";
import { z } from "zod";

export const PROJECT_PRESETS = {
  kafka: {
    proposalPrefix: "KIP",
    mailingList: "dev",
    listDomain: "kafka.apache.org",
    wikiSpaceKey: "KAFKA",
    wikiPageTitle: "Kafka Improvement Proposals",
  },
  flink: {
    proposalPrefix: "FLIP",
    mailingList: "dev",
    listDomain: "flink.apache.org",
    wikiSpaceKey: "FLINK",
    wikiPageTitle: "Flink Improvement Proposals",
  },
} as const;

export type ProjectName = keyof typeof PROJECT_PRESETS;

const DEFAULT_ARCHIVE_URL = "https://lists.apache.org/api/mbox.lua";
const DEFAULT_WIKI_URL = "https://cwiki.apache.org/confluence";

const ConfigSchema = z.object({
  project: z.enum(["kafka", "flink"]),
  dataDir: z.string().min(1),
  proposalPrefix: z.string().regex(/^[A-Za-z]+$/, "proposal prefix must be letters only"),
  mailingList: z.string().min(1),
  listDomain: z.string().min(1),
  archiveUrl: z.string().url(),
  wikiUrl: z.string().url(),
  wikiSpaceKey: z.string().min(1),
  wikiPageTitle: z.string().min(1),
  requestDelayMs: z.number().int().nonnegative(),
});

export type Config = z.infer<typeof ConfigSchema>;

export interface ConfigOverrides {
  dataDir?: string;
  project?: string;
}

/**
 * Resolve the run configuration: CLI overrides, then IPMENTIONS_* environment
 * variables, then the project preset and defaults.
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Config {
  const projectResult = z
    .enum(["kafka", "flink"])
    .safeParse(overrides.project ?? env.IPMENTIONS_PROJECT ?? "kafka");
  if (!projectResult.success) {
    throw new Error(
      `Unknown project "${overrides.project ?? env.IPMENTIONS_PROJECT}". ` +
        `Expected one of: ${Object.keys(PROJECT_PRESETS).join(", ")}`
    );
  }
  const project = projectResult.data;
  const preset = PROJECT_PRESETS[project];

  const delay = env.IPMENTIONS_REQUEST_DELAY_MS;
  const result = ConfigSchema.safeParse({
    project,
    dataDir:
      overrides.dataDir ??
      env.IPMENTIONS_HOME ??
      join(homedir(), ".ipmentions", project),
    ...preset,
    archiveUrl: env.IPMENTIONS_ARCHIVE_URL ?? DEFAULT_ARCHIVE_URL,
    wikiUrl: env.IPMENTIONS_WIKI_URL ?? DEFAULT_WIKI_URL,
    requestDelayMs: delay === undefined ? 1000 : Number(delay),
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

export function cachePath(config: Config): string {
  return join(config.dataDir, "mentions.csv");
}

export function statePath(config: Config): string {
  return join(config.dataDir, "state.db");
}

export function segmentDir(config: Config): string {
  return join(config.dataDir, "archives", config.mailingList);
}
