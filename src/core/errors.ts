/**
 * Error taxonomy for the mention pipeline.
 *
 * FetchError and ParseError are isolated per segment / per entry and only
 * counted in the run summary. The rest abort the run before the cache is
 * replaced.
 */

export class FetchError extends Error {
  readonly period: string | null;
  readonly status: number | null;

  constructor(
    message: string,
    options: { period?: string; status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.period = options.period ?? null;
    this.status = options.status ?? null;
  }
}

export class ParseError extends Error {
  readonly period: string;
  readonly entry: number;

  constructor(message: string, period: string, entry: number) {
    super(`${period} entry #${entry}: ${message}`);
    this.name = "ParseError";
    this.period = period;
    this.entry = entry;
  }
}

export class CacheCorruptError extends Error {
  readonly path: string;
  readonly line: number | null;

  constructor(message: string, path: string, line: number | null = null) {
    const where = line === null ? path : `${path}:${line}`;
    super(`Cache file ${where} is corrupt: ${message}. Run \`ipmentions init\` to rebuild it.`);
    this.name = "CacheCorruptError";
    this.path = path;
    this.line = line;
  }
}

export class MergeInvariantViolation extends Error {
  readonly proposalId: number;

  constructor(proposalId: number, message: string) {
    super(`Merged record for proposal ${proposalId} is invalid: ${message}`);
    this.name = "MergeInvariantViolation";
    this.proposalId = proposalId;
  }
}

export class LockHeldError extends Error {
  readonly lockPath: string;

  constructor(lockPath: string, holder: string) {
    super(`Another run holds ${lockPath} (${holder}). Wait for it to finish.`);
    this.name = "LockHeldError";
    this.lockPath = lockPath;
  }
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** The `code` of a Node system error ("ENOENT", "EEXIST" ...), if any. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
