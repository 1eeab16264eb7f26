import { FetchError, toErrorMessage } from "./errors.js";
import { parsePeriod, periodEnd, periodOf, periodsInWindow } from "./periods.js";
import type { HttpClient } from "./http.js";
import type { SegmentStore } from "./segments.js";
import type { ArchiveSegment, SegmentFailure, Window } from "../types.js";

/**
 * Fetch-by-period capability of a mailing-list archive.
 * Returns the raw mbox text of one monthly segment.
 */
export interface ArchiveSource {
  fetchSegment(period: string): Promise<string>;
}

export interface ApacheMailArchiveOptions {
  baseUrl: string;
  list: string;
  domain: string;
}

/**
 * lists.apache.org (Pony Mail) monthly mbox export.
 */
export class ApacheMailArchive implements ArchiveSource {
  private readonly http: HttpClient;
  private readonly options: ApacheMailArchiveOptions;

  constructor(http: HttpClient, options: ApacheMailArchiveOptions) {
    this.http = http;
    this.options = options;
  }

  async fetchSegment(period: string): Promise<string> {
    const { year, month } = parsePeriod(period);
    try {
      return await this.http.getText(this.options.baseUrl, {
        list: this.options.list,
        domain: this.options.domain,
        d: `${year}-${month}`,
      });
    } catch (err) {
      throw new FetchError(`Could not download ${this.options.list}@${this.options.domain} ${period}: ${toErrorMessage(err)}`, {
        period,
        status: err instanceof FetchError ? err.status ?? undefined : undefined,
        cause: err,
      });
    }
  }
}

export interface FetchSegmentsOptions {
  source: ArchiveSource;
  store: SegmentStore;
  window: Window;
  now?: Date;
  /** Re-download every period, not only the open one */
  overwrite?: boolean;
  /** When each stored period was last downloaded (ISO time) */
  fetchedAt?: ReadonlyMap<string, string>;
}

export interface FetchSegmentsResult {
  segments: ArchiveSegment[];
  fetched: string[];
  reused: string[];
  failed: SegmentFailure[];
}

/**
 * Collect the segments covering `window`, in period order.
 *
 * Stored segments are reused without a request, except the current month,
 * which is still growing and is always downloaded again, and any month
 * last downloaded before it ended. A failed download is logged and
 * reported in `failed`; the remaining periods still run.
 */
export async function fetchSegments(options: FetchSegmentsOptions): Promise<FetchSegmentsResult> {
  const now = options.now ?? new Date();
  const openPeriod = periodOf(now);
  const result: FetchSegmentsResult = { segments: [], fetched: [], reused: [], failed: [] };

  for (const period of periodsInWindow(options.window, now)) {
    const stale =
      period === openPeriod || options.overwrite === true || downloadedEarly(period, options.fetchedAt);
    if (!stale && options.store.has(period)) {
      result.segments.push(options.store.read(period));
      result.reused.push(period);
      continue;
    }

    console.log(`  Downloading ${period}`);
    try {
      const text = await options.source.fetchSegment(period);
      const segment: ArchiveSegment = { period, text };
      options.store.write(segment);
      result.segments.push(segment);
      result.fetched.push(period);
    } catch (err) {
      const reason = toErrorMessage(err);
      console.warn(`  Skipping ${period}: ${reason}`);
      result.failed.push({ period, reason });
    }
  }

  return result;
}

/** Stored while the month was still open, so it may be missing mail. */
function downloadedEarly(period: string, fetchedAt: ReadonlyMap<string, string> | undefined): boolean {
  const at = fetchedAt?.get(period);
  if (at === undefined) return false;
  const time = Date.parse(at);
  return Number.isNaN(time) || time < periodEnd(period).getTime();
}
