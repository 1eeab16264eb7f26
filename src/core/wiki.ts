import type Database from "better-sqlite3";
import { z } from "zod";
import { FetchError, toErrorMessage } from "./errors.js";
import { getProposals, replaceProposals } from "./db.js";
import { proposalIdFromTitle } from "./extractor.js";
import type { HttpClient } from "./http.js";
import type { Proposal, ProposalStatus, RunMode } from "../types.js";

/**
 * Full-refresh capability of a proposal metadata source.
 */
export interface ProposalSource {
  fetchAll(): Promise<Proposal[]>;
}

const ACCEPTED_TERMS = [
  "accepted",
  "approved",
  "adopted",
  "adopt",
  "implemented",
  "committed",
  "completed",
  "merged",
  "released",
  "accept",
  "vote passed",
];
const UNDER_DISCUSSION_TERMS = [
  "discussion",
  "discuss",
  "discusion",
  "voting",
  "under vote",
  "draft",
  "wip",
  "under review",
];
const NOT_ACCEPTED_TERMS = [
  "rejected",
  "discarded",
  "superseded",
  "subsumed",
  "withdrawn",
  "cancelled",
  "abandoned",
  "replaced",
  "moved to",
];

/**
 * Map free-form "Current state: ..." text to a status. Accepted terms win
 * over discussion terms, which win over rejection terms.
 */
export function classifyStatus(text: string): ProposalStatus {
  const lower = text.toLowerCase();
  if (ACCEPTED_TERMS.some((t) => lower.includes(t))) return "accepted";
  if (UNDER_DISCUSSION_TERMS.some((t) => lower.includes(t))) return "under discussion";
  if (NOT_ACCEPTED_TERMS.some((t) => lower.includes(t))) return "not accepted";
  return "unknown";
}

export function decodeHtmlEntities(text: string): string {
  return text
    .replace(/&#x([0-9a-fA-F]+);/g, (_, hex: string) => String.fromCodePoint(Number.parseInt(hex, 16)))
    .replace(/&#([0-9]+);/g, (_, dec: string) => String.fromCodePoint(Number.parseInt(dec, 10)))
    .replace(/&nbsp;/g, " ")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, "&");
}

function stripTags(html: string): string {
  return decodeHtmlEntities(html.replace(/<[^>]+>/g, " ")).replace(/\s+/g, " ").trim();
}

/**
 * Pull status and JIRA link out of a proposal page body. The status comes
 * from the first paragraph mentioning "current state", the link from the
 * first other paragraph mentioning JIRA.
 */
export function parseProposalBody(html: string): { status: ProposalStatus; jira?: string } {
  let status: ProposalStatus | null = null;
  let jira: string | null = null;

  for (const match of html.matchAll(/<p\b[^>]*>([\s\S]*?)<\/p>/gi)) {
    const inner = match[1];
    const text = stripTags(inner).toLowerCase();

    if (status === null && text.includes("current state")) {
      status = classifyStatus(text.replace("current state", ""));
    } else if (jira === null && text.includes("jira")) {
      const href = inner.match(/<a\b[^>]*\bhref\s*=\s*"([^"]+)"/i);
      jira = href ? decodeHtmlEntities(href[1]) : "";
    }

    if (status !== null && jira !== null) break;
  }

  const result: { status: ProposalStatus; jira?: string } = { status: status ?? "unknown" };
  if (jira) result.jira = jira;
  return result;
}

const PageSearchSchema = z.object({
  results: z.array(z.object({ id: z.string(), title: z.string() })),
});

const ChildPageSchema = z.object({
  id: z.string(),
  title: z.string(),
  _links: z.object({ webui: z.string().optional() }).optional(),
  history: z
    .object({
      createdDate: z.string().optional(),
      createdBy: z.object({ displayName: z.string() }).optional(),
      lastUpdated: z.object({ when: z.string().optional() }).optional(),
    })
    .optional(),
  body: z.object({ view: z.object({ value: z.string() }) }).optional(),
});

const ChildPageListSchema = z.object({
  results: z.array(ChildPageSchema),
  _links: z.object({ next: z.string().optional() }).optional(),
});

type ChildPage = z.infer<typeof ChildPageSchema>;

function parseResponse<T>(schema: z.ZodType<T>, data: unknown, what: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new FetchError(`Unexpected ${what} response: ${result.error.issues[0]?.message ?? "invalid shape"}`);
  }
  return result.data;
}

export interface ConfluenceProposalSourceOptions {
  /** Confluence root, e.g. https://cwiki.apache.org/confluence */
  baseUrl: string;
  spaceKey: string;
  pageTitle: string;
  pattern: RegExp;
  /** Child pages per request */
  chunk?: number;
}

/**
 * Proposals listed as child pages of the project's proposal index page on
 * a Confluence wiki.
 */
export class ConfluenceProposalSource implements ProposalSource {
  private readonly http: HttpClient;
  private readonly options: ConfluenceProposalSourceOptions;

  constructor(http: HttpClient, options: ConfluenceProposalSourceOptions) {
    this.http = http;
    this.options = options;
  }

  async fetchAll(): Promise<Proposal[]> {
    const { baseUrl, spaceKey, pageTitle } = this.options;
    const contentUrl = `${baseUrl}/rest/api/content`;

    const search = parseResponse(
      PageSearchSchema,
      await this.http.getJson(contentUrl, { type: "page", spaceKey, title: pageTitle }),
      "page search"
    );
    if (search.results.length !== 1) {
      throw new FetchError(
        `Expected exactly one page titled "${pageTitle}" in space ${spaceKey}, found ${search.results.length}`
      );
    }

    const proposals = new Map<number, Proposal>();
    let url: string | null = `${contentUrl}/${search.results[0].id}/child/page`;
    let params: Record<string, string> = {
      limit: String(this.options.chunk ?? 100),
      expand: "history,history.lastUpdated,body.view",
    };

    while (url) {
      const page: z.infer<typeof ChildPageListSchema> = parseResponse(
        ChildPageListSchema,
        await this.http.getJson(url, params),
        "child page"
      );
      for (const child of page.results) {
        const proposal = this.toProposal(child);
        if (proposal && !proposals.has(proposal.id)) {
          proposals.set(proposal.id, proposal);
        }
      }
      // `next` already carries the paging and expand parameters
      const next = page._links?.next;
      url = next ? `${baseUrl}${next}` : null;
      params = {};
    }

    return Array.from(proposals.values()).sort((a, b) => a.id - b.id);
  }

  private toProposal(child: ChildPage): Proposal | null {
    const id = proposalIdFromTitle(child.title, this.options.pattern);
    if (id === null) return null;

    const body: { status: ProposalStatus; jira?: string } = child.body
      ? parseProposalBody(child.body.view.value)
      : { status: "unknown" };
    const proposal: Proposal = {
      id,
      title: child.title,
      status: body.status,
      author: child.history?.createdBy?.displayName ?? "unknown",
    };
    if (body.jira) proposal.jira = body.jira;
    if (child._links?.webui) proposal.webUrl = `${this.options.baseUrl}${child._links.webui}`;
    if (child.history?.createdDate) proposal.createdAt = child.history.createdDate;
    if (child.history?.lastUpdated?.when) proposal.lastModifiedAt = child.history.lastUpdated.when;
    return proposal;
  }
}

export interface LoadProposalsOptions {
  source: ProposalSource;
  db: Database.Database;
  mode: RunMode;
}

export interface LoadedProposals {
  proposals: Proposal[];
  fromFallback: boolean;
}

/**
 * Refresh the proposal set and persist it. When the refresh fails, an
 * update run falls back to the last persisted set; an init run, or an
 * update with nothing persisted, fails.
 */
export async function loadProposals(options: LoadProposalsOptions): Promise<LoadedProposals> {
  let proposals: Proposal[];
  try {
    proposals = await options.source.fetchAll();
  } catch (err) {
    const reason = toErrorMessage(err);
    if (options.mode === "update") {
      const persisted = getProposals(options.db);
      if (persisted.length > 0) {
        console.warn(`  Proposal refresh failed (${reason}); using ${persisted.length} stored proposal(s).`);
        return { proposals: persisted, fromFallback: true };
      }
    }
    throw err instanceof FetchError
      ? err
      : new FetchError(`Could not fetch proposal metadata: ${reason}`, { cause: err });
  }

  replaceProposals(options.db, proposals);
  return { proposals, fromFallback: false };
}
