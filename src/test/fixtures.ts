import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { HttpClient } from "../core/http.js";
import type { ArchiveSource } from "../core/archive.js";
import type { ProposalSource } from "../core/wiki.js";
import type { Proposal } from "../types.js";

export interface MailFixture {
  id?: string;
  from?: string;
  date?: string;
  subject: string;
  body: string;
  headers?: string[];
}

/** mbox text with one entry per fixture, separated the way archives are. */
export function mbox(entries: MailFixture[]): string {
  return entries
    .map((e) =>
      [
        "From test@example.org Thu Jan  1 00:00:00 2024",
        `From: ${e.from ?? "Test User <test@example.org>"}`,
        ...(e.date === undefined ? [] : [`Date: ${e.date}`]),
        `Subject: ${e.subject}`,
        ...(e.id === undefined ? [] : [`Message-ID: <${e.id}>`]),
        ...(e.headers ?? []),
        "",
        e.body,
        "",
      ].join("\n")
    )
    .join("\n");
}

export function makeProposal(overrides: Partial<Proposal> = {}): Proposal {
  return {
    id: 500,
    title: "KIP-500: Replace ZooKeeper",
    status: "accepted",
    author: "Test Author",
    ...overrides,
  };
}

/** In-process archive: serves fixed texts and records every request. */
export class FakeArchive implements ArchiveSource {
  readonly calls: string[] = [];
  readonly texts: Map<string, string>;
  readonly failures = new Set<string>();

  constructor(texts: Record<string, string> = {}) {
    this.texts = new Map(Object.entries(texts));
  }

  async fetchSegment(period: string): Promise<string> {
    this.calls.push(period);
    if (this.failures.has(period)) {
      throw new Error(`archive unavailable for ${period}`);
    }
    return this.texts.get(period) ?? "";
  }
}

export class FakeProposalSource implements ProposalSource {
  calls = 0;
  error: Error | null = null;

  constructor(public proposals: Proposal[] = []) {}

  async fetchAll(): Promise<Proposal[]> {
    this.calls++;
    if (this.error) throw this.error;
    return this.proposals.map((p) => ({ ...p }));
  }
}

/** HttpClient over a routing function, with no delays. */
export function fakeHttp(
  route: (url: URL) => Response | Promise<Response>,
  sleeps: number[] = []
): { http: HttpClient; urls: string[] } {
  const urls: string[] = [];
  const http = new HttpClient({
    minDelayMs: 0,
    fetchImpl: async (input) => {
      const url = String(input);
      urls.push(url);
      return route(new URL(url));
    },
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
  return { http, urls };
}

export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function makeTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), "ipmentions-test-"));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}
