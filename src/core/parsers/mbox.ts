import { sha256 } from "@noble/hashes/sha2.js";
import { bytesToHex } from "@noble/hashes/utils.js";
import { ParseError } from "../errors.js";
import { decodeEncodedWords, extractTextParts, parseHeaders, splitHeaderBody } from "./mime.js";
import type { ArchiveSegment, Message } from "../../types.js";

export type ParseResult =
  | { ok: true; message: Message }
  | { ok: false; error: ParseError };

// "Re:", "RE[2]:", "Fwd:", "AW:", "SV^3:" ...
const REPLY_PREFIX = /^(?:re|fwd?|aw|sv|antw)\s*(?:\[\d+\]|\^\d+)?\s*:\s*/i;
const DATE_SHAPE = /\d{1,2}\s+[A-Za-z]{3,}\s+\d{2,4}\s+\d{1,2}:\d{2}/;
const SEPARATOR = /^From \S+/;
const ASCTIME_TAIL = /\s\d{1,2}:\d{2}:\d{2}\s+\d{4}\s*$/;

/**
 * Normalize a subject into its thread key.
 *
 * Rule: repeatedly strip a leading reply/forward prefix (re, fw, fwd, aw,
 * sv, antw; optional [n] or ^n counter; colon), collapse whitespace runs
 * to one space, trim, lower-case. List tags like "[DISCUSS]" are kept.
 * Thread counts are persisted, so this rule must not change between runs.
 */
export function normalizeSubject(subject: string): string {
  let current = subject.replace(/\s+/g, " ").trim();
  for (;;) {
    const stripped = current.replace(REPLY_PREFIX, "");
    if (stripped === current) break;
    current = stripped.trim();
  }
  return current.toLowerCase();
}

export function threadIdOf(subject: string): string {
  return `subject:${normalizeSubject(subject)}`;
}

/**
 * Parse an RFC 2822 date ("Tue, 5 Mar 2024 09:15:00 +0100 (CET)") into
 * ISO 8601 UTC. Returns null when the value is not a recognizable date.
 */
export function parseMailDate(value: string): string | null {
  const clean = value.replace(/\s*\([^)]*\)\s*$/, "").trim();
  if (!DATE_SHAPE.test(clean)) return null;
  const ms = Date.parse(clean);
  if (Number.isNaN(ms)) return null;
  return new Date(ms).toISOString();
}

/**
 * Split mbox text into raw entries (without their "From " separator line).
 * A separator is a "From <sender>" line at the start of the text, after a
 * blank line, or ending in an asctime year. mboxrd ">From " quoting is undone.
 */
export function* splitEntries(text: string): Generator<string> {
  const lines = text.split(/\r?\n/);
  let current: string[] | null = null;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const atBoundary = i === 0 || lines[i - 1].trim() === "" || ASCTIME_TAIL.test(line);
    if (SEPARATOR.test(line) && atBoundary) {
      if (current) yield current.join("\n");
      current = [];
      continue;
    }
    if (current === null) {
      // Text before the first separator: treat the segment as a single entry
      if (line.trim() === "") continue;
      current = [];
    }
    current.push(line.replace(/^>(>*From )/, "$1"));
  }

  if (current) yield current.join("\n");
}

/**
 * Parse one raw entry into a Message. Throws ParseError when the entry is
 * truncated or lacks the headers a message needs.
 */
export function parseEntry(raw: string, period: string, index: number): Message {
  const split = splitHeaderBody(raw);
  if (!split) {
    throw new ParseError("no header/body separator", period, index);
  }

  const headers = parseHeaders(split.header);
  const sender = headers.get("from");
  if (!sender) {
    throw new ParseError("missing From header", period, index);
  }

  const date = headers.get("date");
  if (!date) {
    throw new ParseError("missing Date header", period, index);
  }
  const timestamp = parseMailDate(date);
  if (!timestamp) {
    throw new ParseError(`unparseable Date header "${date}"`, period, index);
  }

  const subject = decodeEncodedWords(headers.get("subject") ?? "");
  const messageId = headers.get("message-id")?.replace(/^<|>$/g, "").trim();

  return {
    id: messageId || bytesToHex(sha256(new TextEncoder().encode(raw))),
    threadId: threadIdOf(subject),
    sender: decodeEncodedWords(sender),
    subject,
    timestamp,
    body: extractTextParts(headers, split.body).join("\n\n"),
  };
}

/**
 * Lazily parse a segment, in archive order. Each iteration starts again
 * from the first entry. Malformed entries come out as `{ ok: false }`
 * results and parsing moves on to the next entry.
 */
export function parseSegment(segment: ArchiveSegment): Iterable<ParseResult> {
  return {
    *[Symbol.iterator]() {
      let index = 0;
      for (const raw of splitEntries(segment.text)) {
        index++;
        let result: ParseResult;
        try {
          result = { ok: true, message: parseEntry(raw, segment.period, index) };
        } catch (err) {
          if (!(err instanceof ParseError)) throw err;
          result = { ok: false, error: err };
        }
        yield result;
      }
    },
  };
}

/**
 * Messages of a segment, skipping malformed entries. `onError` sees every
 * skipped entry.
 */
export function* messagesOf(
  segment: ArchiveSegment,
  onError?: (error: ParseError) => void
): Generator<Message> {
  for (const result of parseSegment(segment)) {
    if (result.ok) {
      yield result.message;
    } else {
      onError?.(result.error);
    }
  }
}
