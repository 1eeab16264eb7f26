/**
 * Minimal MIME handling for mailing-list archives: header parsing, RFC 2047
 * encoded words, transfer decodings and text/plain extraction from
 * multipart bodies.
 */

export type HeaderMap = Map<string, string>;

/**
 * Parse an unfolded header block. Keys are lower-cased; the first
 * occurrence of a repeated header wins.
 */
export function parseHeaders(block: string): HeaderMap {
  const headers: HeaderMap = new Map();
  const unfolded = block.replace(/\r?\n[ \t]+/g, " ");

  for (const line of unfolded.split(/\r?\n/)) {
    const colon = line.indexOf(":");
    if (colon <= 0) continue;
    const name = line.slice(0, colon).trim().toLowerCase();
    if (!name || /\s/.test(name)) continue;
    if (!headers.has(name)) {
      headers.set(name, line.slice(colon + 1).trim());
    }
  }

  return headers;
}

/**
 * Split raw message text at the first blank line.
 * Returns null when there is no header/body separator.
 */
export function splitHeaderBody(raw: string): { header: string; body: string } | null {
  const match = raw.match(/\r?\n\r?\n/);
  if (match?.index === undefined) return null;
  return {
    header: raw.slice(0, match.index),
    body: raw.slice(match.index + match[0].length),
  };
}

function charsetOf(name: string): BufferEncoding {
  const normalized = name.toLowerCase().replace(/[^a-z0-9]/g, "");
  if (normalized === "iso88591" || normalized === "latin1" || normalized === "windows1252" || normalized === "usascii") {
    return "latin1";
  }
  return "utf-8";
}

/** Decode RFC 2047 encoded words (`=?charset?B|Q?text?=`). */
export function decodeEncodedWords(value: string): string {
  return value
    .replace(/(\?=)\s+(=\?)/g, "$1$2")
    .replace(/=\?([^?]+)\?([bBqQ])\?([^?]*)\?=/g, (_, charset: string, encoding: string, text: string) => {
      const bytes =
        encoding.toUpperCase() === "B"
          ? Buffer.from(text, "base64")
          : qpBytes(text.replace(/_/g, " "));
      return bytes.toString(charsetOf(charset));
    });
}

function qpBytes(text: string): Buffer {
  const bytes: number[] = [];
  for (let i = 0; i < text.length; i++) {
    const codePoint = text.codePointAt(i) ?? 0;
    const hex = text.slice(i + 1, i + 3);
    if (codePoint === 0x3d && /^[0-9A-Fa-f]{2}$/.test(hex)) {
      bytes.push(Number.parseInt(hex, 16));
      i += 2;
    } else {
      bytes.push(...Buffer.from(String.fromCodePoint(codePoint), "utf-8"));
      if (codePoint > 0xffff) i++;
    }
  }
  return Buffer.from(bytes);
}

export function decodeQuotedPrintable(text: string, charset = "utf-8"): string {
  return qpBytes(text.replace(/=\r?\n/g, "")).toString(charsetOf(charset));
}

/** Read a `; name=value` parameter from a structured header. */
export function headerParam(value: string, param: string): string | null {
  const re = new RegExp(`;\\s*${param}\\s*=\\s*(?:"([^"]*)"|([^;\\s]+))`, "i");
  const match = value.match(re);
  if (!match) return null;
  return match[1] ?? match[2] ?? null;
}

function decodeTransfer(body: string, headers: HeaderMap): string {
  const encoding = (headers.get("content-transfer-encoding") ?? "").toLowerCase();
  const charset = headerParam(headers.get("content-type") ?? "", "charset") ?? "utf-8";
  if (encoding === "base64") {
    return Buffer.from(body.replace(/\s+/g, ""), "base64").toString(charsetOf(charset));
  }
  if (encoding === "quoted-printable") {
    return decodeQuotedPrintable(body, charset);
  }
  return body;
}

// Signatures and key blocks: armored, or one long run without whitespace
function isSignature(text: string): boolean {
  return text.includes("BEGIN PGP SIGNATURE") || (text.length > 200 && !/\s/.test(text.trim()));
}

/**
 * Collect the text/plain parts of a message body. HTML alternatives,
 * attachments and PGP signatures are dropped; identical parts collapse.
 */
export function extractTextParts(headers: HeaderMap, body: string, depth = 0): string[] {
  const contentType = (headers.get("content-type") ?? "text/plain").toLowerCase();
  const disposition = (headers.get("content-disposition") ?? "").toLowerCase();

  if (contentType.startsWith("multipart/") && depth < 8) {
    const boundary = headerParam(headers.get("content-type") ?? "", "boundary");
    if (!boundary) return [];
    const parts: string[] = [];
    for (const rawPart of splitMultipart(body, boundary)) {
      const split = splitHeaderBody(rawPart);
      // A part with no headers is plain text by default
      const partHeaders = split ? parseHeaders(split.header) : new Map<string, string>();
      const partBody = split ? split.body : rawPart;
      for (const text of extractTextParts(partHeaders, partBody, depth + 1)) {
        if (!parts.includes(text)) parts.push(text);
      }
    }
    return parts;
  }

  if (!contentType.startsWith("text/plain") || disposition.startsWith("attachment")) {
    return [];
  }

  const text = decodeTransfer(body, headers);
  if (isSignature(text)) return [];
  return [text];
}

function splitMultipart(body: string, boundary: string): string[] {
  const delimiter = `--${boundary}`;
  const parts: string[] = [];
  let current: string[] | null = null;

  for (const line of body.split(/\r?\n/)) {
    if (line.startsWith(delimiter)) {
      if (current) parts.push(current.join("\n"));
      if (line.startsWith(`${delimiter}--`)) {
        current = null;
        break;
      }
      current = [];
      continue;
    }
    current?.push(line);
  }
  if (current) parts.push(current.join("\n"));

  return parts;
}
