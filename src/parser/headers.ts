import libmime from "libmime";
import type { ParsedMail } from "mailparser";
import type { MessageHeaders } from "../types/index.js";

/**
 * Build a header map keyed by lower-cased name. When a name repeats, the
 * first value wins.
 */
export function createHeaderMap(
  entries: Iterable<readonly [string, string]>
): MessageHeaders {
  const headers = new Map<string, string>();
  for (const [name, value] of entries) {
    const key = name.toLowerCase();
    if (!headers.has(key)) {
      headers.set(key, value);
    }
  }
  return headers;
}

export function headersFromRecord(record: Readonly<Record<string, string>>): MessageHeaders {
  return createHeaderMap(Object.entries(record));
}

function rawLineValue(line: string): string {
  const colon = line.indexOf(":");
  const value = colon === -1 ? "" : line.slice(colon + 1);
  return value.replace(/\r?\n[ \t]+/g, " ").trim();
}

/**
 * Header map for a parsed message. Values are mailparser's string value
 * where it has one; structured headers (addresses, dates, content types)
 * fall back to the unfolded raw line. Encoded words (RFC 2047) are decoded
 * either way.
 */
export function headersFromParsedMail(
  parsed: Pick<ParsedMail, "headers" | "headerLines">
): MessageHeaders {
  const entries: Array<[string, string]> = parsed.headerLines.map(({ key, line }) => {
    const decoded = parsed.headers.get(key);
    const value = typeof decoded === "string" ? decoded : rawLineValue(line);
    return [key, libmime.decodeWords(value)];
  });
  return createHeaderMap(entries);
}
