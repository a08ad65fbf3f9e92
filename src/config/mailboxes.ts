import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { SharedConfig } from "./shared.js";
import type { HeaderFilter, MailboxDefinition, SourceFilter } from "../types/index.js";

export const DEFAULT_MAILBOX_NAME = "Default";

export type MailboxConfigErrorCode =
  | "INVALID_FORMAT"
  | "INVALID_JSON"
  | "INVALID_SHAPE"
  | "DUPLICATE_NAME"
  | "INVALID_SOURCE";

export class MailboxConfigError extends Error {
  constructor(
    message: string,
    public readonly code: MailboxConfigErrorCode,
  ) {
    super(message);
    this.name = "MailboxConfigError";
  }
}

// Keys are lower-cased before validation, so "Recipients" and "RECIPIENTS" both land here.
const mailboxSchema = z.object({
  name: z.string().trim().min(1, "name is required"),
  recipients: z.string().nullish(),
  headerfilters: z
    .array(
      z.object({
        header: z.string().trim().min(1, "header is required"),
        pattern: z.string().nullish(),
      })
    )
    .nullish(),
  sourcefilters: z
    .array(
      z.object({
        pattern: z.string().nullish(),
      })
    )
    .nullish(),
});

function lowerCaseKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(lowerCaseKeys);
  }
  if (typeof value === "object" && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      result[key.toLowerCase()] = lowerCaseKeys(inner);
    }
    return result;
  }
  return value;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Validate a structured mailbox object. Field names are matched
 * case-insensitively and unknown fields are ignored.
 */
export function parseMailboxObject(raw: unknown): MailboxDefinition {
  const result = mailboxSchema.safeParse(lowerCaseKeys(raw));
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "mailbox";
    throw new MailboxConfigError(
      `Invalid mailbox definition: ${where}: ${issue.message}`,
      "INVALID_SHAPE"
    );
  }

  const { name, recipients, headerfilters, sourcefilters } = result.data;

  const headerFilters: HeaderFilter[] | undefined = headerfilters?.map((filter) =>
    Object.freeze({ header: filter.header, pattern: filter.pattern ?? undefined })
  );
  const sourceFilters: SourceFilter[] | undefined = sourcefilters?.map((filter) =>
    Object.freeze({ pattern: filter.pattern ?? undefined })
  );

  return Object.freeze({
    name,
    recipients: recipients ?? "",
    headerFilters: headerFilters ? Object.freeze(headerFilters) : undefined,
    sourceFilters: sourceFilters ? Object.freeze(sourceFilters) : undefined,
  });
}

/**
 * Parse the textual mailbox encoding: either a JSON object or the legacy
 * `Name=Recipients` form, split on the first `=`.
 */
export function parseMailboxDefinition(text: string): MailboxDefinition {
  if (text.trimStart().startsWith("{")) {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new MailboxConfigError(
        `Mailbox JSON format is invalid: ${errorMessage(err)}`,
        "INVALID_JSON"
      );
    }
    return parseMailboxObject(raw);
  }

  const separator = text.indexOf("=");
  if (separator === -1) {
    throw new MailboxConfigError(
      'Mailbox must be in format "Name=Recipients" or valid JSON',
      "INVALID_FORMAT"
    );
  }

  const name = text.slice(0, separator).trim();
  if (!name) {
    throw new MailboxConfigError("Mailbox name must not be empty", "INVALID_FORMAT");
  }

  return Object.freeze({ name, recipients: text.slice(separator + 1) });
}

export function parseMailboxEntry(entry: unknown): MailboxDefinition {
  if (typeof entry === "string") {
    return parseMailboxDefinition(entry);
  }
  if (typeof entry === "object" && entry !== null && !Array.isArray(entry)) {
    return parseMailboxObject(entry);
  }
  throw new MailboxConfigError(
    "Mailbox entry must be a string or an object",
    "INVALID_SHAPE"
  );
}

export interface LoadMailboxesOptions {
  /** Append a catch-all "Default" mailbox unless one is configured. Defaults to true. */
  appendDefault?: boolean;
}

/**
 * Turn raw configuration entries into the ordered, frozen list the router
 * consumes. Names must be unique (case-insensitive).
 */
export function loadMailboxes(
  entries: readonly unknown[],
  options: LoadMailboxesOptions = {}
): readonly MailboxDefinition[] {
  const mailboxes: MailboxDefinition[] = [];
  const seen = new Set<string>();

  entries.forEach((entry, index) => {
    let mailbox: MailboxDefinition;
    try {
      mailbox = parseMailboxEntry(entry);
    } catch (err) {
      if (err instanceof MailboxConfigError) {
        throw new MailboxConfigError(`Mailbox #${index + 1}: ${err.message}`, err.code);
      }
      throw err;
    }

    const key = mailbox.name.toLowerCase();
    if (seen.has(key)) {
      throw new MailboxConfigError(
        `Mailbox #${index + 1}: duplicate mailbox name "${mailbox.name}"`,
        "DUPLICATE_NAME"
      );
    }
    seen.add(key);
    mailboxes.push(mailbox);
  });

  if (options.appendDefault !== false && !seen.has(DEFAULT_MAILBOX_NAME.toLowerCase())) {
    mailboxes.push(Object.freeze({ name: DEFAULT_MAILBOX_NAME, recipients: "*" }));
  }

  return Object.freeze(mailboxes);
}

/**
 * Entries from the MAILBOXES variable: a JSON array when it starts with `[`,
 * otherwise one entry per non-blank line.
 */
export function parseInlineEntries(inline: string): unknown[] {
  const trimmed = inline.trim();
  if (!trimmed) {
    return [];
  }

  if (!trimmed.startsWith("[")) {
    return trimmed
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter(Boolean);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (err) {
    throw new MailboxConfigError(
      `MAILBOXES is not valid JSON: ${errorMessage(err)}`,
      "INVALID_SOURCE"
    );
  }
  if (!Array.isArray(parsed)) {
    throw new MailboxConfigError("MAILBOXES must be a JSON array", "INVALID_SOURCE");
  }
  return parsed;
}

export async function readMailboxFile(filePath: string): Promise<unknown[]> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new MailboxConfigError(
      `Cannot read mailbox file ${filePath}: ${errorMessage(err)}`,
      "INVALID_SOURCE"
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new MailboxConfigError(
      `Mailbox file ${filePath} is not valid JSON: ${errorMessage(err)}`,
      "INVALID_SOURCE"
    );
  }
  if (!Array.isArray(parsed)) {
    throw new MailboxConfigError(
      `Mailbox file ${filePath} must contain a JSON array`,
      "INVALID_SOURCE"
    );
  }
  return parsed;
}

/** File entries come first, then MAILBOXES entries. */
export async function readMailboxEntries(config: SharedConfig): Promise<unknown[]> {
  const fromFile = config.mailboxes.file ? await readMailboxFile(config.mailboxes.file) : [];
  return [...fromFile, ...parseInlineEntries(config.mailboxes.inline)];
}

export async function loadConfiguredMailboxes(
  config: SharedConfig
): Promise<readonly MailboxDefinition[]> {
  return loadMailboxes(await readMailboxEntries(config));
}
