import { MailboxConfigError, loadConfiguredMailboxes } from "../config/mailboxes.js";
import type { SharedConfig } from "../config/shared.js";
import { headersFromRecord } from "../parser/index.js";
import { findMailboxForRecipient } from "../router/index.js";
import type { MailboxDefinition } from "../types/index.js";

export function parseArgs(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith("--")) {
      const key = args[i].slice(2);
      const value = args[i + 1];
      if (value && !value.startsWith("--")) {
        result[key] = value;
        i++;
      } else {
        result[key] = "true";
      }
    }
  }
  return result;
}

export function parseHeadersOption(raw: string): Record<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error("Invalid JSON in --headers");
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error("--headers must be a JSON object");
  }

  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(parsed)) {
    if (typeof value !== "string") {
      throw new Error(`Header "${name}" must have a string value`);
    }
    headers[name] = value;
  }
  return headers;
}

function describeFilters(mailbox: MailboxDefinition): string {
  const parts: string[] = [];
  if (mailbox.sourceFilters?.length) parts.push(`${mailbox.sourceFilters.length} source`);
  if (mailbox.headerFilters?.length) parts.push(`${mailbox.headerFilters.length} header`);
  return parts.length > 0 ? parts.join(", ") : "-";
}

export function formatMailboxTable(mailboxes: readonly MailboxDefinition[]): string[] {
  return [
    "",
    `${"#".padEnd(4)} ${"Name".padEnd(25)} ${"Filters".padEnd(20)} Recipients`,
    "-".repeat(90),
    ...mailboxes.map(
      (mailbox, index) =>
        `${String(index + 1).padEnd(4)} ${mailbox.name.padEnd(25)} ${describeFilters(mailbox).padEnd(20)} ${mailbox.recipients || "-"}`
    ),
    "",
    `Total: ${mailboxes.length} mailbox(es)`,
  ];
}

/** Details for the named mailbox (case-insensitive), or undefined when it is not configured. */
export function formatMailboxDetails(
  mailboxes: readonly MailboxDefinition[],
  name: string
): string[] | undefined {
  const index = mailboxes.findIndex((m) => m.name.toLowerCase() === name.toLowerCase());
  if (index === -1) {
    return undefined;
  }
  const mailbox = mailboxes[index];

  const sources = mailbox.sourceFilters?.length
    ? mailbox.sourceFilters.map((filter) => `  - ${filter.pattern ?? "(empty)"}`)
    : ["  -"];
  const headers = mailbox.headerFilters?.length
    ? mailbox.headerFilters.map((filter) => `  - ${filter.header}: ${filter.pattern || "(present)"}`)
    : ["  -"];

  return [
    "",
    `Name:        ${mailbox.name}`,
    `Order:       ${index + 1}`,
    `Recipients:  ${mailbox.recipients || "-"}`,
    "Source filters:",
    ...sources,
    "Header filters:",
    ...headers,
  ];
}

export interface RouteOutcome {
  mailbox: MailboxDefinition | undefined;
  line: string;
}

export function routeRecipient(
  mailboxes: readonly MailboxDefinition[],
  recipient: string,
  opts: Record<string, string>,
  regexTimeoutMs: number
): RouteOutcome {
  const headers = opts.headers ? headersFromRecord(parseHeadersOption(opts.headers)) : undefined;
  const mailbox = findMailboxForRecipient(
    recipient,
    mailboxes,
    opts.hostname,
    opts.ip,
    headers,
    { regexTimeoutMs }
  );

  return {
    mailbox,
    line: mailbox ? `${recipient} -> ${mailbox.name}` : `${recipient} -> no matching mailbox`,
  };
}

export interface ValidationOutcome {
  ok: boolean;
  line: string;
}

export async function validateMailboxes(config: SharedConfig): Promise<ValidationOutcome> {
  try {
    const mailboxes = await loadConfiguredMailboxes(config);
    return { ok: true, line: `Mailbox configuration OK: ${mailboxes.length} mailbox(es)` };
  } catch (err) {
    if (err instanceof MailboxConfigError) {
      return { ok: false, line: `Invalid mailbox configuration (${err.code}): ${err.message}` };
    }
    throw err;
  }
}
