import { matches, type MatchOptions } from "../matcher/index.js";
import type {
  HeaderFilter,
  MailboxDefinition,
  MessageHeaders,
  SourceFilter,
} from "../types/index.js";

export {
  createMailboxRegistry,
  mailboxRegistry,
  reloadMailboxes,
  type MailboxRegistry,
} from "./registry.js";

function isBlank(value: string | null | undefined): boolean {
  return value === undefined || value === null || value.trim() === "";
}

/**
 * True when `recipient` matches any element of the mailbox's recipient
 * expression. A blank expression matches nothing.
 */
export function matchesRecipientPattern(
  recipient: string,
  recipientPatterns: string | undefined,
  options: MatchOptions = {}
): boolean {
  return matches(recipient, recipientPatterns, options);
}

/**
 * A header filter matches when the header is present (name compared
 * case-insensitively) and, if the filter carries a pattern, its value
 * matches that pattern. A blank pattern only checks presence.
 */
export function matchesHeaderFilter(
  headers: MessageHeaders | null | undefined,
  filter: HeaderFilter,
  options: MatchOptions = {}
): boolean {
  if (!headers || isBlank(filter.header)) {
    return false;
  }

  const value = headers.get(filter.header.toLowerCase());
  if (value === undefined) {
    return false;
  }

  if (isBlank(filter.pattern)) {
    return true;
  }

  return matches(value, filter.pattern, options);
}

/**
 * A source filter is tested against the announced client hostname first and
 * falls back to the client IP when the hostname does not match.
 */
export function matchesSourceFilter(
  clientHostname: string | null | undefined,
  clientIp: string | null | undefined,
  filter: SourceFilter,
  options: MatchOptions = {}
): boolean {
  if (isBlank(filter.pattern)) {
    return false;
  }

  if (clientHostname && matches(clientHostname, filter.pattern, options)) {
    return true;
  }

  if (!clientIp) {
    return false;
  }

  return matches(clientIp, filter.pattern, options);
}

/**
 * Pick the mailbox that should receive mail for `recipient`.
 *
 * Mailboxes are evaluated in order and the first one whose source filters,
 * header filters and recipient expression all match wins. Returns undefined
 * when nothing matches; there is no implicit fallback mailbox.
 */
export function findMailboxForRecipient(
  recipient: string | null | undefined,
  mailboxes: Iterable<MailboxDefinition>,
  clientHostname?: string | null,
  clientIp?: string | null,
  headers?: MessageHeaders | null,
  options: MatchOptions = {}
): MailboxDefinition | undefined {
  if (!recipient || recipient.trim() === "") {
    return undefined;
  }

  for (const mailbox of mailboxes) {
    const sourceFilters = mailbox.sourceFilters ?? [];
    if (
      sourceFilters.length > 0 &&
      !sourceFilters.every((filter) =>
        matchesSourceFilter(clientHostname, clientIp, filter, options)
      )
    ) {
      continue;
    }

    const headerFilters = mailbox.headerFilters ?? [];
    if (
      headerFilters.length > 0 &&
      !headerFilters.every((filter) => matchesHeaderFilter(headers, filter, options))
    ) {
      continue;
    }

    if (matchesRecipientPattern(recipient, mailbox.recipients, options)) {
      return mailbox;
    }
  }

  return undefined;
}
