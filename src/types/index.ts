/** Case-insensitive header lookup: keys are always lower-cased header names. */
export type MessageHeaders = ReadonlyMap<string, string>;

export interface HeaderFilter {
  /** Header name, e.g. "X-Application". Compared case-insensitively. */
  header: string;
  /** Value pattern. Empty or missing means the header only has to be present. */
  pattern?: string;
}

export interface SourceFilter {
  /** Tested against the client hostname first, then the client IP. */
  pattern?: string;
}

export interface MailboxDefinition {
  name: string;
  /** Comma-separated glob and/or /regex/ expressions. */
  recipients: string;
  headerFilters?: readonly HeaderFilter[];
  sourceFilters?: readonly SourceFilter[];
}

export interface ParsedEmail {
  messageId?: string;
  subject?: string;
  from?: string;
  to?: string;
  cc?: string;
  date?: Date;
  headers: MessageHeaders;
  textBody?: string;
  htmlBody?: string;
  attachments: ParsedAttachment[];
  rawMessage: string;
}

export interface ParsedAttachment {
  filename?: string;
  contentType: string;
  size: number;
  checksum?: string;
}

export interface ClientIdentity {
  /** Name the client announced in HELO/EHLO. */
  hostname?: string;
  ip?: string;
}

export interface InboundEnvelope {
  rawMessage: string;
  mailFrom: string;
  rcptTo: string[];
  client: ClientIdentity;
}
