export interface RawMessageOptions {
  from?: string;
  to?: string;
  subject?: string;
  headers?: Array<[string, string]>;
  body?: string;
}

/** Build a minimal RFC 5322 message with CRLF line endings. */
export function buildRawMessage(options: RawMessageOptions = {}): string {
  const lines = [
    `From: ${options.from ?? "sender@example.com"}`,
    `To: ${options.to ?? "receiver@example.com"}`,
    `Subject: ${options.subject ?? "Test message"}`,
    "Message-ID: <test-1@example.com>",
    "Date: Mon, 05 Oct 2026 10:00:00 +0000",
    ...(options.headers ?? []).map(([name, value]) => `${name}: ${value}`),
    "",
    options.body ?? "hello",
    "",
  ];
  return lines.join("\r\n");
}
