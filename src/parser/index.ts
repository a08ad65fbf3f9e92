import { simpleParser, type ParsedMail } from "mailparser";
import { createHash } from "node:crypto";
import type { ParsedEmail, ParsedAttachment } from "../types/index.js";
import { headersFromParsedMail } from "./headers.js";

export { createHeaderMap, headersFromRecord, headersFromParsedMail } from "./headers.js";

function addressListToString(
  addr: ParsedMail["to"]
): string | undefined {
  if (!addr) return undefined;
  const objects = Array.isArray(addr) ? addr : [addr];
  return objects
    .flatMap((a) =>
      a.value.map((v) => (v.name ? `${v.name} <${v.address ?? ""}>` : v.address ?? ""))
    )
    .join(", ");
}

export async function parseEmail(rawMessage: string): Promise<ParsedEmail> {
  const parsed = await simpleParser(rawMessage);

  const attachments: ParsedAttachment[] = (parsed.attachments || []).map(
    (att) => ({
      filename: att.filename,
      contentType: att.contentType,
      size: att.size,
      checksum: createHash("sha256").update(att.content).digest("hex"),
    })
  );

  return {
    messageId: parsed.messageId,
    subject: parsed.subject,
    from: addressListToString(parsed.from),
    to: addressListToString(parsed.to),
    cc: addressListToString(parsed.cc),
    date: parsed.date,
    headers: headersFromParsedMail(parsed),
    textBody: parsed.text,
    htmlBody: parsed.html || undefined,
    attachments,
    rawMessage,
  };
}
