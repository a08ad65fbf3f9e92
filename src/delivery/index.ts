import { logger } from "../config/logger.js";
import { loadSharedConfig } from "../config/shared.js";
import { parseEmail } from "../parser/index.js";
import { findMailboxForRecipient } from "../router/index.js";
import { messageRepository, type StoredMessage } from "../store/index.js";
import type { InboundEnvelope, MailboxDefinition } from "../types/index.js";

export interface DeliveryResult {
  delivered: Array<{ mailbox: string; messageId: string; recipients: string[] }>;
  unrouted: string[];
}

export function normalizeClientIp(remoteIp: string): string {
  return remoteIp.replace(/^::ffff:/, "");
}

/**
 * Parse a received message, route every envelope recipient and store one
 * copy per selected mailbox.
 */
export async function deliverMessage(
  envelope: InboundEnvelope,
  mailboxes: readonly MailboxDefinition[]
): Promise<DeliveryResult> {
  const parsed = await parseEmail(envelope.rawMessage);
  const { regexTimeoutMs } = loadSharedConfig().routing;
  const clientIp = envelope.client.ip ? normalizeClientIp(envelope.client.ip) : undefined;

  const byMailbox = new Map<string, string[]>();
  const unrouted: string[] = [];

  for (const recipient of envelope.rcptTo) {
    const mailbox = findMailboxForRecipient(
      recipient,
      mailboxes,
      envelope.client.hostname,
      clientIp,
      parsed.headers,
      { regexTimeoutMs }
    );

    if (!mailbox) {
      unrouted.push(recipient);
      continue;
    }

    logger.debug({ recipient, mailbox: mailbox.name }, "Recipient routed");
    const recipients = byMailbox.get(mailbox.name) ?? [];
    recipients.push(recipient);
    byMailbox.set(mailbox.name, recipients);
  }

  if (unrouted.length > 0) {
    logger.warn(
      { unrouted, clientHostname: envelope.client.hostname, clientIp },
      "No mailbox matched recipient(s)"
    );
  }

  const headers = Object.fromEntries(parsed.headers);
  const stored: StoredMessage[] = [];
  for (const [mailbox, recipients] of byMailbox) {
    stored.push(
      await messageRepository.create({
        mailbox,
        recipients,
        mailFrom: envelope.mailFrom,
        clientHostname: envelope.client.hostname,
        clientIp,
        messageId: parsed.messageId,
        subject: parsed.subject,
        from: parsed.from,
        to: parsed.to,
        cc: parsed.cc,
        date: parsed.date,
        headers,
        textBody: parsed.textBody,
        htmlBody: parsed.htmlBody,
        attachments: parsed.attachments,
        rawMessage: envelope.rawMessage,
      })
    );
  }

  logger.info(
    {
      subject: parsed.subject,
      mailFrom: envelope.mailFrom,
      mailboxes: stored.map((m) => m.mailbox),
      unrouted: unrouted.length,
    },
    "Message delivered"
  );

  return {
    delivered: stored.map((m) => ({ mailbox: m.mailbox, messageId: m.id, recipients: m.recipients })),
    unrouted,
  };
}
