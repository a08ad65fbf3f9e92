import { randomUUID } from "node:crypto";
import { loadSharedConfig } from "../config/shared.js";
import { logger } from "../config/logger.js";
import type { ParsedAttachment } from "../types/index.js";

export interface StoredMessage {
  id: string;
  mailbox: string;
  receivedAt: Date;
  mailFrom: string;
  /** Envelope recipients that were routed to this mailbox. */
  recipients: string[];
  clientHostname?: string;
  clientIp?: string;
  messageId?: string;
  subject?: string;
  from?: string;
  to?: string;
  cc?: string;
  date?: Date;
  headers: Record<string, string>;
  textBody?: string;
  htmlBody?: string;
  attachments: ParsedAttachment[];
  rawMessage: string;
}

export type CreateMessageInput = Omit<StoredMessage, "id" | "receivedAt">;

export type MessageSummary = Omit<StoredMessage, "rawMessage" | "textBody" | "htmlBody" | "headers">;

// Newest last; each array is replaced, never mutated, so readers see a stable list.
const mailboxes = new Map<string, readonly StoredMessage[]>();

function maxMessagesPerMailbox(): number {
  return loadSharedConfig().mailboxes.maxMessages;
}

export function toSummary(message: StoredMessage): MessageSummary {
  const { rawMessage: _raw, textBody: _text, htmlBody: _html, headers: _headers, ...summary } = message;
  return summary;
}

export const messageRepository = {
  async create(data: CreateMessageInput): Promise<StoredMessage> {
    const message: StoredMessage = {
      ...data,
      id: randomUUID(),
      receivedAt: new Date(),
    };

    const existing = mailboxes.get(data.mailbox) ?? [];
    const limit = maxMessagesPerMailbox();
    const next = [...existing, message];
    const evicted = next.length - limit;
    if (evicted > 0) {
      logger.debug({ mailbox: data.mailbox, evicted }, "Mailbox full, evicting oldest messages");
    }
    mailboxes.set(data.mailbox, evicted > 0 ? next.slice(evicted) : next);

    return message;
  },

  async findById(id: string): Promise<StoredMessage | undefined> {
    for (const messages of mailboxes.values()) {
      const found = messages.find((m) => m.id === id);
      if (found) return found;
    }
    return undefined;
  },

  /** Newest first. */
  async listByMailbox(mailbox: string, limit = 50, offset = 0): Promise<StoredMessage[]> {
    const messages = mailboxes.get(mailbox) ?? [];
    return [...messages].reverse().slice(offset, offset + limit);
  },

  async countByMailbox(mailbox: string): Promise<number> {
    return mailboxes.get(mailbox)?.length ?? 0;
  },

  async delete(id: string): Promise<boolean> {
    for (const [mailbox, messages] of mailboxes) {
      const remaining = messages.filter((m) => m.id !== id);
      if (remaining.length !== messages.length) {
        mailboxes.set(mailbox, remaining);
        return true;
      }
    }
    return false;
  },

  async deleteByMailbox(mailbox: string): Promise<number> {
    const count = mailboxes.get(mailbox)?.length ?? 0;
    mailboxes.delete(mailbox);
    return count;
  },

  async clear(): Promise<void> {
    mailboxes.clear();
  },
};
