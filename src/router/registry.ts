import { loadConfiguredMailboxes } from "../config/mailboxes.js";
import { logger } from "../config/logger.js";
import type { SharedConfig } from "../config/shared.js";
import type { MailboxDefinition } from "../types/index.js";

export interface MailboxRegistry {
  /** The list in effect right now. Callers should read it once per message. */
  current(): readonly MailboxDefinition[];
  /** Replace the whole list. In-flight routing keeps the list it already read. */
  publish(mailboxes: readonly MailboxDefinition[]): void;
}

export function createMailboxRegistry(
  initial: readonly MailboxDefinition[] = []
): MailboxRegistry {
  let snapshot: readonly MailboxDefinition[] = Object.freeze([...initial]);

  return {
    current: () => snapshot,
    publish(mailboxes) {
      snapshot = Object.freeze([...mailboxes]);
    },
  };
}

export const mailboxRegistry = createMailboxRegistry();

/**
 * Re-read the mailbox configuration and publish it. On a configuration error
 * the registry keeps its current list and the error is logged.
 */
export async function reloadMailboxes(
  registry: MailboxRegistry,
  config: SharedConfig
): Promise<boolean> {
  try {
    const mailboxes = await loadConfiguredMailboxes(config);
    registry.publish(mailboxes);
    logger.info({ mailboxes: mailboxes.map((m) => m.name) }, "Mailbox configuration reloaded");
    return true;
  } catch (err) {
    logger.error({ error: err }, "Mailbox reload failed, keeping previous configuration");
    return false;
  }
}
