import { Hono } from "hono";
import { z } from "zod";
import { loadSharedConfig } from "../../config/shared.js";
import { headersFromRecord } from "../../parser/index.js";
import { findMailboxForRecipient, mailboxRegistry } from "../../router/index.js";

export const routingRoutes = new Hono();

const routingTestSchema = z.object({
  recipient: z.string(),
  clientHostname: z.string().optional(),
  clientIp: z.string().optional(),
  headers: z.record(z.string()).optional(),
});

/**
 * Dry run: which mailbox would receive mail for this recipient, client and
 * header set. Nothing is stored.
 */
routingRoutes.post("/test", async (c) => {
  const body: unknown = await c.req.json().catch(() => null);
  const parsed = routingTestSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "body";
    return c.json({ error: `Invalid request: ${where}: ${issue.message}` }, 400);
  }

  const { recipient, clientHostname, clientIp, headers } = parsed.data;
  const mailbox = findMailboxForRecipient(
    recipient,
    mailboxRegistry.current(),
    clientHostname,
    clientIp,
    headers ? headersFromRecord(headers) : undefined,
    { regexTimeoutMs: loadSharedConfig().routing.regexTimeoutMs }
  );

  return c.json({ data: { mailbox: mailbox?.name ?? null } });
});
