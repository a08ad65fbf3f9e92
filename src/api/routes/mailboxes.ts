import { Hono } from "hono";
import { mailboxRegistry } from "../../router/index.js";
import { messageRepository, toSummary } from "../../store/index.js";

const MAX_LIMIT = 100;
const MAX_PAGE = 1000;

const parsePagination = (query: Record<string, string | undefined>) => {
  const pageRaw = Number.parseInt(query.page ?? "", 10);
  const limitRaw = Number.parseInt(query.limit ?? "", 10);
  const page = Number.isFinite(pageRaw) && pageRaw > 0 ? Math.min(pageRaw, MAX_PAGE) : 1;
  const limit = Number.isFinite(limitRaw) && limitRaw > 0 ? limitRaw : 20;
  return { page, limit: Math.min(limit, MAX_LIMIT) };
};

function findConfigured(name: string) {
  return mailboxRegistry.current().find((m) => m.name.toLowerCase() === name.toLowerCase());
}

export const mailboxRoutes = new Hono();

mailboxRoutes.get("/", async (c) => {
  const mailboxes = mailboxRegistry.current();
  const data = await Promise.all(
    mailboxes.map(async (mailbox, index) => ({
      order: index + 1,
      name: mailbox.name,
      recipients: mailbox.recipients,
      headerFilters: mailbox.headerFilters ?? [],
      sourceFilters: mailbox.sourceFilters ?? [],
      messageCount: await messageRepository.countByMailbox(mailbox.name),
    }))
  );
  return c.json({ data });
});

mailboxRoutes.get("/:name/messages", async (c) => {
  const mailbox = findConfigured(c.req.param("name"));
  if (!mailbox) {
    return c.json({ error: "Mailbox not found" }, 404);
  }

  const { page, limit } = parsePagination(c.req.query());
  const [total, messages] = await Promise.all([
    messageRepository.countByMailbox(mailbox.name),
    messageRepository.listByMailbox(mailbox.name, limit, (page - 1) * limit),
  ]);

  return c.json({ data: messages.map(toSummary), total, page, limit });
});

mailboxRoutes.delete("/:name/messages", async (c) => {
  const mailbox = findConfigured(c.req.param("name"));
  if (!mailbox) {
    return c.json({ error: "Mailbox not found" }, 404);
  }

  const deleted = await messageRepository.deleteByMailbox(mailbox.name);
  return c.json({ data: { mailbox: mailbox.name, deleted } });
});
