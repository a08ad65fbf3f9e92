import { Hono } from "hono";
import { messageRepository } from "../../store/index.js";

export const messageRoutes = new Hono();

messageRoutes.get("/:id", async (c) => {
  const message = await messageRepository.findById(c.req.param("id"));
  if (!message) {
    return c.json({ error: "Message not found" }, 404);
  }
  return c.json({ data: message });
});

messageRoutes.get("/:id/raw", async (c) => {
  const message = await messageRepository.findById(c.req.param("id"));
  if (!message) {
    return c.json({ error: "Message not found" }, 404);
  }
  return c.text(message.rawMessage, 200, { "Content-Type": "message/rfc822" });
});

messageRoutes.delete("/:id", async (c) => {
  const deleted = await messageRepository.delete(c.req.param("id"));
  if (!deleted) {
    return c.json({ error: "Message not found" }, 404);
  }
  return c.json({ data: { deleted: true } });
});
