import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from "vitest";
import type { SMTPServer } from "smtp-server";
import { createSmtpServer, startSmtpServer } from "../../src/smtp/index.js";
import { loadMailboxes } from "../../src/config/mailboxes.js";
import { mailboxRegistry } from "../../src/router/index.js";
import { messageRepository } from "../../src/store/index.js";
import { sendTestEmail } from "../helpers/smtp-client.js";

const mailboxes = loadMailboxes(
  [
    {
      name: "Filtered",
      recipients: "*@sales.com",
      sourceFilters: [{ pattern: "legacy.dev.example.org" }],
      headerFilters: [{ header: "X-Application", pattern: "app1" }],
    },
    "Sales=*@sales.com",
    { name: "Loopback", recipients: "*@loopback.test", sourceFilters: [{ pattern: "127.0.0.*" }] },
    "Support=/^support-.*@example\\.com$/",
  ],
  { appendDefault: false }
);

describe("smtp routing", () => {
  let server: SMTPServer | null = null;

  beforeAll(async () => {
    server = createSmtpServer(mailboxRegistry);
    await startSmtpServer(server);
  });

  afterAll(async () => {
    if (server) {
      await new Promise<void>((resolve) => server?.close(() => resolve()));
    }
  });

  beforeEach(() => {
    mailboxRegistry.publish(mailboxes);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("routes by recipient pattern", async () => {
    await sendTestEmail({
      from: "sender@example.com",
      to: "buyer@sales.com",
      subject: "Plain sales",
      text: "hello",
    });

    const [message] = await messageRepository.listByMailbox("Sales");
    expect(message.subject).toBe("Plain sales");
    expect(message.recipients).toEqual(["buyer@sales.com"]);
    expect(message.mailFrom).toBe("sender@example.com");
  });

  it("routes by client hostname and header together", async () => {
    await sendTestEmail({
      from: "app@example.com",
      to: "buyer@sales.com",
      subject: "Filtered sales",
      text: "hello",
      clientName: "legacy.dev.example.org",
      headers: { "X-Application": "app1" },
    });

    const [message] = await messageRepository.listByMailbox("Filtered");
    expect(message.subject).toBe("Filtered sales");
    expect(message.clientHostname).toBe("legacy.dev.example.org");
    expect(await messageRepository.countByMailbox("Sales")).toBe(0);
  });

  it("falls through when only the header differs", async () => {
    await sendTestEmail({
      from: "app@example.com",
      to: "buyer@sales.com",
      subject: "Other app",
      text: "hello",
      clientName: "legacy.dev.example.org",
      headers: { "X-Application": "app2" },
    });

    expect(await messageRepository.countByMailbox("Filtered")).toBe(0);
    expect(await messageRepository.countByMailbox("Sales")).toBe(1);
  });

  it("routes by client IP", async () => {
    await sendTestEmail({
      from: "sender@example.com",
      to: "anyone@loopback.test",
      subject: "Loopback",
      text: "hello",
    });

    const [message] = await messageRepository.listByMailbox("Loopback");
    expect(message.clientIp).toBe("127.0.0.1");
  });

  it("routes regex recipients and splits recipients across mailboxes", async () => {
    await sendTestEmail({
      from: "sender@example.com",
      to: ["support-tier1@example.com", "buyer@sales.com"],
      subject: "Split",
      text: "hello",
    });

    expect((await messageRepository.listByMailbox("Support"))[0].recipients).toEqual([
      "support-tier1@example.com",
    ]);
    expect((await messageRepository.listByMailbox("Sales"))[0].recipients).toEqual(["buyer@sales.com"]);
  });

  it("accepts the message when at least one recipient is routed", async () => {
    const info = await sendTestEmail({
      from: "sender@example.com",
      to: ["buyer@sales.com", "nobody@elsewhere.test"],
      subject: "Partial",
      text: "hello",
    });

    expect(info.accepted).toEqual(["buyer@sales.com", "nobody@elsewhere.test"]);
    expect((await messageRepository.listByMailbox("Sales"))[0].recipients).toEqual(["buyer@sales.com"]);
  });

  it("rejects the message with 550 when no recipient is routed", async () => {
    await expect(
      sendTestEmail({
        from: "sender@example.com",
        to: "nobody@elsewhere.test",
        subject: "Unroutable",
        text: "hello",
      })
    ).rejects.toMatchObject({ responseCode: 550 });
  });

  it("uses the list published at delivery time", async () => {
    mailboxRegistry.publish(loadMailboxes(["Everything=*"], { appendDefault: false }));

    await sendTestEmail({
      from: "sender@example.com",
      to: "nobody@elsewhere.test",
      subject: "After reload",
      text: "hello",
    });

    expect((await messageRepository.listByMailbox("Everything"))[0].subject).toBe("After reload");
  });

  it("rejects a message over the size limit with 552", async () => {
    await expect(
      sendTestEmail({
        from: "sender@example.com",
        to: "buyer@sales.com",
        subject: "Too large",
        text: "X".repeat(1536 * 1024),
      })
    ).rejects.toMatchObject({ responseCode: 552 });

    expect(await messageRepository.countByMailbox("Sales")).toBe(0);
  });

  it("answers 451 when the message cannot be stored", async () => {
    vi.spyOn(messageRepository, "create").mockRejectedValue(new Error("store unavailable"));

    await expect(
      sendTestEmail({
        from: "sender@example.com",
        to: "buyer@sales.com",
        subject: "Store down",
        text: "hello",
      })
    ).rejects.toMatchObject({ responseCode: 451 });
  });
});
