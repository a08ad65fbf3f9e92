import { describe, it, expect } from "vitest";
import { messageRepository, toSummary, type CreateMessageInput } from "../../src/store/index.js";

function input(mailbox: string, subject: string): CreateMessageInput {
  return {
    mailbox,
    subject,
    recipients: ["a@corp.test"],
    mailFrom: "sender@example.com",
    headers: {},
    attachments: [],
    rawMessage: `Subject: ${subject}\r\n\r\nbody\r\n`,
  };
}

describe("messageRepository", () => {
  it("lists newest first with pagination", async () => {
    await messageRepository.create(input("Corp", "one"));
    await messageRepository.create(input("Corp", "two"));
    await messageRepository.create(input("Corp", "three"));

    expect((await messageRepository.listByMailbox("Corp")).map((m) => m.subject)).toEqual([
      "three",
      "two",
      "one",
    ]);
    expect((await messageRepository.listByMailbox("Corp", 1, 1)).map((m) => m.subject)).toEqual(["two"]);
  });

  it("evicts the oldest messages past the per-mailbox limit", async () => {
    for (let i = 1; i <= 7; i++) {
      await messageRepository.create(input("Corp", `m${i}`));
    }
    await messageRepository.create(input("Billing", "kept"));

    expect(await messageRepository.countByMailbox("Corp")).toBe(5);
    expect((await messageRepository.listByMailbox("Corp")).map((m) => m.subject)).toEqual([
      "m7",
      "m6",
      "m5",
      "m4",
      "m3",
    ]);
    expect(await messageRepository.countByMailbox("Billing")).toBe(1);
  });

  it("finds and deletes by id", async () => {
    const message = await messageRepository.create(input("Corp", "target"));

    expect((await messageRepository.findById(message.id))?.subject).toBe("target");
    expect(await messageRepository.delete(message.id)).toBe(true);
    expect(await messageRepository.findById(message.id)).toBeUndefined();
    expect(await messageRepository.delete(message.id)).toBe(false);
  });

  it("empties a mailbox", async () => {
    await messageRepository.create(input("Corp", "a"));
    await messageRepository.create(input("Corp", "b"));

    expect(await messageRepository.deleteByMailbox("Corp")).toBe(2);
    expect(await messageRepository.countByMailbox("Corp")).toBe(0);
  });

  it("summaries leave out bodies and headers", async () => {
    const message = await messageRepository.create(input("Corp", "summary"));
    const summary = toSummary(message);

    expect(summary.subject).toBe("summary");
    expect("rawMessage" in summary).toBe(false);
    expect("headers" in summary).toBe(false);
  });
});
