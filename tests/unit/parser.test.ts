import { describe, it, expect } from "vitest";
import { createHeaderMap, headersFromRecord, parseEmail } from "../../src/parser/index.js";
import { buildRawMessage } from "../helpers/raw-message.js";

describe("createHeaderMap", () => {
  it("lower-cases names", () => {
    const headers = createHeaderMap([["X-Application", "ledger"]]);
    expect(headers.get("x-application")).toBe("ledger");
    expect(headers.get("X-Application")).toBeUndefined();
  });

  it("keeps the first value of a repeated name", () => {
    const headers = createHeaderMap([
      ["X-Tag", "first"],
      ["x-tag", "second"],
    ]);
    expect(headers.get("x-tag")).toBe("first");
    expect(headers.size).toBe(1);
  });

  it("builds from a record", () => {
    expect([...headersFromRecord({ "X-One": "1", "X-Two": "2" })]).toEqual([
      ["x-one", "1"],
      ["x-two", "2"],
    ]);
  });
});

describe("parseEmail", () => {
  it("extracts envelope-independent fields", async () => {
    const raw = buildRawMessage({
      from: "Alerts <alerts@corp.test>",
      to: "Billing Team <team@billing.test>",
      subject: "Quarterly report",
      body: "numbers attached",
    });

    const parsed = await parseEmail(raw);
    expect(parsed.subject).toBe("Quarterly report");
    expect(parsed.from).toBe("Alerts <alerts@corp.test>");
    expect(parsed.to).toBe("Billing Team <team@billing.test>");
    expect(parsed.messageId).toBe("<test-1@example.com>");
    expect(parsed.textBody?.trim()).toBe("numbers attached");
    expect(parsed.rawMessage).toBe(raw);
  });

  it("exposes custom headers by lower-cased name", async () => {
    const parsed = await parseEmail(
      buildRawMessage({ headers: [["X-Application", "ledger"], ["X-Department", "billing"]] })
    );

    expect(parsed.headers.get("x-application")).toBe("ledger");
    expect(parsed.headers.get("x-department")).toBe("billing");
  });

  it("decodes encoded words in custom headers", async () => {
    const parsed = await parseEmail(
      buildRawMessage({
        headers: [
          ["X-Tenant", "=?UTF-8?Q?M=C3=BCller?="],
          ["X-Team", "=?UTF-8?B?w4lxdWlwZQ==?="],
        ],
      })
    );

    expect(parsed.headers.get("x-tenant")).toBe("Müller");
    expect(parsed.headers.get("x-team")).toBe("Équipe");
  });

  it("keeps structured headers as their raw text", async () => {
    const parsed = await parseEmail(buildRawMessage({ to: "Billing Team <team@billing.test>" }));
    expect(parsed.headers.get("to")).toBe("Billing Team <team@billing.test>");
    expect(parsed.headers.get("date")).toBe("Mon, 05 Oct 2026 10:00:00 +0000");
  });
});
