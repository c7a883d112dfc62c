import type { gmail_v1 } from "googleapis";
import { describe, expect, it } from "vitest";
import { NotFoundError } from "../../../src/connectors/core/errors.js";
import { EMPTY_FILTER } from "../../../src/connectors/core/row.js";
import { buildQuery, GmailSource } from "../../../src/connectors/gmail/adapter.js";
import type { MailboxClient } from "../../../src/connectors/gmail/types.js";

class FakeMailboxClient implements MailboxClient {
  listCalls: { query: string; maxResults: number | null }[] = [];
  markCalls: string[][] = [];
  messages = new Map<string, gmail_v1.Schema$Message>();
  getFailure: unknown = null;

  async listMessageIds(query: string, maxResults: number | null): Promise<string[]> {
    this.listCalls.push({ query, maxResults });
    return [...this.messages.keys()];
  }

  async getMessage(messageId: string): Promise<gmail_v1.Schema$Message> {
    if (this.getFailure) throw this.getFailure;
    const msg = this.messages.get(messageId);
    if (!msg) throw Object.assign(new Error("Requested entity was not found."), { code: 404 });
    return msg;
  }

  async markAsRead(messageIds: string[]): Promise<void> {
    this.markCalls.push([...messageIds]);
  }
}

describe("buildQuery", () => {
  it("leaves the base query alone without keywords", () => {
    expect(buildQuery("in:inbox is:unread", EMPTY_FILTER)).toBe("in:inbox is:unread");
  });

  it("adds include and exclude subject clauses", () => {
    expect(
      buildQuery("in:inbox is:unread", {
        include: ["invoice", "receipt"],
        exclude: ["spam"],
      }),
    ).toBe("in:inbox is:unread subject:(invoice OR receipt) -subject:(spam)");
  });

  it("quotes multi-word keywords and strips embedded quotes", () => {
    expect(
      buildQuery("is:unread", { include: ["past due", 'say "hi"'], exclude: [] }),
    ).toBe('is:unread subject:("past due" OR "say hi")');
  });
});

describe("GmailSource", () => {
  it("lists with the built query and configured cap", async () => {
    const client = new FakeMailboxClient();
    client.messages.set("m1", { id: "m1" });
    const source = new GmailSource(client, { maxResults: 25 });

    const ids = await source.list({ include: ["invoice"], exclude: [] });

    expect(ids).toEqual(["m1"]);
    expect(client.listCalls).toEqual([
      { query: "in:inbox is:unread subject:(invoice)", maxResults: 25 },
    ]);
  });

  it("fetches a full message", async () => {
    const client = new FakeMailboxClient();
    client.messages.set("m1", { id: "m1", snippet: "hi" });
    await expect(new GmailSource(client).fetch("m1")).resolves.toEqual({
      id: "m1",
      snippet: "hi",
    });
  });

  it("turns a 404 into NotFoundError", async () => {
    const source = new GmailSource(new FakeMailboxClient());
    const err: unknown = await source.fetch("gone").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toMatchObject({ itemId: "gone" });
  });

  it("passes other failures through", async () => {
    const client = new FakeMailboxClient();
    const failure = { status: 500 };
    client.getFailure = failure;
    await expect(new GmailSource(client).fetch("m1")).rejects.toBe(failure);
  });

  it("acknowledges in batchModify-sized chunks", async () => {
    const client = new FakeMailboxClient();
    const ids = Array.from({ length: 2500 }, (_, i) => `m${i}`);

    await new GmailSource(client).acknowledge(ids);

    expect(client.markCalls.map((c) => c.length)).toEqual([1000, 1000, 500]);
    expect(client.markCalls[2]?.[0]).toBe("m2000");
  });
});
