import { describe, expect, it } from "vitest";
import { TransientError } from "../../../src/connectors/core/errors.js";
import { silentLogger } from "../../../src/connectors/core/logger.js";
import { createRowRecord } from "../../../src/connectors/core/row.js";
import { a1Sheet, SheetsSink } from "../../../src/connectors/sheets/sink.js";
import type { SpreadsheetClient } from "../../../src/connectors/sheets/types.js";

// ─── In-memory workbook ───

function sheetOf(range: string): string {
  const name = range.slice(0, range.lastIndexOf("!"));
  return name.startsWith("'") ? name.slice(1, -1).replace(/''/g, "'") : name;
}

class FakeWorkbook implements SpreadsheetClient {
  tabs = new Map<string, string[][]>();
  added: string[][] = [];
  appendRanges: string[] = [];
  listCalls = 0;
  listFailures: unknown[] = [];
  /** Rows the next append silently drops. */
  dropRows = 0;

  async listSheetTitles(): Promise<string[]> {
    this.listCalls++;
    const failure = this.listFailures.shift();
    if (failure) throw failure;
    return [...this.tabs.keys()];
  }

  async addSheets(titles: string[]): Promise<void> {
    this.added.push([...titles]);
    for (const title of titles) this.tabs.set(title, []);
  }

  async writeRow(range: string, values: string[]): Promise<void> {
    this.tab(range)[0] = [...values];
  }

  async readColumn(range: string): Promise<string[]> {
    return this.tab(range)
      .slice(1)
      .map((row) => row[0]);
  }

  async appendRows(range: string, rows: string[][]): Promise<number> {
    this.appendRanges.push(range);
    const kept = rows.slice(0, rows.length - this.dropRows);
    this.dropRows = 0;
    this.tab(range).push(...kept);
    return kept.length;
  }

  private tab(range: string): string[][] {
    const rows = this.tabs.get(sheetOf(range));
    if (!rows) throw new Error(`Unable to parse range: ${range}`);
    return rows;
  }
}

const row = (subject: string) =>
  createRowRecord({
    from: "sender@example.com",
    subject,
    date: "2024-01-01 00:00:00 UTC",
    content: `About ${subject}`,
  });

// ─── Tests ───

describe("a1Sheet", () => {
  it("quotes titles that need it", () => {
    expect(a1Sheet("Emails")).toBe("Emails");
    expect(a1Sheet("Mail Log")).toBe("'Mail Log'");
    expect(a1Sheet("Bob's")).toBe("'Bob''s'");
  });
});

describe("SheetsSink", () => {
  it("creates missing tabs with header rows on first use", async () => {
    const book = new FakeWorkbook();
    const sink = new SheetsSink(book, silentLogger);

    await expect(sink.readIdentities()).resolves.toEqual([]);

    expect(book.added).toEqual([["Emails", "Processed"]]);
    expect(book.tabs.get("Emails")).toEqual([["From", "Subject", "Date", "Content"]]);
    expect(book.tabs.get("Processed")).toEqual([["messageId"]]);
  });

  it("only creates the tabs that are missing, once", async () => {
    const book = new FakeWorkbook();
    book.tabs.set("Emails", [["From", "Subject", "Date", "Content"]]);
    const sink = new SheetsSink(book, silentLogger);

    await sink.readIdentities();
    await sink.appendIdentities(["m1"]);

    expect(book.added).toEqual([["Processed"]]);
    expect(book.listCalls).toBe(1);
  });

  it("tries the tab check again after a failure", async () => {
    const book = new FakeWorkbook();
    book.listFailures = [new TransientError("503")];
    const sink = new SheetsSink(book, silentLogger);

    await expect(sink.readIdentities()).rejects.toThrow("503");
    await expect(sink.readIdentities()).resolves.toEqual([]);
    expect(book.listCalls).toBe(2);
  });

  it("reads identities below the header, dropping blanks", async () => {
    const book = new FakeWorkbook();
    book.tabs.set("Emails", []);
    book.tabs.set("Processed", [["messageId"], [" m1 "], [""], ["m2"]]);

    await expect(new SheetsSink(book, silentLogger).readIdentities()).resolves.toEqual([
      "m1",
      "m2",
    ]);
  });

  it("appends rows in column order", async () => {
    const book = new FakeWorkbook();
    const sink = new SheetsSink(book, silentLogger);

    await sink.appendRows([row("Invoice 1"), row("Invoice 2")]);

    expect(book.appendRanges).toEqual(["Emails!A2"]);
    expect(book.tabs.get("Emails")?.slice(1)).toEqual([
      ["sender@example.com", "Invoice 1", "2024-01-01 00:00:00 UTC", "About Invoice 1"],
      ["sender@example.com", "Invoice 2", "2024-01-01 00:00:00 UTC", "About Invoice 2"],
    ]);
  });

  it("addresses custom tab names in A1 notation", async () => {
    const book = new FakeWorkbook();
    const sink = new SheetsSink(book, silentLogger, { identitiesSheet: "Seen Ids" });

    await sink.appendIdentities(["m1", "m2"]);

    expect(book.appendRanges).toEqual(["'Seen Ids'!A2"]);
    expect(await sink.readIdentities()).toEqual(["m1", "m2"]);
  });

  it("fails when the sheet reports fewer rows than sent", async () => {
    const book = new FakeWorkbook();
    const sink = new SheetsSink(book, silentLogger);
    await sink.readIdentities();
    book.dropRows = 1;

    const err: unknown = await sink.appendRows([row("a"), row("b")]).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransientError);
    expect(err).toMatchObject({ message: "Sheet 'Emails' reported 1 of 2 rows written" });
  });

  it("makes no calls for empty batches", async () => {
    const book = new FakeWorkbook();
    const sink = new SheetsSink(book, silentLogger);
    await sink.appendRows([]);
    await sink.appendIdentities([]);
    expect(book.listCalls).toBe(0);
  });
});
