import { describe, expect, it } from "vitest";
import {
  createRowRecord,
  MAX_CELL_LENGTH,
  parseKeywordList,
  rowValues,
  subjectPassesFilters,
  toSingleLine,
} from "../../../src/connectors/core/row.js";

describe("toSingleLine", () => {
  it("collapses line breaks and whitespace runs", () => {
    expect(toSingleLine("  Hello\r\n\n  world\tagain  ")).toBe("Hello world again");
  });
});

describe("createRowRecord", () => {
  it("normalizes every field to one line", () => {
    const row = createRowRecord({
      from: "Alice <alice@example.com>",
      subject: "Invoice\n#42",
      date: "2024-03-05 10:00:00 UTC",
      content: "Line one\nLine two\n\nLine three",
    });
    expect(rowValues(row)).toEqual([
      "Alice <alice@example.com>",
      "Invoice #42",
      "2024-03-05 10:00:00 UTC",
      "Line one Line two Line three",
    ]);
    expect(Object.isFrozen(row)).toBe(true);
  });

  it("truncates content that would overflow a cell", () => {
    const row = createRowRecord({
      from: "a",
      subject: "b",
      date: "c",
      content: "x".repeat(MAX_CELL_LENGTH + 10),
    });
    expect(row.content).toHaveLength(MAX_CELL_LENGTH);
    expect(row.content.endsWith("x…")).toBe(true);
  });

  it("keeps content of exactly the cell limit", () => {
    const content = "y".repeat(MAX_CELL_LENGTH);
    const row = createRowRecord({ from: "a", subject: "b", date: "c", content });
    expect(row.content).toBe(content);
  });
});

describe("parseKeywordList", () => {
  it("splits and trims, dropping blanks", () => {
    expect(parseKeywordList(" invoice, receipt ,,bill ")).toEqual([
      "invoice",
      "receipt",
      "bill",
    ]);
  });

  it("returns an empty list for missing input", () => {
    expect(parseKeywordList(undefined)).toEqual([]);
    expect(parseKeywordList("")).toEqual([]);
  });
});

describe("subjectPassesFilters", () => {
  it("passes everything with an empty filter", () => {
    expect(subjectPassesFilters("anything", { include: [], exclude: [] })).toBe(true);
  });

  it("requires one include keyword, case-insensitively", () => {
    const filter = { include: ["Invoice", "receipt"], exclude: [] };
    expect(subjectPassesFilters("Your RECEIPT from us", filter)).toBe(true);
    expect(subjectPassesFilters("invoice #7", filter)).toBe(true);
    expect(subjectPassesFilters("Newsletter", filter)).toBe(false);
  });

  it("lets exclude win over include", () => {
    const filter = { include: ["invoice"], exclude: ["draft"] };
    expect(subjectPassesFilters("Invoice DRAFT", filter)).toBe(false);
  });
});
