import type { RowRecord, SubjectFilter } from "./types.js";

/** Google Sheets rejects cells longer than this. */
export const MAX_CELL_LENGTH = 50_000;

/** Collapse every whitespace run, line breaks included, to one space. */
export function toSingleLine(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function fitCell(text: string): string {
  if (text.length <= MAX_CELL_LENGTH) return text;
  return `${text.slice(0, MAX_CELL_LENGTH - 1)}…`;
}

export function createRowRecord(fields: {
  from: string;
  subject: string;
  date: string;
  content: string;
}): RowRecord {
  return Object.freeze({
    from: fitCell(toSingleLine(fields.from)),
    subject: fitCell(toSingleLine(fields.subject)),
    date: toSingleLine(fields.date),
    content: fitCell(toSingleLine(fields.content)),
  });
}

/** Cell values in sheet column order: From, Subject, Date, Content. */
export function rowValues(row: RowRecord): string[] {
  return [row.from, row.subject, row.date, row.content];
}

// ─── Subject filter ───

export const EMPTY_FILTER: SubjectFilter = { include: [], exclude: [] };

/** Split a comma-separated keyword list, dropping blanks. */
export function parseKeywordList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s !== "");
}

/**
 * Case-insensitive substring match. Include acts as an allow list (any
 * keyword), exclude as a deny list.
 */
export function subjectPassesFilters(
  subject: string,
  filter: SubjectFilter,
): boolean {
  const lower = subject.toLowerCase();
  if (
    filter.include.length > 0 &&
    !filter.include.some((k) => lower.includes(k.toLowerCase()))
  ) {
    return false;
  }
  if (filter.exclude.some((k) => lower.includes(k.toLowerCase()))) {
    return false;
  }
  return true;
}
