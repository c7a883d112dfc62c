/** Sheets connector types. */

export interface SheetsLayout {
  /** Tab receiving one row per message. */
  rowsSheet: string;
  /** Tab holding one processed message id per row. */
  identitiesSheet: string;
}

export const ROW_HEADER = ["From", "Subject", "Date", "Content"];
export const IDENTITY_HEADER = ["messageId"];

/**
 * The spreadsheet calls the sink makes. `SheetsClient` implements it over
 * googleapis; tests supply an in-memory workbook.
 */
export interface SpreadsheetClient {
  listSheetTitles(): Promise<string[]>;
  addSheets(titles: string[]): Promise<void>;
  writeRow(range: string, values: string[]): Promise<void>;
  readColumn(range: string): Promise<string[]>;
  /** Append rows; resolves to the number of rows the API reports written. */
  appendRows(range: string, rows: string[][]): Promise<number>;
}
