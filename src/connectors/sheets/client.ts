/**
 * Google Sheets API client wrapper over `googleapis` (sheets v4).
 *
 * Values are always written `RAW` so cell text such as `=SUM(...)` in a
 * subject is never evaluated as a formula.
 */

import { google, type sheets_v4 } from "googleapis";
import type { Logger, RateLimiter } from "../core/index.js";
import type { GoogleAuth } from "../google/auth.js";
import type { SpreadsheetClient } from "./types.js";

export class SheetsClient implements SpreadsheetClient {
  private readonly sheets: sheets_v4.Sheets;
  private readonly spreadsheetId: string;
  private readonly rateLimiter: RateLimiter;
  private readonly logger: Logger;

  constructor(
    auth: GoogleAuth,
    spreadsheetId: string,
    rateLimiter: RateLimiter,
    logger: Logger,
  ) {
    this.sheets = google.sheets({ version: "v4", auth });
    this.spreadsheetId = spreadsheetId;
    this.rateLimiter = rateLimiter;
    this.logger = logger;
  }

  async listSheetTitles(): Promise<string[]> {
    await this.rateLimiter.acquire();
    const res = await this.sheets.spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      fields: "sheets.properties.title",
    });
    const titles: string[] = [];
    for (const sheet of res.data.sheets ?? []) {
      const title = sheet.properties?.title;
      if (title) titles.push(title);
    }
    return titles;
  }

  async addSheets(titles: string[]): Promise<void> {
    if (titles.length === 0) return;
    await this.rateLimiter.acquire();
    await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: {
        requests: titles.map((title) => ({ addSheet: { properties: { title } } })),
      },
    });
    this.logger.info("Created sheet tabs", { titles });
  }

  async writeRow(range: string, values: string[]): Promise<void> {
    await this.rateLimiter.acquire();
    await this.sheets.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range,
      valueInputOption: "RAW",
      requestBody: { values: [values] },
    });
  }

  async readColumn(range: string): Promise<string[]> {
    await this.rateLimiter.acquire();
    const res = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range,
      majorDimension: "ROWS",
    });
    const column: string[] = [];
    for (const row of res.data.values ?? []) {
      const cell: unknown = row[0];
      if (cell !== undefined && cell !== null) column.push(String(cell));
    }
    return column;
  }

  async appendRows(range: string, rows: string[][]): Promise<number> {
    await this.rateLimiter.acquire();
    const res = await this.sheets.spreadsheets.values.append({
      spreadsheetId: this.spreadsheetId,
      range,
      valueInputOption: "RAW",
      insertDataOption: "INSERT_ROWS",
      requestBody: { values: rows },
    });
    const updated = res.data.updates?.updatedRows ?? 0;
    this.logger.debug("Appended rows", { range, updated });
    return updated;
  }
}
