/**
 * Spreadsheet sink: rows go to one tab, processed identities to another.
 *
 *   Emails     From | Subject | Date | Content   (header in row 1)
 *   Processed  messageId                         (header in row 1)
 *
 * Both appends count as durable only when the API reports every row
 * written.
 */

import type { ItemIdentity, Logger, RowRecord, SinkAdapter } from "../core/index.js";
import { rowValues, TransientError } from "../core/index.js";
import {
  IDENTITY_HEADER,
  ROW_HEADER,
  type SheetsLayout,
  type SpreadsheetClient,
} from "./types.js";

export const DEFAULT_LAYOUT: SheetsLayout = {
  rowsSheet: "Emails",
  identitiesSheet: "Processed",
};

/** Quote a tab title for A1 notation when it needs it. */
export function a1Sheet(title: string): string {
  return /^[A-Za-z0-9_]+$/.test(title)
    ? title
    : `'${title.replace(/'/g, "''")}'`;
}

export class SheetsSink implements SinkAdapter {
  readonly name = "sheets";
  private readonly client: SpreadsheetClient;
  private readonly layout: SheetsLayout;
  private readonly logger: Logger;
  private ready: Promise<void> | null = null;

  constructor(
    client: SpreadsheetClient,
    logger: Logger,
    layout: Partial<SheetsLayout> = {},
  ) {
    this.client = client;
    this.logger = logger;
    this.layout = { ...DEFAULT_LAYOUT, ...layout };
  }

  async readIdentities(): Promise<ItemIdentity[]> {
    await this.ensureSheets();
    const ids = await this.client.readColumn(
      `${a1Sheet(this.layout.identitiesSheet)}!A2:A`,
    );
    return ids.map((id) => id.trim()).filter((id) => id !== "");
  }

  async appendRows(rows: RowRecord[]): Promise<void> {
    if (rows.length === 0) return;
    await this.ensureSheets();
    await this.append(this.layout.rowsSheet, rows.map(rowValues));
  }

  async appendIdentities(ids: ItemIdentity[]): Promise<void> {
    if (ids.length === 0) return;
    await this.ensureSheets();
    await this.append(
      this.layout.identitiesSheet,
      ids.map((id) => [id]),
    );
  }

  private async append(sheet: string, values: string[][]): Promise<void> {
    const written = await this.client.appendRows(`${a1Sheet(sheet)}!A2`, values);
    if (written !== values.length) {
      throw new TransientError(
        `Sheet '${sheet}' reported ${written} of ${values.length} rows written`,
      );
    }
    this.logger.info(`Appended ${written} rows to '${sheet}'`);
  }

  /**
   * Create missing tabs and their header rows. Runs once per sink; a
   * failure is not cached so the next call tries again.
   */
  private ensureSheets(): Promise<void> {
    if (!this.ready) {
      this.ready = this.createMissingSheets().catch((err: unknown) => {
        this.ready = null;
        throw err;
      });
    }
    return this.ready;
  }

  private async createMissingSheets(): Promise<void> {
    const existing = new Set(await this.client.listSheetTitles());
    const wanted: [string, string[]][] = [
      [this.layout.rowsSheet, ROW_HEADER],
      [this.layout.identitiesSheet, IDENTITY_HEADER],
    ];
    const missing = wanted.filter(([title]) => !existing.has(title));
    if (missing.length === 0) return;

    await this.client.addSheets(missing.map(([title]) => title));
    for (const [title, header] of missing) {
      await this.client.writeRow(`${a1Sheet(title)}!A1`, header);
    }
  }
}
