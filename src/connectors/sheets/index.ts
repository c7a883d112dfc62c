export { SheetsClient } from "./client.js";
export { a1Sheet, DEFAULT_LAYOUT, SheetsSink } from "./sink.js";
export type { SheetsLayout, SpreadsheetClient } from "./types.js";
export { IDENTITY_HEADER, ROW_HEADER } from "./types.js";
