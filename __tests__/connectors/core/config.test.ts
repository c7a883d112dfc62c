import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  DEFAULT_LOCK_FILE,
  loadConfig,
} from "../../../src/connectors/core/config.js";

describe("loadConfig", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "inbox-to-sheets-config-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeYaml(content: string): string {
    const file = path.join(tmpDir, "config.yaml");
    fs.writeFileSync(file, content);
    return file;
  }

  it("fills defaults around the spreadsheet ID", () => {
    expect(loadConfig({ env: { SPREADSHEET_ID: " sheet-1 " } })).toEqual({
      spreadsheetId: "sheet-1",
      sheets: { rows: "Emails", identities: "Processed" },
      filter: { include: [], exclude: [] },
      retry: { maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 30_000 },
      fetchConcurrency: 4,
      acknowledgeBatchSize: 100,
      maxResults: null,
      lockFile: DEFAULT_LOCK_FILE,
      logLevel: "info",
    });
  });

  it("requires a spreadsheet ID", () => {
    expect(() => loadConfig({ env: {} })).toThrow("Spreadsheet ID not configured");
    expect(() => loadConfig({ env: { SPREADSHEET_ID: "   " } })).toThrow(
      "Spreadsheet ID not configured",
    );
  });

  it("layers file, environment and overrides", () => {
    const file = writeYaml(
      [
        "spreadsheetId: from-file",
        "sheets:",
        "  rows: Inbox",
        "subjects:",
        "  include: [invoice]",
        "retry:",
        "  maxAttempts: 5",
        "  maxDelayMs: 10000",
        "maxResults: 50",
      ].join("\n"),
    );

    const config = loadConfig({
      file,
      env: { SPREADSHEET_ID: "from-env", SUBJECT_EXCLUDE: "spam, promo" },
      overrides: { maxAttempts: 7 },
    });

    expect(config.spreadsheetId).toBe("from-env");
    expect(config.sheets).toEqual({ rows: "Inbox", identities: "Processed" });
    expect(config.filter).toEqual({ include: ["invoice"], exclude: ["spam", "promo"] });
    expect(config.retry).toEqual({ maxAttempts: 7, baseDelayMs: 500, maxDelayMs: 10_000 });
    expect(config.maxResults).toBe(50);
  });

  it("accepts a comma-separated keyword string in the file", () => {
    const file = writeYaml("spreadsheetId: s\nsubjects:\n  include: invoice, receipt\n");
    expect(loadConfig({ file, env: {} }).filter.include).toEqual(["invoice", "receipt"]);
  });

  it("lets an override disable the lock file", () => {
    const config = loadConfig({
      env: { SPREADSHEET_ID: "s", SYNC_LOCK_FILE: "/tmp/run.lock" },
      overrides: { lockFile: null },
    });
    expect(config.lockFile).toBeNull();
  });

  it("reads the lock file path from the environment", () => {
    const config = loadConfig({
      env: { SPREADSHEET_ID: "s", SYNC_LOCK_FILE: "/tmp/run.lock" },
    });
    expect(config.lockFile).toBe("/tmp/run.lock");
  });

  it("normalizes the log level", () => {
    expect(loadConfig({ env: { SPREADSHEET_ID: "s", LOG_LEVEL: "DEBUG" } }).logLevel).toBe(
      "debug",
    );
    expect(() => loadConfig({ env: { SPREADSHEET_ID: "s", LOG_LEVEL: "loud" } })).toThrow(
      "Invalid LOG_LEVEL",
    );
  });

  it("rejects non-positive integers", () => {
    expect(() =>
      loadConfig({ env: { SPREADSHEET_ID: "s", SYNC_MAX_ATTEMPTS: "0" } }),
    ).toThrow('Invalid SYNC_MAX_ATTEMPTS: expected a positive integer, got "0"');
    expect(() =>
      loadConfig({ env: { SPREADSHEET_ID: "s", SYNC_FETCH_CONCURRENCY: "four" } }),
    ).toThrow("Invalid SYNC_FETCH_CONCURRENCY");
  });

  it("rejects a file that is not a mapping", () => {
    const file = writeYaml("- just\n- a list\n");
    expect(() => loadConfig({ file, env: {} })).toThrow("must contain a mapping");
  });
});
