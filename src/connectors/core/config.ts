/**
 * Run configuration. Sources are layered, later ones winning:
 * defaults → YAML file → environment → explicit overrides (CLI flags).
 */

import * as fs from "node:fs";
import { parse as parseYaml } from "yaml";
import { isLogLevel } from "./logger.js";
import { parseKeywordList } from "./row.js";
import type { LogLevel, SubjectFilter } from "./types.js";

export interface SyncConfig {
  spreadsheetId: string;
  sheets: { rows: string; identities: string };
  filter: SubjectFilter;
  retry: { maxAttempts: number; baseDelayMs: number; maxDelayMs: number };
  fetchConcurrency: number;
  acknowledgeBatchSize: number;
  /** Cap on listed candidates per run; null lists everything. */
  maxResults: number | null;
  /** Lock file path; null disables the run lease. */
  lockFile: string | null;
  logLevel: LogLevel;
}

export interface ConfigOverrides {
  spreadsheetId?: string;
  include?: string[];
  exclude?: string[];
  maxAttempts?: number;
  baseDelayMs?: number;
  lockFile?: string | null;
  logLevel?: LogLevel;
}

export const DEFAULT_LOCK_FILE = ".inbox-to-sheets.lock";

type LayerOf<T> = {
  [K in keyof T]?: T[K] extends object ? Partial<T[K]> : T[K];
};
type ConfigLayer = LayerOf<Omit<SyncConfig, "filter">> & {
  filter?: Partial<SubjectFilter>;
};

// ─── Value readers ───

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function positiveInt(value: unknown, key: string): number {
  const n =
    typeof value === "number"
      ? value
      : typeof value === "string" && /^\d+$/.test(value.trim())
        ? Number.parseInt(value, 10)
        : Number.NaN;
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(
      `Invalid ${key}: expected a positive integer, got ${JSON.stringify(value)}`,
    );
  }
  return n;
}

function optionalString(value: unknown, key: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new Error(`Invalid ${key}: expected a string`);
  }
  return value;
}

function keywordList(value: unknown, key: string): string[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return parseKeywordList(value);
  if (!Array.isArray(value)) {
    throw new Error(`Invalid ${key}: expected a list of strings`);
  }
  const keywords: string[] = [];
  for (const entry of value) {
    if (typeof entry !== "string") {
      throw new Error(`Invalid ${key}: expected a list of strings`);
    }
    if (entry.trim() !== "") keywords.push(entry.trim());
  }
  return keywords;
}

function logLevel(value: unknown, key: string): LogLevel | undefined {
  const raw = optionalString(value, key)?.toLowerCase();
  if (raw === undefined) return undefined;
  if (!isLogLevel(raw)) {
    throw new Error(`Invalid ${key}: expected debug, info, warn or error`);
  }
  return raw;
}

// ─── Layers ───

/** Read a YAML config file into a layer. */
export function readConfigFile(filePath: string): ConfigLayer {
  const doc: unknown = parseYaml(fs.readFileSync(filePath, "utf-8"));
  if (doc === null || doc === undefined) return {};
  if (!isRecord(doc)) {
    throw new Error(`Config file ${filePath} must contain a mapping`);
  }

  const sheets = isRecord(doc.sheets) ? doc.sheets : {};
  const subjects = isRecord(doc.subjects) ? doc.subjects : {};
  const retry = isRecord(doc.retry) ? doc.retry : {};
  const num = (v: unknown, key: string) =>
    v === undefined ? undefined : positiveInt(v, key);

  return {
    spreadsheetId: optionalString(doc.spreadsheetId, "spreadsheetId"),
    sheets: {
      rows: optionalString(sheets.rows, "sheets.rows"),
      identities: optionalString(sheets.identities, "sheets.identities"),
    },
    filter: {
      include: keywordList(subjects.include, "subjects.include"),
      exclude: keywordList(subjects.exclude, "subjects.exclude"),
    },
    retry: {
      maxAttempts: num(retry.maxAttempts, "retry.maxAttempts"),
      baseDelayMs: num(retry.baseDelayMs, "retry.baseDelayMs"),
      maxDelayMs: num(retry.maxDelayMs, "retry.maxDelayMs"),
    },
    fetchConcurrency: num(doc.fetchConcurrency, "fetchConcurrency"),
    acknowledgeBatchSize: num(doc.acknowledgeBatchSize, "acknowledgeBatchSize"),
    maxResults: num(doc.maxResults, "maxResults"),
    lockFile: optionalString(doc.lockFile, "lockFile"),
    logLevel: logLevel(doc.logLevel, "logLevel"),
  };
}

export function readEnv(env: NodeJS.ProcessEnv): ConfigLayer {
  const num = (name: string) => {
    const raw = env[name];
    return raw === undefined || raw === "" ? undefined : positiveInt(raw, name);
  };
  const str = (name: string) => {
    const raw = env[name];
    return raw === undefined || raw === "" ? undefined : raw;
  };

  return {
    spreadsheetId: str("SPREADSHEET_ID"),
    sheets: { rows: str("SHEET_EMAILS"), identities: str("SHEET_PROCESSED") },
    filter: {
      include: keywordList(str("SUBJECT_INCLUDE"), "SUBJECT_INCLUDE"),
      exclude: keywordList(str("SUBJECT_EXCLUDE"), "SUBJECT_EXCLUDE"),
    },
    retry: {
      maxAttempts: num("SYNC_MAX_ATTEMPTS"),
      baseDelayMs: num("SYNC_BACKOFF_BASE_MS"),
      maxDelayMs: num("SYNC_BACKOFF_MAX_MS"),
    },
    fetchConcurrency: num("SYNC_FETCH_CONCURRENCY"),
    acknowledgeBatchSize: num("SYNC_ACK_BATCH_SIZE"),
    maxResults: num("GMAIL_MAX_RESULTS"),
    lockFile: str("SYNC_LOCK_FILE"),
    logLevel: logLevel(str("LOG_LEVEL"), "LOG_LEVEL"),
  };
}

function fromOverrides(o: ConfigOverrides): ConfigLayer {
  return {
    spreadsheetId: o.spreadsheetId,
    filter: { include: o.include, exclude: o.exclude },
    retry: { maxAttempts: o.maxAttempts, baseDelayMs: o.baseDelayMs },
    lockFile: o.lockFile,
    logLevel: o.logLevel,
  };
}

function pick<T>(...values: (T | undefined)[]): T | undefined {
  for (let i = values.length - 1; i >= 0; i--) {
    const v = values[i];
    if (v !== undefined) return v;
  }
  return undefined;
}

export function loadConfig(
  opts: {
    env?: NodeJS.ProcessEnv;
    file?: string;
    overrides?: ConfigOverrides;
  } = {},
): SyncConfig {
  const layers: ConfigLayer[] = [
    opts.file ? readConfigFile(opts.file) : {},
    readEnv(opts.env ?? process.env),
    fromOverrides(opts.overrides ?? {}),
  ];

  const spreadsheetId = pick(...layers.map((l) => l.spreadsheetId));
  if (!spreadsheetId || spreadsheetId.trim() === "") {
    throw new Error(
      "Spreadsheet ID not configured. Set SPREADSHEET_ID, spreadsheetId in the config file, or pass --spreadsheet.",
    );
  }

  const lockFile = pick(...layers.map((l) => l.lockFile));

  return {
    spreadsheetId: spreadsheetId.trim(),
    sheets: {
      rows: pick(...layers.map((l) => l.sheets?.rows)) ?? "Emails",
      identities:
        pick(...layers.map((l) => l.sheets?.identities)) ?? "Processed",
    },
    filter: {
      include: pick(...layers.map((l) => l.filter?.include)) ?? [],
      exclude: pick(...layers.map((l) => l.filter?.exclude)) ?? [],
    },
    retry: {
      maxAttempts: pick(...layers.map((l) => l.retry?.maxAttempts)) ?? 3,
      baseDelayMs: pick(...layers.map((l) => l.retry?.baseDelayMs)) ?? 500,
      maxDelayMs: pick(...layers.map((l) => l.retry?.maxDelayMs)) ?? 30_000,
    },
    fetchConcurrency: pick(...layers.map((l) => l.fetchConcurrency)) ?? 4,
    acknowledgeBatchSize:
      pick(...layers.map((l) => l.acknowledgeBatchSize)) ?? 100,
    maxResults: pick(...layers.map((l) => l.maxResults)) ?? null,
    lockFile: lockFile === undefined ? DEFAULT_LOCK_FILE : lockFile,
    logLevel: pick(...layers.map((l) => l.logLevel)) ?? "info",
  };
}
