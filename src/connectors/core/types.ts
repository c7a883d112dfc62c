/** Core type definitions for inbox-to-sheets. */

// ─── Identities & rows ───

/** Opaque, source-issued key of one item. The only dedupe key. */
export type ItemIdentity = string;

export interface RowRecord {
  readonly from: string;
  readonly subject: string;
  readonly date: string;
  readonly content: string;
}

export interface BatchEntry {
  id: ItemIdentity;
  row: RowRecord;
}

// ─── Filtering ───

export interface SubjectFilter {
  include: string[];
  exclude: string[];
}

// ─── Collaborators ───

export interface SourceAdapter<Raw> {
  name: string;
  list(filter: SubjectFilter): Promise<ItemIdentity[]>;
  fetch(id: ItemIdentity): Promise<Raw>;
}

export interface AcknowledgmentAdapter {
  acknowledge(ids: ItemIdentity[]): Promise<void>;
}

export interface Transformer<Raw> {
  transform(raw: Raw): RowRecord;
}

export interface RowSink {
  appendRows(rows: RowRecord[]): Promise<void>;
}

export interface IdentityStore {
  readIdentities(): Promise<ItemIdentity[]>;
  appendIdentities(ids: ItemIdentity[]): Promise<void>;
}

export interface SinkAdapter extends RowSink, IdentityStore {
  name: string;
}

/**
 * Cross-process exclusion for runs. `acquire` resolves to the release
 * function, or rejects with `LeaseUnavailableError`.
 */
export interface RunLease {
  acquire(): Promise<() => Promise<void>>;
}

// ─── Run summary ───

export type RunPhase = "init" | "discover" | "fetch" | "persist" | "acknowledge";

export type RunOutcome = "synced" | "partial" | "aborted";

export interface RunCounts {
  discovered: number;
  duplicates: number;
  fetched: number;
  filtered: number;
  persisted: number;
  acknowledged: number;
  errored: number;
}

export interface SyncError {
  entity: string;
  phase: RunPhase;
  error: string;
  retryable: boolean;
}

export interface RunSummary {
  outcome: RunOutcome;
  /** Phase that ended the run early, or null when every phase ran. */
  failedPhase: RunPhase | null;
  counts: RunCounts;
  errors: SyncError[];
  durationMs: number;
}

// ─── Rate Limiter ───

export interface RateLimiterConfig {
  maxRequests?: number;
  windowMs?: number;
  minDelayMs?: number;
  maxUnitsPerWindow?: number;
  unitsWindowMs?: number;
}

export interface RateLimiter {
  acquire(cost?: number): Promise<void>;
}

// ─── Logger ───

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  progress(current: number, total: number, label: string): void;
}
