// Concurrency
export { mapConcurrent } from "./concurrency.js";
// Configuration
export type { ConfigOverrides, SyncConfig } from "./config.js";
export { DEFAULT_LOCK_FILE, loadConfig, readConfigFile, readEnv } from "./config.js";
// Daemon
export type { DaemonOptions } from "./daemon.js";
export { runDaemon } from "./daemon.js";
// Errors
export type { FailureKind } from "./errors.js";
export {
  classifyError,
  errorMessage,
  httpStatusOf,
  LeaseUnavailableError,
  MalformedContentError,
  NotFoundError,
  PermanentError,
  StoreUnavailableError,
  StoreWriteFailedError,
  TransientError,
} from "./errors.js";
// Identity set
export { IdentitySet } from "./identity-set.js";
// Run lease
export { FileRunLease } from "./lease.js";
// Logger
export { ConsoleLogger, createLogger, isLogLevel, silentLogger } from "./logger.js";
// Orchestrator
export type { SyncOrchestratorOptions } from "./orchestrator.js";
export { describeOutcome, SyncOrchestrator } from "./orchestrator.js";
// Rate limiter
export { createRateLimiter, QuotaRateLimiter } from "./rate-limiter.js";
export type { RetryOptions } from "./retry.js";
// Retry
export { backoffDelay, NO_RETRY, RetryPolicy, withRetry } from "./retry.js";
// Rows & filters
export {
  createRowRecord,
  EMPTY_FILTER,
  MAX_CELL_LENGTH,
  parseKeywordList,
  rowValues,
  subjectPassesFilters,
  toSingleLine,
} from "./row.js";
export type {
  AcknowledgmentAdapter,
  BatchEntry,
  IdentityStore,
  ItemIdentity,
  Logger,
  LogLevel,
  RateLimiter,
  RateLimiterConfig,
  RowRecord,
  RowSink,
  RunCounts,
  RunLease,
  RunOutcome,
  RunPhase,
  RunSummary,
  SinkAdapter,
  SourceAdapter,
  SubjectFilter,
  SyncError,
  Transformer,
} from "./types.js";
