/**
 * Failure taxonomy shared by adapters and the orchestrator.
 *
 * Adapters translate transport errors into these classes where they know
 * more than the status code does (e.g. a 404 on fetch is `NotFoundError`).
 * Anything else is classified by `classifyError` from its HTTP status or
 * network error code.
 */

export type FailureKind = "transient" | "permanent";

abstract class SyncFailure extends Error {
  abstract readonly kind: FailureKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Rate limiting, 5xx, network blips. Retried. */
export class TransientError extends SyncFailure {
  readonly kind = "transient";
}

/** Auth, permission, validation. Never retried. */
export class PermanentError extends SyncFailure {
  readonly kind = "permanent";
}

/** The item disappeared from the source between list and fetch. */
export class NotFoundError extends SyncFailure {
  readonly kind = "permanent";

  constructor(
    readonly itemId: string,
    options?: { cause?: unknown },
  ) {
    super(`Item ${itemId} not found at source`, options);
  }
}

export class MalformedContentError extends SyncFailure {
  readonly kind = "permanent";
}

/** The identity store could not be read. */
export class StoreUnavailableError extends SyncFailure {
  readonly kind = "permanent";
}

/** An identity append did not complete; none of its ids count as persisted. */
export class StoreWriteFailedError extends SyncFailure {
  readonly kind = "permanent";
}

export class LeaseUnavailableError extends SyncFailure {
  readonly kind = "permanent";
}

// ─── Classification ───

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNREFUSED",
  "EAI_AGAIN",
  "ENOTFOUND",
  "EPIPE",
]);

const TRANSIENT_MESSAGES = ["socket hang up", "fetch failed", "network error"];

/** Google APIs report per-user quota exhaustion as 403 with these reasons. */
const RATE_LIMIT_REASONS = new Set([
  "rateLimitExceeded",
  "userRateLimitExceeded",
]);

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Extract an HTTP status from the error shapes googleapis/gaxios produce:
 * `status`, numeric `code`, or `response.status`.
 */
export function httpStatusOf(err: unknown): number | undefined {
  if (!isObject(err)) return undefined;
  if (typeof err.status === "number") return err.status;
  if (typeof err.code === "number") return err.code;
  if (isObject(err.response) && typeof err.response.status === "number") {
    return err.response.status;
  }
  return undefined;
}

function errorReasons(err: unknown): string[] {
  if (!isObject(err) || !Array.isArray(err.errors)) return [];
  const reasons: string[] = [];
  for (const entry of err.errors) {
    if (isObject(entry) && typeof entry.reason === "string") {
      reasons.push(entry.reason);
    }
  }
  return reasons;
}

export function classifyError(err: unknown): FailureKind {
  if (err instanceof SyncFailure) return err.kind;

  const status = httpStatusOf(err);
  if (status !== undefined) {
    if (status === 408 || status === 429 || (status >= 500 && status < 600)) {
      return "transient";
    }
    if (
      status === 403 &&
      errorReasons(err).some((r) => RATE_LIMIT_REASONS.has(r))
    ) {
      return "transient";
    }
    if (status >= 400 && status < 500) return "permanent";
  }

  if (isObject(err) && typeof err.code === "string") {
    if (TRANSIENT_CODES.has(err.code)) return "transient";
  }

  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    if (TRANSIENT_MESSAGES.some((m) => msg.includes(m))) return "transient";
    if ([...TRANSIENT_CODES].some((c) => msg.includes(c.toLowerCase()))) {
      return "transient";
    }
  }

  return "permanent";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
