import { classifyError, errorMessage, type FailureKind } from "./errors.js";
import type { Logger } from "./types.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  /** Total attempts, including the first. */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Fraction of the delay added as random jitter (0 disables). */
  jitter?: number;
  classify?: (err: unknown) => FailureKind;
  logger?: Logger;
  label?: string;
  sleep?: (ms: number) => Promise<void>;
}

export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/**
 * Run `fn`, retrying transient failures with exponential backoff. Permanent
 * failures and the last transient failure are rethrown unchanged.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const maxAttempts = Math.max(1, opts.maxAttempts ?? 3);
  const baseDelay = opts.baseDelayMs ?? 500;
  const maxDelay = opts.maxDelayMs ?? 30_000;
  const jitter = opts.jitter ?? 0.1;
  const classify = opts.classify ?? classifyError;
  const wait = opts.sleep ?? sleep;
  const label = opts.label ?? "operation";

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= maxAttempts || classify(err) !== "transient") {
        throw err;
      }
      const delay = backoffDelay(attempt, baseDelay, maxDelay);
      const delayMs = Math.round(delay + delay * jitter * Math.random());
      opts.logger?.warn(`Retrying ${label}`, {
        attempt,
        maxAttempts,
        delayMs,
        reason: errorMessage(err),
      });
      await wait(delayMs);
    }
  }
}

/**
 * Retry strategy handed to the orchestrator and the identity set, so every
 * remote call in a run shares one classification and backoff setting.
 */
export class RetryPolicy {
  private readonly options: Omit<RetryOptions, "label">;

  constructor(options: Omit<RetryOptions, "label"> = {}) {
    this.options = options;
  }

  get maxAttempts(): number {
    return Math.max(1, this.options.maxAttempts ?? 3);
  }

  execute<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return withRetry(operation, { ...this.options, label });
  }
}

/** A policy that never retries. */
export const NO_RETRY = new RetryPolicy({ maxAttempts: 1 });
