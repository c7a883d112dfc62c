import { errorMessage } from "./errors.js";
import type { Logger, RunSummary } from "./types.js";

export interface DaemonOptions {
  intervalMs: number;
  signal: AbortSignal;
  logger: Logger;
  onSummary?: (summary: RunSummary) => void;
  /** Wait between passes; resolves early once `signal` aborts. */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

/** Sleep in 1-second increments so a shutdown request is noticed quickly. */
async function interruptibleSleep(ms: number, signal: AbortSignal): Promise<void> {
  const sleepUntil = Date.now() + ms;
  while (Date.now() < sleepUntil && !signal.aborted) {
    await new Promise((resolve) =>
      setTimeout(resolve, Math.min(1_000, sleepUntil - Date.now())),
    );
  }
}

/**
 * Run sync passes until `signal` aborts. A pass that throws is logged and
 * the loop carries on with the next interval. Resolves to the number of
 * passes started.
 */
export async function runDaemon(
  runner: { run(signal?: AbortSignal): Promise<RunSummary> },
  opts: DaemonOptions,
): Promise<number> {
  const { signal, logger } = opts;
  const sleep = opts.sleep ?? interruptibleSleep;
  let passes = 0;

  while (!signal.aborted) {
    passes++;
    try {
      const summary = await runner.run(signal);
      opts.onSummary?.(summary);
    } catch (err) {
      logger.error("Sync pass failed", { pass: passes, error: errorMessage(err) });
    }
    if (signal.aborted) break;
    await sleep(opts.intervalMs, signal);
  }
  return passes;
}
