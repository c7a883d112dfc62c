/**
 * SyncOrchestrator: one run of the source → sink pipeline.
 *
 *   init         acquire lease, load identities
 *   discover     list candidates, drop known identities
 *   fetch        fetch + transform survivors (per-item failures skip)
 *   persist      append rows, then append identities
 *   acknowledge  mark persisted items consumed at the source
 *
 * Phases run once, in order. The identity append is only issued after the
 * row append succeeded, and acknowledgment only after the identity append
 * succeeded, so re-running after a crash at any point either skips an item
 * (identity recorded) or redoes its whole row → identity → ack sequence.
 */

import { mapConcurrent } from "./concurrency.js";
import {
  classifyError,
  errorMessage,
  MalformedContentError,
  NotFoundError,
  StoreWriteFailedError,
} from "./errors.js";
import type { IdentitySet } from "./identity-set.js";
import type { RetryPolicy } from "./retry.js";
import { EMPTY_FILTER, subjectPassesFilters } from "./row.js";
import type {
  AcknowledgmentAdapter,
  BatchEntry,
  ItemIdentity,
  Logger,
  RowSink,
  RunCounts,
  RunLease,
  RunOutcome,
  RunPhase,
  RunSummary,
  SourceAdapter,
  SubjectFilter,
  SyncError,
  Transformer,
} from "./types.js";

export interface SyncOrchestratorOptions<Raw> {
  source: SourceAdapter<Raw>;
  transformer: Transformer<Raw>;
  sink: RowSink;
  identities: IdentitySet;
  acknowledger: AcknowledgmentAdapter;
  retry: RetryPolicy;
  logger: Logger;
  filter?: SubjectFilter;
  lease?: RunLease;
  /** Fetches in flight at once. Persist is always sequential. */
  fetchConcurrency?: number;
  acknowledgeBatchSize?: number;
}

/** Thrown inside the fetch phase to unwind to the run boundary. */
class RunAborted extends Error {
  constructor(
    readonly phase: RunPhase,
    readonly reason: unknown,
  ) {
    super(errorMessage(reason));
  }
}

function emptyCounts(): RunCounts {
  return {
    discovered: 0,
    duplicates: 0,
    fetched: 0,
    filtered: 0,
    persisted: 0,
    acknowledged: 0,
    errored: 0,
  };
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export class SyncOrchestrator<Raw> {
  private readonly opts: SyncOrchestratorOptions<Raw>;
  private readonly filter: SubjectFilter;
  private readonly fetchConcurrency: number;
  private readonly acknowledgeBatchSize: number;

  constructor(opts: SyncOrchestratorOptions<Raw>) {
    this.opts = opts;
    this.filter = opts.filter ?? EMPTY_FILTER;
    this.fetchConcurrency = Math.max(1, opts.fetchConcurrency ?? 1);
    this.acknowledgeBatchSize = Math.max(1, opts.acknowledgeBatchSize ?? 100);
  }

  async run(signal?: AbortSignal): Promise<RunSummary> {
    const { lease, logger } = this.opts;
    const startMs = Date.now();
    const run = new RunRecorder(startMs, logger);

    let release: (() => Promise<void>) | null = null;
    if (lease) {
      try {
        release = await lease.acquire();
      } catch (err) {
        return run.abort("init", "run lease", err);
      }
    }

    try {
      return await this.execute(run, signal);
    } finally {
      if (release) {
        try {
          await release();
        } catch (err) {
          logger.warn("Failed to release run lease", {
            error: errorMessage(err),
          });
        }
      }
    }
  }

  private async execute(
    run: RunRecorder,
    signal: AbortSignal | undefined,
  ): Promise<RunSummary> {
    const { source, identities, retry, logger } = this.opts;

    // ── init ──
    try {
      await identities.load();
    } catch (err) {
      return run.abort("init", "identity store", err);
    }
    logger.info("Loaded processed identities", { count: identities.size });

    if (signal?.aborted) return run.cancel("init");

    // ── discover ──
    let listed: ItemIdentity[];
    try {
      listed = await retry.execute(`list ${source.name}`, () =>
        source.list(this.filter),
      );
    } catch (err) {
      return run.abort("discover", `source:${source.name}`, err);
    }

    const candidates = [...new Set(listed)];
    run.counts.discovered = candidates.length;
    const fresh: ItemIdentity[] = [];
    for (const id of candidates) {
      if (identities.contains(id)) {
        run.counts.duplicates++;
        logger.debug("Skipping already processed item", { id });
      } else {
        fresh.push(id);
      }
    }
    logger.info("Discovered candidates", {
      discovered: run.counts.discovered,
      duplicates: run.counts.duplicates,
      new: fresh.length,
    });

    // ── fetch ──
    let prepared: (BatchEntry | null)[];
    try {
      let done = 0;
      prepared = await mapConcurrent(fresh, this.fetchConcurrency, async (id) => {
        const entry = await this.prepare(id, run, signal);
        logger.progress(++done, fresh.length, "Fetching items");
        return entry;
      });
    } catch (err) {
      if (err instanceof RunAborted) {
        return run.abort(err.phase, "run", err.reason);
      }
      throw err;
    }
    if (signal?.aborted) return run.cancel("fetch");

    const batch = prepared.filter((e): e is BatchEntry => e !== null);
    if (batch.length === 0) {
      logger.info("No new rows to append; nothing to acknowledge");
      return run.finish();
    }

    // ── persist ──
    const ids = batch.map((e) => e.id);
    const rows = batch.map((e) => e.row);
    try {
      await retry.execute("append rows", () => this.opts.sink.appendRows(rows));
    } catch (err) {
      run.fail("persist", "rows", err, ids.length);
      return run.stop("persist");
    }
    logger.info("Appended rows", { count: rows.length });

    try {
      await identities.record(ids);
    } catch (err) {
      run.fail("persist", "identities", err, ids.length);
      return run.stop("persist");
    }
    run.counts.persisted = ids.length;
    logger.info("Recorded identities", { count: ids.length });

    // ── acknowledge ──
    await this.acknowledge(ids, run);

    return run.finish();
  }

  /**
   * Fetch and transform one item. Returns null when the item is skipped
   * (gone, malformed, filtered, or transiently unreachable); throws
   * `RunAborted` on failures that would hit every item alike.
   */
  private async prepare(
    id: ItemIdentity,
    run: RunRecorder,
    signal: AbortSignal | undefined,
  ): Promise<BatchEntry | null> {
    const { source, transformer, retry, logger } = this.opts;
    if (signal?.aborted) return null;

    let raw: Raw;
    try {
      raw = await retry.execute(`fetch ${id}`, () => source.fetch(id));
    } catch (err) {
      if (err instanceof NotFoundError || classifyError(err) === "transient") {
        run.fail("fetch", `item:${id}`, err, 1);
        return null;
      }
      throw new RunAborted("fetch", err);
    }
    run.counts.fetched++;

    let entry: BatchEntry;
    try {
      entry = { id, row: transformer.transform(raw) };
    } catch (err) {
      const reason =
        err instanceof MalformedContentError
          ? err
          : new MalformedContentError(errorMessage(err), { cause: err });
      run.fail("fetch", `item:${id}`, reason, 1);
      return null;
    }

    if (!subjectPassesFilters(entry.row.subject, this.filter)) {
      run.counts.filtered++;
      logger.debug("Subject filtered out", { id, subject: entry.row.subject });
      return null;
    }
    return entry;
  }

  private async acknowledge(ids: ItemIdentity[], run: RunRecorder): Promise<void> {
    const { acknowledger, identities, retry, logger } = this.opts;

    for (const chunked of chunk(ids, this.acknowledgeBatchSize)) {
      const group = chunked.filter((id) => identities.contains(id));
      const unrecorded = chunked.filter((id) => !identities.contains(id));
      if (unrecorded.length > 0) {
        run.fail(
          "acknowledge",
          `items:${unrecorded.join(",")}`,
          new StoreWriteFailedError(
            `Refusing to acknowledge unrecorded items: ${unrecorded.join(", ")}`,
          ),
          unrecorded.length,
        );
      }
      if (group.length === 0) continue;
      try {
        await retry.execute("acknowledge", () => acknowledger.acknowledge(group));
        run.counts.acknowledged += group.length;
      } catch (err) {
        run.fail("acknowledge", `items:${group.join(",")}`, err, group.length);
      }
    }
    logger.info("Acknowledged items", { count: run.counts.acknowledged });
  }
}

// ─── Run bookkeeping ───

class RunRecorder {
  readonly counts = emptyCounts();
  readonly errors: SyncError[] = [];

  constructor(
    private readonly startMs: number,
    private readonly logger: Logger,
  ) {}

  fail(phase: RunPhase, entity: string, err: unknown, items: number): void {
    const error = errorMessage(err);
    const retryable = classifyError(err) === "transient";
    this.errors.push({ entity, phase, error, retryable });
    this.counts.errored += items;
    this.logger.warn(`Failed during ${phase}`, { entity, error, retryable });
  }

  abort(phase: RunPhase, entity: string, err: unknown): RunSummary {
    const error = errorMessage(err);
    this.errors.push({
      entity,
      phase,
      error,
      retryable: classifyError(err) === "transient",
    });
    this.logger.error(`Run aborted during ${phase}`, { entity, error });
    return this.summary("aborted", phase);
  }

  cancel(phase: RunPhase): RunSummary {
    this.logger.warn("Run cancelled before persistence", { phase });
    this.errors.push({
      entity: "run",
      phase,
      error: "cancelled",
      retryable: true,
    });
    return this.summary("aborted", phase);
  }

  stop(phase: RunPhase): RunSummary {
    return this.summary("partial", phase);
  }

  finish(): RunSummary {
    return this.summary(this.errors.length === 0 ? "synced" : "partial", null);
  }

  private summary(outcome: RunOutcome, failedPhase: RunPhase | null): RunSummary {
    return {
      outcome,
      failedPhase,
      counts: { ...this.counts },
      errors: [...this.errors],
      durationMs: Date.now() - this.startMs,
    };
  }
}

/** One-line, human-readable verdict for a run. */
export function describeOutcome(summary: RunSummary): string {
  const { counts } = summary;
  switch (summary.outcome) {
    case "synced":
      return `fully synced: ${counts.persisted} persisted, ${counts.acknowledged} acknowledged, ${counts.duplicates} already processed`;
    case "partial":
      if (summary.failedPhase === "persist") {
        return `partially synced: persistence failed, ${counts.errored} items left for the next run`;
      }
      return `partially synced: ${counts.persisted} persisted, ${counts.acknowledged} acknowledged, ${counts.errored} items skipped`;
    case "aborted":
      return `aborted before persistence during ${summary.failedPhase ?? "run"}: ${summary.errors.at(-1)?.error ?? "unknown error"}`;
  }
}
