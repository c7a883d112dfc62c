#!/usr/bin/env node
import * as path from "node:path";
import { Command, InvalidArgumentError } from "commander";
import { config as loadDotenv } from "dotenv";
import { GmailClient, GmailSource, gmailTransformer } from "../gmail/index.js";
import {
  createGoogleAuth,
  type GoogleAuth,
  loadGoogleCredentials,
} from "../google/auth.js";
import { SheetsClient, SheetsSink } from "../sheets/index.js";
import { type ConfigOverrides, loadConfig, type SyncConfig } from "./config.js";
import { runDaemon } from "./daemon.js";
import { errorMessage } from "./errors.js";
import { IdentitySet } from "./identity-set.js";
import { FileRunLease } from "./lease.js";
import { createLogger } from "./logger.js";
import { describeOutcome, SyncOrchestrator } from "./orchestrator.js";
import { createRateLimiter } from "./rate-limiter.js";
import { RetryPolicy } from "./retry.js";
import { parseKeywordList } from "./row.js";
import type { Logger, RunOutcome, RunSummary } from "./types.js";

loadDotenv();
loadDotenv({ path: ".env.local", override: true });

const EXIT_CODES: Record<RunOutcome, number> = {
  synced: 0,
  partial: 1,
  aborted: 2,
};

interface SyncCommandOptions {
  config?: string;
  spreadsheet?: string;
  include?: string;
  exclude?: string;
  maxAttempts?: number;
  backoffMs?: number;
  lock: boolean;
}

function parsePositiveInt(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value) || n <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

function resolveConfig(opts: SyncCommandOptions): SyncConfig {
  const overrides: ConfigOverrides = {
    spreadsheetId: opts.spreadsheet,
    include: opts.include === undefined ? undefined : parseKeywordList(opts.include),
    exclude: opts.exclude === undefined ? undefined : parseKeywordList(opts.exclude),
    maxAttempts: opts.maxAttempts,
    baseDelayMs: opts.backoffMs,
    lockFile: opts.lock ? undefined : null,
  };
  return loadConfig({ file: opts.config, overrides });
}

// ─── Wiring ───

function createSink(
  config: SyncConfig,
  auth: GoogleAuth,
  logger: Logger,
): SheetsSink {
  const client = new SheetsClient(
    auth,
    config.spreadsheetId,
    createRateLimiter({ maxRequests: 60, windowMs: 60_000 }),
    logger,
  );
  return new SheetsSink(client, logger, {
    rowsSheet: config.sheets.rows,
    identitiesSheet: config.sheets.identities,
  });
}

function createOrchestrator(config: SyncConfig, logger: Logger) {
  const auth = createGoogleAuth(loadGoogleCredentials());
  const gmail = new GmailClient(
    auth,
    createRateLimiter({ maxUnitsPerWindow: 14_000, unitsWindowMs: 60_000 }),
    logger,
  );
  const source = new GmailSource(gmail, { maxResults: config.maxResults });
  const sink = createSink(config, auth, logger);
  const retry = new RetryPolicy({ ...config.retry, logger });

  return new SyncOrchestrator({
    source,
    transformer: gmailTransformer,
    sink,
    identities: new IdentitySet(sink, { retry }),
    acknowledger: source,
    retry,
    logger,
    filter: config.filter,
    lease: config.lockFile
      ? new FileRunLease(path.resolve(config.lockFile), { logger })
      : undefined,
    fetchConcurrency: config.fetchConcurrency,
    acknowledgeBatchSize: config.acknowledgeBatchSize,
  });
}

function printSummary(summary: RunSummary): void {
  const { counts } = summary;
  const status = { synced: "✓", partial: "⚠", aborted: "✗" }[summary.outcome];
  console.log("\n═══ Sync Summary ═══\n");
  console.log(`${status} ${describeOutcome(summary)}`);
  console.log(
    `  discovered ${counts.discovered}, duplicates ${counts.duplicates}, fetched ${counts.fetched}, filtered ${counts.filtered}, persisted ${counts.persisted}, acknowledged ${counts.acknowledged}, errored ${counts.errored} [${(summary.durationMs / 1000).toFixed(1)}s]`,
  );
  for (const err of summary.errors.slice(0, 5)) {
    console.log(`  ✗ ${err.phase} ${err.entity}: ${err.error}`);
  }
  if (summary.errors.length > 5) {
    console.log(`  ... and ${summary.errors.length - 5} more errors`);
  }
}

function withSyncOptions(cmd: Command): Command {
  return cmd
    .option("--config <file>", "YAML config file")
    .option("--spreadsheet <id>", "Destination spreadsheet ID")
    .option("--include <keywords>", "Comma-separated subject keywords to keep")
    .option("--exclude <keywords>", "Comma-separated subject keywords to drop")
    .option("--max-attempts <n>", "Attempts per remote call", parsePositiveInt)
    .option("--backoff-ms <n>", "Base retry delay in ms", parsePositiveInt)
    .option("--no-lock", "Do not take the run lock file");
}

const program = new Command()
  .name("inbox-to-sheets")
  .description("Copy unread Gmail messages into a Google Sheet, once each")
  .version("1.0.0");

withSyncOptions(
  program.command("sync").description("Run one sync pass"),
).action(async (opts: SyncCommandOptions) => {
  const config = resolveConfig(opts);
  const logger = createLogger("sync", config.logLevel);
  const orchestrator = createOrchestrator(config, logger);

  const ac = new AbortController();
  const sigHandler = () => {
    logger.warn("Received interrupt, stopping before the next write...");
    ac.abort();
  };
  process.on("SIGINT", sigHandler);

  try {
    const summary = await orchestrator.run(ac.signal);
    printSummary(summary);
    process.exitCode = EXIT_CODES[summary.outcome];
  } finally {
    process.removeListener("SIGINT", sigHandler);
  }
});

program
  .command("status")
  .description("Show how many messages the spreadsheet has recorded")
  .option("--config <file>", "YAML config file")
  .option("--spreadsheet <id>", "Spreadsheet ID")
  .action(async (opts: Pick<SyncCommandOptions, "config" | "spreadsheet">) => {
    const config = resolveConfig({ ...opts, lock: false });
    const logger = createLogger("status", config.logLevel);
    const auth = createGoogleAuth(loadGoogleCredentials());
    const identities = new IdentitySet(createSink(config, auth, logger));
    await identities.load();
    console.log(
      `${config.spreadsheetId}: ${identities.size} messages recorded in '${config.sheets.identities}'`,
    );
  });

withSyncOptions(
  program
    .command("daemon")
    .description("Run sync passes on an interval until interrupted")
    .option(
      "--interval <minutes>",
      "Minutes between sync passes",
      parsePositiveInt,
      15,
    ),
).action(async (opts: SyncCommandOptions & { interval: number }) => {
  const config = resolveConfig(opts);
  const logger = createLogger("daemon", config.logLevel);
  const orchestrator = createOrchestrator(config, logger);
  const intervalMs = opts.interval * 60_000;

  const ac = new AbortController();
  const shutdown = () => {
    if (ac.signal.aborted) return;
    logger.info("Graceful shutdown requested, finishing current pass...");
    ac.abort();
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  logger.info(`Syncing every ${opts.interval} min`);
  await runDaemon(orchestrator, {
    intervalMs,
    signal: ac.signal,
    logger,
    onSummary: printSummary,
  });
  logger.info("Shutdown complete.");
});

program.parseAsync().catch((err: unknown) => {
  console.error(`✗ ${errorMessage(err)}`);
  process.exitCode = EXIT_CODES.aborted;
});
