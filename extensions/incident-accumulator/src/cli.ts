/**
 * Incident Accumulator — CLI Commands
 *
 * `incident-ledger` subcommands for running the poller, running a single
 * cycle, ingesting a saved feed response, and summarising stored views.
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { Command } from "commander";
import { loadConfig, type AccumulatorConfig } from "./config.js";
import { AccumulationEngine } from "./engine.js";
import { ConfigValidationError, PersistenceFailureError, describeError } from "./errors.js";
import { FeedClient, extractAlerts } from "./feed-client.js";
import { createLogger } from "./logger.js";
import { Poller } from "./poller.js";
import { formatCounts, summarizeIncidents } from "./stats.js";
import { createStorage } from "./storage/index.js";
import type { CycleReport, FetchBatch, PersistenceAdapter } from "./types.js";

export type CliContext = {
  program: Command;
  logger: { info: (msg: string) => void; warn: (msg: string) => void; error: (msg: string) => void };
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Registers the handler `run` calls on shutdown; defaults to SIGINT/SIGTERM. */
  onShutdown?: (handler: () => Promise<void>) => void;
};

type CommonOptions = {
  config?: string;
  storage?: string;
  data?: string;
  logLevel?: string;
};

type FeedOptions = CommonOptions & {
  feedUrl?: string;
  interval?: string;
};

function withCommonOptions(command: Command): Command {
  return command
    .option("-c, --config <path>", "Path to a JSON config file (default: ./config.json if present)")
    .option("--storage <type>", "Storage backend: json, sqlite, memory")
    .option("--data <path>", "Data directory (json) or database file (sqlite)")
    .option("--log-level <level>", "Log level: trace, debug, info, warn, error, fatal");
}

function resolveConfig(ctx: CliContext, opts: FeedOptions): AccumulatorConfig {
  return loadConfig({
    configPath: opts.config,
    env: ctx.env,
    cwd: ctx.cwd,
    overrides: {
      feedUrl: opts.feedUrl,
      pollIntervalSeconds: opts.interval,
      storage: { type: opts.storage, path: opts.data },
      logging: { level: opts.logLevel },
    },
  });
}

function summarizeReport(report: CycleReport): string {
  return `Fetched: ${report.fetched} | New: ${report.added} | Duplicates: ${report.duplicates} | Malformed: ${report.malformed} | Total: ${report.total}`;
}

/** Report configuration and storage errors as CLI errors with exit code 1. */
async function guard(ctx: CliContext, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    if (err instanceof ConfigValidationError || err instanceof PersistenceFailureError) {
      ctx.logger.error(err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

async function openEngine(
  ctx: CliContext,
  config: AccumulatorConfig,
  fetchBatch: FetchBatch,
): Promise<{ engine: AccumulationEngine; storage: PersistenceAdapter }> {
  const logger = createLogger("engine", { level: config.logging.level });
  const storage = createStorage(config, { cwd: ctx.cwd, logger });
  try {
    const engine = await AccumulationEngine.create({ persistence: storage, fetchBatch, logger });
    return { engine, storage };
  } catch (err) {
    await storage.close();
    throw err;
  }
}

function requireFeedUrl(ctx: CliContext, config: AccumulatorConfig): string | null {
  if (!config.feedUrl) {
    ctx.logger.error("No feed URL configured. Set feedUrl in config.json, FEED_URL, or pass --feed-url.");
    process.exitCode = 1;
    return null;
  }
  return config.feedUrl;
}

export function registerLedgerCli(ctx: CliContext): void {
  const program = ctx.program;

  // ─── run ───────────────────────────────────────────────────────────────────
  withCommonOptions(
    program
      .command("run")
      .description("Poll the feed continuously and accumulate incidents")
      .option("--feed-url <url>", "Incident feed endpoint")
      .option("-i, --interval <seconds>", "Poll interval in seconds"),
  ).action(async (opts: FeedOptions) =>
    guard(ctx, async () => {
      const config = resolveConfig(ctx, opts);
      const feedUrl = requireFeedUrl(ctx, config);
      if (!feedUrl) return;

      const client = new FeedClient({ url: feedUrl, timeout: config.requestTimeoutMs });
      const { engine, storage } = await openEngine(ctx, config, () => client.fetchBatch());
      const poller = new Poller({
        engine,
        intervalMs: config.pollIntervalSeconds * 1000,
        logger: createLogger("poller", { level: config.logging.level }),
      });

      ctx.logger.info(`Fetch interval: ${config.pollIntervalSeconds} seconds`);
      ctx.logger.info(`Existing incidents: ${engine.size}`);
      poller.start();

      const shutdown = async (): Promise<void> => {
        ctx.logger.info("Stopping, saving final state...");
        await poller.stop();
        const saved = await engine.flush();
        await storage.close();
        ctx.logger.info(`Total unique incidents: ${engine.size}${saved ? "" : " (final save failed)"}`);
      };

      if (ctx.onShutdown) {
        ctx.onShutdown(shutdown);
      } else {
        const onSignal = (): void => {
          shutdown().then(
            () => process.exit(0),
            (err: unknown) => {
              ctx.logger.error(`Shutdown failed: ${describeError(err)}`);
              process.exit(1);
            },
          );
        };
        process.once("SIGINT", onSignal);
        process.once("SIGTERM", onSignal);
      }
    }),
  );

  // ─── once ──────────────────────────────────────────────────────────────────
  withCommonOptions(
    program
      .command("once")
      .description("Run a single fetch-and-merge cycle, then exit")
      .option("--feed-url <url>", "Incident feed endpoint"),
  ).action(async (opts: FeedOptions) =>
    guard(ctx, async () => {
      const config = resolveConfig(ctx, opts);
      const feedUrl = requireFeedUrl(ctx, config);
      if (!feedUrl) return;

      const client = new FeedClient({ url: feedUrl, timeout: config.requestTimeoutMs });
      const { engine, storage } = await openEngine(ctx, config, () => client.fetchBatch());
      try {
        const report = await engine.runCycle();
        if (report.status === "fetch-failed") {
          ctx.logger.error(`Fetch failed: ${report.error ?? "unknown error"}`);
          process.exitCode = 1;
          return;
        }
        ctx.logger.info(summarizeReport(report));
        if (!report.persisted) process.exitCode = 1;
      } finally {
        await storage.close();
      }
    }),
  );

  // ─── ingest ────────────────────────────────────────────────────────────────
  withCommonOptions(
    program
      .command("ingest")
      .argument("<file>", "JSON file holding a feed response or an array of alerts")
      .description("Merge a saved feed response into the store"),
  ).action(async (file: string, opts: CommonOptions) =>
    guard(ctx, async () => {
      const config = resolveConfig(ctx, opts);
      const path = resolve(ctx.cwd ?? process.cwd(), file);

      let body: unknown;
      try {
        body = JSON.parse(await readFile(path, "utf-8"));
      } catch (err) {
        ctx.logger.error(`Cannot read ${path}: ${describeError(err)}`);
        process.exitCode = 1;
        return;
      }

      const alerts = extractAlerts(body);
      const { engine, storage } = await openEngine(ctx, config, async () => alerts);
      try {
        const report = await engine.runCycle();
        ctx.logger.info(`Ingested ${file}: ${summarizeReport(report)}`);
        if (!report.persisted) process.exitCode = 1;
      } finally {
        await storage.close();
      }
    }),
  );

  // ─── stats ─────────────────────────────────────────────────────────────────
  withCommonOptions(
    program.command("stats").description("Show statistics for the stored incidents"),
  ).action(async (opts: CommonOptions) =>
    guard(ctx, async () => {
      const config = resolveConfig(ctx, opts);
      const storage = createStorage(config, { cwd: ctx.cwd });
      try {
        await storage.initialize();
        const { master, latest } = await storage.load();
        const stats = summarizeIncidents(master);

        ctx.logger.info(`Total unique incidents: ${stats.total}`);
        if (stats.total > 0) {
          ctx.logger.info(`By type: ${formatCounts(stats.byType)}`);
          ctx.logger.info(`By city: ${formatCounts(stats.byCity)}`);
        }
        if (stats.dateRange) {
          ctx.logger.info(`Date range: ${stats.dateRange.earliest} to ${stats.dateRange.latest}`);
        }
        ctx.logger.info(`Latest batch: ${latest.length} incident(s)`);
      } finally {
        await storage.close();
      }
    }),
  );
}
