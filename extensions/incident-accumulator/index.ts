/**
 * Incident Accumulator — Package Entry Point
 */

import { loadConfig, type LoadConfigOptions } from "./src/config.js";
import { AccumulationEngine } from "./src/engine.js";
import { ConfigValidationError } from "./src/errors.js";
import { FeedClient } from "./src/feed-client.js";
import { createLogger } from "./src/logger.js";
import { Poller } from "./src/poller.js";
import { createStorage } from "./src/storage/index.js";
import type { CycleReport, PersistenceAdapter } from "./src/types.js";

export * from "./src/index.js";

export type AccumulatorService = {
  engine: AccumulationEngine;
  poller: Poller;
  storage: PersistenceAdapter;
  /** Stop polling, save the final state and release storage. */
  stop(): Promise<void>;
};

/**
 * Load configuration, restore persisted state and start polling the feed.
 * The first cycle runs immediately.
 */
export async function startAccumulator(
  options: LoadConfigOptions & { onCycle?: (report: CycleReport) => void } = {},
): Promise<AccumulatorService> {
  const config = loadConfig(options);
  if (!config.feedUrl) {
    throw new ConfigValidationError(["feedUrl: required to start polling"]);
  }

  const logger = createLogger("engine", { level: config.logging.level });
  const storage = createStorage(config, { cwd: options.cwd, logger });
  const client = new FeedClient({ url: config.feedUrl, timeout: config.requestTimeoutMs });
  const engine = await AccumulationEngine.create({
    persistence: storage,
    fetchBatch: () => client.fetchBatch(),
    logger,
  });

  const poller = new Poller({
    engine,
    intervalMs: config.pollIntervalSeconds * 1000,
    logger: createLogger("poller", { level: config.logging.level }),
    onCycle: options.onCycle,
  });
  poller.start();

  return {
    engine,
    poller,
    storage,
    async stop() {
      await poller.stop();
      await engine.flush();
      await storage.close();
    },
  };
}
