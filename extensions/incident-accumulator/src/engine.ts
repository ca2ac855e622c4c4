/**
 * Accumulation Engine
 *
 * Runs one poll cycle: fetch → normalise → merge → publish → persist.
 * The store is only mutated by a merge that completed; readers get the
 * views through `views()`, an immutable snapshot swapped in as a whole.
 */

import {
  FetchFailureError,
  PersistenceFailureError,
  describeError,
} from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { normalizeBatch } from "./normalizer.js";
import { formatCounts, summarizeIncidents } from "./stats.js";
import { AccumulatorStore } from "./store.js";
import type {
  CycleReport,
  EngineMetrics,
  FetchBatch,
  Incident,
  LedgerViews,
  MergeReport,
  PersistenceAdapter,
  RawRecord,
} from "./types.js";

export type AccumulationEngineOptions = {
  store: AccumulatorStore;
  persistence: PersistenceAdapter;
  fetchBatch: FetchBatch;
  /** Latest view restored from storage, republished until the first cycle. */
  latest?: readonly Incident[];
  logger?: Logger;
};

export class AccumulationEngine {
  private readonly store: AccumulatorStore;
  private readonly persistence: PersistenceAdapter;
  private readonly fetchBatch: FetchBatch;
  private readonly log: Logger;
  private snapshot: LedgerViews;
  private readonly counters: EngineMetrics = {
    cycles: 0,
    fetchFailures: 0,
    persistenceFailures: 0,
    malformedRecords: 0,
  };

  constructor(options: AccumulationEngineOptions) {
    this.store = options.store;
    this.persistence = options.persistence;
    this.fetchBatch = options.fetchBatch;
    this.log = options.logger ?? createLogger("engine");
    this.snapshot = Object.freeze({
      master: this.store.masterView(),
      latest: Object.freeze([...(options.latest ?? [])]),
      version: 0,
      publishedAt: null,
    });
  }

  /**
   * Build an engine from the adapter's last saved state. Load failures
   * propagate: starting empty over unreadable data would overwrite it on
   * the first save.
   */
  static async create(options: {
    persistence: PersistenceAdapter;
    fetchBatch: FetchBatch;
    logger?: Logger;
  }): Promise<AccumulationEngine> {
    await options.persistence.initialize();
    const state = await options.persistence.load();
    const store = new AccumulatorStore(state.master);
    const engine = new AccumulationEngine({ ...options, store, latest: state.latest });
    engine.log.info(`Loaded ${store.size} existing incident(s)`);
    return engine;
  }

  /** Current published views. */
  views(): LedgerViews {
    return this.snapshot;
  }

  get size(): number {
    return this.store.size;
  }

  metrics(): EngineMetrics {
    return { ...this.counters };
  }

  /** One full cycle. Never throws for fetch or persistence failures. */
  async runCycle(): Promise<CycleReport> {
    const startMs = Date.now();
    this.counters.cycles++;

    let raws: RawRecord[];
    try {
      raws = await this.fetchBatch();
    } catch (err) {
      const failure =
        err instanceof FetchFailureError
          ? err
          : new FetchFailureError(`Fetch failed: ${describeError(err)}`, { cause: err });
      this.counters.fetchFailures++;
      this.log.warn("Fetch failed, skipping cycle", { error: failure.message });
      return this.report(startMs, "fetch-failed", { fetched: 0, malformed: 0, added: 0, duplicates: 0 }, false, failure.message);
    }

    const result = this.ingest(raws);
    const persisted = await this.persist();
    const report = this.report(startMs, "merged", result, persisted);

    this.log.info(
      `Fetched: ${report.fetched} | New: ${report.added} | Duplicates: ${report.duplicates} | Total: ${report.total}`,
      report.malformed > 0 ? { malformed: report.malformed } : undefined,
    );
    this.logStatistics();
    return report;
  }

  /**
   * Normalise and merge a batch obtained elsewhere (a file, a test) and
   * publish it as the latest view. Does not persist.
   */
  ingest(raws: readonly unknown[]): MergeReport & { fetched: number; malformed: number } {
    const { incidents, skipped } = normalizeBatch(raws);
    for (const { index, error } of skipped) {
      this.log.debug(`Dropped record ${index}`, { field: error.field, reason: error.message });
    }
    this.counters.malformedRecords += skipped.length;

    const merge = this.store.merge(incidents);
    this.publish(incidents);
    return { ...merge, fetched: raws.length, malformed: skipped.length };
  }

  /** Save the current views; used after a cycle and on shutdown. */
  async flush(): Promise<boolean> {
    return this.persist();
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private publish(latest: readonly Incident[]): void {
    this.snapshot = Object.freeze({
      master: this.store.masterView(),
      latest: Object.freeze([...latest]),
      version: this.snapshot.version + 1,
      publishedAt: new Date().toISOString(),
    });
  }

  private async persist(): Promise<boolean> {
    const { master, latest } = this.snapshot;
    try {
      await this.persistence.save(master, latest);
      return true;
    } catch (err) {
      const failure =
        err instanceof PersistenceFailureError
          ? err
          : new PersistenceFailureError("save", describeError(err), err);
      this.counters.persistenceFailures++;
      this.log.error("Failed to persist incident views; will retry next cycle", {
        error: failure.message,
        pending: master.length,
      });
      return false;
    }
  }

  private report(
    startMs: number,
    status: CycleReport["status"],
    counts: { fetched: number; malformed: number; added: number; duplicates: number },
    persisted: boolean,
    error?: string,
  ): CycleReport {
    return {
      status,
      fetched: counts.fetched,
      malformed: counts.malformed,
      added: counts.added,
      duplicates: counts.duplicates,
      total: this.store.size,
      persisted,
      durationMs: Date.now() - startMs,
      timestamp: new Date().toISOString(),
      error,
    };
  }

  private logStatistics(): void {
    if (!this.log.isLevelEnabled("debug")) return;
    const stats = summarizeIncidents(this.snapshot.master);
    this.log.debug(`Unique incidents: ${stats.total}`, {
      byType: formatCounts(stats.byType),
      dateRange: stats.dateRange,
    });
  }
}
