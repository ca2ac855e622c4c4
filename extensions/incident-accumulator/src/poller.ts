/**
 * Poll Scheduler
 *
 * Drives the engine on a fixed interval. The first cycle runs as soon as
 * the poller starts; each following cycle is scheduled only once the
 * previous one has settled, so cycles never overlap and a slow cycle
 * defers the next one instead of running beside it.
 */

import { describeError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { CycleReport } from "./types.js";

/** The part of the engine the poller depends on. */
export interface CycleRunner {
  runCycle(): Promise<CycleReport>;
}

export type PollerOptions = {
  engine: CycleRunner;
  intervalMs: number;
  logger?: Logger;
  /** Called after every completed cycle. */
  onCycle?: (report: CycleReport) => void;
};

export class Poller {
  private readonly engine: CycleRunner;
  private readonly intervalMs: number;
  private readonly log: Logger;
  private readonly onCycle?: (report: CycleReport) => void;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<CycleReport | null> | null = null;
  private running = false;
  private generation = 0;
  private lastReport: CycleReport | null = null;

  constructor(options: PollerOptions) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new RangeError(`Poll interval must be a positive number of ms, got ${options.intervalMs}`);
    }
    this.engine = options.engine;
    this.intervalMs = options.intervalMs;
    this.log = options.logger ?? createLogger("poller");
    this.onCycle = options.onCycle;
  }

  /** Start polling. The first cycle runs immediately. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.generation++;
    this.log.info(`Polling every ${Math.round(this.intervalMs / 1000)}s`);
    void this.tick(this.generation);
  }

  /** Stop scheduling and wait for an in-flight cycle to settle. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
  }

  isRunning(): boolean {
    return this.running;
  }

  getLastReport(): CycleReport | null {
    return this.lastReport;
  }

  /**
   * Run a cycle now. If one is already in flight its result is returned
   * instead of starting a second. Resolves to null when the cycle threw.
   */
  trigger(): Promise<CycleReport | null> {
    if (this.inFlight) return this.inFlight;
    this.inFlight = this.runSafely().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  /** A tick from before the last stop()/start() pair stops rescheduling. */
  private async tick(generation: number): Promise<void> {
    this.timer = null;
    if (!this.running || generation !== this.generation) return;
    await this.trigger();
    if (this.running && generation === this.generation) {
      this.timer = setTimeout(() => void this.tick(generation), this.intervalMs);
    }
  }

  private async runSafely(): Promise<CycleReport | null> {
    let report: CycleReport;
    try {
      report = await this.engine.runCycle();
    } catch (err) {
      this.log.error("Cycle failed", { error: describeError(err) });
      return null;
    }

    this.lastReport = report;
    try {
      this.onCycle?.(report);
    } catch (err) {
      this.log.warn("Cycle listener threw", { error: describeError(err) });
    }
    return report;
  }
}
