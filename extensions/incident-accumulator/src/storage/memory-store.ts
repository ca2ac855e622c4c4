/**
 * Incident Accumulator — In-Memory Storage
 *
 * Lightweight implementation for tests and dry runs. Views are held in
 * their serialised form so loads go through the same decoder as the file
 * and database backends.
 */

import { encodeView, parseView } from "../serialization.js";
import type { Incident, PersistedState, PersistenceAdapter } from "../types.js";

export class InMemoryIncidentStorage implements PersistenceAdapter {
  private master = "[]";
  private latest = "[]";
  private saves = 0;

  async initialize(): Promise<void> {
    // No-op for in-memory
  }

  async load(): Promise<PersistedState> {
    return { master: parseView(this.master), latest: parseView(this.latest) };
  }

  async save(master: readonly Incident[], latest: readonly Incident[]): Promise<void> {
    const masterText = encodeView(master);
    const latestText = encodeView(latest);
    this.master = masterText;
    this.latest = latestText;
    this.saves++;
  }

  /** Number of successful saves since construction. */
  getSaveCount(): number {
    return this.saves;
  }

  async close(): Promise<void> {
    // Nothing to release; state stays readable until the instance is dropped.
  }
}
