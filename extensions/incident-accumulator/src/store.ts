/**
 * Accumulator Store
 *
 * Insertion-ordered, append-only set of incidents keyed by resolved
 * identity. The first observation of an identity wins; later observations
 * are counted as duplicates and discarded.
 */

import { identityKeyString, incidentKey } from "./identity.js";
import type { IdentityKey, Incident, MergeReport } from "./types.js";

export class AccumulatorStore {
  private readonly entries = new Map<string, Incident>();

  /**
   * Seed the store from persisted state. Entries are admitted through the
   * same first-write-wins rule as `merge`, so a master view written by an
   * older resolver cannot introduce duplicate keys.
   */
  constructor(initial: readonly Incident[] = []) {
    this.merge(initial);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Admit every incident whose identity is not yet known, in arrival order.
   *
   * Additions are staged and committed once the whole batch has been
   * resolved, so an exception part-way through leaves the store as it was.
   */
  merge(batch: readonly Incident[]): MergeReport {
    const staged = new Map<string, Incident>();
    let duplicates = 0;

    for (const incident of batch) {
      const key = incidentKey(incident);
      if (this.entries.has(key) || staged.has(key)) {
        duplicates++;
        continue;
      }
      staged.set(key, incident);
    }

    for (const [key, incident] of staged) {
      this.entries.set(key, incident);
    }

    return { added: staged.size, duplicates, total: this.entries.size };
  }

  has(incident: Incident): boolean {
    return this.entries.has(incidentKey(incident));
  }

  get(key: IdentityKey): Incident | undefined {
    return this.entries.get(identityKeyString(key));
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  /** Frozen copy of every admitted incident, in admission order. */
  masterView(): readonly Incident[] {
    return Object.freeze([...this.entries.values()]);
  }
}
