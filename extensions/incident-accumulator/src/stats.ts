/**
 * Incident Statistics
 *
 * Aggregate counts over a view for the cycle log and the `stats` command.
 */

import type { Incident, IncidentStats } from "./types.js";

function countBy(incidents: readonly Incident[], key: (item: Incident) => string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const item of incidents) {
    const k = key(item);
    counts[k] = (counts[k] ?? 0) + 1;
  }
  return counts;
}

export function summarizeIncidents(incidents: readonly Incident[]): IncidentStats {
  const byType = countBy(incidents, (i) => i.type.raw);
  const byCity = countBy(incidents, (i) => i.city ?? "unknown");

  let earliest: number | null = null;
  let latest: number | null = null;
  for (const { timestamp } of incidents) {
    if (timestamp === undefined) continue;
    if (earliest === null || timestamp < earliest) earliest = timestamp;
    if (latest === null || timestamp > latest) latest = timestamp;
  }

  return {
    total: incidents.length,
    byType,
    byCity,
    dateRange:
      earliest !== null && latest !== null
        ? { earliest: new Date(earliest).toISOString(), latest: new Date(latest).toISOString() }
        : null,
  };
}

/** `ACCIDENT: 3, JAM: 1` ordered by count, highest first. */
export function formatCounts(counts: Record<string, number>): string {
  return Object.entries(counts)
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .map(([key, count]) => `${key}: ${count}`)
    .join(", ");
}
