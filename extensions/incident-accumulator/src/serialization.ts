/**
 * Persisted view format
 *
 * Each view is stored as a JSON array of flat incident objects. Entries
 * are validated with zod on the way back in; entries in the flat layout
 * written by earlier versions of the service (`lng`, `pubMillis`, no
 * `raw`) fail the schema and are re-read through the feed normaliser.
 */

import { z } from "zod";
import { MalformedRecordError, PersistenceFailureError } from "./errors.js";
import { MAX_TIMESTAMP_MS, createIncident, normalizeRecord, parseIncidentType } from "./normalizer.js";
import type { Incident, PersistedIncident } from "./types.js";

export const persistedIncidentSchema = z.object({
  uuid: z.string().min(1).optional(),
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
  type: z.string().min(1),
  subtype: z.string().optional(),
  timestamp: z.number().int().nonnegative().max(MAX_TIMESTAMP_MS).optional(),
  reportedAt: z.string().optional(),
  street: z.string().optional(),
  city: z.string().optional(),
  country: z.string().optional(),
  reliability: z.number().optional(),
  reportRating: z.number().optional(),
  raw: z.record(z.string(), z.unknown()),
});

export type PersistedIncidentInput = z.infer<typeof persistedIncidentSchema>;

export function toPersisted(incident: Incident): PersistedIncident {
  return {
    uuid: incident.uuid,
    lat: incident.location.lat,
    lon: incident.location.lon,
    type: incident.type.raw,
    subtype: incident.subtype,
    timestamp: incident.timestamp,
    reportedAt: incident.timestamp !== undefined ? new Date(incident.timestamp).toISOString() : undefined,
    street: incident.street,
    city: incident.city,
    country: incident.country,
    reliability: incident.reliability,
    reportRating: incident.reportRating,
    raw: incident.raw,
  };
}

export function fromPersisted(entry: PersistedIncidentInput): Incident {
  return createIncident({
    uuid: entry.uuid,
    location: { lat: entry.lat, lon: entry.lon },
    type: parseIncidentType(entry.type),
    subtype: entry.subtype,
    timestamp: entry.timestamp,
    street: entry.street,
    city: entry.city,
    country: entry.country,
    reliability: entry.reliability,
    reportRating: entry.reportRating,
    raw: entry.raw,
  });
}

/** Serialise a view to the JSON document written to storage. */
export function encodeView(incidents: readonly Incident[]): string {
  return JSON.stringify(incidents.map(toPersisted), null, 2);
}

export type DecodeSkipHandler = (index: number, reason: string) => void;

/**
 * Decode one parsed view document. Entries that match neither the current
 * nor the legacy layout are reported through `onSkip` and left out.
 */
export function decodeView(document: unknown, onSkip?: DecodeSkipHandler): Incident[] {
  if (!Array.isArray(document)) {
    throw new PersistenceFailureError("load", "Persisted view is not a JSON array");
  }

  const incidents: Incident[] = [];
  document.forEach((entry: unknown, index) => {
    const parsed = persistedIncidentSchema.safeParse(entry);
    if (parsed.success) {
      incidents.push(fromPersisted(parsed.data));
      return;
    }
    try {
      incidents.push(normalizeRecord(entry));
    } catch (err) {
      if (!(err instanceof MalformedRecordError)) throw err;
      onSkip?.(index, err.message);
    }
  });
  return incidents;
}

/** Parse and decode a view file's text. */
export function parseView(text: string, onSkip?: DecodeSkipHandler): Incident[] {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw new PersistenceFailureError("load", "Persisted view is not valid JSON", err);
  }
  return decodeView(document, onSkip);
}
