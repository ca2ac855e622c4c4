/**
 * Incident Normalizer
 *
 * Pure functions that turn loosely-typed feed alerts into the Incident
 * model. Feed versions disagree on field names and value types, so every
 * field is looked up across the known spellings here, once, and downstream
 * code only ever sees the normalised shape.
 */

import { MalformedRecordError, type SkippedRecord } from "./errors.js";
import type {
  GeoPoint,
  Incident,
  IncidentType,
  KnownIncidentKind,
  RawRecord,
} from "./types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export const COORDINATE_DECIMALS = 5;
const COORDINATE_SCALE = 10 ** COORDINATE_DECIMALS;

/** Epoch values below this are seconds, not milliseconds. */
const SECONDS_THRESHOLD = 1e10;

/** Largest time a Date can hold. */
export const MAX_TIMESTAMP_MS = 8_640_000_000_000_000;

const KNOWN_KINDS = new Map<string, KnownIncidentKind>([
  ["ACCIDENT", "accident"],
  ["HAZARD", "hazard"],
  ["WEATHERHAZARD", "hazard"],
  ["JAM", "jam"],
  ["ROAD_CLOSED", "road_closed"],
  ["POLICE", "police"],
]);

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Feed semantics: null, empty string, zero and false all mean "not sent". */
function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== "" && value !== 0 && value !== false;
}

function firstPresent(source: RawRecord, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (isPresent(source[key])) return source[key];
  }
  return undefined;
}

/** First value whose key exists with a non-null value, even if falsy. */
function firstDefined(source: RawRecord, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = source[key];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function optionalText(value: unknown): string | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

// ---------------------------------------------------------------------------
// Canonical values
// ---------------------------------------------------------------------------

/**
 * Round a coordinate to 5 decimal places (~1 m), half away from zero.
 *
 * The scaled value is cleaned to 15 significant digits before rounding so
 * that inputs such as 40.123455 round on their decimal value rather than on
 * the nearest binary double.
 */
export function roundCoordinate(value: number): number {
  const scaled = Number((Math.abs(value) * COORDINATE_SCALE).toPrecision(15));
  const rounded = Math.round(scaled) / COORDINATE_SCALE;
  return value < 0 && rounded !== 0 ? -rounded : rounded;
}

export function canonicalPoint(point: GeoPoint): GeoPoint {
  return { lat: roundCoordinate(point.lat), lon: roundCoordinate(point.lon) };
}

export function parseIncidentType(value: string): IncidentType {
  const raw = value.trim();
  const kind = KNOWN_KINDS.get(raw.toUpperCase());
  return kind ? { kind, raw } : { kind: "other", raw };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Build an Incident from already-typed fields. Shared by the feed
 * normaliser and the persisted-state decoder so both derive the canonical
 * location the same way.
 *
 * The result is deeply frozen; `raw` is frozen as a copy, so the caller's
 * record stays writable.
 */
export function createIncident(input: Omit<Incident, "canonical">): Incident {
  return deepFreeze({
    ...input,
    location: { lat: input.location.lat, lon: input.location.lon },
    raw: structuredClone(input.raw),
    canonical: canonicalPoint(input.location),
  });
}

// ---------------------------------------------------------------------------
// Field extraction
// ---------------------------------------------------------------------------

/**
 * Coordinates are looked up in three layouts, first complete one wins:
 *   1. `location: { y, x }` (or latitude/longitude, lat/lng/lon)
 *   2. top-level `lat` / `lng` (or latitude/longitude, y/x)
 *   3. `coordinates: [lon, lat]`
 */
function extractLocation(raw: RawRecord): GeoPoint {
  const candidates: [unknown, unknown][] = [];

  if (isRecord(raw.location)) {
    candidates.push([
      firstPresent(raw.location, ["y", "latitude", "lat"]),
      firstPresent(raw.location, ["x", "longitude", "lng", "lon"]),
    ]);
  }
  candidates.push([
    firstPresent(raw, ["lat", "latitude", "y"]),
    firstPresent(raw, ["lng", "longitude", "lon", "x"]),
  ]);
  if (Array.isArray(raw.coordinates) && raw.coordinates.length >= 2) {
    candidates.push([raw.coordinates[1], raw.coordinates[0]]);
  }

  const pair = candidates.find(([lat, lon]) => isPresent(lat) && isPresent(lon));
  if (!pair) {
    throw new MalformedRecordError("location", "no coordinates found", raw);
  }

  const lat = toFiniteNumber(pair[0]);
  const lon = toFiniteNumber(pair[1]);
  if (lat === undefined || lon === undefined) {
    throw new MalformedRecordError("location", "coordinates are not numeric", raw);
  }
  if (Math.abs(lat) > 90 || Math.abs(lon) > 180) {
    throw new MalformedRecordError("location", `coordinates out of range (${lat}, ${lon})`, raw);
  }
  return { lat, lon };
}

function extractType(raw: RawRecord): IncidentType {
  const value = optionalText(firstDefined(raw, ["type", "alertType"]));
  if (!value) {
    throw new MalformedRecordError("type", "missing incident type", raw);
  }
  return parseIncidentType(value);
}

/**
 * Report time in epoch milliseconds. Absent or zero yields undefined; a
 * value that is present but cannot be read as a time is malformed.
 */
function extractTimestamp(raw: RawRecord): number | undefined {
  const value = firstDefined(raw, ["pubMillis", "pub_millis", "timestamp"]);
  if (value === undefined || value === 0 || value === "") return undefined;

  let millis: number;
  if (typeof value === "number") {
    millis = value < SECONDS_THRESHOLD ? value * 1000 : value;
  } else if (typeof value === "string") {
    const numeric = toFiniteNumber(value);
    if (numeric === 0) return undefined;
    if (numeric !== undefined) {
      millis = numeric < SECONDS_THRESHOLD ? numeric * 1000 : numeric;
    } else {
      millis = Date.parse(value.trim());
    }
  } else {
    throw new MalformedRecordError("timestamp", `unsupported timestamp type ${typeof value}`, raw);
  }

  if (!Number.isFinite(millis) || millis < 0) {
    throw new MalformedRecordError("timestamp", `unreadable timestamp ${JSON.stringify(value)}`, raw);
  }
  if (millis > MAX_TIMESTAMP_MS) {
    throw new MalformedRecordError("timestamp", `timestamp out of range (${millis})`, raw);
  }
  return Math.round(millis);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Normalise one feed alert. Throws MalformedRecordError when location or
 * type cannot be extracted, or when a timestamp is present but unreadable.
 */
export function normalizeRecord(raw: unknown): Incident {
  if (!isRecord(raw)) {
    throw new MalformedRecordError("record", "record is not an object", raw);
  }

  return createIncident({
    uuid: optionalText(raw.uuid),
    location: extractLocation(raw),
    type: extractType(raw),
    subtype: optionalText(firstDefined(raw, ["subtype", "alertSubtype"])),
    timestamp: extractTimestamp(raw),
    street: optionalText(raw.street),
    city: optionalText(raw.city),
    country: optionalText(raw.country),
    reliability: toFiniteNumber(firstDefined(raw, ["reliability", "confidence"])),
    reportRating: toFiniteNumber(firstDefined(raw, ["reportRating", "report_rating"])),
    raw,
  });
}

/**
 * Normalise a batch, skipping malformed records. Skipped records are
 * returned with their batch index so callers can count and log them.
 */
export function normalizeBatch(raws: readonly unknown[]): {
  incidents: Incident[];
  skipped: SkippedRecord[];
} {
  const incidents: Incident[] = [];
  const skipped: SkippedRecord[] = [];

  raws.forEach((raw, index) => {
    try {
      incidents.push(normalizeRecord(raw));
    } catch (err) {
      if (!(err instanceof MalformedRecordError)) throw err;
      skipped.push({ index, error: err });
    }
  });

  return { incidents, skipped };
}
