/**
 * Incident Accumulator — Core Types
 *
 * Normalised traffic-incident model, identity keys, merge reports and the
 * persistence contract shared by every storage backend.
 */

// =============================================================================
// Raw Feed Input
// =============================================================================

/** One semi-structured alert object as returned by the upstream feed. */
export type RawRecord = Record<string, unknown>;

/** Fetches the current batch of raw records from the feed. */
export type FetchBatch = () => Promise<RawRecord[]>;

// =============================================================================
// Incident
// =============================================================================

/** Incident categories the normaliser recognises. */
export type KnownIncidentKind = "accident" | "hazard" | "jam" | "road_closed" | "police";

/**
 * Incident category. Unrecognised feed values are kept as `other` with the
 * original string so they never fail normalisation.
 */
export type IncidentType =
  | { readonly kind: KnownIncidentKind; readonly raw: string }
  | { readonly kind: "other"; readonly raw: string };

export type GeoPoint = {
  readonly lat: number;
  readonly lon: number;
};

/** A single normalised traffic incident. Instances are deeply frozen. */
export type Incident = {
  /** Upstream identifier, when the feed supplies one. */
  readonly uuid?: string;
  /** Location at the precision the feed reported. */
  readonly location: GeoPoint;
  /** Location rounded to 5 decimal places, used for identity matching. */
  readonly canonical: GeoPoint;
  readonly type: IncidentType;
  readonly subtype?: string;
  /** Report time in epoch milliseconds. */
  readonly timestamp?: number;
  readonly street?: string;
  readonly city?: string;
  readonly country?: string;
  readonly reliability?: number;
  readonly reportRating?: number;
  /** Original feed record, untouched. */
  readonly raw: Readonly<RawRecord>;
};

// =============================================================================
// Identity
// =============================================================================

export type IdentityTier = "uuid" | "location-time" | "location-street";

export type IdentityKey =
  | { tier: "uuid"; uuid: string }
  | { tier: "location-time"; lat: number; lon: number; type: string; timestamp: number }
  | { tier: "location-street"; lat: number; lon: number; type: string; street: string };

// =============================================================================
// Merge
// =============================================================================

export type MergeReport = {
  /** Incidents admitted to the store by this merge. */
  added: number;
  /** Incidents discarded because their identity was already known. */
  duplicates: number;
  /** Store size after the merge. */
  total: number;
};

/** Immutable snapshot handed to readers and to persistence. */
export type LedgerViews = {
  /** Every distinct incident ever admitted, in admission order. */
  master: readonly Incident[];
  /** The most recently fetched batch, as fetched. */
  latest: readonly Incident[];
  /** Incremented on every publish. */
  version: number;
  /** ISO-8601 time of the last publish, or null before the first. */
  publishedAt: string | null;
};

// =============================================================================
// Engine
// =============================================================================

export type CycleStatus = "merged" | "fetch-failed";

export type CycleReport = {
  status: CycleStatus;
  fetched: number;
  malformed: number;
  added: number;
  duplicates: number;
  total: number;
  /** Whether the views reached durable storage. */
  persisted: boolean;
  durationMs: number;
  timestamp: string;
  error?: string;
};

export type EngineMetrics = {
  cycles: number;
  fetchFailures: number;
  persistenceFailures: number;
  malformedRecords: number;
};

// =============================================================================
// Statistics
// =============================================================================

export type IncidentStats = {
  total: number;
  byType: Record<string, number>;
  byCity: Record<string, number>;
  dateRange: { earliest: string; latest: string } | null;
};

// =============================================================================
// Persistence
// =============================================================================

/** Serialised form of an incident, one object per entry in a view file. */
export type PersistedIncident = {
  uuid?: string;
  lat: number;
  lon: number;
  type: string;
  subtype?: string;
  timestamp?: number;
  reportedAt?: string;
  street?: string;
  city?: string;
  country?: string;
  reliability?: number;
  reportRating?: number;
  raw: RawRecord;
};

export type PersistedState = {
  master: Incident[];
  latest: Incident[];
};

export interface PersistenceAdapter {
  initialize(): Promise<void>;
  /** Last successfully saved state, or empty views when nothing was saved. */
  load(): Promise<PersistedState>;
  /** Writes both views as one logical operation. */
  save(master: readonly Incident[], latest: readonly Incident[]): Promise<void>;
  close(): Promise<void>;
}

export type StorageType = "json" | "sqlite" | "memory";
