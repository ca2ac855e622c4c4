export const VERSION = "1.0.0";

export { AccumulationEngine } from "./engine.js";
export type { AccumulationEngineOptions } from "./engine.js";
export { AccumulatorStore } from "./store.js";
export { Poller } from "./poller.js";
export type { CycleRunner, PollerOptions } from "./poller.js";
export { FeedClient, extractAlerts, DEFAULT_USER_AGENT } from "./feed-client.js";
export type { FeedClientOptions } from "./feed-client.js";
export {
  normalizeRecord,
  normalizeBatch,
  roundCoordinate,
  canonicalPoint,
  parseIncidentType,
} from "./normalizer.js";
export { resolveIdentity, identityKeyString, incidentKey } from "./identity.js";
export { encodeView, decodeView, parseView, toPersisted, fromPersisted } from "./serialization.js";
export { summarizeIncidents, formatCounts } from "./stats.js";
export { loadConfig, validateConfig, resolveStoragePath, accumulatorConfigSchema } from "./config.js";
export type { AccumulatorConfig, LoadConfigOptions } from "./config.js";
export { createLogger, ConsoleTransport, createDefaultFormatter } from "./logger.js";
export type { Logger, LogLevel, LogEntry, LogTransport } from "./logger.js";
export {
  createStorage,
  JsonFileIncidentStorage,
  SQLiteIncidentStorage,
  InMemoryIncidentStorage,
} from "./storage/index.js";
export { registerLedgerCli } from "./cli.js";
export type { CliContext } from "./cli.js";
export {
  MalformedRecordError,
  FetchFailureError,
  PersistenceFailureError,
  ConfigValidationError,
} from "./errors.js";
export type {
  RawRecord,
  FetchBatch,
  Incident,
  IncidentType,
  KnownIncidentKind,
  GeoPoint,
  IdentityKey,
  IdentityTier,
  MergeReport,
  LedgerViews,
  CycleReport,
  CycleStatus,
  EngineMetrics,
  IncidentStats,
  PersistedIncident,
  PersistedState,
  PersistenceAdapter,
  StorageType,
} from "./types.js";
