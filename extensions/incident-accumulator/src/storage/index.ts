import { resolveStoragePath, type AccumulatorConfig } from "../config.js";
import type { Logger } from "../logger.js";
import type { PersistenceAdapter } from "../types.js";
import { JsonFileIncidentStorage } from "./json-file-store.js";
import { InMemoryIncidentStorage } from "./memory-store.js";
import { SQLiteIncidentStorage } from "./sqlite-store.js";

export { JsonFileIncidentStorage, DEFAULT_LATEST_FILE, DEFAULT_MASTER_FILE, MANIFEST_FILE } from "./json-file-store.js";
export type { JsonFileStorageOptions, JsonManifest } from "./json-file-store.js";
export { SQLiteIncidentStorage } from "./sqlite-store.js";
export { InMemoryIncidentStorage } from "./memory-store.js";

export function createStorage(
  config: AccumulatorConfig,
  options?: { cwd?: string; logger?: Logger },
): PersistenceAdapter {
  const logger = options?.logger?.child("storage");
  switch (config.storage.type) {
    case "memory":
      return new InMemoryIncidentStorage();
    case "sqlite":
      return new SQLiteIncidentStorage(resolveStoragePath(config, options?.cwd), { logger });
    case "json":
      return new JsonFileIncidentStorage({ directory: resolveStoragePath(config, options?.cwd), logger });
  }
}
