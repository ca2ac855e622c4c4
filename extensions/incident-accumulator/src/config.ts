/**
 * Accumulator Configuration
 *
 * Layered configuration validated with zod. Layers, later wins:
 * schema defaults, JSON config file, environment, explicit overrides
 * (CLI flags).
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { ConfigValidationError } from "./errors.js";
import { isRecord } from "./normalizer.js";

// =============================================================================
// Zod Schemas
// =============================================================================

export const storageConfigSchema = z.object({
  type: z.enum(["json", "sqlite", "memory"]).default("json"),
  /** Directory for the JSON view files, or the SQLite database file. */
  path: z.string().min(1).optional(),
});

export const loggingConfigSchema = z.object({
  level: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
});

export const accumulatorConfigSchema = z.object({
  feedUrl: z.string().url().optional(),
  pollIntervalSeconds: z.coerce.number().int().positive().default(120),
  requestTimeoutMs: z.coerce.number().int().positive().default(30_000),
  storage: storageConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

export type AccumulatorConfig = z.infer<typeof accumulatorConfigSchema>;

export const DEFAULT_CONFIG_FILE = "config.json";
export const DEFAULT_JSON_DIR = "data";
export const DEFAULT_SQLITE_PATH = "data/incidents.db";

// =============================================================================
// Layers
// =============================================================================

/** Unvalidated partial configuration from one source. */
export type ConfigLayer = {
  feedUrl?: unknown;
  pollIntervalSeconds?: unknown;
  requestTimeoutMs?: unknown;
  storage?: { type?: unknown; path?: unknown };
  logging?: { level?: unknown };
};

function pick<T>(...values: (T | undefined)[]): T | undefined {
  for (let i = values.length - 1; i >= 0; i--) {
    if (values[i] !== undefined) return values[i];
  }
  return undefined;
}

function mergeLayers(layers: ConfigLayer[]): ConfigLayer {
  return {
    feedUrl: pick(...layers.map((l) => l.feedUrl)),
    pollIntervalSeconds: pick(...layers.map((l) => l.pollIntervalSeconds)),
    requestTimeoutMs: pick(...layers.map((l) => l.requestTimeoutMs)),
    storage: {
      type: pick(...layers.map((l) => l.storage?.type)),
      path: pick(...layers.map((l) => l.storage?.path)),
    },
    logging: {
      level: pick(...layers.map((l) => l.logging?.level)),
    },
  };
}

/**
 * Read a JSON config file. Accepts the snake_case keys used by earlier
 * deployments (`waze_api_url`, `update_interval_seconds`).
 */
export function readConfigFile(path: string): ConfigLayer {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigValidationError([`${path}: ${err instanceof Error ? err.message : String(err)}`]);
  }
  if (!isRecord(parsed)) {
    throw new ConfigValidationError([`${path}: expected a JSON object`]);
  }

  const storage = isRecord(parsed.storage) ? parsed.storage : undefined;
  const logging = isRecord(parsed.logging) ? parsed.logging : undefined;
  return {
    feedUrl: parsed.feedUrl ?? parsed.waze_api_url,
    pollIntervalSeconds: parsed.pollIntervalSeconds ?? parsed.update_interval_seconds,
    requestTimeoutMs: parsed.requestTimeoutMs,
    storage: storage ? { type: storage.type, path: storage.path } : undefined,
    logging: logging ? { level: logging.level } : undefined,
  };
}

/**
 * `WAZE_API_URL` and `UPDATE_INTERVAL_SECONDS` are read when the current
 * names are unset, for deployments configured before the rename.
 */
export function readEnvLayer(env: NodeJS.ProcessEnv): ConfigLayer {
  const value = (key: string): string | undefined => {
    const v = env[key];
    return v !== undefined && v.trim() !== "" ? v.trim() : undefined;
  };
  return {
    feedUrl: value("FEED_URL") ?? value("WAZE_API_URL"),
    pollIntervalSeconds: value("POLL_INTERVAL_SECONDS") ?? value("UPDATE_INTERVAL_SECONDS"),
    requestTimeoutMs: value("REQUEST_TIMEOUT_MS"),
    storage: { type: value("STORAGE_TYPE"), path: value("STORAGE_PATH") },
    logging: { level: value("LOG_LEVEL") },
  };
}

// =============================================================================
// Validation
// =============================================================================

export function validateConfig(input: unknown): AccumulatorConfig {
  const result = accumulatorConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  return result.data;
}

export type LoadConfigOptions = {
  /** Explicit config file; must exist. Defaults to ./config.json when present. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigLayer;
  cwd?: string;
};

export function loadConfig(options: LoadConfigOptions = {}): AccumulatorConfig {
  const cwd = options.cwd ?? process.cwd();
  const layers: ConfigLayer[] = [];

  if (options.configPath) {
    const path = resolve(cwd, options.configPath);
    if (!existsSync(path)) {
      throw new ConfigValidationError([`config file not found: ${path}`]);
    }
    layers.push(readConfigFile(path));
  } else {
    const path = resolve(cwd, DEFAULT_CONFIG_FILE);
    if (existsSync(path)) layers.push(readConfigFile(path));
  }

  layers.push(readEnvLayer(options.env ?? process.env));
  if (options.overrides) layers.push(options.overrides);

  return validateConfig(mergeLayers(layers));
}

export function resolveStoragePath(config: AccumulatorConfig, cwd = process.cwd()): string {
  const fallback = config.storage.type === "sqlite" ? DEFAULT_SQLITE_PATH : DEFAULT_JSON_DIR;
  return resolve(cwd, config.storage.path ?? fallback);
}
