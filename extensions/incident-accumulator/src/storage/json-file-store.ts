/**
 * Incident Accumulator — JSON File Storage
 *
 * Each save writes both views into a new generation directory
 * (`generations/<id>/incidents_master.json`, `.../incidents_latest.json`)
 * and then publishes it by renaming a single manifest, `current.json`,
 * over the old one. Readers resolve the manifest first, so they see either
 * the previous pair or the new pair, never one of each. The previous
 * generation is kept for readers still holding the old manifest; older
 * ones are pruned.
 *
 * A directory without a manifest is read in the flat layout of earlier
 * versions (`incidents_master.json` / `incidents_latest.json` at the top).
 */

import { randomUUID } from "node:crypto";
import { mkdir, readFile, readdir, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { PersistenceFailureError, describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { encodeView, parseView } from "../serialization.js";
import type { Incident, PersistedState, PersistenceAdapter } from "../types.js";

export const DEFAULT_MASTER_FILE = "incidents_master.json";
export const DEFAULT_LATEST_FILE = "incidents_latest.json";
export const MANIFEST_FILE = "current.json";
export const GENERATIONS_DIR = "generations";

const manifestSchema = z.object({
  generation: z.string().regex(/^[\w-]+$/),
  savedAt: z.string(),
});

export type JsonManifest = z.infer<typeof manifestSchema>;

export type JsonFileStorageOptions = {
  directory: string;
  masterFile?: string;
  latestFile?: string;
  logger?: Logger;
};

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class JsonFileIncidentStorage implements PersistenceAdapter {
  readonly directory: string;
  readonly manifestPath: string;
  private readonly masterFile: string;
  private readonly latestFile: string;
  private readonly logger?: Logger;
  private pending: Promise<unknown> = Promise.resolve();

  constructor(options: JsonFileStorageOptions) {
    this.directory = options.directory;
    this.manifestPath = join(options.directory, MANIFEST_FILE);
    this.masterFile = options.masterFile ?? DEFAULT_MASTER_FILE;
    this.latestFile = options.latestFile ?? DEFAULT_LATEST_FILE;
    this.logger = options.logger;
  }

  async initialize(): Promise<void> {
    try {
      await mkdir(this.directory, { recursive: true });
    } catch (err) {
      throw new PersistenceFailureError("save", `Cannot create data directory ${this.directory}: ${describeError(err)}`, err);
    }
  }

  /** Paths of the view files the current manifest points at. */
  async currentPaths(): Promise<{ master: string; latest: string }> {
    return this.viewPaths(await this.readManifest());
  }

  load(): Promise<PersistedState> {
    return this.exclusive(async () => {
      const manifest = await this.readManifest();
      const paths = this.viewPaths(manifest);
      // A manifest names files that must exist; only the flat layout may be absent.
      const required = manifest !== null;
      return {
        master: await this.readView(paths.master, required),
        latest: await this.readView(paths.latest, required),
      };
    });
  }

  save(master: readonly Incident[], latest: readonly Incident[]): Promise<void> {
    return this.exclusive(async () => {
      const manifest: JsonManifest = {
        generation: `${Date.now()}-${randomUUID()}`,
        savedAt: new Date().toISOString(),
      };
      const dir = this.generationDir(manifest.generation);
      const manifestTemp = `${this.manifestPath}.${process.pid}.${randomUUID()}.tmp`;
      let previous: JsonManifest | null = null;

      try {
        previous = await this.readManifest();
        await mkdir(dir, { recursive: true });
        await writeFile(join(dir, this.masterFile), encodeView(master), "utf-8");
        await writeFile(join(dir, this.latestFile), encodeView(latest), "utf-8");
        await writeFile(manifestTemp, JSON.stringify(manifest, null, 2), "utf-8");
        await rename(manifestTemp, this.manifestPath);
      } catch (err) {
        await Promise.allSettled([rm(dir, { recursive: true, force: true }), rm(manifestTemp, { force: true })]);
        throw new PersistenceFailureError("save", `Failed to write incident views: ${describeError(err)}`, err);
      }

      await this.prune([manifest.generation, previous?.generation]);
    });
  }

  async close(): Promise<void> {
    await this.pending;
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private generationDir(generation: string): string {
    return join(this.directory, GENERATIONS_DIR, generation);
  }

  private viewPaths(manifest: JsonManifest | null): { master: string; latest: string } {
    const base = manifest ? this.generationDir(manifest.generation) : this.directory;
    return { master: join(base, this.masterFile), latest: join(base, this.latestFile) };
  }

  private async readManifest(): Promise<JsonManifest | null> {
    let text: string;
    try {
      text = await readFile(this.manifestPath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new PersistenceFailureError("load", `Failed to read ${this.manifestPath}: ${describeError(err)}`, err);
    }

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (err) {
      throw new PersistenceFailureError("load", `${this.manifestPath} is not valid JSON`, err);
    }
    const parsed = manifestSchema.safeParse(document);
    if (!parsed.success) {
      throw new PersistenceFailureError("load", `${this.manifestPath} is not a valid manifest`);
    }
    return parsed.data;
  }

  private async readView(path: string, required: boolean): Promise<Incident[]> {
    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (err) {
      if (!required && isNotFound(err)) return [];
      throw new PersistenceFailureError("load", `Failed to read ${path}: ${describeError(err)}`, err);
    }

    return parseView(text, (index, reason) => {
      this.logger?.warn(`Skipping unreadable entry ${index} in ${path}`, { reason });
    });
  }

  /** Remove generations other than `keep`. The new manifest is already live. */
  private async prune(keep: (string | undefined)[]): Promise<void> {
    const root = join(this.directory, GENERATIONS_DIR);
    try {
      const stale = (await readdir(root)).filter((name) => !keep.includes(name));
      await Promise.all(stale.map((name) => rm(join(root, name), { recursive: true, force: true })));
    } catch (err) {
      this.logger?.warn("Failed to prune old generations", { error: describeError(err) });
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.pending.then(task, task);
    // Ordering only: the caller of `run` still receives its rejection.
    this.pending = run.catch(() => undefined);
    return run;
  }
}
