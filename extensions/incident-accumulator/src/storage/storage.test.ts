import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { readFile, readdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { validateConfig } from "../config.js";
import { PersistenceFailureError } from "../errors.js";
import { createLogger, type LogEntry } from "../logger.js";
import { normalizeRecord } from "../normalizer.js";
import type { Incident, PersistenceAdapter } from "../types.js";
import {
  createStorage,
  InMemoryIncidentStorage,
  JsonFileIncidentStorage,
  SQLiteIncidentStorage,
} from "./index.js";

const MASTER: Incident[] = [
  normalizeRecord({ uuid: "a1", lat: 40, lng: -74, type: "ACCIDENT", pubMillis: 1_700_000_000_000 }),
  normalizeRecord({ lat: 41.123456, lng: -73.5, type: "JAM", street: "Main St", city: "Springfield" }),
];
const LATEST: Incident[] = [MASTER[1] ?? normalizeRecord({ lat: 1, lng: 1, type: "JAM" })];

// ─── Shared contract ─────────────────────────────────────────────────────────

function describeAdapter(name: string, make: () => { storage: PersistenceAdapter; cleanup: () => void }): void {
  describe(`${name} contract`, () => {
    let storage: PersistenceAdapter;
    let cleanup: () => void;

    beforeEach(async () => {
      ({ storage, cleanup } = make());
      await storage.initialize();
    });

    afterEach(async () => {
      await storage.close();
      cleanup();
    });

    it("loads empty views before the first save", async () => {
      expect(await storage.load()).toEqual({ master: [], latest: [] });
    });

    it("returns what was saved", async () => {
      await storage.save(MASTER, LATEST);
      const state = await storage.load();

      expect(state.master.map((i) => i.uuid ?? i.street)).toEqual(["a1", "Main St"]);
      expect(state.master[1]?.location).toEqual({ lat: 41.123456, lon: -73.5 });
      expect(state.master[1]?.canonical).toEqual({ lat: 41.12346, lon: -73.5 });
      expect(state.latest).toHaveLength(1);
      expect(state.latest[0]?.city).toBe("Springfield");
    });

    it("replaces the latest view on every save", async () => {
      await storage.save(MASTER, LATEST);
      await storage.save(MASTER, []);
      expect((await storage.load()).latest).toEqual([]);
    });
  });
}

describeAdapter("InMemoryIncidentStorage", () => ({ storage: new InMemoryIncidentStorage(), cleanup: () => {} }));

describeAdapter("SQLiteIncidentStorage", () => ({ storage: new SQLiteIncidentStorage(":memory:"), cleanup: () => {} }));

describeAdapter("JsonFileIncidentStorage", () => {
  const dir = mkdtempSync(join(tmpdir(), "incident-json-"));
  return {
    storage: new JsonFileIncidentStorage({ directory: join(dir, "nested") }),
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
});

// ─── JSON files ──────────────────────────────────────────────────────────────

describe("JsonFileIncidentStorage", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "incident-json-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("publishes both views in one generation behind the manifest", async () => {
    const storage = new JsonFileIncidentStorage({ directory: dir });
    await storage.initialize();
    await storage.save(MASTER, LATEST);

    expect((await readdir(dir)).sort()).toEqual(["current.json", "generations"]);
    const manifest: unknown = JSON.parse(await readFile(storage.manifestPath, "utf-8"));
    const [generation] = await readdir(join(dir, "generations"));
    expect(manifest).toMatchObject({ generation });
    expect((await readdir(join(dir, "generations", generation ?? ""))).sort()).toEqual([
      "incidents_latest.json",
      "incidents_master.json",
    ]);

    const paths = await storage.currentPaths();
    expect(paths.master).toBe(join(dir, "generations", generation ?? "", "incidents_master.json"));
    const master: unknown = JSON.parse(await readFile(paths.master, "utf-8"));
    expect(Array.isArray(master) && master.length).toBe(2);
    expect(await readFile(paths.latest, "utf-8")).toContain('\n  {\n    "lat": 41.123456,');
  });

  it("keeps the last published pair when a save stops halfway", async () => {
    const storage = new JsonFileIncidentStorage({ directory: dir });
    await storage.initialize();
    await storage.save(MASTER, LATEST);
    const before = await storage.currentPaths();

    // The latest file lands in a directory that does not exist, so this save
    // fails after its master file is already on disk.
    const broken = new JsonFileIncidentStorage({ directory: dir, latestFile: "missing/incidents_latest.json" });
    const next = normalizeRecord({ uuid: "b2", lat: 5, lng: 5, type: "POLICE" });
    await expect(broken.save([...MASTER, next], [next])).rejects.toThrow(/^Failed to write incident views: /);

    expect(await storage.currentPaths()).toEqual(before);
    const state = await storage.load();
    expect(state.master.map((i) => i.uuid ?? i.street)).toEqual(["a1", "Main St"]);
    expect(state.latest.map((i) => i.street)).toEqual(["Main St"]);
    expect(await readdir(join(dir, "generations"))).toHaveLength(1);
    expect((await readdir(dir)).sort()).toEqual(["current.json", "generations"]);
  });

  it("keeps only the current and previous generations", async () => {
    const storage = new JsonFileIncidentStorage({ directory: dir });
    await storage.initialize();
    await storage.save(MASTER, LATEST);
    const [first] = await readdir(join(dir, "generations"));
    await storage.save(MASTER, []);
    await storage.save(MASTER.slice(0, 1), []);

    const generations = await readdir(join(dir, "generations"));
    expect(generations).toHaveLength(2);
    expect(generations).not.toContain(first);
    expect((await storage.load()).master.map((i) => i.uuid)).toEqual(["a1"]);
  });

  it("reads the flat layout when there is no manifest", async () => {
    writeFileSync(join(dir, "incidents_master.json"), JSON.stringify([{ uuid: "flat", lat: 1, lng: 2, type: "JAM" }]));
    const storage = new JsonFileIncidentStorage({ directory: dir });

    const { master, latest } = await storage.load();

    expect(master.map((i) => i.uuid)).toEqual(["flat"]);
    expect(latest).toEqual([]);
    expect((await storage.currentPaths()).master).toBe(join(dir, "incidents_master.json"));
  });

  it("fails the load when the manifest names a missing generation", async () => {
    writeFileSync(join(dir, "current.json"), JSON.stringify({ generation: "gone", savedAt: "2024-01-01T00:00:00.000Z" }));
    const storage = new JsonFileIncidentStorage({ directory: dir });
    await expect(storage.load()).rejects.toThrow(PersistenceFailureError);
  });

  it("fails the load when the manifest is malformed", async () => {
    writeFileSync(join(dir, "current.json"), JSON.stringify({ generation: "../escape" }));
    const storage = new JsonFileIncidentStorage({ directory: dir });
    await expect(storage.load()).rejects.toThrow(`${join(dir, "current.json")} is not a valid manifest`);
  });

  it("skips unreadable entries and warns", async () => {
    writeFileSync(
      join(dir, "incidents_master.json"),
      JSON.stringify([{ uuid: "legacy", lat: 1, lng: 2, type: "JAM" }, { type: "JAM" }]),
    );
    const entries: LogEntry[] = [];
    const logger = createLogger("test", { transports: [{ name: "memory", write: (e) => entries.push(e) }] });
    const storage = new JsonFileIncidentStorage({ directory: dir, logger });

    const { master } = await storage.load();

    expect(master.map((i) => i.uuid)).toEqual(["legacy"]);
    expect(entries).toHaveLength(1);
    expect(entries[0]?.message).toBe(`Skipping unreadable entry 1 in ${join(dir, "incidents_master.json")}`);
  });

  it("fails the load when a view is not valid JSON", async () => {
    writeFileSync(join(dir, "incidents_latest.json"), "{");
    const storage = new JsonFileIncidentStorage({ directory: dir });
    await expect(storage.load()).rejects.toThrow(PersistenceFailureError);
  });

  it("reports a failed write as a save failure and cleans up", async () => {
    const blocker = join(dir, "file");
    writeFileSync(blocker, "not a directory");
    const storage = new JsonFileIncidentStorage({ directory: blocker });

    const result = storage.save(MASTER, LATEST);

    await expect(result).rejects.toThrow(PersistenceFailureError);
    await expect(result).rejects.toThrow(/^Failed to write incident views: /);
    expect(await readdir(dir)).toEqual(["file"]);
  });
});

// ─── SQLite ──────────────────────────────────────────────────────────────────

describe("SQLiteIncidentStorage", () => {
  it("refuses to work before initialize()", async () => {
    const storage = new SQLiteIncidentStorage(":memory:");
    await expect(storage.load()).rejects.toThrow("SQLite storage used before initialize()");
  });

  it("keeps the first stored payload for an identity", async () => {
    const storage = new SQLiteIncidentStorage(":memory:");
    await storage.initialize();

    await storage.save(MASTER, []);
    const moved = normalizeRecord({ uuid: "a1", lat: 10, lng: 10, type: "ACCIDENT" });
    await storage.save([moved, ...MASTER.slice(1)], []);

    const { master } = await storage.load();
    expect(master).toHaveLength(2);
    expect(master[0]?.location).toEqual({ lat: 40, lon: -74 });
    await storage.close();
  });

  it("records the save time", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-03-01T12:00:00.000Z"));
    try {
      const storage = new SQLiteIncidentStorage(":memory:");
      await storage.initialize();
      expect(storage.lastSavedAt()).toBeNull();
      await storage.save(MASTER, LATEST);
      expect(storage.lastSavedAt()).toBe("2024-03-01T12:00:00.000Z");
      await storage.close();
    } finally {
      vi.useRealTimers();
    }
  });
});

// ─── Factory ─────────────────────────────────────────────────────────────────

describe("createStorage", () => {
  it("builds the configured backend", () => {
    expect(createStorage(validateConfig({ storage: { type: "memory" } }))).toBeInstanceOf(InMemoryIncidentStorage);
    expect(createStorage(validateConfig({ storage: { type: "sqlite" } }), { cwd: "/srv" })).toBeInstanceOf(
      SQLiteIncidentStorage,
    );

    const json = createStorage(validateConfig({}), { cwd: "/srv" });
    expect(json).toBeInstanceOf(JsonFileIncidentStorage);
    if (json instanceof JsonFileIncidentStorage) {
      expect(json.manifestPath).toBe("/srv/data/current.json");
    }
  });
});
