import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Command } from "commander";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { registerLedgerCli } from "./cli.js";

const D1 = Date.UTC(2024, 0, 1);
const D2 = Date.UTC(2024, 0, 2);

const ALERTS = [
  { uuid: "a1", location: { x: -74, y: 40 }, type: "ACCIDENT", pubMillis: D1, city: "Austin" },
  { uuid: "a2", location: { x: -73, y: 41 }, type: "JAM", pubMillis: D2, city: "Austin" },
  { uuid: "a1", location: { x: -74, y: 40 }, type: "ACCIDENT", pubMillis: D1, city: "Austin" },
  { type: "JAM" },
];

describe("incident-ledger CLI", () => {
  let dir: string;
  let info: string[];
  let errors: string[];
  let shutdown: (() => Promise<void>) | null;

  async function run(...args: string[]): Promise<void> {
    const program = new Command("incident-ledger").exitOverride();
    registerLedgerCli({
      program,
      logger: {
        info: (msg) => info.push(msg),
        warn: (msg) => info.push(msg),
        error: (msg) => errors.push(msg),
      },
      env: {},
      cwd: dir,
      onShutdown: (handler) => {
        shutdown = handler;
      },
    });
    await program.parseAsync(args, { from: "user" });
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "incident-cli-"));
    info = [];
    errors = [];
    shutdown = null;
  });

  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("ingests a saved feed response and reports statistics", async () => {
    writeFileSync(join(dir, "feed.json"), JSON.stringify({ alerts: ALERTS }));

    await run("ingest", "feed.json");
    expect(info).toEqual(["Ingested feed.json: Fetched: 4 | New: 2 | Duplicates: 1 | Malformed: 1 | Total: 2"]);

    info = [];
    await run("stats");
    expect(info).toEqual([
      "Total unique incidents: 2",
      "By type: ACCIDENT: 1, JAM: 1",
      "By city: Austin: 2",
      "Date range: 2024-01-01T00:00:00.000Z to 2024-01-02T00:00:00.000Z",
      "Latest batch: 3 incident(s)",
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  it("does not add incidents when the same file is ingested twice", async () => {
    writeFileSync(join(dir, "feed.json"), JSON.stringify(ALERTS));

    await run("ingest", "feed.json", "--storage", "sqlite");
    await run("ingest", "feed.json", "--storage", "sqlite");

    expect(info[1]).toBe("Ingested feed.json: Fetched: 4 | New: 0 | Duplicates: 3 | Malformed: 1 | Total: 2");
  });

  it("fails when the ingest file cannot be read", async () => {
    await run("ingest", "missing.json");
    expect(errors[0]).toMatch(/^Cannot read .*missing\.json: /);
    expect(process.exitCode).toBe(1);
  });

  it("requires a feed URL for once", async () => {
    await run("once");
    expect(errors).toEqual(["No feed URL configured. Set feedUrl in config.json, FEED_URL, or pass --feed-url."]);
    expect(process.exitCode).toBe(1);
  });

  it("reports invalid configuration", async () => {
    await run("stats", "--storage", "redis");
    expect(errors[0]).toMatch(/^Invalid configuration:\n {2}storage\.type: /);
    expect(process.exitCode).toBe(1);
  });

  it("runs a single cycle against the feed", async () => {
    vi.spyOn(globalThis, "fetch").mockImplementation(
      async () => new Response(JSON.stringify({ alerts: ALERTS.slice(0, 2) }), { status: 200 }),
    );

    await run("once", "--feed-url", "https://feed.example.com/alerts", "--storage", "memory");

    expect(info).toEqual(["Fetched: 2 | New: 2 | Duplicates: 0 | Malformed: 0 | Total: 2"]);
    expect(process.exitCode).toBeUndefined();
  });

  it("exits non-zero when the single cycle cannot fetch", async () => {
    vi.spyOn(globalThis, "fetch").mockImplementation(async () => new Response("down", { status: 503 }));

    await run("once", "--feed-url", "https://feed.example.com/alerts", "--storage", "memory");

    expect(errors).toEqual(["Fetch failed: Feed responded with HTTP 503"]);
    expect(process.exitCode).toBe(1);
  });

  it("polls until shut down and saves the final state", async () => {
    vi.spyOn(globalThis, "fetch").mockImplementation(async () => new Response(JSON.stringify(ALERTS), { status: 200 }));

    await run("run", "--feed-url", "https://feed.example.com/alerts", "--interval", "60");
    expect(info).toEqual(["Fetch interval: 60 seconds", "Existing incidents: 0"]);
    expect(shutdown).not.toBeNull();

    await shutdown?.();
    expect(info.slice(2)).toEqual(["Stopping, saving final state...", "Total unique incidents: 2"]);

    info = [];
    await run("stats");
    expect(info[0]).toBe("Total unique incidents: 2");
  });
});
