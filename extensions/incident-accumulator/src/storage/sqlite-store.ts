/**
 * Incident Accumulator — SQLite Storage
 *
 * WAL-mode SQLite database holding both views. The master table is keyed
 * by resolved identity and only ever inserted into; the latest table is
 * cleared and refilled. Both happen inside one transaction per save.
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { PersistenceFailureError, describeError, type PersistenceOperation } from "../errors.js";
import { incidentKey } from "../identity.js";
import type { Logger } from "../logger.js";
import { decodeView, toPersisted } from "../serialization.js";
import type { Incident, PersistedState, PersistenceAdapter } from "../types.js";

const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS master_incidents (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  identity_key TEXT NOT NULL UNIQUE,
  payload TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS latest_incidents (
  position INTEGER PRIMARY KEY,
  payload TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS ledger_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
`;

type SaveViews = (master: readonly Incident[], latest: readonly Incident[]) => void;

type SqliteHandles = {
  db: Database.Database;
  saveViews: Database.Transaction<SaveViews>;
};

export class SQLiteIncidentStorage implements PersistenceAdapter {
  private readonly dbPath: string;
  private readonly logger?: Logger;
  private handles: SqliteHandles | null = null;

  constructor(dbPath: string, options?: { logger?: Logger }) {
    this.dbPath = dbPath;
    this.logger = options?.logger;
  }

  async initialize(): Promise<void> {
    if (this.handles) return;
    try {
      if (this.dbPath !== ":memory:") mkdirSync(dirname(this.dbPath), { recursive: true });
      const db = new Database(this.dbPath);
      db.pragma("journal_mode = WAL");
      db.pragma("synchronous = NORMAL");
      db.exec(SCHEMA_DDL);

      const insertMaster = db.prepare(
        "INSERT OR IGNORE INTO master_incidents (identity_key, payload) VALUES (@identity_key, @payload)",
      );
      const clearLatest = db.prepare("DELETE FROM latest_incidents");
      const insertLatest = db.prepare("INSERT INTO latest_incidents (position, payload) VALUES (@position, @payload)");
      const setMeta = db.prepare("INSERT OR REPLACE INTO ledger_meta (key, value) VALUES (@key, @value)");

      const saveViews = db.transaction((master: readonly Incident[], latest: readonly Incident[]) => {
        for (const incident of master) {
          insertMaster.run({ identity_key: incidentKey(incident), payload: JSON.stringify(toPersisted(incident)) });
        }
        clearLatest.run();
        latest.forEach((incident, position) => {
          insertLatest.run({ position, payload: JSON.stringify(toPersisted(incident)) });
        });
        setMeta.run({ key: "saved_at", value: new Date().toISOString() });
      });

      this.handles = { db, saveViews };
    } catch (err) {
      throw new PersistenceFailureError("load", `Cannot open SQLite database ${this.dbPath}: ${describeError(err)}`, err);
    }
  }

  async load(): Promise<PersistedState> {
    const { db } = this.open("load");
    try {
      return {
        master: this.readTable(db, "SELECT payload FROM master_incidents ORDER BY seq"),
        latest: this.readTable(db, "SELECT payload FROM latest_incidents ORDER BY position"),
      };
    } catch (err) {
      if (err instanceof PersistenceFailureError) throw err;
      throw new PersistenceFailureError("load", `Failed to read incidents: ${describeError(err)}`, err);
    }
  }

  async save(master: readonly Incident[], latest: readonly Incident[]): Promise<void> {
    const { saveViews } = this.open("save");
    try {
      saveViews(master, latest);
    } catch (err) {
      throw new PersistenceFailureError("save", `Failed to write incidents: ${describeError(err)}`, err);
    }
  }

  /** ISO time of the last successful save, or null. */
  lastSavedAt(): string | null {
    const { db } = this.open("load");
    const row = db
      .prepare<[string], { value: string }>("SELECT value FROM ledger_meta WHERE key = ?")
      .get("saved_at");
    return row?.value ?? null;
  }

  async close(): Promise<void> {
    this.handles?.db.close();
    this.handles = null;
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private open(operation: PersistenceOperation): SqliteHandles {
    if (!this.handles) {
      throw new PersistenceFailureError(operation, "SQLite storage used before initialize()");
    }
    return this.handles;
  }

  private readTable(db: Database.Database, sql: string): Incident[] {
    const rows = db.prepare<[], { payload: string }>(sql).all();
    const entries: unknown[] = rows.map((row) => JSON.parse(row.payload));
    return decodeView(entries, (index, reason) => {
      this.logger?.warn(`Skipping unreadable row ${index}`, { reason });
    });
  }
}
