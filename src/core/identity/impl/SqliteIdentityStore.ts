/**
 * SQLite identity store (better-sqlite3).
 *
 * Every change is an INSERT into an append-only log; a write that repeats
 * the newest value for its key is dropped. Reads take the newest row per
 * key (highest id). WAL mode plus a busy timeout lets several sync
 * processes share one database file.
 *
 * @module
 */

import Database from "better-sqlite3";
import * as path from "node:path";
import { ErrorCode, IdentityStoreError, toError } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";
import { ensureDir } from "../../../utils/index.js";
import type { IdentityMapping, IdentityRef } from "../interfaces/IIdentityStore.js";
import { BaseIdentityStore, type Clock } from "./BaseIdentityStore.js";

const logger = createLogger("identity-sqlite");

const SCHEMA = `
CREATE TABLE IF NOT EXISTS identity_log (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  project TEXT NOT NULL,
  kind TEXT NOT NULL,
  order_id TEXT NOT NULL,
  instance INTEGER NOT NULL DEFAULT 0,
  remote_key TEXT NOT NULL,
  fingerprint TEXT,
  recorded_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS identity_log_item
  ON identity_log (project, kind, order_id, instance);

CREATE TABLE IF NOT EXISTS checkpoint_log (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  project TEXT NOT NULL,
  order_id TEXT NOT NULL,
  last_ts TEXT NOT NULL,
  recorded_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS checkpoint_log_order ON checkpoint_log (project, order_id);

CREATE TABLE IF NOT EXISTS row_time_log (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  product TEXT NOT NULL,
  order_id TEXT NOT NULL,
  row_ts TEXT NOT NULL,
  recorded_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS row_time_log_order ON row_time_log (product, order_id);
`;

interface IdentityRow {
  project: string;
  kind: string;
  order_id: string;
  instance: number;
  remote_key: string;
  fingerprint: string | null;
  recorded_at: string;
}

interface OrderTimestampRow {
  order_id: string;
  ts: string;
}

export interface SqliteIdentityStoreOptions {
  /** Database file, or ":memory:" */
  path: string;
  busyTimeoutMs?: number;
  now?: Clock;
}

function rowToMapping(row: IdentityRow): IdentityMapping {
  const mapping: IdentityMapping = {
    project: row.project,
    kind: row.kind === "unit" ? "unit" : "container",
    orderId: row.order_id,
    remoteKey: row.remote_key,
    fingerprint: row.fingerprint,
    timestamp: row.recorded_at,
  };
  if (mapping.kind === "unit") mapping.instance = row.instance;
  return mapping;
}

function toOrderMap(rows: readonly OrderTimestampRow[]): Map<string, string> {
  return new Map(rows.map((row) => [row.order_id, row.ts]));
}

export class SqliteIdentityStore extends BaseIdentityStore {
  readonly backend = "sqlite" as const;

  private readonly options: SqliteIdentityStoreOptions;
  private db: Database.Database | null = null;

  constructor(options: SqliteIdentityStoreOptions) {
    super(options.now);
    this.options = options;
  }

  async initialize(): Promise<void> {
    if (this.db) return;
    try {
      if (this.options.path !== ":memory:") ensureDir(path.dirname(path.resolve(this.options.path)));
      const db = new Database(this.options.path);
      db.pragma("journal_mode = WAL");
      db.pragma(`busy_timeout = ${this.options.busyTimeoutMs ?? 5000}`);
      db.exec(SCHEMA);
      this.db = db;
      logger.debug({ path: this.options.path }, "Identity store opened");
    } catch (error) {
      throw new IdentityStoreError(`Cannot open identity store: ${toError(error).message}`, ErrorCode.STORE_UNAVAILABLE, {
        path: this.options.path,
      });
    }
  }

  async close(): Promise<void> {
    if (!this.db) return;
    this.db.close();
    this.db = null;
  }

  protected async latest(ref: IdentityRef): Promise<IdentityMapping | null> {
    return this.read("latest", (db) => {
      const row = db
        .prepare<[string, string, string, number], IdentityRow>(
          `SELECT project, kind, order_id, instance, remote_key, fingerprint, recorded_at
           FROM identity_log
           WHERE project = ? AND kind = ? AND order_id = ? AND instance = ?
           ORDER BY id DESC
           LIMIT 1`
        )
        .get(ref.project, ref.kind, ref.orderId, ref.kind === "unit" ? (ref.instance ?? 0) : 0);
      return row ? rowToMapping(row) : null;
    });
  }

  protected async append(mapping: IdentityMapping): Promise<void> {
    this.write("register", (db) => {
      db.prepare(
        `INSERT INTO identity_log (project, kind, order_id, instance, remote_key, fingerprint, recorded_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      ).run(
        mapping.project,
        mapping.kind,
        mapping.orderId,
        mapping.kind === "unit" ? (mapping.instance ?? 0) : 0,
        mapping.remoteKey,
        mapping.fingerprint,
        mapping.timestamp
      );
    });
  }

  async getMappings(project: string, orderId: string): Promise<IdentityMapping[]> {
    return this.read("getMappings", (db) => {
      const rows = db
        .prepare<[string, string], IdentityRow>(
          `SELECT project, kind, order_id, instance, remote_key, fingerprint, recorded_at
           FROM identity_log
           WHERE project = ? AND order_id = ?
           ORDER BY id DESC`
        )
        .all(project, orderId);
      const seen = new Set<string>();
      const mappings: IdentityMapping[] = [];
      for (const row of rows) {
        const key = `${row.kind}:${row.instance}`;
        if (seen.has(key)) continue;
        seen.add(key);
        mappings.push(rowToMapping(row));
      }
      return mappings.sort((a, b) => (a.kind === b.kind ? (a.instance ?? 0) - (b.instance ?? 0) : a.kind === "container" ? -1 : 1));
    });
  }

  async getAllCheckpoints(project: string): Promise<Map<string, string>> {
    return this.read("getAllCheckpoints", (db) =>
      toOrderMap(
        db
          .prepare<[string], OrderTimestampRow>(
            `SELECT order_id, last_ts AS ts FROM checkpoint_log
             WHERE id IN (SELECT MAX(id) FROM checkpoint_log WHERE project = ? GROUP BY order_id)`
          )
          .all(project)
      )
    );
  }

  async setCheckpoint(project: string, orderId: string, timestamp: string): Promise<void> {
    this.write("setCheckpoint", (db) => {
      const current = db
        .prepare<[string, string], { ts: string }>(
          `SELECT last_ts AS ts FROM checkpoint_log WHERE project = ? AND order_id = ? ORDER BY id DESC LIMIT 1`
        )
        .get(project, orderId);
      if (current?.ts === timestamp) return;
      db.prepare(`INSERT INTO checkpoint_log (project, order_id, last_ts, recorded_at) VALUES (?, ?, ?, ?)`).run(
        project,
        orderId,
        timestamp,
        this.now().toISOString()
      );
    });
  }

  async getAllRowTimestamps(product: string): Promise<Map<string, string>> {
    return this.read("getAllRowTimestamps", (db) =>
      toOrderMap(
        db
          .prepare<[string], OrderTimestampRow>(
            `SELECT order_id, row_ts AS ts FROM row_time_log
             WHERE id IN (SELECT MAX(id) FROM row_time_log WHERE product = ? GROUP BY order_id)`
          )
          .all(product)
      )
    );
  }

  async recordRowTimestamps(product: string, timestamps: ReadonlyMap<string, string>): Promise<void> {
    if (timestamps.size === 0) return;
    const recordedAt = this.now().toISOString();
    this.write("recordRowTimestamps", (db) => {
      const current = db.prepare<[string, string], { ts: string }>(
        `SELECT row_ts AS ts FROM row_time_log WHERE product = ? AND order_id = ? ORDER BY id DESC LIMIT 1`
      );
      const insert = db.prepare(`INSERT INTO row_time_log (product, order_id, row_ts, recorded_at) VALUES (?, ?, ?, ?)`);
      const insertChanged = db.transaction((entries: ReadonlyMap<string, string>) => {
        for (const [orderId, ts] of entries) {
          if (current.get(product, orderId)?.ts !== ts) insert.run(product, orderId, ts, recordedAt);
        }
      });
      insertChanged(timestamps);
    });
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private requireDb(): Database.Database {
    if (!this.db) {
      throw new IdentityStoreError("Identity store not initialized", ErrorCode.STORE_UNAVAILABLE);
    }
    return this.db;
  }

  private read<T>(operation: string, fn: (db: Database.Database) => T): T {
    const db = this.requireDb();
    try {
      return fn(db);
    } catch (error) {
      throw new IdentityStoreError(`Identity store read failed: ${toError(error).message}`, ErrorCode.STORE_READ_FAILED, {
        operation,
      });
    }
  }

  private write(operation: string, fn: (db: Database.Database) => void): void {
    const db = this.requireDb();
    try {
      fn(db);
    } catch (error) {
      throw new IdentityStoreError(`Identity store write failed: ${toError(error).message}`, ErrorCode.STORE_WRITE_FAILED, {
        operation,
      });
    }
  }
}
