/**
 * Edge Telemetry Relay - Database Setup
 *
 * SQLite database initialization and schema management for the offline queue.
 * Uses node-sqlite3-wasm for synchronous operations: every statement runs to
 * completion on the event loop, so no two queue operations interleave.
 */

import sqlite3 from "node-sqlite3-wasm";
import { mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";
import { createLogger, type LogLevel } from "../utils/logger.ts";

const { Database } = sqlite3;

export type SqliteDatabase = InstanceType<typeof Database>;

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

const SCHEMA = `
-- ═══════════════════════════════════════════════════════════════════════════════
-- OUTBOUND QUEUE TABLE
-- Records that could not be delivered to the Cloud broker.
-- Rows are never updated, only deleted after a confirmed send.
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS outbound_queue (
    id INTEGER PRIMARY KEY AUTOINCREMENT, -- Monotonic, drives FIFO order
    target_topic TEXT NOT NULL,           -- Cloud topic to publish to
    payload TEXT NOT NULL,                -- JSON-encoded record
    enqueued_at TEXT NOT NULL,            -- ISO timestamp
    status TEXT DEFAULT 'pending'         -- pending (in_flight is never persisted)
);

CREATE INDEX IF NOT EXISTS idx_outbound_queue_pending ON outbound_queue(status, id)
    WHERE status = 'pending';
`;

/** Schema version reported at startup */
export const SCHEMA_VERSION = "1.0";

/**
 * Open (creating if needed) the queue database at `dbPath`.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(dbPath: string, logLevel: LogLevel = "info"): SqliteDatabase {
  const log = createLogger("[DB]", logLevel);
  const inMemory = dbPath === ":memory:";

  // Ensure data directory exists
  if (!inMemory) {
    const dbDir = dirname(dbPath);
    if (!existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
      log.info(`Created data directory: ${dbDir}`);
    }
  }

  const database = new Database(dbPath);

  // Rollback journal: the wasm file layer has no shared memory for WAL.
  // FULL sync makes each enqueue durable on return.
  database.exec("PRAGMA journal_mode = DELETE");
  database.exec("PRAGMA synchronous = FULL");

  database.exec(SCHEMA);

  log.info(`Database initialized at: ${dbPath}`);
  log.debug(`Schema version: ${SCHEMA_VERSION}`);

  return database;
}

/**
 * Run `fn` inside BEGIN/COMMIT, rolling back if it throws
 */
export function withTransaction<T>(database: SqliteDatabase, fn: () => T): T {
  database.exec("BEGIN");
  try {
    const result = fn();
    database.exec("COMMIT");
    return result;
  } catch (err) {
    if (database.inTransaction) {
      database.exec("ROLLBACK");
    }
    throw err;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// UTILITY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Convert Date to ISO string for SQLite storage
 */
export function toSqliteDate(date: Date): string;
export function toSqliteDate(date: Date | null): string | null;
export function toSqliteDate(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

/**
 * Convert SQLite ISO string to Date
 */
export function fromSqliteDate(str: string): Date;
export function fromSqliteDate(str: string | null): Date | null;
export function fromSqliteDate(str: string | null): Date | null {
  return str ? new Date(str) : null;
}
