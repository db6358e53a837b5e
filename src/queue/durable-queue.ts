/**
 * Edge Telemetry Relay - Durable Queue
 *
 * Append-only SQLite store of records that could not be delivered to the
 * Cloud broker. Survives restarts. Entries are never updated: they are
 * read back in enqueue order and deleted once the Cloud acknowledged them.
 */

import { openDatabase, withTransaction, toSqliteDate, fromSqliteDate, type SqliteDatabase } from "../storage/database.ts";
import { decodeRecord } from "../utils/records.ts";
import { createLogger, type Logger, type LogLevel } from "../utils/logger.ts";
import type { QueueEntry, QueueEntryStatus, TelemetryRecord } from "../types/index.ts";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Queue operation that failed */
export type StorageOperation = "enqueue" | "peek" | "delete" | "count";

/** Error thrown when the underlying store cannot complete an operation */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly operation: StorageOperation,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "StorageError";
  }
}

export interface DurableQueueOptions {
  /** Database file path (":memory:" for tests) */
  path: string;
  logLevel?: LogLevel;
  /** Use an already opened database instead of opening `path` */
  database?: SqliteDatabase;
}

type QueueRow = {
  id: number;
  target_topic: string;
  payload: string;
  enqueued_at: string;
  status: QueueEntryStatus;
};

// ═══════════════════════════════════════════════════════════════════════════════
// DURABLE QUEUE CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class DurableQueue {
  private db: SqliteDatabase;
  private log: Logger;
  private closed = false;

  constructor(options: DurableQueueOptions) {
    this.log = createLogger("[Queue]", options.logLevel);
    this.db = options.database ?? openDatabase(options.path, options.logLevel);

    const pending = this.countPending();
    if (pending > 0) {
      this.log.info(`Recovered ${pending} pending entries from previous run`);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // MUTATIONS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Persist a new pending entry and return its id.
   * The row is on disk when this returns.
   */
  enqueue(targetTopic: string, payload: TelemetryRecord): number {
    try {
      const result = this.db.run(`
        INSERT INTO outbound_queue (target_topic, payload, enqueued_at, status)
        VALUES (?, ?, ?, 'pending')
      `, [targetTopic, JSON.stringify(payload), toSqliteDate(new Date())]);

      const id = Number(result.lastInsertRowid);
      this.log.debug(`Enqueued #${id} for ${targetTopic}`);
      return id;
    } catch (err) {
      throw new StorageError(`Failed to enqueue record for ${targetTopic}: ${errorMessage(err)}`, "enqueue", err);
    }
  }

  /**
   * Remove the given entries in one transaction.
   * Unknown ids are ignored; either every listed id is removed or none is.
   * Returns the number of rows removed.
   */
  delete(ids: readonly number[]): number {
    if (ids.length === 0) {
      return 0;
    }

    try {
      const removed = withTransaction(this.db, () => {
        let count = 0;
        for (const id of ids) {
          count += this.db.run(`DELETE FROM outbound_queue WHERE id = ?`, [id]).changes;
        }
        return count;
      });
      this.log.debug(`Deleted ${removed} of ${ids.length} entries`);
      return removed;
    } catch (err) {
      throw new StorageError(`Failed to delete ${ids.length} entries: ${errorMessage(err)}`, "delete", err);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // QUERIES
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Up to `limit` readable pending entries, oldest first. Does not change state.
   * Unreadable rows are skipped and do not count toward `limit`.
   */
  peekPending(limit: number): QueueEntry[] {
    const wanted = Math.floor(limit);
    const entries: QueueEntry[] = [];
    let afterId = 0;

    while (entries.length < wanted) {
      const pageSize = wanted - entries.length;
      const rows = this.readPendingAfter(afterId, pageSize);

      for (const row of rows) {
        const entry = this.rowToEntry(row);
        if (entry) {
          entries.push(entry);
        }
      }

      const last = rows[rows.length - 1];
      if (!last || rows.length < pageSize) {
        break;
      }
      afterId = last.id;
    }

    return entries;
  }

  /**
   * Advisory number of pending entries (reporting only)
   */
  countPending(): number {
    try {
      const row = this.db.get(
        `SELECT COUNT(*) AS count FROM outbound_queue WHERE status = 'pending'`
      );
      return row ? Number(row.count) : 0;
    } catch (err) {
      throw new StorageError(`Failed to count pending entries: ${errorMessage(err)}`, "count", err);
    }
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.db.close();
    this.log.info("Queue database closed");
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // HELPERS
  // ═══════════════════════════════════════════════════════════════════════════

  private readPendingAfter(afterId: number, limit: number): QueueRow[] {
    try {
      return this.db.all(`
        SELECT id, target_topic, payload, enqueued_at, status
        FROM outbound_queue
        WHERE status = 'pending' AND id > ?
        ORDER BY id ASC
        LIMIT ?
      `, [afterId, limit]) as QueueRow[];
    } catch (err) {
      throw new StorageError(`Failed to read pending entries: ${errorMessage(err)}`, "peek", err);
    }
  }

  private rowToEntry(row: QueueRow): QueueEntry | null {
    try {
      return {
        id: row.id,
        targetTopic: row.target_topic,
        payload: decodeRecord(row.payload),
        enqueuedAt: fromSqliteDate(row.enqueued_at),
        status: row.status,
      };
    } catch (err) {
      // Left in place for inspection; it can never be delivered as-is
      this.log.error(`Entry #${row.id} has an unreadable payload, skipping: ${errorMessage(err)}`);
      return null;
    }
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
