/**
 * Edge Telemetry Relay - Dispatch Policy
 *
 * Decides, per accepted record, whether it goes to the Cloud right away or
 * into the in-memory batch.
 *
 * - realtime: every reading is sent immediately
 * - batched:  readings accumulate until the batch is full or the batch
 *             timeout has passed since the last flush (checked by BatchTimer)
 * - alarms:   always sent immediately, whatever the mode
 *
 * A failed send goes into the durable queue; the queue is never written
 * for a send that succeeded.
 */

import { StorageError } from "../queue/durable-queue.ts";
import { createLogger, type Logger, type LogLevel } from "../utils/logger.ts";
import type { CloudLink } from "../links/cloud-link.ts";
import type { DurableQueue } from "../queue/durable-queue.ts";
import type { RelayStats } from "../relay/relay-stats.ts";
import type {
  BatchRecord,
  DispatchMode,
  StampedRecord,
  TelemetryRecord,
} from "../types/index.ts";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type CloudSender = Pick<CloudLink, "send">;
export type OfflineQueue = Pick<DurableQueue, "enqueue" | "countPending">;

export interface DispatchPolicyOptions {
  mode: DispatchMode;
  batchSize: number;
  batchTimeoutMs: number;
  topics: {
    data: string;
    alarms: string;
  };
  edge: {
    id: string;
    name: string;
    location: string;
  };
  cloud: CloudSender;
  queue: OfflineQueue;
  stats: RelayStats;
  logLevel?: LogLevel;
  /** Clock in ms (tests) */
  now?: () => number;
}

/** Outcome of one immediate dispatch */
export type DispatchOutcome = "sent" | "queued" | "lost";

// ═══════════════════════════════════════════════════════════════════════════════
// DISPATCH POLICY CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class DispatchPolicy {
  readonly mode: DispatchMode;
  readonly batchSize: number;
  readonly batchTimeoutMs: number;

  private buffer: StampedRecord[] = [];
  private lastFlushAt: number;
  private options: DispatchPolicyOptions;
  private log: Logger;
  private now: () => number;

  constructor(options: DispatchPolicyOptions) {
    this.options = options;
    this.mode = options.mode;
    this.batchSize = Math.max(1, Math.floor(options.batchSize));
    this.batchTimeoutMs = options.batchTimeoutMs;
    this.now = options.now ?? Date.now;
    this.lastFlushAt = this.now();
    this.log = createLogger("[Dispatch]", options.logLevel);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // ACCEPTING RECORDS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Accept a sensor reading
   */
  async accept(record: StampedRecord): Promise<void> {
    if (this.mode === "batched") {
      this.buffer.push(record);
      this.log.debug(`Buffered reading from ${describeSource(record)} (${this.buffer.length}/${this.batchSize})`);
      return;
    }

    const outcome = await this.dispatchNow(this.options.topics.data, record);
    if (outcome === "sent") {
      this.log.info(`Sent sensor data to cloud from ${describeSource(record)}`);
    } else if (outcome === "queued") {
      this.log.warn(`Queued (cloud offline): ${describeSource(record)} - Queue size: ${this.queueSize()}`);
    }
  }

  /**
   * Accept an alarm. Bypasses the batch in every mode.
   */
  async acceptAlarm(record: StampedRecord): Promise<DispatchOutcome> {
    const outcome = await this.dispatchNow(this.options.topics.alarms, record);
    const violations = JSON.stringify(record.violations ?? "unknown");

    if (outcome === "sent") {
      this.options.stats.recordAlarmForwarded();
      this.log.warn(`ALARM sent to cloud: ${violations}`);
    } else if (outcome === "queued") {
      this.log.error(`ALARM queued (cloud offline): ${violations}`);
    }
    return outcome;
  }

  /**
   * Send now; on failure persist into the offline queue.
   * A queue write failure is logged as data loss and absorbed here.
   */
  async dispatchNow(topic: string, payload: TelemetryRecord, readings = 1): Promise<DispatchOutcome> {
    const sent = await this.options.cloud.send(topic, payload);
    if (sent) {
      this.options.stats.recordSent(readings);
      return "sent";
    }

    try {
      const id = this.options.queue.enqueue(topic, payload);
      this.options.stats.recordQueued();
      this.log.debug(`Stored undelivered record as queue entry #${id}`);
      return "queued";
    } catch (err) {
      this.options.stats.recordQueueWriteFailure();
      const reason = err instanceof StorageError ? err.message : String(err);
      this.log.error(`DATA LOSS: could not queue record for ${topic}: ${reason}`);
      return "lost";
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // BATCHING
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Whether the buffer is full, or non-empty and past the batch timeout
   */
  shouldFlush(now: number = this.now()): boolean {
    if (this.buffer.length >= this.batchSize) {
      return true;
    }
    return this.buffer.length > 0 && now - this.lastFlushAt >= this.batchTimeoutMs;
  }

  /**
   * Take the whole buffer as one Batch Record and dispatch it.
   * The buffer is cleared before the send starts; readings accepted
   * meanwhile belong to the next batch.
   */
  async flush(): Promise<DispatchOutcome | null> {
    if (this.buffer.length === 0) {
      return null;
    }

    const readings = this.buffer;
    this.buffer = [];
    this.lastFlushAt = this.now();

    const batch: BatchRecord = {
      edge_id: this.options.edge.id,
      edge_name: this.options.edge.name,
      edge_location: this.options.edge.location,
      batch_size: readings.length,
      batch_time: new Date(this.lastFlushAt).toISOString(),
      readings,
    };

    const outcome = await this.dispatchNow(this.options.topics.data, batch, readings.length);
    if (outcome === "sent") {
      this.log.info(`Sent batch of ${readings.length} readings to cloud`);
    } else if (outcome === "queued") {
      this.log.warn(`Failed to send batch - queued ${readings.length} readings`);
    }
    return outcome;
  }

  /**
   * Drop the unflushed batch (shutdown). Returns how many readings were dropped.
   */
  discardBuffer(): number {
    const dropped = this.buffer.length;
    this.buffer = [];
    if (dropped > 0) {
      this.log.warn(`Dropping ${dropped} unflushed readings on shutdown`);
    }
    return dropped;
  }

  getBufferSize(): number {
    return this.buffer.length;
  }

  private queueSize(): number {
    try {
      return this.options.queue.countPending();
    } catch (err) {
      this.log.debug("Queue size unavailable:", err);
      return -1;
    }
  }
}

function describeSource(record: TelemetryRecord): string {
  const nodeId = record.node_id;
  return typeof nodeId === "string" || typeof nodeId === "number" ? String(nodeId) : "unknown";
}
