/**
 * Edge Telemetry Relay - Drain Worker
 *
 * While the Cloud link is connected, replays queued records oldest first
 * and deletes exactly those the Cloud acknowledged. A cycle stops at the
 * first failed send so the remaining entries keep their order for the
 * next cycle.
 */

import { createLogger, type Logger, type LogLevel } from "../utils/logger.ts";
import type { CloudLink } from "../links/cloud-link.ts";
import type { DurableQueue } from "../queue/durable-queue.ts";
import type { RelayStats } from "../relay/relay-stats.ts";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type DrainCloud = Pick<CloudLink, "send" | "isConnected">;
export type DrainQueue = Pick<DurableQueue, "peekPending" | "delete">;

export interface DrainWorkerOptions {
  cloud: DrainCloud;
  queue: DrainQueue;
  stats: RelayStats;
  /** Time between cycles (ms) */
  intervalMs: number;
  /** Max entries replayed per cycle */
  batchLimit: number;
  logLevel?: LogLevel;
}

/** Result of one drain cycle */
export interface DrainResult {
  /** Cycle did not run (cloud offline, or a cycle already in progress) */
  skipped: boolean;
  /** Entries a send was attempted for */
  attempted: number;
  /** Entries confirmed and removed from the queue */
  sent: number;
  /** Cycle ended on a failed send before reaching the last entry read */
  stoppedEarly: boolean;
}

const SKIPPED: DrainResult = { skipped: true, attempted: 0, sent: 0, stoppedEarly: false };

// ═══════════════════════════════════════════════════════════════════════════════
// DRAIN WORKER CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class DrainWorker {
  private options: DrainWorkerOptions;
  private log: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;
  private draining = false;

  constructor(options: DrainWorkerOptions) {
    this.options = options;
    this.log = createLogger("[Drain]", options.logLevel);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // CONTROL
  // ═══════════════════════════════════════════════════════════════════════════

  start(): void {
    if (this.running) {
      this.log.warn("Already running");
      return;
    }
    this.running = true;

    this.timer = setInterval(() => {
      if (!this.running) return;
      this.runCycle().catch((err: unknown) => {
        this.log.error("Error in drain cycle:", err);
      });
    }, this.options.intervalMs);

    this.log.info(`Started (every ${this.options.intervalMs / 1000}s, up to ${this.options.batchLimit} entries)`);
  }

  /**
   * Stop scheduling cycles. A cycle already in progress runs to completion.
   */
  stop(): void {
    this.running = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.log.info("Stopped");
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  isDraining(): boolean {
    return this.draining;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // DRAIN CYCLE
  // ═══════════════════════════════════════════════════════════════════════════

  async runCycle(): Promise<DrainResult> {
    const { cloud, queue, stats } = this.options;

    if (this.draining || !cloud.isConnected()) {
      return SKIPPED;
    }

    this.draining = true;
    try {
      const pending = queue.peekPending(this.options.batchLimit);
      if (pending.length === 0) {
        return { skipped: false, attempted: 0, sent: 0, stoppedEarly: false };
      }

      this.log.info(`Processing ${pending.length} queued readings...`);

      const sentIds: number[] = [];
      let attempted = 0;
      for (const entry of pending) {
        attempted++;
        const ok = await cloud.send(entry.targetTopic, entry.payload);
        if (!ok) {
          this.log.warn(`Send of queue entry #${entry.id} failed, retrying next cycle`);
          break;
        }
        sentIds.push(entry.id);
      }

      if (sentIds.length > 0) {
        try {
          queue.delete(sentIds);
          this.log.info(`Cleared ${sentIds.length} readings from offline queue`);
        } catch (err) {
          // Entries stay pending and are sent again: duplicate, never lost
          this.log.error(`Failed to clear ${sentIds.length} delivered entries, they will be resent:`, err);
        }
        stats.recordSent(sentIds.length);
      }

      return {
        skipped: false,
        attempted,
        sent: sentIds.length,
        stoppedEarly: sentIds.length < pending.length,
      };
    } finally {
      this.draining = false;
    }
  }
}
