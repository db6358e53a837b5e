/**
 * Edge Telemetry Relay - Batch Timer
 *
 * Polls the dispatch policy on a fixed interval and flushes the batch once
 * its size or timeout condition holds. Owns nothing but the timer, so a
 * full batch may wait up to one poll interval before it is sent.
 */

import { createLogger, type Logger, type LogLevel } from "../utils/logger.ts";
import type { DispatchPolicy } from "../dispatch/dispatch-policy.ts";

export type FlushablePolicy = Pick<DispatchPolicy, "shouldFlush" | "flush">;

export interface BatchTimerOptions {
  policy: FlushablePolicy;
  /** Poll interval (ms) */
  pollIntervalMs: number;
  logLevel?: LogLevel;
}

export class BatchTimer {
  private policy: FlushablePolicy;
  private pollIntervalMs: number;
  private log: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;
  private flushing = false;

  constructor(options: BatchTimerOptions) {
    this.policy = options.policy;
    this.pollIntervalMs = options.pollIntervalMs;
    this.log = createLogger("[BatchTimer]", options.logLevel);
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;

    this.timer = setInterval(() => {
      if (!this.running) return;
      this.tick().catch((err: unknown) => {
        this.log.error("Error flushing batch:", err);
      });
    }, this.pollIntervalMs);

    this.log.debug(`Polling every ${this.pollIntervalMs}ms`);
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * One poll: flush if due. Returns whether a flush ran.
   */
  async tick(): Promise<boolean> {
    if (this.flushing || !this.policy.shouldFlush()) {
      return false;
    }

    this.flushing = true;
    try {
      await this.policy.flush();
      return true;
    } finally {
      this.flushing = false;
    }
  }
}
