/**
 * Periodic data-flow report, so an operator tailing the log can see that
 * readings are moving.
 */

import { createLogger, type Logger, type LogLevel } from "../utils/logger.ts";
import type { RelayStats } from "../relay/relay-stats.ts";

export interface StatsReporterOptions {
  stats: RelayStats;
  queueSize: () => number;
  cloudConnected: () => boolean;
  intervalMs: number;
  logLevel?: LogLevel;
}

export class StatsReporter {
  private options: StatsReporterOptions;
  private log: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: StatsReporterOptions) {
    this.options = options;
    this.log = createLogger("[Stats]", options.logLevel);
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.report(), this.options.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Log the counters. Silent until something was received or sent.
   * Returns the lines written.
   */
  report(): string[] {
    const stats = this.options.stats.snapshot();
    if (stats.readingsReceived === 0 && stats.readingsSent === 0) {
      return [];
    }

    let queueSize: string;
    try {
      queueSize = String(this.options.queueSize());
    } catch (err) {
      this.log.error("Could not read queue size:", err);
      queueSize = "unavailable";
    }

    const lines = [
      "=== Data Flow Stats ===",
      `  Received from sensors: ${stats.readingsReceived}`,
      `  Sent to cloud: ${stats.readingsSent}`,
      `  Queued (offline): ${stats.readingsQueued}`,
      `  Queue size: ${queueSize}`,
      `  Cloud connected: ${this.options.cloudConnected()}`,
    ];

    const rate = this.options.stats.successRate();
    if (rate !== null) {
      lines.push(`  Success rate: ${rate.toFixed(1)}%`);
    }

    for (const line of lines) {
      this.log.info(line);
    }
    return lines;
  }
}
