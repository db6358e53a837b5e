/**
 * Advisory, monotonically increasing data-flow counters.
 * Reported in status and logs; no delivery decision reads them.
 */

import type { RelayStatsSnapshot } from "../types/index.ts";

export class RelayStats {
  private counters: RelayStatsSnapshot = {
    readingsReceived: 0,
    readingsSent: 0,
    readingsQueued: 0,
    alarmsForwarded: 0,
    decodeErrors: 0,
    queueWriteFailures: 0,
    connectionErrors: 0,
    commandsForwarded: 0,
    lastSyncAt: null,
  };

  recordReceived(): void {
    this.counters.readingsReceived++;
  }

  /** Successful cloud publish(es); also moves lastSyncAt */
  recordSent(count = 1, at: Date = new Date()): void {
    if (count <= 0) return;
    this.counters.readingsSent += count;
    this.counters.lastSyncAt = at;
  }

  recordQueued(): void {
    this.counters.readingsQueued++;
  }

  recordAlarmForwarded(): void {
    this.counters.alarmsForwarded++;
  }

  recordDecodeError(): void {
    this.counters.decodeErrors++;
  }

  recordQueueWriteFailure(): void {
    this.counters.queueWriteFailures++;
  }

  recordConnectionError(): void {
    this.counters.connectionErrors++;
  }

  recordCommandForwarded(): void {
    this.counters.commandsForwarded++;
  }

  /** Sent as a percentage of received, or null before anything arrived */
  successRate(): number | null {
    if (this.counters.readingsReceived === 0) {
      return null;
    }
    return (this.counters.readingsSent / this.counters.readingsReceived) * 100;
  }

  snapshot(): RelayStatsSnapshot {
    return { ...this.counters };
  }
}
