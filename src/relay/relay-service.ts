/**
 * Edge Telemetry Relay - Relay Service
 *
 * Owns and wires the relay components:
 *
 *   Local broker ──► LocalLink ──► DispatchPolicy ──► CloudLink ──► Cloud broker
 *                                        │                ▲
 *                                        ▼                │
 *                                   DurableQueue ──► DrainWorker
 *
 *   Cloud commands ──► CloudLink ──► LocalLink ──► local commands topic
 *
 * Everything is built from an explicit RelayConfig. Transports can be
 * injected so the whole pipeline runs without a broker.
 */

import { CloudLink } from "../links/cloud-link.ts";
import { LocalLink } from "../links/local-link.ts";
import { MqttTransport } from "../links/mqtt-transport.ts";
import { DurableQueue } from "../queue/durable-queue.ts";
import { DispatchPolicy } from "../dispatch/dispatch-policy.ts";
import { DrainWorker } from "../workers/drain-worker.ts";
import { BatchTimer } from "../workers/batch-timer.ts";
import { StatsReporter } from "../workers/stats-reporter.ts";
import { RelayStats } from "./relay-stats.ts";
import { createLogger, type Logger } from "../utils/logger.ts";
import type { RelayConfig } from "../config.ts";
import type { Transport } from "../links/transport.ts";
import type { RelayStatus } from "../types/index.ts";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface RelayServiceDeps {
  /** Transport for the local broker (default: mqtt.js client) */
  localTransport?: Transport;
  /** Transport for the Cloud broker (default: mqtt.js client) */
  cloudTransport?: Transport;
  /** Clock for `received_at` stamps */
  now?: () => Date;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RELAY SERVICE CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class RelayService {
  readonly config: RelayConfig;
  readonly stats = new RelayStats();
  readonly queue: DurableQueue;
  readonly cloudLink: CloudLink;
  readonly localLink: LocalLink;
  readonly policy: DispatchPolicy;
  readonly drainWorker: DrainWorker;
  readonly batchTimer: BatchTimer;
  readonly statsReporter: StatsReporter;

  private log: Logger;
  private running = false;
  private stopped = false;
  private unsubscribers: Array<() => void> = [];

  constructor(config: RelayConfig, deps: RelayServiceDeps = {}) {
    this.config = config;
    const logLevel = config.logging.level;
    this.log = createLogger("[Relay]", logLevel);

    this.queue = new DurableQueue({ path: config.database.path, logLevel });

    this.cloudLink = new CloudLink({
      url: config.cloud.url,
      commandTopic: config.cloud.commandTopic,
      publishTimeoutMs: config.cloud.publishTimeoutMs,
      transport: deps.cloudTransport ?? new MqttTransport({
        url: config.cloud.url,
        clientId: config.cloud.clientId,
        ...config.mqtt,
      }),
      logLevel,
    });

    this.localLink = new LocalLink({
      url: config.local.url,
      topics: {
        data: config.local.dataTopic,
        alarms: config.local.alarmsTopic,
        commands: config.local.commandsTopic,
      },
      edge: config.edge,
      transport: deps.localTransport ?? new MqttTransport({
        url: config.local.url,
        clientId: config.local.clientId,
        ...config.mqtt,
      }),
      stats: this.stats,
      logLevel,
      now: deps.now,
    });

    this.policy = new DispatchPolicy({
      mode: config.dispatch.mode,
      batchSize: config.dispatch.batchSize,
      batchTimeoutMs: config.dispatch.batchTimeoutMs,
      topics: {
        data: config.cloud.dataTopic,
        alarms: config.cloud.alarmsTopic,
      },
      edge: config.edge,
      cloud: this.cloudLink,
      queue: this.queue,
      stats: this.stats,
      logLevel,
    });

    this.drainWorker = new DrainWorker({
      cloud: this.cloudLink,
      queue: this.queue,
      stats: this.stats,
      intervalMs: config.drain.intervalMs,
      batchLimit: config.drain.batchLimit,
      logLevel,
    });

    this.batchTimer = new BatchTimer({
      policy: this.policy,
      pollIntervalMs: config.dispatch.pollIntervalMs,
      logLevel,
    });

    this.statsReporter = new StatsReporter({
      stats: this.stats,
      queueSize: () => this.queue.countPending(),
      cloudConnected: () => this.cloudLink.isConnected(),
      intervalMs: config.stats.intervalMs,
      logLevel,
    });

    this.wire();
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // WIRING
  // ═══════════════════════════════════════════════════════════════════════════

  private wire(): void {
    this.localLink.setHandlers({
      onReading: (record) => this.policy.accept(record),
      onAlarm: (record) => this.policy.acceptAlarm(record),
    });

    this.cloudLink.setCommandHandler((payload) => {
      this.localLink.publishCommand(payload);
    });

    this.unsubscribers.push(
      this.cloudLink.on("error", () => this.stats.recordConnectionError()),
      this.localLink.on("error", () => this.stats.recordConnectionError()),

      // Drain right away on reconnect
      this.cloudLink.on("connected", () => {
        if (!this.running) return;
        this.drainWorker.runCycle().catch((err: unknown) => {
          this.log.error("Error draining after reconnect:", err);
        });
      }),

      this.cloudLink.on("state_change", ({ previousState, currentState }) => {
        this.log.debug(`Cloud link ${previousState} → ${currentState}`);
      }),
    );
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Start links and workers. Unreachable brokers are not fatal: the
   * transports keep retrying and records queue up meanwhile.
   */
  start(): void {
    if (this.running) {
      this.log.warn("Already running");
      return;
    }
    if (this.stopped) {
      this.log.warn("Cannot restart a stopped relay, create a new one");
      return;
    }
    this.running = true;

    this.log.info(`Starting relay for edge ${this.config.edge.id} (${this.config.dispatch.mode} mode)`);

    this.localLink.start();
    this.cloudLink.start();
    this.drainWorker.start();
    this.statsReporter.start();

    if (this.config.dispatch.mode === "batched") {
      this.batchTimer.start();
      this.log.info(
        `Batching up to ${this.policy.batchSize} readings, timeout ${this.config.dispatch.batchTimeoutMs / 1000}s`
      );
    }
  }

  /**
   * Stop workers and links and close the queue. Safe to call more than once.
   */
  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.running = false;

    this.log.info("Stopping...");

    this.batchTimer.stop();
    this.drainWorker.stop();
    this.statsReporter.stop();
    this.policy.discardBuffer();

    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];

    try {
      await this.localLink.stop();
    } catch (err) {
      this.log.error("Error disconnecting from local broker:", err);
    }
    try {
      await this.cloudLink.stop();
    } catch (err) {
      this.log.error("Error disconnecting from cloud broker:", err);
    }

    this.queue.close();
    this.log.info("Stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // STATUS
  // ═══════════════════════════════════════════════════════════════════════════

  getStatus(): RelayStatus {
    return {
      running: this.running,
      localConnection: this.localLink.getStatus(),
      cloudConnection: this.cloudLink.getStatus(),
      batchBufferSize: this.policy.getBufferSize(),
      offlineQueueSize: this.offlineQueueSize(),
      stats: this.stats.snapshot(),
      config: {
        edgeId: this.config.edge.id,
        localBroker: this.config.local.url,
        cloudBroker: this.config.cloud.url,
        mode: this.config.dispatch.mode,
        batchSize: this.policy.batchSize,
        batchTimeoutMs: this.config.dispatch.batchTimeoutMs,
      },
    };
  }

  /** Pending entries, or -1 once the queue is closed or unreadable */
  private offlineQueueSize(): number {
    if (this.stopped) {
      return -1;
    }
    try {
      return this.queue.countPending();
    } catch (err) {
      this.log.error("Could not read offline queue size:", err);
      return -1;
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SINGLETON INSTANCE
// ═══════════════════════════════════════════════════════════════════════════════

let relayService: RelayService | null = null;

/**
 * Initialize the relay service
 */
export function initRelayService(relayConfig: RelayConfig, deps: RelayServiceDeps = {}): RelayService {
  if (!relayService) {
    relayService = new RelayService(relayConfig, deps);
    console.log("[Relay] Initialized");
  }
  return relayService;
}

/**
 * Get the relay service instance, if initialized
 */
export function getRelayService(): RelayService | null {
  return relayService;
}

/**
 * Destroy the relay service (for shutdown)
 */
export async function destroyRelayService(): Promise<void> {
  if (relayService) {
    const service = relayService;
    relayService = null;
    await service.stop();
    console.log("[Relay] Destroyed");
  }
}
