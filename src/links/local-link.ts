/**
 * Edge Telemetry Relay - Local Link
 *
 * Connects to the local broker, receives sensor readings and alarms,
 * stamps them with edge metadata and hands them on:
 * - data topic   → reading handler (Dispatch Policy)
 * - alarms topic → alarm handler (always realtime)
 *
 * Malformed payloads are logged and dropped. There is no local offline
 * queue: whatever arrives while this link is down is lost upstream.
 */

import { BrokerConnection, type LinkEventMap } from "./broker-connection.ts";
import { decodeRecord } from "../utils/records.ts";
import { createLogger, type Logger, type LogLevel } from "../utils/logger.ts";
import type { Transport } from "./transport.ts";
import type { RelayStats } from "../relay/relay-stats.ts";
import type {
  LinkEvent,
  LinkState,
  StampedRecord,
  TelemetryRecord,
} from "../types/index.ts";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Edge identity stamped on every record */
export interface EdgeIdentity {
  id: string;
  name: string;
  location: string;
}

export interface LocalTopics {
  data: string;
  alarms: string;
  commands: string;
}

/** Where decoded records go */
export interface RecordHandlers {
  onReading: (record: StampedRecord) => Promise<unknown>;
  onAlarm: (record: StampedRecord) => Promise<unknown>;
}

export interface LocalLinkOptions {
  url: string;
  topics: LocalTopics;
  edge: EdgeIdentity;
  transport: Transport;
  stats: RelayStats;
  logLevel?: LogLevel;
  /** Clock for `received_at` (tests) */
  now?: () => Date;
}

// ═══════════════════════════════════════════════════════════════════════════════
// LOCAL LINK CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class LocalLink {
  private connection: BrokerConnection;
  private topics: LocalTopics;
  private edge: EdgeIdentity;
  private stats: RelayStats;
  private handlers: RecordHandlers | null = null;
  private log: Logger;
  private now: () => Date;

  constructor(options: LocalLinkOptions) {
    this.topics = options.topics;
    this.edge = options.edge;
    this.stats = options.stats;
    this.now = options.now ?? (() => new Date());
    this.log = createLogger("[LocalLink]", options.logLevel);
    this.connection = new BrokerConnection({
      name: "local",
      url: options.url,
      transport: options.transport,
      logLevel: options.logLevel,
    });

    this.connection.on("connected", () => {
      this.subscribe(this.topics.data, "sensor data");
      this.subscribe(this.topics.alarms, "alarms");
    });

    this.connection.on("message", ({ topic, payload }) => {
      this.handleMessage(topic, payload);
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // CONTROL
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Set the record handlers. Messages received before this are dropped.
   */
  setHandlers(handlers: RecordHandlers): void {
    this.handlers = handlers;
  }

  start(): void {
    this.connection.connect();
  }

  async stop(): Promise<void> {
    // Stop accepting work before the connection goes away
    this.handlers = null;
    await this.connection.disconnect();
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // INBOUND
  // ═══════════════════════════════════════════════════════════════════════════

  private handleMessage(topic: string, payload: Buffer): void {
    const isAlarm = topic === this.topics.alarms;
    if (!isAlarm && topic !== this.topics.data) {
      this.log.debug(`Ignoring message on unexpected topic ${topic}`);
      return;
    }

    const handlers = this.handlers;
    if (!handlers) {
      this.log.warn(`No handlers registered, dropping message on ${topic}`);
      return;
    }

    let decoded: TelemetryRecord;
    try {
      decoded = decodeRecord(payload);
    } catch (err) {
      this.stats.recordDecodeError();
      this.log.error(`Invalid JSON from local broker on ${topic}: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }

    this.stats.recordReceived();
    const record = this.stamp(decoded);

    if (isAlarm) {
      handlers.onAlarm(record).catch((err: unknown) => {
        this.log.error("Error forwarding alarm:", err);
      });
    } else {
      handlers.onReading(record).catch((err: unknown) => {
        this.log.error("Error handling local message:", err);
      });
    }
  }

  /**
   * Attach edge metadata; original sensor fields are kept as they are
   */
  stamp(record: TelemetryRecord): StampedRecord {
    return {
      ...record,
      edge_id: this.edge.id,
      edge_name: this.edge.name,
      edge_location: this.edge.location,
      received_at: this.now().toISOString(),
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // OUTBOUND (Cloud commands)
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Republish a Cloud command on the local commands topic, unmodified.
   * Returns false (and drops it) when the local broker is not connected.
   */
  publishCommand(payload: Buffer): boolean {
    if (!this.connection.isConnected()) {
      this.log.warn(`Local broker not connected, dropping command for ${this.topics.commands}`);
      return false;
    }

    this.connection.publish(this.topics.commands, payload, 0).catch((err: unknown) => {
      this.log.error(`Failed to publish command to ${this.topics.commands}:`, err);
    });
    this.stats.recordCommandForwarded();
    return true;
  }

  private subscribe(topic: string, description: string): void {
    this.connection.subscribe(topic, 0)
      .then(() => {
        this.log.info(`Subscribed to: ${topic} (${description})`);
      })
      .catch((err: unknown) => {
        this.log.error(`Failed to subscribe to ${topic}:`, err);
      });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // STATUS
  // ═══════════════════════════════════════════════════════════════════════════

  isConnected(): boolean {
    return this.connection.isConnected();
  }

  getStatus(): LinkState {
    return this.connection.getStatus();
  }

  get url(): string {
    return this.connection.url;
  }

  on<E extends LinkEvent>(event: E, callback: (data: LinkEventMap[E]) => void): () => void {
    return this.connection.on(event, callback);
  }
}
