/**
 * Edge Telemetry Relay - Broker Connection
 *
 * Connection state machine for one broker link:
 *
 *   disconnected → connecting → connected → disconnected
 *
 * Only the transport callbacks below ever write `state`; everything else
 * reads it through isConnected()/getStatus() or subscribes to events.
 * "connecting" counts as not connected for every send decision.
 */

import { createLogger, type Logger, type LogLevel } from "../utils/logger.ts";
import type { QoS, Transport } from "./transport.ts";
import type {
  LinkEvent,
  LinkMessage,
  LinkName,
  LinkState,
  LinkStateChange,
} from "../types/index.ts";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Internal connection state tracking */
export interface ConnectionStateInfo {
  status: LinkState;
  lastConnected: Date | null;
  lastDisconnected: Date | null;
  lastError: string | null;
  /** Completed handshakes since start (reconnects included) */
  connectCount: number;
}

/** Payload type carried by each event */
export interface LinkEventMap {
  connected: { timestamp: Date; connectCount: number };
  disconnected: { reason: string; timestamp: Date };
  state_change: LinkStateChange;
  message: LinkMessage;
  error: { error: string; timestamp: Date };
}

type EventCallback<E extends LinkEvent> = (data: LinkEventMap[E]) => void;

export interface BrokerConnectionOptions {
  name: LinkName;
  /** Broker URL (for logs and status only) */
  url: string;
  transport: Transport;
  logLevel?: LogLevel;
}

// ═══════════════════════════════════════════════════════════════════════════════
// BROKER CONNECTION CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class BrokerConnection {
  readonly name: LinkName;
  readonly url: string;
  private transport: Transport;
  private log: Logger;
  private started = false;

  private state: ConnectionStateInfo = {
    status: "disconnected",
    lastConnected: null,
    lastDisconnected: null,
    lastError: null,
    connectCount: 0,
  };

  private eventListeners: { [E in LinkEvent]: Set<EventCallback<E>> } = {
    connected: new Set(),
    disconnected: new Set(),
    state_change: new Set(),
    message: new Set(),
    error: new Set(),
  };

  constructor(options: BrokerConnectionOptions) {
    this.name = options.name;
    this.url = options.url;
    this.transport = options.transport;
    this.log = createLogger(`[${options.name === "cloud" ? "CloudLink" : "LocalLink"}]`, options.logLevel);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // CONNECTION MANAGEMENT
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Begin connecting. Failures are reported through events and retried by the transport.
   */
  connect(): void {
    if (this.started) {
      this.log.debug("Already connected or connecting");
      return;
    }
    this.started = true;

    this.updateState("connecting");
    this.log.info(`Connecting to ${this.url}...`);

    try {
      this.transport.connect({
        onConnect: () => this.handleConnect(),
        onDisconnect: (reason) => this.handleDisconnect(reason),
        onMessage: (topic, payload) => this.emit("message", { topic, payload }),
        onError: (error) => this.handleError(error),
      });
    } catch (err) {
      // Nothing will retry a transport that failed to start
      this.started = false;
      this.updateState("disconnected");
      this.handleError(err instanceof Error ? err : new Error(String(err)));
    }
  }

  /**
   * Close the connection and stop automatic reconnection
   */
  async disconnect(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;

    try {
      await this.transport.end();
    } catch (err) {
      this.log.error("Error while closing connection:", err);
    }

    this.handleDisconnect("manual");
  }

  isConnected(): boolean {
    return this.state.status === "connected";
  }

  getStatus(): LinkState {
    return this.state.status;
  }

  getState(): ConnectionStateInfo {
    return { ...this.state };
  }

  subscribe(topic: string, qos: QoS): Promise<void> {
    return this.transport.subscribe(topic, qos);
  }

  publish(topic: string, payload: string | Buffer, qos: QoS): Promise<void> {
    return this.transport.publish(topic, payload, qos);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // TRANSPORT EVENT HANDLERS
  // ─────────────────────────────────────────────────────────────────────────────

  private handleConnect(): void {
    if (!this.started) {
      return;
    }

    this.state.lastConnected = new Date();
    this.state.lastError = null;
    this.state.connectCount++;
    this.updateState("connected");

    this.log.info(`✓ Connected to ${this.url}`);
    this.emit("connected", { timestamp: new Date(), connectCount: this.state.connectCount });
  }

  private handleDisconnect(reason: string): void {
    // mqtt.js reports one drop as offline + close; only the first changes anything
    const wasConnected = this.state.status === "connected";
    const nextStatus: LinkState = this.started ? "connecting" : "disconnected";

    if (wasConnected) {
      this.state.lastDisconnected = new Date();
    }
    this.updateState(nextStatus);

    if (wasConnected) {
      this.log.warn(`Disconnected from ${this.url} (${reason})`);
      this.emit("disconnected", { reason, timestamp: new Date() });
    }
  }

  private handleError(error: Error): void {
    this.state.lastError = error.message;
    this.log.error(`Connection error: ${error.message}`);
    this.emit("error", { error: error.message, timestamp: new Date() });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // EVENT SYSTEM
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Subscribe to connection events. Returns an unsubscribe function.
   */
  on<E extends LinkEvent>(event: E, callback: EventCallback<E>): () => void {
    const listeners: Set<EventCallback<E>> = this.eventListeners[event];
    listeners.add(callback);
    return () => {
      listeners.delete(callback);
    };
  }

  private emit<E extends LinkEvent>(event: E, data: LinkEventMap[E]): void {
    const listeners: Set<EventCallback<E>> = this.eventListeners[event];
    for (const callback of listeners) {
      try {
        callback(data);
      } catch (err) {
        this.log.error(`Event listener error for ${event}:`, err);
      }
    }
  }

  private updateState(status: LinkState): void {
    const previousState = this.state.status;
    this.state.status = status;

    if (previousState !== status) {
      this.emit("state_change", {
        link: this.name,
        previousState,
        currentState: status,
        timestamp: new Date(),
      });
    }
  }

  /**
   * Clean up resources
   */
  async destroy(): Promise<void> {
    await this.disconnect();
    for (const listeners of Object.values(this.eventListeners)) {
      listeners.clear();
    }
  }
}
