/**
 * Edge Telemetry Relay - Cloud Link
 *
 * Maintains the connection to the Cloud broker and publishes records with
 * QoS 1 (at least once). `send` only reports success or failure; deciding
 * whether to queue a failed record belongs to the caller.
 *
 * Commands arriving on the per-edge command topic are handed, byte for
 * byte, to the registered command handler (the Local Link).
 */

import { BrokerConnection, type LinkEventMap } from "./broker-connection.ts";
import { createLogger, type Logger, type LogLevel } from "../utils/logger.ts";
import type { Transport } from "./transport.ts";
import type { LinkEvent, LinkState, TelemetryRecord } from "../types/index.ts";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/** Receives raw command payloads from the Cloud */
export type CommandHandler = (payload: Buffer) => void;

export interface CloudLinkOptions {
  /** Broker URL (for logs and status) */
  url: string;
  /** Per-edge command topic to subscribe to on every connect */
  commandTopic: string;
  /** Max wait for a publish acknowledgement (ms) */
  publishTimeoutMs: number;
  transport: Transport;
  logLevel?: LogLevel;
}

/** Error used when a publish acknowledgement does not arrive in time */
export class PublishTimeoutError extends Error {
  constructor(topic: string, timeoutMs: number) {
    super(`No acknowledgement for ${topic} within ${timeoutMs}ms`);
    this.name = "PublishTimeoutError";
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLOUD LINK CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class CloudLink {
  private connection: BrokerConnection;
  private commandTopic: string;
  private publishTimeoutMs: number;
  private commandHandler: CommandHandler | null = null;
  private log: Logger;

  constructor(options: CloudLinkOptions) {
    this.commandTopic = options.commandTopic;
    this.publishTimeoutMs = options.publishTimeoutMs;
    this.log = createLogger("[CloudLink]", options.logLevel);
    this.connection = new BrokerConnection({
      name: "cloud",
      url: options.url,
      transport: options.transport,
      logLevel: options.logLevel,
    });

    this.connection.on("connected", () => {
      this.subscribeToCommands();
    });

    this.connection.on("message", ({ topic, payload }) => {
      if (topic === this.commandTopic) {
        this.handleCommand(payload);
      }
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // CONTROL
  // ═══════════════════════════════════════════════════════════════════════════

  start(): void {
    this.connection.connect();
  }

  async stop(): Promise<void> {
    await this.connection.disconnect();
  }

  /**
   * Register where Cloud commands are forwarded to
   */
  setCommandHandler(handler: CommandHandler | null): void {
    this.commandHandler = handler;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // SENDING
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Publish a record with QoS 1.
   * Resolves true only once the broker acknowledged it; false when not
   * connected (no I/O attempted), on publish error, or on ack timeout.
   */
  async send(topic: string, payload: TelemetryRecord): Promise<boolean> {
    if (!this.connection.isConnected()) {
      return false;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new PublishTimeoutError(topic, this.publishTimeoutMs)), this.publishTimeoutMs);
    });

    try {
      await Promise.race([
        this.connection.publish(topic, JSON.stringify(payload), 1),
        timeout,
      ]);
      return true;
    } catch (err) {
      this.log.warn(`Publish to ${topic} failed: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    } finally {
      clearTimeout(timer);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // COMMANDS
  // ═══════════════════════════════════════════════════════════════════════════

  private subscribeToCommands(): void {
    this.connection.subscribe(this.commandTopic, 1)
      .then(() => {
        this.log.info(`Subscribed to: ${this.commandTopic} (Cloud commands)`);
      })
      .catch((err: unknown) => {
        this.log.error(`Failed to subscribe to ${this.commandTopic}:`, err);
      });
  }

  private handleCommand(payload: Buffer): void {
    this.log.info(`Received command from Cloud (${payload.length} bytes)`);

    if (!this.commandHandler) {
      this.log.warn("No command handler registered, dropping command");
      return;
    }
    this.commandHandler(payload);
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
