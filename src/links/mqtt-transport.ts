/**
 * Edge Telemetry Relay - MQTT Transport
 *
 * Adapts an mqtt.js client to the Transport contract. Connect timeout,
 * keep-alive and automatic reconnection are all delegated to mqtt.js.
 */

import { connect, type MqttClient } from "mqtt";
import type { QoS, Transport, TransportCallbacks } from "./transport.ts";

export interface MqttTransportOptions {
  /** Broker URL, e.g. mqtt://localhost:1883 */
  url: string;
  clientId: string;
  connectTimeoutMs: number;
  /** Delay between automatic reconnect attempts (0 disables reconnecting) */
  reconnectPeriodMs: number;
  keepaliveSec: number;
}

export class MqttTransport implements Transport {
  private client: MqttClient | null = null;

  constructor(private readonly options: MqttTransportOptions) {}

  connect(callbacks: TransportCallbacks): void {
    if (this.client) {
      return;
    }

    const client = connect(this.options.url, {
      clientId: this.options.clientId,
      connectTimeout: this.options.connectTimeoutMs,
      reconnectPeriod: this.options.reconnectPeriodMs,
      keepalive: this.options.keepaliveSec,
      clean: true,
    });

    client.on("connect", () => callbacks.onConnect());
    client.on("close", () => callbacks.onDisconnect("connection closed"));
    client.on("offline", () => callbacks.onDisconnect("client offline"));
    client.on("disconnect", (packet) => {
      callbacks.onDisconnect(`broker sent DISCONNECT (reason ${packet.reasonCode ?? "unknown"})`);
    });
    client.on("message", (topic, payload) => callbacks.onMessage(topic, payload));
    client.on("error", (error) => callbacks.onError(error));

    this.client = client;
  }

  async subscribe(topic: string, qos: QoS): Promise<void> {
    await this.requireClient().subscribeAsync(topic, { qos });
  }

  async publish(topic: string, payload: string | Buffer, qos: QoS): Promise<void> {
    await this.requireClient().publishAsync(topic, payload, { qos });
  }

  async end(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) {
      await client.endAsync();
    }
  }

  private requireClient(): MqttClient {
    if (!this.client) {
      throw new Error(`MQTT client for ${this.options.url} is not connected`);
    }
    return this.client;
  }
}
