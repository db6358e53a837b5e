/**
 * Transport contract the broker links are written against.
 *
 * The production implementation is MqttTransport; tests use an in-process fake.
 */

/** Transport callbacks */
export interface TransportCallbacks {
  /** Handshake completed (also fired after every automatic reconnect) */
  onConnect: () => void;
  /** Connection lost or closed */
  onDisconnect: (reason: string) => void;
  /** Message received on a subscribed topic */
  onMessage: (topic: string, payload: Buffer) => void;
  /** Transport-level error (connection refused, protocol error, ...) */
  onError: (error: Error) => void;
}

export type QoS = 0 | 1 | 2;

export interface Transport {
  /** Start connecting; reconnection after a drop is the transport's job */
  connect(callbacks: TransportCallbacks): void;

  subscribe(topic: string, qos: QoS): Promise<void>;

  /** Resolves once the broker acknowledged the publish (for qos > 0) */
  publish(topic: string, payload: string | Buffer, qos: QoS): Promise<void>;

  /** Close the connection and stop reconnecting */
  end(): Promise<void>;
}
