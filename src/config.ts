/**
 * Edge Telemetry Relay Configuration
 *
 * All configuration settings for the relay.
 * Values can be overridden via environment variables.
 *
 * The resulting value is passed explicitly to every component at
 * construction; nothing below the entry point reads `config` directly.
 */

import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type { DispatchMode } from "./types/index.ts";
import type { LogLevel } from "./utils/logger.ts";

// Base paths
const PROJECT_ROOT = join(dirname(fileURLToPath(import.meta.url)), "..");

type Env = Record<string, string | undefined>;

/** Positive number from env, or the default when missing/invalid */
function positiveNumber(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") return fallback;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function logLevel(value: string | undefined): LogLevel {
  switch (value) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return value;
    default:
      return "info";
  }
}

export function createConfig(env: Env = process.env) {
  const connectTimeoutMs = positiveNumber(env.MQTT_CONNECT_TIMEOUT_MS, 60_000);
  const commandTopicPrefix = env.CLOUD_COMMAND_TOPIC_PREFIX || "agrisense/commands";
  const edgeId = env.EDGE_ID || "edge-rpi-001";
  const mode: DispatchMode = flag(env.REALTIME_MODE, true) ? "realtime" : "batched";

  return {
    // ═══════════════════════════════════════════════════════════════════════════
    // EDGE IDENTITY
    // Stamped onto every forwarded record
    // ═══════════════════════════════════════════════════════════════════════════
    edge: {
      id: edgeId,
      name: env.EDGE_NAME || "AgriSense Gateway",
      location: env.EDGE_LOCATION || "Greenhouse-A",
    },

    // ═══════════════════════════════════════════════════════════════════════════
    // LOCAL BROKER (sensor gateway side)
    // ═══════════════════════════════════════════════════════════════════════════
    local: {
      /** Local MQTT broker URL */
      url: env.LOCAL_MQTT_URL || "mqtt://localhost:1883",

      clientId: env.LOCAL_MQTT_CLIENT_ID || "cloud_sync_local",

      /** Sensor readings published by the gateway */
      dataTopic: env.LOCAL_DATA_TOPIC || "agrisense/sensors/data",

      /** Alarm events (always forwarded in realtime) */
      alarmsTopic: env.LOCAL_ALARMS_TOPIC || "agrisense/alarms",

      /** Where cloud commands are republished for local actuators */
      commandsTopic: env.LOCAL_COMMANDS_TOPIC || "agrisense/commands",
    },

    // ═══════════════════════════════════════════════════════════════════════════
    // CLOUD BROKER
    // ═══════════════════════════════════════════════════════════════════════════
    cloud: {
      /** Cloud MQTT broker URL */
      url: env.CLOUD_MQTT_URL || "mqtt://localhost:1884",

      clientId: `edge_${edgeId}`,

      dataTopic: env.CLOUD_DATA_TOPIC || "agrisense/sensors/data",

      alarmsTopic: env.CLOUD_ALARMS_TOPIC || "agrisense/alarms",

      /** Commands for this edge arrive on `<prefix>/<edgeId>` */
      commandTopic: `${commandTopicPrefix}/${edgeId}`,

      /** Upper bound on waiting for a QoS 1 acknowledgement (ms) */
      publishTimeoutMs: positiveNumber(env.CLOUD_PUBLISH_TIMEOUT_MS, connectTimeoutMs),
    },

    // ═══════════════════════════════════════════════════════════════════════════
    // MQTT TRANSPORT (shared by both links)
    // Reconnection is left to the mqtt client itself
    // ═══════════════════════════════════════════════════════════════════════════
    mqtt: {
      connectTimeoutMs,

      /** Delay between reconnect attempts (ms) */
      reconnectPeriodMs: positiveNumber(env.MQTT_RECONNECT_PERIOD_MS, 5_000),

      keepaliveSec: positiveNumber(env.MQTT_KEEPALIVE_SEC, 60),
    },

    // ═══════════════════════════════════════════════════════════════════════════
    // DISPATCH POLICY
    // ═══════════════════════════════════════════════════════════════════════════
    dispatch: {
      mode,

      /** Readings per batch before a flush is due */
      batchSize: positiveNumber(env.BATCH_SIZE, 1),

      /** Flush a non-empty batch after this long since the last flush (ms) */
      batchTimeoutMs: positiveNumber(env.BATCH_TIMEOUT_MS, 2_000),

      /** How often the batch timer checks the flush condition (ms) */
      pollIntervalMs: positiveNumber(env.BATCH_POLL_INTERVAL_MS, 1_000),
    },

    // ═══════════════════════════════════════════════════════════════════════════
    // OFFLINE QUEUE DRAIN
    // ═══════════════════════════════════════════════════════════════════════════
    drain: {
      intervalMs: positiveNumber(env.DRAIN_INTERVAL_MS, 5_000),

      /** Max queued entries replayed per cycle */
      batchLimit: positiveNumber(env.DRAIN_BATCH_LIMIT, 50),
    },

    stats: {
      /** Data flow report interval (ms) */
      intervalMs: positiveNumber(env.STATS_INTERVAL_MS, 60_000),
    },

    // ═══════════════════════════════════════════════════════════════════════════
    // DATABASE CONFIGURATION (SQLite offline queue)
    // ═══════════════════════════════════════════════════════════════════════════
    database: {
      path: env.QUEUE_DB_PATH || join(PROJECT_ROOT, "data", "offline_queue.db"),
    },

    // ═══════════════════════════════════════════════════════════════════════════
    // HTTP STATUS SERVER (read-only monitoring)
    // ═══════════════════════════════════════════════════════════════════════════
    http: {
      enabled: flag(env.STATUS_HTTP_ENABLED, true),
      host: env.HTTP_HOST || "0.0.0.0",
      port: positiveNumber(env.HTTP_PORT, 8080),
    },

    logging: {
      /** Log level: debug, info, warn, error */
      level: logLevel(env.LOG_LEVEL),
    },
  };
}

export type RelayConfig = ReturnType<typeof createConfig>;

export const config: RelayConfig = createConfig();
export default config;
