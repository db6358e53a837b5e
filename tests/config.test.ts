/**
 * Tests for environment-driven configuration
 */

import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { createConfig } from "../src/config.ts";

describe("createConfig", () => {
  describe("defaults", () => {
    const config = createConfig({});

    it("should use the default edge identity", () => {
      expect(config.edge).toEqual({
        id: "edge-rpi-001",
        name: "AgriSense Gateway",
        location: "Greenhouse-A",
      });
    });

    it("should derive cloud client id and command topic from the edge id", () => {
      expect(config.cloud.clientId).toBe("edge_edge-rpi-001");
      expect(config.cloud.commandTopic).toBe("agrisense/commands/edge-rpi-001");
    });

    it("should use the default topics", () => {
      expect(config.local.dataTopic).toBe("agrisense/sensors/data");
      expect(config.local.alarmsTopic).toBe("agrisense/alarms");
      expect(config.local.commandsTopic).toBe("agrisense/commands");
      expect(config.local.clientId).toBe("cloud_sync_local");
      expect(config.cloud.dataTopic).toBe("agrisense/sensors/data");
      expect(config.cloud.alarmsTopic).toBe("agrisense/alarms");
    });

    it("should default to realtime dispatch", () => {
      expect(config.dispatch).toEqual({
        mode: "realtime",
        batchSize: 1,
        batchTimeoutMs: 2_000,
        pollIntervalMs: 1_000,
      });
    });

    it("should use the default timings", () => {
      expect(config.mqtt).toEqual({ connectTimeoutMs: 60_000, reconnectPeriodMs: 5_000, keepaliveSec: 60 });
      expect(config.cloud.publishTimeoutMs).toBe(60_000);
      expect(config.drain).toEqual({ intervalMs: 5_000, batchLimit: 50 });
      expect(config.stats.intervalMs).toBe(60_000);
    });

    it("should keep the queue under data/", () => {
      expect(config.database.path.endsWith(join("data", "offline_queue.db"))).toBe(true);
    });

    it("should enable the status server on port 8080", () => {
      expect(config.http).toEqual({ enabled: true, host: "0.0.0.0", port: 8080 });
      expect(config.logging.level).toBe("info");
    });
  });

  describe("overrides", () => {
    it("should switch to batched mode", () => {
      const config = createConfig({ REALTIME_MODE: "false", BATCH_SIZE: "10", BATCH_TIMEOUT_MS: "30000" });

      expect(config.dispatch.mode).toBe("batched");
      expect(config.dispatch.batchSize).toBe(10);
      expect(config.dispatch.batchTimeoutMs).toBe(30_000);
    });

    it("should build the command topic from prefix and edge id", () => {
      const config = createConfig({ EDGE_ID: "greenhouse-01", CLOUD_COMMAND_TOPIC_PREFIX: "farm/cmd" });

      expect(config.cloud.commandTopic).toBe("farm/cmd/greenhouse-01");
      expect(config.cloud.clientId).toBe("edge_greenhouse-01");
    });

    it("should fall back to defaults for invalid numbers", () => {
      expect(createConfig({ BATCH_SIZE: "abc" }).dispatch.batchSize).toBe(1);
      expect(createConfig({ BATCH_SIZE: "-5" }).dispatch.batchSize).toBe(1);
      expect(createConfig({ DRAIN_BATCH_LIMIT: "0" }).drain.batchLimit).toBe(50);
    });

    it("should tie the publish timeout to the connect timeout unless set", () => {
      expect(createConfig({ MQTT_CONNECT_TIMEOUT_MS: "10000" }).cloud.publishTimeoutMs).toBe(10_000);
      expect(createConfig({ CLOUD_PUBLISH_TIMEOUT_MS: "2500" }).cloud.publishTimeoutMs).toBe(2_500);
    });

    it("should accept known log levels only", () => {
      expect(createConfig({ LOG_LEVEL: "debug" }).logging.level).toBe("debug");
      expect(createConfig({ LOG_LEVEL: "verbose" }).logging.level).toBe("info");
    });

    it("should read boolean flags", () => {
      expect(createConfig({ STATUS_HTTP_ENABLED: "off" }).http.enabled).toBe(false);
      expect(createConfig({ STATUS_HTTP_ENABLED: "yes" }).http.enabled).toBe(true);
      expect(createConfig({ REALTIME_MODE: "1" }).dispatch.mode).toBe("realtime");
    });

    it("should take the queue path and broker URLs from the environment", () => {
      const config = createConfig({
        QUEUE_DB_PATH: "/var/lib/relay/queue.db",
        LOCAL_MQTT_URL: "mqtt://10.0.0.5:1883",
        CLOUD_MQTT_URL: "mqtts://cloud.example.com:8883",
      });

      expect(config.database.path).toBe("/var/lib/relay/queue.db");
      expect(config.local.url).toBe("mqtt://10.0.0.5:1883");
      expect(config.cloud.url).toBe("mqtts://cloud.example.com:8883");
    });
  });
});
