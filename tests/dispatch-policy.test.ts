/**
 * Tests for the Dispatch Policy
 *
 * Tests realtime forwarding, fallback to the offline queue, batch
 * triggers (size and timeout) and the alarm bypass.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { DispatchPolicy, type DispatchPolicyOptions } from "../src/dispatch/dispatch-policy.ts";
import { DurableQueue, StorageError } from "../src/queue/durable-queue.ts";
import { RelayStats } from "../src/relay/relay-stats.ts";
import type { StampedRecord, TelemetryRecord } from "../src/types/index.ts";

const DATA_TOPIC = "cloud/sensors/data";
const ALARMS_TOPIC = "cloud/alarms";

function reading(seq: number): StampedRecord {
  return {
    node_id: `node-${seq}`,
    seq,
    edge_id: "edge-test",
    edge_name: "Test Gateway",
    edge_location: "Bench",
    received_at: "2026-03-01T12:00:00.000Z",
  };
}

describe("DispatchPolicy", () => {
  let send: Mock<(topic: string, payload: TelemetryRecord) => Promise<boolean>>;
  let queue: DurableQueue;
  let stats: RelayStats;
  let nowMs: number;

  function createPolicy(overrides: Partial<DispatchPolicyOptions> = {}): DispatchPolicy {
    return new DispatchPolicy({
      mode: "realtime",
      batchSize: 1,
      batchTimeoutMs: 2_000,
      topics: { data: DATA_TOPIC, alarms: ALARMS_TOPIC },
      edge: { id: "edge-test", name: "Test Gateway", location: "Bench" },
      cloud: { send },
      queue,
      stats,
      logLevel: "error",
      now: () => nowMs,
      ...overrides,
    });
  }

  beforeEach(() => {
    send = vi.fn<(topic: string, payload: TelemetryRecord) => Promise<boolean>>(async () => true);
    queue = new DurableQueue({ path: ":memory:", logLevel: "error" });
    stats = new RelayStats();
    nowMs = Date.parse("2026-03-01T12:00:00.000Z");
  });

  afterEach(() => {
    queue.close();
  });

  describe("realtime mode", () => {
    it("should send each reading immediately and never touch the queue", async () => {
      const policy = createPolicy();

      await policy.accept(reading(1));

      expect(send).toHaveBeenCalledTimes(1);
      expect(send).toHaveBeenCalledWith(DATA_TOPIC, reading(1));
      expect(queue.countPending()).toBe(0);
      expect(stats.snapshot().readingsSent).toBe(1);
    });

    it("should queue a reading the cloud did not accept", async () => {
      send.mockResolvedValue(false);
      const policy = createPolicy();

      await policy.accept(reading(1));

      const entries = queue.peekPending(10);
      expect(entries).toHaveLength(1);
      expect(entries[0]?.targetTopic).toBe(DATA_TOPIC);
      expect(entries[0]?.payload).toEqual(reading(1));
      expect(stats.snapshot().readingsQueued).toBe(1);
      expect(stats.snapshot().readingsSent).toBe(0);
    });
  });

  describe("batched mode", () => {
    it("should not send until the batch is full", async () => {
      const policy = createPolicy({ mode: "batched", batchSize: 3, batchTimeoutMs: 30_000 });

      await policy.accept(reading(1));
      await policy.accept(reading(2));

      expect(send).not.toHaveBeenCalled();
      expect(policy.getBufferSize()).toBe(2);
      expect(policy.shouldFlush()).toBe(false);

      await policy.accept(reading(3));
      expect(policy.shouldFlush()).toBe(true);
    });

    it("should send a full batch as one batch record", async () => {
      const policy = createPolicy({ mode: "batched", batchSize: 3, batchTimeoutMs: 30_000 });
      await policy.accept(reading(1));
      await policy.accept(reading(2));
      await policy.accept(reading(3));

      const outcome = await policy.flush();

      expect(outcome).toBe("sent");
      expect(send).toHaveBeenCalledTimes(1);
      expect(send).toHaveBeenCalledWith(DATA_TOPIC, {
        edge_id: "edge-test",
        edge_name: "Test Gateway",
        edge_location: "Bench",
        batch_size: 3,
        batch_time: "2026-03-01T12:00:00.000Z",
        readings: [reading(1), reading(2), reading(3)],
      });
      expect(policy.getBufferSize()).toBe(0);
      expect(stats.snapshot().readingsSent).toBe(3);
    });

    it("should flush a partial batch once the timeout has passed", async () => {
      const start = nowMs;
      const policy = createPolicy({ mode: "batched", batchSize: 3, batchTimeoutMs: 30_000 });
      await policy.accept(reading(1));

      nowMs = start + 29_999;
      expect(policy.shouldFlush()).toBe(false);

      nowMs = start + 30_000;
      expect(policy.shouldFlush()).toBe(true);

      await policy.flush();
      expect(send.mock.calls[0]?.[1].batch_size).toBe(1);
    });

    it("should measure the timeout from the last flush", async () => {
      const start = nowMs;
      const policy = createPolicy({ mode: "batched", batchSize: 3, batchTimeoutMs: 30_000 });
      await policy.accept(reading(1));
      nowMs = start + 30_000;
      await policy.flush();

      await policy.accept(reading(2));
      nowMs = start + 59_999;
      expect(policy.shouldFlush()).toBe(false);
      nowMs = start + 60_000;
      expect(policy.shouldFlush()).toBe(true);
    });

    it("should never flush an empty buffer", async () => {
      const policy = createPolicy({ mode: "batched", batchSize: 3, batchTimeoutMs: 30_000 });
      nowMs += 120_000;

      expect(policy.shouldFlush()).toBe(false);
      expect(await policy.flush()).toBeNull();
      expect(send).not.toHaveBeenCalled();
    });

    it("should queue a failed batch as a single entry", async () => {
      send.mockResolvedValue(false);
      const policy = createPolicy({ mode: "batched", batchSize: 2, batchTimeoutMs: 30_000 });
      await policy.accept(reading(1));
      await policy.accept(reading(2));

      const outcome = await policy.flush();

      expect(outcome).toBe("queued");
      const entries = queue.peekPending(10);
      expect(entries).toHaveLength(1);
      expect(entries[0]?.payload.batch_size).toBe(2);
      expect(policy.getBufferSize()).toBe(0);
    });

    it("should report dropped readings on discard", async () => {
      const policy = createPolicy({ mode: "batched", batchSize: 10, batchTimeoutMs: 30_000 });
      await policy.accept(reading(1));
      await policy.accept(reading(2));

      expect(policy.discardBuffer()).toBe(2);
      expect(policy.getBufferSize()).toBe(0);
      expect(send).not.toHaveBeenCalled();
    });
  });

  describe("alarms", () => {
    it("should bypass the batch buffer in batched mode", async () => {
      const policy = createPolicy({ mode: "batched", batchSize: 10, batchTimeoutMs: 30_000 });
      await policy.accept(reading(1));

      const alarm = { ...reading(2), violations: ["temperature_high"] };
      const outcome = await policy.acceptAlarm(alarm);

      expect(outcome).toBe("sent");
      expect(send).toHaveBeenCalledTimes(1);
      expect(send).toHaveBeenCalledWith(ALARMS_TOPIC, alarm);
      expect(policy.getBufferSize()).toBe(1);
      expect(stats.snapshot().alarmsForwarded).toBe(1);
    });

    it("should queue an alarm for the alarms topic when the cloud is offline", async () => {
      send.mockResolvedValue(false);
      const policy = createPolicy();

      const outcome = await policy.acceptAlarm(reading(1));

      expect(outcome).toBe("queued");
      expect(queue.peekPending(10)[0]?.targetTopic).toBe(ALARMS_TOPIC);
      expect(stats.snapshot().alarmsForwarded).toBe(0);
    });
  });

  describe("queue write failure", () => {
    it("should report the record as lost and keep going", async () => {
      send.mockResolvedValue(false);
      const policy = createPolicy({
        queue: {
          enqueue: () => {
            throw new StorageError("disk full", "enqueue");
          },
          countPending: () => 0,
        },
      });

      const outcome = await policy.acceptAlarm(reading(1));

      expect(outcome).toBe("lost");
      expect(stats.snapshot().queueWriteFailures).toBe(1);
      expect(stats.snapshot().readingsQueued).toBe(0);
    });
  });
});
