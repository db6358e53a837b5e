/**
 * Tests for the Drain Worker
 *
 * Tests FIFO replay, stop-at-first-failure, skip while offline, batch
 * limit, overlapping cycles and the interval loop.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { DrainWorker, type DrainWorkerOptions } from "../src/workers/drain-worker.ts";
import { DurableQueue, StorageError } from "../src/queue/durable-queue.ts";
import { RelayStats } from "../src/relay/relay-stats.ts";
import { openDatabase } from "../src/storage/database.ts";
import type { TelemetryRecord } from "../src/types/index.ts";

const TOPIC = "agrisense/sensors/data";

describe("DrainWorker", () => {
  let queue: DurableQueue;
  let stats: RelayStats;
  let connected: boolean;
  let send: Mock<(topic: string, payload: TelemetryRecord) => Promise<boolean>>;

  function createWorker(overrides: Partial<DrainWorkerOptions> = {}): DrainWorker {
    return new DrainWorker({
      cloud: { send, isConnected: () => connected },
      queue,
      stats,
      intervalMs: 5_000,
      batchLimit: 50,
      logLevel: "error",
      ...overrides,
    });
  }

  function sentSeqs(): Array<TelemetryRecord[string]> {
    return send.mock.calls.map(([, payload]) => payload.seq);
  }

  beforeEach(() => {
    queue = new DurableQueue({ path: ":memory:", logLevel: "error" });
    stats = new RelayStats();
    connected = true;
    send = vi.fn<(topic: string, payload: TelemetryRecord) => Promise<boolean>>(async () => true);

    queue.enqueue(TOPIC, { seq: 1 });
    queue.enqueue(TOPIC, { seq: 2 });
    queue.enqueue(TOPIC, { seq: 3 });
  });

  afterEach(() => {
    vi.useRealTimers();
    queue.close();
  });

  describe("runCycle", () => {
    it("should send entries oldest first and delete them", async () => {
      const worker = createWorker();

      const result = await worker.runCycle();

      expect(result).toEqual({ skipped: false, attempted: 3, sent: 3, stoppedEarly: false });
      expect(sentSeqs()).toEqual([1, 2, 3]);
      expect(send.mock.calls.every(([topic]) => topic === TOPIC)).toBe(true);
      expect(queue.countPending()).toBe(0);
      expect(stats.snapshot().readingsSent).toBe(3);
      expect(stats.snapshot().lastSyncAt).toBeInstanceOf(Date);
    });

    it("should stop at the first failure and keep the rest in order", async () => {
      send.mockResolvedValueOnce(true).mockResolvedValueOnce(false);
      const worker = createWorker();

      const result = await worker.runCycle();

      expect(result).toEqual({ skipped: false, attempted: 2, sent: 1, stoppedEarly: true });
      expect(queue.peekPending(10).map((entry) => entry.payload.seq)).toEqual([2, 3]);
      expect(stats.snapshot().readingsSent).toBe(1);

      send.mockClear();
      const retry = await worker.runCycle();

      expect(retry.sent).toBe(2);
      expect(sentSeqs()).toEqual([2, 3]);
      expect(queue.countPending()).toBe(0);
    });

    it("should skip while the cloud is not connected", async () => {
      connected = false;
      const worker = createWorker();

      const result = await worker.runCycle();

      expect(result).toEqual({ skipped: true, attempted: 0, sent: 0, stoppedEarly: false });
      expect(send).not.toHaveBeenCalled();
      expect(queue.countPending()).toBe(3);
    });

    it("should read at most batchLimit entries per cycle", async () => {
      const worker = createWorker({ batchLimit: 2 });

      const result = await worker.runCycle();

      expect(result).toEqual({ skipped: false, attempted: 2, sent: 2, stoppedEarly: false });
      expect(queue.peekPending(10).map((entry) => entry.payload.seq)).toEqual([3]);
    });

    it("should deliver entries queued behind unreadable rows", async () => {
      queue.close();
      const db = openDatabase(":memory:", "error");
      for (let i = 0; i < 2; i++) {
        db.run(`
          INSERT INTO outbound_queue (target_topic, payload, enqueued_at, status)
          VALUES (?, 'not json', '2026-03-01T12:00:00.000Z', 'pending')
        `, [TOPIC]);
      }
      queue = new DurableQueue({ path: ":memory:", database: db, logLevel: "error" });
      queue.enqueue(TOPIC, { seq: 1 });
      const worker = createWorker({ batchLimit: 2 });

      const result = await worker.runCycle();

      expect(result).toEqual({ skipped: false, attempted: 1, sent: 1, stoppedEarly: false });
      expect(sentSeqs()).toEqual([1]);
      expect(queue.countPending()).toBe(2);
    });

    it("should report an empty queue as a run with nothing sent", async () => {
      queue.delete(queue.peekPending(10).map((entry) => entry.id));
      const worker = createWorker();

      expect(await worker.runCycle()).toEqual({ skipped: false, attempted: 0, sent: 0, stoppedEarly: false });
    });

    it("should never let the pending count grow without new enqueues", async () => {
      const worker = createWorker();
      send
        .mockResolvedValueOnce(false)
        .mockResolvedValueOnce(true)
        .mockResolvedValueOnce(false)
        .mockResolvedValueOnce(true)
        .mockResolvedValueOnce(true);

      const counts = [queue.countPending()];
      for (let i = 0; i < 4; i++) {
        await worker.runCycle();
        counts.push(queue.countPending());
      }

      expect(counts).toEqual([3, 3, 2, 0, 0]);
    });

    it("should skip a cycle that overlaps one in progress", async () => {
      let release: (value: boolean) => void = () => undefined;
      send.mockImplementationOnce(() => new Promise<boolean>((resolve) => {
        release = resolve;
      }));
      const worker = createWorker();

      const first = worker.runCycle();
      expect(worker.isDraining()).toBe(true);

      const second = await worker.runCycle();
      expect(second.skipped).toBe(true);

      release(true);
      const result = await first;
      expect(result.sent).toBe(3);
      expect(worker.isDraining()).toBe(false);
    });

    it("should keep delivered entries pending when the delete fails", async () => {
      vi.spyOn(queue, "delete").mockImplementation(() => {
        throw new StorageError("database is locked", "delete");
      });
      const worker = createWorker();

      const result = await worker.runCycle();

      expect(result.sent).toBe(3);
      expect(queue.countPending()).toBe(3);
    });
  });

  describe("start/stop", () => {
    it("should run a cycle every interval until stopped", async () => {
      vi.useFakeTimers();
      const worker = createWorker({ batchLimit: 1 });

      worker.start();
      expect(worker.isRunning()).toBe(true);

      await vi.advanceTimersByTimeAsync(4_999);
      expect(send).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      expect(sentSeqs()).toEqual([1]);

      await vi.advanceTimersByTimeAsync(5_000);
      expect(sentSeqs()).toEqual([1, 2]);

      worker.stop();
      expect(worker.isRunning()).toBe(false);

      await vi.advanceTimersByTimeAsync(20_000);
      expect(sentSeqs()).toEqual([1, 2]);
      expect(queue.countPending()).toBe(1);
    });
  });
});
