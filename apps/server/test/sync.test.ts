/**
 * Log Scanner Tests
 *
 * Window arithmetic of the event log scanner against an in-memory chain.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  createSyncCursor,
  fetchEventWindow,
  scanEventLogs,
  type EventWindow,
} from "../src/integrations/chain/sync";
import { InMemoryChainReader, address, createMockLog } from "./helpers";

describe("Log Scanner", () => {
  let reader: InMemoryChainReader;

  beforeEach(() => {
    reader = new InMemoryChainReader();
  });

  describe("createSyncCursor", () => {
    it("should hold the head back by the confirmation gap", async () => {
      reader.latest = 1_000n;

      const cursor = await createSyncCursor(reader, { from: 10n });

      expect(cursor.head).toBe(997n);
      expect(cursor.from).toBe(10n);
      expect(cursor.windowSize).toBe(50_000n);
      expect(cursor.confirmationGap).toBe(3n);
    });

    it("should clamp the head at zero on a young chain", async () => {
      reader.latest = 2n;

      const cursor = await createSyncCursor(reader, { from: 0n });

      expect(cursor.head).toBe(0n);
    });
  });

  describe("fetchEventWindow", () => {
    it("should backfill in fixed windows, then follow the head", async () => {
      reader.latest = 200_000n;
      const cursor = await createSyncCursor(reader, { from: 0n, addresses: [address(0xaa)] });

      const first = await fetchEventWindow(reader, cursor, 0);
      expect(reader.logQueries[0]).toMatchObject({ fromBlock: 0n, toBlock: 49_999n });
      expect(first.nextBlock).toBe(50_000n);
      expect(cursor.from).toBe(50_000n);

      await fetchEventWindow(reader, cursor, 0);
      await fetchEventWindow(reader, cursor, 0);
      expect(reader.logQueries[2]).toMatchObject({ fromBlock: 100_000n, toBlock: 149_999n });
      expect(cursor.from).toBe(150_000n);

      // 199_997 - 150_000 is within one window: query up to the head
      const caughtUp = await fetchEventWindow(reader, cursor, 0);
      expect(reader.logQueries[3]).toMatchObject({ fromBlock: 150_000n, toBlock: 199_997n });
      expect(cursor.from).toBe(199_997n);
      expect(caughtUp.nextBlock).toBe(199_997n);
    });

    it("should pass watched addresses to every query", async () => {
      reader.latest = 100n;
      const cursor = await createSyncCursor(reader, {
        from: 0n,
        addresses: [address(0xaa), address(0xbb)],
      });

      await fetchEventWindow(reader, cursor, 0);

      expect(reader.logQueries[0].addresses).toEqual([address(0xaa), address(0xbb)]);
    });

    it("should refresh the head after a caught-up query", async () => {
      reader.latest = 100n;
      const cursor = await createSyncCursor(reader, { from: 90n, windowSize: 50n });

      reader.latest = 120n;
      const window = await fetchEventWindow(reader, cursor, 0);

      expect(reader.logQueries[0]).toMatchObject({ fromBlock: 90n, toBlock: 97n });
      expect(cursor.from).toBe(97n);
      expect(cursor.head).toBe(117n);
      expect(window.nextBlock).toBe(117n);
    });

    it("should treat a gap equal to the window as caught up", async () => {
      reader.latest = 53n;
      const cursor = await createSyncCursor(reader, { from: 0n, windowSize: 50n });

      await fetchEventWindow(reader, cursor, 0);

      expect(reader.logQueries[0]).toMatchObject({ fromBlock: 0n, toBlock: 50n });
    });

    it("should return the logs inside the window", async () => {
      reader.latest = 300n;
      reader.logs.push(
        createMockLog({ blockNumber: 50n, logIndex: 0 }),
        createMockLog({ blockNumber: 150n, logIndex: 1 })
      );
      const cursor = await createSyncCursor(reader, { from: 0n, windowSize: 100n });

      const first = await fetchEventWindow(reader, cursor, 0);
      const second = await fetchEventWindow(reader, cursor, 0);

      expect(first.logs.map((l) => l.logIndex)).toEqual([0]);
      expect(second.logs.map((l) => l.logIndex)).toEqual([1]);
    });

    it("should return early when aborted during the idle wait", async () => {
      reader.latest = 100n;
      const cursor = await createSyncCursor(reader, { from: 50n });
      const abort = new AbortController();
      abort.abort();

      const window = await fetchEventWindow(reader, cursor, 60_000, abort.signal);

      expect(reader.logQueries).toEqual([]);
      expect(window).toEqual({ logs: [], nextBlock: 50n });
      expect(cursor.from).toBe(50n);
      expect(cursor.head).toBe(97n);
    });

    it("should skip the query when the cursor is ahead of the head", async () => {
      reader.latest = 10n;
      const cursor = await createSyncCursor(reader, { from: 20n });

      const window = await fetchEventWindow(reader, cursor, 0);

      expect(reader.logQueries).toEqual([]);
      expect(window.logs).toEqual([]);
      expect(cursor.from).toBe(20n);
    });
  });

  describe("scanEventLogs", () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it("should cancel the idle wait when stopped", async () => {
      reader.latest = 100n;
      const cursor = await createSyncCursor(reader, { from: 50n });
      vi.useFakeTimers();

      const stop = scanEventLogs(reader, cursor, {
        idleDelayMs: 60_000,
        onLogs: () => undefined,
      });
      // First scan starts and parks in the idle wait
      await vi.advanceTimersByTimeAsync(0);
      expect(vi.getTimerCount()).toBe(1);

      stop();
      await vi.advanceTimersByTimeAsync(0);

      expect(vi.getTimerCount()).toBe(0);
      await vi.advanceTimersByTimeAsync(120_000);
      expect(reader.logQueries).toEqual([]);
    });

    it("should deliver windows until stopped", async () => {
      reader.latest = 303n;
      reader.logs.push(
        createMockLog({ blockNumber: 10n, logIndex: 0 }),
        createMockLog({ blockNumber: 110n, logIndex: 1 }),
        createMockLog({ blockNumber: 210n, logIndex: 2 })
      );
      const cursor = await createSyncCursor(reader, { from: 0n, windowSize: 100n });
      const windows: EventWindow[] = [];

      await new Promise<void>((resolve) => {
        const stop = scanEventLogs(reader, cursor, {
          idleDelayMs: 0,
          retryDelayMs: 0,
          onLogs: (window) => {
            windows.push(window);
            if (windows.length === 3) {
              stop();
              resolve();
            }
          },
        });
      });

      expect(windows.map((w) => w.logs.map((l) => l.logIndex))).toEqual([[0], [1], [2]]);
      expect(windows.map((w) => w.nextBlock)).toEqual([100n, 200n, 300n]);
    });

    it("should report errors and retry", async () => {
      reader.latest = 103n;
      reader.logs.push(createMockLog({ blockNumber: 5n }));
      const cursor = await createSyncCursor(reader, { from: 0n });
      const errors: string[] = [];
      reader.failNext = new Error("rpc unavailable");

      const window = await new Promise<EventWindow>((resolve) => {
        const stop = scanEventLogs(reader, cursor, {
          idleDelayMs: 0,
          retryDelayMs: 0,
          onError: (error) => errors.push(error.message),
          onLogs: (w) => {
            stop();
            resolve(w);
          },
        });
      });

      expect(errors).toEqual(["rpc unavailable"]);
      expect(window.logs.length).toBe(1);
    });
  });
});
