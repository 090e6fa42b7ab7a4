/**
 * Windowed Event Log Scanner
 *
 * Walks eth_getLogs over a block range in fixed-size windows while it is
 * behind the chain head, then follows the head at a fixed confirmation gap.
 * Each scan returns a stop function for cleanup.
 */

import type { AbiEvent, Address } from "viem";
import type { ChainLog, ChainReader } from "./reader";
import { logger } from "../../utils/logger";

// ============================================
// Cursor
// ============================================

export const DEFAULT_WINDOW_SIZE = 50_000n;
export const DEFAULT_CONFIRMATION_GAP = 3n;
export const DEFAULT_IDLE_DELAY_MS = 10_000;
export const DEFAULT_RETRY_DELAY_MS = 5_000;

export interface SyncCursor {
  /** Newest block considered settled (latest minus the confirmation gap) */
  head: bigint;
  /** First block of the next query */
  from: bigint;
  windowSize: bigint;
  confirmationGap: bigint;
  addresses: Address[];
  events: AbiEvent[];
}

export interface SyncCursorOptions {
  from: bigint;
  addresses?: Address[];
  events?: AbiEvent[];
  windowSize?: bigint;
  confirmationGap?: bigint;
}

export interface EventWindow {
  logs: ChainLog[];
  /** Block the caller should treat as its new sync height */
  nextBlock: bigint;
}

async function settledHead(
  reader: ChainReader,
  confirmationGap: bigint
): Promise<bigint> {
  const latest = await reader.getBlockNumber();
  return latest > confirmationGap ? latest - confirmationGap : 0n;
}

/** Resolves after `ms`, or as soon as `signal` aborts */
function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Start a cursor at `from`, with the head set from the node
 */
export async function createSyncCursor(
  reader: ChainReader,
  options: SyncCursorOptions
): Promise<SyncCursor> {
  const confirmationGap = options.confirmationGap ?? DEFAULT_CONFIRMATION_GAP;
  return {
    head: await settledHead(reader, confirmationGap),
    from: options.from,
    windowSize: options.windowSize ?? DEFAULT_WINDOW_SIZE,
    confirmationGap,
    addresses: options.addresses ?? [],
    events: options.events ?? [],
  };
}

/**
 * Fetch the next window of logs and advance the cursor.
 *
 * Behind the head by more than one window: query `[from, from + windowSize - 1]`
 * and move `from` past it. Otherwise wait `idleDelayMs`, query `[from, head]`,
 * keep `from` at the old head (the boundary block is queried again next time)
 * and refresh the head. An abort during the wait returns no logs and leaves
 * the cursor untouched.
 */
export async function fetchEventWindow(
  reader: ChainReader,
  cursor: SyncCursor,
  idleDelayMs: number = DEFAULT_IDLE_DELAY_MS,
  signal?: AbortSignal
): Promise<EventWindow> {
  const query = { addresses: cursor.addresses, events: cursor.events };

  if (cursor.head - cursor.from > cursor.windowSize) {
    const toBlock = cursor.from + cursor.windowSize - 1n;
    const logs = await reader.getLogs({ ...query, fromBlock: cursor.from, toBlock });
    cursor.from = toBlock + 1n;
    return { logs, nextBlock: toBlock + 1n };
  }

  await delay(idleDelayMs, signal);
  if (signal?.aborted) {
    return { logs: [], nextBlock: cursor.from };
  }

  const toBlock = cursor.head;
  const logs =
    cursor.from <= toBlock
      ? await reader.getLogs({ ...query, fromBlock: cursor.from, toBlock })
      : [];

  if (cursor.from < toBlock) {
    cursor.from = toBlock;
  }
  cursor.head = await settledHead(reader, cursor.confirmationGap);
  return { logs, nextBlock: cursor.head };
}

// ============================================
// Scan loop
// ============================================

export interface ScanEventLogsOptions {
  onLogs: (window: EventWindow) => void | Promise<void>;
  onError?: (error: Error) => void;
  idleDelayMs?: number;
  retryDelayMs?: number;
}

/**
 * Run fetchEventWindow in a loop until stopped.
 * RPC errors are reported and retried after `retryDelayMs`.
 */
export function scanEventLogs(
  reader: ChainReader,
  cursor: SyncCursor,
  options: ScanEventLogsOptions
): () => void {
  const {
    onLogs,
    onError = (error) => logger.warn({ error: error.message }, "Log scan failed"),
    idleDelayMs = DEFAULT_IDLE_DELAY_MS,
    retryDelayMs = DEFAULT_RETRY_DELAY_MS,
  } = options;
  let stopped = false;
  const abort = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | null = null;

  function schedule(ms: number) {
    timeoutId = setTimeout(() => {
      scan().catch((error: unknown) => {
        logger.error({ error }, "Log scan loop crashed");
      });
    }, ms);
  }

  async function scan() {
    if (stopped) return;
    let nextDelay = 0;
    try {
      const window = await fetchEventWindow(reader, cursor, idleDelayMs, abort.signal);
      if (!stopped && window.logs.length > 0) {
        await onLogs(window);
      }
      logger.debug(
        { from: cursor.from.toString(), head: cursor.head.toString(), logs: window.logs.length },
        "Log window scanned"
      );
    } catch (error) {
      onError(error instanceof Error ? error : new Error(String(error)));
      nextDelay = retryDelayMs;
    } finally {
      if (!stopped) {
        schedule(nextDelay);
      }
    }
  }

  schedule(0);

  return () => {
    stopped = true;
    abort.abort();
    if (timeoutId !== null) {
      clearTimeout(timeoutId);
    }
  };
}
