/**
 * Blockproof Server
 *
 * Main entry point.
 *
 * Starts:
 * - Hono HTTP server serving per-block receipt and transaction-hash
 *   commitments
 * - The windowed event log scanner, when addresses are watched
 */

import { serve } from "@hono/node-server";
import { parseAbi, type AbiEvent } from "viem";
import { env } from "./utils/env";
import { logger } from "./utils/logger";
import { createApp } from "./api/app";
import { getPublicClient } from "./integrations/chain/client";
import { createViemChainReader, type ChainReader } from "./integrations/chain/reader";
import { createSyncCursor, scanEventLogs } from "./integrations/chain/sync";

// Scanner cleanup functions
const scanStoppers: Array<() => void> = [];

function parseEvents(signatures: string[]): AbiEvent[] {
  if (signatures.length === 0) return [];
  return parseAbi(signatures).filter((item): item is AbiEvent => item.type === "event");
}

async function startLogScanner(reader: ChainReader): Promise<void> {
  if (env.WATCH_ADDRESSES.length === 0) {
    logger.info("No WATCH_ADDRESSES configured, log scanner disabled");
    return;
  }

  const cursor = await createSyncCursor(reader, {
    from: env.START_BLOCK,
    addresses: env.WATCH_ADDRESSES,
    events: parseEvents(env.WATCH_EVENTS),
    windowSize: env.LOG_WINDOW_SIZE,
    confirmationGap: env.CONFIRMATION_GAP,
  });

  logger.info(
    {
      from: cursor.from.toString(),
      head: cursor.head.toString(),
      addresses: cursor.addresses,
      events: cursor.events.map((e) => e.name),
    },
    "Starting log scanner"
  );

  const stop = scanEventLogs(reader, cursor, {
    idleDelayMs: env.SYNC_IDLE_MS,
    retryDelayMs: env.SYNC_RETRY_MS,
    onLogs: ({ logs, nextBlock }) => {
      logger.info(
        { count: logs.length, nextBlock: nextBlock.toString() },
        "Event logs received"
      );
    },
  });
  scanStoppers.push(stop);
}

// Graceful shutdown handler
function setupShutdownHandler(close: () => void) {
  const shutdown = () => {
    logger.info("Shutdown signal received, stopping scanner and server...");
    for (const stop of scanStoppers) {
      stop();
    }
    close();
    process.exit(0);
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

// Start server
async function main() {
  logger.info({ nodeEnv: env.NODE_ENV, chainId: env.CHAIN_ID }, "Starting Blockproof Server");

  const reader = createViemChainReader(getPublicClient());
  const app = createApp({ reader, corsOrigin: env.FRONTEND_URL });

  const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
    logger.info(
      { port: info.port, url: `http://localhost:${info.port}` },
      "Server started"
    );
  });

  setupShutdownHandler(() => server.close());

  await startLogScanner(reader);

  logger.info("Blockproof Server is ready");
}

// Run
main().catch((error) => {
  logger.error({ error }, "Failed to start server");
  process.exit(1);
});
