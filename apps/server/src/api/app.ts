/**
 * HTTP application
 *
 * Hono app wiring routes, middleware and error mapping. The chain reader is
 * injected so the app can run against a live node or an in-memory fake.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger as honoLogger } from "hono/logger";
import {
  EmptyLeafSetError,
  LeafIndexOutOfRangeError,
  LeafNotFoundError,
  MerkleError,
} from "@blockproof/merkle";
import { CommitmentService } from "../commitment/service";
import { BlockNotFoundError, ChainError } from "../integrations/chain/errors";
import type { ChainReader } from "../integrations/chain/reader";
import { logger } from "../utils/logger";
import { createBlockRoutes, createHealthRoutes, proofRoutes } from "./routes";

export interface AppDependencies {
  reader: ChainReader;
  corsOrigin?: string;
}

function statusFor(error: Error): 400 | 404 | 422 | 500 {
  if (error instanceof BlockNotFoundError) return 404;
  if (error instanceof LeafNotFoundError) return 404;
  if (error instanceof LeafIndexOutOfRangeError) return 404;
  if (error instanceof EmptyLeafSetError) return 422;
  if (error instanceof MerkleError) return 400;
  return 500;
}

export function createApp({ reader, corsOrigin }: AppDependencies): Hono {
  const app = new Hono();
  const service = new CommitmentService(reader);

  // Middleware
  app.use("*", cors({
    origin: corsOrigin || "*",
    allowMethods: ["GET", "POST", "OPTIONS"],
    allowHeaders: ["Content-Type"],
  }));

  app.use("*", honoLogger((message) => logger.info(message)));

  // Routes
  app.route("/health", createHealthRoutes(reader));
  app.route("/api/blocks", createBlockRoutes(service));
  app.route("/api/proofs", proofRoutes);

  // Root endpoint
  app.get("/", (c) => {
    return c.json({
      name: "Blockproof Server",
      version: "0.1.0",
      status: "running",
      endpoints: {
        health: "/health",
        receiptRoot: "/api/blocks/:number/receipts/root",
        receiptProof: "/api/blocks/:number/receipts/proof?index=:transactionIndex",
        hashProof: "/api/blocks/:number/hashes/proof?tx=:transactionHash",
        verify: "/api/proofs/verify",
      },
    });
  });

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: "Not found" }, 404);
  });

  // Error handler
  app.onError((err, c) => {
    const status = statusFor(err);
    if (status === 500) {
      logger.error({ error: err.message, stack: err.stack }, "Unhandled error");
      return c.json({ error: "Internal server error" }, 500);
    }

    const code = err instanceof MerkleError || err instanceof ChainError ? err.code : "ERROR";
    logger.warn({ error: err.message, code, status }, "Request failed");
    return c.json({ error: err.message, code }, status);
  });

  return app;
}
