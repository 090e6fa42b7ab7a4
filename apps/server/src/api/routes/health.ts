/**
 * Health Check Routes
 *
 * Provides health status for the server and its chain connection.
 */

import { Hono } from "hono";
import type { ChainReader } from "../../integrations/chain/reader";

interface IntegrationStatus {
  name: string;
  status: "healthy" | "unhealthy";
  latencyMs?: number;
  blockNumber?: string;
  error?: string;
}

interface HealthResponse {
  status: "healthy" | "unhealthy";
  timestamp: string;
  uptime: number;
  integrations: IntegrationStatus[];
}

const startTime = Date.now();

/**
 * Check chain connectivity
 */
async function checkChain(reader: ChainReader): Promise<IntegrationStatus> {
  const start = Date.now();
  try {
    const blockNumber = await reader.getBlockNumber();
    return {
      name: "chain",
      status: "healthy",
      latencyMs: Date.now() - start,
      blockNumber: blockNumber.toString(),
    };
  } catch (error) {
    return {
      name: "chain",
      status: "unhealthy",
      error: error instanceof Error ? error.message : "Unknown error",
    };
  }
}

export function createHealthRoutes(reader: ChainReader): Hono {
  const health = new Hono();

  /**
   * GET /health
   *
   * Returns overall health status
   */
  health.get("/", async (c) => {
    const integrations = [await checkChain(reader)];
    const overallStatus = integrations.some((i) => i.status === "unhealthy")
      ? "unhealthy"
      : "healthy";

    const response: HealthResponse = {
      status: overallStatus,
      timestamp: new Date().toISOString(),
      uptime: Date.now() - startTime,
      integrations,
    };

    return c.json(response, overallStatus === "healthy" ? 200 : 503);
  });

  /**
   * GET /health/live
   *
   * Simple liveness probe
   */
  health.get("/live", (c) => {
    return c.json({ status: "ok" });
  });

  /**
   * GET /health/ready
   *
   * Readiness probe: the chain must answer
   */
  health.get("/ready", async (c) => {
    const chain = await checkChain(reader);
    if (chain.status === "unhealthy") {
      return c.json({ status: "not ready", chain }, 503);
    }
    return c.json({ status: "ready" });
  });

  return health;
}
