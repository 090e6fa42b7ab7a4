import {
  createPublicClient,
  http,
  type Chain,
  type PublicClient,
} from "viem";
import { env } from "../../utils/env";
import { logger } from "../../utils/logger";

// Chain definition for the configured RPC endpoint
export const configuredChain: Chain = {
  id: env.CHAIN_ID,
  name: env.CHAIN_NAME,
  nativeCurrency: {
    decimals: 18,
    name: "Ether",
    symbol: "ETH",
  },
  rpcUrls: {
    default: {
      http: [env.RPC_URL],
    },
  },
};

// Singleton public client for read operations
let _publicClient: PublicClient | null = null;

/**
 * Get the public client for read operations
 */
export function getPublicClient(): PublicClient {
  if (!_publicClient) {
    _publicClient = createPublicClient({
      chain: configuredChain,
      transport: http(env.RPC_URL),
    });
    logger.info(
      { chainId: configuredChain.id, chainName: configuredChain.name },
      "Public client initialized"
    );
  }
  return _publicClient;
}

export type { PublicClient };
