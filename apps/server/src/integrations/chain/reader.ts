/**
 * Chain Reader
 *
 * Read-only view of a chain node. Services depend on the ChainReader
 * interface; createViemChainReader backs it with a viem PublicClient.
 * Lookups for unknown blocks, transactions or receipts resolve to null.
 */

import {
  BlockNotFoundError as ViemBlockNotFoundError,
  TransactionNotFoundError,
  TransactionReceiptNotFoundError,
  type AbiEvent,
  type Address,
  type Hash,
  type Hex,
  type PublicClient,
} from "viem";

// ============================================
// Types
// ============================================

export interface ChainBlock {
  number: bigint;
  hash: Hash;
  transactions: Hash[];
  transactionsRoot: Hash;
}

export interface ChainTransaction {
  hash: Hash;
  from: Address;
  to: Address | null;
  nonce: number;
  value: bigint;
  input: Hex;
  blockNumber: bigint | null;
  transactionIndex: number | null;
}

export interface ChainLog {
  address: Address;
  topics: readonly Hex[];
  data: Hex;
  blockNumber: bigint | null;
  blockHash: Hash | null;
  transactionHash: Hash | null;
  transactionIndex: number | null;
  logIndex: number | null;
  removed: boolean;
}

export interface ChainReceipt {
  transactionHash: Hash;
  transactionIndex: number;
  blockHash: Hash;
  blockNumber: bigint;
  from: Address;
  to: Address | null;
  root?: Hash;
  logsBloom: Hex;
  logs: ChainLog[];
}

export interface LogQuery {
  addresses?: Address[];
  events?: AbiEvent[];
  fromBlock: bigint;
  toBlock: bigint;
}

export interface ChainReader {
  getBlockNumber(): Promise<bigint>;
  getBlock(blockNumber: bigint): Promise<ChainBlock | null>;
  getTransaction(hash: Hash): Promise<ChainTransaction | null>;
  getTransactionReceipt(hash: Hash): Promise<ChainReceipt | null>;
  getLogs(query: LogQuery): Promise<ChainLog[]>;
}

// ============================================
// viem-backed reader
// ============================================

async function orNull<T>(
  lookup: Promise<T>,
  notFound: (error: unknown) => boolean
): Promise<T | null> {
  try {
    return await lookup;
  } catch (error) {
    if (notFound(error)) return null;
    throw error;
  }
}

/**
 * Create a ChainReader over a viem public client
 */
export function createViemChainReader(client: PublicClient): ChainReader {
  return {
    getBlockNumber() {
      return client.getBlockNumber();
    },

    async getBlock(blockNumber) {
      const block = await orNull(
        client.getBlock({ blockNumber }),
        (error) => error instanceof ViemBlockNotFoundError
      );
      if (!block) return null;

      return {
        number: block.number,
        hash: block.hash,
        transactions: [...block.transactions],
        transactionsRoot: block.transactionsRoot,
      };
    },

    async getTransaction(hash) {
      const tx = await orNull(
        client.getTransaction({ hash }),
        (error) => error instanceof TransactionNotFoundError
      );
      if (!tx) return null;

      return {
        hash: tx.hash,
        from: tx.from,
        to: tx.to,
        nonce: tx.nonce,
        value: tx.value,
        input: tx.input,
        blockNumber: tx.blockNumber,
        transactionIndex: tx.transactionIndex,
      };
    },

    async getTransactionReceipt(hash) {
      const receipt = await orNull(
        client.getTransactionReceipt({ hash }),
        (error) => error instanceof TransactionReceiptNotFoundError
      );
      if (!receipt) return null;

      return {
        transactionHash: receipt.transactionHash,
        transactionIndex: receipt.transactionIndex,
        blockHash: receipt.blockHash,
        blockNumber: receipt.blockNumber,
        from: receipt.from,
        to: receipt.to,
        root: receipt.root,
        logsBloom: receipt.logsBloom,
        logs: receipt.logs,
      };
    },

    async getLogs({ addresses, events, fromBlock, toBlock }) {
      return client.getLogs({
        address: addresses && addresses.length > 0 ? addresses : undefined,
        events: events && events.length > 0 ? events : undefined,
        fromBlock,
        toBlock,
      });
    },
  };
}

// ============================================
// Helpers
// ============================================

/**
 * Full transactions of a block, in block order.
 * Hashes the node cannot resolve are skipped; an unknown block yields [].
 */
export async function getBlockTransactions(
  reader: ChainReader,
  blockNumber: bigint
): Promise<ChainTransaction[]> {
  const block = await reader.getBlock(blockNumber);
  if (!block) return [];

  const transactions: ChainTransaction[] = [];
  for (const hash of block.transactions) {
    const tx = await reader.getTransaction(hash);
    if (tx) {
      transactions.push(tx);
    }
  }
  return transactions;
}
