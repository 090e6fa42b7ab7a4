/**
 * Test Helpers
 *
 * Mock factories and an in-memory chain reader, so tests never reach a node.
 */

import type { Address, Hash } from "viem";
import type {
  ChainBlock,
  ChainLog,
  ChainReader,
  ChainReceipt,
  ChainTransaction,
  LogQuery,
} from "../src/integrations/chain/reader";

// ============================================
// Values
// ============================================

export const hash = (n: number): Hash => `0x${n.toString(16).padStart(64, "0")}`;

export const address = (n: number): Address => `0x${n.toString(16).padStart(40, "0")}`;

export const EMPTY_BLOOM: Hash = `0x${"00".repeat(256)}`;

// ============================================
// Factories
// ============================================

export function createMockLog(overrides: Partial<ChainLog> = {}): ChainLog {
  return {
    address: address(0xaa),
    topics: [hash(0x10)],
    data: "0x",
    blockNumber: 1n,
    blockHash: hash(0xb1),
    transactionHash: hash(1),
    transactionIndex: 0,
    logIndex: 0,
    removed: false,
    ...overrides,
  };
}

export function createMockReceipt(overrides: Partial<ChainReceipt> = {}): ChainReceipt {
  return {
    transactionHash: hash(1),
    transactionIndex: 0,
    blockHash: hash(0xb1),
    blockNumber: 1n,
    from: address(1),
    to: address(2),
    logsBloom: EMPTY_BLOOM,
    logs: [],
    ...overrides,
  };
}

export function createMockTransaction(overrides: Partial<ChainTransaction> = {}): ChainTransaction {
  return {
    hash: hash(1),
    from: address(1),
    to: address(2),
    nonce: 0,
    value: 0n,
    input: "0x",
    blockNumber: 1n,
    transactionIndex: 0,
    ...overrides,
  };
}

// ============================================
// In-memory chain
// ============================================

export class InMemoryChainReader implements ChainReader {
  latest = 0n;
  readonly blocks = new Map<bigint, ChainBlock>();
  readonly transactions = new Map<Hash, ChainTransaction>();
  readonly receipts = new Map<Hash, ChainReceipt>();
  readonly logs: ChainLog[] = [];
  readonly logQueries: LogQuery[] = [];
  failNext: Error | null = null;

  private takeFailure(): void {
    if (this.failNext) {
      const error = this.failNext;
      this.failNext = null;
      throw error;
    }
  }

  async getBlockNumber(): Promise<bigint> {
    this.takeFailure();
    return this.latest;
  }

  async getBlock(blockNumber: bigint): Promise<ChainBlock | null> {
    return this.blocks.get(blockNumber) ?? null;
  }

  async getTransaction(txHash: Hash): Promise<ChainTransaction | null> {
    return this.transactions.get(txHash) ?? null;
  }

  async getTransactionReceipt(txHash: Hash): Promise<ChainReceipt | null> {
    return this.receipts.get(txHash) ?? null;
  }

  async getLogs(query: LogQuery): Promise<ChainLog[]> {
    this.takeFailure();
    this.logQueries.push(query);
    return this.logs.filter(
      (log) =>
        log.blockNumber !== null &&
        log.blockNumber >= query.fromBlock &&
        log.blockNumber <= query.toBlock
    );
  }

  /**
   * Add a block whose transactions all have receipts.
   * Transaction hashes are hash(blockNumber * 1000 + i).
   */
  addBlock(blockNumber: bigint, txCount: number): ChainBlock {
    const transactions: Hash[] = [];
    const blockHash = hash(Number(blockNumber) * 1000 + 999);

    for (let i = 0; i < txCount; i++) {
      const txHash = hash(Number(blockNumber) * 1000 + i);
      transactions.push(txHash);
      this.transactions.set(
        txHash,
        createMockTransaction({ hash: txHash, blockNumber, transactionIndex: i, nonce: i })
      );
      this.receipts.set(
        txHash,
        createMockReceipt({
          transactionHash: txHash,
          transactionIndex: i,
          blockHash,
          blockNumber,
        })
      );
    }

    const block: ChainBlock = {
      number: blockNumber,
      hash: blockHash,
      transactions,
      transactionsRoot: hash(Number(blockNumber) * 1000 + 998),
    };
    this.blocks.set(blockNumber, block);
    if (blockNumber > this.latest) {
      this.latest = blockNumber;
    }
    return block;
  }
}
