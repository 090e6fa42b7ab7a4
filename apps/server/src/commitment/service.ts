/**
 * Commitment Service
 *
 * Builds per-block Merkle commitments from chain data: receipts
 * (object-commitment mode) and transaction hashes (identifier-commitment
 * mode). Trees are rebuilt per call; nothing is cached or persisted.
 */

import type { Hash } from "viem";
import {
  LeafNotFoundError,
  buildMerkleTree,
  toHexProof,
  type HexMerkleProof,
  type MerkleTree,
} from "@blockproof/merkle";
import type { ChainBlock, ChainReader } from "../integrations/chain/reader";
import { BlockNotFoundError } from "../integrations/chain/errors";
import { logger } from "../utils/logger";
import { projectReceipt, serializeReceipt, type ReceiptRecord } from "./receipt";
import { buildHashCommitment, type HashCommitment } from "./identifiers";

export interface ReceiptTree {
  blockNumber: bigint;
  tree: MerkleTree;
  leaves: Buffer[];
  receipts: ReceiptRecord[];
}

export interface ReceiptProof extends HexMerkleProof {
  blockNumber: string;
  transactionIndex: number;
}

export class CommitmentService {
  constructor(private readonly reader: ChainReader) {}

  /**
   * Fetch a block or throw BlockNotFoundError
   */
  async getBlock(blockNumber: bigint): Promise<ChainBlock> {
    const block = await this.reader.getBlock(blockNumber);
    if (!block) {
      throw new BlockNotFoundError(blockNumber);
    }
    return block;
  }

  /**
   * Receipts of a block, projected, in transaction order.
   * Receipts the node does not return are skipped.
   */
  async getReceipts(block: ChainBlock): Promise<ReceiptRecord[]> {
    const receipts: ReceiptRecord[] = [];
    for (const hash of block.transactions) {
      const receipt = await this.reader.getTransactionReceipt(hash);
      if (receipt) {
        receipts.push(projectReceipt(receipt));
      } else {
        logger.warn(
          { blockNumber: block.number.toString(), txHash: hash },
          "Receipt missing, leaving it out of the commitment"
        );
      }
    }
    return receipts;
  }

  /**
   * Merkle tree over all receipts of a block
   */
  async buildReceiptTree(blockNumber: bigint): Promise<ReceiptTree> {
    const block = await this.getBlock(blockNumber);
    const receipts = await this.getReceipts(block);
    const leaves = receipts.map((record) => serializeReceipt(record));
    const tree = buildMerkleTree(leaves);

    logger.info(
      {
        blockNumber: blockNumber.toString(),
        leafCount: tree.leafCount,
        paddedLeafCount: tree.paddedLeafCount,
      },
      "Receipt tree built"
    );

    return { blockNumber, tree, leaves, receipts };
  }

  /**
   * Proof for the receipt with the given transaction index.
   * Without an index, the first receipt of the block.
   */
  async getReceiptProof(blockNumber: bigint, transactionIndex?: number): Promise<ReceiptProof> {
    const { tree, leaves, receipts } = await this.buildReceiptTree(blockNumber);

    let position = 0;
    if (transactionIndex !== undefined) {
      position = receipts.findIndex((record) => record.index === transactionIndex);
      if (position === -1) {
        throw new LeafNotFoundError(`transaction index ${transactionIndex}`);
      }
    }

    return {
      ...toHexProof(tree, leaves, position),
      blockNumber: blockNumber.toString(),
      transactionIndex: receipts[position].index,
    };
  }

  /**
   * Root and proof over the block's transaction hashes
   */
  async getHashProof(blockNumber: bigint, txHash?: Hash): Promise<HashCommitment> {
    const block = await this.getBlock(blockNumber);
    const commitment = buildHashCommitment(block, txHash);

    logger.info(
      { blockNumber: commitment.blockNumber, index: commitment.index, leafCount: commitment.leafCount },
      "Transaction hash commitment built"
    );

    return commitment;
  }
}
