/**
 * Identifier-commitment mode
 *
 * Commits to a block's transaction hashes rather than full records. Each
 * leaf is the SHA-256 digest of a hash serialized as a JSON string; the
 * block's transactionsRoot is appended as one extra leaf. The tree hashes
 * these digests again with Keccak-256, and existing roots depend on that
 * double hashing.
 */

import type { Hash } from "viem";
import {
  LeafNotFoundError,
  buildMerkleTree,
  getMerkleProof,
  identifierDigest,
  toHex,
} from "@blockproof/merkle";
import type { ChainBlock } from "../integrations/chain/reader";

export interface HashCommitment {
  blockNumber: string;
  root: string;
  proof: string[];
  index: number;
  leafCount: number;
}

/**
 * Identifier list for a block: its transaction hashes, then transactionsRoot
 */
export function blockIdentifiers(block: ChainBlock): Hash[] {
  return [...block.transactions, block.transactionsRoot];
}

/**
 * Leaf blobs for a list of identifiers
 */
export function identifierLeaves(identifiers: readonly Hash[]): Buffer[] {
  return identifiers.map((id) => identifierDigest(id.toLowerCase()));
}

/**
 * Position of `target` in the identifier list (hex compared case-insensitively).
 * Position 0 when no target is given.
 */
export function findIdentifierIndex(identifiers: readonly Hash[], target?: Hash): number {
  if (target === undefined) return 0;

  const needle = target.toLowerCase();
  const index = identifiers.findIndex((id) => id.toLowerCase() === needle);
  if (index === -1) {
    throw new LeafNotFoundError(target);
  }
  return index;
}

/**
 * Root and proof over a block's transaction hashes
 */
export function buildHashCommitment(block: ChainBlock, txHash?: Hash): HashCommitment {
  const identifiers = blockIdentifiers(block);
  const index = findIdentifierIndex(identifiers, txHash);
  const tree = buildMerkleTree(identifierLeaves(identifiers));

  return {
    blockNumber: block.number.toString(),
    root: toHex(tree.root),
    proof: getMerkleProof(tree, index).map((p) => toHex(p)),
    index,
    leafCount: tree.leafCount,
  };
}
