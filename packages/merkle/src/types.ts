/**
 * Core types for the Merkle tree engine
 */

/** 32-byte hash output */
export type Digest = Buffer;

/** Raw leaf blob, any length (empty included) */
export type LeafData = Buffer | Uint8Array;

/** Sibling digests, ordered leaf-to-root */
export type MerkleProof = readonly Digest[];

/**
 * Complete binary tree in heap layout.
 *
 * `nodes[0]` is the root, the children of `i` sit at `2i + 1` and `2i + 2`,
 * and the last `paddedLeafCount` slots hold the leaf digests.
 */
export interface MerkleTree {
  readonly root: Digest;
  readonly proofs: readonly MerkleProof[];
  readonly nodes: readonly Digest[];
  readonly leafCount: number;
  readonly paddedLeafCount: number;
}

/** JSON-safe proof for a single leaf (0x-prefixed hex) */
export interface HexMerkleProof {
  leaf: string;
  proof: string[];
  root: string;
  index: number;
}
