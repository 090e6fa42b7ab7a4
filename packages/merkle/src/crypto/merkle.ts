/**
 * Merkle tree implementation for ordered leaf commitments
 */

import { DIGEST_LENGTH } from "../constants";
import {
  EmptyLeafSetError,
  InvalidHexError,
  InvalidProofError,
  LeafIndexOutOfRangeError,
  LeafSetMismatchError,
} from "../errors";
import type {
  Digest,
  HexMerkleProof,
  LeafData,
  MerkleProof,
  MerkleTree,
} from "../types";
import { combine, leafDigest } from "./hash";
import { fromHex, toHex } from "./encoding";

/**
 * Smallest power of two >= leafCount
 */
export function paddedLeafCount(leafCount: number): number {
  if (leafCount < 1) {
    throw new EmptyLeafSetError();
  }

  let target = 1;
  while (target < leafCount) {
    target *= 2;
  }
  return target;
}

/** Heap slot holding leaf `index` in a tree of `padded` leaves */
export function leafPosition(index: number, padded: number): number {
  return padded - 1 + index;
}

/** Sibling slot of a non-root node */
export function siblingIndex(v: number): number {
  return v % 2 === 0 ? v - 1 : v + 1;
}

/** Parent slot of a non-root node */
export function parentIndex(v: number): number {
  return (v - 1) >> 1;
}

function extractProof(nodes: readonly Digest[], position: number): MerkleProof {
  const proof: Digest[] = [];
  let v = position;

  while (v > 0) {
    proof.push(Buffer.from(nodes[siblingIndex(v)]));
    v = parentIndex(v);
  }

  return Object.freeze(proof);
}

/**
 * Build a Merkle tree over an ordered list of leaf blobs.
 *
 * Leaves are padded with empty blobs up to the next power of two. Proofs are
 * returned for the original leaves only, in input order.
 */
export function buildMerkleTree(leaves: readonly LeafData[]): MerkleTree {
  if (leaves.length === 0) {
    throw new EmptyLeafSetError();
  }

  const padded = paddedLeafCount(leaves.length);
  const internal = padded - 1;
  const nodes: Digest[] = new Array<Digest>(internal + padded);

  for (let j = 0; j < padded; j++) {
    nodes[internal + j] = leafDigest(j < leaves.length ? leaves[j] : Buffer.alloc(0));
  }

  // Children sit at higher indices, so walking down fills them first
  for (let i = internal - 1; i >= 0; i--) {
    nodes[i] = combine(nodes[2 * i + 1], nodes[2 * i + 2]);
  }

  const proofs: MerkleProof[] = [];
  for (let i = 0; i < leaves.length; i++) {
    proofs.push(extractProof(nodes, leafPosition(i, padded)));
  }

  // Root and proof digests are copies; no Buffer is shared with `nodes`
  return Object.freeze({
    root: Buffer.from(nodes[0]),
    proofs: Object.freeze(proofs),
    nodes: Object.freeze(nodes),
    leafCount: leaves.length,
    paddedLeafCount: padded,
  });
}

/**
 * Get a private copy of the proof for a specific leaf index
 */
export function getMerkleProof(tree: MerkleTree, index: number): Digest[] {
  if (!Number.isInteger(index) || index < 0 || index >= tree.leafCount) {
    throw new LeafIndexOutOfRangeError(index, tree.leafCount);
  }
  return tree.proofs[index].map((digest) => Buffer.from(digest));
}

/**
 * Verify that a leaf blob and proof reproduce the root.
 *
 * A mismatch, or a malformed sibling or root, is `false` rather than an error.
 */
export function verifyMerkleProof(
  leaf: LeafData,
  proof: readonly Digest[],
  root: Digest
): boolean {
  if (root.length !== DIGEST_LENGTH) {
    return false;
  }

  let current = leafDigest(leaf);
  for (const sibling of proof) {
    if (sibling.length !== DIGEST_LENGTH) {
      return false;
    }
    current = combine(current, sibling);
  }

  return current.equals(root);
}

/**
 * Verify a Merkle proof and throw if invalid
 */
export function assertValidProof(
  leaf: LeafData,
  proof: readonly Digest[],
  root: Digest
): void {
  if (!verifyMerkleProof(leaf, proof, root)) {
    throw new InvalidProofError(toHex(root));
  }
}

/**
 * Get the Merkle root as a 0x-prefixed hex string
 */
export function getMerkleRoot(tree: MerkleTree): string {
  return toHex(tree.root);
}

/**
 * JSON-safe proof for one leaf of a tree built from `leaves`
 */
export function toHexProof(
  tree: MerkleTree,
  leaves: readonly LeafData[],
  index: number
): HexMerkleProof {
  if (leaves.length !== tree.leafCount) {
    throw new LeafSetMismatchError(tree.leafCount, leaves.length);
  }

  const proof = getMerkleProof(tree, index);
  return {
    leaf: toHex(leaves[index]),
    proof: proof.map((p) => toHex(p)),
    root: toHex(tree.root),
    index,
  };
}

/**
 * Verify a JSON-safe proof. Malformed hex is a failed verification.
 */
export function verifyHexProof(proof: HexMerkleProof): boolean {
  try {
    return verifyMerkleProof(
      fromHex(proof.leaf),
      proof.proof.map((p) => fromHex(p)),
      fromHex(proof.root)
    );
  } catch (error) {
    if (error instanceof InvalidHexError) {
      return false;
    }
    throw error;
  }
}
