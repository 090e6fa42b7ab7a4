/**
 * Error classes for the Merkle tree engine
 */

/** Base error class */
export class MerkleError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "MerkleError";
  }
}

/** Tree requested over zero leaves */
export class EmptyLeafSetError extends MerkleError {
  constructor() {
    super("Cannot build Merkle tree from empty leaf set", "EMPTY_LEAF_SET");
    this.name = "EmptyLeafSetError";
  }
}

/** Proof requested for a leaf the tree does not have */
export class LeafIndexOutOfRangeError extends MerkleError {
  constructor(index: number, leafCount: number) {
    super(
      `Invalid leaf index: ${index}. Must be between 0 and ${leafCount - 1}`,
      "LEAF_INDEX_OUT_OF_RANGE",
      { index, leafCount }
    );
    this.name = "LeafIndexOutOfRangeError";
  }
}

/** Identifier not present in a leaf list */
export class LeafNotFoundError extends MerkleError {
  constructor(identifier: string) {
    super(`Leaf not found: ${identifier}`, "LEAF_NOT_FOUND", { identifier });
    this.name = "LeafNotFoundError";
  }
}

/** Leaf list handed alongside a tree that was built from a different one */
export class LeafSetMismatchError extends MerkleError {
  constructor(expected: number, actual: number) {
    super(
      `Leaf list has ${actual} entries, tree was built from ${expected}`,
      "LEAF_SET_MISMATCH",
      { expected, actual }
    );
    this.name = "LeafSetMismatchError";
  }
}

/** Digest (or digest stream) of the wrong width */
export class InvalidDigestError extends MerkleError {
  constructor(length: number, expected: string) {
    super(
      `Invalid digest length: ${length} bytes, expected ${expected}`,
      "INVALID_DIGEST",
      { length }
    );
    this.name = "InvalidDigestError";
  }
}

/** Malformed hex string */
export class InvalidHexError extends MerkleError {
  constructor(value: string) {
    super(`Invalid hex string: ${value}`, "INVALID_HEX", { value });
    this.name = "InvalidHexError";
  }
}

/** Proof does not reproduce the root */
export class InvalidProofError extends MerkleError {
  constructor(root: string) {
    super(`Invalid Merkle proof for root ${root}`, "INVALID_PROOF", { root });
    this.name = "InvalidProofError";
  }
}
