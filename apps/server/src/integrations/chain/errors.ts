/**
 * Error classes for chain access
 */

/** Base error class */
export class ChainError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ChainError";
  }
}

/** Block unknown to the node */
export class BlockNotFoundError extends ChainError {
  constructor(blockNumber: bigint) {
    super(`Block not found: ${blockNumber}`, "BLOCK_NOT_FOUND", {
      blockNumber: blockNumber.toString(),
    });
    this.name = "BlockNotFoundError";
  }
}
