/**
 * Constants for the Merkle tree engine
 */

/** Digest length in bytes (Keccak-256 / SHA-256) */
export const DIGEST_LENGTH = 32;

/** All-zero digest, reported where a record carries no hash */
export const ZERO_DIGEST_HEX: `0x${string}` = `0x${"00".repeat(DIGEST_LENGTH)}`;
