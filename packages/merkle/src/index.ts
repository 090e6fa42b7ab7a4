/**
 * @blockproof/merkle
 * Binary Merkle tree engine: build, prove, verify
 */

export * from "./crypto/hash";
export * from "./crypto/merkle";
export * from "./crypto/encoding";
export * from "./constants";
export * from "./types";
export * from "./errors";
