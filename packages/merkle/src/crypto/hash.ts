/**
 * Hashing primitives
 */

import { keccak_256 } from "@noble/hashes/sha3";
import { sha256 } from "@noble/hashes/sha256";
import { DIGEST_LENGTH } from "../constants";
import { InvalidDigestError } from "../errors";
import type { Digest, LeafData } from "../types";

/**
 * Hash data using Keccak-256
 */
export function keccak256Hash(data: LeafData | string): Digest {
  const input = typeof data === "string" ? Buffer.from(data) : data;
  return Buffer.from(keccak_256(input));
}

/**
 * Hash data using SHA-256
 */
export function sha256Hash(data: LeafData | string): Digest {
  const input = typeof data === "string" ? Buffer.from(data) : data;
  return Buffer.from(sha256(input));
}

/**
 * Initial node value for a leaf blob
 */
export function leafDigest(blob: LeafData): Digest {
  return keccak256Hash(blob);
}

/**
 * Byte-lexicographic digest order
 */
export function compareDigests(a: LeafData, b: LeafData): number {
  return Buffer.compare(a, b);
}

/**
 * Order a pair so that the smaller digest comes first
 */
export function sortDigestPair(a: Digest, b: Digest): [Digest, Digest] {
  return compareDigests(a, b) < 0 ? [a, b] : [b, a];
}

/**
 * Encode an ordered pair as a 2-tuple: the compact JSON array of the two
 * digests' byte values, e.g. `[[1,2,...],[3,4,...]]`.
 */
export function serializeDigestPair(first: Digest, second: Digest): Buffer {
  return Buffer.from(JSON.stringify([Array.from(first), Array.from(second)]));
}

function assertDigest(value: Digest): void {
  if (value.length !== DIGEST_LENGTH) {
    throw new InvalidDigestError(value.length, `${DIGEST_LENGTH}`);
  }
}

/**
 * Combine two child digests into their parent.
 *
 * The pair is sorted before hashing, so `combine(a, b)` equals
 * `combine(b, a)`. Proofs therefore carry sibling values only, never a side.
 * Trees hashed in fixed left/right order produce different roots and are not
 * proof-compatible with this rule.
 */
export function combine(a: Digest, b: Digest): Digest {
  assertDigest(a);
  assertDigest(b);
  const [first, second] = sortDigestPair(a, b);
  return keccak256Hash(serializeDigestPair(first, second));
}

/**
 * SHA-256 of an identifier serialized as a JSON string (quotes included).
 * Leaf sources use it to commit to identifiers rather than full records.
 */
export function identifierDigest(identifier: string): Digest {
  return sha256Hash(JSON.stringify(identifier));
}
