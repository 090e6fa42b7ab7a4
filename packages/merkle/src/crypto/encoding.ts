/**
 * Hex and proof byte encodings
 */

import { DIGEST_LENGTH } from "../constants";
import { InvalidDigestError, InvalidHexError } from "../errors";
import type { Digest, LeafData, MerkleProof } from "../types";

const HEX_PATTERN = /^[0-9a-fA-F]*$/;

/**
 * Encode bytes as a 0x-prefixed lowercase hex string
 */
export function toHex(data: LeafData): `0x${string}` {
  return `0x${Buffer.from(data).toString("hex")}`;
}

/**
 * Decode a hex string, with or without the 0x prefix
 */
export function fromHex(hex: string): Buffer {
  const body = hex.startsWith("0x") || hex.startsWith("0X") ? hex.slice(2) : hex;
  if (body.length % 2 !== 0 || !HEX_PATTERN.test(body)) {
    throw new InvalidHexError(hex);
  }
  return Buffer.from(body, "hex");
}

/**
 * Concatenate proof digests without delimiters
 */
export function encodeProof(proof: MerkleProof): Buffer {
  return Buffer.concat(proof);
}

/**
 * Split a concatenated proof back into its digests
 */
export function decodeProof(bytes: LeafData): Digest[] {
  if (bytes.length % DIGEST_LENGTH !== 0) {
    throw new InvalidDigestError(bytes.length, `a multiple of ${DIGEST_LENGTH}`);
  }

  const data = Buffer.from(bytes);
  const proof: Digest[] = [];
  for (let offset = 0; offset < data.length; offset += DIGEST_LENGTH) {
    proof.push(Buffer.from(data.subarray(offset, offset + DIGEST_LENGTH)));
  }
  return proof;
}
