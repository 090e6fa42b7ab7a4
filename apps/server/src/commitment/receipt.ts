/**
 * Receipt projection
 *
 * Canonical byte form of a transaction receipt, used as the leaf blob in
 * object-commitment mode. Field order is fixed and every hex value is
 * lowercased, so the same receipt always serializes to the same bytes.
 */

import { numberToHex, type Address, type Hash, type Hex } from "viem";
import { ZERO_DIGEST_HEX } from "@blockproof/merkle";
import type { ChainLog, ChainReceipt } from "../integrations/chain/reader";

export interface ReceiptRecord {
  txHash: Hash;
  index: number;
  logs: string[];
  from: Address;
  to: Address | null;
  blockHash: Hash;
  root: Hash;
  logsBloom: Hex;
}

function lower(value: Hex): Hex {
  return `0x${value.slice(2).toLowerCase()}`;
}

function quantity(value: bigint | number | null): Hex | null {
  return value === null ? null : numberToHex(value);
}

/**
 * Canonical JSON for one log entry
 */
export function serializeLog(log: ChainLog): string {
  return JSON.stringify({
    address: lower(log.address),
    topics: log.topics.map((topic) => lower(topic)),
    data: lower(log.data),
    blockHash: log.blockHash === null ? null : lower(log.blockHash),
    blockNumber: quantity(log.blockNumber),
    transactionHash: log.transactionHash === null ? null : lower(log.transactionHash),
    transactionIndex: quantity(log.transactionIndex),
    logIndex: quantity(log.logIndex),
    removed: log.removed,
  });
}

/**
 * Project a receipt onto the committed fields
 */
export function projectReceipt(receipt: ChainReceipt): ReceiptRecord {
  return {
    txHash: lower(receipt.transactionHash),
    index: receipt.transactionIndex,
    logs: receipt.logs.map((log) => serializeLog(log)),
    from: lower(receipt.from),
    to: receipt.to === null ? null : lower(receipt.to),
    blockHash: lower(receipt.blockHash),
    root: receipt.root ? lower(receipt.root) : ZERO_DIGEST_HEX,
    logsBloom: lower(receipt.logsBloom),
  };
}

/**
 * Leaf blob for a projected receipt: UTF-8 of its compact JSON
 */
export function serializeReceipt(record: ReceiptRecord): Buffer {
  return Buffer.from(
    JSON.stringify({
      txHash: record.txHash,
      index: record.index,
      logs: record.logs,
      from: record.from,
      to: record.to,
      blockHash: record.blockHash,
      root: record.root,
      logsBloom: record.logsBloom,
    })
  );
}
