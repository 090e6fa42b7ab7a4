/**
 * Block Commitment Routes
 *
 * Receipt roots and proofs, and transaction-hash proofs, per block.
 */

import { Hono } from "hono";
import { z } from "zod";
import { getMerkleRoot } from "@blockproof/merkle";
import type { CommitmentService } from "../../commitment/service";

const blockNumberSchema = z
  .string()
  .regex(/^\d+$/, "Block number must be a non-negative integer")
  .transform((value) => BigInt(value));

const receiptProofQuerySchema = z.object({
  index: z.coerce.number().int().nonnegative().optional(),
});

const hashProofQuerySchema = z.object({
  tx: z
    .string()
    .regex(/^0x[0-9a-fA-F]{64}$/, "tx must be a 32-byte 0x-prefixed hash")
    .transform((value): `0x${string}` => `0x${value.slice(2)}`)
    .optional(),
});

export function createBlockRoutes(service: CommitmentService): Hono {
  const blocks = new Hono();

  /**
   * GET /api/blocks/:number/receipts/root
   */
  blocks.get("/:number/receipts/root", async (c) => {
    const blockNumber = blockNumberSchema.safeParse(c.req.param("number"));
    if (!blockNumber.success) {
      return c.json({ error: blockNumber.error.issues[0].message }, 400);
    }

    const { tree } = await service.buildReceiptTree(blockNumber.data);
    return c.json({
      blockNumber: blockNumber.data.toString(),
      root: getMerkleRoot(tree),
      leafCount: tree.leafCount,
      paddedLeafCount: tree.paddedLeafCount,
    });
  });

  /**
   * GET /api/blocks/:number/receipts/proof?index=N
   *
   * N is the transaction index within the block; the first receipt when omitted.
   */
  blocks.get("/:number/receipts/proof", async (c) => {
    const blockNumber = blockNumberSchema.safeParse(c.req.param("number"));
    if (!blockNumber.success) {
      return c.json({ error: blockNumber.error.issues[0].message }, 400);
    }

    const query = receiptProofQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json({ error: query.error.issues[0].message }, 400);
    }

    const proof = await service.getReceiptProof(blockNumber.data, query.data.index);
    return c.json(proof);
  });

  /**
   * GET /api/blocks/:number/hashes/proof?tx=0x...
   *
   * Proof over the block's transaction hashes (plus its transactionsRoot).
   */
  blocks.get("/:number/hashes/proof", async (c) => {
    const blockNumber = blockNumberSchema.safeParse(c.req.param("number"));
    if (!blockNumber.success) {
      return c.json({ error: blockNumber.error.issues[0].message }, 400);
    }

    const query = hashProofQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json({ error: query.error.issues[0].message }, 400);
    }

    const commitment = await service.getHashProof(blockNumber.data, query.data.tx);
    return c.json(commitment);
  });

  return blocks;
}
