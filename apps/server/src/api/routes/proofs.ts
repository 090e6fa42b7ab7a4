/**
 * Proof Verification Routes
 */

import { Hono } from "hono";
import { z } from "zod";
import { fromHex, verifyMerkleProof } from "@blockproof/merkle";
import { logger } from "../../utils/logger";

const hexSchema = z.string().regex(/^0x([0-9a-fA-F]{2})*$/, "Must be 0x-prefixed hex");
const digestSchema = z.string().regex(/^0x[0-9a-fA-F]{64}$/, "Must be a 32-byte 0x-prefixed digest");

const verifyBodySchema = z.object({
  leaf: hexSchema,
  proof: z.array(digestSchema),
  root: digestSchema,
});

const proofs = new Hono();

/**
 * POST /api/proofs/verify
 *
 * Body: { leaf, proof, root } as hex. A proof that does not reproduce the
 * root is `{ valid: false }`, not an error.
 */
proofs.post("/verify", async (c) => {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return c.json({ error: "Request body must be JSON" }, 400);
  }

  const parsed = verifyBodySchema.safeParse(body);
  if (!parsed.success) {
    return c.json({ error: parsed.error.issues[0].message }, 400);
  }

  const { leaf, proof, root } = parsed.data;
  const valid = verifyMerkleProof(
    fromHex(leaf),
    proof.map((sibling) => fromHex(sibling)),
    fromHex(root)
  );

  logger.debug({ root, proofLength: proof.length, valid }, "Proof verification requested");

  return c.json({ valid });
});

export default proofs;
