import { z } from "zod";
import { getAddress, isAddress } from "viem";

function splitList(separator: string) {
  return (value: string | undefined): string[] =>
    (value ?? "")
      .split(separator)
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
}

const envSchema = z.object({
  // Chain
  RPC_URL: z.string().url().default("http://127.0.0.1:8545"),
  CHAIN_ID: z.coerce.number().int().positive().default(1),
  CHAIN_NAME: z.string().min(1).default("Ethereum"),

  // Event log scanning (disabled when no addresses are watched)
  START_BLOCK: z.coerce.bigint().nonnegative().default(0n),
  WATCH_ADDRESSES: z
    .string()
    .optional()
    .transform(splitList(","))
    .pipe(
      z.array(
        z
          .string()
          .refine((value) => isAddress(value), "Must be a 0x-prefixed address")
          .transform((value) => getAddress(value))
      )
    ),
  // Human-readable event signatures, separated by ";"
  // e.g. "event Transfer(address indexed from, address indexed to, uint256 value)"
  WATCH_EVENTS: z.string().optional().transform(splitList(";")),
  LOG_WINDOW_SIZE: z.coerce.bigint().positive().default(50_000n),
  CONFIRMATION_GAP: z.coerce.bigint().nonnegative().default(3n),
  SYNC_IDLE_MS: z.coerce.number().int().nonnegative().default(10_000),
  SYNC_RETRY_MS: z.coerce.number().int().nonnegative().default(5_000),

  // Server
  PORT: z.coerce.number().default(3001),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  FRONTEND_URL: z.string().url().optional(),
});

export function loadEnv(source: NodeJS.ProcessEnv = process.env) {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error("Environment validation failed:");
    console.error(result.error.format());
    throw new Error("Invalid environment configuration");
  }

  return result.data;
}

export const env = loadEnv();
export type Env = z.infer<typeof envSchema>;
