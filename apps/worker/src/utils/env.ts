import { isAddress, type Address, type Hex } from "viem";
import { z } from "zod";

const address = z.string().refine((value): value is Address => isAddress(value), "Must be an address");

const privateKey = z
  .string()
  .refine((value): value is Hex => /^0x[0-9a-fA-F]{64}$/.test(value), "Must be a 32-byte hex key");

const blockCount = z
  .string()
  .regex(/^\d+$/, "Must be a non-negative integer")
  .transform((value) => BigInt(value));

export const envSchema = z.object({
  // Chain
  RPC_URL: z.string().url().default("http://127.0.0.1:8545"),
  CHAIN_ID: z.coerce.number().int().positive().default(31337),
  JOBS_MANAGER_ADDRESS: address,

  // Worker account that signs claims, audits and settlements
  WORKER_PRIVATE_KEY: privateKey,

  // Remote call bounds
  RPC_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  BLOCK_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(2_000),
  CONFIRMATION_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),

  // Claim protocol
  CLAIM_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  FIRST_CLAIM_DEADLINE_BLOCKS: blockCount.default("230"),

  // IPFS (audit payload disclosure)
  IPFS_API_URL: z.string().url().default("http://127.0.0.1:5001"),

  // Claim journal (in-memory when unset)
  DATABASE_URL: z.string().url().optional(),

  // Server
  PORT: z.coerce.number().default(3001),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  FRONTEND_URL: z.string().url().optional(),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error("Environment validation failed:");
    console.error(result.error.format());
    throw new Error("Invalid environment configuration");
  }

  return result.data;
}
