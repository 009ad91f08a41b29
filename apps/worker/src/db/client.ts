import { sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema";
import { logger } from "../utils/logger";

/**
 * Open the claim journal database
 */
export function createDatabase(databaseUrl: string) {
  const client = postgres(databaseUrl, { max: 5 });
  const db = drizzle(client, { schema });
  logger.info("Database initialized");
  return { db, client };
}

export type DB = ReturnType<typeof createDatabase>["db"];

const MIGRATIONS = [
  `CREATE TABLE IF NOT EXISTS claims (
    id SERIAL PRIMARY KEY,
    job_id TEXT NOT NULL,
    claim_id TEXT NOT NULL,
    range_start BIGINT NOT NULL,
    range_end BIGINT NOT NULL,
    root TEXT NOT NULL,
    claim_block TEXT NOT NULL,
    tx_hash TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'committed',
    settlement_tx_hash TEXT,
    error TEXT,
    created_at TIMESTAMP DEFAULT NOW(),
    updated_at TIMESTAMP DEFAULT NOW()
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_claims_job_claim ON claims(job_id, claim_id)`,
  `CREATE TABLE IF NOT EXISTS audits (
    id SERIAL PRIMARY KEY,
    job_id TEXT NOT NULL,
    claim_id TEXT NOT NULL,
    seq_no BIGINT NOT NULL,
    status TEXT NOT NULL,
    storage_address TEXT,
    tx_hash TEXT,
    error TEXT,
    created_at TIMESTAMP DEFAULT NOW()
  )`,
  `CREATE INDEX IF NOT EXISTS idx_audits_job_claim ON audits(job_id, claim_id)`,
];

// Initialize tables (simple migration for development)
export async function initializeDatabase(db: DB): Promise<void> {
  logger.info("Initializing database tables...");

  for (const statement of MIGRATIONS) {
    await db.execute(sql.raw(statement));
  }

  logger.info("Database tables initialized");
}
