import {
  pgTable,
  text,
  serial,
  timestamp,
  bigint,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";

/**
 * Claims - one row per claim accepted on-chain
 */
export const claims = pgTable(
  "claims",
  {
    id: serial("id").primaryKey(),
    jobId: text("job_id").notNull(),
    claimId: text("claim_id").notNull(),
    rangeStart: bigint("range_start", { mode: "number" }).notNull(),
    rangeEnd: bigint("range_end", { mode: "number" }).notNull(),
    root: text("root").notNull(),
    claimBlock: text("claim_block").notNull(),
    txHash: text("tx_hash").notNull(),
    status: text("status").notNull().default("committed"), // 'committed' | 'settled' | 'failed'
    settlementTxHash: text("settlement_tx_hash"),
    error: text("error"),
    createdAt: timestamp("created_at").defaultNow(),
    updatedAt: timestamp("updated_at").defaultNow(),
  },
  (table) => ({
    jobClaimIdx: uniqueIndex("idx_claims_job_claim").on(table.jobId, table.claimId),
  })
);

/**
 * Audits - one row per segment challenged within a claim
 */
export const audits = pgTable(
  "audits",
  {
    id: serial("id").primaryKey(),
    jobId: text("job_id").notNull(),
    claimId: text("claim_id").notNull(),
    seqNo: bigint("seq_no", { mode: "number" }).notNull(),
    status: text("status").notNull(), // 'submitted' | 'failed'
    storageAddress: text("storage_address"),
    txHash: text("tx_hash"),
    error: text("error"),
    createdAt: timestamp("created_at").defaultNow(),
  },
  (table) => ({
    jobClaimIdx: index("idx_audits_job_claim").on(table.jobId, table.claimId),
  })
);

export type ClaimRow = typeof claims.$inferSelect;
export type AuditRow = typeof audits.$inferSelect;
