/**
 * Postgres claim journal
 *
 * Persists claims, audits and settlement outcomes so history survives
 * restarts of the worker.
 */

import { and, eq, sql } from "drizzle-orm";
import { isHex, type Hex } from "viem";
import type {
  AuditEntry,
  ClaimEntry,
  ClaimHistory,
  ClaimJournal,
  ClaimStatus,
  SettlementEntry,
} from "../claims/types";
import type { DB } from "./client";
import { audits, claims, type AuditRow, type ClaimRow } from "./schema";

const CLAIM_STATUSES: readonly ClaimStatus[] = ["committed", "settled", "failed"];
const AUDIT_STATUSES: readonly AuditEntry["status"][] = ["submitted", "failed"];

function parseHex(value: string, column: string): Hex {
  if (!isHex(value)) {
    throw new Error(`Column ${column} holds non-hex value ${value}`);
  }
  return value;
}

function parseOptionalHex(value: string | null, column: string): Hex | undefined {
  return value === null ? undefined : parseHex(value, column);
}

function parseStatus<T extends string>(value: string, allowed: readonly T[]): T {
  const status = allowed.find((s) => s === value);
  if (status === undefined) {
    throw new Error(`Unexpected status ${value}`);
  }
  return status;
}

function toAuditEntry(row: AuditRow): AuditEntry {
  return {
    jobId: BigInt(row.jobId),
    claimId: BigInt(row.claimId),
    seqNo: row.seqNo,
    status: parseStatus(row.status, AUDIT_STATUSES),
    storageAddress: row.storageAddress ?? undefined,
    txHash: parseOptionalHex(row.txHash, "audits.tx_hash"),
    error: row.error ?? undefined,
  };
}

function toClaimHistory(row: ClaimRow, auditRows: AuditRow[]): ClaimHistory {
  return {
    jobId: BigInt(row.jobId),
    claimId: BigInt(row.claimId),
    range: [row.rangeStart, row.rangeEnd],
    root: parseHex(row.root, "claims.root"),
    claimBlock: BigInt(row.claimBlock),
    txHash: parseHex(row.txHash, "claims.tx_hash"),
    status: parseStatus(row.status, CLAIM_STATUSES),
    audits: auditRows.filter((a) => a.claimId === row.claimId).map(toAuditEntry),
    settlementTxHash: parseOptionalHex(row.settlementTxHash, "claims.settlement_tx_hash"),
    error: row.error ?? undefined,
  };
}

export class DrizzleClaimJournal implements ClaimJournal {
  constructor(private readonly db: DB) {}

  async recordClaim(entry: ClaimEntry): Promise<void> {
    await this.db
      .insert(claims)
      .values({
        jobId: entry.jobId.toString(),
        claimId: entry.claimId.toString(),
        rangeStart: entry.range[0],
        rangeEnd: entry.range[1],
        root: entry.root,
        claimBlock: entry.claimBlock.toString(),
        txHash: entry.txHash,
      })
      .onConflictDoNothing();
  }

  async recordAudit(entry: AuditEntry): Promise<void> {
    await this.db.insert(audits).values({
      jobId: entry.jobId.toString(),
      claimId: entry.claimId.toString(),
      seqNo: entry.seqNo,
      status: entry.status,
      storageAddress: entry.storageAddress,
      txHash: entry.txHash,
      error: entry.error,
    });
  }

  async recordSettlement(entry: SettlementEntry): Promise<void> {
    await this.db
      .update(claims)
      .set({
        status: entry.status,
        settlementTxHash: entry.txHash ?? null,
        error: entry.error ?? null,
        updatedAt: new Date(),
      })
      .where(
        and(
          eq(claims.jobId, entry.jobId.toString()),
          eq(claims.claimId, entry.claimId.toString())
        )
      );
  }

  async listClaims(jobId: bigint): Promise<ClaimHistory[]> {
    const key = jobId.toString();
    const claimRows = await this.db.select().from(claims).where(eq(claims.jobId, key));
    const auditRows = await this.db.select().from(audits).where(eq(audits.jobId, key));

    return claimRows
      .map((row) => toClaimHistory(row, auditRows))
      .sort((a, b) => (a.claimId < b.claimId ? -1 : a.claimId > b.claimId ? 1 : 0));
  }

  async ping(): Promise<void> {
    await this.db.execute(sql`select 1`);
  }
}
