/**
 * In-memory claim journal, used when no database is configured
 */

import type { Logger } from "../utils/logger";
import { errorMessage } from "./errors";
import type {
  AuditEntry,
  ClaimEntry,
  ClaimHistory,
  ClaimJournal,
  SettlementEntry,
} from "./types";

const claimKey = (jobId: bigint, claimId: bigint) => `${jobId}:${claimId}`;

export class MemoryClaimJournal implements ClaimJournal {
  private readonly claims = new Map<string, ClaimHistory>();
  private readonly orphanAudits = new Map<string, AuditEntry[]>();

  async recordClaim(entry: ClaimEntry): Promise<void> {
    const key = claimKey(entry.jobId, entry.claimId);
    this.claims.set(key, {
      ...entry,
      status: "committed",
      audits: this.orphanAudits.get(key) ?? [],
    });
    this.orphanAudits.delete(key);
  }

  async recordAudit(entry: AuditEntry): Promise<void> {
    const key = claimKey(entry.jobId, entry.claimId);
    const claim = this.claims.get(key);
    if (claim) {
      claim.audits.push(entry);
      return;
    }
    const orphans = this.orphanAudits.get(key) ?? [];
    orphans.push(entry);
    this.orphanAudits.set(key, orphans);
  }

  async recordSettlement(entry: SettlementEntry): Promise<void> {
    const claim = this.claims.get(claimKey(entry.jobId, entry.claimId));
    if (!claim) {
      return;
    }
    claim.status = entry.status === "settled" ? "settled" : "failed";
    claim.settlementTxHash = entry.txHash;
    claim.error = entry.error;
  }

  async listClaims(jobId: bigint): Promise<ClaimHistory[]> {
    return [...this.claims.values()]
      .filter((claim) => claim.jobId === jobId)
      .sort((a, b) => (a.claimId < b.claimId ? -1 : a.claimId > b.claimId ? 1 : 0));
  }

  async ping(): Promise<void> {}
}

/**
 * Journal writes never fail the work they describe; a failed write is logged.
 */
export async function recordSafely(
  log: Logger,
  kind: string,
  write: () => Promise<void>
): Promise<void> {
  try {
    await write();
  } catch (error) {
    log.error({ err: error, kind, reason: errorMessage(error) }, "Failed to write claim journal");
  }
}
