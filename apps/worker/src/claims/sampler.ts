/**
 * Audit Sampler
 *
 * Picks the committed segments that must be proven on-chain. Selection is
 * keyed on the hash of the block after the claim block, which does not
 * exist when the claim is submitted.
 */

import { concat, hexToBigInt, keccak256, numberToHex, type Hex } from "viem";
import { errorMessage } from "./errors";
import { recordSafely } from "./journal";
import type { ClaimTaskContext } from "./tasks";
import type { AuditableSegment, CommittedClaim, Ledger, SegmentRange } from "./types";

export interface AuditOutcome {
  seqNo: number;
  status: "submitted" | "failed";
  storageAddress?: string;
  txHash?: Hex;
  error?: string;
}

/**
 * A segment is audited iff
 * keccak256(pad32(claimBlock + 1) ‖ blockHash(claimBlock + 1) ‖ pad32(seqNo)) mod verifyRate == 0.
 * A rate of zero disables audits.
 */
export function shouldAuditSegment(
  seqNo: number,
  range: SegmentRange,
  claimBlock: bigint,
  plusOneBlockHash: Hex,
  verifyRate: bigint
): boolean {
  if (seqNo < range[0] || seqNo > range[1]) {
    return false;
  }
  if (verifyRate <= 0n) {
    return false;
  }

  const digest = keccak256(
    concat([
      numberToHex(claimBlock + 1n, { size: 32 }),
      plusOneBlockHash,
      numberToHex(BigInt(seqNo), { size: 32 }),
    ])
  );

  return hexToBigInt(digest) % verifyRate === 0n;
}

/**
 * Resolve once `target` has been mined
 */
export async function waitForBlock(
  ledger: Ledger,
  target: bigint,
  rpcTimeoutMs: number
): Promise<void> {
  const height = await ledger.currentHeight();
  if (height < target) {
    await ledger.waitForBlocks(target - height, rpcTimeoutMs);
  }
}

/**
 * Wait for the block after the claim, then challenge every sampled segment.
 * Each segment's audit is independent: one failure does not stop the rest.
 */
export async function runAuditSampling(
  claim: CommittedClaim,
  ctx: ClaimTaskContext
): Promise<AuditOutcome[]> {
  const anchorBlock = claim.claimBlock + 1n;
  await waitForBlock(ctx.ledger, anchorBlock, ctx.rpcTimeoutMs);

  const anchorHash = await ctx.ledger.blockHash(anchorBlock);
  const verifyRate = await ctx.ledger.auditRate();

  const sampled = claim.segments.filter((segment) =>
    shouldAuditSegment(segment.seqNo, claim.range, claim.claimBlock, anchorHash, verifyRate)
  );

  ctx.log.info(
    {
      claimId: claim.claimId.toString(),
      range: claim.range,
      verifyRate: verifyRate.toString(),
      sampled: sampled.map((s) => s.seqNo),
    },
    "Audit sampling complete"
  );

  const outcomes: AuditOutcome[] = [];
  for (const segment of sampled) {
    outcomes.push(await auditSegment(claim, segment, ctx));
  }
  return outcomes;
}

async function auditSegment(
  claim: CommittedClaim,
  segment: AuditableSegment,
  ctx: ClaimTaskContext
): Promise<AuditOutcome> {
  ctx.log.info({ seqNo: segment.seqNo }, "Segment challenged for verification");

  let outcome: AuditOutcome;
  let storageAddress: string | undefined;
  try {
    storageAddress = await ctx.store.publish(segment.sourceData);
    const txHash = await ctx.ledger.submitAudit({
      jobId: claim.jobId,
      claimId: claim.claimId,
      seqNo: segment.seqNo,
      storageAddress,
      sourceDataHash: segment.sourceDataHash,
      commitmentLeafHash: segment.commitmentLeafHash,
      broadcasterSignature: segment.broadcasterSignature,
      inclusionProof: segment.inclusionProof,
    });
    await ctx.ledger.confirm(txHash);

    ctx.log.info({ seqNo: segment.seqNo, txHash, storageAddress }, "Verified segment");
    outcome = { seqNo: segment.seqNo, status: "submitted", storageAddress, txHash };
  } catch (error) {
    ctx.log.error({ err: error, seqNo: segment.seqNo }, "Failed to submit segment for verification");
    outcome = {
      seqNo: segment.seqNo,
      status: "failed",
      storageAddress,
      error: errorMessage(error),
    };
  }

  await recordSafely(ctx.log, "audit", () =>
    ctx.journal.recordAudit({ jobId: claim.jobId, claimId: claim.claimId, ...outcome })
  );
  return outcome;
}
