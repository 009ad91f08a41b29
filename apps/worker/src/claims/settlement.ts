/**
 * Settlement Waiter
 *
 * Releases escrowed fees for a claim once its dispute window
 * (verification period + slashing period) has passed.
 */

import type { Hex } from "viem";
import type { ClaimTaskContext } from "./tasks";
import type { CommittedClaim } from "./types";

export async function settleClaim(
  claim: CommittedClaim,
  ctx: ClaimTaskContext
): Promise<Hex> {
  const verificationPeriod = await ctx.ledger.verificationPeriodBlocks();
  const slashingPeriod = await ctx.ledger.slashingPeriodBlocks();
  const disputeWindow = verificationPeriod + slashingPeriod;

  ctx.log.info(
    { claimId: claim.claimId.toString(), blocks: disputeWindow.toString() },
    "Waiting out dispute window"
  );
  await ctx.ledger.waitForBlocks(disputeWindow, ctx.rpcTimeoutMs);

  const txHash = await ctx.ledger.settle(claim.jobId, claim.claimId);
  await ctx.ledger.confirm(txHash);

  ctx.log.info(
    { jobId: claim.jobId.toString(), claimId: claim.claimId.toString(), txHash },
    "Distributed fees"
  );
  return txHash;
}
