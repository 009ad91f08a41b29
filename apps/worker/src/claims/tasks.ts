/**
 * Post-commitment tasks
 *
 * Each accepted claim gets one background task: audit sampling, then
 * settlement. Tasks are tracked so shutdown can wait for them.
 */

import type { Logger } from "../utils/logger";
import { errorMessage } from "./errors";
import { recordSafely } from "./journal";
import { runAuditSampling } from "./sampler";
import { settleClaim } from "./settlement";
import type { ClaimJournal, CommittedClaim, ContentStore, Ledger } from "./types";

export interface ClaimTaskContext {
  ledger: Ledger;
  store: ContentStore;
  journal: ClaimJournal;
  rpcTimeoutMs: number;
  log: Logger;
}

export class TaskRegistry {
  private readonly inFlight = new Map<string, Promise<void>>();

  constructor(private readonly log: Logger) {}

  /**
   * Start a task under `key`. Failures end the task and are logged;
   * they never reach the caller.
   */
  track(key: string, task: () => Promise<void>): void {
    const running = task()
      .catch((error: unknown) => {
        this.log.error({ err: error, task: key }, "Background task failed");
      })
      .finally(() => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, running);
  }

  get size(): number {
    return this.inFlight.size;
  }

  /** Resolve once every task, including ones started meanwhile, has finished */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight.values()]);
    }
  }
}

/**
 * Audit then settle one accepted claim. A failed audit sampling step ends
 * the task without settling; individual segment audit failures do not.
 */
export async function runPostCommitment(
  claim: CommittedClaim,
  ctx: ClaimTaskContext
): Promise<void> {
  const base = { jobId: claim.jobId, claimId: claim.claimId };

  try {
    await runAuditSampling(claim, ctx);
  } catch (error) {
    ctx.log.error({ err: error, claimId: claim.claimId.toString() }, "Audit sampling failed");
    await recordSafely(ctx.log, "settlement", () =>
      ctx.journal.recordSettlement({
        ...base,
        status: "failed",
        error: `audit sampling failed: ${errorMessage(error)}`,
      })
    );
    return;
  }

  try {
    const txHash = await settleClaim(claim, ctx);
    await recordSafely(ctx.log, "settlement", () =>
      ctx.journal.recordSettlement({ ...base, status: "settled", txHash })
    );
  } catch (error) {
    ctx.log.error({ err: error, claimId: claim.claimId.toString() }, "Fee distribution failed");
    await recordSafely(ctx.log, "settlement", () =>
      ctx.journal.recordSettlement({ ...base, status: "failed", error: errorMessage(error) })
    );
  }
}
