/**
 * Claim Manager
 *
 * Manages the claim process for one job: takes per-profile receipts,
 * commits contiguous runs of complete segments on-chain, and hands each
 * accepted claim to a background audit/settlement task.
 *
 * Receipt intake and post-confirmation accounting are synchronous, so
 * the event loop keeps them atomic. Async operations that read state
 * across an await run one at a time on the manager's queue.
 */

import { isAddressEqual, zeroAddress, type Hex } from "viem";
import {
  merkleCommitmentBuilder,
  type Commitment,
  type CommitmentBuilder,
} from "@proofwork/commitments";
import { logger as rootLogger, type Logger } from "../utils/logger";
import { CommitmentBuildFailedError } from "./errors";
import { MemoryClaimJournal, recordSafely } from "./journal";
import { SerialQueue } from "./lock";
import { makeRanges } from "./ranges";
import { SegmentStore } from "./receipts";
import { runPostCommitment, TaskRegistry, type ClaimTaskContext } from "./tasks";
import type {
  AcceptedClaim,
  AuditableSegment,
  ClaimCycleReport,
  ClaimJournal,
  ClaimManagerConfig,
  ClaimManagerDeps,
  ClaimManagerStatus,
  ClaimRecord,
  CommittedClaim,
  ContentStore,
  Ledger,
  Profile,
  SegmentRange,
  SegmentView,
} from "./types";

/** Blocks after job creation in which an unbound job may still be claimed */
export const BLOCKS_UNTIL_FIRST_CLAIM_DEADLINE = 230n;

/** Bound on each remote call made while waiting for blocks */
export const DEFAULT_RPC_TIMEOUT_MS = 10_000;

/** Reads of a committed claim's record before its task gives up */
export const CLAIM_RECORD_ATTEMPTS = 5;

export class ClaimManager {
  readonly jobId: bigint;
  readonly streamId: string;

  private readonly segments: SegmentStore;
  private readonly queue = new SerialQueue();
  private readonly tasks: TaskRegistry;
  private readonly ledger: Ledger;
  private readonly store: ContentStore;
  private readonly commitments: CommitmentBuilder;
  private readonly journal: ClaimJournal;
  private readonly log: Logger;
  private readonly firstClaimDeadlineBlocks: bigint;
  private readonly rpcTimeoutMs: number;
  private acceptedBatchCount = 0;

  constructor(
    private readonly config: ClaimManagerConfig,
    deps: ClaimManagerDeps
  ) {
    this.jobId = config.jobId;
    this.streamId = config.streamId;
    this.segments = new SegmentStore(config.profiles, config.pricePerSegment);
    this.ledger = deps.ledger;
    this.store = deps.store;
    this.commitments = deps.commitments ?? merkleCommitmentBuilder;
    this.journal = deps.journal ?? new MemoryClaimJournal();
    this.firstClaimDeadlineBlocks =
      config.firstClaimDeadlineBlocks ?? BLOCKS_UNTIL_FIRST_CLAIM_DEADLINE;
    this.rpcTimeoutMs = config.rpcTimeoutMs ?? DEFAULT_RPC_TIMEOUT_MS;
    this.log = rootLogger.child({ jobId: config.jobId.toString(), streamId: config.streamId });
    this.tasks = new TaskRegistry(this.log);
  }

  get profiles(): readonly Profile[] {
    return this.segments.profiles;
  }

  // ============================================
  // Receipt intake
  // ============================================

  /**
   * Record a completed transcode of one segment for one profile.
   * Throws UnknownProfileError or DuplicateProfileReceiptError without
   * changing any state.
   */
  addReceipt(
    seqNo: number,
    sourceData: Uint8Array,
    outputHash: Hex,
    signature: Hex,
    profile: Profile
  ): void {
    this.segments.addReceipt(seqNo, sourceData, outputHash, signature, profile);
    this.log.debug({ seqNo, profile }, "Receipt added");
  }

  // ============================================
  // Eligibility
  // ============================================

  /**
   * True when there is pending work and either the job is bound to this
   * worker, or nobody has claimed it yet and the first-claim deadline has
   * not passed.
   */
  canClaim(): Promise<boolean> {
    return this.queue.run(async () => {
      if (this.segments.pendingCount === 0) {
        return false;
      }

      const assignment = await this.ledger.getWorkAssignment(this.jobId);
      if (isAddressEqual(assignment.assignee, this.ledger.account)) {
        return true;
      }
      if (!isAddressEqual(assignment.assignee, zeroAddress)) {
        return false;
      }

      const height = await this.ledger.currentHeight();
      return height <= assignment.creationBlock + this.firstClaimDeadlineBlocks;
    });
  }

  /**
   * True when the requester's deposit, less what has already accrued,
   * still pays for one more segment in every profile.
   */
  sufficientDeposit(): Promise<boolean> {
    return this.queue.run(async () => {
      let deposit: bigint;
      try {
        deposit = await this.ledger.remainingDeposit(this.config.broadcaster);
      } catch (error) {
        this.log.error({ err: error }, "Error getting broadcaster deposit");
        throw error;
      }

      const nextRound = BigInt(this.segments.profiles.length) * this.config.pricePerSegment;
      return deposit - this.segments.accruedCost - nextRound >= 0n;
    });
  }

  hasSubmittedFirstClaim(): boolean {
    return this.acceptedBatchCount > 0;
  }

  // ============================================
  // Submission pipeline
  // ============================================

  /**
   * Commit every claimable range, in order. A range whose commitment
   * cannot be built is skipped and stays pending. A submission or
   * confirmation failure rejects the cycle; ranges accepted before it
   * stay committed.
   */
  runClaimCycle(): Promise<ClaimCycleReport> {
    return this.queue.run(async () => {
      const report: ClaimCycleReport = { accepted: [], skipped: [] };
      const ranges = makeRanges(this.segments.pendingSeqNos(), (seqNo) =>
        this.segments.isComplete(seqNo)
      );

      for (const range of ranges) {
        let commitment: Commitment;
        try {
          commitment = this.buildCommitment(range);
        } catch (error) {
          const failure = new CommitmentBuildFailedError(range, error);
          this.log.error({ err: failure, range }, "Skipping range");
          report.skipped.push({ range, reason: failure.message });
          continue;
        }

        report.accepted.push(await this.submitRange(range, commitment));
      }

      return report;
    });
  }

  private buildCommitment(range: SegmentRange): Commitment {
    const leaves = this.segments.leafHashes(range);
    const commitment = this.commitments.buildCommitment(leaves);
    if (commitment.proofs.length !== leaves.length) {
      throw new Error(
        `Expected ${leaves.length} proofs, commitment returned ${commitment.proofs.length}`
      );
    }
    return commitment;
  }

  private async submitRange(
    range: SegmentRange,
    commitment: Commitment
  ): Promise<AcceptedClaim> {
    const txHash = await this.ledger.submitClaim(this.jobId, range, commitment.root);
    await this.ledger.confirm(txHash);

    this.log.info({ start: range[0], end: range[1], txHash }, "Submitted transcode claim");

    this.segments.markClaimed(range);
    this.acceptedBatchCount++;
    this.segments.attachProofs(range, commitment.proofs);

    const batchIndex = BigInt(this.acceptedBatchCount - 1);
    const segments = Object.freeze(this.segments.snapshot(range));

    let record: ClaimRecord;
    try {
      record = await this.ledger.getClaimRecord(this.jobId, batchIndex);
    } catch (error) {
      // Already committed on-chain; the task resolves the record itself
      this.log.error(
        { err: error, batchIndex: batchIndex.toString(), txHash },
        "Claim record unavailable, resolving in background"
      );
      this.tasks.track(`claim-${batchIndex}`, async () => {
        const recovered = await this.readClaimRecord(batchIndex);
        const claim = await this.journalClaim(recovered, range, commitment.root, txHash, segments);
        await runPostCommitment(claim, this.taskContext(claim.claimId));
      });
      throw error;
    }

    const claim = await this.journalClaim(record, range, commitment.root, txHash, segments);
    this.tasks.track(`claim-${claim.claimId}`, () =>
      runPostCommitment(claim, this.taskContext(claim.claimId))
    );

    return {
      range,
      claimId: claim.claimId,
      claimBlock: claim.claimBlock,
      root: claim.root,
      txHash,
    };
  }

  /** Re-read a claim record one block at a time until the ledger answers */
  private async readClaimRecord(batchIndex: bigint): Promise<ClaimRecord> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= CLAIM_RECORD_ATTEMPTS; attempt++) {
      await this.ledger.waitForBlocks(1n, this.rpcTimeoutMs);
      try {
        return await this.ledger.getClaimRecord(this.jobId, batchIndex);
      } catch (error) {
        lastError = error;
        this.log.warn({ err: error, batchIndex: batchIndex.toString(), attempt }, "Claim record read failed");
      }
    }
    throw lastError;
  }

  private async journalClaim(
    record: ClaimRecord,
    range: SegmentRange,
    root: Hex,
    txHash: Hex,
    segments: readonly AuditableSegment[]
  ): Promise<CommittedClaim> {
    const claim: CommittedClaim = Object.freeze({
      jobId: this.jobId,
      claimId: record.claimId,
      claimBlock: record.claimBlock,
      range,
      root,
      txHash,
      segments,
    });

    await recordSafely(this.log, "claim", () =>
      this.journal.recordClaim({
        jobId: claim.jobId,
        claimId: claim.claimId,
        range,
        root,
        claimBlock: claim.claimBlock,
        txHash,
      })
    );
    return claim;
  }

  private taskContext(claimId: bigint): ClaimTaskContext {
    return {
      ledger: this.ledger,
      store: this.store,
      journal: this.journal,
      rpcTimeoutMs: this.rpcTimeoutMs,
      log: this.log.child({ claimId: claimId.toString() }),
    };
  }

  // ============================================
  // Observability / shutdown
  // ============================================

  status(): ClaimManagerStatus {
    return {
      jobId: this.jobId,
      streamId: this.streamId,
      profiles: this.segments.profiles,
      segments: this.segments.segmentCount,
      pendingSegments: this.segments.pendingCount,
      accruedCost: this.segments.accruedCost,
      acceptedBatchCount: this.acceptedBatchCount,
      inFlightTasks: this.tasks.size,
    };
  }

  isPending(seqNo: number): boolean {
    return this.segments.isPending(seqNo);
  }

  segment(seqNo: number): SegmentView | undefined {
    return this.segments.view(seqNo);
  }

  /** Wait for every in-flight audit/settlement task to finish */
  drain(): Promise<void> {
    return this.tasks.drain();
  }
}
