/**
 * Jobs Manager Ledger
 *
 * Ledger implementation over viem clients. Reads are wrapped as
 * LedgerQueryFailedError; writes refused by the node become
 * TransactionRejectedError.
 */

import { setTimeout as sleep } from "node:timers/promises";
import {
  WaitForTransactionReceiptTimeoutError,
  type Account,
  type Address,
  type Chain,
  type Hex,
  type PublicClient,
  type Transport,
  type WalletClient,
} from "viem";
import {
  ConfirmationTimeoutError,
  errorMessage,
  LedgerQueryFailedError,
  TransactionRejectedError,
} from "../../claims/errors";
import type {
  AuditSubmission,
  ClaimRecord,
  Ledger,
  SegmentRange,
  WorkAssignment,
} from "../../claims/types";
import { logger } from "../../utils/logger";
import { jobsManagerAbi } from "./abis";

export interface ViemLedgerOptions {
  publicClient: PublicClient;
  walletClient: WalletClient<Transport, Chain, Account>;
  jobsManager: Address;
  pollIntervalMs: number;
  confirmationTimeoutMs: number;
}

/**
 * Reject if `promise` has not settled within `ms`
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class ViemLedger implements Ledger {
  readonly account: Address;
  private readonly publicClient: PublicClient;
  private readonly walletClient: WalletClient<Transport, Chain, Account>;
  private readonly address: Address;
  private readonly pollIntervalMs: number;
  private readonly confirmationTimeoutMs: number;

  constructor(options: ViemLedgerOptions) {
    this.publicClient = options.publicClient;
    this.walletClient = options.walletClient;
    this.account = options.walletClient.account.address;
    this.address = options.jobsManager;
    this.pollIntervalMs = options.pollIntervalMs;
    this.confirmationTimeoutMs = options.confirmationTimeoutMs;
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  async getWorkAssignment(jobId: bigint): Promise<WorkAssignment> {
    const job = await this.query("getJob", () =>
      this.publicClient.readContract({
        address: this.address,
        abi: jobsManagerAbi,
        functionName: "getJob",
        args: [jobId],
      })
    );
    const [, , , , transcoderAddress, , creationBlock] = job;
    return { assignee: transcoderAddress, creationBlock };
  }

  currentHeight(): Promise<bigint> {
    return this.query("blockNumber", () => this.publicClient.getBlockNumber({ cacheTime: 0 }));
  }

  async remainingDeposit(requester: Address): Promise<bigint> {
    const [deposit] = await this.query("broadcasters", () =>
      this.publicClient.readContract({
        address: this.address,
        abi: jobsManagerAbi,
        functionName: "broadcasters",
        args: [requester],
      })
    );
    return deposit;
  }

  async getClaimRecord(jobId: bigint, batchIndex: bigint): Promise<ClaimRecord> {
    const claim = await this.query("getClaim", () =>
      this.publicClient.readContract({
        address: this.address,
        abi: jobsManagerAbi,
        functionName: "getClaim",
        args: [jobId, batchIndex],
      })
    );
    const [, , claimBlock] = claim;
    return { claimId: batchIndex, claimBlock };
  }

  auditRate(): Promise<bigint> {
    return this.query("verificationRate", () =>
      this.publicClient.readContract({
        address: this.address,
        abi: jobsManagerAbi,
        functionName: "verificationRate",
      })
    );
  }

  verificationPeriodBlocks(): Promise<bigint> {
    return this.query("verificationPeriod", () =>
      this.publicClient.readContract({
        address: this.address,
        abi: jobsManagerAbi,
        functionName: "verificationPeriod",
      })
    );
  }

  slashingPeriodBlocks(): Promise<bigint> {
    return this.query("verificationSlashingPeriod", () =>
      this.publicClient.readContract({
        address: this.address,
        abi: jobsManagerAbi,
        functionName: "verificationSlashingPeriod",
      })
    );
  }

  async blockHash(blockNumber: bigint): Promise<Hex> {
    const block = await this.query("getBlock", () =>
      this.publicClient.getBlock({ blockNumber })
    );
    return block.hash;
  }

  // ─── Writes ─────────────────────────────────────────────────────────

  submitClaim(jobId: bigint, range: SegmentRange, commitmentRoot: Hex): Promise<Hex> {
    return this.send("claimWork", () =>
      this.walletClient.writeContract({
        address: this.address,
        abi: jobsManagerAbi,
        functionName: "claimWork",
        args: [jobId, [BigInt(range[0]), BigInt(range[1])], commitmentRoot],
      })
    );
  }

  submitAudit(submission: AuditSubmission): Promise<Hex> {
    return this.send("verify", () =>
      this.walletClient.writeContract({
        address: this.address,
        abi: jobsManagerAbi,
        functionName: "verify",
        args: [
          submission.jobId,
          submission.claimId,
          BigInt(submission.seqNo),
          submission.storageAddress,
          [submission.sourceDataHash, submission.commitmentLeafHash],
          submission.broadcasterSignature,
          submission.inclusionProof,
        ],
      })
    );
  }

  settle(jobId: bigint, claimId: bigint): Promise<Hex> {
    return this.send("distributeFees", () =>
      this.walletClient.writeContract({
        address: this.address,
        abi: jobsManagerAbi,
        functionName: "distributeFees",
        args: [jobId, claimId],
      })
    );
  }

  async confirm(txHash: Hex): Promise<void> {
    let status: "success" | "reverted";
    try {
      const receipt = await this.publicClient.waitForTransactionReceipt({
        hash: txHash,
        timeout: this.confirmationTimeoutMs,
      });
      status = receipt.status;
    } catch (error) {
      if (error instanceof WaitForTransactionReceiptTimeoutError) {
        throw new ConfirmationTimeoutError(txHash, this.confirmationTimeoutMs);
      }
      throw new LedgerQueryFailedError("waitForTransactionReceipt", error);
    }

    if (status === "reverted") {
      throw new TransactionRejectedError("confirm", "reverted", txHash);
    }
  }

  // ─── Block waits ────────────────────────────────────────────────────

  async waitForBlocks(count: bigint, rpcTimeoutMs: number): Promise<void> {
    const readHeight = () =>
      this.query("blockNumber", () =>
        withTimeout(this.publicClient.getBlockNumber({ cacheTime: 0 }), rpcTimeoutMs, "getBlockNumber")
      );

    const start = await readHeight();
    const target = start + count;
    let height = start;

    logger.debug({ start: start.toString(), target: target.toString() }, "Waiting for blocks");
    while (height < target) {
      await sleep(this.pollIntervalMs);
      height = await readHeight();
    }
  }

  // ─── Helpers ────────────────────────────────────────────────────────

  private async query<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw new LedgerQueryFailedError(operation, error);
    }
  }

  private async send(operation: string, call: () => Promise<Hex>): Promise<Hex> {
    try {
      const txHash = await call();
      logger.debug({ operation, txHash }, "Transaction sent");
      return txHash;
    } catch (error) {
      throw new TransactionRejectedError(operation, errorMessage(error));
    }
  }
}
