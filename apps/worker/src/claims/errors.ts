/**
 * Error classes for the claim process
 */

import type { Hex } from "viem";
import type { Profile, SegmentRange } from "./types";

/** Base error class */
export class ClaimError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ClaimError";
  }
}

/** Receipt names a profile the job was not configured with */
export class UnknownProfileError extends ClaimError {
  constructor(profile: Profile) {
    super(`Cannot find profile: ${profile}`, "UNKNOWN_PROFILE", { profile });
    this.name = "UnknownProfileError";
  }
}

/** Segment already has a receipt for this profile */
export class DuplicateProfileReceiptError extends ClaimError {
  constructor(seqNo: number, profile: Profile) {
    super(
      `Receipt for segment ${seqNo} profile ${profile} already exists`,
      "DUPLICATE_PROFILE_RECEIPT",
      { seqNo, profile }
    );
    this.name = "DuplicateProfileReceiptError";
  }
}

/** Chain read failed */
export class LedgerQueryFailedError extends ClaimError {
  constructor(operation: string, cause: unknown) {
    super(
      `Ledger query ${operation} failed: ${errorMessage(cause)}`,
      "LEDGER_QUERY_FAILED",
      { operation }
    );
    this.name = "LedgerQueryFailedError";
    this.cause = cause;
  }
}

/** Transaction was refused at submission or reverted when mined */
export class TransactionRejectedError extends ClaimError {
  constructor(operation: string, reason: string, txHash?: Hex) {
    super(
      `Transaction ${operation} rejected: ${reason}`,
      "TRANSACTION_REJECTED",
      { operation, txHash }
    );
    this.name = "TransactionRejectedError";
  }
}

/** Transaction was not mined within the confirmation timeout */
export class ConfirmationTimeoutError extends ClaimError {
  constructor(txHash: Hex, timeoutMs: number) {
    super(
      `Transaction ${txHash} not confirmed within ${timeoutMs}ms`,
      "CONFIRMATION_TIMEOUT",
      { txHash, timeoutMs }
    );
    this.name = "ConfirmationTimeoutError";
  }
}

/** Commitment over a range could not be built; the range stays pending */
export class CommitmentBuildFailedError extends ClaimError {
  constructor(range: SegmentRange, cause: unknown) {
    super(
      `Failed to build commitment for segments ${range[0]}-${range[1]}: ${errorMessage(cause)}`,
      "COMMITMENT_BUILD_FAILED",
      { start: range[0], end: range[1] }
    );
    this.name = "CommitmentBuildFailedError";
    this.cause = cause;
  }
}

/** Usage errors are the caller's fault and leave state untouched */
export function isUsageError(error: unknown): error is ClaimError {
  return (
    error instanceof UnknownProfileError ||
    error instanceof DuplicateProfileReceiptError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
