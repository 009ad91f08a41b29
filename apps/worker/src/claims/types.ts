/**
 * Claim Manager Types
 *
 * Data model for segment receipts and claims, plus the collaborator
 * contracts (ledger, content store, journal) the manager depends on.
 */

import type { Address, Hex } from "viem";
import type { CommitmentBuilder } from "@proofwork/commitments";

// ============================================
// Segments
// ============================================

/** Name of one configured output rendition */
export type Profile = string;

/** Inclusive range of segment sequence numbers */
export type SegmentRange = readonly [start: number, end: number];

/** Bookkeeping for one segment, created on its first receipt */
export interface SegmentRecord {
  seqNo: number;
  sourceData: Uint8Array;
  sourceDataHash: Hex;
  outputHashes: Map<Profile, Hex>;
  broadcasterSignature: Hex;
  /** Set when the segment's range is committed */
  commitmentLeafHash?: Hex;
  /** Set once the containing claim is accepted on-chain */
  inclusionProof?: Hex;
}

/** Copy of a segment's bookkeeping handed out to callers */
export interface SegmentView {
  readonly seqNo: number;
  readonly sourceDataHash: Hex;
  readonly outputHashes: ReadonlyMap<Profile, Hex>;
  readonly broadcasterSignature: Hex;
  readonly commitmentLeafHash?: Hex;
  readonly inclusionProof?: Hex;
}

/** Segment fields an audit needs, copied out once the claim is accepted */
export interface AuditableSegment {
  readonly seqNo: number;
  readonly sourceData: Uint8Array;
  readonly sourceDataHash: Hex;
  readonly commitmentLeafHash: Hex;
  readonly broadcasterSignature: Hex;
  readonly inclusionProof: Hex;
}

// ============================================
// Chain objects
// ============================================

export interface WorkAssignment {
  /** Zero address until a worker's first claim binds the job */
  assignee: Address;
  creationBlock: bigint;
}

export interface ClaimRecord {
  claimId: bigint;
  claimBlock: bigint;
}

export interface AuditSubmission {
  jobId: bigint;
  claimId: bigint;
  seqNo: number;
  storageAddress: string;
  sourceDataHash: Hex;
  commitmentLeafHash: Hex;
  broadcasterSignature: Hex;
  inclusionProof: Hex;
}

// ============================================
// Collaborators
// ============================================

/**
 * Ledger client. Reads return confirmed state; writes return a transaction
 * hash that `confirm` resolves once mined successfully.
 */
export interface Ledger {
  readonly account: Address;
  getWorkAssignment(jobId: bigint): Promise<WorkAssignment>;
  currentHeight(): Promise<bigint>;
  remainingDeposit(requester: Address): Promise<bigint>;
  submitClaim(jobId: bigint, range: SegmentRange, commitmentRoot: Hex): Promise<Hex>;
  confirm(txHash: Hex): Promise<void>;
  getClaimRecord(jobId: bigint, batchIndex: bigint): Promise<ClaimRecord>;
  auditRate(): Promise<bigint>;
  submitAudit(submission: AuditSubmission): Promise<Hex>;
  verificationPeriodBlocks(): Promise<bigint>;
  slashingPeriodBlocks(): Promise<bigint>;
  settle(jobId: bigint, claimId: bigint): Promise<Hex>;
  /** Resolves once `count` more blocks are mined; each remote call is bounded by `rpcTimeoutMs` */
  waitForBlocks(count: bigint, rpcTimeoutMs: number): Promise<void>;
  blockHash(blockNumber: bigint): Promise<Hex>;
}

/** Content-addressed storage used to disclose audited source data */
export interface ContentStore {
  publish(data: Uint8Array): Promise<string>;
}

// ============================================
// Journal
// ============================================

export interface ClaimEntry {
  jobId: bigint;
  claimId: bigint;
  range: SegmentRange;
  root: Hex;
  claimBlock: bigint;
  txHash: Hex;
}

export interface AuditEntry {
  jobId: bigint;
  claimId: bigint;
  seqNo: number;
  status: "submitted" | "failed";
  storageAddress?: string;
  txHash?: Hex;
  error?: string;
}

export interface SettlementEntry {
  jobId: bigint;
  claimId: bigint;
  status: "settled" | "failed";
  txHash?: Hex;
  error?: string;
}

export type ClaimStatus = "committed" | "settled" | "failed";

export interface ClaimHistory extends ClaimEntry {
  status: ClaimStatus;
  audits: AuditEntry[];
  settlementTxHash?: Hex;
  error?: string;
}

/** Durable record of claims, audits and settlements */
export interface ClaimJournal {
  recordClaim(entry: ClaimEntry): Promise<void>;
  recordAudit(entry: AuditEntry): Promise<void>;
  recordSettlement(entry: SettlementEntry): Promise<void>;
  listClaims(jobId: bigint): Promise<ClaimHistory[]>;
  ping(): Promise<void>;
}

// ============================================
// Manager
// ============================================

export interface ClaimManagerConfig {
  jobId: bigint;
  streamId: string;
  broadcaster: Address;
  pricePerSegment: bigint;
  profiles: readonly Profile[];
  /** Blocks after job creation during which an unbound job may be claimed */
  firstClaimDeadlineBlocks?: bigint;
  rpcTimeoutMs?: number;
}

export interface ClaimManagerDeps {
  ledger: Ledger;
  store: ContentStore;
  commitments?: CommitmentBuilder;
  journal?: ClaimJournal;
}

/** Immutable view of an accepted claim handed to its audit/settlement task */
export interface CommittedClaim {
  readonly jobId: bigint;
  readonly claimId: bigint;
  readonly claimBlock: bigint;
  readonly range: SegmentRange;
  readonly root: Hex;
  readonly txHash: Hex;
  readonly segments: readonly AuditableSegment[];
}

export interface AcceptedClaim {
  range: SegmentRange;
  claimId: bigint;
  claimBlock: bigint;
  root: Hex;
  txHash: Hex;
}

export interface SkippedRange {
  range: SegmentRange;
  reason: string;
}

export interface ClaimCycleReport {
  accepted: AcceptedClaim[];
  skipped: SkippedRange[];
}

export interface ClaimManagerStatus {
  jobId: bigint;
  streamId: string;
  profiles: readonly Profile[];
  segments: number;
  pendingSegments: number;
  accruedCost: bigint;
  acceptedBatchCount: number;
  inFlightTasks: number;
}
