/**
 * Claims Module
 *
 * Re-exports the claim manager and its building blocks.
 */

export { ClaimManager, BLOCKS_UNTIL_FIRST_CLAIM_DEADLINE, DEFAULT_RPC_TIMEOUT_MS } from "./manager";
export { SegmentStore } from "./receipts";
export { makeRanges, rangeLength, seqNosIn } from "./ranges";
export { shouldAuditSegment, runAuditSampling, waitForBlock } from "./sampler";
export type { AuditOutcome } from "./sampler";
export { settleClaim } from "./settlement";
export { TaskRegistry, runPostCommitment } from "./tasks";
export type { ClaimTaskContext } from "./tasks";
export { MemoryClaimJournal, recordSafely } from "./journal";
export { SerialQueue } from "./lock";
export * from "./errors";
export type * from "./types";
