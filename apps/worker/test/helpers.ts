/**
 * Test Helpers
 *
 * In-process stand-ins for the chain and the content store, plus
 * factories for managers wired to them.
 */

import {
  isAddressEqual,
  keccak256,
  numberToHex,
  stringToHex,
  zeroAddress,
  type Address,
  type Hex,
} from "viem";
import { ClaimManager } from "../src/claims/manager";
import { MemoryClaimJournal } from "../src/claims/journal";
import type {
  AuditSubmission,
  ClaimJournal,
  ClaimManagerConfig,
  ClaimManagerDeps,
  ContentStore,
  Ledger,
  SegmentRange,
} from "../src/claims/types";

// ============================================
// Constants
// ============================================

export const ADDRESSES = {
  worker: "0x1111111111111111111111111111111111111111",
  otherWorker: "0x2222222222222222222222222222222222222222",
  broadcaster: "0x3333333333333333333333333333333333333333",
} as const satisfies Record<string, Address>;

export const JOB_ID = 7n;
export const PRICE = 10n;
export const SIGNATURE: Hex = stringToHex("broadcaster-signature");

export const outputHash = (seqNo: number, profile: string): Hex =>
  keccak256(stringToHex(`output-${seqNo}-${profile}`));

export const sourceData = (seqNo: number): Uint8Array =>
  new TextEncoder().encode(`segment-${seqNo}`);

// ============================================
// Fake chain
// ============================================

type FaultOperation =
  | "getWorkAssignment"
  | "remainingDeposit"
  | "submitClaim"
  | "confirmClaim"
  | "getClaimRecord"
  | "submitAudit"
  | "confirmAudit"
  | "settle"
  | "confirmSettle"
  | "auditRate"
  | "waitForBlocks";

export interface ChainClaim {
  jobId: bigint;
  range: SegmentRange;
  root: Hex;
  claimBlock: bigint;
  submitter: Address;
}

type PendingTx =
  | { kind: "claim"; apply: () => void }
  | { kind: "audit"; apply: () => void }
  | { kind: "settle"; apply: () => void };

const confirmFault = {
  claim: "confirmClaim",
  audit: "confirmAudit",
  settle: "confirmSettle",
} as const satisfies Record<PendingTx["kind"], FaultOperation>;

/**
 * Single-job chain that mines one block per confirmed transaction.
 * Writes only take effect once confirmed.
 */
export class FakeChain {
  height = 100n;
  creationBlock = 100n;
  assignee: Address = zeroAddress;
  deposit = 1_000_000n;
  verifyRate = 1n;
  verificationPeriod = 1n;
  slashingPeriod = 15n;

  readonly claims: ChainClaim[] = [];
  readonly audits: AuditSubmission[] = [];
  readonly settlements: { jobId: bigint; claimId: bigint; by: Address }[] = [];
  /** Every waitForBlocks count, in call order */
  readonly waits: bigint[] = [];
  /** Operation names in call order */
  readonly calls: string[] = [];

  private readonly pending = new Map<Hex, PendingTx>();
  private readonly faults = new Map<FaultOperation, (Error | null)[]>();
  private txCount = 0;

  /**
   * Make the next call of `operation` fail, after letting `skip` calls succeed
   */
  failNext(operation: FaultOperation, error: Error, skip = 0): void {
    const queue = this.faults.get(operation) ?? [];
    for (let i = 0; i < skip; i++) {
      queue.push(null);
    }
    queue.push(error);
    this.faults.set(operation, queue);
  }

  blockHashAt(blockNumber: bigint): Hex {
    return keccak256(numberToHex(blockNumber, { size: 32 }));
  }

  ledgerFor(account: Address): Ledger {
    return {
      account,
      getWorkAssignment: async () => {
        await this.tick("getWorkAssignment");
        return { assignee: this.assignee, creationBlock: this.creationBlock };
      },
      currentHeight: async () => this.height,
      remainingDeposit: async () => {
        await this.tick("remainingDeposit");
        return this.deposit;
      },
      submitClaim: async (jobId, range, commitmentRoot) => {
        await this.tick("submitClaim");
        return this.queueTx({
          kind: "claim",
          apply: () => {
            if (isAddressEqual(this.assignee, zeroAddress)) {
              this.assignee = account;
            }
            this.claims.push({
              jobId,
              range,
              root: commitmentRoot,
              claimBlock: this.height,
              submitter: account,
            });
          },
        });
      },
      confirm: async (txHash) => {
        const tx = this.pending.get(txHash);
        if (!tx) {
          throw new Error(`Unknown transaction ${txHash}`);
        }
        await this.tick(confirmFault[tx.kind]);
        this.pending.delete(txHash);
        this.height += 1n;
        tx.apply();
      },
      getClaimRecord: async (jobId, batchIndex) => {
        await this.tick("getClaimRecord");
        const claim = this.claims.filter((c) => c.jobId === jobId)[Number(batchIndex)];
        if (!claim) {
          throw new Error(`No claim ${batchIndex} for job ${jobId}`);
        }
        return { claimId: batchIndex, claimBlock: claim.claimBlock };
      },
      auditRate: async () => {
        await this.tick("auditRate");
        return this.verifyRate;
      },
      submitAudit: async (submission) => {
        await this.tick("submitAudit");
        return this.queueTx({ kind: "audit", apply: () => this.audits.push(submission) });
      },
      verificationPeriodBlocks: async () => this.verificationPeriod,
      slashingPeriodBlocks: async () => this.slashingPeriod,
      settle: async (jobId, claimId) => {
        await this.tick("settle");
        return this.queueTx({
          kind: "settle",
          apply: () => this.settlements.push({ jobId, claimId, by: account }),
        });
      },
      waitForBlocks: async (count) => {
        await this.tick("waitForBlocks");
        this.waits.push(count);
        this.height += count;
      },
      blockHash: async (blockNumber) => {
        if (blockNumber > this.height) {
          throw new Error(`Block ${blockNumber} not mined yet`);
        }
        return this.blockHashAt(blockNumber);
      },
    };
  }

  private queueTx(tx: PendingTx): Hex {
    this.txCount++;
    const txHash = keccak256(stringToHex(`tx-${this.txCount}`));
    this.pending.set(txHash, tx);
    return txHash;
  }

  /** Yield to the event loop, then apply any queued fault */
  private async tick(operation: FaultOperation): Promise<void> {
    this.calls.push(operation);
    await Promise.resolve();
    const queue = this.faults.get(operation);
    const fault = queue?.shift();
    if (fault) {
      throw fault;
    }
  }
}

// ============================================
// Fake content store
// ============================================

export class FakeContentStore implements ContentStore {
  readonly published: Uint8Array[] = [];
  private readonly faults: Error[] = [];

  failNext(error: Error): void {
    this.faults.push(error);
  }

  async publish(data: Uint8Array): Promise<string> {
    const fault = this.faults.shift();
    if (fault) {
      throw fault;
    }
    this.published.push(data);
    return `bafy-test-${this.published.length}`;
  }
}

// ============================================
// Manager factory
// ============================================

export interface TestWorker {
  chain: FakeChain;
  store: FakeContentStore;
  journal: ClaimJournal;
  manager: ClaimManager;
}

export function createTestWorker(
  overrides: Partial<ClaimManagerConfig> = {},
  deps: Partial<ClaimManagerDeps> & { chain?: FakeChain; account?: Address } = {}
): TestWorker {
  const chain = deps.chain ?? new FakeChain();
  const store = new FakeContentStore();
  const journal = deps.journal ?? new MemoryClaimJournal();
  const manager = new ClaimManager(
    {
      jobId: JOB_ID,
      streamId: "stream-test",
      broadcaster: ADDRESSES.broadcaster,
      pricePerSegment: PRICE,
      profiles: ["P240p30fps16x9", "P360p30fps16x9"],
      ...overrides,
    },
    {
      ledger: deps.ledger ?? chain.ledgerFor(deps.account ?? ADDRESSES.worker),
      store: deps.store ?? store,
      commitments: deps.commitments,
      journal,
    }
  );
  return { chain, store, journal, manager };
}

/** Add a receipt for every listed profile of every listed segment */
export function addReceipts(
  manager: ClaimManager,
  seqNos: readonly number[],
  profiles: readonly string[] = manager.profiles
): void {
  for (const seqNo of seqNos) {
    for (const profile of profiles) {
      manager.addReceipt(seqNo, sourceData(seqNo), outputHash(seqNo, profile), SIGNATURE, profile);
    }
  }
}
