/**
 * Claim Manager Tests
 *
 * Drive the manager against the in-process chain and content store.
 */

import { describe, it, expect } from "vitest";
import { concat, keccak256, type Hex } from "viem";
import {
  buildCommitment,
  decodeProof,
  merkleCommitmentBuilder,
  verifyCommitmentProof,
  type CommitmentBuilder,
} from "@proofwork/commitments";
import {
  ConfirmationTimeoutError,
  LedgerQueryFailedError,
  TransactionRejectedError,
} from "../src/claims/errors";
import { ClaimManager } from "../src/claims/manager";
import {
  ADDRESSES,
  FakeChain,
  JOB_ID,
  SIGNATURE,
  addReceipts,
  createTestWorker,
  outputHash,
  sourceData,
} from "./helpers";

const LOW = "P240p30fps16x9";
const HIGH = "P360p30fps16x9";

const leafFor = (seqNo: number): Hex =>
  keccak256(concat([outputHash(seqNo, LOW), outputHash(seqNo, HIGH)]));

describe("ClaimManager", () => {
  // ============================================
  // Eligibility
  // ============================================

  describe("canClaim", () => {
    it("is false with no pending segments, without asking the chain", async () => {
      const { chain, manager } = createTestWorker();

      expect(await manager.canClaim()).toBe(false);
      expect(chain.calls).toEqual([]);
    });

    it("is true for an unbound job up to the first-claim deadline", async () => {
      const { chain, manager } = createTestWorker();
      addReceipts(manager, [0]);

      chain.height = chain.creationBlock + 230n;
      expect(await manager.canClaim()).toBe(true);

      chain.height = chain.creationBlock + 231n;
      expect(await manager.canClaim()).toBe(false);
    });

    it("honours a configured first-claim deadline", async () => {
      const { chain, manager } = createTestWorker({ firstClaimDeadlineBlocks: 5n });
      addReceipts(manager, [0]);

      chain.height = chain.creationBlock + 6n;
      expect(await manager.canClaim()).toBe(false);
    });

    it("is true when the job is bound to this worker, whatever the height", async () => {
      const { chain, manager } = createTestWorker();
      addReceipts(manager, [0]);
      chain.assignee = ADDRESSES.worker;
      chain.height = 10_000n;

      expect(await manager.canClaim()).toBe(true);
    });

    it("is false when the job is bound to another worker", async () => {
      const { chain, manager } = createTestWorker();
      addReceipts(manager, [0]);
      chain.assignee = ADDRESSES.otherWorker;

      expect(await manager.canClaim()).toBe(false);
    });
  });

  describe("sufficientDeposit", () => {
    it("requires room for one more segment in every profile", async () => {
      const { chain, manager } = createTestWorker();
      addReceipts(manager, [0]);
      // accrued 2 x 10, next round 2 x 10

      chain.deposit = 40n;
      expect(await manager.sufficientDeposit()).toBe(true);

      chain.deposit = 39n;
      expect(await manager.sufficientDeposit()).toBe(false);
    });

    it("propagates a failed deposit query", async () => {
      const { chain, manager } = createTestWorker();
      chain.failNext("remainingDeposit", new LedgerQueryFailedError("broadcasters", new Error("boom")));

      await expect(manager.sufficientDeposit()).rejects.toThrow(
        "Ledger query broadcasters failed: boom"
      );
    });
  });

  // ============================================
  // Claim cycle
  // ============================================

  describe("runClaimCycle", () => {
    it("commits a complete run and removes it from pending", async () => {
      const { chain, manager } = createTestWorker();
      addReceipts(manager, [0, 1, 2]);

      const report = await manager.runClaimCycle();

      const expectedRoot = buildCommitment([leafFor(0), leafFor(1), leafFor(2)]).root;
      expect(report.skipped).toEqual([]);
      expect(report.accepted).toHaveLength(1);
      expect(report.accepted[0]).toMatchObject({
        range: [0, 2],
        claimId: 0n,
        claimBlock: 101n,
        root: expectedRoot,
      });
      expect(chain.claims).toEqual([
        {
          jobId: JOB_ID,
          range: [0, 2],
          root: expectedRoot,
          claimBlock: 101n,
          submitter: ADDRESSES.worker,
        },
      ]);
      expect(manager.status().pendingSegments).toBe(0);
      expect(manager.status().acceptedBatchCount).toBe(1);
      expect(manager.hasSubmittedFirstClaim()).toBe(true);

      await manager.drain();
    });

    it("leaves incomplete segments pending", async () => {
      const { chain, manager } = createTestWorker();
      addReceipts(manager, [0, 1]);
      addReceipts(manager, [2], [LOW]);

      const report = await manager.runClaimCycle();

      expect(report.accepted.map((a) => a.range)).toEqual([[0, 1]]);
      expect(manager.isPending(2)).toBe(true);
      expect(chain.claims).toHaveLength(1);

      await manager.drain();
    });

    it("claims each run separately", async () => {
      const { chain, manager } = createTestWorker();
      addReceipts(manager, [0, 1, 4, 5, 6]);

      const report = await manager.runClaimCycle();

      expect(report.accepted.map((a) => [a.range, a.claimId])).toEqual([
        [[0, 1], 0n],
        [[4, 6], 1n],
      ]);
      expect(chain.claims.map((c) => c.range)).toEqual([
        [0, 1],
        [4, 6],
      ]);

      await manager.drain();
    });

    it("stores a verifying inclusion proof on every committed segment", async () => {
      const { manager } = createTestWorker();
      addReceipts(manager, [0, 1, 2]);

      const [accepted] = (await manager.runClaimCycle()).accepted;

      [0, 1, 2].forEach((seqNo, index) => {
        const segment = manager.segment(seqNo);
        expect(segment?.commitmentLeafHash).toBe(leafFor(seqNo));
        expect(
          verifyCommitmentProof({
            leaf: leafFor(seqNo),
            proof: decodeProof(segment?.inclusionProof ?? "0x"),
            root: accepted.root,
            index,
          })
        ).toBe(true);
      });

      await manager.drain();
    });

    it("skips a range whose commitment cannot be built", async () => {
      let builds = 0;
      const flaky: CommitmentBuilder = {
        buildCommitment(leaves) {
          builds++;
          if (builds === 1) {
            throw new Error("tree exploded");
          }
          return merkleCommitmentBuilder.buildCommitment(leaves);
        },
      };
      const { chain, manager } = createTestWorker({}, { commitments: flaky });
      addReceipts(manager, [0, 1, 3, 4]);

      const report = await manager.runClaimCycle();

      expect(report.skipped).toEqual([
        { range: [0, 1], reason: "Failed to build commitment for segments 0-1: tree exploded" },
      ]);
      expect(report.accepted.map((a) => a.range)).toEqual([[3, 4]]);
      expect(manager.isPending(0)).toBe(true);
      expect(manager.isPending(3)).toBe(false);
      expect(chain.claims).toHaveLength(1);

      const retry = await manager.runClaimCycle();
      expect(retry.accepted.map((a) => [a.range, a.claimId])).toEqual([[[0, 1], 1n]]);

      await manager.drain();
    });

    it("skips a range when the commitment has the wrong number of proofs", async () => {
      const short: CommitmentBuilder = {
        buildCommitment: (leaves) => ({ root: leaves[0], proofs: [] }),
      };
      const { chain, manager } = createTestWorker({}, { commitments: short });
      addReceipts(manager, [0]);

      const report = await manager.runClaimCycle();

      expect(report.skipped).toEqual([
        {
          range: [0, 0],
          reason: "Failed to build commitment for segments 0-0: Expected 1 proofs, commitment returned 0",
        },
      ]);
      expect(chain.claims).toEqual([]);
    });

    it("keeps earlier ranges committed when a later confirmation fails", async () => {
      const { chain, manager } = createTestWorker();
      addReceipts(manager, [0, 1, 3, 4]);
      chain.failNext("confirmClaim", new ConfirmationTimeoutError("0xabc", 5_000), 1);

      await expect(manager.runClaimCycle()).rejects.toBeInstanceOf(ConfirmationTimeoutError);

      expect(manager.status().acceptedBatchCount).toBe(1);
      expect(manager.isPending(0)).toBe(false);
      expect(manager.isPending(3)).toBe(true);
      expect(chain.claims.map((c) => c.range)).toEqual([[0, 1]]);

      const retry = await manager.runClaimCycle();
      expect(retry.accepted.map((a) => [a.range, a.claimId])).toEqual([[[3, 4], 1n]]);

      await manager.drain();
    });

    it("rejects the cycle when the chain refuses the claim", async () => {
      const { chain, manager } = createTestWorker();
      addReceipts(manager, [0]);
      chain.failNext("submitClaim", new TransactionRejectedError("claimWork", "out of gas"));

      await expect(manager.runClaimCycle()).rejects.toThrow(
        "Transaction claimWork rejected: out of gas"
      );
      expect(manager.isPending(0)).toBe(true);
      expect(manager.hasSubmittedFirstClaim()).toBe(false);
    });

    it("still audits and settles a committed claim whose record could not be read", async () => {
      const { chain, journal, manager } = createTestWorker();
      addReceipts(manager, [0, 1]);
      chain.failNext("getClaimRecord", new LedgerQueryFailedError("getClaim", "rpc blip"));

      await expect(manager.runClaimCycle()).rejects.toThrow(
        "Ledger query getClaim failed: rpc blip"
      );
      expect(manager.isPending(0)).toBe(false);
      expect(manager.hasSubmittedFirstClaim()).toBe(true);
      expect((await manager.runClaimCycle()).accepted).toEqual([]);

      await manager.drain();

      expect(chain.claims).toHaveLength(1);
      expect(chain.audits.map((a) => a.seqNo)).toEqual([0, 1]);
      expect(chain.settlements).toEqual([{ jobId: JOB_ID, claimId: 0n, by: ADDRESSES.worker }]);
      // One block before the record is re-read, then the dispute window
      expect(chain.waits).toEqual([1n, 16n]);

      const [history] = await journal.listClaims(JOB_ID);
      expect(history).toMatchObject({
        claimId: 0n,
        claimBlock: 101n,
        range: [0, 1],
        status: "settled",
      });
      expect(manager.status().inFlightTasks).toBe(0);
    });

    it("gives up on a claim record that stays unreadable", async () => {
      const { chain, journal, manager } = createTestWorker();
      addReceipts(manager, [0]);
      for (let i = 0; i < 6; i++) {
        chain.failNext("getClaimRecord", new LedgerQueryFailedError("getClaim", "rpc down"));
      }

      await expect(manager.runClaimCycle()).rejects.toBeInstanceOf(LedgerQueryFailedError);
      await manager.drain();

      expect(chain.waits).toEqual([1n, 1n, 1n, 1n, 1n]);
      expect(chain.settlements).toEqual([]);
      expect(await journal.listClaims(JOB_ID)).toEqual([]);
      expect(manager.status().inFlightTasks).toBe(0);
    });

    it("runs overlapping cycles one after the other", async () => {
      const { chain, manager } = createTestWorker();
      addReceipts(manager, [0, 1, 2, 3]);

      const [first, second] = await Promise.all([
        manager.runClaimCycle(),
        manager.runClaimCycle(),
      ]);

      expect(first.accepted.map((a) => a.range)).toEqual([[0, 3]]);
      expect(second.accepted).toEqual([]);
      expect(chain.claims).toHaveLength(1);

      await manager.drain();
    });
  });

  // ============================================
  // Audits and settlement
  // ============================================

  describe("post-commitment tasks", () => {
    it("audits every segment at rate 1, then settles after the dispute window", async () => {
      const { chain, store, journal, manager } = createTestWorker();
      addReceipts(manager, [0, 1, 2]);

      await manager.runClaimCycle();
      await manager.drain();

      expect(chain.audits.map((a) => a.seqNo)).toEqual([0, 1, 2]);
      expect(chain.audits[1]).toMatchObject({
        jobId: JOB_ID,
        claimId: 0n,
        storageAddress: "bafy-test-2",
        sourceDataHash: keccak256(sourceData(1)),
        commitmentLeafHash: leafFor(1),
      });
      expect(store.published).toEqual([sourceData(0), sourceData(1), sourceData(2)]);
      // 1 block to the sampling anchor, then verification (1) + slashing (15)
      expect(chain.waits).toEqual([1n, 16n]);
      expect(chain.settlements).toEqual([{ jobId: JOB_ID, claimId: 0n, by: ADDRESSES.worker }]);

      const [history] = await journal.listClaims(JOB_ID);
      expect(history.status).toBe("settled");
      expect(history.audits.map((a) => [a.seqNo, a.status])).toEqual([
        [0, "submitted"],
        [1, "submitted"],
        [2, "submitted"],
      ]);
      expect(manager.status().inFlightTasks).toBe(0);
    });

    it("publishes the source data as received after the caller reuses its buffer", async () => {
      const { chain, store, manager } = createTestWorker({ profiles: ["A"] });
      const buffer = sourceData(0);
      manager.addReceipt(0, buffer, outputHash(0, "A"), SIGNATURE, "A");

      await manager.runClaimCycle();
      buffer.fill(0x41);
      await manager.drain();

      expect(store.published).toEqual([sourceData(0)]);
      expect(chain.audits[0].sourceDataHash).toBe(keccak256(sourceData(0)));
    });

    it("settles without audits at rate 0", async () => {
      const { chain, manager } = createTestWorker();
      chain.verifyRate = 0n;
      addReceipts(manager, [0, 1]);

      await manager.runClaimCycle();
      await manager.drain();

      expect(chain.audits).toEqual([]);
      expect(chain.settlements).toHaveLength(1);
    });

    it("keeps auditing after one segment fails", async () => {
      const { chain, store, journal, manager } = createTestWorker();
      store.failNext(new Error("ipfs down"));
      addReceipts(manager, [0, 1, 2]);

      await manager.runClaimCycle();
      await manager.drain();

      expect(chain.audits.map((a) => a.seqNo)).toEqual([1, 2]);
      expect(chain.settlements).toHaveLength(1);

      const [history] = await journal.listClaims(JOB_ID);
      expect(history.audits[0]).toMatchObject({ seqNo: 0, status: "failed", error: "ipfs down" });
      expect(history.audits.slice(1).map((a) => a.status)).toEqual(["submitted", "submitted"]);
      expect(history.status).toBe("settled");
    });

    it("does not settle when audit sampling fails", async () => {
      const { chain, journal, manager } = createTestWorker();
      chain.failNext("auditRate", new Error("rpc down"));
      addReceipts(manager, [0]);

      await manager.runClaimCycle();
      await manager.drain();

      expect(chain.settlements).toEqual([]);
      const [history] = await journal.listClaims(JOB_ID);
      expect(history.status).toBe("failed");
      expect(history.error).toBe("audit sampling failed: rpc down");
    });

    it("records a failed settlement", async () => {
      const { chain, journal, manager } = createTestWorker();
      chain.failNext("settle", new TransactionRejectedError("distributeFees", "reverted"));
      addReceipts(manager, [0]);

      await manager.runClaimCycle();
      await manager.drain();

      const [history] = await journal.listClaims(JOB_ID);
      expect(history.status).toBe("failed");
      expect(history.error).toBe("Transaction distributeFees rejected: reverted");
    });
  });

  // ============================================
  // Two workers, one job
  // ============================================

  describe("competing workers", () => {
    it("binds the job to the first worker to claim", async () => {
      const chain = new FakeChain();
      const profiles = ["A", "B"];
      const first = createTestWorker({ profiles }, { chain, account: ADDRESSES.worker });
      const second = createTestWorker({ profiles }, { chain, account: ADDRESSES.otherWorker });
      const seqNos = Array.from({ length: 10 }, (_, i) => i);
      addReceipts(first.manager, seqNos);
      addReceipts(second.manager, seqNos);

      expect(await first.manager.canClaim()).toBe(true);
      const report = await first.manager.runClaimCycle();

      expect(report.accepted.map((a) => a.range)).toEqual([[0, 9]]);
      expect(first.manager.hasSubmittedFirstClaim()).toBe(true);
      expect(chain.assignee).toBe(ADDRESSES.worker);
      expect(await second.manager.canClaim()).toBe(false);
      expect(second.manager.hasSubmittedFirstClaim()).toBe(false);

      await first.manager.drain();
    });
  });

  it("exposes its configured profiles in canonical order", () => {
    const manager = new ClaimManager(
      {
        jobId: 1n,
        streamId: "s",
        broadcaster: ADDRESSES.broadcaster,
        pricePerSegment: 1n,
        profiles: ["b", "a"],
      },
      { ledger: new FakeChain().ledgerFor(ADDRESSES.worker), store: { publish: async () => "cid" } }
    );

    expect(manager.profiles).toEqual(["a", "b"]);
  });
});
