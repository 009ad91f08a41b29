/**
 * Segment Receipt Store
 *
 * Per-segment bookkeeping of completed work. Records are never removed;
 * committed segments keep their hashes and proof for later audits.
 */

import { concat, keccak256, type Hex } from "viem";
import { DuplicateProfileReceiptError, UnknownProfileError } from "./errors";
import { seqNosIn } from "./ranges";
import type {
  AuditableSegment,
  Profile,
  SegmentRange,
  SegmentRecord,
  SegmentView,
} from "./types";

export class SegmentStore {
  /** Configured profiles in canonical (name) order */
  readonly profiles: readonly Profile[];
  private readonly profileIndex: ReadonlyMap<Profile, number>;
  private readonly segments = new Map<number, SegmentRecord>();
  private readonly pending = new Set<number>();
  private cost = 0n;

  constructor(
    profiles: readonly Profile[],
    private readonly pricePerSegment: bigint
  ) {
    const canonical = [...new Set(profiles)].sort();
    if (canonical.length === 0) {
      throw new Error("At least one profile is required");
    }
    this.profiles = canonical;
    this.profileIndex = new Map(canonical.map((p, i) => [p, i]));
  }

  /**
   * Record one profile's output for a segment. The source data of the
   * first receipt is copied, so the caller may reuse its buffer.
   * Throws before mutating anything when the receipt is unusable.
   */
  addReceipt(
    seqNo: number,
    sourceData: Uint8Array,
    outputHash: Hex,
    signature: Hex,
    profile: Profile
  ): SegmentView {
    if (!this.profileIndex.has(profile)) {
      throw new UnknownProfileError(profile);
    }

    const existing = this.segments.get(seqNo);
    if (existing?.outputHashes.has(profile)) {
      throw new DuplicateProfileReceiptError(seqNo, profile);
    }

    let record = existing;
    if (!record) {
      const copy = sourceData.slice();
      record = {
        seqNo,
        sourceData: copy,
        sourceDataHash: keccak256(copy),
        outputHashes: new Map<Profile, Hex>(),
        broadcasterSignature: signature,
      };
    }
    if (!existing) {
      this.segments.set(seqNo, record);
    }

    record.outputHashes.set(profile, outputHash);
    // Charged per receipt, so a segment costs pricePerSegment per profile
    this.cost += this.pricePerSegment;
    this.pending.add(seqNo);

    return toView(record);
  }

  view(seqNo: number): SegmentView | undefined {
    const record = this.segments.get(seqNo);
    return record && toView(record);
  }

  isComplete(seqNo: number): boolean {
    const record = this.segments.get(seqNo);
    return record !== undefined && this.profiles.every((p) => record.outputHashes.has(p));
  }

  isPending(seqNo: number): boolean {
    return this.pending.has(seqNo);
  }

  pendingSeqNos(): number[] {
    return [...this.pending];
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get segmentCount(): number {
    return this.segments.size;
  }

  get accruedCost(): bigint {
    return this.cost;
  }

  /**
   * Derive and store the commitment leaf of every segment in the range:
   * keccak256 over the output hashes in canonical profile order.
   */
  leafHashes(range: SegmentRange): Hex[] {
    const leaves: Hex[] = [];

    for (const seqNo of seqNosIn(range)) {
      const record = this.require(seqNo);
      const ordered = this.profiles.map((profile) => {
        const hash = record.outputHashes.get(profile);
        if (hash === undefined) {
          throw new Error(`Segment ${seqNo} has no output hash for profile ${profile}`);
        }
        return hash;
      });
      record.commitmentLeafHash = keccak256(concat(ordered));
      leaves.push(record.commitmentLeafHash);
    }

    return leaves;
  }

  markClaimed(range: SegmentRange): void {
    for (const seqNo of seqNosIn(range)) {
      this.pending.delete(seqNo);
    }
  }

  /** Store per-leaf proofs, indexed from the range start */
  attachProofs(range: SegmentRange, proofs: readonly Hex[]): void {
    for (const seqNo of seqNosIn(range)) {
      this.require(seqNo).inclusionProof = proofs[seqNo - range[0]];
    }
  }

  /** Copy out what an audit needs; every segment must be committed and proven */
  snapshot(range: SegmentRange): AuditableSegment[] {
    return [...seqNosIn(range)].map((seqNo) => {
      const record = this.require(seqNo);
      if (record.commitmentLeafHash === undefined || record.inclusionProof === undefined) {
        throw new Error(`Segment ${seqNo} is not committed`);
      }
      return Object.freeze({
        seqNo,
        sourceData: record.sourceData,
        sourceDataHash: record.sourceDataHash,
        commitmentLeafHash: record.commitmentLeafHash,
        broadcasterSignature: record.broadcasterSignature,
        inclusionProof: record.inclusionProof,
      });
    });
  }

  private require(seqNo: number): SegmentRecord {
    const record = this.segments.get(seqNo);
    if (!record) {
      throw new Error(`Unknown segment ${seqNo}`);
    }
    return record;
  }
}

function toView(record: SegmentRecord): SegmentView {
  return Object.freeze({
    seqNo: record.seqNo,
    sourceDataHash: record.sourceDataHash,
    outputHashes: new Map(record.outputHashes),
    broadcasterSignature: record.broadcasterSignature,
    commitmentLeafHash: record.commitmentLeafHash,
    inclusionProof: record.inclusionProof,
  });
}
