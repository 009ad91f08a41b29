/**
 * Core types for segment commitments
 */

/** 0x-prefixed hex string */
export type Hex = `0x${string}`;

/** Inclusion proof for one leaf of a commitment */
export interface CommitmentProof {
  leaf: Hex;
  proof: Hex[];
  root: Hex;
  index: number;
}

/** Root plus one encoded inclusion proof per leaf, in leaf order */
export interface Commitment {
  root: Hex;
  proofs: Hex[];
}

/** Builds a commitment over ordered leaf hashes */
export interface CommitmentBuilder {
  buildCommitment(leafHashes: readonly Hex[]): Commitment;
}
