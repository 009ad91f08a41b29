/**
 * Merkle tree implementation for segment commitments
 *
 * Leaves are already digests (one per segment), so they enter the tree
 * unhashed. The leaf layer is padded to a power of two by repeating the
 * last leaf.
 */

import { concatBytes } from "@noble/hashes/utils";
import { HASH_LENGTH } from "../constants";
import { EmptyCommitmentError, InvalidLeafError, InvalidProofError } from "../errors";
import type { Commitment, CommitmentBuilder, CommitmentProof, Hex } from "../types";
import { fromHex, hashConcat, toHex } from "./hash";

/** Merkle tree structure */
export interface CommitmentTree {
  /** Number of leaves before padding */
  leafCount: number;
  leaves: Uint8Array[];
  layers: Uint8Array[][];
  root: Uint8Array;
}

function hashPair(left: Uint8Array, right: Uint8Array): Uint8Array {
  return hashConcat(left, right);
}

function padToPowerOfTwo(arr: Uint8Array[]): Uint8Array[] {
  let targetLength = 1;
  while (targetLength < arr.length) {
    targetLength *= 2;
  }

  const result = [...arr];
  const last = arr[arr.length - 1];
  while (result.length < targetLength) {
    result.push(last);
  }

  return result;
}

/**
 * Build a Merkle tree from ordered leaf hashes
 */
export function buildCommitmentTree(leafHashes: readonly Hex[]): CommitmentTree {
  if (leafHashes.length === 0) {
    throw new EmptyCommitmentError();
  }

  const decoded = leafHashes.map((leaf, index) => {
    const bytes = fromHex(leaf);
    if (bytes.length !== HASH_LENGTH) {
      throw new InvalidLeafError(index, bytes.length);
    }
    return bytes;
  });

  const leaves = padToPowerOfTwo(decoded);
  const layers: Uint8Array[][] = [leaves];
  let currentLayer = leaves;

  while (currentLayer.length > 1) {
    const nextLayer: Uint8Array[] = [];

    for (let i = 0; i < currentLayer.length; i += 2) {
      nextLayer.push(hashPair(currentLayer[i], currentLayer[i + 1]));
    }

    layers.push(nextLayer);
    currentLayer = nextLayer;
  }

  return {
    leafCount: leafHashes.length,
    leaves,
    layers,
    root: currentLayer[0],
  };
}

/**
 * Generate the inclusion proof for a specific leaf index
 */
export function generateCommitmentProof(
  tree: CommitmentTree,
  index: number
): CommitmentProof {
  if (!Number.isInteger(index) || index < 0 || index >= tree.leafCount) {
    throw new RangeError(
      `Invalid index: ${index}. Must be between 0 and ${tree.leafCount - 1}`
    );
  }

  const proof: Hex[] = [];
  let currentIndex = index;

  for (let i = 0; i < tree.layers.length - 1; i++) {
    const layer = tree.layers[i];
    const siblingIndex = currentIndex % 2 === 0 ? currentIndex + 1 : currentIndex - 1;
    proof.push(toHex(layer[siblingIndex]));
    currentIndex = Math.floor(currentIndex / 2);
  }

  return {
    leaf: toHex(tree.leaves[index]),
    proof,
    root: toHex(tree.root),
    index,
  };
}

/**
 * Verify an inclusion proof
 */
export function verifyCommitmentProof(proof: CommitmentProof): boolean {
  let current = fromHex(proof.leaf);
  let index = proof.index;

  for (const siblingHex of proof.proof) {
    const sibling = fromHex(siblingHex);
    current = index % 2 === 0 ? hashPair(current, sibling) : hashPair(sibling, current);
    index = Math.floor(index / 2);
  }

  return toHex(current) === proof.root.toLowerCase();
}

/**
 * Verify an inclusion proof and throw if invalid
 */
export function assertValidProof(proof: CommitmentProof): void {
  if (!verifyCommitmentProof(proof)) {
    throw new InvalidProofError(proof.index);
  }
}

/**
 * Encode proof siblings as one byte string, the form submitted on-chain
 */
export function encodeProof(siblings: readonly Hex[]): Hex {
  return toHex(concatBytes(...siblings.map((s) => fromHex(s))));
}

/**
 * Split an encoded proof back into its 32-byte siblings
 */
export function decodeProof(encoded: Hex): Hex[] {
  const bytes = fromHex(encoded);
  if (bytes.length % HASH_LENGTH !== 0) {
    throw new RangeError(`Encoded proof length ${bytes.length} is not a multiple of ${HASH_LENGTH}`);
  }

  const siblings: Hex[] = [];
  for (let offset = 0; offset < bytes.length; offset += HASH_LENGTH) {
    siblings.push(toHex(bytes.subarray(offset, offset + HASH_LENGTH)));
  }
  return siblings;
}

/**
 * Build a commitment: the root plus one encoded proof per leaf
 */
export function buildCommitment(leafHashes: readonly Hex[]): Commitment {
  const tree = buildCommitmentTree(leafHashes);
  const proofs: Hex[] = [];

  for (let i = 0; i < tree.leafCount; i++) {
    proofs.push(encodeProof(generateCommitmentProof(tree, i).proof));
  }

  return { root: toHex(tree.root), proofs };
}

/** Default commitment builder backed by the keccak merkle tree */
export const merkleCommitmentBuilder: CommitmentBuilder = {
  buildCommitment,
};
