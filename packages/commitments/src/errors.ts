/**
 * Error classes for segment commitments
 */

/** Base error class */
export class CommitmentError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "CommitmentError";
  }
}

/** No leaves to commit to */
export class EmptyCommitmentError extends CommitmentError {
  constructor() {
    super("Cannot build a commitment from an empty leaf list", "EMPTY_COMMITMENT");
    this.name = "EmptyCommitmentError";
  }
}

/** Leaf is not a 32-byte digest */
export class InvalidLeafError extends CommitmentError {
  constructor(index: number, length: number) {
    super(
      `Leaf ${index} must be 32 bytes, got ${length}`,
      "INVALID_LEAF",
      { index, length }
    );
    this.name = "InvalidLeafError";
  }
}

/** Proof does not lead to the committed root */
export class InvalidProofError extends CommitmentError {
  constructor(leafIndex: number) {
    super(
      `Invalid commitment proof for leaf ${leafIndex}`,
      "INVALID_PROOF",
      { leafIndex }
    );
    this.name = "InvalidProofError";
  }
}
