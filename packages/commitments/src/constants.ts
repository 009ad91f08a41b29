/**
 * Commitment constants
 */

/** Byte length of a keccak-256 digest, and so of every leaf and proof node */
export const HASH_LENGTH = 32;
