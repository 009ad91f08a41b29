/**
 * @proofwork/commitments
 * Hashing and merkle commitments over transcoded segments
 */

export * from "./crypto/merkle";
export * from "./crypto/hash";
export * from "./constants";
export * from "./types";
export * from "./errors";
