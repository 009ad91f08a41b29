/**
 * Hashing utilities
 */

import { keccak_256 } from "@noble/hashes/sha3";
import { bytesToHex, concatBytes, hexToBytes, utf8ToBytes } from "@noble/hashes/utils";
import type { Hex } from "../types";

/**
 * Hash data using keccak-256
 */
export function keccakHash(data: Uint8Array | string): Uint8Array {
  const input = typeof data === "string" ? utf8ToBytes(data) : data;
  return keccak_256(input);
}

/**
 * Hash multiple byte arrays concatenated
 */
export function hashConcat(...parts: Uint8Array[]): Uint8Array {
  return keccak_256(concatBytes(...parts));
}

/**
 * Hash data and return as 0x hex
 */
export function keccakHex(data: Uint8Array | string): Hex {
  return toHex(keccakHash(data));
}

export function toHex(bytes: Uint8Array): Hex {
  return `0x${bytesToHex(bytes)}`;
}

/**
 * Decode 0x hex (prefix optional) to bytes
 */
export function fromHex(hex: string): Uint8Array {
  return hexToBytes(hex.startsWith("0x") ? hex.slice(2) : hex);
}
