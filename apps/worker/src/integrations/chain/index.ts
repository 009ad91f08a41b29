/**
 * Chain Integration Module
 *
 * Re-exports all chain-related functionality.
 */

export {
  defineWorkerChain,
  createChainPublicClient,
  createWorkerWalletClient,
} from "./client";
export type { ChainConnection } from "./client";
export { ViemLedger, withTimeout } from "./ledger";
export type { ViemLedgerOptions } from "./ledger";
export { jobsManagerAbi } from "./abis";
