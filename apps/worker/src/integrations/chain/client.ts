import {
  createPublicClient,
  createWalletClient,
  http,
  type Chain,
  type PublicClient,
  type WalletClient,
  type Transport,
  type Account,
  type Hex,
} from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { logger } from "../../utils/logger";

export interface ChainConnection {
  rpcUrl: string;
  chainId: number;
  rpcTimeoutMs: number;
}

/**
 * Chain definition for the configured RPC endpoint
 */
export function defineWorkerChain(connection: ChainConnection): Chain {
  return {
    id: connection.chainId,
    name: `Chain ${connection.chainId}`,
    nativeCurrency: {
      decimals: 18,
      name: "ETH",
      symbol: "ETH",
    },
    rpcUrls: {
      default: {
        http: [connection.rpcUrl],
      },
    },
  };
}

/**
 * Create the public client for read operations
 */
export function createChainPublicClient(connection: ChainConnection): PublicClient {
  const client = createPublicClient({
    chain: defineWorkerChain(connection),
    transport: http(connection.rpcUrl, { timeout: connection.rpcTimeoutMs }),
  });
  logger.info({ chainId: connection.chainId }, "Public client initialized");
  return client;
}

/**
 * Create the wallet client that signs claims, audits and settlements
 */
export function createWorkerWalletClient(
  connection: ChainConnection,
  privateKey: Hex
): WalletClient<Transport, Chain, Account> {
  const account = privateKeyToAccount(privateKey);
  const client = createWalletClient({
    account,
    chain: defineWorkerChain(connection),
    transport: http(connection.rpcUrl, { timeout: connection.rpcTimeoutMs }),
  });
  logger.info(
    { address: account.address, chainId: connection.chainId },
    "Worker wallet client initialized"
  );
  return client;
}
