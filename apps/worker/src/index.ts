/**
 * Proofwork Claim Worker
 *
 * Main entry point for the claim worker.
 *
 * Starts:
 * - Hono HTTP server with the job and receipt API
 * - One claim loop per registered job
 */

import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { MemoryClaimJournal, type ClaimJournal } from "./claims";
import { createDatabase, initializeDatabase } from "./db/client";
import { DrizzleClaimJournal } from "./db/journal";
import {
  createChainPublicClient,
  createWorkerWalletClient,
  ViemLedger,
  type ChainConnection,
} from "./integrations/chain";
import { IpfsContentStore } from "./integrations/ipfs";
import { JobRegistry } from "./jobs";
import { loadEnv } from "./utils/env";
import { logger } from "./utils/logger";

async function main() {
  const env = loadEnv();
  logger.info({ nodeEnv: env.NODE_ENV }, "Starting claim worker");

  // Chain
  const connection: ChainConnection = {
    rpcUrl: env.RPC_URL,
    chainId: env.CHAIN_ID,
    rpcTimeoutMs: env.RPC_TIMEOUT_MS,
  };
  const ledger = new ViemLedger({
    publicClient: createChainPublicClient(connection),
    walletClient: createWorkerWalletClient(connection, env.WORKER_PRIVATE_KEY),
    jobsManager: env.JOBS_MANAGER_ADDRESS,
    pollIntervalMs: env.BLOCK_POLL_INTERVAL_MS,
    confirmationTimeoutMs: env.CONFIRMATION_TIMEOUT_MS,
  });

  // Audit payload storage
  const store = new IpfsContentStore(env.IPFS_API_URL);

  // Claim journal
  let journal: ClaimJournal;
  let closeDatabase: (() => Promise<void>) | null = null;
  if (env.DATABASE_URL) {
    const { db, client } = createDatabase(env.DATABASE_URL);
    await initializeDatabase(db);
    journal = new DrizzleClaimJournal(db);
    closeDatabase = () => client.end();
  } else {
    logger.warn("DATABASE_URL not set, claim history is kept in memory only");
    journal = new MemoryClaimJournal();
  }

  const registry = new JobRegistry({
    ledger,
    store,
    journal,
    cycleIntervalMs: env.CLAIM_INTERVAL_MS,
    firstClaimDeadlineBlocks: env.FIRST_CLAIM_DEADLINE_BLOCKS,
    rpcTimeoutMs: env.RPC_TIMEOUT_MS,
    autoStart: true,
  });

  const app = createApp({
    registry,
    ledger,
    journal,
    storage: store,
    frontendUrl: env.FRONTEND_URL,
  });

  // Start HTTP server
  logger.info({ port: env.PORT }, "Starting HTTP server");
  const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
    logger.info(
      { port: info.port, url: `http://localhost:${info.port}`, account: ledger.account },
      "Server started"
    );
  });

  // Graceful shutdown: stop claiming, let audits and settlements finish
  let shuttingDown = false;
  const shutdown = () => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info("Shutdown signal received, stopping claim loops...");
    server.close();

    registry
      .shutdown()
      .then(() => closeDatabase?.())
      .then(() => {
        logger.info("Claim worker stopped, exiting...");
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error({ error }, "Shutdown failed");
        process.exit(1);
      });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  logger.info("Claim worker is ready");
}

// Run
main().catch((error) => {
  logger.error({ error }, "Failed to start server");
  process.exit(1);
});
