/**
 * Health Check Routes
 *
 * Provides health status for the worker and its integrations.
 */

import { Hono } from "hono";
import type { ClaimJournal, Ledger } from "../../claims/types";
import type { JobRegistry } from "../../jobs/registry";

export interface HealthDeps {
  ledger: Ledger;
  journal: ClaimJournal;
  registry: JobRegistry;
  /** Content store probe, when the store supports one */
  storage?: { ping(): Promise<void> };
}

interface IntegrationStatus {
  name: string;
  status: "healthy" | "degraded" | "unhealthy";
  latencyMs?: number;
  blockNumber?: string;
  error?: string;
}

interface HealthResponse {
  status: "healthy" | "degraded" | "unhealthy";
  timestamp: string;
  uptime: number;
  integrations: IntegrationStatus[];
  jobs: {
    total: number;
    running: number;
    inFlightTasks: number;
  };
}

const startTime = Date.now();

/**
 * Check chain connectivity
 */
async function checkChain(ledger: Ledger): Promise<IntegrationStatus> {
  const start = Date.now();
  try {
    const blockNumber = await ledger.currentHeight();
    return {
      name: "chain",
      status: "healthy",
      latencyMs: Date.now() - start,
      blockNumber: blockNumber.toString(),
    };
  } catch (error) {
    return {
      name: "chain",
      status: "unhealthy",
      error: error instanceof Error ? error.message : "Unknown error",
    };
  }
}

/**
 * Check claim journal connectivity
 */
async function checkJournal(journal: ClaimJournal): Promise<IntegrationStatus> {
  const start = Date.now();
  try {
    await journal.ping();
    return {
      name: "journal",
      status: "healthy",
      latencyMs: Date.now() - start,
    };
  } catch (error) {
    return {
      name: "journal",
      status: "degraded",
      error: error instanceof Error ? error.message : "Unknown error",
    };
  }
}

/**
 * Check content store connectivity
 */
async function checkStorage(storage: { ping(): Promise<void> }): Promise<IntegrationStatus> {
  const start = Date.now();
  try {
    await storage.ping();
    return {
      name: "storage",
      status: "healthy",
      latencyMs: Date.now() - start,
    };
  } catch (error) {
    return {
      name: "storage",
      status: "degraded",
      error: error instanceof Error ? error.message : "Unknown error",
    };
  }
}

export function createHealthRoutes(deps: HealthDeps): Hono {
  const health = new Hono();

  /**
   * GET /health
   *
   * Returns overall health status
   */
  health.get("/", async (c) => {
    const integrations = await Promise.all([
      checkChain(deps.ledger),
      checkJournal(deps.journal),
      ...(deps.storage ? [checkStorage(deps.storage)] : []),
    ]);

    const jobs = deps.registry.list();
    const unhealthyCount = integrations.filter((i) => i.status === "unhealthy").length;
    const degradedCount = integrations.filter((i) => i.status === "degraded").length;

    let overallStatus: HealthResponse["status"];
    if (unhealthyCount > 0) {
      overallStatus = "unhealthy";
    } else if (degradedCount > 0) {
      overallStatus = "degraded";
    } else {
      overallStatus = "healthy";
    }

    const response: HealthResponse = {
      status: overallStatus,
      timestamp: new Date().toISOString(),
      uptime: Date.now() - startTime,
      integrations,
      jobs: {
        total: jobs.length,
        running: jobs.filter((j) => j.loop.getStatus().isRunning).length,
        inFlightTasks: jobs.reduce((sum, j) => sum + j.manager.status().inFlightTasks, 0),
      },
    };

    return c.json(response, overallStatus === "healthy" ? 200 : 503);
  });

  /**
   * GET /health/live
   *
   * Simple liveness probe
   */
  health.get("/live", (c) => {
    return c.json({ status: "ok" });
  });

  /**
   * GET /health/ready
   *
   * Readiness probe - the chain must answer before claims can be made
   */
  health.get("/ready", async (c) => {
    const chain = await checkChain(deps.ledger);
    if (chain.status === "unhealthy") {
      return c.json({ status: "not ready", chain }, 503);
    }
    return c.json({ status: "ready" });
  });

  return health;
}
