/**
 * HTTP application
 *
 * Builds the Hono app around a job registry so the server entry point and
 * the route tests share one wiring.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger as honoLogger } from "hono/logger";
import { ClaimError, isUsageError, type ClaimJournal, type Ledger } from "./claims";
import { createHealthRoutes, createJobRoutes } from "./api/routes";
import type { JobRegistry } from "./jobs";
import { logger } from "./utils/logger";

export interface AppDeps {
  registry: JobRegistry;
  ledger: Ledger;
  journal: ClaimJournal;
  storage?: { ping(): Promise<void> };
  frontendUrl?: string;
  /** Log each request line; off in tests */
  requestLogging?: boolean;
}

function statusForError(error: ClaimError): 400 | 409 | 502 | 504 | 500 {
  if (isUsageError(error)) {
    return 400;
  }
  switch (error.code) {
    case "JOB_ALREADY_REGISTERED":
      return 409;
    case "LEDGER_QUERY_FAILED":
    case "TRANSACTION_REJECTED":
      return 502;
    case "CONFIRMATION_TIMEOUT":
      return 504;
    default:
      return 500;
  }
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  // Middleware
  app.use(
    "*",
    cors({
      origin: deps.frontendUrl || "*",
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization"],
    })
  );

  if (deps.requestLogging ?? true) {
    app.use("*", honoLogger());
  }

  // Routes
  app.route("/health", createHealthRoutes(deps));
  app.route("/api/jobs", createJobRoutes(deps.registry, deps.journal));

  // Root endpoint
  app.get("/", (c) => {
    return c.json({
      name: "Proofwork Claim Worker",
      version: "0.1.0",
      status: "running",
      account: deps.ledger.account,
      endpoints: {
        health: "/health",
        jobs: "/api/jobs",
        jobDetail: "/api/jobs/:jobId",
        receipts: "/api/jobs/:jobId/receipts",
        claims: "/api/jobs/:jobId/claims",
      },
    });
  });

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: "Not found" }, 404);
  });

  // Error handler
  app.onError((err, c) => {
    if (err instanceof ClaimError) {
      const status = statusForError(err);
      if (status === 500) {
        logger.error({ error: err.message, code: err.code }, "Unhandled claim error");
      }
      return c.json({ error: err.message, code: err.code }, status);
    }

    logger.error({ error: err.message, stack: err.stack }, "Unhandled error");
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
}
