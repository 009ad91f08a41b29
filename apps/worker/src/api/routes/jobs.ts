/**
 * Job API Routes
 *
 * Registers work assignments, takes transcode receipts and exposes
 * claim status and history.
 */

import { Hono } from "hono";
import { isAddress, type Address, type Hex } from "viem";
import { z } from "zod";
import { isUsageError } from "../../claims/errors";
import type { ClaimJournal } from "../../claims/types";
import type { JobRegistry, RegisteredJob } from "../../jobs/registry";
import { toJsonSafe } from "../../utils/json";

const uint = z
  .union([z.string().regex(/^\d+$/, "Must be a non-negative integer"), z.number().int().nonnegative()])
  .transform((value) => BigInt(value));

const address = z.string().refine((value): value is Address => isAddress(value), "Must be an address");

const hexPattern = (pattern: RegExp, message: string) =>
  z.string().refine((value): value is Hex => pattern.test(value), message);

const hash32 = hexPattern(/^0x[0-9a-fA-F]{64}$/, "Must be a 32-byte 0x-prefixed hex hash");

const hexBytes = hexPattern(/^0x(?:[0-9a-fA-F]{2})+$/, "Must be 0x-prefixed hex bytes");

export const registerJobSchema = z.object({
  jobId: uint,
  streamId: z.string().min(1),
  broadcaster: address,
  pricePerSegment: uint,
  profiles: z.array(z.string().min(1)).min(1),
});

export const receiptSchema = z.object({
  seqNo: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  /** Base64 source segment */
  data: z.string().base64(),
  outputHash: hash32,
  signature: hexBytes,
  profile: z.string().min(1),
});

function parseJobId(raw: string): bigint | null {
  return /^\d+$/.test(raw) ? BigInt(raw) : null;
}

function serializeJob({ manager, loop }: RegisteredJob) {
  const status = manager.status();
  const loopStatus = loop.getStatus();
  return {
    jobId: status.jobId.toString(),
    streamId: status.streamId,
    profiles: status.profiles,
    segments: status.segments,
    pendingSegments: status.pendingSegments,
    accruedCost: status.accruedCost.toString(),
    acceptedBatchCount: status.acceptedBatchCount,
    hasSubmittedFirstClaim: manager.hasSubmittedFirstClaim(),
    inFlightTasks: status.inFlightTasks,
    loop: {
      isRunning: loopStatus.isRunning,
      currentCycle: loopStatus.currentCycle,
      lastClaimTime: loopStatus.lastClaimTime?.toISOString() ?? null,
      lastError: loopStatus.lastError,
    },
  };
}

export function createJobRoutes(registry: JobRegistry, journal: ClaimJournal): Hono {
  const jobs = new Hono();

  /**
   * POST /api/jobs - Register a work assignment
   */
  jobs.post("/", async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const parsed = registerJobSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: "Invalid job", issues: parsed.error.flatten() }, 400);
    }

    const job = registry.register(parsed.data);
    return c.json(serializeJob(job), 201);
  });

  /**
   * GET /api/jobs - List registered jobs
   */
  jobs.get("/", (c) => {
    return c.json({ jobs: registry.list().map(serializeJob) });
  });

  /**
   * GET /api/jobs/:jobId - Job claim status
   */
  jobs.get("/:jobId", (c) => {
    const jobId = parseJobId(c.req.param("jobId"));
    const job = jobId === null ? undefined : registry.get(jobId);
    if (!job) {
      return c.json({ error: "Job not found" }, 404);
    }
    return c.json(serializeJob(job));
  });

  /**
   * POST /api/jobs/:jobId/receipts - Record one transcoded profile of a segment
   */
  jobs.post("/:jobId/receipts", async (c) => {
    const jobId = parseJobId(c.req.param("jobId"));
    const job = jobId === null ? undefined : registry.get(jobId);
    if (!job) {
      return c.json({ error: "Job not found" }, 404);
    }

    const body: unknown = await c.req.json().catch(() => null);
    const parsed = receiptSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: "Invalid receipt", issues: parsed.error.flatten() }, 400);
    }

    const receipt = parsed.data;
    try {
      job.manager.addReceipt(
        receipt.seqNo,
        new Uint8Array(Buffer.from(receipt.data, "base64")),
        receipt.outputHash,
        receipt.signature,
        receipt.profile
      );
    } catch (error) {
      if (isUsageError(error)) {
        return c.json({ error: error.message, code: error.code }, 400);
      }
      throw error;
    }

    return c.json(
      {
        seqNo: receipt.seqNo,
        profile: receipt.profile,
        pending: job.manager.isPending(receipt.seqNo),
        accruedCost: job.manager.status().accruedCost.toString(),
      },
      201
    );
  });

  /**
   * POST /api/jobs/:jobId/claims - Run one claim cycle now
   */
  jobs.post("/:jobId/claims", async (c) => {
    const jobId = parseJobId(c.req.param("jobId"));
    const job = jobId === null ? undefined : registry.get(jobId);
    if (!job) {
      return c.json({ error: "Job not found" }, 404);
    }

    const attempt = await job.loop.runCycle();
    const statusCode = attempt.status === "failed" ? 502 : attempt.status === "busy" ? 409 : 200;
    return c.json(toJsonSafe(attempt), statusCode);
  });

  /**
   * GET /api/jobs/:jobId/claims - Claim history
   */
  jobs.get("/:jobId/claims", async (c) => {
    const jobId = parseJobId(c.req.param("jobId"));
    if (jobId === null || !registry.get(jobId)) {
      return c.json({ error: "Job not found" }, 404);
    }

    const history = await journal.listClaims(jobId);
    return c.json({ claims: toJsonSafe(history) });
  });

  return jobs;
}
