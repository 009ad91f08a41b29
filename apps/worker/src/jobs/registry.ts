/**
 * Job Registry
 *
 * Owns one claim manager and claim loop per work assignment.
 */

import type { Address } from "viem";
import { ClaimError } from "../claims/errors";
import { ClaimManager } from "../claims/manager";
import type { ClaimManagerDeps, Profile } from "../claims/types";
import { logger } from "../utils/logger";
import { ClaimLoop } from "./loop";

export interface JobRegistration {
  jobId: bigint;
  streamId: string;
  broadcaster: Address;
  pricePerSegment: bigint;
  profiles: Profile[];
}

export interface JobRegistryOptions extends ClaimManagerDeps {
  cycleIntervalMs?: number;
  firstClaimDeadlineBlocks?: bigint;
  rpcTimeoutMs?: number;
  /** Start each job's claim loop on registration */
  autoStart?: boolean;
}

export interface RegisteredJob {
  manager: ClaimManager;
  loop: ClaimLoop;
}

export class JobAlreadyRegisteredError extends ClaimError {
  constructor(jobId: bigint) {
    super(`Job ${jobId} is already registered`, "JOB_ALREADY_REGISTERED", {
      jobId: jobId.toString(),
    });
    this.name = "JobAlreadyRegisteredError";
  }
}

export class JobRegistry {
  private readonly jobs = new Map<bigint, RegisteredJob>();

  constructor(private readonly options: JobRegistryOptions) {}

  register(registration: JobRegistration): RegisteredJob {
    if (this.jobs.has(registration.jobId)) {
      throw new JobAlreadyRegisteredError(registration.jobId);
    }

    const manager = new ClaimManager(
      {
        ...registration,
        firstClaimDeadlineBlocks: this.options.firstClaimDeadlineBlocks,
        rpcTimeoutMs: this.options.rpcTimeoutMs,
      },
      {
        ledger: this.options.ledger,
        store: this.options.store,
        commitments: this.options.commitments,
        journal: this.options.journal,
      }
    );
    const loop = new ClaimLoop(manager, this.options.cycleIntervalMs);
    const job = { manager, loop };
    this.jobs.set(registration.jobId, job);

    logger.info(
      {
        jobId: registration.jobId.toString(),
        streamId: registration.streamId,
        profiles: manager.profiles,
      },
      "Job registered"
    );

    if (this.options.autoStart) {
      loop.start();
    }
    return job;
  }

  get(jobId: bigint): RegisteredJob | undefined {
    return this.jobs.get(jobId);
  }

  list(): RegisteredJob[] {
    return [...this.jobs.values()];
  }

  get size(): number {
    return this.jobs.size;
  }

  /**
   * Stop every claim loop, then wait for outstanding audits and settlements
   */
  async shutdown(): Promise<void> {
    logger.info({ count: this.jobs.size }, "Stopping all claim loops");
    for (const { loop } of this.jobs.values()) {
      loop.stop();
    }
    await Promise.all(this.list().map(({ manager }) => manager.drain()));
    logger.info("All claim tasks drained");
  }
}
