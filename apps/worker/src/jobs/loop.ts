/**
 * Claim Loop
 *
 * Periodic claim driver for one job:
 * 1. Check eligibility
 * 2. Check the requester can still pay
 * 3. Run a claim cycle
 */

import type { ClaimManager } from "../claims/manager";
import { errorMessage } from "../claims/errors";
import type { ClaimCycleReport } from "../claims/types";
import { logger } from "../utils/logger";

// Default cycle interval: 60 seconds
const DEFAULT_CYCLE_INTERVAL_MS = 60_000;

export type ClaimAttempt =
  | { status: "busy" }
  | { status: "ineligible" }
  | { status: "insufficient_deposit" }
  | { status: "claimed"; report: ClaimCycleReport }
  | { status: "failed"; error: string };

export interface ClaimLoopStatus {
  jobId: bigint;
  isRunning: boolean;
  currentCycle: number;
  lastClaimTime: Date | null;
  lastError: string | null;
}

export class ClaimLoop {
  private isRunning = false;
  private isCycleRunning = false;
  private currentCycle = 0;
  private lastClaimTime: Date | null = null;
  private lastError: string | null = null;
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private readonly cycleIntervalMs: number;

  constructor(
    private readonly manager: ClaimManager,
    cycleIntervalMs?: number
  ) {
    this.cycleIntervalMs = cycleIntervalMs || DEFAULT_CYCLE_INTERVAL_MS;
  }

  /**
   * Start the claim loop
   */
  start(): void {
    if (this.isRunning) {
      logger.warn({ jobId: this.manager.jobId.toString() }, "Claim loop already running");
      return;
    }

    this.isRunning = true;
    logger.info(
      { jobId: this.manager.jobId.toString(), cycleIntervalMs: this.cycleIntervalMs },
      "Starting claim loop"
    );

    this.intervalId = setInterval(() => {
      this.runCycle().catch((error) => {
        logger.error({ jobId: this.manager.jobId.toString(), error }, "Claim cycle failed");
      });
    }, this.cycleIntervalMs);
  }

  /**
   * Stop the claim loop. In-flight audits and settlements keep running.
   */
  stop(): void {
    if (!this.isRunning) {
      return;
    }

    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }

    this.isRunning = false;
    logger.info({ jobId: this.manager.jobId.toString() }, "Claim loop stopped");
  }

  /**
   * Run a single claim cycle
   */
  async runCycle(): Promise<ClaimAttempt> {
    // Guard against overlapping cycles (e.g., a slow confirmation)
    if (this.isCycleRunning) {
      logger.warn(
        { jobId: this.manager.jobId.toString(), cycle: this.currentCycle },
        "Skipping cycle - previous cycle still running"
      );
      return { status: "busy" };
    }

    this.isCycleRunning = true;
    const cycleStart = Date.now();
    this.currentCycle++;

    try {
      if (!(await this.manager.canClaim())) {
        logger.debug({ jobId: this.manager.jobId.toString() }, "Nothing claimable");
        return { status: "ineligible" };
      }

      if (!(await this.manager.sufficientDeposit())) {
        logger.warn(
          { jobId: this.manager.jobId.toString() },
          "Broadcaster deposit cannot cover more work, not claiming"
        );
        return { status: "insufficient_deposit" };
      }

      const report = await this.manager.runClaimCycle();
      this.lastClaimTime = new Date();
      this.lastError = null;

      logger.info(
        {
          jobId: this.manager.jobId.toString(),
          cycle: this.currentCycle,
          accepted: report.accepted.length,
          skipped: report.skipped.length,
          durationMs: Date.now() - cycleStart,
        },
        "Claim cycle complete"
      );

      return { status: "claimed", report };
    } catch (error) {
      this.lastError = errorMessage(error);

      logger.error(
        {
          jobId: this.manager.jobId.toString(),
          cycle: this.currentCycle,
          error: this.lastError,
        },
        "Claim cycle error"
      );

      return { status: "failed", error: this.lastError };
    } finally {
      this.isCycleRunning = false;
    }
  }

  getStatus(): ClaimLoopStatus {
    return {
      jobId: this.manager.jobId,
      isRunning: this.isRunning,
      currentCycle: this.currentCycle,
      lastClaimTime: this.lastClaimTime,
      lastError: this.lastError,
    };
  }
}
