/**
 * Jobs Module
 *
 * Re-exports the job registry and claim loop.
 */

export { JobRegistry, JobAlreadyRegisteredError } from "./registry";
export type { JobRegistration, JobRegistryOptions, RegisteredJob } from "./registry";
export { ClaimLoop } from "./loop";
export type { ClaimAttempt, ClaimLoopStatus } from "./loop";
