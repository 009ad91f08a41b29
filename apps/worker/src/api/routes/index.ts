/**
 * API Routes Index
 *
 * Re-exports all route factories.
 */

export { createHealthRoutes, type HealthDeps } from "./health";
export { createJobRoutes, registerJobSchema, receiptSchema } from "./jobs";
