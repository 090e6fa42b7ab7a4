/**
 * API Routes Index
 *
 * Re-exports all route handlers.
 */

export { createHealthRoutes } from "./health";
export { createBlockRoutes } from "./blocks";
export { default as proofRoutes } from "./proofs";
