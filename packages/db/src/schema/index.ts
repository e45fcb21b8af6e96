/**
 * packages/db - Database Schema (Drizzle SoT)
 *
 * - Single source of truth for all database schemas
 * - All tables keyed by pool_id, timestamptz(UTC)
 * - Time column named 'ts' on event tables
 */

// Governance parameters
export * from "./pool-config";

// Engine events (append-only)
export * from "./rebalance-event";
export * from "./swap-event";
