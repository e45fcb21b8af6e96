/**
 * packages/adapters - Oracle Adapters
 *
 * - Port interfaces for price feeds
 * - `OracleReader` and `Clock` implementations consumed by the engine
 */

// Port interfaces
export * from "./ports";

export { LatestOracleCache } from "./oracle/latest-oracle-cache";
export { ScenarioFeed } from "./scenario/scenario-feed";
export type { OracleScript } from "./scenario/scenario-feed";
export { ManualClock } from "./clock";
