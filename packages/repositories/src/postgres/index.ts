/**
 * Postgres Repository Implementations
 */

export { createPostgresPoolConfigRepository } from "./pool-config-repository";
export { createPostgresRebalanceEventRepository } from "./rebalance-event-repository";
export { createPostgresSwapEventRepository } from "./swap-event-repository";
export {
  mapRows,
  poolConfigFromRow,
  rebalanceEventFromRow,
  rebalanceEventToRow,
  swapEventFromRow,
  swapEventToRow,
} from "./row-mappers";
