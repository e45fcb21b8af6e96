/**
 * Repository Interfaces
 */

export type { NewPoolConfig, PoolConfigRepository, StoredPoolConfig } from "./pool-config-repository";

export type { RebalanceEventRepository } from "./rebalance-event-repository";

export type { SwapEventRepository } from "./swap-event-repository";
