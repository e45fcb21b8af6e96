/**
 * Rebalance Event Repository Interface
 *
 * Append-only sink for TARGET_UPDATED records.
 */

import type { Result } from "neverthrow";
import type { TargetUpdatedRecord } from "@dnmm/core";

import type { RepositoryError } from "../types";

export interface RebalanceEventRepository {
  append: (poolId: string, record: TargetUpdatedRecord) => Promise<Result<void, RepositoryError>>;

  /**
   * Most recent records first
   */
  listRecent: (poolId: string, limit: number) => Promise<Result<TargetUpdatedRecord[], RepositoryError>>;
}
