/**
 * Swap Event Repository Interface
 *
 * Append-only sink for SWAP_SETTLED records.
 */

import type { Result } from "neverthrow";
import type { SwapRecord } from "@dnmm/core";

import type { RepositoryError } from "../types";

export interface SwapEventRepository {
  append: (poolId: string, record: SwapRecord) => Promise<Result<void, RepositoryError>>;

  /**
   * Write a batch in one statement; no-op for an empty batch
   */
  appendMany: (poolId: string, records: SwapRecord[]) => Promise<Result<void, RepositoryError>>;

  /**
   * Most recent records first
   */
  listRecent: (poolId: string, limit: number) => Promise<Result<SwapRecord[], RepositoryError>>;
}
