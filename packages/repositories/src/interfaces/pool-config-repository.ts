/**
 * Pool Config Repository Interface
 *
 * - Governance parameter store
 * - At most one current config per pool
 */

import type { Result } from "neverthrow";
import type { PoolConfig } from "@dnmm/core";

import type { RepositoryError } from "../types";

/**
 * Stored config set
 */
export interface StoredPoolConfig {
  id: string;
  poolId: string;
  isCurrent: boolean;
  createdAt: Date;
  createdBy: string;
  config: PoolConfig;
  comment: string | null;
}

export interface NewPoolConfig {
  poolId: string;
  createdBy: string;
  config: PoolConfig;
  comment?: string;
}

/**
 * Pool Config Repository Interface
 */
export interface PoolConfigRepository {
  /**
   * Get the current config for a pool (null when none has been published)
   */
  getCurrent: (poolId: string) => Promise<Result<StoredPoolConfig | null, RepositoryError>>;

  /**
   * Store a new config set without activating it
   *
   * @returns The new config id
   */
  save: (input: NewPoolConfig) => Promise<Result<string, RepositoryError>>;

  /**
   * Make `id` the current config of its pool; the previous current set is cleared
   */
  setCurrent: (poolId: string, id: string) => Promise<Result<void, RepositoryError>>;
}
