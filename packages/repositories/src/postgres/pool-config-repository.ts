/**
 * Postgres Pool Config Repository
 *
 * - Configs are stored as jsonb (bigint fields serialized as strings)
 * - Activation flips is_current inside one transaction
 */

import { and, desc, eq } from "drizzle-orm";
import { err, ok, type Result } from "neverthrow";
import { serializePoolConfig } from "@dnmm/core";
import { poolConfig, type Db } from "@dnmm/db";

import type { NewPoolConfig, PoolConfigRepository, StoredPoolConfig } from "../interfaces/pool-config-repository";
import { toDbError, type RepositoryError } from "../types";
import { poolConfigFromRow } from "./row-mappers";

/**
 * Create a Postgres pool config repository
 */
export function createPostgresPoolConfigRepository(db: Db): PoolConfigRepository {
  return {
    async getCurrent(poolId: string): Promise<Result<StoredPoolConfig | null, RepositoryError>> {
      try {
        const rows = await db
          .select()
          .from(poolConfig)
          .where(and(eq(poolConfig.poolId, poolId), eq(poolConfig.isCurrent, true)))
          .orderBy(desc(poolConfig.createdAt))
          .limit(1);

        const [row] = rows;
        if (!row) return ok(null);
        return poolConfigFromRow(row);
      } catch (error) {
        return err(toDbError(error));
      }
    },

    async save(input: NewPoolConfig): Promise<Result<string, RepositoryError>> {
      try {
        const rows = await db
          .insert(poolConfig)
          .values({
            poolId: input.poolId,
            createdBy: input.createdBy,
            config: serializePoolConfig(input.config),
            comment: input.comment ?? null,
          })
          .returning({ id: poolConfig.id });

        const [row] = rows;
        if (!row) return err({ type: "DB_ERROR", message: "insert into pool_config returned no id" });
        return ok(row.id);
      } catch (error) {
        return err(toDbError(error));
      }
    },

    async setCurrent(poolId: string, id: string): Promise<Result<void, RepositoryError>> {
      try {
        const existing = await db
          .select({ id: poolConfig.id })
          .from(poolConfig)
          .where(and(eq(poolConfig.id, id), eq(poolConfig.poolId, poolId)))
          .limit(1);

        if (existing.length === 0) {
          return err({ type: "NOT_FOUND", message: `pool_config ${id} not found for pool ${poolId}` });
        }

        await db.transaction(async tx => {
          await tx.update(poolConfig).set({ isCurrent: false }).where(eq(poolConfig.poolId, poolId));
          await tx.update(poolConfig).set({ isCurrent: true }).where(eq(poolConfig.id, id));
        });
        return ok(undefined);
      } catch (error) {
        return err(toDbError(error));
      }
    },
  };
}
