/**
 * Postgres Rebalance Event Repository
 */

import { desc, eq } from "drizzle-orm";
import { err, ok, type Result } from "neverthrow";
import type { TargetUpdatedRecord } from "@dnmm/core";
import { rebalanceEvent, type Db } from "@dnmm/db";

import type { RebalanceEventRepository } from "../interfaces/rebalance-event-repository";
import { toDbError, type RepositoryError } from "../types";
import { mapRows, rebalanceEventFromRow, rebalanceEventToRow } from "./row-mappers";

/**
 * Create a Postgres rebalance event repository
 */
export function createPostgresRebalanceEventRepository(db: Db): RebalanceEventRepository {
  return {
    async append(poolId: string, record: TargetUpdatedRecord): Promise<Result<void, RepositoryError>> {
      try {
        await db.insert(rebalanceEvent).values(rebalanceEventToRow(poolId, record));
        return ok(undefined);
      } catch (error) {
        return err(toDbError(error));
      }
    },

    async listRecent(poolId: string, limit: number): Promise<Result<TargetUpdatedRecord[], RepositoryError>> {
      try {
        const rows = await db
          .select()
          .from(rebalanceEvent)
          .where(eq(rebalanceEvent.poolId, poolId))
          .orderBy(desc(rebalanceEvent.ts))
          .limit(limit);

        return mapRows(rows, rebalanceEventFromRow);
      } catch (error) {
        return err(toDbError(error));
      }
    },
  };
}
