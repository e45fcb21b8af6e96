/**
 * Postgres Swap Event Repository
 */

import { desc, eq } from "drizzle-orm";
import { err, ok, type Result } from "neverthrow";
import type { SwapRecord } from "@dnmm/core";
import { swapEvent, type Db } from "@dnmm/db";

import type { SwapEventRepository } from "../interfaces/swap-event-repository";
import { toDbError, type RepositoryError } from "../types";
import { mapRows, swapEventFromRow, swapEventToRow } from "./row-mappers";

/**
 * Create a Postgres swap event repository
 */
export function createPostgresSwapEventRepository(db: Db): SwapEventRepository {
  return {
    async append(poolId: string, record: SwapRecord): Promise<Result<void, RepositoryError>> {
      try {
        await db.insert(swapEvent).values(swapEventToRow(poolId, record));
        return ok(undefined);
      } catch (error) {
        return err(toDbError(error));
      }
    },

    async appendMany(poolId: string, records: SwapRecord[]): Promise<Result<void, RepositoryError>> {
      if (records.length === 0) return ok(undefined);
      try {
        await db.insert(swapEvent).values(records.map(record => swapEventToRow(poolId, record)));
        return ok(undefined);
      } catch (error) {
        return err(toDbError(error));
      }
    },

    async listRecent(poolId: string, limit: number): Promise<Result<SwapRecord[], RepositoryError>> {
      try {
        const rows = await db
          .select()
          .from(swapEvent)
          .where(eq(swapEvent.poolId, poolId))
          .orderBy(desc(swapEvent.ts))
          .limit(limit);

        return mapRows(rows, swapEventFromRow);
      } catch (error) {
        return err(toDbError(error));
      }
    },
  };
}
