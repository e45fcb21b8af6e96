/**
 * rebalance_event - Target inventory updates
 *
 * - Append-only; one row per TARGET_UPDATED record
 * - Amounts stored as numeric to keep full integer precision
 */

import { index, integer, numeric, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

export const rebalanceEvent = pgTable(
  "rebalance_event",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    ts: timestamp("ts", { withTimezone: true, mode: "date" }).notNull(),
    poolId: text("pool_id").notNull(),
    trigger: text("trigger").notNull(), // auto/manual
    previousTarget: numeric("previous_target").notNull(),
    newTarget: numeric("new_target").notNull(),
    priceWad: numeric("price_wad").notNull(),
    blockRef: integer("block_ref").notNull(),
  },
  table => [index("rebalance_event_pool_id_ts_idx").on(table.poolId, table.ts.desc())],
);

export type RebalanceEventRow = typeof rebalanceEvent.$inferSelect;
export type NewRebalanceEventRow = typeof rebalanceEvent.$inferInsert;
