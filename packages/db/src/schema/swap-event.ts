/**
 * swap_event - Settled swaps
 *
 * - Append-only; one row per SWAP_SETTLED record
 * - regime_bitmask follows the engine's regime flag encoding
 */

import { boolean, index, integer, numeric, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

export const swapEvent = pgTable(
  "swap_event",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    ts: timestamp("ts", { withTimezone: true, mode: "date" }).notNull(),
    poolId: text("pool_id").notNull(),
    isBaseIn: boolean("is_base_in").notNull(),
    requestedAmountIn: numeric("requested_amount_in").notNull(),
    appliedAmountIn: numeric("applied_amount_in").notNull(),
    amountOut: numeric("amount_out").notNull(),
    feeBps: integer("fee_bps").notNull(),
    midWad: numeric("mid_wad").notNull(),
    reason: text("reason").notNull(),
    usedFallback: boolean("used_fallback").notNull(),
    regimeBitmask: integer("regime_bitmask").notNull(),
    blockRef: integer("block_ref").notNull(),
  },
  table => [index("swap_event_pool_id_ts_idx").on(table.poolId, table.ts.desc())],
);

export type SwapEventRow = typeof swapEvent.$inferSelect;
export type NewSwapEventRow = typeof swapEvent.$inferInsert;
