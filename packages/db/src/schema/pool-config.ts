/**
 * pool_config - Governance parameter sets
 *
 * - One row per submitted config; `config` holds the serialized PoolConfig
 * - is_current = true marks the active set for a pool
 */

import { boolean, index, jsonb, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

export const poolConfig = pgTable(
  "pool_config",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    poolId: text("pool_id").notNull(),
    isCurrent: boolean("is_current").notNull().default(false),
    createdAt: timestamp("created_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
    createdBy: text("created_by").notNull(), // governance/simulator
    config: jsonb("config").notNull(),
    comment: text("comment"),
  },
  table => [index("pool_config_pool_id_is_current_idx").on(table.poolId, table.isCurrent)],
);

export type PoolConfigRow = typeof poolConfig.$inferSelect;
export type NewPoolConfigRow = typeof poolConfig.$inferInsert;
