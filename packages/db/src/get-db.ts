/**
 * packages/db - DB connection helper
 *
 * Centralizes the `Pool` / `drizzle` setup; callers pass only the
 * connection string and get a `db` bound to the schema.
 */

import { drizzle } from "drizzle-orm/node-postgres";
import { Pool } from "pg";

import * as schema from "./schema";

export type Db = ReturnType<typeof drizzle<typeof schema>>;

export interface DbHandle {
  db: Db;
  close: () => Promise<void>;
}

/**
 * Open a pool-backed `db`; `close` ends the pool for short-lived processes
 */
export function openDb(connectionString: string): DbHandle {
  if (!connectionString) {
    throw new Error("DATABASE_URL is empty");
  }

  const pool = new Pool({ connectionString });
  const db = drizzle(pool, { schema });

  return { db, close: () => pool.end() };
}
