// Export schema and utilities
export * from "./schema";

// Connection helper (Node-only)
export { openDb } from "./get-db";
export type { Db, DbHandle } from "./get-db";
