/**
 * Repository Types
 *
 * Types shared across repositories
 */

/**
 * Repository error types
 */
export type RepositoryError =
  | { type: "DB_ERROR"; message: string }
  | { type: "NOT_FOUND"; message: string }
  | { type: "INVALID_ROW"; message: string };

/**
 * Wrap a thrown driver error
 */
export function toDbError(error: unknown): RepositoryError {
  return {
    type: "DB_ERROR",
    message: error instanceof Error ? error.message : "Unknown error",
  };
}
