/**
 * packages/repositories - Shared Repository Layer
 *
 * - Interface-based repository pattern
 * - Separation of interface and implementation
 * - Reusable across apps
 */

export * from "./interfaces";
export * from "./postgres";
export * from "./types";
