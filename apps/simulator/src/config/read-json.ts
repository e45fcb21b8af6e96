/**
 * JSON file helpers for bundled and user-supplied config
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import { err, ok, type Result } from "neverthrow";

import type { SimulatorError } from "../types";

/**
 * Absolute path of a file under apps/simulator/config
 */
export function bundledConfigPath(fileName: string): string {
  return fileURLToPath(new URL(`../../config/${fileName}`, import.meta.url));
}

/**
 * Read a JSON file into an unknown value
 */
export function readJsonFile(path: string): Result<unknown, SimulatorError> {
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return ok(parsed);
  } catch (error) {
    return err({
      type: "CONFIG_ERROR",
      message: `failed to read ${path}: ${error instanceof Error ? error.message : String(error)}`,
    });
  }
}
