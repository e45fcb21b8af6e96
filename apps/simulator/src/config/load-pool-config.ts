/**
 * Pool config loading for the simulator
 *
 * - Current config from the parameter store when a repository is given
 * - JSON file otherwise, or when the store has no current config
 */

import { describeEngineError, validatePoolConfig, type PoolConfig } from "@dnmm/core";
import type { PoolConfigRepository } from "@dnmm/repositories";
import { logger } from "@dnmm/utils";
import { err, ok, type Result } from "neverthrow";

import type { SimulatorError } from "../types";
import { readJsonFile } from "./read-json";

export function loadPoolConfigFile(path: string): Result<PoolConfig, SimulatorError> {
  return readJsonFile(path).andThen(raw =>
    validatePoolConfig(raw).mapErr(
      (error): SimulatorError => ({ type: "CONFIG_ERROR", message: `${path}: ${describeEngineError(error)}` }),
    ),
  );
}

export async function loadPoolConfig(
  filePath: string,
  store?: { repository: PoolConfigRepository; poolId: string },
): Promise<Result<PoolConfig, SimulatorError>> {
  if (!store) return loadPoolConfigFile(filePath);

  const current = await store.repository.getCurrent(store.poolId);
  if (current.isErr()) {
    return err({ type: "CONFIG_ERROR", message: `pool_config read failed: ${current.error.message}` });
  }
  if (current.value === null) {
    logger.warn("No current pool_config row, using file", { poolId: store.poolId, filePath });
    return loadPoolConfigFile(filePath);
  }

  logger.info("Loaded pool config from store", { poolId: store.poolId, configId: current.value.id });
  return ok(current.value.config);
}
