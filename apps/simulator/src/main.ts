/**
 * Simulator Main Entry Point
 *
 * - Load pool config (parameter store or JSON) and scenarios
 * - Run each selected scenario with a seeded trade flow
 * - Log a summary per scenario, optionally write CSV and persist events
 */

import "dotenv/config";

import { openDb, type DbHandle } from "@dnmm/db";
import {
  createPostgresPoolConfigRepository,
  createPostgresRebalanceEventRepository,
  createPostgresSwapEventRepository,
} from "@dnmm/repositories";
import { configureLogger, logger } from "@dnmm/utils";

import { loadPoolConfig } from "./config/load-pool-config";
import { bundledConfigPath } from "./config/read-json";
import { loadEnv, type Env } from "./env";
import { writeStepsCsv } from "./report/csv-writer";
import { summarizeRun } from "./report/summary";
import { loadScenarios, selectScenarios } from "./scenario/scenario-schema";
import { runScenario } from "./scenario-runner";
import type { ScenarioRunResult } from "./types";

async function persistRun(handle: DbHandle, poolId: string, run: ScenarioRunResult): Promise<void> {
  const swapRepo = createPostgresSwapEventRepository(handle.db);
  const rebalanceRepo = createPostgresRebalanceEventRepository(handle.db);

  const saved = await swapRepo.appendMany(poolId, run.swaps);
  if (saved.isErr()) {
    logger.error("Failed to persist swaps", { scenario: run.scenario, error: saved.error.message });
  }

  for (const record of run.rebalances) {
    const appended = await rebalanceRepo.append(poolId, record);
    if (appended.isErr()) {
      logger.error("Failed to persist rebalance", { scenario: run.scenario, error: appended.error.message });
    }
  }
}

async function run(env: Env, handle: DbHandle | null): Promise<boolean> {
  const poolConfig = await loadPoolConfig(
    env.POOL_CONFIG_PATH ?? bundledConfigPath("pool.default.json"),
    handle ? { repository: createPostgresPoolConfigRepository(handle.db), poolId: env.POOL_ID } : undefined,
  );
  if (poolConfig.isErr()) {
    logger.error("Invalid pool config", { error: poolConfig.error.message });
    return false;
  }

  const scenarios = loadScenarios(env.SCENARIOS_PATH ?? bundledConfigPath("scenarios.json")).andThen(all =>
    selectScenarios(all, env.SCENARIO),
  );
  if (scenarios.isErr()) {
    logger.error("Invalid scenarios", { error: scenarios.error.message });
    return false;
  }

  const runs: ScenarioRunResult[] = [];
  const startSec = Math.floor(Date.now() / 1000);

  for (const scenario of scenarios.value) {
    logger.info("Running scenario", { scenario: scenario.name, trades: env.TRADES, seed: env.SEED });

    const result = runScenario({
      scenario,
      poolConfig: poolConfig.value,
      trades: env.TRADES,
      seed: env.SEED,
      mode: env.ORACLE_MODE,
      startSec,
    });
    if (result.isErr()) {
      logger.error("Scenario failed", { scenario: scenario.name, error: result.error.message });
      return false;
    }

    const summary = summarizeRun(result.value);
    logger.info("Scenario completed", {
      scenario: summary.scenario,
      filled: summary.filled,
      partial: summary.partial,
      rejected: summary.rejected,
      rejections: summary.rejections,
      avgFeeBps: summary.avgFeeBps,
      maxFeeBps: summary.maxFeeBps,
      fallbackSwaps: summary.fallbackSwaps,
      regimeCounts: summary.regimeCounts,
      rebalances: summary.rebalances,
      finalReserves: summary.finalReserves,
    });

    if (handle) await persistRun(handle, env.POOL_ID, result.value);
    runs.push(result.value);
  }

  if (env.SIM_OUT_CSV) {
    writeStepsCsv(runs, env.SIM_OUT_CSV);
    logger.info("CSV written", { path: env.SIM_OUT_CSV });
  }

  return true;
}

async function main(): Promise<void> {
  const env = loadEnv();
  configureLogger({ level: env.LOG_LEVEL });

  const handle = env.DATABASE_URL ? openDb(env.DATABASE_URL) : null;
  try {
    const succeeded = await run(env, handle);
    if (!succeeded) process.exitCode = 1;
  } finally {
    await handle?.close();
  }
}

main().catch(error => {
  logger.error("Fatal error", error);
  process.exit(1);
});
