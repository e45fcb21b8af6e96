/**
 * Scenario Runner - Drives one stress scenario through the pool engine
 *
 * - Scripted oracle feed -> latest-value cache -> engine
 * - Seeded trade flow, one swap per step
 * - Simulated clock advances `stepSec` (one block) per step
 */

import { LatestOracleCache, ManualClock, ScenarioFeed } from "@dnmm/adapters";
import {
  decodeRegimeFlags,
  describeEngineError,
  fromWad,
  PoolEngine,
  type EngineError,
  type OracleMode,
  type PoolConfig,
  type SwapRecord,
  type SwapResult,
  type TargetUpdatedRecord,
} from "@dnmm/core";
import { logger } from "@dnmm/utils";
import { err, ok, type Result } from "neverthrow";

import { createTradeFlow } from "./flows/trade-flow";
import type { Scenario } from "./scenario/scenario-schema";
import type { ScenarioRunResult, SimulatorError, StepRecord } from "./types";

export interface ScenarioRunConfig {
  scenario: Scenario;
  poolConfig: PoolConfig;
  trades: number;
  seed: number;
  mode: OracleMode;
  /** Simulated start time, unix seconds */
  startSec: number;
  /** Called for every settled swap and target update, e.g. to persist them */
  onSwap?: (record: SwapRecord) => void;
  onTargetUpdated?: (record: TargetUpdatedRecord) => void;
}

function settledStep(step: number, atSec: number, result: SwapResult): StepRecord {
  return {
    step,
    atSec,
    isBaseIn: result.record.isBaseIn,
    amountIn: result.record.requestedAmountIn,
    appliedAmountIn: result.appliedAmountIn,
    amountOut: result.amountOut,
    feeBps: result.feeBpsUsed,
    mid: fromWad(result.midUsed),
    outcome: result.leftoverAmountIn > 0n ? "partial" : "filled",
    reason: result.reason,
    regimeFlags: result.regimeFlags.asArray,
    usedFallback: result.usedFallback,
  };
}

function rejectedStep(step: number, atSec: number, isBaseIn: boolean, amountIn: bigint, error: EngineError): StepRecord {
  return {
    step,
    atSec,
    isBaseIn,
    amountIn,
    appliedAmountIn: 0n,
    amountOut: 0n,
    feeBps: null,
    mid: "",
    outcome: "rejected",
    reason: error.type,
    regimeFlags: decodeRegimeFlags(0).asArray,
    usedFallback: false,
  };
}

/**
 * Run one scenario to completion
 */
export function runScenario(config: ScenarioRunConfig): Result<ScenarioRunResult, SimulatorError> {
  const { scenario, trades, seed, mode } = config;
  const poolConfig: PoolConfig = {
    ...config.poolConfig,
    featureFlags: { ...config.poolConfig.featureFlags, ...scenario.featureFlags },
  };

  const clock = new ManualClock(config.startSec);
  const cache = new LatestOracleCache(clock);
  const feed = new ScenarioFeed(scenario.oracle, scenario.name);
  const feedErrors: string[] = [];

  feed.onEvent(event => {
    const applied = cache.apply(event);
    if (applied.isErr()) feedErrors.push(applied.error.message);
  });

  const swaps: SwapRecord[] = [];
  const rebalances: TargetUpdatedRecord[] = [];

  const created = PoolEngine.create({
    config: poolConfig,
    oracle: cache,
    clock,
    initialReserves: {
      baseReserve: scenario.reserves.baseReserve,
      quoteReserve: scenario.reserves.quoteReserve,
      targetBaseStar: scenario.reserves.targetBaseStar ?? scenario.reserves.baseReserve,
    },
    hooks: {
      onSwap: record => {
        swaps.push(record);
        config.onSwap?.(record);
      },
      onTargetUpdated: record => {
        rebalances.push(record);
        logger.info("Target updated", {
          scenario: scenario.name,
          trigger: record.trigger,
          previousTarget: record.previousTarget,
          newTarget: record.newTarget,
          price: fromWad(record.priceWad),
        });
        config.onTargetUpdated?.(record);
      },
      onReject: (operation, error) => {
        logger.debug("Engine rejected", { scenario: scenario.name, operation, error: describeEngineError(error) });
      },
    },
  });
  if (created.isErr()) {
    return err({ type: "ENGINE_ERROR", message: describeEngineError(created.error) });
  }
  const engine = created.value;

  const started = feed.start();
  if (started.isErr()) return err({ type: "FEED_ERROR", message: started.error.message });

  const flow = createTradeFlow(scenario.flow, seed);
  const steps: StepRecord[] = [];

  for (let step = 0; step < trades; step++) {
    const ticked = feed.tick(step, clock.nowDate());
    if (ticked.isErr()) return err({ type: "FEED_ERROR", message: ticked.error.message });
    if (feedErrors.length > 0) {
      return err({ type: "FEED_ERROR", message: feedErrors.join("; ") });
    }

    if (scenario.manualRebalanceAtStep === step) {
      const manual = engine.manualRebalance();
      if (manual.isErr()) {
        logger.warn("Manual rebalance rejected", { scenario: scenario.name, error: describeEngineError(manual.error) });
      }
    }

    const draft = flow.next();
    const nowSec = clock.nowSec();
    const swapped = engine.swap({
      amountIn: draft.amountIn,
      isBaseIn: draft.isBaseIn,
      mode,
      minAmountOut: 0n,
      deadlineSec: nowSec + scenario.stepSec,
    });

    steps.push(
      swapped.isOk()
        ? settledStep(step, nowSec, swapped.value)
        : rejectedStep(step, nowSec, draft.isBaseIn, draft.amountIn, swapped.error),
    );

    clock.advance(scenario.stepSec);
  }

  feed.stop();

  return ok({
    scenario: scenario.name,
    steps,
    swaps,
    rebalances,
    finalReserves: engine.getReserves(),
  });
}
