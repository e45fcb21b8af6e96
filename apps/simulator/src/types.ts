/**
 * Simulator Types
 */

import type { Amount, Bps, ReserveState, Sec, SwapRecord, TargetUpdatedRecord } from "@dnmm/core";

export type SimulatorError =
  | { type: "CONFIG_ERROR"; message: string }
  | { type: "ENGINE_ERROR"; message: string }
  | { type: "FEED_ERROR"; message: string };

export type StepOutcome = "filled" | "partial" | "rejected";

/**
 * One simulated swap attempt
 */
export interface StepRecord {
  step: number;
  atSec: Sec;
  isBaseIn: boolean;
  amountIn: Amount;
  appliedAmountIn: Amount;
  amountOut: Amount;
  feeBps: Bps | null;
  /** Reference mid as a decimal string; empty when rejected */
  mid: string;
  outcome: StepOutcome;
  /** Reason code on success, engine error type on rejection */
  reason: string;
  regimeFlags: string[];
  usedFallback: boolean;
}

export interface ScenarioRunResult {
  scenario: string;
  steps: StepRecord[];
  swaps: SwapRecord[];
  rebalances: TargetUpdatedRecord[];
  finalReserves: ReserveState;
}
