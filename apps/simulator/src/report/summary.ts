/**
 * Run Summary - Aggregate metrics for one scenario run
 */

import type { Bps, ReserveState } from "@dnmm/core";

import type { ScenarioRunResult } from "../types";

export interface ScenarioSummary {
  scenario: string;
  trades: number;
  filled: number;
  partial: number;
  rejected: number;
  /** Engine error type -> count */
  rejections: Record<string, number>;
  /** Mean fee over settled swaps, rounded to 2 decimals */
  avgFeeBps: number | null;
  maxFeeBps: Bps | null;
  fallbackSwaps: number;
  /** Regime flag -> settled swaps carrying it */
  regimeCounts: Record<string, number>;
  rebalances: number;
  finalReserves: ReserveState;
}

export function summarizeRun(result: ScenarioRunResult): ScenarioSummary {
  const rejections: Record<string, number> = {};
  const regimeCounts: Record<string, number> = {};
  let filled = 0;
  let partial = 0;
  let rejected = 0;
  let fallbackSwaps = 0;
  let feeSum = 0;
  let maxFeeBps: Bps | null = null;

  for (const step of result.steps) {
    if (step.outcome === "rejected") {
      rejected++;
      rejections[step.reason] = (rejections[step.reason] ?? 0) + 1;
      continue;
    }

    if (step.outcome === "partial") partial++;
    else filled++;

    if (step.usedFallback) fallbackSwaps++;
    for (const flag of step.regimeFlags) {
      regimeCounts[flag] = (regimeCounts[flag] ?? 0) + 1;
    }

    const fee = step.feeBps ?? 0;
    feeSum += fee;
    maxFeeBps = maxFeeBps === null ? fee : Math.max(maxFeeBps, fee);
  }

  const settled = filled + partial;

  return {
    scenario: result.scenario,
    trades: result.steps.length,
    filled,
    partial,
    rejected,
    rejections,
    avgFeeBps: settled > 0 ? Math.round((feeSum / settled) * 100) / 100 : null,
    maxFeeBps,
    fallbackSwaps,
    regimeCounts,
    rebalances: result.rebalances.length,
    finalReserves: result.finalReserves,
  };
}
