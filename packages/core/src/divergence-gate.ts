/**
 * Divergence Gate - Cross-source deviation bands with hysteresis
 *
 * - delta <= accept: no adjustment; healthy streak grows
 * - accept < delta <= hard: soft band, haircut added to the fee
 * - delta > hard: DIVERGENCE_HARD, no state change
 *
 * Soft memory clears only after HEALTHY_FRAMES_TO_CLEAR consecutive
 * accept-band observations.
 *
 * This module is pure (no I/O, no throw).
 */

import { err, ok, type Result } from "neverthrow";

import type { EngineError } from "./errors";
import { BPS, mulDiv } from "./math";
import type { Bps, FeatureFlags, OracleConfig, ReferencePrice, SoftDivergenceState, Wad } from "./types";

export const HEALTHY_FRAMES_TO_CLEAR = 3;

export type DivergenceBand = "ACCEPT" | "SOFT" | "HARD";

export interface DivergenceOutcome {
  band: DivergenceBand;
  deltaBps: Bps;
  haircutBps: Bps;
  nextState: SoftDivergenceState;
  /** false when no independent pair was available to compare */
  observed: boolean;
}

export function createInitialSoftDivergenceState(): SoftDivergenceState {
  return { active: false, healthyStreak: 0, lastDeltaBps: 0 };
}

/**
 * Symmetric deviation: (max - min) / max, in bps, rounded down
 */
export function computeDeviationBps(a: Wad, b: Wad): Bps {
  const hi = a > b ? a : b;
  const lo = a > b ? b : a;
  if (hi === 0n) return 0;
  return Number(mulDiv(hi - lo, BPS, hi));
}

export function classifyDivergence(deltaBps: Bps, oracle: OracleConfig): DivergenceBand {
  if (deltaBps <= oracle.divergenceAcceptBps) return "ACCEPT";
  if (deltaBps <= oracle.divergenceHardBps) return "SOFT";
  return "HARD";
}

/**
 * haircut = min + slope * (delta - accept); saturates at the soft edge
 */
export function computeHaircutBps(deltaBps: Bps, oracle: OracleConfig): Bps {
  if (deltaBps <= oracle.divergenceAcceptBps) return 0;
  const effective = Math.min(deltaBps, oracle.divergenceSoftBps);
  return oracle.haircutMinBps + oracle.haircutSlopeBps * (effective - oracle.divergenceAcceptBps);
}

/**
 * Evaluate one observation against the current soft-divergence memory.
 *
 * The returned `nextState` is only committed by the caller on success.
 */
export function evaluateDivergence(
  crossCheck: ReferencePrice["crossCheck"],
  state: SoftDivergenceState,
  oracle: OracleConfig,
  flags: FeatureFlags,
): Result<DivergenceOutcome, EngineError> {
  const deltaBps = crossCheck ? computeDeviationBps(crossCheck.primaryMid, crossCheck.secondaryMid) : null;
  return evaluateDeviation(deltaBps, state, oracle, flags);
}

/**
 * Band transition for an already measured deviation; `null` means no pair
 * was observed and the memory is left as is.
 */
export function evaluateDeviation(
  deltaBps: Bps | null,
  state: SoftDivergenceState,
  oracle: OracleConfig,
  flags: FeatureFlags,
): Result<DivergenceOutcome, EngineError> {
  if (deltaBps === null) {
    return ok({ band: "ACCEPT", deltaBps: 0, haircutBps: 0, nextState: state, observed: false });
  }

  if (!flags.enableSoftDivergence) {
    if (deltaBps > oracle.divergenceBps) {
      return err({ type: "DIVERGENCE_HARD", deltaBps, hardBps: oracle.divergenceBps });
    }
    return ok({ band: "ACCEPT", deltaBps, haircutBps: 0, nextState: state, observed: true });
  }

  const band = classifyDivergence(deltaBps, oracle);

  if (band === "HARD") {
    return err({ type: "DIVERGENCE_HARD", deltaBps, hardBps: oracle.divergenceHardBps });
  }

  if (band === "SOFT") {
    return ok({
      band,
      deltaBps,
      haircutBps: computeHaircutBps(deltaBps, oracle),
      nextState: { active: true, healthyStreak: 0, lastDeltaBps: deltaBps },
      observed: true,
    });
  }

  const healthyStreak = Math.min(state.healthyStreak + 1, HEALTHY_FRAMES_TO_CLEAR);
  return ok({
    band,
    deltaBps,
    haircutBps: 0,
    nextState: {
      active: state.active && healthyStreak < HEALTHY_FRAMES_TO_CLEAR,
      healthyStreak,
      lastDeltaBps: deltaBps,
    },
    observed: true,
  });
}
