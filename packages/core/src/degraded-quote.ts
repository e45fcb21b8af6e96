/**
 * Degraded Quote Mode (AOMQ)
 *
 * Keeps the pool two-sided under stress with a reduced size and a wider fee.
 * Triggers, first match names the reason (sides accumulate):
 * 1. soft divergence active → both sides
 * 2. reserve within floorEpsilonBps of its floor → side that depletes it
 * 3. fallback oracle in use → both sides
 *
 * This module is pure (no I/O, no throw).
 */

import { BPS, baseAmountFor, mulDiv, quoteValueOf } from "./math";
import type {
  AomqActivationState,
  AomqTrigger,
  Amount,
  InventoryFloors,
  PoolConfig,
  PoolSide,
  ReserveState,
  Wad,
} from "./types";

export interface AomqInputs {
  softDivergenceActive: boolean;
  usedFallback: boolean;
  reserves: ReserveState;
  floors: InventoryFloors;
  midWad: Wad;
}

export interface FloorProximity {
  base: boolean;
  quote: boolean;
}

export const INACTIVE_AOMQ: AomqActivationState = { askActive: false, bidActive: false, triggerReason: null };

/**
 * Trader paying base hits the pool's bid; paying quote hits the ask.
 */
export function sideForTrade(isBaseIn: boolean): PoolSide {
  return isBaseIn ? "bid" : "ask";
}

export function isSideActive(state: AomqActivationState, side: PoolSide): boolean {
  return side === "ask" ? state.askActive : state.bidActive;
}

/**
 * reserve <= floor + target-relative epsilon, per asset
 */
export function detectFloorProximity(
  reserves: ReserveState,
  floors: InventoryFloors,
  midWad: Wad,
  config: PoolConfig,
): FloorProximity {
  const epsilonBps = BigInt(config.aomq.floorEpsilonBps);
  const targetQuoteValue = quoteValueOf(reserves.targetBaseStar, midWad, config.tokens);
  const baseBand = mulDiv(reserves.targetBaseStar, epsilonBps, BPS);
  const quoteBand = mulDiv(targetQuoteValue, epsilonBps, BPS);

  return {
    base: reserves.baseReserve <= floors.base + baseBand,
    quote: reserves.quoteReserve <= floors.quote + quoteBand,
  };
}

export function evaluateAomq(inputs: AomqInputs, config: PoolConfig): AomqActivationState {
  if (!config.featureFlags.enableAOMQ) {
    return INACTIVE_AOMQ;
  }

  let askActive = false;
  let bidActive = false;
  let triggerReason: AomqTrigger | null = null;

  if (inputs.softDivergenceActive) {
    askActive = true;
    bidActive = true;
    triggerReason = "SOFT_DIVERGENCE";
  }

  const proximity = detectFloorProximity(inputs.reserves, inputs.floors, inputs.midWad, config);
  if (proximity.base || proximity.quote) {
    // base near floor: selling base (ask) depletes it
    askActive = askActive || proximity.base;
    bidActive = bidActive || proximity.quote;
    triggerReason = triggerReason ?? "FLOOR_PROXIMITY";
  }

  if (inputs.usedFallback) {
    askActive = true;
    bidActive = true;
    triggerReason = triggerReason ?? "FALLBACK";
  }

  return { askActive, bidActive, triggerReason };
}

/**
 * Clamp input to the amount worth `minQuoteNotional`
 */
export function clampToMinNotional(
  amountIn: Amount,
  isBaseIn: boolean,
  midWad: Wad,
  config: PoolConfig,
): { sizedIn: Amount; clamped: boolean } {
  const maxIn = isBaseIn
    ? baseAmountFor(config.aomq.minQuoteNotional, midWad, config.tokens)
    : config.aomq.minQuoteNotional;

  if (maxIn > 0n && amountIn > maxIn) {
    return { sizedIn: maxIn, clamped: true };
  }
  return { sizedIn: amountIn, clamped: false };
}
