/**
 * Trade Pricing - Shared by quote, swap and preview
 *
 * One code path from (oracle-derived inputs, reserves, config) to a fee and
 * a fill, so that preview and live execution cannot drift apart.
 *
 * This module is pure (no I/O, no throw).
 */

import type { Result } from "neverthrow";

import { clampToMinNotional, evaluateAomq, isSideActive, sideForTrade, detectFloorProximity } from "./degraded-quote";
import type { EngineError } from "./errors";
import { computeFeeBps } from "./fee-pipeline";
import { computeInventoryDeviationBps, computeInventoryFloors, solveFill } from "./inventory-solver";
import { quoteValueOf } from "./math";
import { encodeRegimeFlags } from "./regime-flags";
import type {
  AomqActivationState,
  Amount,
  Bps,
  FeeBreakdown,
  FillResult,
  InventoryFloors,
  PoolConfig,
  ReasonCode,
  RegimeFlag,
  RegimeFlags,
  ReserveState,
  Wad,
} from "./types";

/**
 * Oracle-derived inputs, either live or replayed from a snapshot
 */
export interface PricingInputs {
  midWad: Wad;
  confidenceBps: Bps;
  spreadBps: Bps;
  sigmaBps: Bps;
  haircutBps: Bps;
  usedFallback: boolean;
  softDivergenceActive: boolean;
}

export interface TradeIntent {
  amountIn: Amount;
  isBaseIn: boolean;
  caller?: string;
}

export interface TradeFee {
  floors: InventoryFloors;
  aomq: AomqActivationState;
  aomqOnSide: boolean;
  nearFloor: boolean;
  /** Input after the degraded-mode clamp */
  sizedIn: Amount;
  aomqClamped: boolean;
  notional: Amount;
  fees: FeeBreakdown;
}

export interface PricedTrade extends TradeFee {
  fill: FillResult;
  floorClamped: boolean;
  reason: ReasonCode;
  reasonCodes: ReasonCode[];
  regimeFlags: RegimeFlags;
}

/** Highest priority first */
const REASON_PRIORITY: ReasonCode[] = ["PARTIAL_FILL_FLOOR", "AOMQ_CLAMP", "FALLBACK_MODE", "SOFT_DIVERGENCE"];

export function isRebateEligible(caller: string | undefined, config: PoolConfig): boolean {
  return caller !== undefined && config.rebateAllowList.includes(caller);
}

/**
 * Fee for a trade of `amountIn`, including degraded-mode sizing
 */
export function computeTradeFee(
  inputs: PricingInputs,
  intent: TradeIntent,
  reserves: ReserveState,
  config: PoolConfig,
): TradeFee {
  const floors = computeInventoryFloors(reserves, inputs.midWad, config);
  const aomq = evaluateAomq(
    {
      softDivergenceActive: inputs.softDivergenceActive,
      usedFallback: inputs.usedFallback,
      reserves,
      floors,
      midWad: inputs.midWad,
    },
    config,
  );
  const proximity = detectFloorProximity(reserves, floors, inputs.midWad, config);
  const aomqOnSide = isSideActive(aomq, sideForTrade(intent.isBaseIn));

  const { sizedIn, clamped } = aomqOnSide
    ? clampToMinNotional(intent.amountIn, intent.isBaseIn, inputs.midWad, config)
    : { sizedIn: intent.amountIn, clamped: false };

  const notional = intent.isBaseIn ? quoteValueOf(sizedIn, inputs.midWad, config.tokens) : sizedIn;

  const fees = computeFeeBps(
    {
      confidenceBps: inputs.confidenceBps,
      haircutBps: inputs.haircutBps,
      notional,
      inventoryDeviationBps: computeInventoryDeviationBps(reserves),
      spreadBps: inputs.spreadBps,
      sigmaBps: inputs.sigmaBps,
      isBaseIn: intent.isBaseIn,
      aomqActive: aomqOnSide,
      rebateEligible: isRebateEligible(intent.caller, config),
    },
    config,
  );

  return {
    floors,
    aomq,
    aomqOnSide,
    nearFloor: proximity.base || proximity.quote,
    sizedIn,
    aomqClamped: clamped,
    notional,
    fees,
  };
}

/**
 * Fee plus fill. Leftover is measured against the caller's requested input.
 */
export function priceTrade(
  inputs: PricingInputs,
  intent: TradeIntent,
  reserves: ReserveState,
  config: PoolConfig,
): Result<PricedTrade, EngineError> {
  const tradeFee = computeTradeFee(inputs, intent, reserves, config);

  return solveFill({
    desiredIn: tradeFee.sizedIn,
    isBaseIn: intent.isBaseIn,
    reserves,
    floors: tradeFee.floors,
    midWad: inputs.midWad,
    feeBps: tradeFee.fees.totalBps,
    tokens: config.tokens,
  }).map(solved => {
    const fill: FillResult = {
      ...solved,
      leftoverAmountIn: intent.amountIn - solved.appliedAmountIn,
      isPartial: solved.appliedAmountIn < intent.amountIn,
    };

    const present = new Set<ReasonCode>();
    if (solved.isPartial) present.add("PARTIAL_FILL_FLOOR");
    if (tradeFee.aomqClamped) present.add("AOMQ_CLAMP");
    if (inputs.usedFallback) present.add("FALLBACK_MODE");
    if (inputs.softDivergenceActive || inputs.haircutBps > 0) present.add("SOFT_DIVERGENCE");
    const reasonCodes = REASON_PRIORITY.filter(code => present.has(code));

    const flags: RegimeFlag[] = [];
    if (tradeFee.aomq.askActive || tradeFee.aomq.bidActive) flags.push("AOMQ");
    if (inputs.usedFallback) flags.push("Fallback");
    if (tradeFee.nearFloor) flags.push("NearFloor");
    if (tradeFee.fees.sizeBps > 0) flags.push("SizeFee");
    if (tradeFee.fees.tiltBps !== 0) flags.push("InvTilt");
    if (inputs.softDivergenceActive) flags.push("SoftDivergence");

    return {
      ...tradeFee,
      fill,
      floorClamped: solved.isPartial,
      reason: reasonCodes[0] ?? "OK",
      reasonCodes: reasonCodes.length > 0 ? reasonCodes : ["OK"],
      regimeFlags: encodeRegimeFlags(flags),
    };
  });
}
