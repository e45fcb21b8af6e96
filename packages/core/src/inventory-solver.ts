/**
 * Inventory Solver - Fill sizing under inventory floors
 *
 * Output rounds down. When a fill would take the paid-out reserve below its
 * floor, the input is reduced to the smallest amount that reaches the floor
 * and the remainder is returned as leftover.
 *
 * This module is pure (no I/O, no throw).
 */

import { err, ok, type Result } from "neverthrow";

import type { EngineError } from "./errors";
import { BPS, baseAmountFor, minBigInt, mulDiv, quoteValueOf } from "./math";
import type { Amount, Bps, FillResult, InventoryFloors, PoolConfig, ReserveState, TokenConfig, Wad } from "./types";

export interface SolveFillInput {
  desiredIn: Amount;
  isBaseIn: boolean;
  reserves: ReserveState;
  floors: InventoryFloors;
  midWad: Wad;
  feeBps: Bps;
  tokens: TokenConfig;
}

/**
 * Floors are fractions of the target inventory, not of current reserves.
 */
export function computeInventoryFloors(reserves: ReserveState, midWad: Wad, config: PoolConfig): InventoryFloors {
  const floorBps = BigInt(config.inventory.floorBps);
  const targetQuoteValue = quoteValueOf(reserves.targetBaseStar, midWad, config.tokens, "up");
  return {
    base: mulDiv(reserves.targetBaseStar, floorBps, BPS, "up"),
    quote: mulDiv(targetQuoteValue, floorBps, BPS, "up"),
  };
}

/**
 * Signed (base - target) / target in bps, truncated toward zero
 */
export function computeInventoryDeviationBps(reserves: ReserveState): Bps {
  if (reserves.targetBaseStar === 0n) return 0;
  return Number(((reserves.baseReserve - reserves.targetBaseStar) * BPS) / reserves.targetBaseStar);
}

export function feeAmountFor(amountIn: Amount, feeBps: Bps): Amount {
  return mulDiv(amountIn, BigInt(feeBps), BPS, "up");
}

/**
 * Smallest input whose net-of-fee amount reaches `needNet`
 */
function minimalGrossFor(needNet: Amount, feeBps: Bps): Amount {
  const keepBps = BPS - BigInt(feeBps);
  let gross = mulDiv(needNet, BPS, keepBps, "up");
  while (gross - feeAmountFor(gross, feeBps) < needNet) {
    gross += 1n;
  }
  return gross;
}

/**
 * Size a fill against the paid-out reserve's floor.
 */
export function solveFill(input: SolveFillInput): Result<FillResult, EngineError> {
  const { desiredIn, isBaseIn, reserves, floors, midWad, feeBps, tokens } = input;

  if (desiredIn <= 0n) {
    return err({ type: "INVALID_AMOUNT", message: "amountIn must be positive" });
  }

  const reserveOut = isBaseIn ? reserves.quoteReserve : reserves.baseReserve;
  const floorOut = isBaseIn ? floors.quote : floors.base;
  const available = reserveOut - floorOut;

  if (available <= 0n) {
    return err({ type: "FLOOR_BREACH", reserve: reserveOut, floor: floorOut });
  }

  const convert = (net: Amount): Amount =>
    isBaseIn ? quoteValueOf(net, midWad, tokens, "down") : baseAmountFor(net, midWad, tokens, "down");

  const feeAmount = feeAmountFor(desiredIn, feeBps);
  const amountOut = convert(desiredIn - feeAmount);

  if (amountOut <= available) {
    if (amountOut === 0n) {
      return err({ type: "INVALID_AMOUNT", message: `amountIn ${desiredIn} produces no output` });
    }
    return ok({ amountOut, appliedAmountIn: desiredIn, leftoverAmountIn: 0n, feeAmount, isPartial: false });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Partial fill: reach the floor exactly
  // ─────────────────────────────────────────────────────────────────────────

  const needNet = isBaseIn
    ? baseAmountFor(available, midWad, tokens, "up")
    : quoteValueOf(available, midWad, tokens, "up");
  const appliedAmountIn = minimalGrossFor(needNet, feeBps);
  const appliedFee = feeAmountFor(appliedAmountIn, feeBps);
  const clampedOut = minBigInt(convert(appliedAmountIn - appliedFee), available);

  if (clampedOut <= 0n) {
    return err({ type: "FLOOR_BREACH", reserve: reserveOut, floor: floorOut });
  }

  return ok({
    amountOut: clampedOut,
    appliedAmountIn,
    leftoverAmountIn: desiredIn - appliedAmountIn,
    feeAmount: appliedFee,
    isPartial: appliedAmountIn < desiredIn,
  });
}

/**
 * Reserves after settling a fill. Fees stay in the pool.
 */
export function applyFill(reserves: ReserveState, fill: FillResult, isBaseIn: boolean): ReserveState {
  if (isBaseIn) {
    return {
      ...reserves,
      baseReserve: reserves.baseReserve + fill.appliedAmountIn,
      quoteReserve: reserves.quoteReserve - fill.amountOut,
    };
  }
  return {
    ...reserves,
    baseReserve: reserves.baseReserve - fill.amountOut,
    quoteReserve: reserves.quoteReserve + fill.appliedAmountIn,
  };
}
