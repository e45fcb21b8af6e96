/**
 * Fee Pipeline - Composable fee in basis points
 *
 * Order of application:
 * 1. base + confidence + inventory deviation + divergence haircut
 * 2. size fee (lin·u + quad·u², capped)
 * 3. inventory tilt (signed, capped both ways)
 * 4. BBO-aware floor
 * 5. volatility surcharge, then the global cap
 * 6. rebate (allow-listed callers), re-clamped to [floor, cap]
 * 7. degraded-mode emergency spread, still within the cap
 *
 * Disabled components contribute exactly zero. Each component is rounded
 * toward zero to an integer bps.
 *
 * This module is pure (no I/O, no throw).
 */

import { BPS_NUMBER, clamp, Dec, truncBps } from "./math";
import type { Amount, Bps, FeeBreakdown, PoolConfig } from "./types";

/**
 * Per-trade inputs to the pipeline
 */
export interface FeeContext {
  confidenceBps: Bps;
  haircutBps: Bps;
  /** Trade notional in quote units */
  notional: Amount;
  /** Signed (base - target) / target, in bps */
  inventoryDeviationBps: Bps;
  spreadBps: Bps;
  sigmaBps: Bps;
  isBaseIn: boolean;
  /** Degraded mode active on the side this trade hits */
  aomqActive: boolean;
  rebateEligible: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Components
// ─────────────────────────────────────────────────────────────────────────────

/**
 * min(cap, lin·u + quad·u²) with u = notional / s0
 */
export function computeSizeFeeBps(notional: Amount, config: PoolConfig): Bps {
  const { gammaSizeLinBps, gammaSizeQuadBps, sizeFeeCapBps } = config.fee;
  if (!config.featureFlags.enableSizeFee || notional <= 0n || config.maker.s0Notional <= 0n) {
    return 0;
  }

  const u = new Dec(notional.toString()).div(config.maker.s0Notional.toString());
  const raw = u.mul(gammaSizeLinBps).plus(u.pow(2).mul(gammaSizeQuadBps));
  return Math.min(truncBps(raw), sizeFeeCapBps);
}

/**
 * Signed tilt: positive when the trade pushes inventory further from target.
 */
export function computeInventoryTiltBps(
  inventoryDeviationBps: Bps,
  isBaseIn: boolean,
  spreadBps: Bps,
  confidenceBps: Bps,
  config: PoolConfig,
): Bps {
  const { invTiltBpsPer1pct, invTiltMaxBps, tiltSpreadWeightBps, tiltConfWeightBps } = config.inventory;
  if (!config.featureFlags.enableInvTilt || inventoryDeviationBps === 0) {
    return 0;
  }

  const deviationPct = new Dec(inventoryDeviationBps).div(100);
  const direction = isBaseIn ? 1 : -1;
  const spreadWeight = new Dec(1).plus(new Dec(tiltSpreadWeightBps).div(BPS_NUMBER).mul(spreadBps).div(100));
  const confWeight = new Dec(1).plus(new Dec(tiltConfWeightBps).div(BPS_NUMBER).mul(confidenceBps).div(100));

  const tilt = deviationPct.mul(invTiltBpsPer1pct).mul(direction).mul(spreadWeight).mul(confWeight);
  return clamp(truncBps(tilt), -invTiltMaxBps, invTiltMaxBps);
}

/**
 * max(betaFloor, alphaBbo · spread)
 */
export function computeBboFloorBps(spreadBps: Bps, config: PoolConfig): Bps {
  if (!config.featureFlags.enableBboFloor) return 0;
  const { alphaBboBps, betaFloorBps } = config.maker;
  const spreadFloor = truncBps(new Dec(alphaBboBps).mul(spreadBps).div(BPS_NUMBER));
  return Math.max(betaFloorBps, spreadFloor);
}

/**
 * min(cap, kappa · (sigma · √ttlSec + bias)); bias only while degraded on this side
 */
export function computeVolatilitySurchargeBps(sigmaBps: Bps, aomqActive: boolean, config: PoolConfig): Bps {
  if (!config.featureFlags.enableVolSurcharge) return 0;
  const { kappaBps, capBps, toxicityBiasBps } = config.fee.volatility;

  const ttlSec = new Dec(config.maker.ttlMs).div(1000);
  const bias = aomqActive ? toxicityBiasBps : 0;
  const raw = new Dec(sigmaBps).mul(ttlSec.sqrt()).plus(bias).mul(kappaBps).div(BPS_NUMBER);
  return Math.min(truncBps(raw), capBps);
}

function ratioBps(value: Bps, numerator: number, denominator: number): Bps {
  if (denominator <= 0) return 0;
  return truncBps(new Dec(value).mul(numerator).div(denominator));
}

// ─────────────────────────────────────────────────────────────────────────────
// Pipeline
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Compute the full fee breakdown for one trade
 */
export function computeFeeBps(ctx: FeeContext, config: PoolConfig): FeeBreakdown {
  const { fee, featureFlags, aomq } = config;

  const confidenceBps = ratioBps(ctx.confidenceBps, fee.alphaNumerator, fee.alphaDenominator);
  const deviationBps = ratioBps(
    Math.abs(ctx.inventoryDeviationBps),
    fee.betaInvDevNumerator,
    fee.betaInvDevDenominator,
  );
  const sizeBps = computeSizeFeeBps(ctx.notional, config);
  const tiltBps = computeInventoryTiltBps(ctx.inventoryDeviationBps, ctx.isBaseIn, ctx.spreadBps, ctx.confidenceBps, config);
  const floorBps = computeBboFloorBps(ctx.spreadBps, config);
  const volatilityBps = computeVolatilitySurchargeBps(ctx.sigmaBps, ctx.aomqActive, config);

  let total = Math.max(0, fee.baseBps + confidenceBps + deviationBps + ctx.haircutBps + sizeBps + tiltBps);
  total = Math.max(total, floorBps);
  total = Math.min(total + volatilityBps, fee.capBps);

  const rebateBps = featureFlags.enableRebates && ctx.rebateEligible ? fee.rebateBps : 0;
  if (rebateBps > 0) {
    total = Math.min(Math.max(total - rebateBps, floorBps), fee.capBps);
  }

  const emergencyBps = featureFlags.enableAOMQ && ctx.aomqActive ? aomq.emergencySpreadBps : 0;
  if (emergencyBps > 0) {
    total = Math.min(Math.max(total, emergencyBps), fee.capBps);
  }

  return {
    baseBps: fee.baseBps,
    confidenceBps,
    deviationBps,
    haircutBps: ctx.haircutBps,
    sizeBps,
    tiltBps,
    floorBps,
    volatilityBps,
    rebateBps,
    emergencyBps,
    totalBps: total,
  };
}
