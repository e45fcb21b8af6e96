/**
 * Recenter - Target inventory recomputation
 *
 * IDLE → COMMITTED → IDLE. A commit records the trigger price and time,
 * resets the healthy streak and emits exactly one TARGET_UPDATED record.
 *
 * Auto recenter runs as a side effect of a settled swap; manual recenter is
 * permissionless but gated by strict oracle freshness (caller side), the
 * cooldown and both thresholds.
 *
 * This module is pure (no I/O, no throw).
 */

import { err, ok, type Result } from "neverthrow";

import type { EngineError } from "./errors";
import { baseAmountFor, quoteValueOf, relativeChangeBps } from "./math";
import type { Amount, Bps, PoolConfig, RecenterState, ReserveState, Sec, TargetUpdatedRecord, Wad } from "./types";

export interface RecenterContext {
  state: RecenterState;
  reserves: ReserveState;
  priceWad: Wad;
  nowSec: Sec;
  blockRef: number;
  config: PoolConfig;
}

export interface RecenterCommit {
  nextState: RecenterState;
  nextReserves: ReserveState;
  record: TargetUpdatedRecord;
}

export type AutoRecenterOutcome =
  | { kind: "baseline"; nextState: RecenterState }
  | { kind: "idle"; nextState: RecenterState }
  | ({ kind: "commit" } & RecenterCommit);

export interface RebalanceProposal {
  newTarget: Amount;
  changeBps: Bps;
  accepted: boolean;
}

/**
 * Streak starts saturated so the first qualifying move can commit.
 */
export function createInitialRecenterState(config: PoolConfig): RecenterState {
  return {
    lastRebalancePriceWad: 0n,
    lastRebalanceAtSec: null,
    healthyStreak: config.inventory.recenterHealthyFrames,
  };
}

export function recenterThresholdBps(config: PoolConfig): Bps {
  return Math.round(config.inventory.recenterThresholdPct * 100);
}

export function cooldownRemainingSec(state: RecenterState, nowSec: Sec, config: PoolConfig): Sec {
  if (state.lastRebalanceAtSec === null) return 0;
  return Math.max(0, state.lastRebalanceAtSec + config.inventory.recenterCooldownSec - nowSec);
}

/**
 * total = quote + base·price; newTarget = total / 2 / price
 */
export function performRebalance(reserves: ReserveState, priceWad: Wad, config: PoolConfig): RebalanceProposal {
  const totalQuoteValue = reserves.quoteReserve + quoteValueOf(reserves.baseReserve, priceWad, config.tokens);
  const newTarget = baseAmountFor(totalQuoteValue, priceWad, config.tokens) / 2n;
  const changeBps =
    reserves.targetBaseStar === 0n ? (newTarget > 0n ? 10_000 : 0) : relativeChangeBps(reserves.targetBaseStar, newTarget);

  return {
    newTarget,
    changeBps,
    accepted: newTarget !== reserves.targetBaseStar && changeBps >= config.inventory.recenterMinTargetChangeBps,
  };
}

function commit(ctx: RecenterContext, newTarget: Amount, trigger: TargetUpdatedRecord["trigger"]): RecenterCommit {
  return {
    nextState: { lastRebalancePriceWad: ctx.priceWad, lastRebalanceAtSec: ctx.nowSec, healthyStreak: 0 },
    nextReserves: { ...ctx.reserves, targetBaseStar: newTarget },
    record: {
      type: "TARGET_UPDATED",
      trigger,
      previousTarget: ctx.reserves.targetBaseStar,
      newTarget,
      priceWad: ctx.priceWad,
      atSec: ctx.nowSec,
      blockRef: ctx.blockRef,
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Automatic
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Evaluate an auto recenter against post-trade reserves
 */
export function evaluateAutoRecenter(ctx: RecenterContext): AutoRecenterOutcome {
  const { state, config } = ctx;

  if (!config.featureFlags.enableAutoRecenter || ctx.priceWad <= 0n) {
    return { kind: "idle", nextState: state };
  }

  if (state.lastRebalancePriceWad === 0n) {
    return { kind: "baseline", nextState: { ...state, lastRebalancePriceWad: ctx.priceWad } };
  }

  const moveBps = relativeChangeBps(state.lastRebalancePriceWad, ctx.priceWad);
  if (moveBps < recenterThresholdBps(config)) {
    const healthyStreak = Math.min(state.healthyStreak + 1, config.inventory.recenterHealthyFrames);
    return { kind: "idle", nextState: { ...state, healthyStreak } };
  }

  if (cooldownRemainingSec(state, ctx.nowSec, config) > 0) {
    return { kind: "idle", nextState: state };
  }
  if (state.healthyStreak < config.inventory.recenterHealthyFrames) {
    return { kind: "idle", nextState: state };
  }

  const proposal = performRebalance(ctx.reserves, ctx.priceWad, config);
  if (!proposal.accepted) {
    return { kind: "idle", nextState: state };
  }

  return { kind: "commit", ...commit(ctx, proposal.newTarget, "auto") };
}

// ─────────────────────────────────────────────────────────────────────────────
// Manual
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Manual recenter. Price must already be a strict-mode reading.
 *
 * Without a recorded baseline price only the target-change gate applies.
 */
export function evaluateManualRecenter(ctx: RecenterContext): Result<RecenterCommit, EngineError> {
  const { state, config } = ctx;

  const remainingSec = cooldownRemainingSec(state, ctx.nowSec, config);
  if (remainingSec > 0) {
    return err({ type: "RECENTER_COOLDOWN", remainingSec });
  }

  if (state.lastRebalancePriceWad > 0n) {
    const moveBps = relativeChangeBps(state.lastRebalancePriceWad, ctx.priceWad);
    const thresholdBps = recenterThresholdBps(config);
    if (moveBps < thresholdBps) {
      return err({ type: "RECENTER_THRESHOLD", kind: "PRICE_MOVE", observedBps: moveBps, thresholdBps });
    }
  }

  const proposal = performRebalance(ctx.reserves, ctx.priceWad, config);
  if (!proposal.accepted) {
    return err({
      type: "RECENTER_THRESHOLD",
      kind: "TARGET_CHANGE",
      observedBps: proposal.changeBps,
      thresholdBps: config.inventory.recenterMinTargetChangeBps,
    });
  }

  return ok(commit(ctx, proposal.newTarget, "manual"));
}
