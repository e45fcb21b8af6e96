/**
 * Preview - Fee replay against the last settled snapshot
 *
 * Preview rebuilds the pricing inputs from the snapshot and runs the same
 * pricing path as a live swap, against current reserves, config and
 * soft-divergence memory. The snapshot's deviation is replayed through the
 * divergence gate, so a preview sees the same band transition the next swap
 * would.
 *
 * This module is pure (no I/O, no throw).
 */

import { err, ok, type Result } from "neverthrow";

import { evaluateDeviation } from "./divergence-gate";
import type { EngineError } from "./errors";
import { quoteValueOf } from "./math";
import { blendConfidenceBps } from "./oracle-fusion";
import { computeTradeFee, priceTrade, type PricingInputs } from "./pricing";
import type {
  Amount,
  Bps,
  ClampStatus,
  PoolConfig,
  PreviewLadder,
  PreviewSnapshot,
  ReserveState,
  Sec,
  SoftDivergenceState,
} from "./types";

export interface PreviewOptions {
  isBaseIn: boolean;
  caller?: string;
}

export interface FreshSnapshot {
  snapshot: PreviewSnapshot;
  ageSec: Sec;
}

/**
 * Stale snapshots are served best effort unless `preview.strict` is set.
 */
export function checkSnapshotFreshness(
  snapshot: PreviewSnapshot | null,
  nowSec: Sec,
  config: PoolConfig,
): Result<FreshSnapshot, EngineError> {
  if (snapshot === null) {
    return err({ type: "MID_UNSET", message: "no preview snapshot recorded" });
  }

  const ageSec = Math.max(0, nowSec - snapshot.timestampSec);
  if (config.preview.strict && ageSec > config.preview.maxAgeSec) {
    return err({ type: "PREVIEW_SNAPSHOT_STALE", ageSec, maxAgeSec: config.preview.maxAgeSec });
  }

  return ok({ snapshot, ageSec });
}

export function pricingInputsFromSnapshot(
  snapshot: PreviewSnapshot,
  softState: SoftDivergenceState,
  config: PoolConfig,
): Result<PricingInputs, EngineError> {
  const observedBps = snapshot.divergenceObserved ? snapshot.divergenceBps : null;

  return evaluateDeviation(observedBps, softState, config.oracle, config.featureFlags).map(divergence => ({
    midWad: snapshot.midWad,
    confidenceBps: blendConfidenceBps(
      {
        spreadBps: snapshot.spreadBps,
        sigmaBps: snapshot.sigmaBps,
        secondaryConfBps: snapshot.secondaryConfBps,
      },
      snapshot.mode,
      config.oracle,
      config.featureFlags,
    ),
    spreadBps: snapshot.spreadBps,
    sigmaBps: snapshot.sigmaBps,
    haircutBps: divergence.haircutBps,
    usedFallback: snapshot.usedFallback,
    softDivergenceActive: divergence.nextState.active,
  }));
}

/**
 * Total fee (bps) per input size
 */
export function previewFees(
  snapshot: PreviewSnapshot,
  softState: SoftDivergenceState,
  sizes: Amount[],
  options: PreviewOptions,
  reserves: ReserveState,
  config: PoolConfig,
): Result<Bps[], EngineError> {
  return pricingInputsFromSnapshot(snapshot, softState, config).map(inputs =>
    sizes.map(
      amountIn =>
        computeTradeFee(inputs, { amountIn, isBaseIn: options.isBaseIn, caller: options.caller }, reserves, config).fees
          .totalBps,
    ),
  );
}

const CLAMP_SEVERITY: Record<ClampStatus, number> = { none: 0, size_fee: 1, aomq: 2, floor: 3 };

function clampStatusFor(
  inputs: PricingInputs,
  amountIn: Amount,
  isBaseIn: boolean,
  reserves: ReserveState,
  config: PoolConfig,
): { feeBps: Bps; status: ClampStatus } {
  const intent = { amountIn, isBaseIn };
  const priced = priceTrade(inputs, intent, reserves, config);

  if (priced.isErr()) {
    return {
      feeBps: computeTradeFee(inputs, intent, reserves, config).fees.totalBps,
      status: priced.error.type === "FLOOR_BREACH" ? "floor" : "none",
    };
  }

  const { value } = priced;
  let status: ClampStatus = "none";
  if (value.floorClamped) status = "floor";
  else if (value.aomqClamped) status = "aomq";
  else if (value.fees.sizeBps > 0 && value.fees.sizeBps >= config.fee.sizeFeeCapBps) status = "size_fee";

  return { feeBps: value.fees.totalBps, status };
}

/**
 * Ask/bid fees over `baseSize × preview.ladderMultipliers` (base units).
 *
 * Ask rungs price a quote-in trade worth the rung's base size.
 */
export function previewLadder(
  fresh: FreshSnapshot,
  softState: SoftDivergenceState,
  baseSize: Amount,
  reserves: ReserveState,
  config: PoolConfig,
): Result<PreviewLadder, EngineError> {
  return pricingInputsFromSnapshot(fresh.snapshot, softState, config).map(inputs => {
    const sizes = config.preview.ladderMultipliers.map(multiplier => baseSize * BigInt(multiplier));

    const askFee: Bps[] = [];
    const bidFee: Bps[] = [];
    const clampFlags: ClampStatus[] = [];

    for (const size of sizes) {
      const quoteIn = quoteValueOf(size, inputs.midWad, config.tokens);
      const ask = clampStatusFor(inputs, quoteIn, false, reserves, config);
      const bid = clampStatusFor(inputs, size, true, reserves, config);

      askFee.push(ask.feeBps);
      bidFee.push(bid.feeBps);
      clampFlags.push(CLAMP_SEVERITY[ask.status] >= CLAMP_SEVERITY[bid.status] ? ask.status : bid.status);
    }

    return { sizes, askFee, bidFee, clampFlags, snapshotAgeSec: fresh.ageSec };
  });
}
