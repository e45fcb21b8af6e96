/**
 * Pool Engine - Single-pool market maker state and entry points
 *
 * Owns reserves, soft-divergence memory, volatility, recenter state and the
 * preview snapshot. Every operation is all-or-nothing: state is written only
 * after every check has passed. Callers serialize swaps.
 *
 * The engine does no I/O; settled records go out through hooks.
 */

import { err, ok, type Result } from "neverthrow";

import { validatePoolConfig } from "./config-schema";
import { detectFloorProximity, evaluateAomq, INACTIVE_AOMQ } from "./degraded-quote";
import { createInitialSoftDivergenceState, evaluateDivergence } from "./divergence-gate";
import type { EngineError } from "./errors";
import { applyFill, computeInventoryFloors } from "./inventory-solver";
import { readReferencePrice } from "./oracle-fusion";
import {
  checkSnapshotFreshness,
  previewFees as replayFees,
  previewLadder as replayLadder,
  type PreviewOptions,
} from "./preview";
import { priceTrade, type PricedTrade, type PricingInputs } from "./pricing";
import { createInitialRecenterState, evaluateAutoRecenter, evaluateManualRecenter } from "./recenter";
import { decodeRegimeFlags, encodeRegimeFlags } from "./regime-flags";
import { createInitialVolatilityState, updateVolatility } from "./volatility";
import type {
  AomqActivationState,
  Amount,
  Bps,
  Clock,
  OracleMode,
  OracleReader,
  PoolConfig,
  PreviewLadder,
  PreviewSnapshot,
  QuoteRequest,
  QuoteResult,
  RecenterState,
  ReferencePrice,
  RegimeFlag,
  ReserveState,
  SoftDivergenceState,
  SwapRecord,
  SwapRequest,
  SwapResult,
  TargetUpdatedRecord,
  VolatilityState,
} from "./types";

export type EngineOperation = "quote" | "swap" | "manualRebalance" | "refreshPreviewSnapshot";

/**
 * Observers for settled state changes and rejections
 */
export interface PoolEngineHooks {
  onSwap?: (record: SwapRecord) => void;
  onTargetUpdated?: (record: TargetUpdatedRecord) => void;
  onReject?: (operation: EngineOperation, error: EngineError) => void;
}

export interface PoolEngineDeps {
  config: PoolConfig;
  oracle: OracleReader;
  clock: Clock;
  initialReserves: ReserveState;
  hooks?: PoolEngineHooks;
}

interface PricingContext {
  mode: OracleMode;
  reference: ReferencePrice;
  inputs: PricingInputs;
  divergenceBps: Bps;
  divergenceObserved: boolean;
  nextSoftState: SoftDivergenceState;
}

export class PoolEngine {
  private config: PoolConfig;
  private readonly oracle: OracleReader;
  private readonly clock: Clock;
  private readonly hooks: PoolEngineHooks;

  private reserves: ReserveState;
  private softDivergence: SoftDivergenceState;
  private volatility: VolatilityState;
  private recenter: RecenterState;
  private aomq: AomqActivationState = INACTIVE_AOMQ;
  private snapshot: PreviewSnapshot | null = null;

  private constructor(deps: PoolEngineDeps, config: PoolConfig) {
    this.config = config;
    this.oracle = deps.oracle;
    this.clock = deps.clock;
    this.hooks = deps.hooks ?? {};
    this.reserves = { ...deps.initialReserves };
    this.softDivergence = createInitialSoftDivergenceState();
    this.volatility = createInitialVolatilityState();
    this.recenter = createInitialRecenterState(config);
  }

  /**
   * Validate config and reserves, then build an engine
   */
  static create(deps: PoolEngineDeps): Result<PoolEngine, EngineError> {
    const { baseReserve, quoteReserve, targetBaseStar } = deps.initialReserves;
    if (baseReserve < 0n || quoteReserve < 0n || targetBaseStar < 0n) {
      return err({ type: "INVALID_AMOUNT", message: "reserves and target must be non-negative" });
    }
    return validatePoolConfig(deps.config).map(config => new PoolEngine(deps, config));
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Trading
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Price a trade against live oracle state. No mutation.
   */
  quote(request: QuoteRequest): Result<QuoteResult, EngineError> {
    const result = this.validateAmount(request.amountIn)
      .andThen(() => this.buildPricingContext(request.mode))
      .andThen(ctx =>
        priceTrade(ctx.inputs, request, this.reserves, this.config).map(priced => toQuoteResult(priced, ctx)),
      );
    return this.reportRejection("quote", result);
  }

  /**
   * Execute a trade. Mutates reserves and all engine state on success.
   */
  swap(request: SwapRequest): Result<SwapResult, EngineError> {
    const nowSec = this.clock.nowSec();
    const blockRef = this.clock.blockRef();

    const result = this.checkDeadline(request.deadlineSec, nowSec)
      .andThen(() => this.validateAmount(request.amountIn))
      .andThen(() => this.buildPricingContext(request.mode))
      .andThen(ctx =>
        priceTrade(ctx.inputs, request, this.reserves, this.config).andThen((priced): Result<SwapResult, EngineError> => {
          if (priced.fill.amountOut < request.minAmountOut) {
            return err({
              type: "SLIPPAGE",
              amountOut: priced.fill.amountOut,
              minAmountOut: request.minAmountOut,
            });
          }
          return ok(this.settle(request, priced, ctx, nowSec, blockRef));
        }),
      );

    return this.reportRejection("swap", result);
  }

  private settle(
    request: SwapRequest,
    priced: PricedTrade,
    ctx: PricingContext,
    nowSec: number,
    blockRef: number,
  ): SwapResult {
    const midWad = ctx.inputs.midWad;
    const postTrade = applyFill(this.reserves, priced.fill, request.isBaseIn);
    const nextVolatility = updateVolatility(this.volatility, midWad, this.config.oracle.sigmaEwmaLambdaBps);

    const recenter = evaluateAutoRecenter({
      state: this.recenter,
      reserves: postTrade,
      priceWad: midWad,
      nowSec,
      blockRef,
      config: this.config,
    });
    const nextReserves = recenter.kind === "commit" ? recenter.nextReserves : postTrade;
    const rebalance = recenter.kind === "commit" ? recenter.record : undefined;

    const quoteResult = toQuoteResult(priced, ctx);
    const record: SwapRecord = {
      type: "SWAP_SETTLED",
      isBaseIn: request.isBaseIn,
      requestedAmountIn: request.amountIn,
      appliedAmountIn: priced.fill.appliedAmountIn,
      amountOut: priced.fill.amountOut,
      feeBpsUsed: priced.fees.totalBps,
      midUsed: midWad,
      reason: priced.reason,
      usedFallback: ctx.inputs.usedFallback,
      regimeBitmask: priced.regimeFlags.bitmask,
      atSec: nowSec,
      blockRef,
    };

    // commit
    this.reserves = nextReserves;
    this.softDivergence = ctx.nextSoftState;
    this.volatility = nextVolatility;
    this.recenter = recenter.nextState;
    this.aomq = priced.aomq;
    this.snapshot = this.buildSnapshot(ctx, nextVolatility.sigmaBps, priced.regimeFlags.bitmask, nowSec, blockRef);

    this.hooks.onSwap?.(record);
    if (rebalance) this.hooks.onTargetUpdated?.(rebalance);

    return { ...quoteResult, record, rebalance, reserves: { ...nextReserves } };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Recenter
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Permissionless recenter against a strict-mode reading
   */
  manualRebalance(): Result<TargetUpdatedRecord, EngineError> {
    const nowSec = this.clock.nowSec();
    const blockRef = this.clock.blockRef();

    const result = readReferencePrice({
      reader: this.oracle,
      mode: "strict",
      config: this.config,
      sigmaBps: this.volatility.sigmaBps,
    })
      .andThen(reference =>
        evaluateManualRecenter({
          state: this.recenter,
          reserves: this.reserves,
          priceWad: reference.reading.mid,
          nowSec,
          blockRef,
          config: this.config,
        }),
      )
      .map(commit => {
        this.recenter = commit.nextState;
        this.reserves = commit.nextReserves;
        this.hooks.onTargetUpdated?.(commit.record);
        return commit.record;
      });

    return this.reportRejection("manualRebalance", result);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Preview
  // ─────────────────────────────────────────────────────────────────────────

  previewFees(sizes: Amount[], options: PreviewOptions): Result<Bps[], EngineError> {
    return checkSnapshotFreshness(this.snapshot, this.clock.nowSec(), this.config).andThen(({ snapshot }) =>
      replayFees(snapshot, this.softDivergence, sizes, options, this.reserves, this.config),
    );
  }

  previewLadder(baseSize: Amount): Result<PreviewLadder, EngineError> {
    if (baseSize <= 0n) {
      return err({ type: "INVALID_AMOUNT", message: "ladder base size must be positive" });
    }
    return checkSnapshotFreshness(this.snapshot, this.clock.nowSec(), this.config).andThen(fresh =>
      replayLadder(fresh, this.softDivergence, baseSize, this.reserves, this.config),
    );
  }

  /**
   * Re-read the oracle and persist a snapshot without trading
   */
  refreshPreviewSnapshot(mode: OracleMode): Result<PreviewSnapshot, EngineError> {
    const nowSec = this.clock.nowSec();
    const blockRef = this.clock.blockRef();

    const result = this.buildPricingContext(mode).map(ctx => {
      const floors = computeInventoryFloors(this.reserves, ctx.inputs.midWad, this.config);
      const aomq = evaluateAomq(
        {
          softDivergenceActive: ctx.inputs.softDivergenceActive,
          usedFallback: ctx.inputs.usedFallback,
          reserves: this.reserves,
          floors,
          midWad: ctx.inputs.midWad,
        },
        this.config,
      );
      const proximity = detectFloorProximity(this.reserves, floors, ctx.inputs.midWad, this.config);

      const flags: RegimeFlag[] = [];
      if (aomq.askActive || aomq.bidActive) flags.push("AOMQ");
      if (ctx.inputs.usedFallback) flags.push("Fallback");
      if (proximity.base || proximity.quote) flags.push("NearFloor");
      if (ctx.inputs.softDivergenceActive) flags.push("SoftDivergence");

      const snapshot = this.buildSnapshot(
        ctx,
        this.volatility.sigmaBps,
        encodeRegimeFlags(flags).bitmask,
        nowSec,
        blockRef,
      );
      this.snapshot = snapshot;
      return structuredClone(snapshot);
    });

    return this.reportRejection("refreshPreviewSnapshot", result);
  }

  previewSnapshotRaw(): PreviewSnapshot | null {
    return this.snapshot === null ? null : structuredClone(this.snapshot);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // State accessors & governance
  // ─────────────────────────────────────────────────────────────────────────

  getSoftDivergenceState(): SoftDivergenceState {
    return { ...this.softDivergence };
  }

  getReserves(): ReserveState {
    return { ...this.reserves };
  }

  getRecenterState(): RecenterState {
    return { ...this.recenter };
  }

  getVolatilityState(): VolatilityState {
    return { ...this.volatility };
  }

  /** Activation computed by the last settled swap */
  getAomqState(): AomqActivationState {
    return { ...this.aomq };
  }

  /** A copy; edits only take effect through `updateConfig` */
  getConfig(): PoolConfig {
    return structuredClone(this.config);
  }

  /**
   * Replace governance parameters between calls
   */
  updateConfig(next: unknown): Result<PoolConfig, EngineError> {
    return validatePoolConfig(next).map(config => {
      this.config = config;
      return structuredClone(config);
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────

  private buildPricingContext(mode: OracleMode): Result<PricingContext, EngineError> {
    return readReferencePrice({
      reader: this.oracle,
      mode,
      config: this.config,
      sigmaBps: this.volatility.sigmaBps,
    }).andThen(reference =>
      evaluateDivergence(reference.crossCheck, this.softDivergence, this.config.oracle, this.config.featureFlags).map(
        divergence => ({
          mode,
          reference,
          divergenceBps: divergence.deltaBps,
          divergenceObserved: divergence.observed,
          nextSoftState: divergence.nextState,
          inputs: {
            midWad: reference.reading.mid,
            confidenceBps: reference.confidenceBps,
            spreadBps: reference.reading.spreadBps,
            sigmaBps: this.volatility.sigmaBps,
            haircutBps: divergence.haircutBps,
            usedFallback: reference.usedFallback,
            softDivergenceActive: divergence.nextState.active,
          },
        }),
      ),
    );
  }

  private buildSnapshot(
    ctx: PricingContext,
    sigmaBps: Bps,
    regimeBitmask: number,
    nowSec: number,
    blockRef: number,
  ): PreviewSnapshot {
    return {
      midWad: ctx.inputs.midWad,
      divergenceBps: ctx.divergenceBps,
      haircutBps: ctx.inputs.haircutBps,
      spreadBps: ctx.inputs.spreadBps,
      secondaryConfBps: ctx.reference.secondaryConfBps,
      sigmaBps,
      mode: ctx.mode,
      usedFallback: ctx.inputs.usedFallback,
      divergenceObserved: ctx.divergenceObserved,
      regimeFlags: decodeRegimeFlags(regimeBitmask),
      blockRef,
      timestampSec: nowSec,
    };
  }

  private validateAmount(amountIn: Amount): Result<void, EngineError> {
    if (amountIn <= 0n) {
      return err({ type: "INVALID_AMOUNT", message: "amountIn must be positive" });
    }
    return ok(undefined);
  }

  private checkDeadline(deadlineSec: number, nowSec: number): Result<void, EngineError> {
    if (nowSec > deadlineSec) {
      return err({ type: "DEADLINE_EXPIRED", deadlineSec, nowSec });
    }
    return ok(undefined);
  }

  private reportRejection<T>(operation: EngineOperation, result: Result<T, EngineError>): Result<T, EngineError> {
    if (result.isErr()) {
      this.hooks.onReject?.(operation, result.error);
    }
    return result;
  }
}

function toQuoteResult(priced: PricedTrade, ctx: PricingContext): QuoteResult {
  return {
    amountOut: priced.fill.amountOut,
    appliedAmountIn: priced.fill.appliedAmountIn,
    leftoverAmountIn: priced.fill.leftoverAmountIn,
    feeBpsUsed: priced.fees.totalBps,
    fees: priced.fees,
    midUsed: ctx.inputs.midWad,
    usedFallback: ctx.inputs.usedFallback,
    reason: priced.reason,
    reasonCodes: priced.reasonCodes,
    aomq: priced.aomq,
    regimeFlags: priced.regimeFlags,
  };
}
