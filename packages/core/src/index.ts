/**
 * packages/core - Pure Pricing Engine
 *
 * All pricing, inventory and recenter logic for a single pool.
 * NO I/O dependencies (DB, HTTP, WS, FS).
 * NO exceptions thrown (uses Result types).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────
export type {
  // Value objects
  Amount,
  Wad,
  Bps,
  Sec,
  OracleMode,
  SourceTag,
  PoolSide,
  ReasonCode,
  RegimeFlag,
  RegimeFlags,
  // Oracle
  MidAndAge,
  BidAsk,
  EmaMid,
  SecondaryMid,
  OracleReader,
  Clock,
  OracleReading,
  ReferencePrice,
  // State
  ReserveState,
  SoftDivergenceState,
  VolatilityState,
  RecenterState,
  AomqTrigger,
  AomqActivationState,
  PreviewSnapshot,
  // Config
  TokenConfig,
  OracleConfig,
  InventoryConfig,
  VolatilitySurchargeConfig,
  FeeConfig,
  MakerConfig,
  AomqConfig,
  PreviewConfig,
  FeatureFlags,
  PoolConfig,
  // Fees & fills
  FeeBreakdown,
  InventoryFloors,
  FillResult,
  // Requests & results
  QuoteRequest,
  SwapRequest,
  QuoteResult,
  TargetUpdatedRecord,
  SwapRecord,
  SwapResult,
  ClampStatus,
  PreviewLadder,
} from "./types";
export { REGIME_BIT_VALUES } from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Errors & Config
// ─────────────────────────────────────────────────────────────────────────────
export type { EngineError, EngineErrorType } from "./errors";
export { describeEngineError } from "./errors";
export { featureFlagsSchema, poolConfigSchema, validatePoolConfig, serializePoolConfig } from "./config-schema";

// ─────────────────────────────────────────────────────────────────────────────
// Math
// ─────────────────────────────────────────────────────────────────────────────
export { WAD, BPS, toWad, fromWad, quoteValueOf, baseAmountFor, relativeChangeBps, mulDiv } from "./math";

// ─────────────────────────────────────────────────────────────────────────────
// Engine Components
// ─────────────────────────────────────────────────────────────────────────────
export { readReferencePrice, blendConfidenceBps, computeSpreadBps } from "./oracle-fusion";
export type { ReadReferencePriceInput, ConfidenceInputs } from "./oracle-fusion";

export {
  evaluateDivergence,
  evaluateDeviation,
  computeDeviationBps,
  classifyDivergence,
  computeHaircutBps,
  createInitialSoftDivergenceState,
  HEALTHY_FRAMES_TO_CLEAR,
} from "./divergence-gate";
export type { DivergenceBand, DivergenceOutcome } from "./divergence-gate";

export {
  computeFeeBps,
  computeSizeFeeBps,
  computeInventoryTiltBps,
  computeBboFloorBps,
  computeVolatilitySurchargeBps,
} from "./fee-pipeline";
export type { FeeContext } from "./fee-pipeline";

export { solveFill, computeInventoryFloors, computeInventoryDeviationBps, applyFill } from "./inventory-solver";
export type { SolveFillInput } from "./inventory-solver";

export {
  evaluateAutoRecenter,
  evaluateManualRecenter,
  performRebalance,
  createInitialRecenterState,
} from "./recenter";
export type { AutoRecenterOutcome, RecenterCommit, RebalanceProposal } from "./recenter";

export { evaluateAomq, clampToMinNotional, detectFloorProximity, sideForTrade } from "./degraded-quote";
export type { AomqInputs } from "./degraded-quote";

export { encodeRegimeFlags, decodeRegimeFlags, hasRegimeFlag } from "./regime-flags";
export { updateVolatility, createInitialVolatilityState } from "./volatility";

export { computeTradeFee, priceTrade } from "./pricing";
export type { PricingInputs, TradeIntent, PricedTrade } from "./pricing";

export { checkSnapshotFreshness, previewFees, previewLadder } from "./preview";
export type { PreviewOptions } from "./preview";

// ─────────────────────────────────────────────────────────────────────────────
// Engine
// ─────────────────────────────────────────────────────────────────────────────
export { PoolEngine } from "./pool-engine";
export type { PoolEngineDeps, PoolEngineHooks, EngineOperation } from "./pool-engine";
