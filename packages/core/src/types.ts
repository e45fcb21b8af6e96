/**
 * Core Domain Types
 *
 * Pure type definitions for the pricing engine.
 * No I/O dependencies, no side effects.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Value Objects
// ─────────────────────────────────────────────────────────────────────────────

/** Token amount in integer base units */
export type Amount = bigint;

/** 18-decimal fixed point value (quote per base for prices) */
export type Wad = bigint;

/** Integer basis points */
export type Bps = number;

/** Seconds (unix time or duration) */
export type Sec = number;

/**
 * Oracle read mode
 *
 * - spot: fallbacks allowed (EMA, secondary)
 * - strict: primary must be fresh, no fallback
 */
export type OracleMode = "spot" | "strict";

/** Closed set of price sources, in fallback priority order */
export type SourceTag = "PRIMARY" | "EMA_FALLBACK" | "SECONDARY";

/**
 * Pool side
 *
 * - ask: pool sells base (trader pays quote)
 * - bid: pool buys base (trader pays base)
 */
export type PoolSide = "ask" | "bid";

// ─────────────────────────────────────────────────────────────────────────────
// Reason Codes (returned alongside successful results)
// ─────────────────────────────────────────────────────────────────────────────

export type ReasonCode =
  | "OK"
  | "PARTIAL_FILL_FLOOR" // input clamped so the paid-out reserve stays on its floor
  | "AOMQ_CLAMP" // degraded mode reduced the quoted size
  | "FALLBACK_MODE" // reference mid came from a fallback source
  | "SOFT_DIVERGENCE"; // haircut applied for cross-source deviation

// ─────────────────────────────────────────────────────────────────────────────
// Regime Flags
// ─────────────────────────────────────────────────────────────────────────────

export const REGIME_BIT_VALUES = {
  AOMQ: 1 << 0,
  Fallback: 1 << 1,
  NearFloor: 1 << 2,
  SizeFee: 1 << 3,
  InvTilt: 1 << 4,
  SoftDivergence: 1 << 5,
} as const;

export type RegimeFlag = keyof typeof REGIME_BIT_VALUES;

export interface RegimeFlags {
  bitmask: number;
  asArray: RegimeFlag[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Oracle Inputs
// ─────────────────────────────────────────────────────────────────────────────

export interface MidAndAge {
  mid: Wad;
  ageSec: Sec;
  ok: boolean;
}

export interface BidAsk {
  bid: Wad;
  ask: Wad;
  ok: boolean;
}

export interface EmaMid {
  mid: Wad;
  /** Age of the EMA sample; treated as fresh when omitted */
  ageSec?: Sec;
  ok: boolean;
}

export interface SecondaryMid {
  mid: Wad;
  confBps: Bps;
  ageSec: Sec;
  ok: boolean;
}

/**
 * Synchronous oracle reader consumed by the engine.
 *
 * Implementations live outside core (cache fed by market data, scenario feeds).
 */
export interface OracleReader {
  readMidAndAge(): MidAndAge;
  readBidAsk(): BidAsk;
  readEmaFallback(): EmaMid;
  readSecondaryMid(): SecondaryMid;
}

/**
 * Time source. `blockRef` is an opaque monotonically increasing ordinal
 * supplied by the surrounding ledger.
 */
export interface Clock {
  nowSec(): Sec;
  blockRef(): number;
}

/**
 * A single accepted price observation
 */
export interface OracleReading {
  mid: Wad;
  ageSec: Sec;
  spreadBps: Bps;
  sourceTag: SourceTag;
}

/**
 * Output of oracle fusion
 */
export interface ReferencePrice {
  reading: OracleReading;
  confidenceBps: Bps;
  /** Secondary confidence fed into the blend (0 when unavailable) */
  secondaryConfBps: Bps;
  usedFallback: boolean;
  reason: "OK" | "FALLBACK_MODE";
  /** Present only when a fresh primary and a fresh independent secondary both exist */
  crossCheck?: { primaryMid: Wad; secondaryMid: Wad };
}

// ─────────────────────────────────────────────────────────────────────────────
// Engine State
// ─────────────────────────────────────────────────────────────────────────────

export interface ReserveState {
  baseReserve: Amount;
  quoteReserve: Amount;
  targetBaseStar: Amount;
}

export interface SoftDivergenceState {
  active: boolean;
  healthyStreak: number;
  lastDeltaBps: Bps;
}

export interface VolatilityState {
  /** EWMA of absolute mid-to-mid returns */
  sigmaBps: Bps;
  /** 0n until the first settled observation */
  lastMidWad: Wad;
}

export interface RecenterState {
  /** 0n until a baseline price is observed */
  lastRebalancePriceWad: Wad;
  lastRebalanceAtSec: Sec | null;
  healthyStreak: number;
}

export type AomqTrigger = "SOFT_DIVERGENCE" | "FLOOR_PROXIMITY" | "FALLBACK";

export interface AomqActivationState {
  askActive: boolean;
  bidActive: boolean;
  triggerReason: AomqTrigger | null;
}

/**
 * Last settled pricing context; replayed by preview calls.
 */
export interface PreviewSnapshot {
  midWad: Wad;
  divergenceBps: Bps;
  haircutBps: Bps;
  spreadBps: Bps;
  secondaryConfBps: Bps;
  sigmaBps: Bps;
  mode: OracleMode;
  usedFallback: boolean;
  /** false when no independent pair backed `divergenceBps` */
  divergenceObserved: boolean;
  regimeFlags: RegimeFlags;
  blockRef: number;
  timestampSec: Sec;
}

// ─────────────────────────────────────────────────────────────────────────────
// Pool Configuration
// ─────────────────────────────────────────────────────────────────────────────

export interface TokenConfig {
  baseDecimals: number;
  quoteDecimals: number;
}

export interface OracleConfig {
  maxAgeSec: Sec;
  allowEmaFallback: boolean;
  confCapBpsSpot: Bps;
  confCapBpsStrict: Bps;
  /** Blend weights, 10_000 = 1.0x */
  confWeightSpreadBps: Bps;
  confWeightSigmaBps: Bps;
  confWeightSecondaryBps: Bps;
  /** EWMA decay, 10_000 = keep all history */
  sigmaEwmaLambdaBps: Bps;
  /** Single hard gate used when soft divergence is disabled */
  divergenceBps: Bps;
  divergenceAcceptBps: Bps;
  divergenceSoftBps: Bps;
  divergenceHardBps: Bps;
  haircutMinBps: Bps;
  haircutSlopeBps: Bps;
}

export interface InventoryConfig {
  floorBps: Bps;
  recenterThresholdPct: number;
  recenterCooldownSec: Sec;
  recenterHealthyFrames: number;
  recenterMinTargetChangeBps: Bps;
  invTiltBpsPer1pct: Bps;
  invTiltMaxBps: Bps;
  tiltConfWeightBps: Bps;
  tiltSpreadWeightBps: Bps;
}

export interface VolatilitySurchargeConfig {
  /** Slope, 10_000 = 1.0x */
  kappaBps: Bps;
  capBps: Bps;
  toxicityBiasBps: Bps;
}

export interface FeeConfig {
  baseBps: Bps;
  alphaNumerator: number;
  alphaDenominator: number;
  betaInvDevNumerator: number;
  betaInvDevDenominator: number;
  capBps: Bps;
  gammaSizeLinBps: Bps;
  gammaSizeQuadBps: Bps;
  sizeFeeCapBps: Bps;
  volatility: VolatilitySurchargeConfig;
  rebateBps: Bps;
}

export interface MakerConfig {
  /** Reference notional (quote units) for the size fee */
  s0Notional: Amount;
  ttlMs: number;
  /** 10_000 = floor equals observed spread */
  alphaBboBps: Bps;
  betaFloorBps: Bps;
}

export interface AomqConfig {
  /** Quote-unit notional a degraded side is clamped to */
  minQuoteNotional: Amount;
  emergencySpreadBps: Bps;
  floorEpsilonBps: Bps;
}

export interface PreviewConfig {
  maxAgeSec: Sec;
  strict: boolean;
  ladderMultipliers: number[];
}

export interface FeatureFlags {
  blendOn: boolean;
  enableSoftDivergence: boolean;
  enableSizeFee: boolean;
  enableBboFloor: boolean;
  enableInvTilt: boolean;
  enableVolSurcharge: boolean;
  enableAOMQ: boolean;
  enableRebates: boolean;
  enableAutoRecenter: boolean;
}

export interface PoolConfig {
  tokens: TokenConfig;
  oracle: OracleConfig;
  inventory: InventoryConfig;
  fee: FeeConfig;
  maker: MakerConfig;
  aomq: AomqConfig;
  preview: PreviewConfig;
  featureFlags: FeatureFlags;
  rebateAllowList: string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Fees & Fills
// ─────────────────────────────────────────────────────────────────────────────

export interface FeeBreakdown {
  baseBps: Bps;
  confidenceBps: Bps;
  deviationBps: Bps;
  haircutBps: Bps;
  sizeBps: Bps;
  tiltBps: Bps;
  floorBps: Bps;
  volatilityBps: Bps;
  rebateBps: Bps;
  emergencyBps: Bps;
  totalBps: Bps;
}

export interface InventoryFloors {
  base: Amount;
  quote: Amount;
}

export interface FillResult {
  amountOut: Amount;
  appliedAmountIn: Amount;
  leftoverAmountIn: Amount;
  feeAmount: Amount;
  isPartial: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Requests & Results
// ─────────────────────────────────────────────────────────────────────────────

export interface QuoteRequest {
  amountIn: Amount;
  isBaseIn: boolean;
  mode: OracleMode;
  /** Caller identity for the rebate allow-list */
  caller?: string;
}

export interface SwapRequest extends QuoteRequest {
  minAmountOut: Amount;
  deadlineSec: Sec;
}

export interface QuoteResult {
  amountOut: Amount;
  appliedAmountIn: Amount;
  leftoverAmountIn: Amount;
  feeBpsUsed: Bps;
  fees: FeeBreakdown;
  midUsed: Wad;
  usedFallback: boolean;
  reason: ReasonCode;
  reasonCodes: ReasonCode[];
  aomq: AomqActivationState;
  regimeFlags: RegimeFlags;
}

export interface TargetUpdatedRecord {
  type: "TARGET_UPDATED";
  trigger: "auto" | "manual";
  previousTarget: Amount;
  newTarget: Amount;
  priceWad: Wad;
  atSec: Sec;
  blockRef: number;
}

export interface SwapRecord {
  type: "SWAP_SETTLED";
  isBaseIn: boolean;
  requestedAmountIn: Amount;
  appliedAmountIn: Amount;
  amountOut: Amount;
  feeBpsUsed: Bps;
  midUsed: Wad;
  reason: ReasonCode;
  usedFallback: boolean;
  regimeBitmask: number;
  atSec: Sec;
  blockRef: number;
}

export interface SwapResult extends QuoteResult {
  record: SwapRecord;
  rebalance?: TargetUpdatedRecord;
  reserves: ReserveState;
}

export type ClampStatus = "none" | "size_fee" | "aomq" | "floor";

export interface PreviewLadder {
  sizes: Amount[];
  askFee: Bps[];
  bidFee: Bps[];
  clampFlags: ClampStatus[];
  snapshotAgeSec: Sec;
}
