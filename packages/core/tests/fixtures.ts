/**
 * Shared fixtures for core tests
 *
 * Tokens use 0 decimals so that at mid 1.0 one base unit is worth one quote
 * unit and expected values can be traced by hand.
 */

import { toWad } from "../src/math";
import type {
  BidAsk,
  Clock,
  EmaMid,
  FeatureFlags,
  MidAndAge,
  OracleReader,
  PoolConfig,
  ReserveState,
  SecondaryMid,
} from "../src/types";

export const ALL_FLAGS_OFF: FeatureFlags = {
  blendOn: false,
  enableSoftDivergence: false,
  enableSizeFee: false,
  enableBboFloor: false,
  enableInvTilt: false,
  enableVolSurcharge: false,
  enableAOMQ: false,
  enableRebates: false,
  enableAutoRecenter: false,
};

export const createTestConfig = (flags: Partial<FeatureFlags> = {}): PoolConfig => ({
  tokens: { baseDecimals: 0, quoteDecimals: 0 },
  oracle: {
    maxAgeSec: 60,
    allowEmaFallback: true,
    confCapBpsSpot: 100,
    confCapBpsStrict: 50,
    confWeightSpreadBps: 5_000,
    confWeightSigmaBps: 5_000,
    confWeightSecondaryBps: 5_000,
    sigmaEwmaLambdaBps: 9_000,
    divergenceBps: 50,
    divergenceAcceptBps: 30,
    divergenceSoftBps: 60,
    divergenceHardBps: 100,
    haircutMinBps: 5,
    haircutSlopeBps: 1,
  },
  inventory: {
    floorBps: 300,
    recenterThresholdPct: 7.5,
    recenterCooldownSec: 60,
    recenterHealthyFrames: 2,
    recenterMinTargetChangeBps: 10,
    invTiltBpsPer1pct: 2,
    invTiltMaxBps: 15,
    tiltConfWeightBps: 0,
    tiltSpreadWeightBps: 0,
  },
  fee: {
    baseBps: 15,
    alphaNumerator: 0,
    alphaDenominator: 1,
    betaInvDevNumerator: 0,
    betaInvDevDenominator: 1,
    capBps: 500,
    gammaSizeLinBps: 12,
    gammaSizeQuadBps: 6,
    sizeFeeCapBps: 30,
    volatility: { kappaBps: 5_000, capBps: 30, toxicityBiasBps: 10 },
    rebateBps: 3,
  },
  maker: { s0Notional: 100n, ttlMs: 1_000, alphaBboBps: 0, betaFloorBps: 0 },
  aomq: { minQuoteNotional: 50n, emergencySpreadBps: 100, floorEpsilonBps: 100 },
  preview: { maxAgeSec: 30, strict: true, ladderMultipliers: [1, 2, 5] },
  featureFlags: { ...ALL_FLAGS_OFF, ...flags },
  rebateAllowList: ["maker-1"],
});

export const createReserves = (base = 1_000n, quote = 1_000n, target = 1_000n): ReserveState => ({
  baseReserve: base,
  quoteReserve: quote,
  targetBaseStar: target,
});

/**
 * Mutable oracle stub; defaults to a fresh primary at 1.0 and nothing else.
 */
export class StubOracle implements OracleReader {
  primary: MidAndAge = { mid: toWad("1"), ageSec: 0, ok: true };
  bidAsk: BidAsk = { bid: 0n, ask: 0n, ok: false };
  ema: EmaMid = { mid: 0n, ok: false };
  secondary: SecondaryMid = { mid: 0n, confBps: 0, ageSec: 0, ok: false };

  setPrice(price: string): void {
    this.primary = { mid: toWad(price), ageSec: 0, ok: true };
  }

  readMidAndAge(): MidAndAge {
    return this.primary;
  }

  readBidAsk(): BidAsk {
    return this.bidAsk;
  }

  readEmaFallback(): EmaMid {
    return this.ema;
  }

  readSecondaryMid(): SecondaryMid {
    return this.secondary;
  }
}

export class StubClock implements Clock {
  constructor(
    public now = 1_000,
    public block = 1,
  ) {}

  advance(seconds: number): void {
    this.now += seconds;
    this.block += 1;
  }

  nowSec(): number {
    return this.now;
  }

  blockRef(): number {
    return this.block;
  }
}
