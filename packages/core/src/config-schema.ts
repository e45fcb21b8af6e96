/**
 * Pool Config Schema
 *
 * Governance-supplied parameters are validated here before the engine
 * accepts them. Out-of-range values surface as INVALID_CONFIG.
 *
 * Amount fields accept bigint or an integer string (JSON / jsonb storage).
 */

import { err, ok, type Result } from "neverthrow";
import { z } from "zod";

import type { EngineError } from "./errors";
import type { PoolConfig } from "./types";

const bps = z.number().int().min(0).max(10_000);
const nonNegativeInt = z.number().int().min(0);

const amount = z.union([
  z.bigint().nonnegative(),
  z
    .string()
    .regex(/^\d+$/, "expected an integer string")
    .transform(value => BigInt(value)),
]);

const tokensSchema = z.object({
  baseDecimals: z.number().int().min(0).max(36),
  quoteDecimals: z.number().int().min(0).max(36),
});

const oracleSchema = z
  .object({
    maxAgeSec: z.number().int().positive(),
    allowEmaFallback: z.boolean(),
    confCapBpsSpot: bps,
    confCapBpsStrict: bps,
    confWeightSpreadBps: bps,
    confWeightSigmaBps: bps,
    confWeightSecondaryBps: bps,
    sigmaEwmaLambdaBps: bps,
    divergenceBps: bps,
    divergenceAcceptBps: bps,
    divergenceSoftBps: bps,
    divergenceHardBps: bps,
    haircutMinBps: bps,
    haircutSlopeBps: bps,
  })
  .refine(o => o.divergenceAcceptBps <= o.divergenceSoftBps && o.divergenceSoftBps <= o.divergenceHardBps, {
    message: "divergence bands must satisfy accept <= soft <= hard",
    path: ["divergenceSoftBps"],
  });

const inventorySchema = z.object({
  floorBps: z.number().int().min(0).max(5_000),
  recenterThresholdPct: z.number().positive().max(100),
  recenterCooldownSec: nonNegativeInt,
  recenterHealthyFrames: nonNegativeInt,
  recenterMinTargetChangeBps: bps,
  invTiltBpsPer1pct: bps,
  invTiltMaxBps: bps,
  tiltConfWeightBps: bps,
  tiltSpreadWeightBps: bps,
});

const feeSchema = z
  .object({
    baseBps: bps,
    alphaNumerator: nonNegativeInt,
    alphaDenominator: z.number().int().positive(),
    betaInvDevNumerator: nonNegativeInt,
    betaInvDevDenominator: z.number().int().positive(),
    capBps: z.number().int().min(0).max(9_999),
    gammaSizeLinBps: bps,
    gammaSizeQuadBps: bps,
    sizeFeeCapBps: bps,
    volatility: z.object({
      kappaBps: bps,
      capBps: bps,
      toxicityBiasBps: bps,
    }),
    rebateBps: bps,
  })
  .refine(f => f.baseBps <= f.capBps, { message: "baseBps must not exceed capBps", path: ["baseBps"] });

const makerSchema = z.object({
  s0Notional: amount.refine(v => v > 0n, "s0Notional must be positive"),
  ttlMs: nonNegativeInt,
  alphaBboBps: bps,
  betaFloorBps: bps,
});

const aomqSchema = z.object({
  minQuoteNotional: amount,
  emergencySpreadBps: bps,
  floorEpsilonBps: bps,
});

const previewSchema = z.object({
  maxAgeSec: z.number().int().positive(),
  strict: z.boolean(),
  ladderMultipliers: z.array(z.number().int().positive()).min(1),
});

export const featureFlagsSchema = z.object({
  blendOn: z.boolean(),
  enableSoftDivergence: z.boolean(),
  enableSizeFee: z.boolean(),
  enableBboFloor: z.boolean(),
  enableInvTilt: z.boolean(),
  enableVolSurcharge: z.boolean(),
  enableAOMQ: z.boolean(),
  enableRebates: z.boolean(),
  enableAutoRecenter: z.boolean(),
});

export const poolConfigSchema = z.object({
  tokens: tokensSchema,
  oracle: oracleSchema,
  inventory: inventorySchema,
  fee: feeSchema,
  maker: makerSchema,
  aomq: aomqSchema,
  preview: previewSchema,
  featureFlags: featureFlagsSchema,
  rebateAllowList: z.array(z.string()).default([]),
});

/**
 * Validate an untrusted config object
 */
export function validatePoolConfig(input: unknown): Result<PoolConfig, EngineError> {
  const parsed = poolConfigSchema.safeParse(input);
  if (!parsed.success) {
    return err({
      type: "INVALID_CONFIG",
      issues: parsed.error.issues.map(issue => `${issue.path.map(String).join(".")}: ${issue.message}`),
    });
  }
  return ok(parsed.data);
}

/**
 * JSON-safe form of a config (bigint → string)
 */
export function serializePoolConfig(config: PoolConfig): Record<string, unknown> {
  return {
    ...config,
    maker: { ...config.maker, s0Notional: config.maker.s0Notional.toString() },
    aomq: { ...config.aomq, minQuoteNotional: config.aomq.minQuoteNotional.toString() },
  };
}
