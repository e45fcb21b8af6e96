/**
 * Oracle Fusion - Reference mid selection with fallback
 *
 * Sources are tried in fixed priority: PRIMARY → EMA_FALLBACK → SECONDARY.
 * A reading is rejected when it is unset (zero / not ok) or older than
 * `oracle.maxAgeSec`. Strict mode accepts the primary only.
 *
 * Reads are synchronous; this module performs no mutation.
 */

import { err, ok, type Result } from "neverthrow";

import type { EngineError } from "./errors";
import { BPS, Dec, mulDiv, truncBps } from "./math";
import type {
  BidAsk,
  Bps,
  FeatureFlags,
  OracleConfig,
  OracleMode,
  OracleReader,
  OracleReading,
  PoolConfig,
  ReferencePrice,
  Sec,
  SourceTag,
  Wad,
} from "./types";

type ReadingState = "fresh" | "stale" | "unset";

export interface ReadReferencePriceInput {
  reader: OracleReader;
  mode: OracleMode;
  config: PoolConfig;
  /** Current volatility estimate, blended into confidence */
  sigmaBps: Bps;
}

export interface ConfidenceInputs {
  spreadBps: Bps;
  sigmaBps: Bps;
  secondaryConfBps: Bps;
}

function classifyReading(okFlag: boolean, mid: Wad, ageSec: Sec, maxAgeSec: Sec): ReadingState {
  if (!okFlag || mid <= 0n) return "unset";
  if (ageSec > maxAgeSec) return "stale";
  return "fresh";
}

/**
 * Observed book spread relative to `mid`, in bps.
 * An unusable book contributes 0.
 */
export function computeSpreadBps(bidAsk: BidAsk, mid: Wad): Bps {
  if (!bidAsk.ok || mid <= 0n || bidAsk.bid <= 0n || bidAsk.ask < bidAsk.bid) {
    return 0;
  }
  return Number(mulDiv(bidAsk.ask - bidAsk.bid, BPS, mid));
}

/**
 * Confidence blend.
 *
 * Each term is capped at the mode's cap, weighted (10_000 = 1.0x), summed and
 * capped again. With `blendOn` off only the capped spread is used.
 */
export function blendConfidenceBps(
  inputs: ConfidenceInputs,
  mode: OracleMode,
  oracle: OracleConfig,
  flags: FeatureFlags,
): Bps {
  const cap = mode === "strict" ? oracle.confCapBpsStrict : oracle.confCapBpsSpot;
  const spread = Math.min(inputs.spreadBps, cap);

  if (!flags.blendOn) {
    return spread;
  }

  const blended = new Dec(spread)
    .mul(oracle.confWeightSpreadBps)
    .plus(new Dec(Math.min(inputs.sigmaBps, cap)).mul(oracle.confWeightSigmaBps))
    .plus(new Dec(Math.min(inputs.secondaryConfBps, cap)).mul(oracle.confWeightSecondaryBps))
    .div(10_000);

  return Math.min(truncBps(blended), cap);
}

function buildReference(
  reading: OracleReading,
  usedFallback: boolean,
  input: ReadReferencePriceInput,
  secondaryConfBps: Bps,
  crossCheck: ReferencePrice["crossCheck"],
): ReferencePrice {
  const { mode, config, sigmaBps } = input;
  return {
    reading,
    confidenceBps: blendConfidenceBps(
      { spreadBps: reading.spreadBps, sigmaBps, secondaryConfBps },
      mode,
      config.oracle,
      config.featureFlags,
    ),
    secondaryConfBps,
    usedFallback,
    reason: usedFallback ? "FALLBACK_MODE" : "OK",
    crossCheck,
  };
}

/**
 * Read the reference mid.
 *
 * Failure modes:
 * - every source unusable → MID_UNSET
 * - strict mode with a resolved but stale primary → ORACLE_STALE
 */
export function readReferencePrice(input: ReadReferencePriceInput): Result<ReferencePrice, EngineError> {
  const { reader, mode, config } = input;
  const maxAgeSec = config.oracle.maxAgeSec;

  const primary = reader.readMidAndAge();
  const secondary = reader.readSecondaryMid();
  const bidAsk = reader.readBidAsk();

  const primaryState = classifyReading(primary.ok, primary.mid, primary.ageSec, maxAgeSec);
  const secondaryState = classifyReading(secondary.ok, secondary.mid, secondary.ageSec, maxAgeSec);
  const secondaryConfBps = secondaryState === "fresh" ? secondary.confBps : 0;

  const attempts: { source: SourceTag; state: ReadingState }[] = [{ source: "PRIMARY", state: primaryState }];

  if (primaryState === "fresh") {
    const reading: OracleReading = {
      mid: primary.mid,
      ageSec: primary.ageSec,
      spreadBps: computeSpreadBps(bidAsk, primary.mid),
      sourceTag: "PRIMARY",
    };
    const crossCheck = secondaryState === "fresh" ? { primaryMid: primary.mid, secondaryMid: secondary.mid } : undefined;
    return ok(buildReference(reading, false, input, secondaryConfBps, crossCheck));
  }

  if (mode === "strict") {
    if (primaryState === "stale") {
      return err({ type: "ORACLE_STALE", source: "PRIMARY", ageSec: primary.ageSec, maxAgeSec });
    }
    return err({ type: "MID_UNSET", message: "primary mid unset (strict mode)" });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Fallback chain
  // ─────────────────────────────────────────────────────────────────────────

  if (config.oracle.allowEmaFallback) {
    const ema = reader.readEmaFallback();
    const emaAgeSec = ema.ageSec ?? 0;
    const emaState = classifyReading(ema.ok, ema.mid, emaAgeSec, maxAgeSec);
    attempts.push({ source: "EMA_FALLBACK", state: emaState });

    if (emaState === "fresh") {
      const reading: OracleReading = {
        mid: ema.mid,
        ageSec: emaAgeSec,
        spreadBps: computeSpreadBps(bidAsk, ema.mid),
        sourceTag: "EMA_FALLBACK",
      };
      // EMA stands in for the primary side of the cross-check
      const crossCheck = secondaryState === "fresh" ? { primaryMid: ema.mid, secondaryMid: secondary.mid } : undefined;
      return ok(buildReference(reading, true, input, secondaryConfBps, crossCheck));
    }
  }

  attempts.push({ source: "SECONDARY", state: secondaryState });
  if (secondaryState === "fresh") {
    const reading: OracleReading = {
      mid: secondary.mid,
      ageSec: secondary.ageSec,
      spreadBps: computeSpreadBps(bidAsk, secondary.mid),
      sourceTag: "SECONDARY",
    };
    return ok(buildReference(reading, true, input, secondaryConfBps, undefined));
  }

  return err({
    type: "MID_UNSET",
    message: `no source produced a usable mid (${attempts.map(a => `${a.source}: ${a.state}`).join(", ")})`,
  });
}
