/**
 * Trade Flow - Seeded taker flow for scenarios
 *
 * Sizes are uniform in [minSize, maxSize] (input-token units); direction is
 * base-in with probability `baseInShare`. Same seed, same sequence.
 */

import type { Amount } from "@dnmm/core";

export interface TradeFlowConfig {
  minSize: Amount;
  maxSize: Amount;
  baseInShare: number;
}

export interface TradeDraft {
  isBaseIn: boolean;
  amountIn: Amount;
}

export interface TradeFlow {
  next(): TradeDraft;
}

/**
 * Mulberry32 - fast deterministic PRNG, values in [0, 1)
 */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    let t = (state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createTradeFlow(config: TradeFlowConfig, seed: number): TradeFlow {
  const rng = mulberry32(seed);
  const span = Number(config.maxSize - config.minSize + 1n);

  return {
    next(): TradeDraft {
      const isBaseIn = rng() < config.baseInShare;
      const offset = BigInt(Math.min(span - 1, Math.floor(rng() * span)));
      return { isBaseIn, amountIn: config.minSize + offset };
    },
  };
}
