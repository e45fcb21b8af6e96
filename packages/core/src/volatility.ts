/**
 * Volatility estimate - EWMA of absolute mid-to-mid returns (bps)
 *
 * Updated once per settled swap.
 */

import { BPS_NUMBER, Dec, relativeChangeBps, truncBps } from "./math";
import type { Bps, VolatilityState, Wad } from "./types";

export function createInitialVolatilityState(): VolatilityState {
  return { sigmaBps: 0, lastMidWad: 0n };
}

/**
 * sigma' = λ·sigma + (1 - λ)·|return|
 */
export function updateVolatility(state: VolatilityState, midWad: Wad, lambdaBps: Bps): VolatilityState {
  if (state.lastMidWad === 0n) {
    return { sigmaBps: state.sigmaBps, lastMidWad: midWad };
  }

  const returnBps = relativeChangeBps(state.lastMidWad, midWad);
  const sigma = new Dec(state.sigmaBps)
    .mul(lambdaBps)
    .plus(new Dec(returnBps).mul(BPS_NUMBER - lambdaBps))
    .div(BPS_NUMBER);

  return { sigmaBps: truncBps(sigma), lastMidWad: midWad };
}
