/**
 * Regime flag bitmask helpers
 */

import { REGIME_BIT_VALUES, type RegimeFlag, type RegimeFlags } from "./types";

const ORDERED_FLAGS = Object.keys(REGIME_BIT_VALUES).filter((key): key is RegimeFlag => key in REGIME_BIT_VALUES);

export function encodeRegimeFlags(active: Iterable<RegimeFlag>): RegimeFlags {
  let bitmask = 0;
  for (const flag of active) {
    bitmask |= REGIME_BIT_VALUES[flag];
  }
  return decodeRegimeFlags(bitmask);
}

export function decodeRegimeFlags(bitmask: number): RegimeFlags {
  return {
    bitmask,
    asArray: ORDERED_FLAGS.filter(flag => (bitmask & REGIME_BIT_VALUES[flag]) !== 0),
  };
}

export function hasRegimeFlag(flags: RegimeFlags, flag: RegimeFlag): boolean {
  return (flags.bitmask & REGIME_BIT_VALUES[flag]) !== 0;
}
