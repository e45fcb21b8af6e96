/**
 * Latest Oracle Cache Unit Tests
 */

import { describe, expect, test } from "vitest";

import { toWad } from "@dnmm/core";

import { ManualClock } from "../src/clock";
import { LatestOracleCache } from "../src/oracle/latest-oracle-cache";

const at = (sec: number) => new Date(sec * 1000);

describe("LatestOracleCache", () => {
  test("should read unset values before any event", () => {
    const cache = new LatestOracleCache(new ManualClock(1_000));

    expect(cache.readMidAndAge()).toEqual({ mid: 0n, ageSec: 0, ok: false });
    expect(cache.readBidAsk().ok).toBe(false);
    expect(cache.readEmaFallback().ok).toBe(false);
    expect(cache.readSecondaryMid().ok).toBe(false);
  });

  test("should report primary mid, book and age", () => {
    const clock = new ManualClock(1_000);
    const cache = new LatestOracleCache(clock);

    const applied = cache.apply({
      type: "primary",
      ts: at(1_000),
      source: "test",
      midPx: "1.5",
      bestBidPx: "1.499",
      bestAskPx: "1.501",
    });
    clock.advance(12);

    expect(applied.isOk()).toBe(true);
    expect(cache.readMidAndAge()).toEqual({ mid: toWad("1.5"), ageSec: 12, ok: true });
    expect(cache.readBidAsk()).toEqual({ bid: toWad("1.499"), ask: toWad("1.501"), ok: true });
  });

  test("should treat a primary without a book as unusable for spread", () => {
    const cache = new LatestOracleCache(new ManualClock(1_000));
    cache.apply({ type: "primary", ts: at(1_000), source: "test", midPx: "2" });

    expect(cache.readMidAndAge().ok).toBe(true);
    expect(cache.readBidAsk()).toEqual({ bid: 0n, ask: 0n, ok: false });
  });

  test("should age the EMA and secondary independently", () => {
    const clock = new ManualClock(1_000);
    const cache = new LatestOracleCache(clock);

    cache.apply({ type: "ema", ts: at(990), source: "test", emaPx: "1.01" });
    cache.apply({ type: "secondary", ts: at(995), source: "test", midPx: "1.02", confBps: 15 });

    expect(cache.readEmaFallback()).toEqual({ mid: toWad("1.01"), ageSec: 10, ok: true });
    expect(cache.readSecondaryMid()).toEqual({ mid: toWad("1.02"), confBps: 15, ageSec: 5, ok: true });
  });

  test("should reject malformed prices without changing state", () => {
    const cache = new LatestOracleCache(new ManualClock(1_000));
    cache.apply({ type: "primary", ts: at(1_000), source: "test", midPx: "1" });

    const bad = cache.apply({ type: "primary", ts: at(1_001), source: "test", midPx: "-3" });
    const zero = cache.apply({ type: "primary", ts: at(1_001), source: "test", midPx: "0" });

    expect(bad.isErr() && bad.error.type).toBe("invalid_price");
    expect(zero.isErr() && zero.error.message).toBe("midPx must be positive: 0");
    expect(cache.readMidAndAge().mid).toBe(toWad("1"));
  });

  test("should reject out-of-order events", () => {
    const cache = new LatestOracleCache(new ManualClock(1_000));
    cache.apply({ type: "secondary", ts: at(1_000), source: "test", midPx: "1", confBps: 5 });

    const late = cache.apply({ type: "secondary", ts: at(999), source: "test", midPx: "2", confBps: 5 });

    expect(late.isErr() && late.error.type).toBe("out_of_order");
    expect(cache.readSecondaryMid().mid).toBe(toWad("1"));
  });

  test("should read a source as unset while it is down and recover on the next update", () => {
    const cache = new LatestOracleCache(new ManualClock(1_000));
    cache.apply({ type: "primary", ts: at(1_000), source: "test", midPx: "1" });

    cache.apply({ type: "primary_down", ts: at(1_000), reason: "feed halted" });
    expect(cache.readMidAndAge().ok).toBe(false);

    cache.apply({ type: "primary", ts: at(1_001), source: "test", midPx: "1.1" });
    expect(cache.readMidAndAge().mid).toBe(toWad("1.1"));
  });
});
