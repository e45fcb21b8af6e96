/**
 * Pool Engine Tests
 *
 * End-to-end behaviour through the public entry points.
 */

import { describe, expect, test } from "vitest";

import type { EngineError } from "../src/errors";
import { computeInventoryFloors } from "../src/inventory-solver";
import { toWad } from "../src/math";
import { PoolEngine, type EngineOperation } from "../src/pool-engine";
import type { FeatureFlags, ReserveState, SwapRecord, SwapRequest, TargetUpdatedRecord } from "../src/types";
import { createReserves, createTestConfig, StubClock, StubOracle } from "./fixtures";

const setupEngine = (flags: Partial<FeatureFlags> = {}, reserves: ReserveState = createReserves()) => {
  const oracle = new StubOracle();
  const clock = new StubClock();
  const swaps: SwapRecord[] = [];
  const targets: TargetUpdatedRecord[] = [];
  const rejects: { operation: EngineOperation; error: EngineError }[] = [];

  const engine = PoolEngine.create({
    config: createTestConfig(flags),
    oracle,
    clock,
    initialReserves: reserves,
    hooks: {
      onSwap: record => swaps.push(record),
      onTargetUpdated: record => targets.push(record),
      onReject: (operation, error) => rejects.push({ operation, error }),
    },
  })._unsafeUnwrap();

  return { engine, oracle, clock, swaps, targets, rejects };
};

const swapRequest = (amountIn: bigint, isBaseIn: boolean, overrides: Partial<SwapRequest> = {}): SwapRequest => ({
  amountIn,
  isBaseIn,
  mode: "spot",
  minAmountOut: 0n,
  deadlineSec: 10_000,
  ...overrides,
});

describe("PoolEngine.create", () => {
  test("should reject an invalid config", () => {
    const config = createTestConfig();
    config.inventory.floorBps = 6_000;

    const result = PoolEngine.create({
      config,
      oracle: new StubOracle(),
      clock: new StubClock(),
      initialReserves: createReserves(),
    });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe("INVALID_CONFIG");
    }
  });
});

describe("quote", () => {
  test("should price without mutating state", () => {
    const { engine } = setupEngine();

    const result = engine.quote({ amountIn: 10n, isBaseIn: true, mode: "spot" });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.amountOut).toBe(9n);
      expect(result.value.feeBpsUsed).toBe(15);
      expect(result.value.reason).toBe("OK");
      expect(result.value.reasonCodes).toEqual(["OK"]);
    }
    expect(engine.getReserves()).toEqual(createReserves());
    expect(engine.previewSnapshotRaw()).toBeNull();
  });

  test("should discount allow-listed callers when rebates are on", () => {
    const { engine } = setupEngine({ enableRebates: true });

    expect(engine.quote({ amountIn: 100n, isBaseIn: true, mode: "spot", caller: "maker-1" })._unsafeUnwrap().feeBpsUsed).toBe(12);
    expect(engine.quote({ amountIn: 100n, isBaseIn: true, mode: "spot", caller: "taker-9" })._unsafeUnwrap().feeBpsUsed).toBe(15);
  });
});

describe("swap", () => {
  test("should settle reserves and emit a record", () => {
    const { engine, swaps } = setupEngine();

    const result = engine.swap(swapRequest(10n, true));

    expect(result.isOk()).toBe(true);
    expect(engine.getReserves()).toEqual(createReserves(1_010n, 991n, 1_000n));
    expect(swaps).toEqual([
      {
        type: "SWAP_SETTLED",
        isBaseIn: true,
        requestedAmountIn: 10n,
        appliedAmountIn: 10n,
        amountOut: 9n,
        feeBpsUsed: 15,
        midUsed: toWad("1"),
        reason: "OK",
        usedFallback: false,
        regimeBitmask: 0,
        atSec: 1_000,
        blockRef: 1,
      },
    ]);
  });

  test("should keep both reserves at or above their floors", () => {
    const { engine, rejects } = setupEngine({}, createReserves(1_000n, 100n));

    const partial = engine.swap(swapRequest(500n, true));

    expect(partial.isOk()).toBe(true);
    if (partial.isOk()) {
      expect(partial.value.appliedAmountIn).toBe(71n);
      expect(partial.value.leftoverAmountIn).toBe(429n);
      expect(partial.value.appliedAmountIn + partial.value.leftoverAmountIn).toBe(500n);
      expect(partial.value.reason).toBe("PARTIAL_FILL_FLOOR");
    }

    const reserves = engine.getReserves();
    const floors = computeInventoryFloors(reserves, toWad("1"), engine.getConfig());
    expect(reserves.quoteReserve).toBe(floors.quote);
    expect(reserves.baseReserve >= floors.base).toBe(true);

    const breach = engine.swap(swapRequest(10n, true));

    expect(breach.isErr()).toBe(true);
    if (breach.isErr()) {
      expect(breach.error).toEqual({ type: "FLOOR_BREACH", reserve: 30n, floor: 30n });
    }
    expect(engine.getReserves()).toEqual(reserves);
    expect(rejects).toEqual([{ operation: "swap", error: { type: "FLOOR_BREACH", reserve: 30n, floor: 30n } }]);
  });

  test("should reject on slippage without mutating", () => {
    const { engine, swaps } = setupEngine();

    const result = engine.swap(swapRequest(10n, true, { minAmountOut: 10n }));

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({ type: "SLIPPAGE", amountOut: 9n, minAmountOut: 10n });
    }
    expect(engine.getReserves()).toEqual(createReserves());
    expect(swaps).toHaveLength(0);
  });

  test("should reject an expired deadline", () => {
    const { engine } = setupEngine();

    const result = engine.swap(swapRequest(10n, true, { deadlineSec: 999 }));

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({ type: "DEADLINE_EXPIRED", deadlineSec: 999, nowSec: 1_000 });
    }
  });

  test("should add the divergence haircut in the soft band and fail closed past hard", () => {
    const { engine, oracle } = setupEngine({ enableSoftDivergence: true });
    oracle.secondary = { mid: toWad("0.996"), confBps: 0, ageSec: 0, ok: true };

    // 15 base + haircut 5 + 1 * (40 - 30)
    const soft = engine.swap(swapRequest(100n, true));

    expect(soft.isOk()).toBe(true);
    if (soft.isOk()) {
      expect(soft.value.feeBpsUsed).toBe(30);
      expect(soft.value.reason).toBe("SOFT_DIVERGENCE");
      expect(soft.value.regimeFlags.asArray).toContain("SoftDivergence");
    }
    expect(engine.getSoftDivergenceState()).toEqual({ active: true, healthyStreak: 0, lastDeltaBps: 40 });

    const reserves = engine.getReserves();
    oracle.secondary = { mid: toWad("0.985"), confBps: 0, ageSec: 0, ok: true };
    const hard = engine.swap(swapRequest(100n, true));

    expect(hard.isErr()).toBe(true);
    if (hard.isErr()) {
      expect(hard.error).toEqual({ type: "DIVERGENCE_HARD", deltaBps: 150, hardBps: 100 });
    }
    expect(engine.getSoftDivergenceState()).toEqual({ active: true, healthyStreak: 0, lastDeltaBps: 40 });
    expect(engine.getReserves()).toEqual(reserves);
  });

  test("should clamp and widen in degraded mode on fallback", () => {
    const { engine, oracle } = setupEngine({ enableAOMQ: true });
    oracle.primary = { mid: toWad("1"), ageSec: 120, ok: true };
    oracle.ema = { mid: toWad("1"), ok: true };

    // 80 quote → clamped to 50; fee 100 bps → ceil(0.5) = 1; out 49
    const result = engine.swap(swapRequest(80n, false));

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.appliedAmountIn).toBe(50n);
      expect(result.value.leftoverAmountIn).toBe(30n);
      expect(result.value.amountOut).toBe(49n);
      expect(result.value.feeBpsUsed).toBe(100);
      expect(result.value.usedFallback).toBe(true);
      expect(result.value.reason).toBe("AOMQ_CLAMP");
      expect(result.value.reasonCodes).toEqual(["AOMQ_CLAMP", "FALLBACK_MODE"]);
      expect(result.value.aomq).toEqual({ askActive: true, bidActive: true, triggerReason: "FALLBACK" });
      expect(result.value.regimeFlags.asArray).toEqual(["AOMQ", "Fallback"]);
    }
    expect(engine.getAomqState().triggerReason).toBe("FALLBACK");
  });
});

describe("auto recenter", () => {
  test("should recenter once after a threshold move and not on later sub-threshold swaps", () => {
    const { engine, oracle, clock, targets } = setupEngine({ enableAutoRecenter: true });

    // baseline at 1.0
    expect(engine.swap(swapRequest(10n, true)).isOk()).toBe(true);
    expect(targets).toHaveLength(0);

    // 1000 bps move ≥ 750
    oracle.setPrice("1.1");
    clock.advance(5);
    const jump = engine.swap(swapRequest(10n, true));

    expect(jump.isOk()).toBe(true);
    if (jump.isOk()) {
      // post-trade (1020, 982): 982 + 1020 * 1.1 = 2104; 2104 / 1.1 = 1912 → / 2 = 956
      // total / 2 / price; a target near 909 would only come from dividing by 2.2
      expect(jump.value.rebalance?.newTarget).toBe(956n);
      expect(jump.value.reserves.targetBaseStar).toBe(956n);
    }

    oracle.setPrice("1.12");
    clock.advance(5);
    expect(engine.swap(swapRequest(10n, true)).isOk()).toBe(true);
    clock.advance(100);
    expect(engine.swap(swapRequest(10n, false)).isOk()).toBe(true);

    expect(targets).toHaveLength(1);
    expect(targets[0]).toEqual({
      type: "TARGET_UPDATED",
      trigger: "auto",
      previousTarget: 1_000n,
      newTarget: 956n,
      priceWad: toWad("1.1"),
      atSec: 1_005,
      blockRef: 2,
    });
    expect(engine.getRecenterState().healthyStreak).toBe(2);
  });

  test("should hold a second commit until the healthy streak is rebuilt", () => {
    const { engine, oracle, clock, targets } = setupEngine({ enableAutoRecenter: true });

    expect(engine.swap(swapRequest(10n, true)).isOk()).toBe(true);
    oracle.setPrice("1.1");
    clock.advance(5);
    expect(engine.swap(swapRequest(10n, true)).isOk()).toBe(true);
    expect(targets).toHaveLength(1);
    expect(engine.getRecenterState().healthyStreak).toBe(0);

    // past the 60s cooldown, sub-threshold: no record, streak 1
    oracle.setPrice("1.12");
    clock.advance(70);
    expect(engine.swap(swapRequest(10n, true))._unsafeUnwrap().rebalance).toBeUndefined();
    expect(engine.getRecenterState().healthyStreak).toBe(1);

    // threshold move with cooldown elapsed, but only one healthy frame
    oracle.setPrice("1.2");
    clock.advance(5);
    expect(engine.swap(swapRequest(10n, true))._unsafeUnwrap().rebalance).toBeUndefined();
    expect(engine.getRecenterState().healthyStreak).toBe(1);

    oracle.setPrice("1.15");
    clock.advance(5);
    expect(engine.swap(swapRequest(10n, true))._unsafeUnwrap().rebalance).toBeUndefined();
    expect(engine.getRecenterState().healthyStreak).toBe(2);

    oracle.setPrice("1.2");
    clock.advance(5);
    const second = engine.swap(swapRequest(10n, true))._unsafeUnwrap();

    expect(second.rebalance?.previousTarget).toBe(956n);
    expect(second.rebalance?.priceWad).toBe(toWad("1.2"));
    expect(second.reserves.targetBaseStar).toBe(second.rebalance?.newTarget);
    expect(targets.map(t => [t.atSec, t.blockRef])).toEqual([
      [1_005, 2],
      [1_090, 6],
    ]);
    expect(engine.getRecenterState()).toEqual({
      lastRebalancePriceWad: toWad("1.2"),
      lastRebalanceAtSec: 1_090,
      healthyStreak: 0,
    });
  });
});

describe("manualRebalance", () => {
  test("should enforce the cooldown even with sufficient deviation", () => {
    const { engine, oracle, clock, targets } = setupEngine();
    oracle.setPrice("1.1");

    // 1000 + 1000 * 1.1 = 2100; 2100 / 1.1 = 1909 → / 2 = 954 (a figure near 909 does not follow from total / 2 / price)
    const first = engine.manualRebalance();
    expect(first.isOk()).toBe(true);
    expect(engine.getReserves().targetBaseStar).toBe(954n);

    oracle.setPrice("1.25");
    clock.advance(10);
    const second = engine.manualRebalance();

    expect(second.isErr()).toBe(true);
    if (second.isErr()) {
      expect(second.error).toEqual({ type: "RECENTER_COOLDOWN", remainingSec: 50 });
    }

    clock.advance(50);
    // 1000 + 1250 = 2250; 2250 / 1.25 = 1800 → / 2 = 900
    const third = engine.manualRebalance();
    expect(third.isOk()).toBe(true);
    if (third.isOk()) {
      expect(third.value.newTarget).toBe(900n);
    }
    expect(targets.map(t => t.newTarget)).toEqual([954n, 900n]);
  });

  test("should require a fresh primary", () => {
    const { engine, oracle } = setupEngine();
    oracle.primary = { mid: toWad("1.1"), ageSec: 120, ok: true };
    oracle.ema = { mid: toWad("1.1"), ok: true };

    const result = engine.manualRebalance();

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({ type: "ORACLE_STALE", source: "PRIMARY", ageSec: 120, maxAgeSec: 60 });
    }
  });
});

describe("preview", () => {
  test("should return MID_UNSET before any snapshot", () => {
    const { engine } = setupEngine();

    const result = engine.previewFees([100n], { isBaseIn: true });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe("MID_UNSET");
    }
  });

  test("should match the live fee for the same size under identical inputs", () => {
    const { engine, oracle, clock } = setupEngine({
      blendOn: true,
      enableSizeFee: true,
      enableInvTilt: true,
      enableVolSurcharge: true,
      enableBboFloor: true,
    });
    oracle.bidAsk = { bid: toWad("0.999"), ask: toWad("1.001"), ok: true };
    oracle.secondary = { mid: toWad("1"), confBps: 20, ageSec: 0, ok: true };
    expect(engine.swap(swapRequest(40n, true)).isOk()).toBe(true);

    oracle.setPrice("1.01");
    oracle.bidAsk = { bid: toWad("1.008"), ask: toWad("1.012"), ok: true };
    oracle.secondary = { mid: toWad("1.01"), confBps: 20, ageSec: 0, ok: true };
    clock.advance(3);
    expect(engine.swap(swapRequest(40n, true)).isOk()).toBe(true);

    const s0 = engine.getConfig().maker.s0Notional;
    for (const isBaseIn of [true, false]) {
      const preview = engine.previewFees([s0], { isBaseIn })._unsafeUnwrap();
      const live = engine.quote({ amountIn: s0, isBaseIn, mode: "spot" })._unsafeUnwrap();

      expect(preview).toEqual([live.feeBpsUsed]);
    }
  });

  test("should fail strict previews on a stale snapshot", () => {
    const { engine, clock } = setupEngine();
    expect(engine.swap(swapRequest(10n, true)).isOk()).toBe(true);

    clock.advance(31);
    const stale = engine.previewFees([10n], { isBaseIn: true });

    expect(stale.isErr()).toBe(true);
    if (stale.isErr()) {
      expect(stale.error).toEqual({ type: "PREVIEW_SNAPSHOT_STALE", ageSec: 31, maxAgeSec: 30 });
    }

    const relaxed = createTestConfig();
    relaxed.preview.strict = false;
    expect(engine.updateConfig(relaxed).isOk()).toBe(true);
    expect(engine.previewFees([10n], { isBaseIn: true })._unsafeUnwrap()).toEqual([15]);
  });

  test("should build a ladder over the configured multipliers", () => {
    const { engine } = setupEngine();
    expect(engine.swap(swapRequest(10n, true)).isOk()).toBe(true);

    const ladder = engine.previewLadder(10n)._unsafeUnwrap();

    expect(ladder).toEqual({
      sizes: [10n, 20n, 50n],
      askFee: [15, 15, 15],
      bidFee: [15, 15, 15],
      clampFlags: ["none", "none", "none"],
      snapshotAgeSec: 0,
    });
  });

  test("should flag floor clamps on the ladder", () => {
    const { engine } = setupEngine({}, createReserves(1_000n, 100n));
    expect(engine.swap(swapRequest(10n, true)).isOk()).toBe(true);

    // quote available after the swap: 91 - 30 = 61
    const ladder = engine.previewLadder(20n)._unsafeUnwrap();

    expect(ladder.clampFlags).toEqual(["none", "none", "floor"]);
  });

  test("should replay the soft-divergence clear the next swap would make", () => {
    const { engine, oracle } = setupEngine({ enableSoftDivergence: true, enableAOMQ: true });

    // 40 bps: soft band, degraded mode widens to the 100 bps emergency spread
    oracle.secondary = { mid: toWad("0.996"), confBps: 0, ageSec: 0, ok: true };
    expect(engine.swap(swapRequest(10n, true))._unsafeUnwrap().feeBpsUsed).toBe(100);

    oracle.secondary = { mid: toWad("1"), confBps: 0, ageSec: 0, ok: true };
    expect(engine.swap(swapRequest(10n, true))._unsafeUnwrap().feeBpsUsed).toBe(100);

    // second healthy frame: still soft
    expect(engine.previewFees([10n], { isBaseIn: true })._unsafeUnwrap()).toEqual([100]);
    expect(engine.swap(swapRequest(10n, true))._unsafeUnwrap().feeBpsUsed).toBe(100);
    expect(engine.getSoftDivergenceState()).toEqual({ active: true, healthyStreak: 2, lastDeltaBps: 0 });

    // third healthy frame clears soft mode
    expect(engine.previewFees([10n], { isBaseIn: true })._unsafeUnwrap()).toEqual([15]);
    expect(engine.swap(swapRequest(10n, true))._unsafeUnwrap().feeBpsUsed).toBe(15);
    expect(engine.getSoftDivergenceState()).toEqual({ active: false, healthyStreak: 3, lastDeltaBps: 0 });
  });

  test("should not expose the stored snapshot", () => {
    const { engine } = setupEngine();
    expect(engine.swap(swapRequest(10n, true)).isOk()).toBe(true);

    const copy = engine.previewSnapshotRaw();
    copy?.regimeFlags.asArray.push("AOMQ");

    expect(engine.previewSnapshotRaw()?.regimeFlags.asArray).toEqual([]);
  });

  test("should refresh the snapshot without trading", () => {
    const { engine, oracle, clock } = setupEngine();
    clock.advance(2);
    oracle.setPrice("1.02");

    const snapshot = engine.refreshPreviewSnapshot("spot")._unsafeUnwrap();

    expect(snapshot.midWad).toBe(toWad("1.02"));
    expect(snapshot.timestampSec).toBe(1_002);
    expect(engine.previewSnapshotRaw()).toEqual(snapshot);
    expect(engine.getReserves()).toEqual(createReserves());
  });
});

describe("updateConfig", () => {
  test("should keep the current config when validation fails", () => {
    const { engine } = setupEngine();
    const before = engine.getConfig();

    const result = engine.updateConfig({ ...createTestConfig(), fee: { ...createTestConfig().fee, capBps: -1 } });

    expect(result.isErr()).toBe(true);
    expect(engine.getConfig()).toEqual(before);
  });

  test("should ignore edits to the returned config", () => {
    const { engine } = setupEngine();

    const config = engine.getConfig();
    config.fee.capBps = 10_000;
    config.fee.baseBps = 400;

    expect(engine.getConfig().fee.capBps).toBe(500);
    expect(engine.quote({ amountIn: 10n, isBaseIn: true, mode: "spot" })._unsafeUnwrap().feeBpsUsed).toBe(15);
  });

  test("should return a copy of the applied config", () => {
    const { engine } = setupEngine();
    const next = createTestConfig();
    next.fee.baseBps = 20;

    const applied = engine.updateConfig(next)._unsafeUnwrap();
    applied.fee.baseBps = 400;

    expect(engine.getConfig().fee.baseBps).toBe(20);
  });
});
