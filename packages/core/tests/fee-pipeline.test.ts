/**
 * Fee Pipeline Unit Tests
 */

import { describe, expect, test } from "vitest";

import {
  computeBboFloorBps,
  computeFeeBps,
  computeInventoryTiltBps,
  computeSizeFeeBps,
  computeVolatilitySurchargeBps,
  type FeeContext,
} from "../src/fee-pipeline";
import { createTestConfig } from "./fixtures";

const createDefaultContext = (): FeeContext => ({
  confidenceBps: 0,
  haircutBps: 0,
  notional: 0n,
  inventoryDeviationBps: 0,
  spreadBps: 0,
  sigmaBps: 0,
  isBaseIn: true,
  aomqActive: false,
  rebateEligible: false,
});

describe("computeSizeFeeBps", () => {
  const config = createTestConfig({ enableSizeFee: true });

  test("should charge lin + quad at u = 1", () => {
    // 12 * 1 + 6 * 1 = 18
    expect(computeSizeFeeBps(100n, config)).toBe(18);
  });

  test("should clamp to the size fee cap", () => {
    // u = 3: 12 * 3 + 6 * 9 = 90 → 30
    expect(computeSizeFeeBps(300n, config)).toBe(30);
  });

  test("should be non-decreasing in u", () => {
    const fees = [0n, 10n, 50n, 100n, 120n, 150n, 300n, 1_000n].map(n => computeSizeFeeBps(n, config));
    // u = 0.1: 1.2 + 0.06 → 1; u = 0.5: 6 + 1.5 → 7; u = 1.2: 14.4 + 8.64 → 23
    expect(fees).toEqual([0, 1, 7, 18, 23, 30, 30, 30]);
  });

  test("should contribute zero when disabled", () => {
    expect(computeSizeFeeBps(300n, createTestConfig())).toBe(0);
  });
});

describe("computeInventoryTiltBps", () => {
  const config = createTestConfig({ enableInvTilt: true });

  test("should surcharge trades that worsen the imbalance", () => {
    // base 5% over target, trader adds base: 2 * 5 = 10
    expect(computeInventoryTiltBps(500, true, 0, 0, config)).toBe(10);
  });

  test("should discount trades that restore balance", () => {
    expect(computeInventoryTiltBps(500, false, 0, 0, config)).toBe(-10);
  });

  test("should clamp to the tilt cap on both sides", () => {
    // 2 * 10 = 20 → 15
    expect(computeInventoryTiltBps(1_000, true, 0, 0, config)).toBe(15);
    expect(computeInventoryTiltBps(1_000, false, 0, 0, config)).toBe(-15);
  });

  test("should scale with spread and confidence weights", () => {
    const weighted = createTestConfig({ enableInvTilt: true });
    weighted.inventory.tiltSpreadWeightBps = 5_000;
    weighted.inventory.tiltConfWeightBps = 10_000;
    // 2 * 3 = 6; spread weight 1 + 0.5 * 20/100 = 1.1; conf weight 1 + 1.0 * 10/100 = 1.1
    // 6 * 1.1 * 1.1 = 7.26 → 7
    expect(computeInventoryTiltBps(300, true, 20, 10, weighted)).toBe(7);
  });
});

describe("computeBboFloorBps", () => {
  test("should take the larger of the fixed floor and the spread term", () => {
    const config = createTestConfig({ enableBboFloor: true });
    config.maker.alphaBboBps = 5_000;
    config.maker.betaFloorBps = 8;

    expect(computeBboFloorBps(10, config)).toBe(8);
    // 0.5 * 40 = 20
    expect(computeBboFloorBps(40, config)).toBe(20);
  });
});

describe("computeVolatilitySurchargeBps", () => {
  const config = createTestConfig({ enableVolSurcharge: true });

  test("should scale sigma by kappa and sqrt(ttl)", () => {
    // 0.5 * 40 * sqrt(1) = 20
    expect(computeVolatilitySurchargeBps(40, false, config)).toBe(20);
  });

  test("should add the toxicity bias only while degraded", () => {
    // 0.5 * (40 + 10) = 25
    expect(computeVolatilitySurchargeBps(40, true, config)).toBe(25);
  });

  test("should clamp to the surcharge cap", () => {
    expect(computeVolatilitySurchargeBps(200, false, config)).toBe(30);
  });
});

describe("computeFeeBps", () => {
  test("should return the base fee when every component is disabled", () => {
    const fees = computeFeeBps({ ...createDefaultContext(), notional: 500n, confidenceBps: 40 }, createTestConfig());

    expect(fees.totalBps).toBe(15);
    expect(fees.sizeBps).toBe(0);
    expect(fees.tiltBps).toBe(0);
    expect(fees.floorBps).toBe(0);
    expect(fees.volatilityBps).toBe(0);
    expect(fees.rebateBps).toBe(0);
  });

  test("should add confidence, deviation and haircut terms", () => {
    const config = createTestConfig();
    config.fee.alphaNumerator = 1;
    config.fee.alphaDenominator = 2;
    config.fee.betaInvDevNumerator = 1;
    config.fee.betaInvDevDenominator = 100;

    // 15 + 40/2 + |-700|/100 + 5 = 47
    const fees = computeFeeBps(
      { ...createDefaultContext(), confidenceBps: 40, inventoryDeviationBps: -700, haircutBps: 5 },
      config,
    );

    expect(fees.confidenceBps).toBe(20);
    expect(fees.deviationBps).toBe(7);
    expect(fees.totalBps).toBe(47);
  });

  test("should not let a rebate reduce the fee below the BBO floor", () => {
    const config = createTestConfig({ enableBboFloor: true, enableRebates: true });
    config.fee.baseBps = 22;
    config.maker.betaFloorBps = 20;

    // subtotal 22, rebate 3 → 19 → floored at 20
    const fees = computeFeeBps({ ...createDefaultContext(), rebateEligible: true }, config);

    expect(fees.rebateBps).toBe(3);
    expect(fees.totalBps).toBe(20);
  });

  test("should apply the rebate only to eligible callers", () => {
    const config = createTestConfig({ enableRebates: true });
    expect(computeFeeBps({ ...createDefaultContext(), rebateEligible: true }, config).totalBps).toBe(12);
    expect(computeFeeBps(createDefaultContext(), config).totalBps).toBe(15);
  });

  test("should let the global cap win over the floor", () => {
    const config = createTestConfig({ enableBboFloor: true });
    config.maker.betaFloorBps = 600;

    expect(computeFeeBps(createDefaultContext(), config).totalBps).toBe(500);
  });

  test("should widen to the emergency spread while degraded on the side", () => {
    const config = createTestConfig({ enableAOMQ: true, enableVolSurcharge: true });

    // 15 + vol 0.5 * (0 + 10) = 20 → max(20, 100) = 100
    const fees = computeFeeBps({ ...createDefaultContext(), aomqActive: true }, config);

    expect(fees.volatilityBps).toBe(5);
    expect(fees.emergencyBps).toBe(100);
    expect(fees.totalBps).toBe(100);
  });

  test("should not go below zero with a large tilt discount", () => {
    const config = createTestConfig({ enableInvTilt: true });
    config.fee.baseBps = 5;

    // 5 - 15 → 0
    const fees = computeFeeBps({ ...createDefaultContext(), inventoryDeviationBps: 1_000, isBaseIn: false }, config);

    expect(fees.tiltBps).toBe(-15);
    expect(fees.totalBps).toBe(0);
  });
});
