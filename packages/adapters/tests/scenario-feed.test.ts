/**
 * Scenario Feed Unit Tests
 */

import { describe, expect, test } from "vitest";

import { toWad } from "@dnmm/core";

import { ManualClock } from "../src/clock";
import { LatestOracleCache } from "../src/oracle/latest-oracle-cache";
import type { OracleFeedEvent } from "../src/ports";
import { ScenarioFeed, type OracleScript } from "../src/scenario/scenario-feed";

const createDefaultScript = (): OracleScript => ({
  midPx: "1",
  deltaBps: 50,
  spreadBps: 20,
  confBps: 10,
});

describe("ScenarioFeed", () => {
  test("should derive book and secondary from the script", () => {
    const feed = new ScenarioFeed(createDefaultScript(), "calm");
    const ts = new Date(0);

    expect(feed.eventsAt(0, ts)).toEqual([
      { type: "primary", ts, source: "calm", midPx: "1", bestBidPx: "0.999", bestAskPx: "1.001" },
      { type: "ema", ts, source: "calm", emaPx: "1" },
      { type: "secondary", ts, source: "calm", midPx: "0.995", confBps: 10 },
    ]);
  });

  test("should stop publishing the primary after the first tick when stale", () => {
    const feed = new ScenarioFeed({ ...createDefaultScript(), primaryStale: true });

    expect(feed.eventsAt(0, new Date(0)).map(e => e.type)).toEqual(["primary", "ema", "secondary"]);
    expect(feed.eventsAt(1, new Date(0)).map(e => e.type)).toEqual(["ema", "secondary"]);
  });

  test("should switch the mid at the jump step", () => {
    const feed = new ScenarioFeed({ ...createDefaultScript(), jump: { atStep: 3, midPx: "1.1" } });

    expect(feed.midAt(2).toString()).toBe("1");
    expect(feed.midAt(3).toString()).toBe("1.1");
  });

  test("should refuse to tick before start", () => {
    const feed = new ScenarioFeed(createDefaultScript());
    const result = feed.tick(0, new Date(0));

    expect(result.isErr() && result.error.type).toBe("not_running");
  });

  test("should feed a cache through the event handler", () => {
    const clock = new ManualClock(100);
    const cache = new LatestOracleCache(clock);
    const feed = new ScenarioFeed(createDefaultScript());
    const seen: OracleFeedEvent[] = [];

    feed.onEvent(event => {
      seen.push(event);
      cache.apply(event);
    });
    feed.start();
    const emitted = feed.tick(0, clock.nowDate());

    expect(emitted.isOk() && emitted.value).toBe(3);
    expect(seen).toHaveLength(3);
    expect(cache.readMidAndAge()).toEqual({ mid: toWad("1"), ageSec: 0, ok: true });
    expect(cache.readSecondaryMid().mid).toBe(toWad("0.995"));
  });
});
