/**
 * Scenario Feed - Scripted oracle feed for stress scenarios
 *
 * Emits primary, EMA and secondary events derived from a script on every
 * tick. Used by the simulator in place of a live venue connection.
 */

import Decimal from "decimal.js";
import { err, ok, type Result } from "neverthrow";

import type { OracleFeedError, OracleFeedEvent, OracleFeedPort } from "../ports";

/**
 * Oracle side of a stress scenario
 */
export interface OracleScript {
  /** Starting primary mid, decimal string */
  midPx: string;
  /** Secondary offset below primary, in bps */
  deltaBps: number;
  /** Full top-of-book spread around the primary mid, in bps */
  spreadBps: number;
  /** Secondary oracle confidence */
  confBps: number;
  /** Primary publishes only on the first tick; EMA keeps publishing */
  primaryStale?: boolean;
  /** Secondary publishes only on the first tick */
  secondaryStale?: boolean;
  /** Primary mid switches to `midPx` from `atStep` onwards */
  jump?: { atStep: number; midPx: string };
}

const PRICE_DECIMALS = 18;

function fmt(value: Decimal): string {
  return value.toDecimalPlaces(PRICE_DECIMALS, Decimal.ROUND_DOWN).toFixed();
}

export class ScenarioFeed implements OracleFeedPort {
  private handlers: ((event: OracleFeedEvent) => void)[] = [];
  private running = false;

  constructor(
    private readonly script: OracleScript,
    private readonly source = "scenario",
  ) {}

  start(): Result<void, OracleFeedError> {
    this.running = true;
    return ok(undefined);
  }

  stop(): void {
    this.running = false;
  }

  isRunning(): boolean {
    return this.running;
  }

  onEvent(handler: (event: OracleFeedEvent) => void): void {
    this.handlers.push(handler);
  }

  /**
   * Primary mid in effect at `step`
   */
  midAt(step: number): Decimal {
    const { jump } = this.script;
    return new Decimal(jump && step >= jump.atStep ? jump.midPx : this.script.midPx);
  }

  /**
   * Events for one step, without emitting
   */
  eventsAt(step: number, ts: Date): OracleFeedEvent[] {
    const mid = this.midAt(step);
    const halfSpread = mid.mul(this.script.spreadBps).div(20_000);
    const events: OracleFeedEvent[] = [];

    if (!this.script.primaryStale || step === 0) {
      events.push({
        type: "primary",
        ts,
        source: this.source,
        midPx: fmt(mid),
        bestBidPx: fmt(mid.minus(halfSpread)),
        bestAskPx: fmt(mid.plus(halfSpread)),
      });
    }

    events.push({ type: "ema", ts, source: this.source, emaPx: fmt(mid) });

    if (!this.script.secondaryStale || step === 0) {
      events.push({
        type: "secondary",
        ts,
        source: this.source,
        midPx: fmt(mid.mul(new Decimal(10_000).minus(this.script.deltaBps)).div(10_000)),
        confBps: this.script.confBps,
      });
    }

    return events;
  }

  /**
   * Emit the events for `step` to every handler
   */
  tick(step: number, ts: Date): Result<number, OracleFeedError> {
    if (!this.running) {
      return err({ type: "not_running", message: "scenario feed is not started" });
    }
    const events = this.eventsAt(step, ts);
    for (const event of events) {
      for (const handler of this.handlers) handler(event);
    }
    return ok(events.length);
  }
}
