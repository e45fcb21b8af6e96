/**
 * Latest Oracle Cache - In-memory latest values for the hot path
 *
 * - Holds the most recent primary, EMA and secondary readings
 * - Ages are measured against the injected clock at read time
 * - No I/O; reads are synchronous
 */

import { err, ok, type Result } from "neverthrow";

import { toWad, type BidAsk, type Clock, type EmaMid, type MidAndAge, type OracleReader, type SecondaryMid, type Wad } from "@dnmm/core";

import type { OracleFeedError, OracleFeedEvent } from "../ports";

const DECIMAL_PRICE = /^\d+(\.\d+)?$/;

interface PrimaryEntry {
  mid: Wad;
  bid: Wad;
  ask: Wad;
  tsMs: number;
}

interface EmaEntry {
  mid: Wad;
  tsMs: number;
}

interface SecondaryEntry {
  mid: Wad;
  confBps: number;
  tsMs: number;
}

function parsePrice(field: string, value: string): Result<Wad, OracleFeedError> {
  if (!DECIMAL_PRICE.test(value)) {
    return err({ type: "invalid_price", message: `${field} is not a decimal price: ${value}` });
  }
  const wad = toWad(value);
  if (wad <= 0n) {
    return err({ type: "invalid_price", message: `${field} must be positive: ${value}` });
  }
  return ok(wad);
}

function parseOptionalPrice(field: string, value: string | undefined): Result<Wad, OracleFeedError> {
  return value === undefined ? ok(0n) : parsePrice(field, value);
}

/**
 * Latest Oracle Cache
 *
 * Implements the engine's `OracleReader` from pushed feed events.
 */
export class LatestOracleCache implements OracleReader {
  private primary: PrimaryEntry | null = null;
  private ema: EmaEntry | null = null;
  private secondary: SecondaryEntry | null = null;
  private primaryDown = false;
  private secondaryDown = false;

  constructor(private readonly clock: Clock) {}

  /**
   * Apply a feed event. Invalid or out-of-order events leave the cache unchanged.
   */
  apply(event: OracleFeedEvent): Result<void, OracleFeedError> {
    const tsMs = event.ts.getTime();

    switch (event.type) {
      case "primary": {
        if (this.primary && tsMs < this.primary.tsMs) return this.outOfOrder(event.type, tsMs, this.primary.tsMs);
        return parsePrice("midPx", event.midPx).andThen(mid =>
          parseOptionalPrice("bestBidPx", event.bestBidPx).andThen(bid =>
            parseOptionalPrice("bestAskPx", event.bestAskPx).map(ask => {
              this.primary = { mid, bid, ask, tsMs };
              this.primaryDown = false;
            }),
          ),
        );
      }
      case "ema": {
        if (this.ema && tsMs < this.ema.tsMs) return this.outOfOrder(event.type, tsMs, this.ema.tsMs);
        return parsePrice("emaPx", event.emaPx).map(mid => {
          this.ema = { mid, tsMs };
        });
      }
      case "secondary": {
        if (this.secondary && tsMs < this.secondary.tsMs) return this.outOfOrder(event.type, tsMs, this.secondary.tsMs);
        if (!Number.isInteger(event.confBps) || event.confBps < 0) {
          return err({ type: "invalid_price", message: `confBps must be a non-negative integer: ${event.confBps}` });
        }
        return parsePrice("midPx", event.midPx).map(mid => {
          this.secondary = { mid, confBps: event.confBps, tsMs };
          this.secondaryDown = false;
        });
      }
      case "primary_down":
        this.primaryDown = true;
        return ok(undefined);
      case "secondary_down":
        this.secondaryDown = true;
        return ok(undefined);
    }
  }

  readMidAndAge(): MidAndAge {
    if (!this.primary || this.primaryDown) return { mid: 0n, ageSec: 0, ok: false };
    return { mid: this.primary.mid, ageSec: this.ageSec(this.primary.tsMs), ok: true };
  }

  readBidAsk(): BidAsk {
    if (!this.primary || this.primaryDown || this.primary.bid === 0n || this.primary.ask === 0n) {
      return { bid: 0n, ask: 0n, ok: false };
    }
    return { bid: this.primary.bid, ask: this.primary.ask, ok: true };
  }

  readEmaFallback(): EmaMid {
    if (!this.ema) return { mid: 0n, ok: false };
    return { mid: this.ema.mid, ageSec: this.ageSec(this.ema.tsMs), ok: true };
  }

  readSecondaryMid(): SecondaryMid {
    if (!this.secondary || this.secondaryDown) return { mid: 0n, confBps: 0, ageSec: 0, ok: false };
    return {
      mid: this.secondary.mid,
      confBps: this.secondary.confBps,
      ageSec: this.ageSec(this.secondary.tsMs),
      ok: true,
    };
  }

  private ageSec(tsMs: number): number {
    return Math.max(0, Math.floor((this.clock.nowSec() * 1000 - tsMs) / 1000));
  }

  private outOfOrder(kind: string, tsMs: number, lastMs: number): Result<void, OracleFeedError> {
    return err({ type: "out_of_order", message: `${kind} event at ${tsMs} is older than ${lastMs}` });
  }
}
