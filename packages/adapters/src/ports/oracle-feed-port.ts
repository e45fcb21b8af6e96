/**
 * Oracle Feed Port - Interface for price feed subscriptions
 *
 * Feeds push venue-normalized price events; the engine never talks to a
 * feed directly; events land in a cache that implements `OracleReader`.
 */

import type { Result } from "neverthrow";

/**
 * Primary venue mid with top of book
 */
export interface PrimaryPriceEvent {
  type: "primary";
  ts: Date;
  source: string;
  midPx: string;
  bestBidPx?: string;
  bestAskPx?: string;
}

/**
 * EMA published by the primary venue
 */
export interface EmaPriceEvent {
  type: "ema";
  ts: Date;
  source: string;
  emaPx: string;
}

/**
 * Independent secondary oracle with its own confidence
 */
export interface SecondaryPriceEvent {
  type: "secondary";
  ts: Date;
  source: string;
  midPx: string;
  confBps: number;
}

/**
 * Feed outage notice; the affected source reads as unset until it recovers
 */
export interface FeedStatusEvent {
  type: "primary_down" | "secondary_down";
  ts: Date;
  reason?: string;
}

export type OracleFeedEvent = PrimaryPriceEvent | EmaPriceEvent | SecondaryPriceEvent | FeedStatusEvent;

/**
 * Oracle feed errors
 */
export type OracleFeedError =
  | { type: "invalid_price"; message: string }
  | { type: "out_of_order"; message: string }
  | { type: "not_running"; message: string };

/**
 * Oracle Feed Port interface
 */
export interface OracleFeedPort {
  start(): Result<void, OracleFeedError>;
  stop(): void;
  isRunning(): boolean;
  onEvent(handler: (event: OracleFeedEvent) => void): void;
}
