/**
 * Port interfaces for adapters
 */

export type {
  EmaPriceEvent,
  FeedStatusEvent,
  OracleFeedError,
  OracleFeedEvent,
  OracleFeedPort,
  PrimaryPriceEvent,
  SecondaryPriceEvent,
} from "./oracle-feed-port";
