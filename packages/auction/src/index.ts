/**
 * @fracta/auction — Auction engine.
 *
 * Provides:
 * - AuctionEngine: start, bid, end, cancel, governed parameters
 * - Anti-snipe extension with an optional cap
 *
 * @packageDocumentation
 */

export type {
  AuctionFailureReason,
  AuctionParameters,
  GovernedParameter,
  AuctionRecord,
  BidResult,
  SettlementResult,
  CancellationResult,
} from "./types.js";
export { AuctionError, DEFAULT_AUCTION_PARAMETERS } from "./types.js";

export { AuctionEngine } from "./engine.js";
export type { AuctionEngineOptions } from "./engine.js";
