/**
 * @fracta/auction — Types and errors.
 */

import type { Address, Amount, AssetId, FailureCode, Timestamp } from "@fracta/types";

// =============================================================================
// Errors
// =============================================================================

export type AuctionFailureReason =
  | "NOT_OWNER"
  | "NOT_AUTHORITY"
  | "AUTHORITY_UNSET"
  | "WRONG_DURATION"
  | "NEGATIVE_PRICE"
  | "NOT_IN_CUSTODY"
  | "AUCTION_ACTIVE"
  | "AUCTION_NOT_ACTIVE"
  | "AUCTION_EXPIRED"
  | "AUCTION_NOT_ENDED"
  | "NO_BIDS"
  | "BID_TOO_LOW"
  | "UNKNOWN_DEPOSITOR"
  | "INVALID_PARAMETER"
  | "RECIPIENT_REJECTED";

export class AuctionError extends Error {
  public readonly code: FailureCode;
  public readonly reason: AuctionFailureReason;

  constructor(code: FailureCode, reason: AuctionFailureReason, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AuctionError";
    this.code = code;
    this.reason = reason;
  }
}

// =============================================================================
// Parameters
// =============================================================================

export interface AuctionParameters {
  /** Required auction length in seconds; `start` must match it exactly. */
  readonly duration: number;
  /** Share of the winning bid credited to the depositor, 0-100. */
  readonly royaltyPercentage: number;
  /** Trailing window in which a bid extends the auction. */
  readonly antiSnipeWindow: number;
  /** Seconds added per qualifying bid. */
  readonly antiSnipeExtension: number;
  /** Extension cap per auction; 0 means unlimited. */
  readonly maxExtensions: number;
}

/** Parameters governance may change. */
export type GovernedParameter = "duration" | "royaltyPercentage" | "maxExtensions";

export const DEFAULT_AUCTION_PARAMETERS: AuctionParameters = {
  duration: 7 * 24 * 60 * 60,
  royaltyPercentage: 5,
  antiSnipeWindow: 15 * 60,
  antiSnipeExtension: 15 * 60,
  maxExtensions: 0,
};

// =============================================================================
// Records
// =============================================================================

export interface AuctionRecord {
  readonly assetId: AssetId;
  readonly isActive: boolean;
  readonly startingPrice: Amount;
  readonly endTime: Timestamp;
  readonly highestBid: Amount;
  readonly highestBidder: Address | null;
  readonly totalBids: number;
  readonly extensions: number;
}

export interface BidResult {
  readonly highestBid: Amount;
  readonly endTime: Timestamp;
  readonly extended: boolean;
}

export interface SettlementResult {
  readonly winner: Address;
  readonly amount: Amount;
  readonly royalty: Amount;
  readonly royaltyRecipient: Address;
}

export interface CancellationResult {
  readonly refundedBidder: Address | null;
  readonly refund: Amount;
}
