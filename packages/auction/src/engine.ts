/**
 * AuctionEngine — per-asset auction state machine.
 *
 *   Inactive --start--> Active --bid--> Active
 *   Active --end--> Inactive       (deadline passed, at least one bid)
 *   Active --cancel--> Inactive    (governance, any time)
 *
 * Bids are collected into escrow as they arrive. An outbid bidder is
 * credited to the pending-payment ledger; nothing is pushed to them.
 *
 * Deadlines are evaluated against the injected clock when an operation
 * is called. There is no background sweep.
 */

import type { Address, Amount, AssetId, Clock } from "@fracta/types";
import { slotHolds } from "@fracta/types";
import type { EventRecorder } from "@fracta/event-store";
import { FRACTA_EVENTS } from "@fracta/event-store";
import type { CustodyPort } from "@fracta/custody";
import type { BusyGuard, PendingPaymentLedger, ValueRail } from "@fracta/ledger";
import { formatAmount, percentOf, requirePositive, resourceKey } from "@fracta/ledger";
import type {
  AuctionParameters,
  AuctionRecord,
  BidResult,
  CancellationResult,
  GovernedParameter,
  SettlementResult,
} from "./types.js";
import { AuctionError, DEFAULT_AUCTION_PARAMETERS } from "./types.js";

export interface AuctionEngineOptions {
  /** Actor recorded on credits the engine makes. */
  readonly address: Address;
  readonly custody: CustodyPort;
  readonly payments: PendingPaymentLedger;
  readonly rail: ValueRail;
  readonly guard: BusyGuard;
  readonly clock: Clock;
  readonly events: EventRecorder;
  readonly parameters?: Partial<AuctionParameters>;
}

interface MutableAuction {
  isActive: boolean;
  startingPrice: Amount;
  endTime: number;
  highestBid: Amount;
  highestBidder: Address | null;
  totalBids: number;
  extensions: number;
}

const PARAMETER_STREAM = "auction-parameters";

function streamOf(assetId: AssetId): string {
  return `asset:${assetId}`;
}

export class AuctionEngine {
  readonly address: Address;

  private readonly custody: CustodyPort;
  private readonly payments: PendingPaymentLedger;
  private readonly rail: ValueRail;
  private readonly guard: BusyGuard;
  private readonly clock: Clock;
  private readonly events: EventRecorder;

  private readonly auctions = new Map<AssetId, MutableAuction>();
  private params: AuctionParameters;

  constructor(options: AuctionEngineOptions) {
    this.address = options.address;
    this.custody = options.custody;
    this.payments = options.payments;
    this.rail = options.rail;
    this.guard = options.guard;
    this.clock = options.clock;
    this.events = options.events;

    const params = { ...DEFAULT_AUCTION_PARAMETERS, ...options.parameters };
    validateDuration(params.duration);
    validateRoyalty(params.royaltyPercentage);
    validateCount("antiSnipeWindow", params.antiSnipeWindow);
    validateCount("antiSnipeExtension", params.antiSnipeExtension);
    validateCount("maxExtensions", params.maxExtensions);
    this.params = params;
  }

  // ─── Start ───────────────────────────────────────────────────────────

  /**
   * Open an auction. Owner only; `duration` must equal the configured
   * duration exactly.
   */
  start(assetId: AssetId, startingPrice: Amount, duration: number, caller: Address): AuctionRecord {
    if (caller !== this.custody.owner()) {
      throw new AuctionError("UNAUTHORIZED", "NOT_OWNER", `${caller} may not start auctions`);
    }
    if (duration !== this.params.duration) {
      throw new AuctionError(
        "INVALID_ARGUMENT",
        "WRONG_DURATION",
        `Auction duration must be ${this.params.duration}s, got ${duration}s`,
      );
    }
    if (startingPrice < 0n) {
      throw new AuctionError("INVALID_ARGUMENT", "NEGATIVE_PRICE", "Starting price cannot be negative");
    }

    return this.guard.run(resourceKey.asset(assetId), () => {
      if (!this.custody.isInCustody(assetId)) {
        throw new AuctionError("NOT_IN_CUSTODY", "NOT_IN_CUSTODY", `Asset ${assetId} is not in custody`);
      }
      if (this.auctions.get(assetId)?.isActive === true) {
        throw new AuctionError("PRECONDITION_FAILED", "AUCTION_ACTIVE", `Asset ${assetId} is already under auction`);
      }

      const auction: MutableAuction = {
        isActive: true,
        startingPrice,
        endTime: this.clock.now() + duration,
        highestBid: startingPrice,
        highestBidder: null,
        totalBids: 0,
        extensions: 0,
      };
      this.custody.setListed(assetId, true);
      this.auctions.set(assetId, auction);

      this.events.record(streamOf(assetId), FRACTA_EVENTS.AUCTION_STARTED, caller, {
        assetId,
        startingPrice: formatAmount(startingPrice),
        duration,
        endTime: auction.endTime,
      });
      return view(assetId, auction);
    });
  }

  // ─── Bid ─────────────────────────────────────────────────────────────

  /**
   * Place a bid of `payment`, collected from the caller into escrow.
   *
   * Must strictly exceed the current high bid. The displaced bidder is
   * credited their bid. A bid inside the anti-snipe window pushes the
   * deadline back by one extension.
   */
  bid(assetId: AssetId, payment: Amount, caller: Address): BidResult {
    requirePositive(payment, "Bid");

    return this.guard.run(resourceKey.asset(assetId), () => {
      const auction = this.requireActive(assetId);
      const now = this.clock.now();
      if (now >= auction.endTime) {
        throw new AuctionError("PRECONDITION_FAILED", "AUCTION_EXPIRED", `Auction for ${assetId} has ended`);
      }
      if (payment <= auction.highestBid) {
        throw new AuctionError(
          "PRECONDITION_FAILED",
          "BID_TOO_LOW",
          `Bid ${formatAmount(payment)} must exceed ${formatAmount(auction.highestBid)}`,
        );
      }

      this.rail.collect(caller, payment);

      const correlationId = this.events.correlation();
      if (auction.highestBidder !== null) {
        this.payments.credit(auction.highestBidder, auction.highestBid, "outbid", this.address, { correlationId });
      }
      auction.highestBid = payment;
      auction.highestBidder = caller;
      auction.totalBids += 1;

      const extended = this.shouldExtend(auction, now);
      if (extended) {
        auction.endTime += this.params.antiSnipeExtension;
        auction.extensions += 1;
      }

      this.events.record(streamOf(assetId), FRACTA_EVENTS.BID_PLACED, caller, {
        assetId,
        bidder: caller,
        amount: formatAmount(payment),
        endTime: auction.endTime,
        extended,
      }, { correlationId });
      return { highestBid: payment, endTime: auction.endTime, extended };
    });
  }

  // ─── End ─────────────────────────────────────────────────────────────

  /**
   * Settle an auction past its deadline. Anyone may call.
   *
   * The asset goes to the highest bidder, the depositor is credited a
   * royalty on the winning bid, and the full winning bid is booked as
   * proceeds for claim holders. The royalty is not deducted from the
   * proceeds.
   */
  end(assetId: AssetId, caller: Address): SettlementResult {
    return this.guard.run(resourceKey.asset(assetId), () => {
      const auction = this.requireActive(assetId);
      if (this.clock.now() < auction.endTime) {
        throw new AuctionError(
          "PRECONDITION_FAILED",
          "AUCTION_NOT_ENDED",
          `Auction for ${assetId} runs until ${auction.endTime}`,
        );
      }
      const winner = auction.highestBidder;
      if (winner === null) {
        throw new AuctionError("PRECONDITION_FAILED", "NO_BIDS", `Auction for ${assetId} has no bids`);
      }
      const depositor = this.custody.originalOwnerOf(assetId);
      if (depositor === undefined) {
        throw new AuctionError("NOT_FOUND", "UNKNOWN_DEPOSITOR", `No depositor recorded for ${assetId}`);
      }

      const amount = auction.highestBid;
      const royalty = percentOf(amount, this.params.royaltyPercentage);

      auction.isActive = false;
      try {
        this.custody.releaseAsset(assetId, winner);
      } catch (err) {
        auction.isActive = true;
        throw new AuctionError("TRANSFER_FAILED", "RECIPIENT_REJECTED", `Delivering ${assetId} to ${winner} failed`, {
          cause: err,
        });
      }

      const correlationId = this.events.correlation();
      this.payments.credit(depositor, royalty, "royalty", this.address, { correlationId });
      this.custody.recordSaleProceeds(assetId, amount, correlationId);

      const result = { winner, amount, royalty, royaltyRecipient: depositor };
      this.events.record(streamOf(assetId), FRACTA_EVENTS.AUCTION_ENDED, caller, {
        assetId,
        winner,
        amount: formatAmount(amount),
        royalty: formatAmount(royalty),
        royaltyRecipient: depositor,
      }, { correlationId });
      return result;
    });
  }

  // ─── Cancel ──────────────────────────────────────────────────────────

  /**
   * Close an active auction without a sale. Governance only.
   * The highest bidder, if any, is credited their bid.
   */
  cancel(assetId: AssetId, caller: Address): CancellationResult {
    this.requireAuthority(caller);

    return this.guard.run(resourceKey.asset(assetId), () => {
      const auction = this.requireActive(assetId);
      const refundedBidder = auction.highestBidder;
      const refund = refundedBidder === null ? 0n : auction.highestBid;

      auction.isActive = false;
      auction.highestBid = 0n;
      auction.highestBidder = null;
      this.custody.setListed(assetId, false);

      const correlationId = this.events.correlation();
      if (refundedBidder !== null) {
        this.payments.credit(refundedBidder, refund, "auction-cancelled", this.address, { correlationId });
      }
      this.events.record(streamOf(assetId), FRACTA_EVENTS.AUCTION_CANCELLED, caller, {
        assetId,
        refundedBidder,
        refund: formatAmount(refund),
      }, { correlationId });
      return { refundedBidder, refund };
    });
  }

  // ─── Governed Parameters ─────────────────────────────────────────────

  setDuration(seconds: number, caller: Address): void {
    this.requireAuthority(caller);
    validateDuration(seconds);
    this.update("duration", seconds, caller);
  }

  setRoyaltyPercentage(percentage: number, caller: Address): void {
    this.requireAuthority(caller);
    validateRoyalty(percentage);
    this.update("royaltyPercentage", percentage, caller);
  }

  setMaxExtensions(count: number, caller: Address): void {
    this.requireAuthority(caller);
    validateCount("maxExtensions", count);
    this.update("maxExtensions", count, caller);
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getParameters(): AuctionParameters {
    return this.params;
  }

  getAuction(assetId: AssetId): AuctionRecord | undefined {
    const auction = this.auctions.get(assetId);
    return auction === undefined ? undefined : view(assetId, auction);
  }

  listAuctions(options?: { activeOnly?: boolean }): readonly AuctionRecord[] {
    const all = [...this.auctions.entries()].map(([assetId, auction]) => view(assetId, auction));
    return options?.activeOnly === true ? all.filter((a) => a.isActive) : all;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private shouldExtend(auction: MutableAuction, now: number): boolean {
    if (auction.endTime - now > this.params.antiSnipeWindow) {
      return false;
    }
    return this.params.maxExtensions === 0 || auction.extensions < this.params.maxExtensions;
  }

  private update(parameter: GovernedParameter, value: number, caller: Address): void {
    const previous = this.params[parameter];
    const next: { -readonly [K in keyof AuctionParameters]: AuctionParameters[K] } = { ...this.params };
    next[parameter] = value;
    this.params = next;
    this.events.record(PARAMETER_STREAM, FRACTA_EVENTS.AUCTION_PARAMETER_UPDATED, caller, {
      parameter,
      previous,
      value,
    });
  }

  private requireActive(assetId: AssetId): MutableAuction {
    const auction = this.auctions.get(assetId);
    if (auction === undefined || !auction.isActive) {
      throw new AuctionError("PRECONDITION_FAILED", "AUCTION_NOT_ACTIVE", `No active auction for ${assetId}`);
    }
    return auction;
  }

  private requireAuthority(caller: Address): void {
    const authority = this.custody.authority();
    if (authority.state === "unset") {
      throw new AuctionError("UNAUTHORIZED", "AUTHORITY_UNSET", "No governance authority has been set");
    }
    if (!slotHolds(authority, caller)) {
      throw new AuctionError("UNAUTHORIZED", "NOT_AUTHORITY", `${caller} is not the governance authority`);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function view(assetId: AssetId, auction: MutableAuction): AuctionRecord {
  return { assetId, ...auction };
}

function validateDuration(seconds: number): void {
  if (!Number.isSafeInteger(seconds) || seconds <= 0) {
    throw new AuctionError("INVALID_ARGUMENT", "INVALID_PARAMETER", `Duration must be a positive integer, got ${seconds}`);
  }
}

function validateRoyalty(percentage: number): void {
  if (!Number.isInteger(percentage) || percentage < 0 || percentage > 100) {
    throw new AuctionError(
      "INVALID_ARGUMENT",
      "INVALID_PARAMETER",
      `Royalty percentage must be an integer in [0, 100], got ${percentage}`,
    );
  }
}

function validateCount(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new AuctionError("INVALID_ARGUMENT", "INVALID_PARAMETER", `${name} must be a non-negative integer, got ${value}`);
  }
}
