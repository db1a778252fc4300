/**
 * @fracta/event-store — Domain Event Definitions.
 *
 * The catalog of every event the engine appends to its observable log.
 *
 * Naming convention: `<component>.<entity>.<action>`
 *
 * Amounts are base-10 strings; timestamps in payloads are unix seconds.
 */

import { isRecord } from "@fracta/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Custody Events
// =============================================================================

export interface AssetDepositedPayload {
  readonly assetId: string;
  readonly depositor: string;
  readonly minted: string;
}

export interface AssetWithdrawnPayload {
  readonly assetId: string;
  readonly holder: string;
  readonly burned: string;
}

export interface ProceedsRedeemedPayload {
  readonly assetId: string;
  readonly holder: string;
  readonly fractionAmount: string;
  readonly payout: string;
  readonly remainingProceeds: string;
}

export interface ProceedsRecordedPayload {
  readonly assetId: string;
  readonly amount: string;
  readonly totalProceeds: string;
}

export interface AuthoritySetPayload {
  readonly authority: string;
}

// =============================================================================
// Auction Events
// =============================================================================

export interface AuctionStartedPayload {
  readonly assetId: string;
  readonly startingPrice: string;
  readonly duration: number;
  readonly endTime: number;
}

export interface BidPlacedPayload {
  readonly assetId: string;
  readonly bidder: string;
  readonly amount: string;
  readonly endTime: number;
  readonly extended: boolean;
}

export interface AuctionEndedPayload {
  readonly assetId: string;
  readonly winner: string;
  readonly amount: string;
  readonly royalty: string;
  readonly royaltyRecipient: string;
}

export interface AuctionCancelledPayload {
  readonly assetId: string;
  readonly refundedBidder: string | null;
  readonly refund: string;
}

export interface AuctionParameterUpdatedPayload {
  readonly parameter: string;
  readonly previous: number;
  readonly value: number;
}

// =============================================================================
// Payment Events
// =============================================================================

export interface PaymentCreditedPayload {
  readonly payee: string;
  readonly amount: string;
  readonly reason: string;
}

export interface PaymentWithdrawnPayload {
  readonly payee: string;
  readonly amount: string;
}

// =============================================================================
// Governance Events
// =============================================================================

export interface ProposalCreatedPayload {
  readonly proposalId: string;
  readonly proposer: string;
  readonly description: string;
  readonly target: string;
  readonly calldata: string;
  readonly votingStart: number;
  readonly votingEnd: number;
  readonly supplySnapshot: string;
}

export interface VoteCastPayload {
  readonly proposalId: string;
  readonly voter: string;
  readonly support: boolean;
  readonly weight: string;
}

export interface ProposalExecutedPayload {
  readonly proposalId: string;
  readonly operationId: string;
  readonly eta: number;
}

export interface OperationPayload {
  readonly operationId: string;
  readonly proposalId?: string;
  readonly target?: string;
  readonly calldata?: string;
  readonly eta?: number;
}

// =============================================================================
// Event Type Constants
// =============================================================================

export const FRACTA_EVENTS = {
  // Custody
  ASSET_DEPOSITED: "custody.asset.deposited",
  ASSET_WITHDRAWN: "custody.asset.withdrawn",
  PROCEEDS_REDEEMED: "custody.proceeds.redeemed",
  PROCEEDS_RECORDED: "custody.proceeds.recorded",
  CUSTODY_AUTHORITY_SET: "custody.authority.set",

  // Auction
  AUCTION_STARTED: "auction.auction.started",
  BID_PLACED: "auction.bid.placed",
  AUCTION_ENDED: "auction.auction.ended",
  AUCTION_CANCELLED: "auction.auction.cancelled",
  AUCTION_PARAMETER_UPDATED: "auction.parameter.updated",

  // Payments
  PAYMENT_CREDITED: "payments.payment.credited",
  PAYMENT_WITHDRAWN: "payments.payment.withdrawn",

  // Claims
  CLAIMS_MINTED: "claims.claims.minted",
  CLAIMS_BURNED: "claims.claims.burned",
  CLAIMS_TRANSFERRED: "claims.claims.transferred",
  CLAIMS_AUTHORITY_SET: "claims.authority.set",

  // Governance
  PROPOSAL_CREATED: "governance.proposal.created",
  VOTE_CAST: "governance.vote.cast",
  PROPOSAL_EXECUTED: "governance.proposal.executed",

  // Timelock
  OPERATION_SCHEDULED: "timelock.operation.scheduled",
  OPERATION_EXECUTED: "timelock.operation.executed",
  OPERATION_CANCELLED: "timelock.operation.cancelled",
} as const;

export type FractaEventType = (typeof FRACTA_EVENTS)[keyof typeof FRACTA_EVENTS];

// =============================================================================
// Schema Definitions
// =============================================================================

function hasStrings(p: unknown, ...keys: readonly string[]): boolean {
  return isRecord(p) && keys.every((k) => typeof p[k] === "string");
}

function hasNumbers(p: unknown, ...keys: readonly string[]): boolean {
  return isRecord(p) && keys.every((k) => typeof p[k] === "number");
}

function schema(
  type: FractaEventType,
  source: EventSchema["source"],
  description: string,
  validate: (p: unknown) => boolean,
): EventSchema {
  return { type, version: 1, description, source, validate };
}

const SCHEMAS: readonly EventSchema[] = [
  schema(FRACTA_EVENTS.ASSET_DEPOSITED, "custody", "An asset entered custody and claims were minted",
    (p) => hasStrings(p, "assetId", "depositor", "minted")),
  schema(FRACTA_EVENTS.ASSET_WITHDRAWN, "custody", "An asset left custody against a full claim set",
    (p) => hasStrings(p, "assetId", "holder", "burned")),
  schema(FRACTA_EVENTS.PROCEEDS_REDEEMED, "custody", "Claims were burned for a pro-rata share of sale proceeds",
    (p) => hasStrings(p, "assetId", "holder", "fractionAmount", "payout", "remainingProceeds")),
  schema(FRACTA_EVENTS.PROCEEDS_RECORDED, "custody", "An auction settled and its proceeds were booked",
    (p) => hasStrings(p, "assetId", "amount", "totalProceeds")),
  schema(FRACTA_EVENTS.CUSTODY_AUTHORITY_SET, "custody", "The governance authority was set",
    (p) => hasStrings(p, "authority")),

  schema(FRACTA_EVENTS.AUCTION_STARTED, "auction", "An auction opened for an asset in custody",
    (p) => hasStrings(p, "assetId", "startingPrice") && hasNumbers(p, "duration", "endTime")),
  schema(FRACTA_EVENTS.BID_PLACED, "auction", "A new highest bid was accepted",
    (p) => hasStrings(p, "assetId", "bidder", "amount") && hasNumbers(p, "endTime")),
  schema(FRACTA_EVENTS.AUCTION_ENDED, "auction", "An auction settled to its highest bidder",
    (p) => hasStrings(p, "assetId", "winner", "amount", "royalty", "royaltyRecipient")),
  schema(FRACTA_EVENTS.AUCTION_CANCELLED, "auction", "Governance cancelled an active auction",
    (p) => hasStrings(p, "assetId", "refund")),
  schema(FRACTA_EVENTS.AUCTION_PARAMETER_UPDATED, "auction", "Governance changed an auction parameter",
    (p) => hasStrings(p, "parameter") && hasNumbers(p, "previous", "value")),

  schema(FRACTA_EVENTS.PAYMENT_CREDITED, "payments", "An amount became withdrawable by a payee",
    (p) => hasStrings(p, "payee", "amount", "reason")),
  schema(FRACTA_EVENTS.PAYMENT_WITHDRAWN, "payments", "A payee pulled everything owed to them",
    (p) => hasStrings(p, "payee", "amount")),

  schema(FRACTA_EVENTS.CLAIMS_MINTED, "claims", "Claim units were created",
    (p) => hasStrings(p, "to", "amount")),
  schema(FRACTA_EVENTS.CLAIMS_BURNED, "claims", "Claim units were destroyed",
    (p) => hasStrings(p, "from", "amount")),
  schema(FRACTA_EVENTS.CLAIMS_TRANSFERRED, "claims", "Claim units moved between holders",
    (p) => hasStrings(p, "from", "to", "amount")),
  schema(FRACTA_EVENTS.CLAIMS_AUTHORITY_SET, "claims", "The sole minter/burner was set",
    (p) => hasStrings(p, "authority")),

  schema(FRACTA_EVENTS.PROPOSAL_CREATED, "governance", "A proposal opened for voting",
    (p) => hasStrings(p, "proposalId", "proposer", "target", "calldata", "supplySnapshot")
      && hasNumbers(p, "votingStart", "votingEnd")),
  schema(FRACTA_EVENTS.VOTE_CAST, "governance", "A holder voted on a proposal",
    (p) => hasStrings(p, "proposalId", "voter", "weight")
      && isRecord(p) && typeof p["support"] === "boolean"),
  schema(FRACTA_EVENTS.PROPOSAL_EXECUTED, "governance", "A passing proposal was queued in the timelock",
    (p) => hasStrings(p, "proposalId", "operationId") && hasNumbers(p, "eta")),

  schema(FRACTA_EVENTS.OPERATION_SCHEDULED, "timelock", "An action was queued for delayed application",
    (p) => hasStrings(p, "operationId", "proposalId", "target", "calldata") && hasNumbers(p, "eta")),
  schema(FRACTA_EVENTS.OPERATION_EXECUTED, "timelock", "A queued action was applied",
    (p) => hasStrings(p, "operationId")),
  schema(FRACTA_EVENTS.OPERATION_CANCELLED, "timelock", "A queued action was withdrawn by the guardian",
    (p) => hasStrings(p, "operationId")),
];

/**
 * Create an EventCatalog pre-loaded with every Fracta event type.
 */
export function createFractaCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const s of SCHEMAS) {
    catalog.register(s);
  }
  return catalog;
}
