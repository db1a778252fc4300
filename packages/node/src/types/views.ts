/**
 * Response views.
 *
 * Domain records carry bigint amounts; responses carry them as
 * base-10 strings, matching event payloads.
 */

import type { AssetRecord, RedeemResult } from "@fracta/custody";
import type { AuctionRecord, BidResult, CancellationResult, SettlementResult } from "@fracta/auction";
import type { Proposal, ProposalStatus, TimelockOperation } from "@fracta/governance";

export function assetView(record: AssetRecord) {
  return { ...record, saleProceeds: record.saleProceeds.toString() };
}

export function redeemView(result: RedeemResult) {
  return {
    payout: result.payout.toString(),
    remainingProceeds: result.remainingProceeds.toString(),
  };
}

export function auctionView(record: AuctionRecord) {
  return {
    ...record,
    startingPrice: record.startingPrice.toString(),
    highestBid: record.highestBid.toString(),
  };
}

export function bidView(result: BidResult) {
  return { ...result, highestBid: result.highestBid.toString() };
}

export function settlementView(result: SettlementResult) {
  return {
    ...result,
    amount: result.amount.toString(),
    royalty: result.royalty.toString(),
  };
}

export function cancellationView(result: CancellationResult) {
  return { ...result, refund: result.refund.toString() };
}

export function proposalView(proposal: Proposal, status: ProposalStatus) {
  return {
    ...proposal,
    status,
    supplySnapshot: proposal.supplySnapshot.toString(),
    votesFor: proposal.votesFor.toString(),
    votesAgainst: proposal.votesAgainst.toString(),
    totalVotes: proposal.totalVotes.toString(),
  };
}

export function operationView(operation: TimelockOperation, ready: boolean) {
  return { ...operation, ready };
}
