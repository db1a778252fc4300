/**
 * @fracta/governance — Proposal status projection.
 */

import type { Amount, Timestamp } from "@fracta/types";
import type { Proposal, ProposalStatus } from "./types.js";

/** Votes required for a snapshot: `quorumPercentage * snapshot / 100`, truncated. */
export function quorumFor(supplySnapshot: Amount, quorumPercentage: number): Amount {
  return (BigInt(quorumPercentage) * supplySnapshot) / 100n;
}

export function meetsQuorum(proposal: Proposal, quorumPercentage: number): boolean {
  return proposal.totalVotes >= quorumFor(proposal.supplySnapshot, quorumPercentage);
}

export function hasMajority(proposal: Proposal): boolean {
  return proposal.votesFor > proposal.votesAgainst;
}

/**
 * Project a proposal into its lifecycle status at `now`.
 *
 * - Approved: executed (scheduled in the timelock)
 * - Pending: before the voting window
 * - Active: inside the voting window
 * - Voting Ended: window closed, quorum and majority met, not yet executed
 * - Rejected: window closed without quorum or majority
 */
export function projectStatus(proposal: Proposal, now: Timestamp, quorumPercentage: number): ProposalStatus {
  if (proposal.executed) {
    return "Approved";
  }
  if (now < proposal.votingStart) {
    return "Pending";
  }
  if (now <= proposal.votingEnd) {
    return "Active";
  }
  return meetsQuorum(proposal, quorumPercentage) && hasMajority(proposal) ? "Voting Ended" : "Rejected";
}
