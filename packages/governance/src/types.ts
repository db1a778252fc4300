/**
 * @fracta/governance — Types and errors.
 */

import type { Address, Amount, FailureCode, ProposalId, Timestamp } from "@fracta/types";

// =============================================================================
// Errors
// =============================================================================

export type GovernanceFailureReason =
  | "EMPTY_DESCRIPTION"
  | "INVALID_CALLDATA"
  | "UNKNOWN_TARGET"
  | "SUPPLY_ZERO"
  | "BELOW_PROPOSAL_THRESHOLD"
  | "UNKNOWN_PROPOSAL"
  | "VOTING_NOT_STARTED"
  | "VOTING_CLOSED"
  | "ALREADY_VOTED"
  | "NO_VOTING_POWER"
  | "VOTING_NOT_ENDED"
  | "ALREADY_EXECUTED"
  | "QUORUM_NOT_MET"
  | "MAJORITY_NOT_REACHED"
  | "NOT_CONTROLLER"
  | "NOT_GUARDIAN"
  | "UNKNOWN_OPERATION"
  | "OPERATION_EXISTS"
  | "OPERATION_NOT_PENDING"
  | "OPERATION_NOT_READY"
  | "INVALID_PARAMETER";

export class GovernanceError extends Error {
  public readonly code: FailureCode;
  public readonly reason: GovernanceFailureReason;

  constructor(code: FailureCode, reason: GovernanceFailureReason, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GovernanceError";
    this.code = code;
    this.reason = reason;
  }
}

// =============================================================================
// Parameters
// =============================================================================

export interface GovernanceParameters {
  /** Share of claim supply a proposer must hold, 0-100. */
  readonly proposalThresholdPercentage: number;
  /** Share of the supply snapshot that must vote, 0-100. */
  readonly quorumPercentage: number;
  /** Voting window in seconds. */
  readonly votingPeriod: number;
}

export const DEFAULT_GOVERNANCE_PARAMETERS: GovernanceParameters = {
  proposalThresholdPercentage: 5,
  quorumPercentage: 10,
  votingPeriod: 3 * 24 * 60 * 60,
};

/** Delay between approval and application. */
export const DEFAULT_TIMELOCK_DELAY = 2 * 24 * 60 * 60;

// =============================================================================
// Proposals
// =============================================================================

export type ProposalStatus = "Pending" | "Active" | "Voting Ended" | "Approved" | "Rejected";

export interface Proposal {
  readonly id: ProposalId;
  readonly proposer: Address;
  readonly description: string;
  readonly target: Address;
  readonly calldata: string;
  readonly votingStart: Timestamp;
  readonly votingEnd: Timestamp;
  readonly supplySnapshot: Amount;
  readonly votesFor: Amount;
  readonly votesAgainst: Amount;
  readonly totalVotes: Amount;
  readonly executed: boolean;
  /** Timelock operation created on execution. */
  readonly operationId: string | null;
}

// =============================================================================
// Timelock
// =============================================================================

export type OperationState = "pending" | "executed" | "cancelled";

export interface TimelockOperation {
  readonly operationId: string;
  readonly proposalId: ProposalId;
  readonly target: Address;
  readonly calldata: string;
  readonly eta: Timestamp;
  readonly state: OperationState;
}
