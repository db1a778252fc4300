/**
 * GovernanceController — claim-weighted proposals.
 *
 *   create ─► vote (inside [votingStart, votingEnd]) ─► execute (after votingEnd)
 *
 * Execution does not apply the action: it checks quorum and majority
 * and schedules the action in the timelock. The `executed` flag never
 * resets.
 *
 * Voting weight is the voter's claim balance at the time of the vote.
 * Each address votes at most once per proposal.
 */

import type { Address, Amount, Clock, ProposalId } from "@fracta/types";
import type { EventRecorder } from "@fracta/event-store";
import { FRACTA_EVENTS } from "@fracta/event-store";
import type { ClaimBalances } from "@fracta/ledger";
import { formatAmount, mulDiv } from "@fracta/ledger";
import { decodeAction } from "./actions.js";
import { hasMajority, meetsQuorum, projectStatus, quorumFor } from "./status.js";
import type { Timelock } from "./timelock.js";
import type { GovernanceParameters, Proposal, ProposalStatus } from "./types.js";
import { DEFAULT_GOVERNANCE_PARAMETERS, GovernanceError } from "./types.js";

export interface GovernanceControllerOptions {
  readonly address: Address;
  readonly claims: ClaimBalances;
  readonly timelock: Pick<Timelock, "schedule" | "hasTarget">;
  readonly clock: Clock;
  readonly events: EventRecorder;
  readonly parameters?: Partial<GovernanceParameters>;
}

interface ProposalState {
  proposal: Proposal;
  readonly voters: Set<Address>;
}

function streamOf(proposalId: ProposalId): string {
  return `proposal:${proposalId}`;
}

function validatePercentage(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 100) {
    throw new GovernanceError("INVALID_ARGUMENT", "INVALID_PARAMETER", `${name} must be an integer in [0, 100], got ${value}`);
  }
}

export class GovernanceController {
  readonly address: Address;
  readonly parameters: GovernanceParameters;

  private readonly claims: ClaimBalances;
  private readonly timelock: Pick<Timelock, "schedule" | "hasTarget">;
  private readonly clock: Clock;
  private readonly events: EventRecorder;
  private readonly proposals = new Map<ProposalId, ProposalState>();
  private nextId = 1;

  constructor(options: GovernanceControllerOptions) {
    const parameters = { ...DEFAULT_GOVERNANCE_PARAMETERS, ...options.parameters };
    validatePercentage("proposalThresholdPercentage", parameters.proposalThresholdPercentage);
    validatePercentage("quorumPercentage", parameters.quorumPercentage);
    if (!Number.isSafeInteger(parameters.votingPeriod) || parameters.votingPeriod <= 0) {
      throw new GovernanceError(
        "INVALID_ARGUMENT",
        "INVALID_PARAMETER",
        `votingPeriod must be a positive integer, got ${parameters.votingPeriod}`,
      );
    }

    this.address = options.address;
    this.parameters = parameters;
    this.claims = options.claims;
    this.timelock = options.timelock;
    this.clock = options.clock;
    this.events = options.events;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Create
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Open a proposal to apply `calldata` to `target`.
   *
   * The proposer must hold at least the threshold share of the current
   * claim supply. The supply is snapshotted for the quorum check.
   */
  createProposal(description: string, target: Address, calldata: string, caller: Address): Proposal {
    if (description.trim().length === 0) {
      throw new GovernanceError("INVALID_ARGUMENT", "EMPTY_DESCRIPTION", "Proposal description is empty");
    }
    if (!this.timelock.hasTarget(target)) {
      throw new GovernanceError("NOT_FOUND", "UNKNOWN_TARGET", `Unknown proposal target ${target}`);
    }
    decodeAction(calldata);

    const supply = this.claims.totalSupply();
    if (supply === 0n) {
      throw new GovernanceError("SUPPLY_ZERO", "SUPPLY_ZERO", "No claims are outstanding");
    }
    const balance = this.claims.balanceOf(caller);
    const threshold = mulDiv(supply, BigInt(this.parameters.proposalThresholdPercentage), 100n);
    if (balance === 0n || balance < threshold) {
      throw new GovernanceError(
        "INSUFFICIENT_CLAIMS",
        "BELOW_PROPOSAL_THRESHOLD",
        `Proposing needs ${formatAmount(threshold)} claims; ${caller} holds ${formatAmount(balance)}`,
      );
    }

    const now = this.clock.now();
    const proposal: Proposal = {
      id: String(this.nextId),
      proposer: caller,
      description,
      target,
      calldata,
      votingStart: now,
      votingEnd: now + this.parameters.votingPeriod,
      supplySnapshot: supply,
      votesFor: 0n,
      votesAgainst: 0n,
      totalVotes: 0n,
      executed: false,
      operationId: null,
    };
    this.nextId += 1;
    this.proposals.set(proposal.id, { proposal, voters: new Set() });

    this.events.record(streamOf(proposal.id), FRACTA_EVENTS.PROPOSAL_CREATED, caller, {
      proposalId: proposal.id,
      proposer: caller,
      description,
      target,
      calldata,
      votingStart: proposal.votingStart,
      votingEnd: proposal.votingEnd,
      supplySnapshot: formatAmount(supply),
    });
    return proposal;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Vote
  // ───────────────────────────────────────────────────────────────────────

  vote(proposalId: ProposalId, support: boolean, caller: Address): Proposal {
    const state = this.requireProposal(proposalId);
    const { proposal } = state;
    const now = this.clock.now();

    if (now < proposal.votingStart) {
      throw new GovernanceError("PRECONDITION_FAILED", "VOTING_NOT_STARTED", `Voting on ${proposalId} has not started`);
    }
    if (now > proposal.votingEnd) {
      throw new GovernanceError("PRECONDITION_FAILED", "VOTING_CLOSED", `Voting on ${proposalId} closed at ${proposal.votingEnd}`);
    }
    if (state.voters.has(caller)) {
      throw new GovernanceError("PRECONDITION_FAILED", "ALREADY_VOTED", `${caller} already voted on ${proposalId}`);
    }
    const weight = this.claims.balanceOf(caller);
    if (weight === 0n) {
      throw new GovernanceError("INSUFFICIENT_CLAIMS", "NO_VOTING_POWER", `${caller} holds no claims`);
    }

    state.voters.add(caller);
    state.proposal = {
      ...proposal,
      votesFor: support ? proposal.votesFor + weight : proposal.votesFor,
      votesAgainst: support ? proposal.votesAgainst : proposal.votesAgainst + weight,
      totalVotes: proposal.totalVotes + weight,
    };

    this.events.record(streamOf(proposalId), FRACTA_EVENTS.VOTE_CAST, caller, {
      proposalId,
      voter: caller,
      support,
      weight: formatAmount(weight),
    });
    return state.proposal;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Execute
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Schedule a passed proposal's action in the timelock. Anyone may call
   * once voting has ended.
   */
  executeProposal(proposalId: ProposalId, caller: Address): Proposal {
    const state = this.requireProposal(proposalId);
    const { proposal } = state;

    if (this.clock.now() <= proposal.votingEnd) {
      throw new GovernanceError("PRECONDITION_FAILED", "VOTING_NOT_ENDED", `Voting on ${proposalId} is still open`);
    }
    if (proposal.executed) {
      throw new GovernanceError("PRECONDITION_FAILED", "ALREADY_EXECUTED", `Proposal ${proposalId} was already executed`);
    }
    if (!meetsQuorum(proposal, this.parameters.quorumPercentage)) {
      throw new GovernanceError(
        "PRECONDITION_FAILED",
        "QUORUM_NOT_MET",
        `Proposal ${proposalId} has ${formatAmount(proposal.totalVotes)} votes; quorum is ${formatAmount(
          quorumFor(proposal.supplySnapshot, this.parameters.quorumPercentage),
        )}`,
      );
    }
    if (!hasMajority(proposal)) {
      throw new GovernanceError("PRECONDITION_FAILED", "MAJORITY_NOT_REACHED", `Proposal ${proposalId} did not pass`);
    }

    const operation = this.timelock.schedule(proposal.id, proposal.target, proposal.calldata, this.address);
    state.proposal = { ...proposal, executed: true, operationId: operation.operationId };

    this.events.record(streamOf(proposalId), FRACTA_EVENTS.PROPOSAL_EXECUTED, caller, {
      proposalId,
      operationId: operation.operationId,
      eta: operation.eta,
    });
    return state.proposal;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getStatus(proposalId: ProposalId): ProposalStatus {
    return projectStatus(this.requireProposal(proposalId).proposal, this.clock.now(), this.parameters.quorumPercentage);
  }

  getProposal(proposalId: ProposalId): Proposal | undefined {
    return this.proposals.get(proposalId)?.proposal;
  }

  listProposals(): readonly Proposal[] {
    return [...this.proposals.values()].map((s) => s.proposal);
  }

  hasVoted(proposalId: ProposalId, voter: Address): boolean {
    return this.proposals.get(proposalId)?.voters.has(voter) === true;
  }

  /** Claims a proposer currently needs. */
  proposalThreshold(): Amount {
    return mulDiv(this.claims.totalSupply(), BigInt(this.parameters.proposalThresholdPercentage), 100n);
  }

  private requireProposal(proposalId: ProposalId): ProposalState {
    const state = this.proposals.get(proposalId);
    if (state === undefined) {
      throw new GovernanceError("NOT_FOUND", "UNKNOWN_PROPOSAL", `Proposal ${proposalId} does not exist`);
    }
    return state;
  }
}
