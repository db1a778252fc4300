/**
 * @fracta/governance — Proposals, quorum and timelocked execution.
 *
 * Provides:
 * - GovernanceController: create / vote / execute / status
 * - Timelock: delayed application of approved actions
 * - GovernanceAction: zod-validated, canonically encoded calldata
 *
 * @packageDocumentation
 */

export type {
  GovernanceFailureReason,
  GovernanceParameters,
  ProposalStatus,
  Proposal,
  OperationState,
  TimelockOperation,
} from "./types.js";
export { GovernanceError, DEFAULT_GOVERNANCE_PARAMETERS, DEFAULT_TIMELOCK_DELAY } from "./types.js";

export { GovernanceActionSchema, encodeAction, decodeAction, auctionExecutor } from "./actions.js";
export type { GovernanceAction, ActionExecutor, AuctionControls } from "./actions.js";

export { projectStatus, quorumFor, meetsQuorum, hasMajority } from "./status.js";

export { Timelock, computeOperationId } from "./timelock.js";
export type { TimelockOptions } from "./timelock.js";

export { GovernanceController } from "./controller.js";
export type { GovernanceControllerOptions } from "./controller.js";
