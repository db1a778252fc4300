/**
 * Timelock — delayed application of approved governance actions.
 *
 * The controller schedules; after the delay anyone may execute; the
 * guardian may cancel a pending operation. The timelock itself is the
 * caller the targets see, so it is the address the vault authority
 * must be set to.
 *
 * Operation IDs are SHA-256 over the canonical JSON of
 * `{ proposalId, target, calldata }`.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { Address, Clock, ProposalId } from "@fracta/types";
import type { EventRecorder } from "@fracta/event-store";
import { FRACTA_EVENTS } from "@fracta/event-store";
import type { ActionExecutor } from "./actions.js";
import { decodeAction } from "./actions.js";
import type { TimelockOperation } from "./types.js";
import { DEFAULT_TIMELOCK_DELAY, GovernanceError } from "./types.js";

export interface TimelockOptions {
  readonly address: Address;
  /** The only address allowed to schedule. */
  readonly controller: Address;
  /** The only address allowed to cancel. */
  readonly guardian: Address;
  readonly delay?: number;
  readonly clock: Clock;
  readonly events: EventRecorder;
}

export function computeOperationId(proposalId: ProposalId, target: Address, calldata: string): string {
  return createHash("sha256").update(canonicalize({ proposalId, target, calldata })).digest("hex");
}

function streamOf(operationId: string): string {
  return `operation:${operationId}`;
}

export class Timelock {
  readonly address: Address;
  readonly delay: number;

  private readonly controller: Address;
  private readonly guardian: Address;
  private readonly clock: Clock;
  private readonly events: EventRecorder;
  private readonly targets = new Map<Address, ActionExecutor>();
  private readonly operations = new Map<string, TimelockOperation>();

  constructor(options: TimelockOptions) {
    const delay = options.delay ?? DEFAULT_TIMELOCK_DELAY;
    if (!Number.isSafeInteger(delay) || delay < 0) {
      throw new GovernanceError("INVALID_ARGUMENT", "INVALID_PARAMETER", `Timelock delay must be a non-negative integer, got ${delay}`);
    }
    this.address = options.address;
    this.controller = options.controller;
    this.guardian = options.guardian;
    this.delay = delay;
    this.clock = options.clock;
    this.events = options.events;
  }

  /** Make `target` addressable by proposals. */
  registerTarget(target: Address, executor: ActionExecutor): void {
    this.targets.set(target, executor);
  }

  hasTarget(target: Address): boolean {
    return this.targets.has(target);
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────

  schedule(proposalId: ProposalId, target: Address, calldata: string, caller: Address): TimelockOperation {
    if (caller !== this.controller) {
      throw new GovernanceError("UNAUTHORIZED", "NOT_CONTROLLER", `${caller} may not schedule operations`);
    }
    if (!this.targets.has(target)) {
      throw new GovernanceError("NOT_FOUND", "UNKNOWN_TARGET", `No executor registered for ${target}`);
    }
    decodeAction(calldata);

    const operationId = computeOperationId(proposalId, target, calldata);
    if (this.operations.has(operationId)) {
      throw new GovernanceError("PRECONDITION_FAILED", "OPERATION_EXISTS", `Operation ${operationId} already exists`);
    }

    const operation: TimelockOperation = {
      operationId,
      proposalId,
      target,
      calldata,
      eta: this.clock.now() + this.delay,
      state: "pending",
    };
    this.operations.set(operationId, operation);
    this.events.record(streamOf(operationId), FRACTA_EVENTS.OPERATION_SCHEDULED, caller, {
      operationId,
      proposalId,
      target,
      calldata,
      eta: operation.eta,
    });
    return operation;
  }

  /**
   * Apply a pending operation whose delay has elapsed. Anyone may call.
   * If the target rejects the action, the operation stays pending.
   */
  execute(operationId: string, caller: Address): TimelockOperation {
    const operation = this.requirePending(operationId);
    if (this.clock.now() < operation.eta) {
      throw new GovernanceError(
        "PRECONDITION_FAILED",
        "OPERATION_NOT_READY",
        `Operation ${operationId} is not ready until ${operation.eta}`,
      );
    }
    const executor = this.targets.get(operation.target);
    if (executor === undefined) {
      throw new GovernanceError("NOT_FOUND", "UNKNOWN_TARGET", `No executor registered for ${operation.target}`);
    }

    executor(decodeAction(operation.calldata), this.address);

    const executed: TimelockOperation = { ...operation, state: "executed" };
    this.operations.set(operationId, executed);
    this.events.record(streamOf(operationId), FRACTA_EVENTS.OPERATION_EXECUTED, caller, { operationId });
    return executed;
  }

  cancel(operationId: string, caller: Address): TimelockOperation {
    if (caller !== this.guardian) {
      throw new GovernanceError("UNAUTHORIZED", "NOT_GUARDIAN", `${caller} may not cancel operations`);
    }
    const operation = this.requirePending(operationId);

    const cancelled: TimelockOperation = { ...operation, state: "cancelled" };
    this.operations.set(operationId, cancelled);
    this.events.record(streamOf(operationId), FRACTA_EVENTS.OPERATION_CANCELLED, caller, { operationId });
    return cancelled;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getOperation(operationId: string): TimelockOperation | undefined {
    return this.operations.get(operationId);
  }

  isOperationReady(operationId: string): boolean {
    const operation = this.operations.get(operationId);
    return operation !== undefined && operation.state === "pending" && this.clock.now() >= operation.eta;
  }

  private requirePending(operationId: string): TimelockOperation {
    const operation = this.operations.get(operationId);
    if (operation === undefined) {
      throw new GovernanceError("NOT_FOUND", "UNKNOWN_OPERATION", `Operation ${operationId} does not exist`);
    }
    if (operation.state !== "pending") {
      throw new GovernanceError(
        "PRECONDITION_FAILED",
        "OPERATION_NOT_PENDING",
        `Operation ${operationId} is already ${operation.state}`,
      );
    }
    return operation;
  }
}
