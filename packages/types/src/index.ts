/**
 * @fracta/types — Shared domain types for the Fracta stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Amounts are bigint; identifiers are strings
 */

// Primitives
export type {
  Address,
  AssetId,
  ProposalId,
  Amount,
  Timestamp,
  OneTimeSlot,
} from "./primitives.js";
export { UNSET, slotOf, isSlotSet, slotHolds } from "./primitives.js";

// Clock
export type { Clock } from "./clock.js";
export { SystemClock, ManualClock, isoAt } from "./clock.js";

// Failures
export type { FailureCode, DomainFailure } from "./failure.js";
export { FAILURE_RETRYABLE, isRetryableFailure } from "./failure.js";

// Events
export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// Runtime type guards
export {
  isRecord,
  isAddress,
  isAssetId,
  isAmountString,
  isEventSource,
  isFailureCode,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
