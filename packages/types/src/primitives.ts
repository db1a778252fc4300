/**
 * Primitive Types
 *
 * Identifiers and amounts shared by every Fracta component.
 *
 * Rules:
 * - Amounts are bigint in the smallest indivisible unit; never floats
 * - Amounts cross process boundaries as base-10 strings
 * - Identifiers are opaque strings
 */

/** An account identity (depositor, bidder, voter, component address). */
export type Address = string;

/** Identifier of a unique, non-divisible asset held in custody. */
export type AssetId = string;

/** Identifier of a governance proposal. */
export type ProposalId = string;

/** A non-negative quantity in the smallest unit (value or claim units). */
export type Amount = bigint;

/** Unix time in whole seconds. */
export type Timestamp = number;

// =============================================================================
// One-time slot
// =============================================================================

/**
 * A value that starts unset and may be set exactly once.
 *
 * Used for authority pointers that must never be re-pointed once the
 * system is live.
 */
export type OneTimeSlot<T> =
  | { readonly state: "unset" }
  | { readonly state: "set"; readonly value: T };

export const UNSET: OneTimeSlot<never> = { state: "unset" };

export function slotOf<T>(value: T): OneTimeSlot<T> {
  return { state: "set", value };
}

export function isSlotSet<T>(
  slot: OneTimeSlot<T>,
): slot is { readonly state: "set"; readonly value: T } {
  return slot.state === "set";
}

/** Whether the slot holds exactly `candidate`. */
export function slotHolds<T>(slot: OneTimeSlot<T>, candidate: T): boolean {
  return slot.state === "set" && slot.value === candidate;
}
