/**
 * @fracta/ledger — Types and errors.
 *
 * Rules:
 * - All amounts are bigint in the smallest unit
 * - Fail-closed: invalid operations throw, never silently succeed
 * - A thrown error means no state changed
 */

import type { Address, Amount, FailureCode, OneTimeSlot } from "@fracta/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Specific reasons behind a ledger failure. */
export type LedgerFailureReason =
  | "NOT_ADMIN"
  | "NOT_AUTHORITY"
  | "AUTHORITY_ALREADY_SET"
  | "AUTHORITY_UNSET"
  | "BALANCE_TOO_LOW"
  | "NOTHING_OWED"
  | "RECIPIENT_REJECTED"
  | "ESCROW_SHORTFALL"
  | "RESOURCE_BUSY"
  | "NON_POSITIVE_AMOUNT"
  | "SELF_TRANSFER";

/**
 * Structured error from the ledger package.
 * Always thrown, never returned.
 */
export class LedgerError extends Error {
  public readonly code: FailureCode;
  public readonly reason: LedgerFailureReason;

  constructor(code: FailureCode, reason: LedgerFailureReason, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LedgerError";
    this.code = code;
    this.reason = reason;
  }
}

// ─── Claim Ledger Contract ───────────────────────────────────────────────

/**
 * The minimal contract the custody vault and governance consume from
 * the fungible claim ledger.
 */
export interface ClaimLedger {
  mint(to: Address, amount: Amount, caller: Address): void;
  burnFrom(holder: Address, amount: Amount, caller: Address): void;
  balanceOf(holder: Address): Amount;
  totalSupply(): Amount;
  authority(): OneTimeSlot<Address>;
}

/** Read-only view used by governance for voting weight. */
export type ClaimBalances = Pick<ClaimLedger, "balanceOf" | "totalSupply">;

// ─── Value Rail Contract ─────────────────────────────────────────────────

/**
 * Moves native value between accounts and the engine's escrow.
 *
 * Both operations are atomic: they either complete or throw with no
 * balance changed.
 */
export interface ValueRail {
  /** Move `amount` from `from` into escrow. */
  collect(from: Address, amount: Amount): void;

  /** Pay `amount` out of escrow to `to`. The recipient may refuse. */
  send(to: Address, amount: Amount): void;

  /** Value currently held in escrow. */
  escrowBalance(): Amount;
}

/**
 * Runs when an account receives value. Throwing refuses the payment.
 * A hook may call back into the engine.
 */
export type ReceiveHook = (amount: Amount) => void;

// ─── Snapshots ───────────────────────────────────────────────────────────

export interface HolderBalance {
  readonly holder: Address;
  readonly balance: Amount;
}

export interface PendingPayment {
  readonly payee: Address;
  readonly owed: Amount;
}
