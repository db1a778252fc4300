/**
 * @fracta/ledger — Pull-payment escrow.
 *
 * Amounts owed to participants (outbid refunds, royalties, cancelled
 * auction refunds) accumulate here and are withdrawn only by the payee.
 *
 * Withdrawal zeroes the balance before value leaves, inside a busy
 * marker on the payee. A refused payment restores the balance.
 */

import type { Address, Amount } from "@fracta/types";
import type { EventRecorder, RecordOptions } from "@fracta/event-store";
import { FRACTA_EVENTS } from "@fracta/event-store";
import { formatAmount } from "./amount-math.js";
import { BusyGuard, resourceKey } from "./busy-guard.js";
import type { PendingPayment, ValueRail } from "./types.js";
import { LedgerError } from "./types.js";

/** Why an amount became owed. */
export type CreditReason = "outbid" | "royalty" | "auction-cancelled";

export interface PendingPaymentDeps {
  readonly rail: ValueRail;
  readonly events: EventRecorder;
  readonly guard: BusyGuard;
}

function streamOf(payee: Address): string {
  return `payments:${payee}`;
}

export class PendingPaymentLedger {
  private readonly owedBy = new Map<Address, Amount>();
  private readonly rail: ValueRail;
  private readonly events: EventRecorder;
  private readonly guard: BusyGuard;

  constructor(deps: PendingPaymentDeps) {
    this.rail = deps.rail;
    this.events = deps.events;
    this.guard = deps.guard;
  }

  /**
   * Add `amount` to what `payee` may withdraw.
   *
   * Never fails for a valid amount; a zero credit is a no-op.
   */
  credit(payee: Address, amount: Amount, reason: CreditReason, actor: Address, options?: RecordOptions): void {
    if (amount < 0n) {
      throw new LedgerError("INVALID_ARGUMENT", "NON_POSITIVE_AMOUNT", `Cannot credit ${amount.toString()}`);
    }
    if (amount === 0n) {
      return;
    }
    this.owedBy.set(payee, this.owed(payee) + amount);
    this.events.record(streamOf(payee), FRACTA_EVENTS.PAYMENT_CREDITED, actor, {
      payee,
      amount: formatAmount(amount),
      reason,
    }, options);
  }

  /**
   * Pay the caller everything owed to them.
   *
   * @returns the amount paid
   */
  withdraw(caller: Address): Amount {
    return this.guard.run(resourceKey.payee(caller), () => {
      const owed = this.owed(caller);
      if (owed === 0n) {
        throw new LedgerError("NO_FUNDS", "NOTHING_OWED", `Nothing is owed to ${caller}`);
      }

      this.owedBy.delete(caller);
      try {
        this.rail.send(caller, owed);
      } catch (err) {
        this.owedBy.set(caller, this.owed(caller) + owed);
        if (err instanceof LedgerError && err.code === "TRANSFER_FAILED") {
          throw err;
        }
        throw new LedgerError("TRANSFER_FAILED", "RECIPIENT_REJECTED", `Payment to ${caller} failed`, { cause: err });
      }

      this.events.record(streamOf(caller), FRACTA_EVENTS.PAYMENT_WITHDRAWN, caller, {
        payee: caller,
        amount: formatAmount(owed),
      });
      return owed;
    });
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  owed(payee: Address): Amount {
    return this.owedBy.get(payee) ?? 0n;
  }

  totalOutstanding(): Amount {
    let total = 0n;
    for (const amount of this.owedBy.values()) {
      total += amount;
    }
    return total;
  }

  payees(): readonly PendingPayment[] {
    return [...this.owedBy.entries()].map(([payee, owed]) => ({ payee, owed }));
  }
}
