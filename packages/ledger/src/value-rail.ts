/**
 * @fracta/ledger — In-memory native value rail.
 *
 * Holds per-account native balances and the engine's escrow. Accounts
 * may register a receive hook that runs on every incoming payment; a
 * hook that throws refuses the payment and the move is reverted.
 */

import type { Address, Amount } from "@fracta/types";
import { requirePositive } from "./amount-math.js";
import type { ReceiveHook, ValueRail } from "./types.js";
import { LedgerError } from "./types.js";

export class InMemoryValueRail implements ValueRail {
  private readonly balances = new Map<Address, Amount>();
  private readonly hooks = new Map<Address, ReceiveHook>();
  private escrow: Amount = 0n;

  /** Credit an account from outside the system. */
  fund(address: Address, amount: Amount): Amount {
    requirePositive(amount, "Funding amount");
    const next = this.balanceOf(address) + amount;
    this.balances.set(address, next);
    return next;
  }

  balanceOf(address: Address): Amount {
    return this.balances.get(address) ?? 0n;
  }

  escrowBalance(): Amount {
    return this.escrow;
  }

  /**
   * Register the hook that runs when `address` receives value.
   * @returns a function that removes the hook
   */
  onReceive(address: Address, hook: ReceiveHook): () => void {
    this.hooks.set(address, hook);
    return () => {
      if (this.hooks.get(address) === hook) {
        this.hooks.delete(address);
      }
    };
  }

  collect(from: Address, amount: Amount): void {
    requirePositive(amount, "Collected amount");
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_FUNDS",
        "BALANCE_TOO_LOW",
        `${from} holds ${balance.toString()}, cannot pay ${amount.toString()}`,
      );
    }
    this.balances.set(from, balance - amount);
    this.escrow += amount;
  }

  send(to: Address, amount: Amount): void {
    requirePositive(amount, "Sent amount");
    if (this.escrow < amount) {
      throw new LedgerError(
        "TRANSFER_FAILED",
        "ESCROW_SHORTFALL",
        `Escrow holds ${this.escrow.toString()}, cannot send ${amount.toString()} to ${to}`,
      );
    }

    const before = this.balanceOf(to);
    this.escrow -= amount;
    this.balances.set(to, before + amount);

    const hook = this.hooks.get(to);
    if (hook === undefined) {
      return;
    }
    try {
      hook(amount);
    } catch (err) {
      this.balances.set(to, this.balanceOf(to) - amount);
      this.escrow += amount;
      throw new LedgerError(
        "TRANSFER_FAILED",
        "RECIPIENT_REJECTED",
        `${to} refused a payment of ${amount.toString()}`,
        { cause: err },
      );
    }
  }
}
