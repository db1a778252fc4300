/**
 * @fracta/ledger — Fungible claim ledger.
 *
 * One fungible unit type. Holders move units freely between themselves;
 * only the authority (the custody vault, set once by the admin) may
 * create or destroy units.
 */

import type { Address, Amount, OneTimeSlot } from "@fracta/types";
import { UNSET, isSlotSet, slotHolds, slotOf } from "@fracta/types";
import type { EventRecorder } from "@fracta/event-store";
import { FRACTA_EVENTS } from "@fracta/event-store";
import { formatAmount, requirePositive } from "./amount-math.js";
import type { ClaimLedger, HolderBalance } from "./types.js";
import { LedgerError } from "./types.js";

const STREAM = "claims";

export class FractionLedger implements ClaimLedger {
  private readonly balances = new Map<Address, Amount>();
  private supply: Amount = 0n;
  private authoritySlot: OneTimeSlot<Address> = UNSET;

  constructor(
    private readonly admin: Address,
    private readonly events: EventRecorder,
  ) {}

  // ─── Authority ───────────────────────────────────────────────────────

  /**
   * Designate the sole minter/burner. Admin only, exactly once.
   */
  setAuthority(authority: Address, caller: Address): void {
    if (caller !== this.admin) {
      throw new LedgerError("UNAUTHORIZED", "NOT_ADMIN", `${caller} is not the claim ledger admin`);
    }
    if (isSlotSet(this.authoritySlot)) {
      throw new LedgerError(
        "ALREADY_SET",
        "AUTHORITY_ALREADY_SET",
        `Claim authority is already ${this.authoritySlot.value}`,
      );
    }
    this.authoritySlot = slotOf(authority);
    this.events.record(STREAM, FRACTA_EVENTS.CLAIMS_AUTHORITY_SET, caller, { authority });
  }

  authority(): OneTimeSlot<Address> {
    return this.authoritySlot;
  }

  // ─── Supply Changes ──────────────────────────────────────────────────

  mint(to: Address, amount: Amount, caller: Address): void {
    this.requireAuthority(caller);
    requirePositive(amount, "Minted amount");

    this.balances.set(to, this.balanceOf(to) + amount);
    this.supply += amount;
    this.events.record(STREAM, FRACTA_EVENTS.CLAIMS_MINTED, caller, {
      to,
      amount: formatAmount(amount),
    });
  }

  burnFrom(holder: Address, amount: Amount, caller: Address): void {
    this.requireAuthority(caller);
    requirePositive(amount, "Burned amount");
    const balance = this.requireBalance(holder, amount);

    this.setBalance(holder, balance - amount);
    this.supply -= amount;
    this.events.record(STREAM, FRACTA_EVENTS.CLAIMS_BURNED, caller, {
      from: holder,
      amount: formatAmount(amount),
    });
  }

  // ─── Holder Operations ───────────────────────────────────────────────

  /**
   * Move units from the caller to `to`.
   */
  transfer(from: Address, to: Address, amount: Amount): void {
    requirePositive(amount, "Transferred amount");
    if (from === to) {
      throw new LedgerError("INVALID_ARGUMENT", "SELF_TRANSFER", "Cannot transfer claims to yourself");
    }
    const balance = this.requireBalance(from, amount);

    this.setBalance(from, balance - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    this.events.record(STREAM, FRACTA_EVENTS.CLAIMS_TRANSFERRED, from, {
      from,
      to,
      amount: formatAmount(amount),
    });
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  balanceOf(holder: Address): Amount {
    return this.balances.get(holder) ?? 0n;
  }

  totalSupply(): Amount {
    return this.supply;
  }

  /** Every holder with a non-zero balance, largest first. */
  holders(): readonly HolderBalance[] {
    return [...this.balances.entries()]
      .map(([holder, balance]) => ({ holder, balance }))
      .sort((a, b) => (a.balance === b.balance ? a.holder.localeCompare(b.holder) : a.balance > b.balance ? -1 : 1));
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private requireAuthority(caller: Address): void {
    if (this.authoritySlot.state === "unset") {
      throw new LedgerError("UNAUTHORIZED", "AUTHORITY_UNSET", "No claim authority has been set");
    }
    if (!slotHolds(this.authoritySlot, caller)) {
      throw new LedgerError("UNAUTHORIZED", "NOT_AUTHORITY", `${caller} may not mint or burn claims`);
    }
  }

  private requireBalance(holder: Address, amount: Amount): Amount {
    const balance = this.balanceOf(holder);
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_CLAIMS",
        "BALANCE_TOO_LOW",
        `${holder} holds ${formatAmount(balance)} claims, needs ${formatAmount(amount)}`,
      );
    }
    return balance;
  }

  private setBalance(holder: Address, balance: Amount): void {
    if (balance === 0n) {
      this.balances.delete(holder);
    } else {
      this.balances.set(holder, balance);
    }
  }
}
