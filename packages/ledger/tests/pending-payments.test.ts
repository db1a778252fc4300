/**
 * Tests for the pull-payment escrow.
 *
 * Covers:
 * - Crediting and querying
 * - Withdrawal zeroes before paying
 * - Refused payments restore the balance
 * - Reentrant withdrawal is rejected
 * - Escrow always covers what is owed (property)
 */

import { describe, it, expect, beforeEach } from "vitest";
import fc from "fast-check";
import { FRACTA_EVENTS } from "@fracta/event-store";
import type { InMemoryEventStore } from "@fracta/event-store";
import { BusyGuard } from "../src/busy-guard.js";
import { PendingPaymentLedger } from "../src/pending-payments.js";
import { LedgerError } from "../src/types.js";
import { InMemoryValueRail } from "../src/value-rail.js";
import { makeRecorders } from "./fixtures.js";

function setup() {
  const { store, recorder } = makeRecorders();
  const rail = new InMemoryValueRail();
  const payments = new PendingPaymentLedger({ rail, events: recorder("payments"), guard: new BusyGuard() });
  return { store, rail, payments };
}

/** Put `amount` into escrow and owe it to `payee`. */
function owe(rail: InMemoryValueRail, payments: PendingPaymentLedger, payee: string, amount: bigint): void {
  rail.fund("payer", amount);
  rail.collect("payer", amount);
  payments.credit(payee, amount, "outbid", "engine");
}

describe("PendingPaymentLedger", () => {
  let rail: InMemoryValueRail;
  let payments: PendingPaymentLedger;
  let store: InMemoryEventStore;

  beforeEach(() => {
    ({ rail, payments, store } = setup());
  });

  describe("credit", () => {
    it("accumulates per payee", () => {
      payments.credit("bob", 150n, "outbid", "engine");
      payments.credit("bob", 50n, "auction-cancelled", "engine");
      payments.credit("alice", 10n, "royalty", "engine");
      expect(payments.owed("bob")).toBe(200n);
      expect(payments.owed("alice")).toBe(10n);
      expect(payments.owed("carol")).toBe(0n);
      expect(payments.totalOutstanding()).toBe(210n);
    });

    it("treats a zero credit as a no-op", () => {
      payments.credit("bob", 0n, "royalty", "engine");
      expect(payments.payees()).toEqual([]);
      expect(store.readAll()).toHaveLength(0);
    });

    it("rejects negative credits", () => {
      expect(() => payments.credit("bob", -1n, "outbid", "engine")).toThrow(LedgerError);
    });

    it("records a credited event on the payee stream", () => {
      payments.credit("bob", 150n, "outbid", "engine");
      const [event] = store.read("payments:bob");
      expect(event?.event.type).toBe(FRACTA_EVENTS.PAYMENT_CREDITED);
      expect(event?.event.payload).toEqual({ payee: "bob", amount: "150", reason: "outbid" });
      expect(event?.event.metadata.actor).toBe("engine");
    });
  });

  describe("withdraw", () => {
    it("pays everything owed and zeroes the balance", () => {
      owe(rail, payments, "bob", 150n);
      expect(payments.withdraw("bob")).toBe(150n);
      expect(payments.owed("bob")).toBe(0n);
      expect(rail.balanceOf("bob")).toBe(150n);
      expect(rail.escrowBalance()).toBe(0n);
    });

    it("fails with NO_FUNDS when nothing is owed", () => {
      try {
        payments.withdraw("bob");
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(LedgerError);
        if (err instanceof LedgerError) {
          expect(err.code).toBe("NO_FUNDS");
        }
      }
    });

    it("fails with NO_FUNDS on a second withdrawal", () => {
      owe(rail, payments, "bob", 150n);
      payments.withdraw("bob");
      expect(() => payments.withdraw("bob")).toThrow(/Nothing is owed/);
    });

    it("restores the balance when the payee refuses", () => {
      owe(rail, payments, "bob", 150n);
      rail.onReceive("bob", () => {
        throw new Error("refused");
      });

      try {
        payments.withdraw("bob");
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(LedgerError);
        if (err instanceof LedgerError) {
          expect(err.code).toBe("TRANSFER_FAILED");
        }
      }
      expect(payments.owed("bob")).toBe(150n);
      expect(rail.escrowBalance()).toBe(150n);
      expect(store.read("payments:bob").map((e) => e.event.type)).toEqual([FRACTA_EVENTS.PAYMENT_CREDITED]);
    });

    it("sees a zero balance from inside the payout and rejects re-entry", () => {
      owe(rail, payments, "bob", 150n);
      const observed: { owed?: bigint; code?: string } = {};
      rail.onReceive("bob", () => {
        observed.owed = payments.owed("bob");
        try {
          payments.withdraw("bob");
        } catch (err) {
          if (err instanceof LedgerError) observed.code = err.code;
        }
      });

      expect(payments.withdraw("bob")).toBe(150n);
      expect(observed).toEqual({ owed: 0n, code: "REENTRANT_CALL" });
      expect(rail.balanceOf("bob")).toBe(150n);
      expect(payments.owed("bob")).toBe(0n);
    });

    it("lets another payee withdraw from inside a payout", () => {
      owe(rail, payments, "bob", 10n);
      owe(rail, payments, "carol", 20n);
      rail.onReceive("bob", () => {
        payments.withdraw("carol");
      });

      payments.withdraw("bob");
      expect(rail.balanceOf("bob")).toBe(10n);
      expect(rail.balanceOf("carol")).toBe(20n);
      expect(payments.totalOutstanding()).toBe(0n);
    });
  });

  describe("properties", () => {
    const arbOp = fc.oneof(
      fc.record({
        kind: fc.constant("credit" as const),
        payee: fc.constantFrom("alice", "bob", "carol"),
        amount: fc.bigInt({ min: 1n, max: 10_000n }),
      }),
      fc.record({
        kind: fc.constant("withdraw" as const),
        payee: fc.constantFrom("alice", "bob", "carol"),
      }),
    );

    it("escrow always equals what is owed, and nothing is created", () => {
      fc.assert(
        fc.property(fc.array(arbOp, { maxLength: 40 }), (ops) => {
          const { rail, payments } = setup();
          let credited = 0n;

          for (const op of ops) {
            if (op.kind === "credit") {
              owe(rail, payments, op.payee, op.amount);
              credited += op.amount;
            } else if (payments.owed(op.payee) > 0n) {
              payments.withdraw(op.payee);
            }

            expect(rail.escrowBalance()).toBe(payments.totalOutstanding());
          }

          const paidOut = ["alice", "bob", "carol"].reduce((sum, p) => sum + rail.balanceOf(p), 0n);
          expect(paidOut + payments.totalOutstanding()).toBe(credited);
        }),
      );
    });
  });
});
