import { describe, it, expect } from "vitest";
import { InMemoryValueRail } from "../src/value-rail.js";
import { LedgerError } from "../src/types.js";

describe("InMemoryValueRail", () => {
  it("funds accounts", () => {
    const rail = new InMemoryValueRail();
    expect(rail.fund("alice", 100n)).toBe(100n);
    expect(rail.fund("alice", 50n)).toBe(150n);
    expect(rail.balanceOf("alice")).toBe(150n);
    expect(rail.balanceOf("nobody")).toBe(0n);
  });

  it("collects into escrow", () => {
    const rail = new InMemoryValueRail();
    rail.fund("alice", 100n);
    rail.collect("alice", 60n);
    expect(rail.balanceOf("alice")).toBe(40n);
    expect(rail.escrowBalance()).toBe(60n);
  });

  it("refuses to collect more than the balance", () => {
    const rail = new InMemoryValueRail();
    rail.fund("alice", 10n);
    try {
      rail.collect("alice", 11n);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(LedgerError);
      if (err instanceof LedgerError) {
        expect(err.code).toBe("INSUFFICIENT_FUNDS");
      }
    }
    expect(rail.balanceOf("alice")).toBe(10n);
    expect(rail.escrowBalance()).toBe(0n);
  });

  it("sends out of escrow", () => {
    const rail = new InMemoryValueRail();
    rail.fund("alice", 100n);
    rail.collect("alice", 100n);
    rail.send("bob", 30n);
    expect(rail.balanceOf("bob")).toBe(30n);
    expect(rail.escrowBalance()).toBe(70n);
  });

  it("refuses to send more than escrow holds", () => {
    const rail = new InMemoryValueRail();
    expect(() => rail.send("bob", 1n)).toThrow(/Escrow holds 0/);
  });

  it("reverts a payment the recipient refuses", () => {
    const rail = new InMemoryValueRail();
    rail.fund("alice", 100n);
    rail.collect("alice", 100n);
    rail.onReceive("bob", () => {
      throw new Error("no thanks");
    });

    try {
      rail.send("bob", 40n);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(LedgerError);
      if (err instanceof LedgerError) {
        expect(err.code).toBe("TRANSFER_FAILED");
        expect(err.reason).toBe("RECIPIENT_REJECTED");
        expect(err.cause).toBeInstanceOf(Error);
      }
    }
    expect(rail.balanceOf("bob")).toBe(0n);
    expect(rail.escrowBalance()).toBe(100n);
  });

  it("runs the hook with the received amount and can be removed", () => {
    const rail = new InMemoryValueRail();
    rail.fund("alice", 100n);
    rail.collect("alice", 100n);
    const received: bigint[] = [];
    const off = rail.onReceive("bob", (amount) => {
      received.push(amount);
    });
    rail.send("bob", 10n);
    off();
    rail.send("bob", 20n);
    expect(received).toEqual([10n]);
    expect(rail.balanceOf("bob")).toBe(30n);
  });
});
