/**
 * Property-based tests for the auction engine.
 *
 * 1. Monotonicity: highestBid strictly increases on every accepted bid
 *    and never moves on a rejected one
 * 2. Escrow covers the standing bid plus every outbid credit
 * 3. Anti-snipe: a bid extends by exactly one extension iff it lands
 *    inside the trailing window
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { LedgerError } from "@fracta/ledger";
import { AuctionError } from "../src/types.js";
import { OWNER, WEEK, depositAsset, makeMarket } from "./fixtures.js";

const BIDDERS = ["b1", "b2", "b3"] as const;

const arbBid = fc.record({
  bidder: fc.constantFrom(...BIDDERS),
  amount: fc.bigInt({ min: 1n, max: 2_000n }),
});

function openAuction() {
  const m = makeMarket();
  depositAsset(m, "7");
  for (const b of BIDDERS) m.rail.fund(b, 1_000_000n);
  m.engine.start("7", 100n, WEEK, OWNER);
  return m;
}

describe("auction properties", () => {
  it("highestBid strictly increases on accepted bids only", () => {
    fc.assert(
      fc.property(fc.array(arbBid, { maxLength: 40 }), (bids) => {
        const m = openAuction();

        for (const { bidder, amount } of bids) {
          const before = m.engine.getAuction("7")?.highestBid ?? 0n;
          let accepted = true;
          try {
            m.engine.bid("7", amount, bidder);
          } catch (err) {
            if (!(err instanceof AuctionError) && !(err instanceof LedgerError)) throw err;
            accepted = false;
          }
          const after = m.engine.getAuction("7")?.highestBid ?? 0n;

          expect(accepted).toBe(amount > before);
          expect(after).toBe(accepted ? amount : before);
        }
      }),
    );
  });

  it("escrow holds the standing bid plus everything owed", () => {
    fc.assert(
      fc.property(fc.array(arbBid, { maxLength: 40 }), (bids) => {
        const m = openAuction();

        for (const { bidder, amount } of bids) {
          try {
            m.engine.bid("7", amount, bidder);
          } catch (err) {
            if (!(err instanceof AuctionError)) throw err;
          }
          const auction = m.engine.getAuction("7");
          const standing = auction?.highestBidder === null ? 0n : (auction?.highestBid ?? 0n);
          expect(m.rail.escrowBalance()).toBe(standing + m.payments.totalOutstanding());
        }
      }),
    );
  });

  it("extends exactly when the bid lands inside the window", () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: WEEK - 1 }), (elapsed) => {
        const m = openAuction();
        const endBefore = m.engine.getAuction("7")?.endTime ?? 0;

        m.clock.advance(elapsed);
        const result = m.engine.bid("7", 150n, "b1");

        const inWindow = endBefore - m.clock.now() <= 900;
        expect(result.extended).toBe(inWindow);
        expect(result.endTime).toBe(inWindow ? endBefore + 900 : endBefore);
      }),
    );
  });
});
