/**
 * Tests for auction and payment routes over one asset's sale.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { OWNER, T0, WEEK, createTestApp, depositViaApi, send } from "./setup.js";
import type { TestApp } from "./setup.js";

let t: TestApp;

async function fund(address: string, amount: string): Promise<void> {
  await send(t, "/api/v1/sandbox/fund", "POST", { address, amount });
}

async function startAuction(): Promise<void> {
  const res = await send(t, "/api/v1/auctions/7/start", "POST", { startingPrice: "100", duration: WEEK }, OWNER);
  expect(res.status).toBe(201);
}

beforeEach(async () => {
  t = createTestApp();
  await depositViaApi(t, "7", "alice");
  await fund("bob", "1000");
  await fund("carol", "1000");
});

describe("POST /api/v1/auctions/:assetId/start", () => {
  it("opens the auction at the starting price", async () => {
    const res = await send(t, "/api/v1/auctions/7/start", "POST", { startingPrice: "100", duration: WEEK }, OWNER);
    expect(res).toEqual({
      status: 201,
      body: {
        data: {
          assetId: "7",
          isActive: true,
          startingPrice: "100",
          endTime: T0 + WEEK,
          highestBid: "100",
          highestBidder: null,
          totalBids: 0,
          extensions: 0,
        },
      },
    });
  });

  it("is reserved to the owner", async () => {
    const res = await send(t, "/api/v1/auctions/7/start", "POST", { startingPrice: "100", duration: WEEK }, "alice");
    expect(res.status).toBe(403);
    expect(res.body).toMatchObject({ error: { details: { reason: "NOT_OWNER" } } });
  });

  it("requires the configured duration", async () => {
    const res = await send(t, "/api/v1/auctions/7/start", "POST", { startingPrice: "100", duration: 60 }, OWNER);
    expect(res).toEqual({
      status: 400,
      body: {
        error: {
          code: "INVALID_ARGUMENT",
          message: `Auction duration must be ${WEEK}s, got 60s`,
          details: { reason: "WRONG_DURATION", retryable: false },
        },
      },
    });
  });
});

describe("bidding", () => {
  beforeEach(startAuction);

  it("accepts a higher bid and credits the displaced bidder", async () => {
    expect(await send(t, "/api/v1/auctions/7/bids", "POST", { amount: "150" }, "bob")).toEqual({
      status: 200,
      body: { data: { highestBid: "150", endTime: T0 + WEEK, extended: false } },
    });
    await send(t, "/api/v1/auctions/7/bids", "POST", { amount: "200" }, "carol");

    expect(await send(t, "/api/v1/payments/bob")).toEqual({
      status: 200,
      body: { data: { address: "bob", owed: "150" } },
    });
  });

  it("rejects a bid that does not beat the high bid", async () => {
    await send(t, "/api/v1/auctions/7/bids", "POST", { amount: "150" }, "bob");
    const res = await send(t, "/api/v1/auctions/7/bids", "POST", { amount: "120" }, "carol");
    expect(res).toEqual({
      status: 409,
      body: {
        error: {
          code: "PRECONDITION_FAILED",
          message: "Bid 120 must exceed 150",
          details: { reason: "BID_TOO_LOW", retryable: true },
        },
      },
    });
  });

  it("rejects a bidder who cannot pay", async () => {
    const res = await send(t, "/api/v1/auctions/7/bids", "POST", { amount: "150" }, "dave");
    expect(res.status).toBe(422);
    expect(res.body).toMatchObject({ error: { code: "INSUFFICIENT_FUNDS", details: { reason: "BALANCE_TOO_LOW" } } });
  });

  it("extends a bid placed in the closing window", async () => {
    await send(t, "/api/v1/sandbox/clock/advance", "POST", { seconds: WEEK - 100 });
    const res = await send(t, "/api/v1/auctions/7/bids", "POST", { amount: "150" }, "bob");
    expect(res.body).toEqual({ data: { highestBid: "150", endTime: T0 + WEEK + 900, extended: true } });
  });

  it("locks the asset against withdrawal", async () => {
    const res = await send(t, "/api/v1/custody/7/withdraw", "POST", undefined, "alice");
    expect(res.status).toBe(409);
    expect(res.body).toMatchObject({ error: { details: { reason: "ASSET_UNDER_AUCTION" } } });
  });

  it("leaves cancellation to governance", async () => {
    const res = await send(t, "/api/v1/auctions/7/cancel", "POST", undefined, OWNER);
    expect(res.status).toBe(403);
  });
});

describe("settlement", () => {
  beforeEach(async () => {
    await startAuction();
    await send(t, "/api/v1/auctions/7/bids", "POST", { amount: "150" }, "bob");
    await send(t, "/api/v1/auctions/7/bids", "POST", { amount: "200" }, "carol");
  });

  it("waits for the end time", async () => {
    const res = await send(t, "/api/v1/auctions/7/end", "POST", undefined, "anyone");
    expect(res.status).toBe(409);
    expect(res.body).toMatchObject({ error: { details: { reason: "AUCTION_NOT_ENDED" } } });
  });

  it("delivers the asset, credits the royalty and books proceeds", async () => {
    await send(t, "/api/v1/sandbox/clock/advance", "POST", { seconds: WEEK });
    const res = await send(t, "/api/v1/auctions/7/end", "POST", undefined, "anyone");

    expect(res).toEqual({
      status: 200,
      body: { data: { winner: "carol", amount: "200", royalty: "10", royaltyRecipient: "alice" } },
    });
    expect((await send(t, "/api/v1/custody/7")).body).toEqual({
      data: { assetId: "7", inCustody: false, originalOwner: "alice", saleProceeds: "200", listed: false },
    });
    expect(t.service.registry.ownerOf("7")).toBe("carol");
    expect((await send(t, "/api/v1/payments")).body).toMatchObject({ totalOutstanding: "160" });
    expect((await send(t, "/api/v1/auctions?active=true")).body).toEqual({ data: [] });
  });

  it("pays out outbid funds and redemptions", async () => {
    await send(t, "/api/v1/sandbox/clock/advance", "POST", { seconds: WEEK });
    await send(t, "/api/v1/auctions/7/end", "POST", undefined, "anyone");

    expect(await send(t, "/api/v1/payments/withdraw", "POST", undefined, "bob")).toEqual({
      status: 200,
      body: { data: { payee: "bob", amount: "150" } },
    });
    expect((await send(t, "/api/v1/sandbox/accounts/bob")).body).toEqual({
      data: { address: "bob", balance: "1000", assets: [] },
    });

    const second = await send(t, "/api/v1/payments/withdraw", "POST", undefined, "bob");
    expect(second.status).toBe(422);
    expect(second.body).toMatchObject({ error: { code: "NO_FUNDS" } });

    expect(await send(t, "/api/v1/custody/7/redeem", "POST", { amount: "500" }, "alice")).toEqual({
      status: 200,
      body: { data: { payout: "100", remainingProceeds: "100" } },
    });
  });
});

describe("GET /api/v1/parameters/auction", () => {
  it("returns the defaults", async () => {
    expect((await send(t, "/api/v1/parameters/auction")).body).toEqual({
      data: {
        duration: WEEK,
        royaltyPercentage: 5,
        antiSnipeWindow: 900,
        antiSnipeExtension: 900,
        maxExtensions: 0,
      },
    });
  });
});

describe("GET /api/v1/auctions/:assetId", () => {
  it("returns 404 before any auction", async () => {
    expect((await send(t, "/api/v1/auctions/7")).status).toBe(404);
  });

  it("serves an asset whose ID reads like a fixed path segment", async () => {
    await depositViaApi(t, "parameters", "alice");
    const started = await send(
      t,
      "/api/v1/auctions/parameters/start",
      "POST",
      { startingPrice: "100", duration: WEEK },
      OWNER,
    );
    expect(started.status).toBe(201);

    const res = await send(t, "/api/v1/auctions/parameters");
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ data: { assetId: "parameters", isActive: true, highestBid: "100" } });
  });
});
