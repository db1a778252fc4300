/**
 * Auction routes.
 *
 * GET  /api/v1/auctions                    — List auctions (?active=true)
 * GET  /api/v1/auctions/:assetId           — Get an auction
 * POST /api/v1/auctions/:assetId/start     — Open an auction (owner)
 * POST /api/v1/auctions/:assetId/bids      — Place a bid
 * POST /api/v1/auctions/:assetId/end       — Settle after the end time
 * POST /api/v1/auctions/:assetId/cancel    — Cancel (governance authority)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { BidSchema, ListAuctionsQuerySchema, StartAuctionSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { auctionView, bidView, cancellationView, settlementView } from "../types/views.js";
import { requireCaller } from "../middleware/auth.js";
import { parseBody, parseQuery } from "../middleware/validate.js";

export function createAuctionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseQuery(c, ListAuctionsQuerySchema);
    const auctions = c.get("service").engine.listAuctions({ activeOnly: query.active === "true" });
    return c.json({ data: auctions.map(auctionView) });
  });

  routes.get("/:assetId", (c) => {
    const assetId = c.req.param("assetId");
    const auction = c.get("service").engine.getAuction(assetId);
    if (auction === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `No auction has been held for ${assetId}`), 404);
    }
    return c.json({ data: auctionView(auction) });
  });

  routes.post("/:assetId/start", async (c) => {
    const caller = requireCaller(c);
    const body = await parseBody(c, StartAuctionSchema);
    const auction = c.get("service").engine.start(c.req.param("assetId"), body.startingPrice, body.duration, caller);
    return c.json({ data: auctionView(auction) }, 201);
  });

  routes.post("/:assetId/bids", async (c) => {
    const caller = requireCaller(c);
    const body = await parseBody(c, BidSchema);
    const result = c.get("service").engine.bid(c.req.param("assetId"), body.amount, caller);
    return c.json({ data: bidView(result) });
  });

  routes.post("/:assetId/end", (c) => {
    const caller = requireCaller(c);
    const result = c.get("service").engine.end(c.req.param("assetId"), caller);
    return c.json({ data: settlementView(result) });
  });

  routes.post("/:assetId/cancel", (c) => {
    const caller = requireCaller(c);
    const result = c.get("service").engine.cancel(c.req.param("assetId"), caller);
    return c.json({ data: cancellationView(result) });
  });

  return routes;
}
