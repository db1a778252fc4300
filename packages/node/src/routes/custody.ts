/**
 * Custody routes.
 *
 * POST /api/v1/custody/deposit             — Lock assets, mint claims
 * POST /api/v1/custody/authority           — Set the one-time governance authority
 * GET  /api/v1/custody                     — List asset records
 * GET  /api/v1/custody/:assetId            — Get an asset record
 * POST /api/v1/custody/:assetId/withdraw   — Burn a full claim set, release the asset
 * POST /api/v1/custody/:assetId/redeem     — Burn claims for a share of sale proceeds
 */

import { Hono } from "hono";
import { isSlotSet } from "@fracta/types";
import type { AppEnv } from "../types/api-contract.js";
import { DepositSchema, RedeemSchema, SetAuthoritySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { assetView, redeemView } from "../types/views.js";
import { requireCaller } from "../middleware/auth.js";
import { parseBody } from "../middleware/validate.js";

export function createCustodyRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/deposit", async (c) => {
    const caller = requireCaller(c);
    const body = await parseBody(c, DepositSchema);
    const records = c.get("service").vault.deposit(body.assetIds, caller);
    return c.json({ data: records.map(assetView) }, 201);
  });

  routes.post("/authority", async (c) => {
    const caller = requireCaller(c);
    const body = await parseBody(c, SetAuthoritySchema);
    const { vault } = c.get("service");
    vault.setAuthority(body.authority, caller);
    return c.json({ data: { authority: body.authority } });
  });

  routes.get("/", (c) => {
    const { vault } = c.get("service");
    const authority = vault.authority();
    return c.json({
      data: vault.listAssets().map(assetView),
      owner: vault.owner(),
      authority: isSlotSet(authority) ? authority.value : null,
      totalProceeds: vault.totalProceeds().toString(),
    });
  });

  routes.get("/:assetId", (c) => {
    const assetId = c.req.param("assetId");
    const record = c.get("service").vault.getAsset(assetId);
    if (record === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Asset ${assetId} has never been deposited`), 404);
    }
    return c.json({ data: assetView(record) });
  });

  routes.post("/:assetId/withdraw", (c) => {
    const caller = requireCaller(c);
    const record = c.get("service").vault.withdraw(c.req.param("assetId"), caller);
    return c.json({ data: assetView(record) });
  });

  routes.post("/:assetId/redeem", async (c) => {
    const caller = requireCaller(c);
    const body = await parseBody(c, RedeemSchema);
    const result = c.get("service").vault.redeem(c.req.param("assetId"), body.amount, caller);
    return c.json({ data: redeemView(result) });
  });

  return routes;
}
