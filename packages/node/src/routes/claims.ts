/**
 * Claim balance routes.
 *
 * GET  /api/v1/claims            — Supply and holders, largest first
 * GET  /api/v1/claims/:address   — One holder's balance
 * POST /api/v1/claims/transfer   — Move claims from the caller to another holder
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { TransferClaimsSchema } from "../types/dto.js";
import { requireCaller } from "../middleware/auth.js";
import { parseBody } from "../middleware/validate.js";

export function createClaimRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const { claims } = c.get("service");
    return c.json({
      data: claims.holders().map((h) => ({ holder: h.holder, balance: h.balance.toString() })),
      totalSupply: claims.totalSupply().toString(),
    });
  });

  routes.post("/transfer", async (c) => {
    const caller = requireCaller(c);
    const body = await parseBody(c, TransferClaimsSchema);
    const { claims } = c.get("service");
    claims.transfer(caller, body.to, body.amount);
    return c.json({
      data: {
        from: caller,
        to: body.to,
        amount: body.amount.toString(),
        balance: claims.balanceOf(caller).toString(),
      },
    });
  });

  routes.get("/:address", (c) => {
    const address = c.req.param("address");
    const { claims } = c.get("service");
    return c.json({
      data: {
        address,
        balance: claims.balanceOf(address).toString(),
        totalSupply: claims.totalSupply().toString(),
      },
    });
  });

  return routes;
}
