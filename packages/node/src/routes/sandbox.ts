/**
 * Sandbox routes. Mounted only when SANDBOX_ENABLED.
 *
 * POST /api/v1/sandbox/fund              — Credit native value to an address
 * POST /api/v1/sandbox/assets            — Register a unique asset to an owner
 * POST /api/v1/sandbox/clock/advance     — Move a manual clock forward
 * GET  /api/v1/sandbox/accounts/:address — Native balance and registry holdings
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AdvanceClockSchema, FundSchema, RegisterAssetSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { parseBody } from "../middleware/validate.js";

export function createSandboxRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/fund", async (c) => {
    const body = await parseBody(c, FundSchema);
    const balance = c.get("service").rail.fund(body.address, body.amount);
    return c.json({ data: { address: body.address, balance: balance.toString() } });
  });

  routes.post("/assets", async (c) => {
    const body = await parseBody(c, RegisterAssetSchema);
    c.get("service").registry.register(body.assetId, body.owner);
    return c.json({ data: { assetId: body.assetId, owner: body.owner } }, 201);
  });

  routes.post("/clock/advance", async (c) => {
    const body = await parseBody(c, AdvanceClockSchema);
    const clock = c.get("service").manualClock();
    if (clock === undefined) {
      return c.json(
        createErrorEnvelope("CONFLICT", "The node runs on the system clock; set CLOCK=manual to move it"),
        409,
      );
    }
    return c.json({ data: { now: clock.advance(body.seconds) } });
  });

  routes.get("/accounts/:address", (c) => {
    const address = c.req.param("address");
    const { rail, registry } = c.get("service");
    return c.json({
      data: {
        address,
        balance: rail.balanceOf(address).toString(),
        assets: registry.assetsOf(address),
      },
    });
  });

  return routes;
}
