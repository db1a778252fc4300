/**
 * Pull-payment routes.
 *
 * POST /api/v1/payments/withdraw    — Withdraw everything owed to the caller
 * GET  /api/v1/payments             — Outstanding total and payees
 * GET  /api/v1/payments/:address    — Amount owed to an address
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { requireCaller } from "../middleware/auth.js";

export function createPaymentRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/withdraw", (c) => {
    const caller = requireCaller(c);
    const amount = c.get("service").payments.withdraw(caller);
    return c.json({ data: { payee: caller, amount: amount.toString() } });
  });

  routes.get("/", (c) => {
    const { payments } = c.get("service");
    return c.json({
      data: payments.payees().map((p) => ({ payee: p.payee, owed: p.owed.toString() })),
      totalOutstanding: payments.totalOutstanding().toString(),
    });
  });

  routes.get("/:address", (c) => {
    const address = c.req.param("address");
    const owed = c.get("service").payments.owed(address);
    return c.json({ data: { address, owed: owed.toString() } });
  });

  return routes;
}
