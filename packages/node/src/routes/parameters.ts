/**
 * Governed parameter routes.
 *
 * GET /api/v1/parameters/auction   — Duration, royalty and anti-snipe settings
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createParameterRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/auction", (c) => {
    return c.json({ data: c.get("service").engine.getParameters() });
  });

  return routes;
}
