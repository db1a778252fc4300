/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (event log hash chain intact)
 */

import { Hono } from "hono";
import { isoAt } from "@fracta/types";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const service = c.get("service");
    const integrity = service.verifyIntegrity();
    const body = {
      status: integrity.valid ? "ready" : "not_ready",
      events: service.store.globalPosition(),
      chainErrors: integrity.errors.length,
      clock: isoAt(service.clock.now()),
    };
    return integrity.valid ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
