/**
 * Event log routes.
 *
 * GET /api/v1/events          — Events in global order, or one stream's events
 *                               in version order (?streamId, cursor pagination)
 * GET /api/v1/events/verify   — Recompute the hash chain
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { startAfter, toPage } from "../types/pagination.js";
import { parseQuery } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseQuery(c, ListEventsQuerySchema);
    const events = c.get("service").readEvents({
      streamId: query.streamId,
      after: startAfter(query.cursor),
      maxCount: query.limit + 1,
    });
    return c.json(
      toPage(events, query.limit, (e) => (query.streamId === undefined ? e.globalPosition : e.version)),
    );
  });

  routes.get("/verify", (c) => {
    const service = c.get("service");
    const integrity = service.verifyIntegrity();
    return c.json({
      data: {
        ...integrity,
        eventCount: service.store.globalPosition(),
      },
    });
  });

  return routes;
}
