/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes around one
 * FractaService. Separated from main.ts so tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Address } from "@fracta/types";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { FractaService, SYSTEM_ADDRESSES } from "./services/fracta-service.js";
import type { FractaServiceConfig } from "./services/fracta-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import type { InternalErrorSink } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import {
  createAuctionRoutes,
  createClaimRoutes,
  createCustodyRoutes,
  createEventRoutes,
  createGovernanceRoutes,
  createHealthRoutes,
  createParameterRoutes,
  createPaymentRoutes,
  createSandboxRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: FractaServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
  readonly onInternalError?: InternalErrorSink;
  /** API key → caller address. Empty or absent: callers assert X-Caller-Address. */
  readonly apiKeys?: ReadonlyMap<string, Address>;
  /** Mount /api/v1/sandbox. Default: false */
  readonly sandbox?: boolean;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: FractaService;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): AppInstance {
  const service = new FractaService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  app.onError(createErrorHandler(options.onInternalError));
  app.notFound((c) => c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404));

  app.use("*", requestIdMiddleware());
  app.use("*", async (c, next) => {
    c.set("service", service);
    c.set("caller", null);
    await next();
  });
  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.route("/", createHealthRoutes());

  app.use(
    "/api/*",
    authMiddleware({
      apiKeys: options.apiKeys ?? new Map(),
      reservedAddresses: new Set<Address>(Object.values(SYSTEM_ADDRESSES)),
    }),
  );

  const api = new Hono<AppEnv>();
  api.route("/custody", createCustodyRoutes());
  api.route("/auctions", createAuctionRoutes());
  api.route("/payments", createPaymentRoutes());
  api.route("/claims", createClaimRoutes());
  api.route("/governance", createGovernanceRoutes());
  api.route("/parameters", createParameterRoutes());
  api.route("/events", createEventRoutes());
  if (options.sandbox === true) {
    api.route("/sandbox", createSandboxRoutes());
  }
  app.route("/api/v1", api);

  return { app, service };
}
