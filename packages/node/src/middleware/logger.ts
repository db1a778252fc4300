/**
 * Structured request logging middleware.
 *
 * Emits one entry per request through an injected sink; `main.ts`
 * routes the entries to pino.
 */

import type { MiddlewareHandler } from "hono";
import type { Address } from "@fracta/types";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  readonly caller: Address | null;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
      requestId: c.get("requestId"),
      caller: c.get("caller") ?? null,
    });
  };
}
