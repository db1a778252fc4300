/**
 * Caller identity middleware.
 *
 * Two modes:
 * 1. API keys configured: every request must carry a known X-Api-Key;
 *    the caller is the address the key is bound to.
 * 2. No keys: the caller is taken from X-Caller-Address (sandbox and
 *    local use). Requests without it are anonymous and may only read.
 *
 * Reserved addresses (the service's own accounts) are never accepted as
 * a caller in either mode.
 *
 * On success, sets `c.set("caller", address | null)`.
 */

import type { Context, MiddlewareHandler } from "hono";
import type { Address } from "@fracta/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_HEADER = "X-Caller-Address";

export interface AuthConfig {
  /** Map of API key → caller address. Empty means header-asserted callers. */
  readonly apiKeys: ReadonlyMap<string, Address>;
  /** Addresses no request may act as. */
  readonly reservedAddresses?: ReadonlySet<Address>;
}

function reservedCaller(address: Address): string {
  return `${address} is a reserved system address and cannot be used as a caller`;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  const reserved = config.reservedAddresses ?? new Set<Address>();
  return async (c, next) => {
    if (config.apiKeys.size > 0) {
      const apiKey = c.req.header(API_KEY_HEADER);
      if (apiKey === undefined) {
        return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
      }
      const address = config.apiKeys.get(apiKey);
      if (address === undefined) {
        return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
      }
      if (reserved.has(address)) {
        return c.json(createErrorEnvelope("UNAUTHORIZED", reservedCaller(address)), 401);
      }
      c.set("caller", address);
      return next();
    }

    const asserted = c.req.header(CALLER_HEADER)?.trim();
    if (asserted !== undefined && reserved.has(asserted)) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", reservedCaller(asserted)), 401);
    }
    c.set("caller", asserted === undefined || asserted === "" ? null : asserted);
    return next();
  };
}

export class MissingCallerError extends Error {
  constructor() {
    super(`This operation needs a caller; send ${CALLER_HEADER} or ${API_KEY_HEADER}`);
    this.name = "MissingCallerError";
  }
}

/** The calling address, for handlers that change state. */
export function requireCaller(c: Context<AppEnv>): Address {
  const caller = c.get("caller");
  if (caller === null) {
    throw new MissingCallerError();
  }
  return caller;
}
