/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Address } from "@fracta/types";
import type { FractaService } from "../services/fracta-service.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The composed engine (set by app factory) */
    service: FractaService;

    /** Calling address, or null for anonymous reads (set by auth middleware) */
    caller: Address | null;
  };
}
