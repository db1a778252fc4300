/**
 * Global error handler.
 *
 * Renders every thrown error as an error envelope. Domain rejections
 * keep their FailureCode and put the specific slug in
 * `details.reason`; anything unrecognised becomes a 500 that does not
 * leak its message.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { ZodError } from "zod";
import type { DomainFailure, FailureCode } from "@fracta/types";
import { isFailureCode, isRetryableFailure } from "@fracta/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import { MissingCallerError } from "./auth.js";
import { RequestValidationError, formatZodErrors } from "./validate.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export const STATUS_MAP = {
  INVALID_ARGUMENT: 400,
  UNAUTHORIZED: 403,
  NOT_FOUND: 404,
  PRECONDITION_FAILED: 409,
  ALREADY_SET: 409,
  REENTRANT_CALL: 409,
  INSUFFICIENT_FUNDS: 422,
  INSUFFICIENT_CLAIMS: 422,
  NOT_IN_CUSTODY: 422,
  NO_PROCEEDS: 422,
  SUPPLY_ZERO: 422,
  NO_FUNDS: 422,
  TRANSFER_FAILED: 502,
} as const satisfies Record<FailureCode, number>;

export function isDomainFailure(err: Error): err is Error & DomainFailure {
  return (
    "code" in err &&
    "reason" in err &&
    isFailureCode(err.code) &&
    typeof err.reason === "string"
  );
}

// =============================================================================
// Handler
// =============================================================================

export type InternalErrorSink = (err: Error, requestId: string) => void;

/**
 * Build the handler registered with `app.onError`. `onInternal` sees
 * the errors that become 500s.
 */
export function createErrorHandler(onInternal?: InternalErrorSink) {
  return (err: Error, c: Context<AppEnv>): Response => {
    if (isDomainFailure(err)) {
      return c.json(
        createErrorEnvelope(err.code, err.message, {
          reason: err.reason,
          retryable: isRetryableFailure(err.code),
        }),
        STATUS_MAP[err.code],
      );
    }

    if (err instanceof RequestValidationError) {
      return c.json(
        createErrorEnvelope(
          "VALIDATION_ERROR",
          err.message,
          err.issues.length > 0 ? { issues: err.issues } : undefined,
        ),
        400,
      );
    }

    if (err instanceof ZodError) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Validation failed", {
          issues: formatZodErrors(err),
        }),
        400,
      );
    }

    if (err instanceof MissingCallerError) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", err.message), 401);
    }

    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    onInternal?.(err, c.get("requestId"));
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
