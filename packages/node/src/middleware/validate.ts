/**
 * Zod request validation.
 *
 * Handlers parse their own input so the parsed type flows from the
 * schema. Failures throw RequestValidationError, which the error
 * handler renders as 400.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export class RequestValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly ValidationIssue[] = [],
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "RequestValidationError";
  }
}

/** Parse and validate the JSON request body. */
export async function parseBody<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (err) {
    throw new RequestValidationError("Invalid JSON in request body", [], { cause: err });
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new RequestValidationError(
      "Request body validation failed",
      formatZodErrors(result.error),
    );
  }
  return result.data;
}

/** Parse and validate the query string. */
export function parseQuery<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): T {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw new RequestValidationError(
      "Invalid query parameters",
      formatZodErrors(result.error),
    );
  }
  return result.data;
}

export function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
