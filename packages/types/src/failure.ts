/**
 * Failure Taxonomy
 *
 * Every rejected operation carries one of these codes plus a specific
 * reason slug. Rejections are synchronous and leave state untouched.
 */

export type FailureCode =
  | "PRECONDITION_FAILED"
  | "UNAUTHORIZED"
  | "INSUFFICIENT_FUNDS"
  | "INSUFFICIENT_CLAIMS"
  | "ALREADY_SET"
  | "TRANSFER_FAILED"
  | "NOT_IN_CUSTODY"
  | "NO_PROCEEDS"
  | "SUPPLY_ZERO"
  | "NO_FUNDS"
  | "NOT_FOUND"
  | "INVALID_ARGUMENT"
  | "REENTRANT_CALL";

/**
 * Whether resubmitting the same call later can succeed without the
 * caller changing who they are or what they asked for.
 *
 * `PRECONDITION_FAILED` covers time- and state-dependent gates (auction
 * still running, bid too low) and is therefore retryable; a wrong role
 * or a spent one-time slot is not.
 */
export const FAILURE_RETRYABLE: Readonly<Record<FailureCode, boolean>> = {
  PRECONDITION_FAILED: true,
  UNAUTHORIZED: false,
  INSUFFICIENT_FUNDS: true,
  INSUFFICIENT_CLAIMS: true,
  ALREADY_SET: false,
  TRANSFER_FAILED: true,
  NOT_IN_CUSTODY: false,
  NO_PROCEEDS: true,
  SUPPLY_ZERO: false,
  NO_FUNDS: true,
  NOT_FOUND: false,
  INVALID_ARGUMENT: false,
  REENTRANT_CALL: true,
};

export function isRetryableFailure(code: FailureCode): boolean {
  return FAILURE_RETRYABLE[code];
}

/**
 * Shape shared by every domain error thrown in Fracta.
 * Each package defines its own Error subclass with this shape.
 */
export interface DomainFailure {
  readonly code: FailureCode;
  readonly reason: string;
  readonly message: string;
}
