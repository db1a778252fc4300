/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, isDomainFailure, STATUS_MAP } from "./error-handler.js";
export type { InternalErrorSink } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { parseBody, parseQuery, formatZodErrors, RequestValidationError } from "./validate.js";
export type { ValidationIssue } from "./validate.js";
export {
  authMiddleware,
  requireCaller,
  MissingCallerError,
  API_KEY_HEADER,
  CALLER_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
