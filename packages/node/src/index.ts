/**
 * @fracta/node — Package public API.
 *
 * `main.ts` is the executable; this module only re-exports.
 */

export { FractaService, SYSTEM_ADDRESSES } from "./services/fracta-service.js";
export type { EventQuery, FractaServiceConfig } from "./services/fracta-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export { createErrorEnvelope } from "./types/error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./types/error.js";
export { encodeCursor, decodeCursor, startAfter, toPage } from "./types/pagination.js";
export type { PaginationMeta, PaginatedResponse } from "./types/pagination.js";
export type { AppEnv } from "./types/api-contract.js";
export * from "./types/dto.js";
