/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, statusFor } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry, RequestLogSink } from "./logger.js";
export { parseBody, parseQuery } from "./validate.js";
export { authMiddleware, callerOf, API_KEY_HEADER } from "./auth.js";
export type { AuthConfig } from "./auth.js";
