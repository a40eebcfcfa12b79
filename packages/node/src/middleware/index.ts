/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, handleError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { parseQuery } from "./validate.js";
export {
  metricsMiddleware,
  MetricsCollector,
  UNMATCHED_PATH,
  HTTP_REQUESTS_METRIC,
  HTTP_DURATION_METRIC,
} from "./metrics.js";
