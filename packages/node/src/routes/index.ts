/**
 * Route barrel — re-exports all route factories.
 */

export { createInfoRoutes, ENDPOINTS } from "./info.js";
export { createHealthRoutes } from "./health.js";
export { createGlRoutes } from "./gl.js";
export { createBatchRoutes } from "./batch.js";
export { createMetricsRoute } from "./metrics.js";
