/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createCustodyRoutes } from "./custody.js";
export { createMetricsRoute } from "./metrics.js";
