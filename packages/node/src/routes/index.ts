/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createLockRoutes } from "./locks.js";
export { createControllerRoutes } from "./controller.js";
export { createNativeRoutes } from "./native.js";
export { createEventRoutes } from "./events.js";
