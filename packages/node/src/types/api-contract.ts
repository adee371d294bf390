/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { TimelockService } from "../services/timelock-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the vestlock app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The timelock behind this app */
    service: TimelockService;

    /** Resolved caller (set by auth middleware on mutating requests) */
    auth: AuthContext | undefined;
  };
}
