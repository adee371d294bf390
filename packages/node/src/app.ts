/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Address } from "@vestlock/types";
import type { AppEnv } from "./types/api-contract.js";
import { TimelockService } from "./services/timelock-service.js";
import type { TimelockServiceConfig } from "./services/timelock-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createLockRoutes } from "./routes/locks.js";
import { createControllerRoutes } from "./routes/controller.js";
import { createNativeRoutes } from "./routes/native.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: TimelockServiceConfig;
  /** API key → caller address. Mutating routes reject unknown keys. */
  readonly apiKeys: ReadonlyMap<string, Address>;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Receives errors that are answered with a 500 */
  readonly onUnexpectedError?: (err: Error) => void;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: TimelockService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new TimelockService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.onUnexpectedError));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", authMiddleware({ apiKeys: options.apiKeys }));
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/locks", createLockRoutes());
  app.route("/api/v1/controller", createControllerRoutes());
  app.route("/api/v1/native", createNativeRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
