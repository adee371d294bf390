/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (controller still present, queue depth)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { TimelockService } from "../services/timelock-service.js";

export function createHealthRoutes(service: TimelockService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const { controller } = service.controllerInfo();
    return c.json({
      status: "ready",
      controller,
      activeLocks: service.listLocks().length,
      pendingOperations: service.pendingOperations,
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
