/**
 * Lock routes.
 *
 * GET  /api/v1/locks                 — Active locks
 * GET  /api/v1/locks/:asset          — Status and held balance of one asset
 * POST /api/v1/locks/:asset          — Initiate a lock ({ amount })
 * POST /api/v1/locks/:asset/release  — Release a matured asset
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { InitiateLockSchema, lockReceiptView, releaseReceiptView } from "../types/dto.js";
import type { LockDetailView } from "../types/dto.js";
import { parseBody } from "../middleware/validate.js";
import { callerOf } from "../middleware/auth.js";

export function createLockRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    return c.json({ data: service.listLocks() });
  });

  routes.get("/:asset", async (c) => {
    const service = c.get("service");
    const { status, heldBalance } = await service.getLock(c.req.param("asset"));
    const view: LockDetailView = { ...status, heldBalance: heldBalance.toString() };
    return c.json({ data: view });
  });

  routes.post("/:asset", async (c) => {
    const service = c.get("service");
    const body = await parseBody(c, InitiateLockSchema);

    const receipt = await service.initiateLock(callerOf(c), c.req.param("asset"), body.amount);
    return c.json({ data: lockReceiptView(receipt) }, 201);
  });

  routes.post("/:asset/release", async (c) => {
    const service = c.get("service");

    const receipt = await service.release(callerOf(c), c.req.param("asset"));
    return c.json({ data: releaseReceiptView(receipt) });
  });

  return routes;
}
