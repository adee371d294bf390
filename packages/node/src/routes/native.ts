/**
 * Native currency routes.
 *
 * POST /api/v1/native/sweep — Send the vault's native balance to the controller
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { sweepReceiptView } from "../types/dto.js";
import { callerOf } from "../middleware/auth.js";

export function createNativeRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/sweep", async (c) => {
    const receipt = await c.get("service").sweepNativeBalance(callerOf(c));
    return c.json({ data: sweepReceiptView(receipt) });
  });

  return routes;
}
