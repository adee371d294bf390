/**
 * Controller routes.
 *
 * GET  /api/v1/controller           — Current controller and lock duration
 * POST /api/v1/controller/transfer  — Hand control over ({ newController })
 * POST /api/v1/controller/renounce  — Give up control for good
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { TransferControlSchema } from "../types/dto.js";
import { parseBody } from "../middleware/validate.js";
import { callerOf } from "../middleware/auth.js";

export function createControllerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").controllerInfo() });
  });

  routes.post("/transfer", async (c) => {
    const service = c.get("service");
    const body = await parseBody(c, TransferControlSchema);

    const controller = await service.transferControl(callerOf(c), body.newController);
    return c.json({ data: { controller } });
  });

  routes.post("/renounce", async (c) => {
    const service = c.get("service");

    await service.renounceControl(callerOf(c));
    return c.json({ data: { controller: null } });
  });

  return routes;
}
