/**
 * Event query routes.
 *
 * GET /api/v1/events — Timelock notifications (cursor pagination)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema, eventView } from "../types/dto.js";
import { parseQuery } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    const query = parseQuery(c, ListEventsQuerySchema);

    const events = service.readEvents(
      query.afterPosition !== undefined
        ? { fromPosition: query.afterPosition + 1 }
        : undefined,
    );

    const result = paginate(
      events.map(eventView),
      { cursor: query.cursor, limit: query.limit },
      (e) => e.position,
    );

    return c.json(result);
  });

  return routes;
}
