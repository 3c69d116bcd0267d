/**
 * Event query routes.
 *
 * GET /api/v1/events            - The whole log in global order (cursor pagination)
 * GET /api/v1/events/:streamId  - One stream, e.g. proposal:7, relay:rejections or oracle:prices
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema, ListStreamEventsQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { requirePermission } from "../middleware/auth.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), (c) => {
    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"), 400);
    }

    const query = queryResult.data;
    const events = c
      .get("service")
      .readAllEvents(
        query.afterPosition !== undefined ? { fromPosition: query.afterPosition + 1 } : undefined,
      );

    return c.json(
      paginate(
        events,
        { cursor: query.cursor, limit: query.limit },
        (e) => e.globalPosition,
        "globalPosition",
      ),
    );
  });

  routes.get("/:streamId", requirePermission("read"), (c) => {
    const streamId = c.req.param("streamId");

    const queryResult = ListStreamEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"), 400);
    }

    const query = queryResult.data;
    const events = c
      .get("service")
      .readStreamEvents(
        streamId,
        query.afterVersion !== undefined ? { fromVersion: query.afterVersion + 1 } : undefined,
      );

    return c.json(
      paginate(events, { cursor: query.cursor, limit: query.limit }, (e) => e.version, "version"),
    );
  });

  return routes;
}
