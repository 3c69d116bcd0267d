/**
 * Price oracle routes.
 *
 * POST /api/v1/oracle/prices - Publish a price snapshot
 * GET  /api/v1/oracle/prices - Latest snapshot per asset
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { PublishPriceSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export function createOracleRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/prices", requirePermission("publish-price"), validateBody(PublishPriceSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");
    const snapshot = service.publishPrice(body.asset, body.price, body.observedAt);
    return c.json({ data: snapshot }, 201);
  });

  routes.get("/prices", requirePermission("read"), (c) => {
    const prices = [...c.get("service").listPrices()].sort((a, b) => a.asset.localeCompare(b.asset));
    return c.json({ data: prices });
  });

  return routes;
}
