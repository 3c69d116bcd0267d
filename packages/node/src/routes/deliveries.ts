/**
 * Transport delivery route.
 *
 * POST /transport/deliveries - One delivery from the transport network.
 *
 * The X-Transport-Address header names the caller. A caller other than
 * the trusted transport gets 403 before its body is read; every other
 * well-formed body is
 * accepted for processing (202) and answered with its outcome, since a
 * rejected vote is still a settled delivery.
 */

import { Hono } from "hono";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { TransportDeliverySchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export const TRANSPORT_ADDRESS_HEADER = "X-Transport-Address";

function requireTrustedTransport(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    c.get("service").authorizeTransport(callerOf(c.req.header(TRANSPORT_ADDRESS_HEADER)));
    await next();
  };
}

function callerOf(header: string | undefined): string {
  return header ?? "";
}

export function createDeliveryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post(
    "/deliveries",
    requirePermission("deliver"),
    requireTrustedTransport(),
    validateBody(TransportDeliverySchema),
    (c) => {
      const service = c.get("service");
      const caller = callerOf(c.req.header(TRANSPORT_ADDRESS_HEADER));

      const outcome = service.deliver(caller, c.get("validatedBody"));

      return c.json({ data: outcome }, 202);
    },
  );

  return routes;
}
