/**
 * Signed vote route.
 *
 * POST /api/v1/signed-votes - Submit a detached-signature vote for an
 * identity-mode proposal. The outcome (accepted or rejected with a
 * reason) is the response body.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SignedVoteSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export function createSignedVoteRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", requirePermission("submit-signed"), validateBody(SignedVoteSchema), (c) => {
    const service = c.get("service");
    const outcome = service.submitSignedVote(c.get("validatedBody"));
    return c.json({ data: outcome });
  });

  return routes;
}
