/**
 * Proposal routes.
 *
 * POST /api/v1/proposals                 - Create a proposal (draft)
 * GET  /api/v1/proposals                 - List proposals (cursor pagination by id)
 * POST /api/v1/proposals/close-expired   - Close every open proposal past closesAt
 * GET  /api/v1/proposals/:id             - Get a single proposal
 * GET  /api/v1/proposals/:id/tally       - Weight per choice
 * POST /api/v1/proposals/:id/open        - draft → open
 * POST /api/v1/proposals/:id/close       - open → closed
 * POST /api/v1/proposals/:id/archive     - closed → archived
 * POST /api/v1/proposals/:id/prune       - Drop receipt records of an archived proposal
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateProposalSchema,
  ListProposalsQuerySchema,
  ProposalIdParamSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";

function parseProposalId(raw: string): number | undefined {
  const parsed = ProposalIdParamSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

function invalidId(raw: string) {
  return createErrorEnvelope("VALIDATION_ERROR", `Invalid proposal id '${raw}'`);
}

export function createProposalRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", requirePermission("manage"), validateBody(CreateProposalSchema), (c) => {
    const proposal = c.get("service").createProposal(c.get("validatedBody"));
    return c.json({ data: proposal }, 201);
  });

  routes.get("/", requirePermission("read"), (c) => {
    const queryResult = ListProposalsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"), 400);
    }

    const query = queryResult.data;
    const proposals = [...c.get("service").listProposals(query.state)].sort((a, b) => a.id - b.id);

    return c.json(
      paginate(proposals, { cursor: query.cursor, limit: query.limit }, (p) => p.id, "id"),
    );
  });

  routes.post("/close-expired", requirePermission("manage"), (c) => {
    const closed = c.get("service").closeExpired();
    return c.json({ data: closed });
  });

  routes.get("/:id", requirePermission("read"), (c) => {
    const id = parseProposalId(c.req.param("id"));
    if (id === undefined) return c.json(invalidId(c.req.param("id")), 400);

    const proposal = c.get("service").getProposal(id);
    if (proposal === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Proposal ${id} not found`), 404);
    }
    return c.json({ data: proposal });
  });

  routes.get("/:id/tally", requirePermission("read"), (c) => {
    const id = parseProposalId(c.req.param("id"));
    if (id === undefined) return c.json(invalidId(c.req.param("id")), 400);

    const tally = c.get("service").getTally(id);
    if (tally === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Proposal ${id} not found`), 404);
    }
    return c.json({ data: tally });
  });

  routes.post("/:id/open", requirePermission("manage"), (c) => {
    const id = parseProposalId(c.req.param("id"));
    if (id === undefined) return c.json(invalidId(c.req.param("id")), 400);
    return c.json({ data: c.get("service").openProposal(id) });
  });

  routes.post("/:id/close", requirePermission("manage"), (c) => {
    const id = parseProposalId(c.req.param("id"));
    if (id === undefined) return c.json(invalidId(c.req.param("id")), 400);
    return c.json({ data: c.get("service").closeProposal(id) });
  });

  routes.post("/:id/archive", requirePermission("manage"), (c) => {
    const id = parseProposalId(c.req.param("id"));
    if (id === undefined) return c.json(invalidId(c.req.param("id")), 400);
    return c.json({ data: c.get("service").archiveProposal(id) });
  });

  routes.post("/:id/prune", requirePermission("manage"), (c) => {
    const id = parseProposalId(c.req.param("id"));
    if (id === undefined) return c.json(invalidId(c.req.param("id")), 400);

    const pruned = c.get("service").pruneProposal(id);
    return c.json({ data: { proposalId: id, pruned } });
  });

  return routes;
}
