/**
 * Tests for proposal routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  SETUP,
  START,
  TREASURY,
  createTestApp,
  deliveryRequest,
  jsonRequest,
  memoHex,
  readJson,
  receiptId,
  seedOpenProposal,
} from "../setup.js";
import type { TestApp } from "../setup.js";

interface ProposalBody {
  data: { id: number; state: string; openedAt?: number; closedAt?: number; archivedAt?: number };
}

interface ErrorBody {
  error: { code: string; message: string };
}

let instance: TestApp;

beforeEach(() => {
  instance = createTestApp();
});

function create(body: Record<string, unknown>): Promise<Response> {
  return Promise.resolve(
    instance.app.request(
      jsonRequest("/api/v1/proposals", "POST", {
        choiceCount: 2,
        opensAt: START,
        closesAt: START + 1_000,
        treasuryRoute: TREASURY,
        ...body,
      }),
    ),
  );
}

function post(path: string): Promise<Response> {
  return Promise.resolve(instance.app.request(jsonRequest(path, "POST")));
}

describe("POST /api/v1/proposals", () => {
  it("creates a draft proposal", async () => {
    const res = await create({ id: 1, title: "Fund the bridge audit" });

    expect(res.status).toBe(201);
    expect(await readJson<ProposalBody>(res)).toEqual({
      data: {
        id: 1,
        choiceCount: 2,
        opensAt: START,
        closesAt: START + 1_000,
        treasuryRoute: TREASURY,
        mode: "payment",
        state: "draft",
        title: "Fund the bridge audit",
        createdAt: SETUP,
      },
    });
  });

  it("returns 409 for an existing id", async () => {
    await create({ id: 1 });
    const res = await create({ id: 1 });

    expect(res.status).toBe(409);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("PROPOSAL_EXISTS");
  });

  it("returns 400 for an empty window", async () => {
    const res = await create({ id: 1, opensAt: START + 10, closesAt: START + 10 });

    expect(res.status).toBe(400);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("INVALID_PROPOSAL");
  });

  it("returns 400 for a window that has already opened", async () => {
    instance.clock.set(START);
    const res = await create({ id: 1 });

    expect(res.status).toBe(400);
    expect(await readJson<ErrorBody>(res)).toEqual({
      error: {
        code: "INVALID_PROPOSAL",
        message: `Proposal 1 must be created before its window opens (opensAt ${START}, now ${START})`,
      },
    });
  });

  it("returns 400 for a choice count out of range", async () => {
    const res = await create({ id: 1, choiceCount: 256 });

    expect(res.status).toBe(400);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("VALIDATION_ERROR");
  });
});

describe("lifecycle", () => {
  it("moves a proposal through open, close and archive", async () => {
    await create({ id: 1 });

    const opened = await readJson<ProposalBody>(await post("/api/v1/proposals/1/open"));
    instance.clock.advance(5);
    const closed = await readJson<ProposalBody>(await post("/api/v1/proposals/1/close"));
    instance.clock.advance(5);
    const archived = await readJson<ProposalBody>(await post("/api/v1/proposals/1/archive"));

    expect(opened.data).toMatchObject({ state: "open", openedAt: SETUP });
    expect(closed.data).toMatchObject({ state: "closed", closedAt: SETUP + 5 });
    expect(archived.data).toMatchObject({ state: "archived", archivedAt: SETUP + 10 });
  });

  it("returns 409 for a transition from the wrong state", async () => {
    await create({ id: 1 });
    const res = await post("/api/v1/proposals/1/close");

    expect(res.status).toBe(409);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("INVALID_TRANSITION");
  });

  it("returns 409 when opening a draft whose window has ended", async () => {
    await create({ id: 1 });
    instance.clock.set(START + 1_000);
    const res = await post("/api/v1/proposals/1/open");

    expect(res.status).toBe(409);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("INVALID_TRANSITION");
  });

  it("returns 404 for a transition of an unknown proposal", async () => {
    const res = await post("/api/v1/proposals/42/open");

    expect(res.status).toBe(404);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("PROPOSAL_NOT_FOUND");
  });

  it("closes expired proposals in one sweep", async () => {
    await create({ id: 1 });
    await create({ id: 2, closesAt: START + 5_000 });
    await post("/api/v1/proposals/1/open");
    await post("/api/v1/proposals/2/open");
    instance.clock.set(START + 2_000);

    const res = await post("/api/v1/proposals/close-expired");

    expect((await readJson<{ data: { id: number; closedAt: number }[] }>(res)).data).toMatchObject([
      { id: 1, closedAt: START + 1_000 },
    ]);
  });

  it("prunes receipts only once a proposal is archived", async () => {
    await seedOpenProposal(instance);
    await instance.app.request(
      deliveryRequest({ receiptId: receiptId(1), rawAmount: "10", asset: "ORIGIN.COIN", memo: memoHex(7, 0) }),
    );

    const refused = await post("/api/v1/proposals/7/prune");
    expect(refused.status).toBe(409);
    expect((await readJson<ErrorBody>(refused)).error.code).toBe("PRUNE_REFUSED");

    await post("/api/v1/proposals/7/close");
    await post("/api/v1/proposals/7/archive");
    const res = await post("/api/v1/proposals/7/prune");

    expect(await readJson<{ data: unknown }>(res)).toEqual({ data: { proposalId: 7, pruned: 1 } });
  });
});

describe("GET /api/v1/proposals", () => {
  it("pages through proposals by id", async () => {
    for (const id of [3, 1, 2]) {
      await create({ id });
    }

    const first = await readJson<{
      data: { id: number }[];
      pagination: { cursor: string | null; hasMore: boolean };
    }>(await instance.app.request("/api/v1/proposals?limit=2"));
    expect(first.data.map((p) => p.id)).toEqual([1, 2]);
    expect(first.pagination.hasMore).toBe(true);

    const second = await readJson<{ data: { id: number }[]; pagination: { hasMore: boolean } }>(
      await instance.app.request(`/api/v1/proposals?limit=2&cursor=${first.pagination.cursor ?? ""}`),
    );
    expect(second.data.map((p) => p.id)).toEqual([3]);
    expect(second.pagination.hasMore).toBe(false);
  });

  it("filters by state", async () => {
    await create({ id: 1 });
    await create({ id: 2 });
    await post("/api/v1/proposals/2/open");

    const body = await readJson<{ data: { id: number }[] }>(
      await instance.app.request("/api/v1/proposals?state=open"),
    );
    expect(body.data.map((p) => p.id)).toEqual([2]);
  });

  it("rejects an unknown state filter", async () => {
    const res = await instance.app.request("/api/v1/proposals?state=pending");
    expect(res.status).toBe(400);
  });
});

describe("GET /api/v1/proposals/:id", () => {
  it("returns 404 for an unknown proposal", async () => {
    const res = await instance.app.request("/api/v1/proposals/5");

    expect(res.status).toBe(404);
    expect(await readJson<ErrorBody>(res)).toEqual({
      error: { code: "NOT_FOUND", message: "Proposal 5 not found" },
    });
  });

  it("returns 400 for an id that is not a uint32", async () => {
    const res = await instance.app.request("/api/v1/proposals/abc");

    expect(res.status).toBe(400);
    expect((await readJson<ErrorBody>(res)).error.message).toBe("Invalid proposal id 'abc'");
  });
});

describe("GET /api/v1/proposals/:id/tally", () => {
  it("returns the weight per choice and the total", async () => {
    await seedOpenProposal(instance);
    await instance.app.request(
      deliveryRequest({ receiptId: receiptId(1), rawAmount: "1000000", asset: "ORIGIN.COIN", memo: memoHex(7, 2, 1) }),
    );
    await instance.app.request(
      deliveryRequest({ receiptId: receiptId(2), rawAmount: "250", asset: "ORIGIN.COIN", memo: memoHex(7, 0, 2) }),
    );

    const res = await instance.app.request("/api/v1/proposals/7/tally");

    expect(await readJson<{ data: unknown }>(res)).toEqual({
      data: {
        proposalId: 7,
        state: "open",
        choices: [
          { choiceId: 0, weight: "500" },
          { choiceId: 1, weight: "0" },
          { choiceId: 2, weight: "2000000" },
        ],
        total: "2000500",
      },
    });
  });
});
