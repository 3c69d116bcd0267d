/**
 * Tests for event query routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  ASSET,
  createTestApp,
  deliveryRequest,
  memoHex,
  readJson,
  receiptId,
  seedOpenProposal,
} from "../setup.js";
import type { TestApp } from "../setup.js";

interface EventPage {
  data: {
    streamId: string;
    version: number;
    globalPosition: number;
    event: { type: string; payload: Record<string, unknown> };
  }[];
  pagination: { cursor: string | null; hasMore: boolean };
}

let instance: TestApp;

beforeEach(async () => {
  instance = createTestApp();
  await seedOpenProposal(instance);
  await instance.app.request(
    deliveryRequest({ receiptId: receiptId(1), rawAmount: "100", asset: ASSET, memo: memoHex(7, 1) }),
  );
  await instance.app.request(
    deliveryRequest({ receiptId: receiptId(2), rawAmount: "100", asset: ASSET, memo: memoHex(99, 1) }),
  );
});

describe("GET /api/v1/events", () => {
  it("returns the whole log in global order", async () => {
    const body = await readJson<EventPage>(await instance.app.request("/api/v1/events"));

    expect(body.data.map((e) => [e.globalPosition, e.streamId, e.event.type])).toEqual([
      [1, "proposal:7", "proposal.created"],
      [2, "proposal:7", "proposal.opened"],
      [3, "oracle:prices", "oracle.price.published"],
      [4, "proposal:7", "vote.cast"],
      [5, "relay:rejections", "vote.rejected"],
    ]);
    expect(body.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("resumes after a global position", async () => {
    const body = await readJson<EventPage>(await instance.app.request("/api/v1/events?afterPosition=3"));

    expect(body.data.map((e) => e.globalPosition)).toEqual([4, 5]);
  });

  it("pages with a cursor", async () => {
    const first = await readJson<EventPage>(await instance.app.request("/api/v1/events?limit=4"));
    expect(first.pagination.hasMore).toBe(true);

    const second = await readJson<EventPage>(
      await instance.app.request(`/api/v1/events?limit=4&cursor=${first.pagination.cursor ?? ""}`),
    );
    expect(second.data.map((e) => e.globalPosition)).toEqual([5]);
  });

  it("returns 400 for a negative position", async () => {
    const res = await instance.app.request("/api/v1/events?afterPosition=-1");
    expect(res.status).toBe(400);
  });
});

describe("GET /api/v1/events/:streamId", () => {
  it("returns one proposal's stream", async () => {
    const body = await readJson<EventPage>(await instance.app.request("/api/v1/events/proposal:7?afterVersion=1"));

    expect(body.data.map((e) => [e.version, e.event.type])).toEqual([
      [2, "proposal.opened"],
      [3, "vote.cast"],
    ]);
  });

  it("returns the price stream", async () => {
    const body = await readJson<EventPage>(await instance.app.request("/api/v1/events/oracle:prices"));

    expect(body.data.map((e) => e.event.payload)).toEqual([{ asset: ASSET, price: "2.0", observedAt: 1_000 }]);
  });

  it("returns the rejection stream", async () => {
    const body = await readJson<EventPage>(await instance.app.request("/api/v1/events/relay:rejections"));

    expect(body.data).toHaveLength(1);
    expect(body.data[0]?.event.payload).toMatchObject({ receiptId: receiptId(2), reason: "unknownOrClosed" });
  });

  it("returns an empty page for an unknown stream", async () => {
    const body = await readJson<EventPage>(await instance.app.request("/api/v1/events/proposal:42"));

    expect(body).toEqual({ data: [], pagination: { cursor: null, hasMore: false } });
  });
});
