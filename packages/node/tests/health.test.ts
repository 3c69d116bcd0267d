/**
 * Tests for health check endpoints.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest, readJson, seedOpenProposal } from "./setup.js";

interface ReadyBody {
  status: string;
  eventLog: { status: string; events: number; lastVerifiedPosition: number; errors: number };
}

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    const body = await readJson<{ status: string; timestamp: string }>(res);
    expect(body.status).toBe("ok");
  });

  it("generates an X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("preserves an incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "test-req-123" }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });
});

describe("GET /ready", () => {
  it("reports an intact event log", async () => {
    const instance = createTestApp();
    await seedOpenProposal(instance);

    const res = await instance.app.request("/ready");

    expect(res.status).toBe(200);
    expect(await readJson<ReadyBody>(res)).toMatchObject({
      status: "ready",
      eventLog: { status: "ok", events: 3, lastVerifiedPosition: 3, errors: 0 },
    });
  });

  it("covers events appended after an earlier check", async () => {
    const instance = createTestApp();
    await seedOpenProposal(instance);
    await instance.app.request("/ready");
    await instance.app.request(jsonRequest("/api/v1/proposals/7/close", "POST"));

    const res = await instance.app.request("/ready");

    expect((await readJson<ReadyBody>(res)).eventLog).toEqual({
      status: "ok",
      events: 4,
      lastVerifiedPosition: 4,
      errors: 0,
    });
  });

  it("returns 503 once the service is stopped", async () => {
    const { app, service } = createTestApp();
    service.stop();

    const res = await app.request("/ready");

    expect(res.status).toBe(503);
    expect((await readJson<ReadyBody>(res)).status).toBe("not_ready");
  });
});
