/**
 * Settlement engine tests.
 *
 * Verifies the order of checks on the vote path, value routing, the
 * administrative lifecycle and replay from the event log.
 */

import { describe, it, expect, vi } from "vitest";
import { InMemoryEventStore } from "@tallybridge/event-store";
import { ComputeMeter, TAIL_RESERVE } from "../src/compute-meter.js";
import { InMemoryPriceOracle } from "../src/price-oracle.js";
import { SettlementEngine } from "../src/settlement-engine.js";
import { InMemoryValueRouter } from "../src/value-router.js";
import { SettlementError } from "../src/types.js";
import {
  ASSET,
  FALLBACK,
  SETUP,
  START,
  TRANSPORT,
  TREASURY,
  createHarness,
  delivery,
  eventTypes,
  lastPayload,
  openProposal,
  proposalDef,
  receiptId,
} from "./fixtures.js";

function settlementCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof SettlementError ? err.code : "unexpected";
  }
  return undefined;
}

// =============================================================================
// Acceptance
// =============================================================================

describe("accepting votes", () => {
  it("tallies the normalized weight and escrows the value", () => {
    const h = createHarness();
    openProposal(h);

    const outcome = h.adapter.onDelivery(TRANSPORT, delivery(1, { choiceId: 2 }));

    expect(outcome).toEqual({
      status: "accepted",
      receiptId: receiptId(1),
      proposalId: 7,
      choiceId: 2,
      weight: "2000000",
      staleOracle: false,
    });
    expect(h.engine.getTally(7)).toEqual(["0", "0", "2000000"]);
    expect(h.router.balanceOf("escrow:7", ASSET)).toBe(1_000_000n);
    expect(eventTypes(h)).toEqual(["proposal.created", "proposal.opened", "vote.cast"]);
  });

  it("records the vote in the proposal stream", () => {
    const h = createHarness();
    openProposal(h);
    h.adapter.onDelivery(TRANSPORT, delivery(1, { choiceId: 1, nonce: 55 }));

    const [cast] = h.events.read("proposal:7", { fromVersion: 3 });
    expect(cast?.event.payload).toEqual({
      proposalId: 7,
      choiceId: 1,
      normalizedWeight: "2000000",
      receiptId: receiptId(1),
      hint: null,
      staleOracle: false,
      rawAmount: "1000000",
      asset: ASSET,
      nonce: 55,
      source: "transport",
    });
    expect(cast?.event.metadata.correlationId).toBe(receiptId(1));
    expect(cast?.event.metadata.timestamp).toBe(new Date(START * 1000).toISOString());
  });
});

// =============================================================================
// Rejections, in check order
// =============================================================================

describe("rejecting votes", () => {
  it("forwards a re-delivered receipt as a duplicate without touching tallies", () => {
    const h = createHarness();
    openProposal(h);
    h.adapter.onDelivery(TRANSPORT, delivery(1));

    const outcome = h.adapter.onDelivery(TRANSPORT, delivery(1));

    expect(outcome).toEqual({ status: "rejected", receiptId: receiptId(1), reason: "duplicate", route: TREASURY });
    expect(h.engine.getTally(7)).toEqual(["2000000", "0", "0"]);
    expect(h.router.balanceOf(TREASURY, ASSET)).toBe(1_000_000n);
    expect(lastPayload(h)).toMatchObject({ reason: "duplicate", consumed: false, proposalId: 7 });
  });

  it("can skip duplicate events while still forwarding value", () => {
    const h = createHarness({ emitDuplicateRejections: false });
    openProposal(h);
    h.adapter.onDelivery(TRANSPORT, delivery(1));
    const before = h.events.globalPosition();

    h.adapter.onDelivery(TRANSPORT, delivery(1));

    expect(h.events.globalPosition()).toBe(before);
    expect(h.router.balanceOf(TREASURY, ASSET)).toBe(1_000_000n);
  });

  it("forwards votes for unknown proposals to the global fallback", () => {
    const h = createHarness();

    const outcome = h.adapter.onDelivery(TRANSPORT, delivery(1, { proposalId: 99 }));

    expect(outcome).toEqual({ status: "rejected", receiptId: receiptId(1), reason: "unknownOrClosed", route: FALLBACK });
    expect(lastPayload(h)).toEqual({
      reason: "unknownOrClosed",
      receiptId: receiptId(1),
      rawAmount: "1000000",
      asset: ASSET,
      route: FALLBACK,
      proposalId: 99,
      consumed: true,
      source: "transport",
    });
  });

  it("consumes the receipt of a vote for an unknown proposal", () => {
    const h = createHarness();
    h.adapter.onDelivery(TRANSPORT, delivery(1, { proposalId: 99 }));

    expect(h.engine.isConsumed(receiptId(1))).toBe(true);
    expect(h.adapter.onDelivery(TRANSPORT, delivery(1, { proposalId: 99 }))).toMatchObject({ reason: "duplicate" });
  });

  it("rejects draft proposals and votes before opensAt", () => {
    const h = createHarness();
    h.engine.createProposal(proposalDef());
    h.engine.createProposal(proposalDef({ id: 8, opensAt: START + 100 }));
    h.engine.openProposal(8);
    h.clock.set(START);

    expect(h.adapter.onDelivery(TRANSPORT, delivery(1))).toMatchObject({ reason: "unknownOrClosed", route: TREASURY });
    expect(h.adapter.onDelivery(TRANSPORT, delivery(2, { proposalId: 8 }))).toMatchObject({
      reason: "unknownOrClosed",
    });
  });

  it("closes a proposal lazily when a delivery arrives at closesAt", () => {
    const h = createHarness();
    openProposal(h);
    h.clock.set(START + 1_000);

    const outcome = h.adapter.onDelivery(TRANSPORT, delivery(1));

    expect(outcome).toMatchObject({ reason: "unknownOrClosed", route: TREASURY });
    expect(h.engine.getProposal(7)).toMatchObject({ state: "closed", closedAt: START + 1_000 });
    expect(eventTypes(h).slice(-2)).toEqual(["proposal.closed", "vote.rejected"]);
    expect(h.events.read("proposal:7").at(-1)?.event.payload).toEqual({
      proposalId: 7,
      closedAt: START + 1_000,
      trigger: "window",
    });
  });

  it("rejects transport votes for identity proposals", () => {
    const h = createHarness();
    openProposal(h, { mode: "identity" });

    expect(h.adapter.onDelivery(TRANSPORT, delivery(1))).toMatchObject({ reason: "modeMismatch", route: TREASURY });
  });

  it("rejects choices outside the declared range", () => {
    const h = createHarness();
    openProposal(h);

    expect(h.adapter.onDelivery(TRANSPORT, delivery(1, { choiceId: 3 }))).toMatchObject({ reason: "invalidChoice" });
    expect(h.engine.getTally(7)).toEqual(["0", "0", "0"]);
  });

  it("rejects when the asset has no price", () => {
    const h = createHarness({ price: null });
    openProposal(h);

    expect(h.adapter.onDelivery(TRANSPORT, delivery(1))).toMatchObject({ reason: "noPrice", route: TREASURY });
  });

  it("rejects stale prices under the reject policy", () => {
    const h = createHarness({ normalizer: { stalenessWindowSeconds: 60, staleOraclePolicy: "reject" } });
    openProposal(h);
    h.clock.advance(61);

    expect(h.adapter.onDelivery(TRANSPORT, delivery(1))).toMatchObject({ reason: "staleOracle" });
  });

  it("rejects without consuming when the budget is gone before the idempotency check", () => {
    const h = createHarness();
    openProposal(h);
    const meter = new ComputeMeter(TAIL_RESERVE);
    const receipt = {
      receiptId: receiptId(1),
      rawAmount: "5",
      asset: ASSET,
      payload: { version: 1, proposalId: 7, choiceId: 0, nonce: 1 },
    };

    const outcome = h.engine.settle(receipt, { source: "transport", carriesValue: true, meter });

    expect(outcome).toEqual({ status: "rejected", receiptId: receiptId(1), reason: "computeExhausted", route: FALLBACK });
    expect(h.engine.isConsumed(receiptId(1))).toBe(false);
    expect(meter.used).toBe(TAIL_RESERVE);
  });
});

// =============================================================================
// Administration
// =============================================================================

describe("administration", () => {
  it("emits lifecycle events with ledger timestamps", () => {
    const h = createHarness();
    openProposal(h);
    h.clock.advance(10);
    h.engine.closeProposal(7);
    h.clock.advance(10);
    h.engine.archiveProposal(7);

    expect(h.events.read("proposal:7").map((e) => e.event.payload)).toEqual([
      {
        proposalId: 7,
        choiceCount: 3,
        opensAt: START,
        closesAt: START + 1_000,
        treasuryRoute: TREASURY,
        mode: "payment",
        title: null,
        createdAt: SETUP,
      },
      { proposalId: 7, opensAt: START, closesAt: START + 1_000, openedAt: SETUP },
      { proposalId: 7, closedAt: START + 10, trigger: "admin" },
      { proposalId: 7, archivedAt: START + 20 },
    ]);
  });

  it("sweeps expired proposals", () => {
    const h = createHarness();
    openProposal(h, {}, { id: 8, closesAt: START + 5_000 });
    h.clock.set(START + 1_500);

    expect(h.engine.closeExpired().map((p) => p.id)).toEqual([7]);
    expect(h.engine.getProposal(7)?.closedAt).toBe(START + 1_000);
    expect(h.engine.getProposal(8)?.state).toBe("open");
  });

  it("prunes receipts of archived proposals only", () => {
    const h = createHarness();
    openProposal(h);
    h.adapter.onDelivery(TRANSPORT, delivery(1));
    h.adapter.onDelivery(TRANSPORT, delivery(2, { proposalId: 99 }));

    expect(settlementCode(() => h.engine.pruneProposal(7))).toBe("PRUNE_REFUSED");

    h.engine.closeProposal(7);
    h.engine.archiveProposal(7);
    expect(h.engine.pruneProposal(7)).toBe(1);
    expect(h.engine.isConsumed(receiptId(1))).toBe(false);
    expect(h.engine.isConsumed(receiptId(2))).toBe(true);

    // the archived proposal still refuses the re-delivered receipt
    expect(h.adapter.onDelivery(TRANSPORT, delivery(1))).toMatchObject({ reason: "unknownOrClosed" });
    expect(h.engine.getTally(7)).toEqual(["2000000", "0", "0"]);
  });

  it("leaves the registry untouched when a lifecycle event cannot be written", () => {
    const h = createHarness();
    const append = vi.spyOn(h.events, "append").mockImplementation(() => {
      throw new Error("disk full");
    });

    expect(() => h.engine.createProposal(proposalDef())).toThrow("disk full");
    expect(h.engine.getProposal(7)).toBeUndefined();
    expect(h.engine.getTally(7)).toBeUndefined();

    append.mockRestore();
    h.engine.createProposal(proposalDef());
    vi.spyOn(h.events, "append").mockImplementation(() => {
      throw new Error("disk full");
    });

    expect(() => h.engine.openProposal(7)).toThrow("disk full");
    expect(h.engine.getProposal(7)?.state).toBe("draft");
  });

  it("refuses to start over a non-empty store", () => {
    const h = createHarness();
    openProposal(h);

    expect(
      settlementCode(() =>
        SettlementEngine.create({
          events: h.events,
          oracle: h.oracle,
          router: h.router,
          clock: h.clock,
          fallbackRoute: FALLBACK,
        }),
      ),
    ).toBe("STORE_NOT_EMPTY");
  });
});

// =============================================================================
// Prices
// =============================================================================

describe("publishing prices", () => {
  it("records the snapshot before making it current", () => {
    const h = createHarness({ price: null });

    const snapshot = h.engine.publishPrice({ asset: ASSET, price: "1.5", observedAt: SETUP });

    expect(snapshot).toEqual({ asset: ASSET, price: "1.5", observedAt: SETUP });
    expect(h.oracle.latest(ASSET)).toEqual(snapshot);
    expect(h.events.read("oracle:prices").map((e) => [e.event.type, e.event.metadata.source])).toEqual([
      ["oracle.price.published", "oracle"],
    ]);
  });

  it("records nothing for a refused publication", () => {
    const h = createHarness();

    expect(settlementCode(() => h.engine.publishPrice({ asset: ASSET, price: "3", observedAt: START - 1 }))).toBe(
      "STALE_PUBLICATION",
    );
    expect(settlementCode(() => h.engine.publishPrice({ asset: ASSET, price: "0", observedAt: START }))).toBe(
      "INVALID_PRICE",
    );
    expect(h.events.globalPosition()).toBe(0);
    expect(h.oracle.latest(ASSET)?.price).toBe("2.0");
  });
});

// =============================================================================
// Restore
// =============================================================================

describe("restore", () => {
  it("rebuilds proposals, tallies and consumed receipts from the log", () => {
    const h = createHarness();
    openProposal(h, {}, { id: 8, choiceCount: 2 });
    h.adapter.onDelivery(TRANSPORT, delivery(1, { choiceId: 1 }));
    h.adapter.onDelivery(TRANSPORT, delivery(2, { proposalId: 8, choiceId: 0 }, "300"));
    h.adapter.onDelivery(TRANSPORT, delivery(3, { proposalId: 99 }));
    h.adapter.onDelivery(TRANSPORT, { ...delivery(4), memo: new Uint8Array([9]) });
    h.clock.advance(5);
    h.engine.closeProposal(8);

    const restored = SettlementEngine.restore({
      events: h.events,
      oracle: h.oracle,
      router: new InMemoryValueRouter(),
      clock: h.clock,
      fallbackRoute: FALLBACK,
    });

    expect(restored.getTally(7)).toEqual(["0", "2000000", "0"]);
    expect(restored.getTally(8)).toEqual(["600", "0"]);
    expect(restored.listProposals()).toEqual(h.engine.listProposals());
    for (const n of [1, 2, 3, 4]) {
      expect(restored.isConsumed(receiptId(n))).toBe(true);
    }
  });

  it("continues rejecting duplicates after a restore", () => {
    const h = createHarness();
    openProposal(h);
    h.adapter.onDelivery(TRANSPORT, delivery(1));

    const restored = SettlementEngine.restore({
      events: h.events,
      oracle: h.oracle,
      router: h.router,
      clock: h.clock,
      fallbackRoute: FALLBACK,
    });

    const receipt = {
      receiptId: receiptId(1),
      rawAmount: "1000000",
      asset: ASSET,
      payload: { version: 1, proposalId: 7, choiceId: 0, nonce: 1 },
    };
    expect(restored.settle(receipt, { source: "transport", carriesValue: true })).toMatchObject({
      reason: "duplicate",
    });
  });

  it("replays published prices into a fresh oracle", () => {
    const h = createHarness({ price: null });
    h.engine.publishPrice({ asset: ASSET, price: "3", observedAt: SETUP });
    openProposal(h);
    const oracle = new InMemoryPriceOracle();

    const restored = SettlementEngine.restore({
      events: h.events,
      oracle,
      router: new InMemoryValueRouter(),
      clock: h.clock,
      fallbackRoute: FALLBACK,
    });

    expect(oracle.latest(ASSET)).toEqual({ asset: ASSET, price: "3", observedAt: SETUP });
    const receipt = {
      receiptId: receiptId(1),
      rawAmount: "10",
      asset: ASSET,
      payload: { version: 1, proposalId: 7, choiceId: 0, nonce: 1 },
    };
    expect(restored.settle(receipt, { source: "transport", carriesValue: true })).toMatchObject({
      status: "accepted",
      weight: "30",
    });
  });

  it("replays pruning", () => {
    const h = createHarness();
    openProposal(h);
    h.adapter.onDelivery(TRANSPORT, delivery(1));
    h.engine.closeProposal(7);
    h.engine.archiveProposal(7);
    h.engine.pruneProposal(7);

    const restored = SettlementEngine.restore({
      events: h.events,
      oracle: h.oracle,
      router: h.router,
      clock: h.clock,
      fallbackRoute: FALLBACK,
    });
    expect(restored.isConsumed(receiptId(1))).toBe(false);
    expect(restored.getProposal(7)?.state).toBe("archived");
  });

  it("refuses an event with a malformed payload", () => {
    const events = new InMemoryEventStore();
    events.append("proposal:7", [
      {
        type: "vote.cast",
        metadata: {
          eventId: "e1",
          timestamp: "2026-01-01T00:00:00.000Z",
          actor: "test",
          correlationId: "c1",
          source: "transport",
        },
        payload: { proposalId: 7 },
      },
    ]);
    const h = createHarness();

    expect(
      settlementCode(() =>
        SettlementEngine.restore({ events, oracle: h.oracle, router: h.router, clock: h.clock, fallbackRoute: FALLBACK }),
      ),
    ).toBe("INVALID_EVENT");
  });
});
